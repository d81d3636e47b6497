import * as development from './development/index.js';
import * as production from './production/index.js';
import * as test from './test/index.js';

const PROFILES: Readonly<Record<string, object>> = { test, development, production };

export const PROFILE_NAMES = Object.keys(PROFILES);

/**
 * Module object whose registration hooks make up the profile, or undefined
 * for an unknown name.
 */
export function getProfile(name: string): object | undefined {
    return Object.prototype.hasOwnProperty.call(PROFILES, name) ? PROFILES[name] : undefined;
}
