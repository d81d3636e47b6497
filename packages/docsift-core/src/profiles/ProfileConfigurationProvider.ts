import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import type { ConfigurationProvider } from '../plugin-engine/types.js';

/**
 * Serves a profile's `<profile>.yaml` as default configuration.
 */
export class ProfileConfigurationProvider implements ConfigurationProvider {
    readonly pluginId: string;

    constructor(
        private readonly profile: string,
        private readonly file: URL
    ) {
        this.pluginId = `profile_${profile}_configuration`;
    }

    getConfigurationId(): string {
        return `profile:${this.profile}`;
    }

    getDefaultConfiguration(): string {
        return readFileSync(fileURLToPath(this.file), 'utf8');
    }
}
