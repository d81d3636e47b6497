/**
 * Registrations every profile shares: fetchers, extractors, reset actions,
 * the content-source lifecycle and the core commands.
 */

import type { RegisterCallback } from '../plugin-engine/PluginRegistry.js';
import { CoreCommands } from '../plugins/commands/CoreCommands.js';
import { HtmlExtractor } from '../plugins/extractors/HtmlExtractor.js';
import { PlainTextExtractor } from '../plugins/extractors/PlainTextExtractor.js';
import { FileContentFetcher } from '../plugins/fetchers/FileContentFetcher.js';
import { HttpContentFetcher } from '../plugins/fetchers/HttpContentFetcher.js';
import { ContentSourceLifecycleAction } from '../plugins/lifecycle/ContentSourceLifecycleAction.js';
import { StorageResetAction, TaskQueueResetAction } from '../plugins/reset/ResetActions.js';

export function registerContentFetcher(register: RegisterCallback): void {
    register(new FileContentFetcher());
    register(new HttpContentFetcher());
}

/** HTML first: the plain-text extractor accepts every text/* type */
export function registerContentExtractor(register: RegisterCallback): void {
    register(new HtmlExtractor());
    register(new PlainTextExtractor());
}

export function registerLifecycleAction(register: RegisterCallback): void {
    register(new ContentSourceLifecycleAction());
}

export function registerResetAction(register: RegisterCallback): void {
    register(new StorageResetAction());
    register(new TaskQueueResetAction());
}

export function registerCommandRegistrar(register: RegisterCallback): void {
    register(new CoreCommands());
}
