#!/usr/bin/env node
import { config } from './config/EnvConfig.js';
import { describeError } from '@docsift/async-utils';
import { runCli } from './cli.js';
import { ConsoleLogger } from './logging/Logger.js';
import { Application } from './startup/Application.js';

const logger = new ConsoleLogger('docsift', config.LOG_LEVEL);
const application = new Application({ logger, configDir: config.DOCSIFT_CONFIG_DIR });
const shutdown = new AbortController();

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
        logger.info(`Received ${signal}, shutting down...`);
        shutdown.abort();
    });
}

process.on('unhandledRejection', (reason: unknown) => {
    logger.error(`Unhandled rejection: ${describeError(reason)}`);
});

async function main(): Promise<number> {
    logger.info(`Profile: ${config.DOCSIFT_PROFILE}`);
    await application.bootstrap({ profile: config.DOCSIFT_PROFILE, paths: config.DOCSIFT_PLUGIN_PATHS });
    return runCli(application, process.argv.slice(2), { logger, signal: shutdown.signal });
}

main().then(
    code => process.exit(code),
    async (error: unknown) => {
        logger.error(`Fatal: ${describeError(error)}`);
        await application.stop();
        process.exit(1);
    }
);
