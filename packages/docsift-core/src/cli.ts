import type { Logger } from './logging/Logger.js';
import type { Application } from './startup/Application.js';

export interface CliOptions {
    logger: Logger;
    signal: AbortSignal;
    print?: (line: string) => void;
}

/**
 * Dispatch `argv` (command name first, `run` when empty) to the command table
 * of a bootstrapped application. Resolves to the exit code.
 */
export async function runCli(application: Application, argv: readonly string[], options: CliOptions): Promise<number> {
    const print = options.print ?? ((line: string) => console.log(line));
    const [name = 'run', ...args] = argv;
    const commands = application.getCommands();

    if (name === 'help' || name === '--help') {
        print('Usage: docsift <command> [options]');
        for (const command of commands.values()) {
            print(`  ${command.name.padEnd(8)} ${command.description}`);
        }
        return 0;
    }

    const command = commands.get(name);
    if (!command) {
        options.logger.error(`Unknown command '${name}' (available: ${[...commands.keys()].join(', ')})`);
        return 1;
    }
    return command.run({ args, logger: options.logger, application, signal: options.signal, print });
}
