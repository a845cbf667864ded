/**
 * wgpeers command definitions
 * Commands: list, show
 */

import { Command } from 'commander';
import type { Logger } from 'pino';
import { ListCommand, ShowCommand } from './commands/peers.js';
import { loadConfig, resolveOptions, type GlobalFlags } from './config.js';
import { getVersion } from './lib/version.js';
import { createLogger } from './logger.js';
import type { CLIOptions, CommandResult, ListResult, ShowResult } from './types.js';
import { createExitHandler, formatOutput, handleError } from './utils.js';

export interface ProgramIO {
  stdout: (text: string) => void;
  exit: (code: number) => void;
  env: NodeJS.ProcessEnv;
  stdin?: NodeJS.ReadableStream;
  /** Overrides the stderr logger built from the resolved log level */
  logger?: Logger;
}

const defaultIO: ProgramIO = {
  stdout: (text) => console.log(text),
  exit: createExitHandler(),
  env: process.env,
};

export function createProgram(io: ProgramIO = defaultIO): Command {
  const program = new Command();

  program
    .name('wgpeers')
    .description('List [Peer] entries and friendly names from a WireGuard configuration')
    .version(getVersion())
    .showHelpAfterError();

  // Global options
  program
    .option('-j, --json', 'output in JSON format')
    .option('-v, --verbose', 'debug logging on stderr')
    .option('-m, --mode <mode>', 'failure mode: fail-fast or collect (env WGPEERS_PARSE_MODE)');

  /**
   * Resolve options, run the command and report. Configuration errors are
   * reported like command failures.
   */
  async function run<T extends ListResult | ShowResult>(
    execute: (options: CLIOptions, logger: Logger) => Promise<CommandResult<T>>
  ): Promise<void> {
    const flags = program.opts<GlobalFlags>();
    let options: CLIOptions;
    try {
      options = resolveOptions(loadConfig(io.env), flags);
    } catch (error) {
      io.stdout(formatOutput(handleError(error), flags.json ?? false));
      io.exit(1);
      return;
    }

    const logger = io.logger ?? createLogger(options.logLevel);
    const result = await execute(options, logger);
    io.stdout(formatOutput(result, options.json));
    io.exit(result.success ? 0 : 1);
  }

  // wgpeers list [wg0.conf]
  program
    .command('list [config-file]')
    .description('List every peer (reads stdin when no file is given)')
    .action(async (configFile: string | undefined) => {
      await run((options, logger) =>
        new ListCommand({ logger, stdin: io.stdin }).execute(configFile, options)
      );
    });

  // wgpeers show <public-key> [wg0.conf]
  program
    .command('show <public-key> [config-file]')
    .description('Show one peer by public key')
    .action(async (publicKey: string, configFile: string | undefined) => {
      await run((options, logger) =>
        new ShowCommand({ logger, stdin: io.stdin }).execute(publicKey, configFile, options)
      );
    });

  return program;
}
