/**
 * @wgpeers/cli - wgpeers command-line utilities
 */

export { ListCommand, ShowCommand } from './commands/peers.js';
export type { CommandContext } from './commands/peers.js';
export { createProgram } from './program.js';
export type { ProgramIO } from './program.js';
export { loadConfig, resolveOptions, ConfigError, LOG_LEVELS } from './config.js';
export type { CliConfig, GlobalFlags, LogLevel } from './config.js';
export { createLogger } from './logger.js';
export { readConfigText } from './lib/input.js';
export { formatOutput, createExitHandler, handleError } from './utils.js';
export type { CLIOptions, CommandResult, ListResult, ShowResult, PeerFailure } from './types.js';
