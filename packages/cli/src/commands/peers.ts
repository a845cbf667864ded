/**
 * wgpeers list / show commands
 * Peer extraction from a WireGuard configuration file or stdin
 */

import { listPeers, parsePeers, type ParseFailure, type ParsePeersResult } from '@wgpeers/config';
import type { Logger } from 'pino';
import { readConfigText } from '../lib/input.js';
import type { CLIOptions, CommandResult, ListResult, ShowResult } from '../types.js';
import { handleError, timing, toPeerFailure } from '../utils.js';

export interface CommandContext {
  logger: Logger;
  stdin?: NodeJS.ReadableStream;
}

function failureResult(result: ParseFailure): CommandResult<never> {
  return {
    success: false,
    error:
      result.errors.length > 1
        ? `${result.errors.length} [Peer] blocks are invalid; first: ${result.error.message}`
        : result.error.message,
    code: result.error.code,
    failures: result.errors.map(toPeerFailure),
  };
}

abstract class PeersCommand {
  constructor(protected readonly context: CommandContext) {}

  protected async load(
    configPath: string | undefined,
    options: CLIOptions
  ): Promise<{ source: string; result: ParsePeersResult }> {
    const { source, text } = await readConfigText(configPath, this.context.stdin);
    const logger = this.context.logger.child({ source });
    logger.debug({ bytes: Buffer.byteLength(text, 'utf-8'), mode: options.mode }, 'parsing configuration');

    const result = parsePeers(text, { mode: options.mode, logger });
    if (!result.ok) {
      logger.warn({ errors: result.errors.map(toPeerFailure) }, 'configuration rejected');
    }
    return { source, result };
  }
}

export class ListCommand extends PeersCommand {
  async execute(configPath: string | undefined, options: CLIOptions): Promise<CommandResult<ListResult>> {
    const timer = timing();

    try {
      const { source, result } = await this.load(configPath, options);
      if (!result.ok) {
        return { ...failureResult(result), timing: timer.end() };
      }

      return {
        success: true,
        data: { source, peers: listPeers(result.peers) },
        timing: timer.end(),
      };
    } catch (error) {
      return {
        ...handleError(error),
        timing: timer.end(),
      };
    }
  }
}

export class ShowCommand extends PeersCommand {
  async execute(
    publicKey: string,
    configPath: string | undefined,
    options: CLIOptions
  ): Promise<CommandResult<ShowResult>> {
    const timer = timing();

    try {
      const { source, result } = await this.load(configPath, options);
      if (!result.ok) {
        return { ...failureResult(result), timing: timer.end() };
      }

      const peer = result.peers.get(publicKey);
      if (!peer) {
        return {
          success: false,
          error: `No peer with public key ${publicKey} in ${source}`,
          code: 'E_PEER_NOT_FOUND',
          timing: timer.end(),
        };
      }

      return {
        success: true,
        data: { source, peer },
        timing: timer.end(),
      };
    } catch (error) {
      return {
        ...handleError(error),
        timing: timer.end(),
      };
    }
  }
}
