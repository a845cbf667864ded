/**
 * CLI utilities and formatting
 */

import chalk from 'chalk';
import { PeerEntryParseError, type PeerRecord } from '@wgpeers/config';
import { ConfigError } from './config.js';
import type { CommandResult, ListResult, PeerFailure, ShowResult } from './types.js';

export function formatOutput(result: CommandResult<ListResult | ShowResult>, json = false): string {
  if (json) {
    return JSON.stringify(result, null, 2);
  }

  if (!result.success) {
    return formatFailure(result);
  }

  if (result.data && 'peers' in result.data) {
    return formatPeerList(result.data);
  }
  if (result.data && 'peer' in result.data) {
    return formatPeerDetail(result.data);
  }

  return JSON.stringify(result.data, null, 2);
}

function formatPeerLine(peer: PeerRecord): string {
  return `${chalk.green(peer.publicKey)}  ${peer.allowedIps}  ${peer.name ?? chalk.dim('-')}`;
}

function formatPeerList(data: ListResult): string {
  if (data.peers.length === 0) {
    return chalk.yellow(`No peers in ${data.source}`);
  }
  return data.peers.map(formatPeerLine).join('\n');
}

function formatPeerDetail(data: ShowResult): string {
  return [
    `Public key: ${chalk.green(data.peer.publicKey)}`,
    `Allowed IPs: ${data.peer.allowedIps}`,
    `Name: ${data.peer.name ?? '-'}`,
  ].join('\n');
}

function formatFailure(result: CommandResult): string {
  const lines = [chalk.red(`Error: ${result.error ?? 'Unknown error'}`)];

  for (const failure of result.failures ?? []) {
    lines.push('', `${failure.code} in [Peer] block at line ${failure.line}:`);
    if (failure.lines.length === 0) {
      lines.push(chalk.dim('  (empty block)'));
    }
    for (const line of failure.lines) {
      lines.push(`  ${line}`);
    }
  }

  return lines.join('\n');
}

export function createExitHandler() {
  return (code: number) => {
    process.exit(code);
  };
}

export function toPeerFailure(error: PeerEntryParseError): PeerFailure {
  return error.toJSON();
}

export function handleError(error: unknown): CommandResult<never> {
  if (error instanceof PeerEntryParseError) {
    return {
      success: false,
      error: error.message,
      code: error.code,
      failures: [toPeerFailure(error)],
    };
  }
  if (error instanceof ConfigError) {
    return { success: false, error: error.message, code: error.code };
  }
  return {
    success: false,
    error: error instanceof Error ? error.message : String(error),
  };
}

export function timing() {
  const started = Date.now();
  return {
    started,
    end: () => {
      const completed = Date.now();
      return {
        started,
        completed,
        duration: completed - started,
      };
    },
  };
}
