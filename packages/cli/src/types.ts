/**
 * Types for wgpeers CLI
 */

import type { ErrorCode, ErrorKind, ParseMode, PeerRecord } from '@wgpeers/config';
import type { LogLevel } from './config.js';

export interface CLIOptions {
  json: boolean;
  mode: ParseMode;
  logLevel: LogLevel;
}

/**
 * Serialized form of a PeerEntryParseError
 */
export interface PeerFailure {
  code: ErrorCode;
  kind: ErrorKind;
  line: number;
  lines: readonly string[];
}

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  code?: string;
  failures?: PeerFailure[];
  timing?: {
    started: number;
    completed: number;
    duration: number;
  };
}

export interface ListResult {
  /** File path, or "-" for stdin */
  source: string;
  peers: PeerRecord[];
}

export interface ShowResult {
  source: string;
  peer: PeerRecord;
}
