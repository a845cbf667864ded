/**
 * @wgpeers/config - Type definitions
 */

import type { PeerEntryParseError } from './errors.js';

/**
 * A peer extracted from one `[Peer]` section.
 */
export interface PeerRecord {
  /** Value of the `PublicKey` entry; identity of the record */
  readonly publicKey: string;
  /** Value of the `AllowedIPs` entry, kept verbatim (not parsed as CIDR) */
  readonly allowedIps: string;
  /** Value of the last `# friendly_name = ...` comment, if any */
  readonly name?: string;
}

/**
 * Non-blank lines of one `[Peer]` section.
 */
export interface PeerBlock {
  /** 1-based line number of the `[Peer]` header */
  line: number;
  /** Block lines, verbatim and in original order */
  lines: string[];
}

/**
 * Records keyed by public key. A later block with the same key replaces the earlier one.
 */
export type PeerCollection = ReadonlyMap<string, PeerRecord>;

/**
 * - fail-fast: stop at the first block that cannot be built (default)
 * - collect: build every block and report all failures
 */
export type ParseMode = 'fail-fast' | 'collect';

/**
 * Minimal structured logger. A pino `Logger` satisfies it.
 */
export interface ParseLogger {
  debug(obj: object, msg?: string): void;
}

export interface ParseOptions {
  /** Failure policy (defaults to 'fail-fast') */
  mode?: ParseMode;
  /** Receives debug records for segmented blocks and the finished collection */
  logger?: ParseLogger;
}

export interface ParseSuccess {
  ok: true;
  peers: PeerCollection;
}

export interface ParseFailure {
  ok: false;
  /** First failing block, in input order */
  error: PeerEntryParseError;
  /** Every failure found; a single entry in fail-fast mode */
  errors: PeerEntryParseError[];
}

export type ParsePeersResult = ParseSuccess | ParseFailure;

export type BuildResult = { ok: true; value: PeerRecord } | { ok: false; error: PeerEntryParseError };
