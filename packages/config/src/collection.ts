/**
 * Peer collection parser
 *
 * Single entry point from configuration text to a map of peers keyed by
 * public key. In fail-fast mode the first block that cannot be built aborts
 * the parse; there is no partial result. Collect mode builds every block and
 * reports all failures, still without a partial result.
 */

import type { PeerEntryParseError } from './errors.js';
import { tryBuildPeerRecord } from './peer.js';
import { segmentPeerBlocks } from './segmenter.js';
import type { ParseOptions, ParsePeersResult, PeerCollection, PeerRecord } from './types.js';

/**
 * Parse configuration text into a peer collection.
 *
 * A later block with an already-seen public key replaces the earlier record.
 *
 * @param text - Full configuration text
 * @param options - Failure mode and optional debug logger
 * @returns Collection, or the failure(s) in block order
 */
export function parsePeers(text: string, options: ParseOptions = {}): ParsePeersResult {
  const mode = options.mode ?? 'fail-fast';
  const { logger } = options;

  const blocks = segmentPeerBlocks(text);
  logger?.debug({ blocks }, 'segmented peer blocks');

  const peers = new Map<string, PeerRecord>();
  const errors: PeerEntryParseError[] = [];

  for (const block of blocks) {
    const result = tryBuildPeerRecord(block);
    if (!result.ok) {
      errors.push(result.error);
      if (mode === 'fail-fast') break;
      continue;
    }
    peers.set(result.value.publicKey, result.value);
  }

  if (errors.length > 0) {
    return { ok: false, error: errors[0], errors };
  }

  logger?.debug({ peers: Object.fromEntries(peers) }, 'parsed peer collection');
  return { ok: true, peers };
}

/**
 * Parse configuration text, throwing the first failure.
 *
 * @throws PeerEntryParseError
 */
export function parsePeersOrThrow(text: string, options: ParseOptions = {}): PeerCollection {
  const result = parsePeers(text, options);
  if (!result.ok) throw result.error;
  return result.peers;
}

/**
 * Friendly name for a public key, if the peer exists and has one.
 */
export function findPeerName(peers: PeerCollection, publicKey: string): string | undefined {
  return peers.get(publicKey)?.name;
}

/**
 * Records in collection order (first insertion of each public key).
 */
export function listPeers(peers: PeerCollection): PeerRecord[] {
  return [...peers.values()];
}
