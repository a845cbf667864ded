/**
 * @wgpeers/config/peer - Builds a PeerRecord from one [Peer] block
 */

import { parseCommentKeyValue } from './comment.js';
import { COMMENT_PREFIX, FRIENDLY_NAME_KEY, FUNCTIONAL_KEYS } from './constants.js';
import { ErrorCodes, PeerEntryParseError } from './errors.js';
import type { BuildResult, PeerBlock, PeerRecord } from './types.js';

/**
 * Case-insensitive prefix test. Only the prefix window is lower-cased so the
 * rest of the line is never case-folded.
 */
function hasKeyPrefix(line: string, prefix: string): boolean {
  return line.slice(0, prefix.length).toLowerCase() === prefix;
}

/**
 * Text after the first `=`, trimmed. A line without `=` yields the whole
 * line, trimmed.
 */
function valueAfterEquals(line: string): string {
  const eq = line.indexOf('=');
  return (eq === -1 ? line : line.slice(eq + 1)).trim();
}

/**
 * Scan a block into a PeerRecord.
 *
 * `PublicKey` and `AllowedIPs` are matched case-insensitively on the key
 * only. A repeated key overwrites the earlier value, and so does a repeated
 * `friendly_name` comment. Every other line is ignored.
 */
export function tryBuildPeerRecord(block: PeerBlock): BuildResult {
  let publicKey = '';
  let allowedIps = '';
  let name: string | undefined;

  for (const line of block.lines) {
    if (hasKeyPrefix(line, FUNCTIONAL_KEYS.publicKey)) {
      publicKey = valueAfterEquals(line);
    } else if (hasKeyPrefix(line, FUNCTIONAL_KEYS.allowedIps)) {
      allowedIps = valueAfterEquals(line);
    } else {
      const trimmed = line.trim();
      if (!trimmed.startsWith(COMMENT_PREFIX)) continue;

      const pair = parseCommentKeyValue(trimmed);
      if (pair && pair[0] === FRIENDLY_NAME_KEY) {
        name = pair[1];
      }
    }
  }

  if (publicKey === '') {
    return {
      ok: false,
      error: new PeerEntryParseError(ErrorCodes.PUBLIC_KEY_NOT_FOUND, block.line, block.lines),
    };
  }
  if (allowedIps === '') {
    return {
      ok: false,
      error: new PeerEntryParseError(ErrorCodes.ALLOWED_IPS_NOT_FOUND, block.line, block.lines),
    };
  }

  const record: PeerRecord = name === undefined ? { publicKey, allowedIps } : { publicKey, allowedIps, name };
  return { ok: true, value: record };
}

/**
 * Same as {@link tryBuildPeerRecord} but throws the failure.
 *
 * @throws PeerEntryParseError when PublicKey or AllowedIPs is missing or empty
 */
export function buildPeerRecord(block: PeerBlock): PeerRecord {
  const result = tryBuildPeerRecord(block);
  if (!result.ok) throw result.error;
  return result.value;
}
