/**
 * @wgpeers/config
 *
 * Extracts [Peer] records, including `# friendly_name` metadata, from
 * WireGuard configuration text.
 */

// Types
export type {
  PeerRecord,
  PeerBlock,
  PeerCollection,
  ParseMode,
  ParseLogger,
  ParseOptions,
  ParseSuccess,
  ParseFailure,
  ParsePeersResult,
  BuildResult,
} from './types.js';

// Constants
export { FRIENDLY_NAME_KEY, PEER_SECTION_HEADER } from './constants.js';

// Parsing stages
export { segmentPeerBlocks } from './segmenter.js';
export { parseCommentKeyValue } from './comment.js';
export { buildPeerRecord, tryBuildPeerRecord } from './peer.js';
export { parsePeers, parsePeersOrThrow, findPeerName, listPeers } from './collection.js';

// Validation
export { PeerRecordSchema } from './schema.js';
export type { PeerRecordType } from './schema.js';

// Errors
export { ErrorCodes, ErrorKinds, PeerEntryParseError } from './errors.js';
export type { ErrorCode, ErrorKind } from './errors.js';
