/**
 * @wgpeers/config/segmenter - Splits configuration text into [Peer] blocks
 */

import { PEER_SECTION_HEADER, SECTION_PREFIX } from './constants.js';
import type { PeerBlock } from './types.js';

/**
 * Group the lines of every `[Peer]` section into blocks.
 *
 * Any line starting with `[` closes the open block. Only an exact `[Peer]`
 * header opens a new one, so `[Interface]` and other sections are skipped
 * along with their content. Empty lines inside a block are dropped; all
 * other lines, whitespace-only ones included, are kept verbatim. A `[Peer]`
 * header with no content still yields an (empty) block.
 */
export function segmentPeerBlocks(text: string): PeerBlock[] {
  const blocks: PeerBlock[] = [];
  let current: PeerBlock | null = null;

  const lines = text.split('\n');
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].endsWith('\r') ? lines[i].slice(0, -1) : lines[i];

    if (line.startsWith(SECTION_PREFIX)) {
      if (current) {
        blocks.push(current);
        current = null;
      }
      if (line === PEER_SECTION_HEADER) {
        current = { line: i + 1, lines: [] };
      }
    } else if (current && line !== '') {
      current.lines.push(line);
    }
  }

  if (current) {
    blocks.push(current);
  }

  return blocks;
}
