/**
 * @wgpeers/config - Parser constants
 */

/**
 * Section header that opens a peer block.
 * Matched exactly: no surrounding whitespace, case-sensitive.
 */
export const PEER_SECTION_HEADER = '[Peer]' as const;

/**
 * Lower-cased prefixes of the functional keys WireGuard interprets.
 * Only a window of this length is case-folded before comparison.
 */
export const FUNCTIONAL_KEYS = {
  publicKey: 'publickey' as const,
  allowedIps: 'allowedips' as const,
} as const;

/**
 * Metadata key carried inside `# key=value` comments.
 * WireGuard ignores comment lines, so the friendly name survives `wg-quick`.
 */
export const FRIENDLY_NAME_KEY = 'friendly_name' as const;

export const COMMENT_PREFIX = '#' as const;
export const SECTION_PREFIX = '[' as const;
