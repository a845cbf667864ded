/**
 * Peer entry parse error codes.
 */

export const ErrorCodes = {
  /** Block has no usable PublicKey entry */
  PUBLIC_KEY_NOT_FOUND: 'E_PUBLIC_KEY_NOT_FOUND',
  /** Block has no usable AllowedIPs entry */
  ALLOWED_IPS_NOT_FOUND: 'E_ALLOWED_IPS_NOT_FOUND',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Error kind for each code.
 */
export const ErrorKinds = {
  [ErrorCodes.PUBLIC_KEY_NOT_FOUND]: 'PublicKeyNotFound',
  [ErrorCodes.ALLOWED_IPS_NOT_FOUND]: 'AllowedIPsEntryNotFound',
} as const satisfies Record<ErrorCode, string>;

export type ErrorKind = (typeof ErrorKinds)[ErrorCode];

const ErrorMessages: Record<ErrorCode, string> = {
  [ErrorCodes.PUBLIC_KEY_NOT_FOUND]: 'no PublicKey entry',
  [ErrorCodes.ALLOWED_IPS_NOT_FOUND]: 'no AllowedIPs entry',
};

/**
 * A `[Peer]` block is missing a required field.
 * Carries a copy of the block's lines for diagnostics.
 */
export class PeerEntryParseError extends Error {
  readonly code: ErrorCode;
  readonly kind: ErrorKind;
  /** 1-based line number of the block's `[Peer]` header */
  readonly line: number;
  readonly lines: readonly string[];

  constructor(code: ErrorCode, line: number, lines: readonly string[]) {
    super(`${ErrorKinds[code]}: [Peer] block at line ${line} has ${ErrorMessages[code]}`);
    this.name = 'PeerEntryParseError';
    this.code = code;
    this.kind = ErrorKinds[code];
    this.line = line;
    this.lines = [...lines];
  }

  toJSON(): { code: ErrorCode; kind: ErrorKind; line: number; lines: readonly string[] } {
    return { code: this.code, kind: this.kind, line: this.line, lines: this.lines };
  }
}
