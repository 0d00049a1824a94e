/**
 * Decode errors for literal content that is committed to an escaped form
 * but cannot be decoded. A lexeme that is simply not the requested kind of
 * literal is reported as `null`, never as a `DecodeError`.
 */

export type DecodeErrorCode =
  | 'unknown-escape'
  | 'invalid-hex-escape'
  | 'hex-escape-out-of-range'
  | 'invalid-unicode-escape'
  | 'invalid-unicode-scalar'
  | 'unicode-escape-in-bytes'
  | 'bare-carriage-return'
  | 'non-ascii-byte'
  | 'dangling-backslash'

export const DECODE_ERROR_MESSAGES: Readonly<Record<DecodeErrorCode, string>> = {
  'unknown-escape': 'unknown character escape',
  'invalid-hex-escape': '\\x must be followed by exactly two hex digits',
  'hex-escape-out-of-range': 'out of range hex escape, must be at most \\x7F',
  'invalid-unicode-escape': 'malformed \\u{...} escape',
  'invalid-unicode-scalar': 'escape does not name a Unicode scalar value',
  'unicode-escape-in-bytes': 'unicode escape in byte content',
  'bare-carriage-return': 'bare CR not allowed in literal content',
  'non-ascii-byte': 'non-ASCII character in byte content',
  'dangling-backslash': 'backslash at end of literal content',
}

export interface DecodeErrorData {
  code: DecodeErrorCode
  message: string
  lexeme: string
  offset: number
}

export class DecodeError extends Error {
  readonly code: DecodeErrorCode
  readonly lexeme: string
  // Offset of the offending character within the lexeme
  readonly offset: number

  constructor(code: DecodeErrorCode, lexeme: string, offset: number, detail?: string) {
    const base = DECODE_ERROR_MESSAGES[code]
    super(detail !== undefined ? `${base}: ${detail} at offset ${offset}` : `${base} at offset ${offset}`)
    this.name = 'DecodeError'
    this.code = code
    this.lexeme = lexeme
    this.offset = offset
  }

  toData(): DecodeErrorData {
    return {
      code: this.code,
      message: this.message.replace(/ at offset \d+$/, ''),
      lexeme: this.lexeme,
      offset: this.offset,
    }
  }
}

export function isDecodeError(value: unknown): value is DecodeError {
  return value instanceof DecodeError
}
