import { CH_BSLASH, CH_DQUOTE, CH_HASH, CH_SQUOTE, CH_b, CH_r } from './chars'
import { DecodeError } from './errors'
import { EscapeMode, unescapeBytes, unescapeText, unescapeUnits } from './escapes'

interface ContentSpan {
  start: number
  end: number
}

/**
 * Content span of a quoted literal whose opening quote is at `open`.
 * A closing quote preceded by an odd run of backslashes is escaped, so the
 * literal is not closed.
 */
function quotedSpan(lexeme: string, open: number, quote: number): ContentSpan | null {
  const end = lexeme.length - 1
  if (end <= open || lexeme.charCodeAt(open) !== quote || lexeme.charCodeAt(end) !== quote) {
    return null
  }
  let backslashes = 0
  for (let i = end - 1; i > open && lexeme.charCodeAt(i) === CH_BSLASH; i--) {
    backslashes++
  }
  if (backslashes % 2 === 1) {
    return null
  }
  return { start: open + 1, end }
}

/** Content span of a raw string: r"..." or r##"..."## starting at `prefixLen`. */
function rawSpan(lexeme: string, prefixLen: number): ContentSpan | null {
  let pos = prefixLen
  while (lexeme.charCodeAt(pos) === CH_HASH) {
    pos++
  }
  const hashes = pos - prefixLen
  if (lexeme.charCodeAt(pos) !== CH_DQUOTE) {
    return null
  }
  const start = pos + 1
  const end = lexeme.length - hashes - 1
  if (end < start || lexeme.charCodeAt(end) !== CH_DQUOTE) {
    return null
  }
  for (let i = end + 1; i < lexeme.length; i++) {
    if (lexeme.charCodeAt(i) !== CH_HASH) return null
  }
  return { start, end }
}

/** Decode "..." or r#"..."#. */
export function decodeString(lexeme: string): string | null {
  switch (lexeme.charCodeAt(0)) {
    case CH_DQUOTE: {
      const span = quotedSpan(lexeme, 0, CH_DQUOTE)
      return span === null ? null : unescapeText(lexeme, span.start, span.end)
    }
    case CH_r: {
      const span = rawSpan(lexeme, 1)
      return span === null ? null : lexeme.substring(span.start, span.end)
    }
    default:
      return null
  }
}

/** Decode b"..." or br#"..."#. */
export function decodeByteString(lexeme: string): Uint8Array | null {
  if (lexeme.charCodeAt(0) !== CH_b) {
    return null
  }
  switch (lexeme.charCodeAt(1)) {
    case CH_DQUOTE: {
      const span = quotedSpan(lexeme, 1, CH_DQUOTE)
      return span === null ? null : unescapeBytes(lexeme, span.start, span.end)
    }
    case CH_r: {
      const span = rawSpan(lexeme, 2)
      if (span === null) {
        return null
      }
      const out = new Uint8Array(span.end - span.start)
      for (let i = span.start; i < span.end; i++) {
        const c = lexeme.charCodeAt(i)
        if (c >= 0x80) {
          throw new DecodeError('non-ascii-byte', lexeme, i)
        }
        out[i - span.start] = c
      }
      return out
    }
    default:
      return null
  }
}

/** Decode '...' holding exactly one Unicode scalar value. */
export function decodeChar(lexeme: string): string | null {
  const span = quotedSpan(lexeme, 0, CH_SQUOTE)
  if (span === null) {
    return null
  }
  const units = unescapeUnits(lexeme, span.start, span.end, EscapeMode.Text)
  return units.length === 1 ? String.fromCodePoint(units[0]) : null
}

/** Decode b'...' holding exactly one byte. */
export function decodeByte(lexeme: string): number | null {
  if (lexeme.charCodeAt(0) !== CH_b) {
    return null
  }
  const span = quotedSpan(lexeme, 1, CH_SQUOTE)
  if (span === null) {
    return null
  }
  const units = unescapeUnits(lexeme, span.start, span.end, EscapeMode.Bytes)
  return units.length === 1 ? units[0] : null
}
