import {
  CH_0,
  CH_BSLASH,
  CH_CR,
  CH_DQUOTE,
  CH_LBRACE,
  CH_NEWLINE,
  CH_RBRACE,
  CH_SQUOTE,
  CH_UNDERSCORE,
  CH_n,
  CH_r,
  CH_t,
  CH_u,
  CH_x,
  hexDigitVal,
  isAsciiWhitespace,
  isWhitespace,
} from './chars'
import { DecodeError, type DecodeErrorCode } from './errors'

export const enum EscapeMode {
  // Content decodes to Unicode scalar values
  Text = 0,
  // Content decodes to bytes; \u{...} and non-ASCII characters are errors
  Bytes = 1,
}

// Returned by EscapeScanner.next() when a line continuation produced nothing
export const NONE = -1

const MAX_UNICODE_DIGITS = 6

/**
 * Decodes the content span [start, end) of a quoted literal one unit at a
 * time. Offsets in errors are relative to the whole lexeme.
 */
export class EscapeScanner {
  private src: string
  private pos: number
  private end: number
  private mode: EscapeMode
  private continuation: boolean

  constructor(src: string, start: number, end: number, mode: EscapeMode, continuation: boolean) {
    this.src = src
    this.pos = start
    this.end = end
    this.mode = mode
    this.continuation = continuation
  }

  atEnd(): boolean {
    return this.pos >= this.end
  }

  /**
   * Read the next code point (text) or byte (bytes), or NONE after a line
   * continuation. Throws DecodeError for malformed content.
   */
  next(): number {
    const c = this.ch()
    if (c === CH_BSLASH) {
      return this.escape()
    }
    if (c === CH_CR) {
      // CRLF is a line break; a lone CR is not allowed
      if (this.chAt(this.pos + 1) === CH_NEWLINE) {
        this.pos += 2
        return CH_NEWLINE
      }
      throw this.error('bare-carriage-return', this.pos)
    }
    if (this.mode === EscapeMode.Bytes) {
      if (c >= 0x80) {
        throw this.error('non-ascii-byte', this.pos)
      }
      this.pos++
      return c
    }
    const cp = this.src.codePointAt(this.pos) ?? c
    this.pos += cp > 0xffff ? 2 : 1
    return cp
  }

  private ch(): number {
    return this.src.charCodeAt(this.pos)
  }

  // NaN past the content span, so comparisons fail
  private chAt(i: number): number {
    return i < this.end ? this.src.charCodeAt(i) : NaN
  }

  private error(code: DecodeErrorCode, offset: number, detail?: string): DecodeError {
    return new DecodeError(code, this.src, offset, detail)
  }

  private escape(): number {
    const start = this.pos
    this.pos++ // skip backslash
    if (this.pos >= this.end) {
      throw this.error('dangling-backslash', start)
    }
    const c = this.ch()
    this.pos++
    switch (c) {
      case CH_n:
        return 0x0a
      case CH_r:
        return 0x0d
      case CH_t:
        return 0x09
      case CH_BSLASH:
        return CH_BSLASH
      case CH_0:
        return 0
      case CH_SQUOTE:
        return CH_SQUOTE
      case CH_DQUOTE:
        return CH_DQUOTE
      case CH_x:
        return this.hexEscape(start)
      case CH_u:
        return this.unicodeEscape(start)
      case CH_NEWLINE:
        return this.lineContinuation(start)
      case CH_CR:
        if (this.chAt(this.pos) === CH_NEWLINE) {
          this.pos++
          return this.lineContinuation(start)
        }
        throw this.error('bare-carriage-return', this.pos - 1)
      default: {
        const escaped = String.fromCodePoint(this.src.codePointAt(this.pos - 1) ?? c)
        throw this.error('unknown-escape', start, `\\${escaped}`)
      }
    }
  }

  // \xHH: exactly two hex digits
  private hexEscape(start: number): number {
    const hi = hexDigitVal(this.chAt(this.pos))
    const lo = hexDigitVal(this.chAt(this.pos + 1))
    if (hi < 0 || lo < 0) {
      throw this.error('invalid-hex-escape', start)
    }
    this.pos += 2
    const value = hi * 16 + lo
    if (this.mode === EscapeMode.Text && value > 0x7f) {
      throw this.error('hex-escape-out-of-range', start, this.src.substring(start, this.pos))
    }
    return value
  }

  // \u{H...}: 1-6 hex digits, '_' allowed after the first
  private unicodeEscape(start: number): number {
    if (this.mode === EscapeMode.Bytes) {
      throw this.error('unicode-escape-in-bytes', start)
    }
    if (this.chAt(this.pos) !== CH_LBRACE) {
      throw this.error('invalid-unicode-escape', start, 'expected {')
    }
    this.pos++

    let value = 0
    let digits = 0
    for (;;) {
      const c = this.chAt(this.pos)
      if (c === CH_RBRACE) {
        this.pos++
        break
      }
      const d = hexDigitVal(c)
      if (d >= 0) {
        value = value * 16 + d
        digits++
      } else if (c !== CH_UNDERSCORE || digits === 0) {
        throw this.error('invalid-unicode-escape', start, Number.isNaN(c) ? 'unterminated' : undefined)
      }
      this.pos++
    }

    if (digits === 0 || digits > MAX_UNICODE_DIGITS) {
      throw this.error('invalid-unicode-escape', start, `${digits} hex digits`)
    }
    if (value > 0x10ffff || (value >= 0xd800 && value <= 0xdfff)) {
      throw this.error('invalid-unicode-scalar', start, value.toString(16))
    }
    return value
  }

  private lineContinuation(start: number): number {
    if (!this.continuation) {
      throw this.error('unknown-escape', start, 'line continuation')
    }
    const isSpace = this.mode === EscapeMode.Bytes ? isAsciiWhitespace : isWhitespace
    while (this.pos < this.end) {
      const cp = this.src.codePointAt(this.pos) ?? 0
      if (!isSpace(cp)) break
      this.pos += cp > 0xffff ? 2 : 1
    }
    return NONE
  }
}

export function unescapeText(src: string, start: number, end: number, continuation = true): string {
  const scanner = new EscapeScanner(src, start, end, EscapeMode.Text, continuation)
  let out = ''
  while (!scanner.atEnd()) {
    const cp = scanner.next()
    if (cp !== NONE) out += String.fromCodePoint(cp)
  }
  return out
}

export function unescapeBytes(src: string, start: number, end: number, continuation = true): Uint8Array {
  const scanner = new EscapeScanner(src, start, end, EscapeMode.Bytes, continuation)
  const out: number[] = []
  while (!scanner.atEnd()) {
    const b = scanner.next()
    if (b !== NONE) out.push(b)
  }
  return Uint8Array.from(out)
}

/** Decode every unit of a span without line continuations (char and byte literals). */
export function unescapeUnits(src: string, start: number, end: number, mode: EscapeMode): number[] {
  const scanner = new EscapeScanner(src, start, end, mode, false)
  const out: number[] = []
  while (!scanner.atEnd()) {
    out.push(scanner.next())
  }
  return out
}
