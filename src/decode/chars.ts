// Character code constants
export const CH_0 = 0x30 // '0'
const CH_9 = 0x39 // '9'
const CH_A = 0x41 // 'A'
export const CH_B = 0x42
export const CH_E = 0x45
const CH_F = 0x46
export const CH_O = 0x4f
export const CH_X = 0x58
const CH_a = 0x61 // 'a'
export const CH_b = 0x62
export const CH_e = 0x65
const CH_f = 0x66
export const CH_n = 0x6e
export const CH_o = 0x6f
export const CH_r = 0x72
export const CH_t = 0x74
export const CH_u = 0x75
export const CH_x = 0x78
export const CH_DQUOTE = 0x22 // '"'
export const CH_HASH = 0x23 // '#'
export const CH_SQUOTE = 0x27 // "'"
export const CH_STAR = 0x2a // '*'
export const CH_PLUS = 0x2b
export const CH_MINUS = 0x2d
export const CH_DOT = 0x2e // '.'
export const CH_SLASH = 0x2f // '/'
export const CH_BANG = 0x21 // '!'
export const CH_BSLASH = 0x5c // '\'
export const CH_UNDERSCORE = 0x5f // '_'
export const CH_LBRACE = 0x7b
export const CH_RBRACE = 0x7d
export const CH_NEWLINE = 0x0a // '\n'
export const CH_CR = 0x0d // '\r'
const CH_TAB = 0x09
export const CH_SPACE = 0x20 // ' '

export function isDigit(c: number): boolean {
  return c >= CH_0 && c <= CH_9
}

export function isHexDigit(c: number): boolean {
  return (c >= CH_0 && c <= CH_9) || (c >= CH_a && c <= CH_f) || (c >= CH_A && c <= CH_F)
}

/** Value of a hex digit, or -1 when `c` is not one. */
export function hexDigitVal(c: number): number {
  if (c >= CH_0 && c <= CH_9) return c - CH_0
  if (c >= CH_a && c <= CH_f) return c - CH_a + 10
  if (c >= CH_A && c <= CH_F) return c - CH_A + 10
  return -1
}

/**
 * Unicode White_Space, the set a line continuation skips in text content.
 */
export function isWhitespace(c: number): boolean {
  if (c <= 0x7f) {
    return c === CH_SPACE || (c >= CH_TAB && c <= CH_CR)
  }
  return (
    c === 0x85 ||
    c === 0xa0 ||
    c === 0x1680 ||
    (c >= 0x2000 && c <= 0x200a) ||
    c === 0x2028 ||
    c === 0x2029 ||
    c === 0x202f ||
    c === 0x205f ||
    c === 0x3000
  )
}

export function isAsciiWhitespace(c: number): boolean {
  return c === CH_SPACE || (c >= CH_TAB && c <= CH_CR)
}
