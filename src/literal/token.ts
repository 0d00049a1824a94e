import type { LiteralClass } from './kinds'

/**
 * Source span (UTF-16 offsets into the source string).
 */
export interface Span {
  start: number
  end: number
}

/**
 * Anything that can hand over the exact text of one literal token.
 * Host tokenizers that already know the token's class report it through
 * `classify`, which lets the decoder skip interpretations that cannot apply.
 */
export interface TokenSource {
  lexeme(): string
  classify?(): LiteralClass | undefined
}
