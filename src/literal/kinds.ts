import { CH_DQUOTE, CH_HASH, CH_SQUOTE, CH_b, CH_r, isDigit } from '../decode/chars'
import { docCommentStyle } from '../decode/comments'
import { hasFloatPart, scanNumber } from '../decode/numbers'
import { isFloatSuffix } from '../options'

/**
 * The eight interpretations a caller can request for a lexeme.
 * Uses a numeric const enum like the scanner's token kinds.
 */
export const enum LiteralKind {
  Int = 0,
  Float = 1,
  String = 2,
  Char = 3,
  Bytes = 4,
  Byte = 5,
  InnerDoc = 6,
  OuterDoc = 7,
}

/** What a tokenizer knows about a literal token before decoding it. */
export type LiteralClass =
  | 'integer'
  | 'float'
  | 'string'
  | 'char'
  | 'byte'
  | 'byte-string'
  | 'line-comment'
  | 'block-comment'

export const LITERAL_KIND_NAMES: Readonly<Record<string, LiteralKind>> = {
  int: LiteralKind.Int,
  float: LiteralKind.Float,
  string: LiteralKind.String,
  char: LiteralKind.Char,
  bytes: LiteralKind.Bytes,
  byte: LiteralKind.Byte,
  'inner-doc': LiteralKind.InnerDoc,
  'outer-doc': LiteralKind.OuterDoc,
}

export function literalKindName(kind: LiteralKind): string {
  switch (kind) {
    case LiteralKind.Int:
      return 'int'
    case LiteralKind.Float:
      return 'float'
    case LiteralKind.String:
      return 'string'
    case LiteralKind.Char:
      return 'char'
    case LiteralKind.Bytes:
      return 'bytes'
    case LiteralKind.Byte:
      return 'byte'
    case LiteralKind.InnerDoc:
      return 'inner-doc'
    case LiteralKind.OuterDoc:
      return 'outer-doc'
  }
}

/** Whether a token of class `cls` can hold a value of the requested kind. */
export function acceptsClass(kind: LiteralKind, cls: LiteralClass): boolean {
  switch (kind) {
    case LiteralKind.Int:
      return cls === 'integer'
    case LiteralKind.Float:
      return cls === 'float'
    case LiteralKind.String:
      return cls === 'string'
    case LiteralKind.Char:
      return cls === 'char'
    case LiteralKind.Bytes:
      return cls === 'byte-string'
    case LiteralKind.Byte:
      return cls === 'byte'
    case LiteralKind.InnerDoc:
    case LiteralKind.OuterDoc:
      return cls === 'line-comment' || cls === 'block-comment'
  }
}

/**
 * Classify a lexeme from its prefix. Only the leading characters are
 * inspected (plus the number scan), so a malformed body still classifies.
 */
export function classifyLexeme(lexeme: string): LiteralClass | null {
  const c0 = lexeme.charCodeAt(0)
  const c1 = lexeme.charCodeAt(1)

  if (isDigit(c0)) {
    const num = scanNumber(lexeme)
    if (num === null) return null
    return hasFloatPart(num) || isFloatSuffix(num.suffix) ? 'float' : 'integer'
  }
  if (c0 === CH_DQUOTE) return 'string'
  if (c0 === CH_SQUOTE) return 'char'
  if (c0 === CH_r && (c1 === CH_DQUOTE || c1 === CH_HASH)) return 'string'
  if (c0 === CH_b) {
    if (c1 === CH_SQUOTE) return 'byte'
    if (c1 === CH_DQUOTE || c1 === CH_r) return 'byte-string'
    return null
  }
  const doc = docCommentStyle(lexeme)
  if (doc !== null) {
    return doc.style === 'line' ? 'line-comment' : 'block-comment'
  }
  return null
}
