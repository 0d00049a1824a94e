// Public API for the literal decoder.
// Usage: import { decodeInt, decodeString } from 'litval';

import { defaultDecoder, LiteralDecoder, type DecodeResult, type LiteralValue, type LiteralValues } from './decoder'
import type { FloatLiteral } from './decode/floats'
import type { IntegerLiteral } from './decode/integers'
import type { LiteralKind } from './literal/kinds'
import type { TokenSource } from './literal/token'
import type { DecoderOptions } from './options'

export function createDecoder(options?: DecoderOptions): LiteralDecoder {
  return new LiteralDecoder(options)
}

export function decodeInt(lexeme: string): IntegerLiteral | null {
  return defaultDecoder.decodeInt(lexeme)
}

export function decodeFloat(lexeme: string): FloatLiteral | null {
  return defaultDecoder.decodeFloat(lexeme)
}

export function decodeString(lexeme: string): string | null {
  return defaultDecoder.decodeString(lexeme)
}

export function decodeChar(lexeme: string): string | null {
  return defaultDecoder.decodeChar(lexeme)
}

export function decodeBytes(lexeme: string): Uint8Array | null {
  return defaultDecoder.decodeBytes(lexeme)
}

export function decodeByte(lexeme: string): number | null {
  return defaultDecoder.decodeByte(lexeme)
}

export function decodeInnerDoc(lexeme: string): string | null {
  return defaultDecoder.decodeInnerDoc(lexeme)
}

export function decodeOuterDoc(lexeme: string): string | null {
  return defaultDecoder.decodeOuterDoc(lexeme)
}

export function decode<K extends LiteralKind>(kind: K, lexeme: string): DecodeResult<LiteralValues[K]> {
  return defaultDecoder.decode(kind, lexeme)
}

export function decodeToken<K extends LiteralKind>(kind: K, source: TokenSource): DecodeResult<LiteralValues[K]> {
  return defaultDecoder.decodeToken(kind, source)
}

export function decodeAny(lexeme: string): LiteralValue | null {
  return defaultDecoder.decodeAny(lexeme)
}

// Re-export types for consumers
export { LiteralDecoder }
export type { DecodeResult, LiteralValue, LiteralValues } from './decoder'
export { LiteralKind, LITERAL_KIND_NAMES, acceptsClass, classifyLexeme, literalKindName } from './literal/kinds'
export type { LiteralClass } from './literal/kinds'
export type { Span, TokenSource } from './literal/token'
export { Literal, SpanLiteral, TextLiteral } from './adapter/token-source'
export { IntegerLiteral, integerType, maxMagnitude } from './decode/integers'
export type { IntegerType, IntegerValue, IntegerWidth } from './decode/integers'
export { FloatLiteral } from './decode/floats'
export type { FloatValue } from './decode/floats'
export { scanNumber } from './decode/numbers'
export type { NumericLexeme, Radix } from './decode/numbers'
export { EscapeMode, EscapeScanner, unescapeBytes, unescapeText } from './decode/escapes'
export { docCommentStyle } from './decode/comments'
export type { CommentStyle, DocCommentStyle, DocPolarity } from './decode/comments'
export { DecodeError, DECODE_ERROR_MESSAGES, isDecodeError } from './decode/errors'
export type { DecodeErrorCode, DecodeErrorData } from './decode/errors'
export { FLOAT_SUFFIXES, INTEGER_SUFFIXES, isFloatSuffix, isIntegerSuffix, resolveOptions } from './options'
export type {
  DecoderOptions,
  FloatSuffix,
  FloatWidth,
  IntegerSuffix,
  NumericSuffix,
  PointerWidth,
  ResolvedOptions,
} from './options'
