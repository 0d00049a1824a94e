import { decodeInnerDoc, decodeOuterDoc, docCommentStyle } from './decode/comments'
import { DecodeError } from './decode/errors'
import { decodeFloat, type FloatLiteral } from './decode/floats'
import { decodeInt, type IntegerLiteral } from './decode/integers'
import { decodeByte, decodeByteString, decodeChar, decodeString } from './decode/quoted'
import { acceptsClass, classifyLexeme, LiteralKind } from './literal/kinds'
import type { TokenSource } from './literal/token'
import { resolveOptions, type DecoderOptions, type ResolvedOptions } from './options'

/** Value type produced for each requested kind. */
export interface LiteralValues {
  [LiteralKind.Int]: IntegerLiteral
  [LiteralKind.Float]: FloatLiteral
  [LiteralKind.String]: string
  [LiteralKind.Char]: string
  [LiteralKind.Bytes]: Uint8Array
  [LiteralKind.Byte]: number
  [LiteralKind.InnerDoc]: string
  [LiteralKind.OuterDoc]: string
}

export type LiteralValue = {
  [K in LiteralKind]: { kind: K; value: LiteralValues[K] }
}[LiteralKind]

/**
 * Outcome of a decode request. `mismatch` means the lexeme is not the
 * requested kind (or is out of range) and another kind may apply;
 * `malformed` means it is that kind but its content is corrupt.
 */
export type DecodeResult<T> =
  | { status: 'ok'; value: T }
  | { status: 'mismatch' }
  | { status: 'malformed'; error: DecodeError }

type DecodeTable = {
  [K in keyof LiteralValues]: (lexeme: string) => LiteralValues[K] | null
}

const MISMATCH = { status: 'mismatch' } as const

/**
 * Decodes literal lexemes under one set of options. Each operation returns
 * null when the lexeme is not of that kind and throws DecodeError when its
 * escaped content is malformed.
 */
export class LiteralDecoder {
  readonly options: ResolvedOptions
  private table: DecodeTable

  constructor(options?: DecoderOptions) {
    this.options = resolveOptions(options)
    this.table = {
      [LiteralKind.Int]: (s) => this.decodeInt(s),
      [LiteralKind.Float]: (s) => this.decodeFloat(s),
      [LiteralKind.String]: (s) => this.decodeString(s),
      [LiteralKind.Char]: (s) => this.decodeChar(s),
      [LiteralKind.Bytes]: (s) => this.decodeBytes(s),
      [LiteralKind.Byte]: (s) => this.decodeByte(s),
      [LiteralKind.InnerDoc]: (s) => this.decodeInnerDoc(s),
      [LiteralKind.OuterDoc]: (s) => this.decodeOuterDoc(s),
    }
  }

  decodeInt(lexeme: string): IntegerLiteral | null {
    return decodeInt(lexeme, this.options)
  }

  decodeFloat(lexeme: string): FloatLiteral | null {
    return decodeFloat(lexeme, this.options)
  }

  decodeString(lexeme: string): string | null {
    return decodeString(lexeme)
  }

  decodeChar(lexeme: string): string | null {
    return decodeChar(lexeme)
  }

  decodeBytes(lexeme: string): Uint8Array | null {
    return decodeByteString(lexeme)
  }

  decodeByte(lexeme: string): number | null {
    return decodeByte(lexeme)
  }

  decodeInnerDoc(lexeme: string): string | null {
    return decodeInnerDoc(lexeme)
  }

  decodeOuterDoc(lexeme: string): string | null {
    return decodeOuterDoc(lexeme)
  }

  /** Run one operation, reporting the outcome as a DecodeResult. */
  decode<K extends LiteralKind>(kind: K, lexeme: string): DecodeResult<LiteralValues[K]> {
    const fn = this.table[kind]
    try {
      const value = fn(lexeme)
      return value === null ? MISMATCH : { status: 'ok', value }
    } catch (err) {
      if (err instanceof DecodeError) {
        return { status: 'malformed', error: err }
      }
      throw err
    }
  }

  /** Like decode(), reading the lexeme from a token source. */
  decodeToken<K extends LiteralKind>(kind: K, source: TokenSource): DecodeResult<LiteralValues[K]> {
    const cls = source.classify?.()
    if (cls !== undefined && !acceptsClass(kind, cls)) {
      return MISMATCH
    }
    return this.decode(kind, source.lexeme())
  }

  /**
   * Classify the lexeme by its prefix and decode it as that kind.
   * Returns null when it is no known literal or does not decode.
   */
  decodeAny(lexeme: string): LiteralValue | null {
    switch (classifyLexeme(lexeme)) {
      case 'integer': {
        const value = this.decodeInt(lexeme)
        return value === null ? null : { kind: LiteralKind.Int, value }
      }
      case 'float': {
        const value = this.decodeFloat(lexeme)
        return value === null ? null : { kind: LiteralKind.Float, value }
      }
      case 'string': {
        const value = this.decodeString(lexeme)
        return value === null ? null : { kind: LiteralKind.String, value }
      }
      case 'char': {
        const value = this.decodeChar(lexeme)
        return value === null ? null : { kind: LiteralKind.Char, value }
      }
      case 'byte-string': {
        const value = this.decodeBytes(lexeme)
        return value === null ? null : { kind: LiteralKind.Bytes, value }
      }
      case 'byte': {
        const value = this.decodeByte(lexeme)
        return value === null ? null : { kind: LiteralKind.Byte, value }
      }
      case 'line-comment':
      case 'block-comment': {
        if (docCommentStyle(lexeme)?.polarity === 'inner') {
          const value = this.decodeInnerDoc(lexeme)
          return value === null ? null : { kind: LiteralKind.InnerDoc, value }
        }
        const value = this.decodeOuterDoc(lexeme)
        return value === null ? null : { kind: LiteralKind.OuterDoc, value }
      }
      case null:
        return null
    }
  }
}

// Decoder with the default options, shared by the free functions
export const defaultDecoder = new LiteralDecoder()
