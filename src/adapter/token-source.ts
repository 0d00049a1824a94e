import type { FloatLiteral } from '../decode/floats'
import type { IntegerLiteral } from '../decode/integers'
import { defaultDecoder, type LiteralDecoder } from '../decoder'
import { acceptsClass, LiteralKind, type LiteralClass } from '../literal/kinds'
import type { Span, TokenSource } from '../literal/token'

/**
 * Token source over any value whose `toString()` is the literal's text.
 * Useful in tests and for lexemes that were not produced by a tokenizer.
 */
export class TextLiteral implements TokenSource {
  constructor(private readonly text: { toString(): string }) {}

  lexeme(): string {
    return this.text.toString()
  }

  toString(): string {
    return this.lexeme()
  }
}

/**
 * Token source for a tokenizer that reports tokens as offsets into the
 * source text, optionally with the class it already determined.
 */
export class SpanLiteral implements TokenSource {
  constructor(
    private readonly source: string,
    private readonly span: Span,
    private readonly cls?: LiteralClass,
  ) {}

  lexeme(): string {
    return this.source.substring(this.span.start, this.span.end)
  }

  classify(): LiteralClass | undefined {
    return this.cls
  }
}

/**
 * Extension-style accessors over a token source. Each accessor returns null
 * when the token is not that kind of literal; malformed escaped content
 * throws DecodeError.
 */
export class Literal {
  constructor(
    readonly source: TokenSource,
    private readonly decoder: LiteralDecoder = defaultDecoder,
  ) {}

  asInt(): IntegerLiteral | null {
    return this.read(LiteralKind.Int, (s) => this.decoder.decodeInt(s))
  }

  asFloat(): FloatLiteral | null {
    return this.read(LiteralKind.Float, (s) => this.decoder.decodeFloat(s))
  }

  asString(): string | null {
    return this.read(LiteralKind.String, (s) => this.decoder.decodeString(s))
  }

  asChar(): string | null {
    return this.read(LiteralKind.Char, (s) => this.decoder.decodeChar(s))
  }

  asBytes(): Uint8Array | null {
    return this.read(LiteralKind.Bytes, (s) => this.decoder.decodeBytes(s))
  }

  asByte(): number | null {
    return this.read(LiteralKind.Byte, (s) => this.decoder.decodeByte(s))
  }

  asInnerDoc(): string | null {
    return this.read(LiteralKind.InnerDoc, (s) => this.decoder.decodeInnerDoc(s))
  }

  asOuterDoc(): string | null {
    return this.read(LiteralKind.OuterDoc, (s) => this.decoder.decodeOuterDoc(s))
  }

  // An unclassified source is tried as every kind
  private read<T>(kind: LiteralKind, decode: (lexeme: string) => T | null): T | null {
    const cls = this.source.classify?.()
    if (cls !== undefined && !acceptsClass(kind, cls)) {
      return null
    }
    return decode(this.source.lexeme())
  }
}
