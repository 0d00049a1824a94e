import {
  CH_0,
  CH_B,
  CH_DOT,
  CH_E,
  CH_MINUS,
  CH_O,
  CH_PLUS,
  CH_UNDERSCORE,
  CH_X,
  CH_b,
  CH_e,
  CH_o,
  CH_x,
  isDigit,
  isHexDigit,
} from './chars'
import { isFloatSuffix, isIntegerSuffix, type NumericSuffix } from '../options'

export type Radix = 2 | 8 | 10 | 16

/**
 * The parts of a numeric literal, with `_` separators removed.
 * `fraction` and `exponent` are only ever set for radix 10.
 */
export interface NumericLexeme {
  radix: Radix
  digits: string
  // Digits after '.', possibly empty ("1." has fraction '')
  fraction?: string
  // Signed exponent digits, e.g. '-23'
  exponent?: string
  suffix: NumericSuffix | ''
}

class DigitReader {
  pos: number

  constructor(
    private src: string,
    start: number,
  ) {
    this.pos = start
  }

  ch(): number {
    return this.src.charCodeAt(this.pos)
  }

  /** Consume a run of digits and separators, returning the digits only. */
  readRun(isValid: (c: number) => boolean): string {
    let out = ''
    while (this.pos < this.src.length) {
      const c = this.ch()
      if (c === CH_UNDERSCORE) {
        this.pos++
      } else if (isValid(c)) {
        out += this.src[this.pos]
        this.pos++
      } else {
        break
      }
    }
    return out
  }

  rest(): string {
    return this.src.substring(this.pos)
  }
}

function radixFromPrefix(c: number): Radix {
  if (c === CH_x || c === CH_X) return 16
  if (c === CH_o || c === CH_O) return 8
  if (c === CH_b || c === CH_B) return 2
  return 10
}

/**
 * Split a numeric lexeme into radix, digits, float parts and suffix.
 * Returns null when the lexeme is not a number, has an empty digit body,
 * a digit outside its radix, an exponent without digits, or an unknown suffix.
 */
export function scanNumber(lexeme: string): NumericLexeme | null {
  if (!isDigit(lexeme.charCodeAt(0))) {
    return null
  }

  let radix: Radix = 10
  let start = 0
  if (lexeme.charCodeAt(0) === CH_0 && lexeme.length > 1) {
    radix = radixFromPrefix(lexeme.charCodeAt(1))
    if (radix !== 10) start = 2
  }

  const reader = new DigitReader(lexeme, start)
  // Binary and octal bodies are read as decimal so a stray '8' or '2' is
  // rejected here instead of being mistaken for a suffix.
  const digits = reader.readRun(radix === 16 ? isHexDigit : isDigit)
  if (digits.length === 0) {
    return null
  }
  if (radix === 2 || radix === 8) {
    for (let i = 0; i < digits.length; i++) {
      if (digits.charCodeAt(i) - CH_0 >= radix) return null
    }
  }

  let fraction: string | undefined
  let exponent: string | undefined
  if (radix === 10) {
    if (reader.ch() === CH_DOT) {
      reader.pos++
      fraction = reader.readRun(isDigit)
    }
    const c = reader.ch()
    if (c === CH_e || c === CH_E) {
      reader.pos++
      let sign = ''
      const s = reader.ch()
      if (s === CH_PLUS || s === CH_MINUS) {
        sign = s === CH_MINUS ? '-' : ''
        reader.pos++
      }
      const expDigits = reader.readRun(isDigit)
      if (expDigits.length === 0) {
        return null
      }
      exponent = sign + expDigits
    }
  }

  const suffix = reader.rest()
  if (suffix !== '' && !isIntegerSuffix(suffix) && !isFloatSuffix(suffix)) {
    return null
  }

  const result: NumericLexeme = { radix, digits, suffix }
  if (fraction !== undefined) result.fraction = fraction
  if (exponent !== undefined) result.exponent = exponent
  return result
}

/** True when the lexeme carries a fraction or an exponent. */
export function hasFloatPart(num: NumericLexeme): boolean {
  return num.fraction !== undefined || num.exponent !== undefined
}
