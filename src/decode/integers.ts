import { hexDigitVal } from './chars'
import { hasFloatPart, scanNumber } from './numbers'
import { isFloatSuffix, type IntegerSuffix, type ResolvedOptions } from '../options'

export type IntegerWidth = 8 | 16 | 32 | 64 | 128 | 'size'

export interface IntegerType {
  signed: boolean
  width: IntegerWidth
}

export interface IntegerValue extends IntegerType {
  magnitude: bigint
  // Resolved bit count; 'size' becomes the configured pointer width
  bits: number
  isNegative: boolean
}

const U64_MAX = (1n << 64n) - 1n
const U128_MAX = (1n << 128n) - 1n

const INTEGER_TYPES: Readonly<Record<IntegerSuffix, IntegerType>> = {
  u8: { signed: false, width: 8 },
  i8: { signed: true, width: 8 },
  u16: { signed: false, width: 16 },
  i16: { signed: true, width: 16 },
  u32: { signed: false, width: 32 },
  i32: { signed: true, width: 32 },
  u64: { signed: false, width: 64 },
  i64: { signed: true, width: 64 },
  u128: { signed: false, width: 128 },
  i128: { signed: true, width: 128 },
  usize: { signed: false, width: 'size' },
  isize: { signed: true, width: 'size' },
}

export function integerType(suffix: IntegerSuffix): IntegerType {
  return INTEGER_TYPES[suffix]
}

/** Largest positive value of the type; a lexeme never carries a sign. */
export function maxMagnitude(signed: boolean, bits: number): bigint {
  const b = BigInt(signed ? bits - 1 : bits)
  return (1n << b) - 1n
}

/**
 * A decoded integer literal. The per-type accessors return null when the
 * literal was written with a different suffix or the value does not fit.
 */
export class IntegerLiteral implements IntegerValue {
  readonly magnitude: bigint
  readonly signed: boolean
  readonly width: IntegerWidth
  readonly bits: number
  readonly isNegative = false
  readonly suffix: IntegerSuffix | ''
  private options: ResolvedOptions

  constructor(magnitude: bigint, suffix: IntegerSuffix | '', options: ResolvedOptions) {
    const type = integerType(suffix === '' ? options.defaultInteger : suffix)
    this.magnitude = magnitude
    this.signed = type.signed
    this.width = type.width
    this.bits = type.width === 'size' ? options.pointerWidth : type.width
    this.suffix = suffix
    this.options = options
  }

  asU8(): number | null {
    return this.asSmall('u8')
  }

  asI8(): number | null {
    return this.asSmall('i8')
  }

  asU16(): number | null {
    return this.asSmall('u16')
  }

  asI16(): number | null {
    return this.asSmall('i16')
  }

  asU32(): number | null {
    return this.asSmall('u32')
  }

  asI32(): number | null {
    return this.asSmall('i32')
  }

  asU64(): bigint | null {
    return this.as('u64')
  }

  asI64(): bigint | null {
    return this.as('i64')
  }

  asU128(): bigint | null {
    return this.as('u128')
  }

  asI128(): bigint | null {
    return this.as('i128')
  }

  asUsize(): bigint | null {
    return this.as('usize')
  }

  asIsize(): bigint | null {
    return this.as('isize')
  }

  /** The value as the given type, or null if the suffix differs or it overflows. */
  as(target: IntegerSuffix): bigint | null {
    if (this.suffix !== '' && this.suffix !== target) {
      return null
    }
    const type = integerType(target)
    if (type.width === 128 && !this.options.wideIntegers) {
      return null
    }
    const bits = type.width === 'size' ? this.options.pointerWidth : type.width
    if (this.magnitude > maxMagnitude(type.signed, bits)) {
      return null
    }
    return this.magnitude
  }

  toNumber(): number {
    return Number(this.magnitude)
  }

  private asSmall(target: IntegerSuffix): number | null {
    const v = this.as(target)
    return v === null ? null : Number(v)
  }
}

/**
 * Decode an integer literal. Returns null for floats, unknown suffixes,
 * values past the widest enabled type, and values that do not fit the
 * type their suffix names.
 */
export function decodeInt(lexeme: string, options: ResolvedOptions): IntegerLiteral | null {
  const num = scanNumber(lexeme)
  if (num === null || hasFloatPart(num)) {
    return null
  }
  const suffix = num.suffix
  if (isFloatSuffix(suffix)) {
    return null
  }
  if (!options.wideIntegers && (suffix === 'u128' || suffix === 'i128')) {
    return null
  }

  const limit = options.wideIntegers ? U128_MAX : U64_MAX
  const base = BigInt(num.radix)
  let value = 0n
  for (let i = 0; i < num.digits.length; i++) {
    value = value * base + BigInt(hexDigitVal(num.digits.charCodeAt(i)))
    if (value > limit) {
      return null
    }
  }

  const lit = new IntegerLiteral(value, suffix, options)
  // Unsuffixed literals are range-checked by the accessors
  if (suffix !== '' && value > maxMagnitude(lit.signed, lit.bits)) {
    return null
  }
  return lit
}
