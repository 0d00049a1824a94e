import { hasFloatPart, scanNumber, type NumericLexeme } from './numbers'
import { isIntegerSuffix, type FloatSuffix, type FloatWidth, type ResolvedOptions } from '../options'

export interface FloatValue {
  value: number
  width: FloatWidth
}

// Halfway between the largest binary32 value and 2^128
const F32_OVERFLOW_MIDPOINT = 2 ** 128 - 2 ** 103

function f32Bits(x: number): number {
  const view = new DataView(new ArrayBuffer(4))
  view.setFloat32(0, x)
  return view.getUint32(0)
}

function f32FromBits(bits: number): number {
  const view = new DataView(new ArrayBuffer(4))
  view.setUint32(0, bits)
  return view.getFloat32(0)
}

/** Adjacent binary32 value above (`up`) or below `f`. */
function nextF32(f: number, up: boolean): number {
  if (f === 0) {
    const tiny = f32FromBits(1)
    return up ? tiny : -tiny
  }
  const away = f > 0 === up
  const bits = f32Bits(f)
  return f32FromBits(away ? bits + 1 : bits - 1)
}

/** Split a finite double into an integer mantissa and a power of two. */
function decomposeF64(x: number): { mantissa: bigint; exp2: number } {
  const view = new DataView(new ArrayBuffer(8))
  view.setFloat64(0, x)
  const bits = view.getBigUint64(0)
  const biased = Number((bits >> 52n) & 0x7ffn)
  const frac = bits & ((1n << 52n) - 1n)
  if (biased === 0) {
    return { mantissa: frac, exp2: -1074 }
  }
  return { mantissa: frac | (1n << 52n), exp2: biased - 1075 }
}

/**
 * Compare digits * 10^exp10 against a finite non-negative double, exactly.
 */
function compareDecimal(digits: bigint, exp10: number, x: number): number {
  const { mantissa, exp2 } = decomposeF64(x)
  let lhs = digits
  let rhs = mantissa
  if (exp10 >= 0) lhs *= 10n ** BigInt(exp10)
  else rhs *= 10n ** BigInt(-exp10)
  if (exp2 >= 0) rhs <<= BigInt(exp2)
  else lhs <<= BigInt(-exp2)
  return lhs < rhs ? -1 : lhs > rhs ? 1 : 0
}

/**
 * Round the decimal number to the nearest binary32 value. Rounding the
 * double first is only wrong when the double lands exactly on a binary32
 * midpoint, so that case is settled against the exact decimal value.
 */
export function decimalToF32(num: NumericLexeme): number {
  const d = Number(decimalText(num))
  const f = Math.fround(d)
  if (f === d || Number.isNaN(d)) {
    return f
  }

  const other = nextF32(f, d > f)
  const mid = Number.isFinite(f) && Number.isFinite(other) ? (f + other) / 2 : F32_OVERFLOW_MIDPOINT
  if (mid !== d) {
    return f
  }

  const fraction = num.fraction ?? ''
  const digits = BigInt(num.digits + fraction)
  const exp10 = Number(num.exponent ?? '0') - fraction.length
  const cmp = compareDecimal(digits, exp10, d)
  if (cmp === 0) {
    return f
  }
  const lower = Math.min(f, other)
  const upper = Math.max(f, other)
  return cmp > 0 ? upper : lower
}

/** Decimal text accepted by Number(), e.g. '1.03e+23' becomes '1.03e23'. */
export function decimalText(num: NumericLexeme): string {
  let text = num.digits
  if (num.fraction !== undefined) text += '.' + num.fraction
  if (num.exponent !== undefined) text += 'e' + num.exponent
  return text
}

/**
 * A decoded float literal. `value` is at the literal's width; the accessors
 * re-round from the decimal text and return null when the written suffix
 * names the other width or the value overflows.
 */
export class FloatLiteral implements FloatValue {
  readonly value: number
  readonly width: FloatWidth
  readonly suffix: FloatSuffix | ''
  // Normalized decimal text, separators and suffix removed
  readonly text: string
  private num: NumericLexeme

  constructor(num: NumericLexeme, suffix: FloatSuffix | '', width: FloatWidth) {
    this.num = num
    this.suffix = suffix
    this.width = width
    this.text = decimalText(num)
    this.value = width === 32 ? decimalToF32(num) : Number(this.text)
  }

  asF32(): number | null {
    if (this.suffix === 'f64') return null
    const v = this.width === 32 ? this.value : decimalToF32(this.num)
    return Number.isFinite(v) ? v : null
  }

  asF64(): number | null {
    if (this.suffix === 'f32') return null
    const v = Number(this.text)
    return Number.isFinite(v) ? v : null
  }
}

/**
 * Decode a decimal float literal. A lexeme needs a fraction, an exponent
 * or a float suffix to be a float; values that overflow are out of range.
 */
export function decodeFloat(lexeme: string, options: ResolvedOptions): FloatLiteral | null {
  const num = scanNumber(lexeme)
  if (num === null || num.radix !== 10) {
    return null
  }
  const suffix = num.suffix
  if (isIntegerSuffix(suffix)) {
    return null
  }
  if (!hasFloatPart(num) && suffix === '') {
    return null
  }

  const width: FloatWidth = suffix === 'f32' ? 32 : suffix === 'f64' ? 64 : options.defaultFloatWidth
  const lit = new FloatLiteral(num, suffix, width)
  if (!Number.isFinite(lit.value)) {
    return null
  }
  return lit
}
