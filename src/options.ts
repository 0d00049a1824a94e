export const INTEGER_SUFFIXES = [
  'u8',
  'i8',
  'u16',
  'i16',
  'u32',
  'i32',
  'u64',
  'i64',
  'u128',
  'i128',
  'usize',
  'isize',
] as const

export const FLOAT_SUFFIXES = ['f32', 'f64'] as const

export type IntegerSuffix = (typeof INTEGER_SUFFIXES)[number]
export type FloatSuffix = (typeof FLOAT_SUFFIXES)[number]
export type NumericSuffix = IntegerSuffix | FloatSuffix

export type PointerWidth = 32 | 64
export type FloatWidth = 32 | 64

export interface DecoderOptions {
  // Accept the 128-bit integer types. Default: true.
  wideIntegers?: boolean
  // Bit width of usize/isize. Default: 64.
  pointerWidth?: PointerWidth
  // Type given to an integer literal written without a suffix. Default: 'isize'.
  defaultInteger?: IntegerSuffix
  // Width given to a float literal written without a suffix. Default: 64.
  defaultFloatWidth?: FloatWidth
}

export type ResolvedOptions = Readonly<Required<DecoderOptions>>

const INTEGER_SUFFIX_SET: ReadonlySet<string> = new Set(INTEGER_SUFFIXES)
const FLOAT_SUFFIX_SET: ReadonlySet<string> = new Set(FLOAT_SUFFIXES)

export function isIntegerSuffix(s: string): s is IntegerSuffix {
  return INTEGER_SUFFIX_SET.has(s)
}

export function isFloatSuffix(s: string): s is FloatSuffix {
  return FLOAT_SUFFIX_SET.has(s)
}

function checkWidth(name: string, value: number): void {
  if (value !== 32 && value !== 64) {
    throw new TypeError(`${name} must be 32 or 64, got ${value}`)
  }
}

/**
 * Fill in defaults and reject values outside the supported set. Plain
 * JavaScript callers can pass anything, so the unions are checked at run time.
 */
export function resolveOptions(options?: DecoderOptions): ResolvedOptions {
  const wideIntegers = options?.wideIntegers ?? true
  const pointerWidth = options?.pointerWidth ?? 64
  const defaultInteger = options?.defaultInteger ?? 'isize'
  const defaultFloatWidth = options?.defaultFloatWidth ?? 64

  checkWidth('pointerWidth', pointerWidth)
  checkWidth('defaultFloatWidth', defaultFloatWidth)
  if (!isIntegerSuffix(defaultInteger)) {
    throw new TypeError(`defaultInteger must be an integer type suffix, got '${String(defaultInteger)}'`)
  }
  if (!wideIntegers && (defaultInteger === 'u128' || defaultInteger === 'i128')) {
    throw new TypeError(`defaultInteger '${defaultInteger}' needs wideIntegers`)
  }

  return { wideIntegers, pointerWidth, defaultInteger, defaultFloatWidth }
}
