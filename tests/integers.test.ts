import { decodeInt, IntegerLiteral, maxMagnitude } from '../src/decode/integers'
import { resolveOptions } from '../src/options'

const defaults = resolveOptions()

function int(lexeme: string, options = defaults) {
  return decodeInt(lexeme, options)
}

describe('decodeInt', () => {
  describe('magnitudes', () => {
    it('decodes decimal literals', () => {
      expect(int('5')?.magnitude).toBe(5n)
      expect(int('0')?.magnitude).toBe(0n)
      expect(int('1234567890')?.magnitude).toBe(1234567890n)
    })

    it('decodes radix prefixes', () => {
      expect(int('0xFF')?.magnitude).toBe(255n)
      expect(int('0x7f')?.magnitude).toBe(127n)
      expect(int('0b1010')?.magnitude).toBe(10n)
      expect(int('0o17')?.magnitude).toBe(15n)
      expect(int('0o73')?.magnitude).toBe(59n)
    })

    it('ignores separators', () => {
      expect(int('1_000')?.magnitude).toBe(1000n)
      expect(int('0x__7___F_')?.magnitude).toBe(127n)
      expect(int('0b_1_0__01')?.magnitude).toBe(9n)
      expect(int('0o_7__3')?.magnitude).toBe(59n)
    })
  })

  describe('types', () => {
    it('defaults to a signed pointer-width integer without a suffix', () => {
      const lit = int('42')
      expect(lit?.suffix).toBe('')
      expect(lit?.signed).toBe(true)
      expect(lit?.width).toBe('size')
      expect(lit?.bits).toBe(64)
      expect(lit?.isNegative).toBe(false)
    })

    it('takes signedness and width from the suffix', () => {
      const u8 = int('0x7Fu8')
      expect(u8?.signed).toBe(false)
      expect(u8?.width).toBe(8)
      expect(u8?.bits).toBe(8)

      const i128 = int('3i128')
      expect(i128?.signed).toBe(true)
      expect(i128?.width).toBe(128)
    })

    it('resolves size widths to the configured pointer width', () => {
      const lit = int('7usize', resolveOptions({ pointerWidth: 32 }))
      expect(lit?.width).toBe('size')
      expect(lit?.bits).toBe(32)
    })

    it('uses the configured default type', () => {
      const lit = int('300', resolveOptions({ defaultInteger: 'u16' }))
      expect(lit?.signed).toBe(false)
      expect(lit?.bits).toBe(16)

      const wide = int('70000', resolveOptions({ defaultInteger: 'u16' }))
      expect(wide?.magnitude).toBe(70000n)
      expect(wide?.bits).toBe(16)
      expect(wide?.asU32()).toBe(70000)
    })
  })

  describe('range checks', () => {
    it('rejects values that do not fit the suffix', () => {
      expect(int('256u8')).toBeNull()
      expect(int('255u8')?.magnitude).toBe(255n)
      expect(int('128i8')).toBeNull()
      expect(int('127i8')?.magnitude).toBe(127n)
    })

    it('keeps the exact magnitude of unsuffixed literals past the default type', () => {
      const max = int('18446744073709551615')
      expect(max?.magnitude).toBe(18446744073709551615n)
      expect(max?.asU64()).toBe(18446744073709551615n)
      expect(max?.asI64()).toBeNull()
      expect(max?.asIsize()).toBeNull()
      expect(int('0xFFFF_FFFF_FFFF_FFFF')?.magnitude).toBe(18446744073709551615n)
      expect(int('340282366920938463463374607431768211455')?.asU128()).toBe((1n << 128n) - 1n)
      expect(int('9223372036854775808u64')?.magnitude).toBe(9223372036854775808n)
    })

    it('accepts the full 128-bit range and nothing past it', () => {
      expect(int('340282366920938463463374607431768211455u128')?.magnitude).toBe((1n << 128n) - 1n)
      expect(int('340282366920938463463374607431768211456u128')).toBeNull()
    })

    it('applies a 32-bit pointer width to the size types', () => {
      const narrow = resolveOptions({ pointerWidth: 32 })
      expect(int('2147483647isize', narrow)?.magnitude).toBe(2147483647n)
      expect(int('2147483648isize', narrow)).toBeNull()

      const lit = int('4294967295', narrow)
      expect(lit?.magnitude).toBe(4294967295n)
      expect(lit?.asIsize()).toBeNull()
      expect(lit?.asUsize()).toBe(4294967295n)
      expect(lit?.asU32()).toBe(4294967295)
    })
  })

  describe('without wide integers', () => {
    const narrow = resolveOptions({ wideIntegers: false })

    it('rejects 128-bit suffixes', () => {
      expect(int('1u128', narrow)).toBeNull()
      expect(int('1i128', narrow)).toBeNull()
    })

    it('overflows past 64 bits', () => {
      expect(int('18446744073709551615u64', narrow)?.magnitude).toBe(18446744073709551615n)
      expect(int('0x1_0000_0000_0000_0000u64', narrow)).toBeNull()
      expect(int('18446744073709551616', narrow)).toBeNull()
    })
  })

  describe('non-integers', () => {
    it('returns null for float-looking lexemes', () => {
      expect(int('5.5')).toBeNull()
      expect(int('1e10')).toBeNull()
      expect(int('5f32')).toBeNull()
      expect(int('1.')).toBeNull()
    })

    it('returns null for other literal kinds', () => {
      expect(int('"5"')).toBeNull()
      expect(int("'5'")).toBeNull()
      expect(int('b\'5\'')).toBeNull()
      expect(int('/// 5')).toBeNull()
    })
  })
})

describe('IntegerLiteral accessors', () => {
  it('extracts an unsuffixed literal as any type it fits', () => {
    const lit = int('5')
    expect(lit).toBeInstanceOf(IntegerLiteral)
    expect(lit?.asU8()).toBe(5)
    expect(lit?.asI8()).toBe(5)
    expect(lit?.asU16()).toBe(5)
    expect(lit?.asI16()).toBe(5)
    expect(lit?.asU32()).toBe(5)
    expect(lit?.asI32()).toBe(5)
    expect(lit?.asU64()).toBe(5n)
    expect(lit?.asI64()).toBe(5n)
    expect(lit?.asU128()).toBe(5n)
    expect(lit?.asI128()).toBe(5n)
    expect(lit?.asUsize()).toBe(5n)
    expect(lit?.asIsize()).toBe(5n)
  })

  it('only extracts a suffixed literal as its own type', () => {
    const lit = int('0b1001i8')
    expect(lit?.asI8()).toBe(9)
    expect(lit?.asU8()).toBeNull()
    expect(lit?.asI32()).toBeNull()
  })

  it('returns null when the value overflows the requested type', () => {
    const lit = int('300')
    expect(lit?.asU8()).toBeNull()
    expect(lit?.asI8()).toBeNull()
    expect(lit?.asU16()).toBe(300)
  })

  it('returns null for 128-bit accessors without wide integers', () => {
    const lit = int('5', resolveOptions({ wideIntegers: false }))
    expect(lit?.asU128()).toBeNull()
    expect(lit?.asU64()).toBe(5n)
  })

  it('converts to a number', () => {
    expect(int('0xFF')?.toNumber()).toBe(255)
  })
})

describe('maxMagnitude', () => {
  it('gives the largest positive value of a type', () => {
    expect(maxMagnitude(false, 8)).toBe(255n)
    expect(maxMagnitude(true, 8)).toBe(127n)
    expect(maxMagnitude(true, 64)).toBe(9223372036854775807n)
  })
})
