import { renderJson, renderPretty, runDecode, type DecodeCommandOptions } from '../src/cli/decode'

function options(overrides: Partial<DecodeCommandOptions> = {}): DecodeCommandOptions {
  return {
    as: 'auto',
    format: 'pretty',
    pointerWidth: '64',
    floatWidth: '64',
    wideIntegers: true,
    color: false,
    ...overrides,
  }
}

describe('runDecode', () => {
  it('decodes each lexeme by its prefix', () => {
    const report = runDecode(['0xFF', '"a\\tb"', 'ident'], options())
    expect(report.exitCode).toBe(0)
    expect(report.entries).toEqual([
      { lexeme: '0xFF', status: 'ok', kind: 'int', value: '255 isize', json: '255' },
      { lexeme: '"a\\tb"', status: 'ok', kind: 'string', value: '"a\\tb"', json: 'a\tb' },
      { lexeme: 'ident', status: 'mismatch' },
    ])
  })

  it('formats each kind of value', () => {
    const report = runDecode(['1.5f32', 'b"a\\xff"', "b'\\n'", "'x'", '/// doc'], options())
    expect(report.entries.map((e) => [e.kind, e.value])).toEqual([
      ['float', '1.5 f32'],
      ['bytes', '61 ff'],
      ['byte', '0a'],
      ['char', '"x"'],
      ['outer-doc', '"doc"'],
    ])
    expect(report.entries.map((e) => e.json)).toEqual([1.5, [0x61, 0xff], 0x0a, 'x', 'doc'])
  })

  it('sets the exit code when a lexeme is malformed', () => {
    const report = runDecode(['1', '"\\q"'], options())
    expect(report.exitCode).toBe(1)
    expect(report.entries[1]).toEqual({
      lexeme: '"\\q"',
      status: 'malformed',
      error: 'unknown character escape: \\q at offset 1',
    })
  })

  it('decodes only the requested kind', () => {
    const report = runDecode(['0b11u8', '"x"', '"\\q"'], options({ as: 'int' }))
    expect(report.entries.map((e) => e.status)).toEqual(['ok', 'mismatch', 'mismatch'])
    expect(report.entries[0].value).toBe('3 u8')
    expect(report.exitCode).toBe(0)
  })

  it('applies width and integer options', () => {
    const report = runDecode(
      ['3000000000', '1u128', '0.1'],
      options({ pointerWidth: '32', floatWidth: '32', wideIntegers: false }),
    )
    expect(report.entries.map((e) => e.status)).toEqual(['ok', 'mismatch', 'ok'])
    expect(report.entries[0].value).toBe('3000000000 isize')
    expect(report.entries[2].value).toBe(`${Math.fround(0.1)} f32`)
  })

  it('rejects unknown option values', () => {
    expect(() => runDecode(['1'], options({ as: 'word' }))).toThrow(
      "--as must be auto or one of int, float, string, char, bytes, byte, inner-doc, outer-doc, got 'word'",
    )
    expect(() => runDecode(['1'], options({ pointerWidth: '16' }))).toThrow(
      "--pointer-width must be 32 or 64, got '16'",
    )
    expect(() => runDecode(['1'], options({ format: 'xml' }))).toThrow("--format must be pretty or json, got 'xml'")
  })
})

describe('renderPretty', () => {
  it('renders one line per lexeme', () => {
    const report = runDecode(['0xFF', 'ident', '"\\q"'], options())
    expect(renderPretty(report, 'auto', false)).toEqual([
      '0xFF  int 255 isize',
      'ident  not a literal',
      '"\\q"  error unknown character escape: \\q at offset 1',
    ])
  })

  it('names the requested kind on a mismatch', () => {
    const report = runDecode(['"x"'], options({ as: 'char' }))
    expect(renderPretty(report, 'char', false)).toEqual(['"x"  not decodable as char'])
  })
})

describe('renderJson', () => {
  it('renders one JSON object per lexeme without the display value', () => {
    const report = runDecode(['0xFF', 'ident', 'b"\\xff"'], options())
    expect(renderJson(report).map((line) => JSON.parse(line))).toEqual([
      { lexeme: '0xFF', status: 'ok', kind: 'int', json: '255' },
      { lexeme: 'ident', status: 'mismatch' },
      { lexeme: 'b"\\xff"', status: 'ok', kind: 'bytes', json: [255] },
    ])
  })
})
