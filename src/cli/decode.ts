/**
 * litval decode command
 *
 * Decodes each lexeme given on the command line, either as one requested
 * kind (--as int) or as whatever its prefix says it is (--as auto).
 */

import chalk from 'chalk'
import { Command } from 'commander'
import { DecodeError } from '../decode/errors'
import { LiteralDecoder, type DecodeResult, type LiteralValue } from '../decoder'
import { LITERAL_KIND_NAMES, LiteralKind, literalKindName } from '../literal/kinds'
import type { DecoderOptions } from '../options'

export interface DecodeCommandOptions {
  as: string
  format: string
  pointerWidth: string
  floatWidth: string
  wideIntegers: boolean
  color: boolean
}

export interface ReportEntry {
  lexeme: string
  status: 'ok' | 'mismatch' | 'malformed'
  kind?: string
  // Display form of the value
  value?: string
  // JSON form of the value
  json?: unknown
  error?: string
}

export interface DecodeReport {
  entries: ReportEntry[]
  exitCode: number
}

function parseWidth(flag: string, value: string): 32 | 64 {
  if (value === '32') return 32
  if (value === '64') return 64
  throw new Error(`${flag} must be 32 or 64, got '${value}'`)
}

function parseFormat(value: string): 'pretty' | 'json' {
  if (value === 'pretty' || value === 'json') return value
  throw new Error(`--format must be pretty or json, got '${value}'`)
}

function toDecoderOptions(options: DecodeCommandOptions): DecoderOptions {
  return {
    wideIntegers: options.wideIntegers,
    pointerWidth: parseWidth('--pointer-width', options.pointerWidth),
    defaultFloatWidth: parseWidth('--float-width', options.floatWidth),
  }
}

function requestedKind(as: string): LiteralKind | undefined {
  if (as === 'auto') return undefined
  const kind = LITERAL_KIND_NAMES[as]
  if (kind === undefined) {
    throw new Error(`--as must be auto or one of ${Object.keys(LITERAL_KIND_NAMES).join(', ')}, got '${as}'`)
  }
  return kind
}

function withKind<T>(result: DecodeResult<T>, wrap: (value: T) => LiteralValue): DecodeResult<LiteralValue> {
  return result.status === 'ok' ? { status: 'ok', value: wrap(result.value) } : result
}

function decodeKind(decoder: LiteralDecoder, kind: LiteralKind, lexeme: string): DecodeResult<LiteralValue> {
  switch (kind) {
    case LiteralKind.Int:
      return withKind(decoder.decode(kind, lexeme), (value) => ({ kind: LiteralKind.Int, value }))
    case LiteralKind.Float:
      return withKind(decoder.decode(kind, lexeme), (value) => ({ kind: LiteralKind.Float, value }))
    case LiteralKind.String:
      return withKind(decoder.decode(kind, lexeme), (value) => ({ kind: LiteralKind.String, value }))
    case LiteralKind.Char:
      return withKind(decoder.decode(kind, lexeme), (value) => ({ kind: LiteralKind.Char, value }))
    case LiteralKind.Bytes:
      return withKind(decoder.decode(kind, lexeme), (value) => ({ kind: LiteralKind.Bytes, value }))
    case LiteralKind.Byte:
      return withKind(decoder.decode(kind, lexeme), (value) => ({ kind: LiteralKind.Byte, value }))
    case LiteralKind.InnerDoc:
      return withKind(decoder.decode(kind, lexeme), (value) => ({ kind: LiteralKind.InnerDoc, value }))
    case LiteralKind.OuterDoc:
      return withKind(decoder.decode(kind, lexeme), (value) => ({ kind: LiteralKind.OuterDoc, value }))
  }
}

function decodeAuto(decoder: LiteralDecoder, lexeme: string): DecodeResult<LiteralValue> {
  try {
    const value = decoder.decodeAny(lexeme)
    return value === null ? { status: 'mismatch' } : { status: 'ok', value }
  } catch (err) {
    if (err instanceof DecodeError) {
      return { status: 'malformed', error: err }
    }
    throw err
  }
}

function hexBytes(bytes: ArrayLike<number>): string {
  return Array.from(bytes, (b) => b.toString(16).padStart(2, '0')).join(' ')
}

function describeValue(decoder: LiteralDecoder, lit: LiteralValue): { value: string; json: unknown } {
  switch (lit.kind) {
    case LiteralKind.Int: {
      const type = lit.value.suffix === '' ? decoder.options.defaultInteger : lit.value.suffix
      return { value: `${lit.value.magnitude} ${type}`, json: lit.value.magnitude.toString() }
    }
    case LiteralKind.Float:
      return { value: `${lit.value.value} f${lit.value.width}`, json: lit.value.value }
    case LiteralKind.Bytes:
      return { value: hexBytes(lit.value), json: Array.from(lit.value) }
    case LiteralKind.Byte:
      return { value: hexBytes([lit.value]), json: lit.value }
    case LiteralKind.String:
    case LiteralKind.Char:
    case LiteralKind.InnerDoc:
    case LiteralKind.OuterDoc:
      return { value: JSON.stringify(lit.value), json: lit.value }
  }
}

function toEntry(decoder: LiteralDecoder, lexeme: string, result: DecodeResult<LiteralValue>): ReportEntry {
  switch (result.status) {
    case 'ok': {
      const { value, json } = describeValue(decoder, result.value)
      return { lexeme, status: 'ok', kind: literalKindName(result.value.kind), value, json }
    }
    case 'mismatch':
      return { lexeme, status: 'mismatch' }
    case 'malformed':
      return { lexeme, status: 'malformed', error: result.error.message }
  }
}

export function runDecode(lexemes: string[], options: DecodeCommandOptions): DecodeReport {
  parseFormat(options.format)
  const decoder = new LiteralDecoder(toDecoderOptions(options))
  const kind = requestedKind(options.as)
  const entries = lexemes.map((lexeme) =>
    toEntry(decoder, lexeme, kind === undefined ? decodeAuto(decoder, lexeme) : decodeKind(decoder, kind, lexeme)),
  )
  const exitCode = entries.some((e) => e.status === 'malformed') ? 1 : 0
  return { entries, exitCode }
}

export function renderPretty(report: DecodeReport, requested: string, color: boolean): string[] {
  const c =
    color === false
      ? {
          red: (s: string) => s,
          yellow: (s: string) => s,
          green: (s: string) => s,
        }
      : chalk

  return report.entries.map((entry) => {
    switch (entry.status) {
      case 'ok':
        return `${entry.lexeme}  ${c.green(entry.kind ?? '')} ${entry.value ?? ''}`
      case 'mismatch':
        return `${entry.lexeme}  ${c.yellow(requested === 'auto' ? 'not a literal' : `not decodable as ${requested}`)}`
      case 'malformed':
        return `${entry.lexeme}  ${c.red('error')} ${entry.error ?? ''}`
    }
  })
}

export function renderJson(report: DecodeReport): string[] {
  return report.entries.map((entry) => {
    const { value: _display, ...rest } = entry
    return JSON.stringify(rest)
  })
}

export const decodeCommand = new Command('decode')
  .description('Decode literal lexemes into their values')
  .argument('<lexemes...>', 'Literal lexemes, exactly as written in source')
  .option('--as <kind>', 'Kind to decode as: auto, int, float, string, char, bytes, byte, inner-doc, outer-doc', 'auto')
  .option('--format <type>', 'Output format: pretty, json', 'pretty')
  .option('--pointer-width <bits>', 'Width of usize and isize: 32, 64', '64')
  .option('--float-width <bits>', 'Width of floats written without a suffix: 32, 64', '64')
  .option('--no-wide-integers', 'Reject the 128-bit integer types')
  .option('--no-color', 'Disable colored output')
  .action((lexemes: string[], options: DecodeCommandOptions) => {
    let report: DecodeReport
    try {
      report = runDecode(lexemes, options)
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : error)
      process.exit(2)
    }

    const lines = options.format === 'json' ? renderJson(report) : renderPretty(report, options.as, options.color)
    report.entries.forEach((entry, i) => {
      if (entry.status === 'malformed') {
        console.error(lines[i])
      } else {
        console.log(lines[i])
      }
    })
    process.exitCode = report.exitCode
  })
