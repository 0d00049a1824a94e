import { decodeInnerDoc, decodeOuterDoc, docCommentStyle } from '../src/decode/comments'

describe('docCommentStyle', () => {
  it('classifies doc comment openers', () => {
    expect(docCommentStyle('/// a')).toEqual({ style: 'line', polarity: 'outer' })
    expect(docCommentStyle('//! a')).toEqual({ style: 'line', polarity: 'inner' })
    expect(docCommentStyle('/** a */')).toEqual({ style: 'block', polarity: 'outer' })
    expect(docCommentStyle('/*! a */')).toEqual({ style: 'block', polarity: 'inner' })
  })

  it('rejects ordinary comments', () => {
    expect(docCommentStyle('// a')).toBeNull()
    expect(docCommentStyle('//// a')).toBeNull()
    expect(docCommentStyle('/* a */')).toBeNull()
    expect(docCommentStyle('/*** a */')).toBeNull()
    expect(docCommentStyle('/**/')).toBeNull()
    expect(docCommentStyle('"///"')).toBeNull()
  })
})

describe('decodeOuterDoc', () => {
  it('strips the opener and one leading space from line comments', () => {
    expect(decodeOuterDoc('///hello')).toBe('hello')
    expect(decodeOuterDoc('/// hello')).toBe('hello')
    expect(decodeOuterDoc('///  indented')).toBe(' indented')
    expect(decodeOuterDoc('///')).toBe('')
  })

  it('strips both delimiters from block comments', () => {
    expect(decodeOuterDoc('/** doc */')).toBe('doc ')
    expect(decodeOuterDoc('/**x*/')).toBe('x')
    expect(decodeOuterDoc('/**\n * a\n */')).toBe('\n * a\n ')
  })

  it('returns null for inner docs and ordinary comments', () => {
    expect(decodeOuterDoc('//!hello')).toBeNull()
    expect(decodeOuterDoc('////')).toBeNull()
    expect(decodeOuterDoc('/***/')).toBeNull()
  })

  it('returns null for an unclosed block comment', () => {
    expect(decodeOuterDoc('/** doc')).toBeNull()
  })
})

describe('decodeInnerDoc', () => {
  it('strips the opener from line comments', () => {
    expect(decodeInnerDoc('//!hello')).toBe('hello')
    expect(decodeInnerDoc('//! crate docs')).toBe('crate docs')
  })

  it('strips both delimiters from block comments', () => {
    expect(decodeInnerDoc('/*! inner */')).toBe('inner ')
    expect(decodeInnerDoc('/*!*/')).toBe('')
    expect(decodeInnerDoc('/*! */')).toBe('')
  })

  it('returns null for outer docs', () => {
    expect(decodeInnerDoc('///hello')).toBeNull()
    expect(decodeInnerDoc('/** hello */')).toBeNull()
  })

  it('does not let the delimiters overlap', () => {
    expect(decodeInnerDoc('/*!/')).toBeNull()
  })
})
