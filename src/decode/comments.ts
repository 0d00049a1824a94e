import { CH_BANG, CH_SLASH, CH_SPACE, CH_STAR } from './chars'

export type DocPolarity = 'inner' | 'outer'
export type CommentStyle = 'line' | 'block'

export interface DocCommentStyle {
  style: CommentStyle
  polarity: DocPolarity
}

/**
 * Classify a doc comment by its opening delimiter.
 * `////` and `/***` are ordinary comments, and so is the empty `/**` + `/`.
 */
export function docCommentStyle(lexeme: string): DocCommentStyle | null {
  if (lexeme.length < 3 || lexeme.charCodeAt(0) !== CH_SLASH) {
    return null
  }
  const second = lexeme.charCodeAt(1)
  const third = lexeme.charCodeAt(2)
  const fourth = lexeme.charCodeAt(3)

  if (second === CH_SLASH) {
    if (third === CH_BANG) return { style: 'line', polarity: 'inner' }
    if (third === CH_SLASH && fourth !== CH_SLASH) return { style: 'line', polarity: 'outer' }
    return null
  }
  if (second === CH_STAR) {
    if (third === CH_BANG) return { style: 'block', polarity: 'inner' }
    if (third === CH_STAR && fourth !== CH_STAR && lexeme !== '/**/') {
      return { style: 'block', polarity: 'outer' }
    }
  }
  return null
}

function docBody(lexeme: string, polarity: DocPolarity): string | null {
  const kind = docCommentStyle(lexeme)
  if (kind === null || kind.polarity !== polarity) {
    return null
  }
  let end = lexeme.length
  if (kind.style === 'block') {
    // Opening and closing delimiters must not overlap
    if (lexeme.length < 5 || !lexeme.endsWith('*/')) return null
    end -= 2
  }
  const start = lexeme.charCodeAt(3) === CH_SPACE && end > 3 ? 4 : 3
  return lexeme.substring(start, end)
}

/** Body of a `//!` or `/*! ... *\/` comment. */
export function decodeInnerDoc(lexeme: string): string | null {
  return docBody(lexeme, 'inner')
}

/** Body of a `///` or `/** ... *\/` comment. */
export function decodeOuterDoc(lexeme: string): string | null {
  return docBody(lexeme, 'outer')
}
