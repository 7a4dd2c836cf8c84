import { ArgumentParsingFailed } from './errors.js'

const QUOTE = '"'
const ESCAPE = '\\'
const SPECIAL_KEY = /^[A-Za-z_][\w-]*$/

export interface Token {
  value: string
  /** Offset of the first character (the opening quote, for quoted tokens). */
  start: number
  /** Offset one past the last character. */
  end: number
  quoted: boolean
}

export interface TokenizerOptions {
  /** Declared special keys mapped to their delimiter character. */
  specials?: ReadonlyMap<string, string>
  /** Number of positional tokens that precede the consume-rest span. */
  positionalCount?: number
  /** Capture the text after the positional tokens verbatim. */
  consumeRest?: boolean
}

export interface RestSpan {
  value: string
  start: number
}

export interface TokenizedInput {
  /** The text that was tokenized. */
  text: string
  positional: Token[]
  specials: Map<string, Token>
  /** Remainder after the positional quota, with special arguments cut out. */
  rest?: RestSpan
}

function isSpace(ch: string | undefined): boolean {
  return ch !== undefined && /\s/.test(ch)
}

/**
 * Reads a quoted span whose opening quote sits at `open`.
 * Returns the unescaped value and the offset after the closing quote.
 */
function readQuoted(text: string, open: number): { value: string; end: number } {
  let value = ''
  let i = open + 1

  while (i < text.length) {
    const ch = text.charAt(i)
    if (ch === ESCAPE && text[i + 1] === QUOTE) {
      value += QUOTE
      i += 2
      continue
    }
    if (ch === QUOTE) {
      const after = i + 1
      if (after < text.length && !isSpace(text[after])) {
        throw new ArgumentParsingFailed(`Expected a space after the closing quote but found "${text[after]}"`, after)
      }
      return { value, end: after }
    }
    value += ch
    i += 1
  }

  throw new ArgumentParsingFailed('Unterminated quoted argument', open)
}

/** Offset after the closing quote of a span opened at `open`, or the text length if it never closes. */
function skipQuoted(text: string, open: number): number {
  let i = open + 1
  while (i < text.length) {
    if (text[i] === ESCAPE && text[i + 1] === QUOTE) {
      i += 2
      continue
    }
    if (text[i] === QUOTE) return i + 1
    i += 1
  }
  return text.length
}

/** Offset of the next whitespace character at or after `from`, or the text length. */
function wordEnd(text: string, from: number): number {
  let i = from
  while (i < text.length && !isSpace(text[i])) i += 1
  return i
}

interface SpecialMatch {
  key: string
  /** Offset of the first value character. */
  valueStart: number
}

/**
 * Classifies a bare word. Returns the match for a declared special key, `'unknown'` when the
 * word is shaped like a special argument for an undeclared key, or `null` for a plain word.
 */
function matchSpecial(
  word: string,
  start: number,
  specials: ReadonlyMap<string, string>,
  delimiters: ReadonlySet<string>
): SpecialMatch | 'unknown' | null {
  for (const delimiter of delimiters) {
    const at = word.indexOf(delimiter)
    if (at <= 0) continue
    const key = word.slice(0, at)
    if (specials.get(key) === delimiter) return { key, valueStart: start + at + 1 }
    if (SPECIAL_KEY.test(key)) return 'unknown'
  }
  return null
}

/**
 * Raw text from `start` to the end of the input, less any special arguments found there.
 * Returns `undefined` when nothing but whitespace is left.
 */
export function restFrom(input: TokenizedInput, start: number): RestSpan | undefined {
  const { text } = input
  const cuts = [...input.specials.values()].filter((token) => token.start >= start).sort((a, b) => a.start - b.start)

  let value = ''
  let at = start
  for (const cut of cuts) {
    value += text.slice(at, cut.start)
    at = cut.end
    while (at < text.length && isSpace(text[at])) at += 1
  }
  value = (value + text.slice(at)).trimEnd()

  return value ? { value, start } : undefined
}

/** Records a declared special argument and returns the offset after it. */
function takeSpecial(text: string, special: SpecialMatch, start: number, end: number, into: Map<string, Token>): number {
  if (into.has(special.key)) {
    throw new ArgumentParsingFailed(`Duplicate special argument "${special.key}"`, start)
  }
  if (text[special.valueStart] === QUOTE) {
    const quoted = readQuoted(text, special.valueStart)
    into.set(special.key, { value: quoted.value, start, end: quoted.end, quoted: true })
    return quoted.end
  }
  into.set(special.key, { value: text.slice(special.valueStart, end), start, end, quoted: false })
  return end
}

/**
 * Splits the text following a command name into positional tokens, keyed special values
 * and an optional verbatim consume-rest span.
 *
 * Double quotes group words (`\"` escapes a quote inside them). A special argument may
 * appear anywhere and its value may be quoted (`title="two words"`). Once
 * `positionalCount` positional tokens have been read, the rest of the text is only scanned
 * for declared special arguments; the first other word starts the consume-rest span,
 * which is taken from the original text so inner whitespace survives.
 */
export function tokenize(text: string, options: TokenizerOptions = {}): TokenizedInput {
  const specials = options.specials ?? new Map<string, string>()
  const delimiters = new Set(specials.values())
  const positionalCount = options.positionalCount ?? 0
  const result: TokenizedInput = { text, positional: [], specials: new Map() }
  let restStart: number | undefined

  let i = 0
  while (i < text.length) {
    if (isSpace(text[i])) {
      i += 1
      continue
    }

    const start = i
    const inRest = options.consumeRest === true && result.positional.length >= positionalCount

    if (text[start] === QUOTE) {
      if (inRest) {
        restStart ??= start
        i = wordEnd(text, skipQuoted(text, start))
        continue
      }
      const quoted = readQuoted(text, start)
      result.positional.push({ value: quoted.value, start, end: quoted.end, quoted: true })
      i = quoted.end
      continue
    }

    const end = wordEnd(text, start)
    const word = text.slice(start, end)
    const special = delimiters.size > 0 ? matchSpecial(word, start, specials, delimiters) : null

    if (special !== null && special !== 'unknown') {
      i = takeSpecial(text, special, start, end, result.specials)
      continue
    }

    if (inRest) {
      restStart ??= start
      i = end
      continue
    }

    if (special === 'unknown') {
      throw new ArgumentParsingFailed(`Unknown special argument "${word}"`, start)
    }

    result.positional.push({ value: word, start, end, quoted: false })
    i = end
  }

  if (restStart !== undefined) {
    const rest = restFrom(result, restStart)
    if (rest) result.rest = rest
  }
  return result
}
