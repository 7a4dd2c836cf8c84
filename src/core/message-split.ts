/**
 * Splits a reply into chat messages of at most `maxLength` characters.
 *
 * Text that already fits is returned untouched. Longer text is packed whole
 * lines first; a line too long on its own is packed word by word, and a word
 * longer than the limit is cut. Blank lines are dropped.
 */
export function splitMessage(text: string, maxLength: number): string[] {
  if (!Number.isInteger(maxLength) || maxLength < 1) {
    throw new RangeError(`maxLength must be a positive integer, got ${maxLength}`)
  }
  if (text.length <= maxLength) return [text]

  const messages: string[] = []
  let current = ''

  const append = (piece: string, separator: string): void => {
    if (current && current.length + separator.length + piece.length <= maxLength) {
      current += separator + piece
      return
    }
    if (current) messages.push(current)
    current = piece
  }

  for (const line of text.split('\n')) {
    const trimmed = line.trim()
    if (!trimmed) continue
    if (trimmed.length <= maxLength) {
      append(trimmed, '\n')
      continue
    }
    trimmed.split(/\s+/).forEach((word, index) => {
      let separator = index === 0 ? '\n' : ' '
      for (let start = 0; start < word.length; start += maxLength) {
        append(word.slice(start, start + maxLength), separator)
        separator = ' '
      }
    })
  }

  if (current) messages.push(current)
  return messages
}
