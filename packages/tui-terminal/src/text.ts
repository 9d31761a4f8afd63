import stringWidth from 'string-width'

/**
 * Cuts `text` to at most `width` display columns, ending with `…` when cut
 */
export function truncate(text: string, width: number): string {
  if (width <= 0) return ''
  if (stringWidth(text) <= width) return text
  let result = ''
  let used = 0
  for (const char of text) {
    const charWidth = stringWidth(char)
    if (used + charWidth > width - 1) break
    result += char
    used += charWidth
  }
  return result + '…'
}

/**
 * Truncates, then pads with spaces to exactly `width` display columns
 */
export function fit(text: string, width: number): string {
  const cut = truncate(text, width)
  return cut + ' '.repeat(Math.max(0, width - stringWidth(cut)))
}

export function displayWidth(text: string): number {
  return stringWidth(text)
}
