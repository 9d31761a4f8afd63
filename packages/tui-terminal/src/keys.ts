/**
 * Decoding of raw terminal input
 *
 * Handles printable characters, control keys, CSI/SS3 escape sequences,
 * Alt+key (ESC followed by a character) and SGR mouse reports
 * (`ESC [ < b ; x ; y M|m`).
 */

export type KeyName =
  | 'char'
  | 'enter'
  | 'escape'
  | 'tab'
  | 'backspace'
  | 'delete'
  | 'up'
  | 'down'
  | 'left'
  | 'right'
  | 'home'
  | 'end'
  | 'page-up'
  | 'page-down'
  | 'unknown'

export interface KeyEvent {
  type: 'key'
  name: KeyName
  /** The character for `char` keys, or the letter held with Ctrl */
  char?: string
  ctrl: boolean
  shift: boolean
  /** Set only when Alt was held */
  alt?: boolean
}

export type MouseAction = 'down' | 'up' | 'drag' | 'wheel-up' | 'wheel-down'
export type MouseButton = 'left' | 'middle' | 'right' | 'none'

export interface MouseEvent {
  type: 'mouse'
  action: MouseAction
  button: MouseButton
  /** 0-based column */
  x: number
  /** 0-based row */
  y: number
  shift: boolean
  ctrl: boolean
}

export type RawInputEvent = KeyEvent | MouseEvent

const SGR_MOUSE = /^\x1b\[<(\d+);(\d+);(\d+)([Mm])/
const CSI = /^\x1b\[([0-9;]*)([A-Za-z~])/
const SS3 = /^\x1bO([A-Za-z])/
// An escape sequence cut off at the end of a read
const PARTIAL = /^\x1b(\[[<0-9;]*|O)$/

const CSI_FINALS: Record<string, KeyName> = {
  A: 'up',
  B: 'down',
  C: 'right',
  D: 'left',
  H: 'home',
  F: 'end'
}

const TILDE_CODES: Record<string, KeyName> = {
  '1': 'home',
  '7': 'home',
  '3': 'delete',
  '4': 'end',
  '8': 'end',
  '5': 'page-up',
  '6': 'page-down'
}

interface KeyOptions {
  char?: string
  ctrl?: boolean
  shift?: boolean
  alt?: boolean
}

function key(name: KeyName, options: KeyOptions = {}): KeyEvent {
  const event: KeyEvent = { type: 'key', name, ctrl: options.ctrl ?? false, shift: options.shift ?? false }
  if (options.char !== undefined) event.char = options.char
  if (options.alt) event.alt = true
  return event
}

function mouseButton(code: number): MouseButton {
  switch (code & 3) {
    case 0:
      return 'left'
    case 1:
      return 'middle'
    case 2:
      return 'right'
    default:
      return 'none'
  }
}

function decodeMouse(match: RegExpExecArray): MouseEvent {
  const code = Number(match[1])
  const x = Number(match[2]) - 1
  const y = Number(match[3]) - 1
  const modifiers = { shift: (code & 4) !== 0, ctrl: (code & 16) !== 0 }

  if (code & 64) {
    return { type: 'mouse', action: (code & 1) === 0 ? 'wheel-up' : 'wheel-down', button: 'none', x, y, ...modifiers }
  }
  const button = mouseButton(code)
  const action: MouseAction = code & 32 ? 'drag' : match[4] === 'm' ? 'up' : 'down'
  return { type: 'mouse', action, button, x, y, ...modifiers }
}

function decodeCsi(params: string, final: string): KeyEvent {
  // xterm reports modifiers as a second parameter: 1 + shift(1) + alt(2) + ctrl(4)
  const [first = '', modifier = '1'] = params.split(';')
  const bits = Number(modifier) - 1
  const modifiers = { shift: (bits & 1) !== 0, alt: (bits & 2) !== 0, ctrl: (bits & 4) !== 0 }

  if (final === 'Z') return key('tab', { shift: true })
  if (final === '~') return key(TILDE_CODES[first] ?? 'unknown', modifiers)
  return key(CSI_FINALS[final] ?? 'unknown', modifiers)
}

function decodeControl(code: number): KeyEvent {
  switch (code) {
    case 0x0d:
    case 0x0a:
      return key('enter')
    case 0x09:
      return key('tab')
    case 0x08:
    case 0x7f:
      return key('backspace')
    default:
      if (code >= 1 && code <= 26) {
        return key('char', { char: String.fromCharCode(code + 96), ctrl: true })
      }
      return key('unknown')
  }
}

function decodeChunk(data: string, keepPartial: boolean): { events: RawInputEvent[]; pending: string } {
  const events: RawInputEvent[] = []
  let rest = data

  while (rest.length > 0) {
    if (rest[0] === '\x1b') {
      if (keepPartial && PARTIAL.test(rest)) {
        return { events, pending: rest }
      }
      const mouse = SGR_MOUSE.exec(rest)
      if (mouse) {
        events.push(decodeMouse(mouse))
        rest = rest.slice(mouse[0].length)
        continue
      }
      const csi = CSI.exec(rest)
      if (csi) {
        events.push(decodeCsi(csi[1], csi[2]))
        rest = rest.slice(csi[0].length)
        continue
      }
      const ss3 = SS3.exec(rest)
      if (ss3) {
        events.push(key(CSI_FINALS[ss3[1]] ?? 'unknown'))
        rest = rest.slice(ss3[0].length)
        continue
      }
      const [next] = Array.from(rest.slice(1))
      const nextCode = next?.codePointAt(0) ?? 0
      if (next !== undefined && nextCode >= 0x20 && nextCode !== 0x7f) {
        events.push(key('char', { char: next, shift: next !== next.toLowerCase(), alt: true }))
        rest = rest.slice(1 + next.length)
        continue
      }
      events.push(key('escape'))
      rest = rest.slice(1)
      continue
    }

    const [char] = Array.from(rest)
    const code = char.codePointAt(0) ?? 0
    rest = rest.slice(char.length)

    if (code < 0x20 || code === 0x7f) {
      events.push(decodeControl(code))
    } else {
      events.push(key('char', { char, shift: char !== char.toLowerCase() }))
    }
  }

  return { events, pending: '' }
}

/**
 * Splits one chunk read from stdin into input events
 */
export function decodeInput(chunk: string | Buffer): RawInputEvent[] {
  return decodeChunk(typeof chunk === 'string' ? chunk : chunk.toString('utf-8'), false).events
}

/**
 * Stateful decoder for a stream of chunks. An escape sequence split across
 * two reads is held back until the rest arrives.
 */
export class InputDecoder {
  private pending = ''

  decode(chunk: string | Buffer): RawInputEvent[] {
    const data = this.pending + (typeof chunk === 'string' ? chunk : chunk.toString('utf-8'))
    const { events, pending } = decodeChunk(data, true)
    this.pending = pending
    return events
  }
}
