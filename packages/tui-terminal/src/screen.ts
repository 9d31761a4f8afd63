import type { ReadStream, WriteStream } from 'node:tty'
import type { TerminalSize } from './renderer.js'

const ALT_SCREEN_ON = '\x1b[?1049h'
const ALT_SCREEN_OFF = '\x1b[?1049l'
const CURSOR_HIDE = '\x1b[?25l'
const CURSOR_SHOW = '\x1b[?25h'
// Button events, drag tracking, SGR encoding
const MOUSE_ON = '\x1b[?1000h\x1b[?1002h\x1b[?1006h'
const MOUSE_OFF = '\x1b[?1006l\x1b[?1002l\x1b[?1000l'
const CLEAR = '\x1b[2J'
const CLEAR_LINE = '\x1b[K'

/**
 * Owns the terminal for the lifetime of the app
 */
export class Screen {
  private active = false
  private lastFrame: string[] = []

  constructor(
    private readonly stdin: ReadStream,
    private readonly stdout: WriteStream
  ) {}

  enter(): void {
    if (this.active) return
    if (this.stdin.isTTY) this.stdin.setRawMode(true)
    this.stdin.setEncoding('utf-8')
    this.stdin.resume()
    this.stdout.write(ALT_SCREEN_ON + CURSOR_HIDE + MOUSE_ON + CLEAR)
    this.active = true
  }

  restore(): void {
    if (!this.active) return
    this.active = false
    this.stdout.write(MOUSE_OFF + CURSOR_SHOW + ALT_SCREEN_OFF)
    if (this.stdin.isTTY) this.stdin.setRawMode(false)
    this.stdin.pause()
  }

  size(): TerminalSize {
    return { columns: this.stdout.columns || 80, rows: this.stdout.rows || 24 }
  }

  /**
   * Writes only the lines that differ from the previous frame
   */
  draw(frame: string): void {
    const lines = frame.split('\n')
    let output = ''
    lines.forEach((line, index) => {
      if (this.lastFrame[index] !== line) {
        output += `\x1b[${index + 1};1H${line}${CLEAR_LINE}`
      }
    })
    this.lastFrame = lines
    if (output) this.stdout.write(output)
  }

  /** Forces the next draw to repaint every line */
  invalidate(): void {
    this.lastFrame = []
    this.stdout.write(CLEAR)
  }
}
