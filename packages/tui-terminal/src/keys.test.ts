import { describe, it, expect } from 'vitest'
import { InputDecoder, decodeInput } from './keys.js'

describe('decodeInput', () => {
  it('decodes printable characters', () => {
    expect(decodeInput('qU')).toEqual([
      { type: 'key', name: 'char', char: 'q', ctrl: false, shift: false },
      { type: 'key', name: 'char', char: 'U', ctrl: false, shift: true }
    ])
  })

  it('decodes control keys', () => {
    expect(decodeInput('\r\t\x7f\x03').map((event) => (event.type === 'key' ? [event.name, event.char, event.ctrl] : []))).toEqual([
      ['enter', undefined, false],
      ['tab', undefined, false],
      ['backspace', undefined, false],
      ['char', 'c', true]
    ])
  })

  it('decodes cursor and editing sequences', () => {
    const names = decodeInput('\x1b[A\x1b[B\x1b[C\x1b[D\x1b[5~\x1b[6~\x1b[H\x1b[4~\x1bOH\x1bOF').map((event) =>
      event.type === 'key' ? event.name : event.type
    )
    expect(names).toEqual(['up', 'down', 'right', 'left', 'page-up', 'page-down', 'home', 'end', 'home', 'end'])
  })

  it('reads Shift+Tab and modified arrows', () => {
    expect(decodeInput('\x1b[Z')).toEqual([{ type: 'key', name: 'tab', ctrl: false, shift: true }])
    expect(decodeInput('\x1b[1;5A')).toEqual([{ type: 'key', name: 'up', ctrl: true, shift: false }])
  })

  it('treats a lone escape as the Escape key', () => {
    expect(decodeInput('\x1b')).toEqual([{ type: 'key', name: 'escape', ctrl: false, shift: false }])
  })

  it('decodes SGR mouse reports with 0-based coordinates', () => {
    expect(decodeInput('\x1b[<0;10;5M')).toEqual([
      { type: 'mouse', action: 'down', button: 'left', x: 9, y: 4, shift: false, ctrl: false }
    ])
    expect(decodeInput('\x1b[<0;10;5m')[0]).toMatchObject({ action: 'up', button: 'left' })
    expect(decodeInput('\x1b[<32;4;4M')[0]).toMatchObject({ action: 'drag', button: 'left', x: 3, y: 3 })
    expect(decodeInput('\x1b[<2;1;1M')[0]).toMatchObject({ action: 'down', button: 'right', x: 0, y: 0 })
    expect(decodeInput('\x1b[<64;3;7M')[0]).toMatchObject({ action: 'wheel-up', button: 'none', x: 2, y: 6 })
    expect(decodeInput('\x1b[<65;3;7M')[0]).toMatchObject({ action: 'wheel-down' })
  })

  it('splits a chunk holding several events', () => {
    const events = decodeInput(Buffer.from('ab\x1b[<0;1;1Mc'))
    expect(events.map((event) => event.type)).toEqual(['key', 'key', 'mouse', 'key'])
  })

  it('reads ESC followed by a character as Alt+key', () => {
    expect(decodeInput('\x1bq')).toEqual([{ type: 'key', name: 'char', char: 'q', ctrl: false, shift: false, alt: true }])
    expect(decodeInput('\x1b[1;3B')).toEqual([{ type: 'key', name: 'down', ctrl: false, shift: false, alt: true }])
  })
})

describe('InputDecoder', () => {
  it('holds back a mouse report split across reads', () => {
    const decoder = new InputDecoder()

    expect(decoder.decode('j\x1b[<0;10')).toEqual([{ type: 'key', name: 'char', char: 'j', ctrl: false, shift: false }])
    expect(decoder.decode(';5M')).toEqual([
      { type: 'mouse', action: 'down', button: 'left', x: 9, y: 4, shift: false, ctrl: false }
    ])
  })

  it('holds back a bare CSI introducer', () => {
    const decoder = new InputDecoder()

    expect(decoder.decode('\x1b[')).toEqual([])
    expect(decoder.decode('A')).toEqual([{ type: 'key', name: 'up', ctrl: false, shift: false }])
  })

  it('still reports a lone escape straight away', () => {
    expect(new InputDecoder().decode('\x1b')).toEqual([{ type: 'key', name: 'escape', ctrl: false, shift: false }])
  })
})
