/**
 * Input Handler
 *
 * Pure mapping from decoded input events to commands. Mouse events are
 * hit-tested against the regions of the last rendered frame.
 */

import { clamp } from '@wingetdash/shared'
import type { KeyEvent, MouseEvent, RawInputEvent } from './keys.js'
import { contains, type LayoutRegions } from './layout.js'
import type { KeyCommand } from './messages.js'
import type { InputMode, OverlayType } from './state.js'

export interface InputContext {
  inputMode: InputMode
  overlay: OverlayType
  layout: LayoutRegions | null
  /** Length of the visible package list */
  visibleCount: number
}

const WHEEL_STEP = 3

const NOOP: KeyCommand = { type: 'noop' }

function isCtrlC(event: KeyEvent): boolean {
  return event.ctrl && event.char === 'c'
}

function navigationKey(event: KeyEvent): KeyCommand | undefined {
  switch (event.name) {
    case 'up':
      return { type: 'navigate', to: 'up' }
    case 'down':
      return { type: 'navigate', to: 'down' }
    case 'page-up':
      return { type: 'navigate', to: 'page-up' }
    case 'page-down':
      return { type: 'navigate', to: 'page-down' }
    case 'home':
      return { type: 'navigate', to: 'home' }
    case 'end':
      return { type: 'navigate', to: 'end' }
    case 'char':
      if (event.ctrl) return undefined
      if (event.char === 'k') return { type: 'navigate', to: 'up' }
      if (event.char === 'j') return { type: 'navigate', to: 'down' }
      return undefined
    default:
      return undefined
  }
}

function mutationKey(event: KeyEvent): KeyCommand | undefined {
  if (event.name !== 'char' || event.ctrl) return undefined
  switch (event.char) {
    case 'i':
      return { type: 'request', kind: 'install' }
    case 'x':
      return { type: 'request', kind: 'uninstall' }
    case 'u':
      return { type: 'request', kind: 'upgrade' }
    default:
      return undefined
  }
}

function searchModeKey(event: KeyEvent): KeyCommand {
  switch (event.name) {
    case 'escape':
      return { type: 'cancel-search' }
    case 'enter':
      return { type: 'submit-search' }
    case 'backspace':
      return { type: 'search-backspace' }
    case 'char':
      if (event.ctrl || event.char === undefined) return NOOP
      return { type: 'search-input', text: event.char }
    default:
      return NOOP
  }
}

function normalKey(event: KeyEvent): KeyCommand {
  const navigation = navigationKey(event)
  if (navigation) return navigation
  const mutation = mutationKey(event)
  if (mutation) return mutation

  switch (event.name) {
    case 'escape':
      return { type: 'quit' }
    case 'enter':
      return { type: 'toggle-detail' }
    case 'tab':
      return { type: 'switch-view', to: event.shift ? 'previous' : 'next' }
    case 'right':
      return { type: 'switch-view', to: 'next' }
    case 'left':
      return { type: 'switch-view', to: 'previous' }
    case 'char':
      if (event.ctrl) return NOOP
      switch (event.char) {
        case 'q':
          return { type: 'quit' }
        case '?':
          return { type: 'toggle-help' }
        case '/':
        case 's':
          return { type: 'focus-search' }
        case 'f':
          return { type: 'cycle-filter' }
        case 'r':
          return { type: 'refresh' }
        case ' ':
          return { type: 'toggle-mark' }
        case 'U':
          return { type: 'upgrade-marked' }
        case 'c':
          return { type: 'dismiss-operations' }
        case '1':
          return { type: 'switch-view', to: 'search' }
        case '2':
          return { type: 'switch-view', to: 'installed' }
        case '3':
          return { type: 'switch-view', to: 'upgrades' }
        default:
          return NOOP
      }
    default:
      return NOOP
  }
}

function mapKey(event: KeyEvent, context: InputContext): KeyCommand {
  if (isCtrlC(event)) return { type: 'quit' }
  // No Alt bindings
  if (event.alt) return NOOP

  switch (context.overlay) {
    case 'confirm':
      if (event.name === 'char' && (event.char === 'y' || event.char === 'Y')) return { type: 'confirm' }
      if (event.name === 'escape' || (event.name === 'char' && (event.char === 'n' || event.char === 'N'))) {
        return { type: 'cancel' }
      }
      return NOOP
    case 'help':
      if (event.name === 'escape' || (event.name === 'char' && (event.char === '?' || event.char === 'q'))) {
        return { type: 'close-overlay' }
      }
      return NOOP
    case 'detail':
      if (event.name === 'escape' || event.name === 'enter' || (event.name === 'char' && event.char === 'q')) {
        return { type: 'close-overlay' }
      }
      return navigationKey(event) ?? mutationKey(event) ?? NOOP
    case 'none':
      break
  }

  return context.inputMode === 'search' ? searchModeKey(event) : normalKey(event)
}

/**
 * Maps a scrollbar row to a list index by its position along the track
 */
function scrollbarIndex(y: number, layout: LayoutRegions, count: number): number {
  const top = layout.listContentY
  const track = Math.max(layout.listRows - 1, 1)
  const ratio = (clamp(y, top, top + layout.listRows - 1) - top) / track
  return Math.round(ratio * (count - 1))
}

function mapMouse(event: MouseEvent, context: InputContext): KeyCommand {
  const { layout } = context
  if (!layout) return NOOP

  if (event.action === 'wheel-up' || event.action === 'wheel-down') {
    if (context.overlay !== 'none' && context.overlay !== 'detail') return NOOP
    if (!contains(layout.packageList, event.x, event.y)) return NOOP
    return { type: 'navigate', by: event.action === 'wheel-up' ? -WHEEL_STEP : WHEEL_STEP }
  }

  if (event.button !== 'left' && event.button !== 'right') return NOOP
  if (event.action === 'up') return NOOP

  const onScrollbar =
    layout.scrollbarX !== null && event.x === layout.scrollbarX && contains(layout.packageList, event.x, event.y)

  if (event.action === 'drag') {
    if (event.button === 'left' && onScrollbar && context.visibleCount > 0) {
      return { type: 'select', index: scrollbarIndex(event.y, layout, context.visibleCount) }
    }
    return NOOP
  }

  if (context.overlay !== 'none') {
    return context.overlay === 'confirm' ? { type: 'cancel' } : { type: 'close-overlay' }
  }

  if (event.y === layout.tabBar.y) {
    const tab = layout.tabs.find((region) => event.x >= region.start && event.x < region.end)
    return tab ? { type: 'switch-view', to: tab.view } : NOOP
  }

  if (contains(layout.searchBar, event.x, event.y)) return { type: 'focus-search' }
  if (contains(layout.filterBar, event.x, event.y)) return { type: 'cycle-filter' }

  if (onScrollbar) {
    if (context.visibleCount === 0) return NOOP
    return { type: 'select', index: scrollbarIndex(event.y, layout, context.visibleCount) }
  }

  if (contains(layout.packageList, event.x, event.y)) {
    const row = event.y - layout.listContentY
    if (row < 0 || row >= layout.listRows) return NOOP
    const index = layout.scrollOffset + row
    return index < context.visibleCount ? { type: 'select', index } : NOOP
  }

  return NOOP
}

export function mapInput(event: RawInputEvent, context: InputContext): KeyCommand {
  return event.type === 'key' ? mapKey(event, context) : mapMouse(event, context)
}
