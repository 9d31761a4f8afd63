/**
 * Frame renderer
 *
 * Draws a ViewSnapshot into a list of terminal lines and reports where each
 * interactive region ended up so mouse clicks can be hit-tested.
 */

import { APP_NAME, FILTER_LABELS, TERMINAL_COLORS, VIEWS, VIEW_LABELS, clamp, type Operation } from '@wingetdash/shared'
import type { LayoutRegions, TabRegion } from './layout.js'
import type { OverlaySnapshot, PackageRow, ViewSnapshot } from './snapshot.js'
import { displayWidth, fit, truncate } from './text.js'

export interface TerminalSize {
  columns: number
  rows: number
}

export interface RenderResult {
  frame: string
  layout: LayoutRegions
}

const { reset, bright, dim, inverse, red, green, yellow, cyan } = TERMINAL_COLORS

/** Rows taken by the tab bar, filter/search bar, list title, column header, status and hints */
const CHROME_ROWS = 6
const LIST_CONTENT_Y = 4

const HELP_LINES = [
  'Navigation',
  '  ↑/k ↓/j        move selection',
  '  PgUp PgDn      page up / down',
  '  Home End       first / last package',
  '  Tab ← →        switch view (1 2 3 jump)',
  '',
  'Actions',
  '  / or s         search',
  '  f              cycle source filter',
  '  r              refresh',
  '  Enter          package details',
  '  i x u          install / uninstall / upgrade',
  '  Space  U       mark / upgrade marked',
  '  c              clear finished operations',
  '',
  '  ? help   q quit'
]

interface Column {
  title: string
  width: number
  cell: (row: PackageRow, spinner: string) => string
}

function style(text: string, ...codes: string[]): string {
  return codes.length === 0 ? text : `${codes.join('')}${text}${reset}`
}

function operationCell(operation: Operation | undefined, spinner: string): string {
  if (!operation) return ''
  switch (operation.status.state) {
    case 'pending':
      return `… ${operation.kind}`
    case 'running':
      return `${spinner} ${operation.kind}`
    case 'succeeded':
      return `✓ ${operation.kind}`
    case 'failed':
      return `✗ ${operation.kind} failed`
  }
}

function columnsFor(snapshot: ViewSnapshot, width: number): Column[] {
  const fixed: Column[] = [
    { title: 'Version', width: 14, cell: (row) => row.pkg.version },
    ...(snapshot.view === 'upgrades'
      ? [{ title: 'Available', width: 14, cell: (row: PackageRow) => row.pkg.availableVersion ?? '' }]
      : []),
    { title: 'Source', width: 8, cell: (row) => (row.pkg.source === 'unknown' ? '' : row.pkg.source) },
    { title: 'Status', width: 16, cell: (row, spinner) => operationCell(row.operation, spinner) }
  ]
  // Marker column, then one space between columns
  const separators = fixed.length + 1
  const rest = Math.max(20, width - 2 - separators - fixed.reduce((sum, column) => sum + column.width, 0))
  const nameWidth = Math.floor(rest * 0.45)
  return [
    { title: 'Name', width: nameWidth, cell: (row) => row.pkg.name },
    { title: 'Id', width: rest - nameWidth, cell: (row) => row.pkg.id },
    ...fixed
  ]
}

function renderTabs(snapshot: ViewSnapshot, columns: number): { line: string; tabs: TabRegion[] } {
  const title = ` ${APP_NAME} `
  let x = displayWidth(title) + 2
  let line = style(title, bright, cyan) + '  '
  const tabs: TabRegion[] = []
  for (const view of VIEWS) {
    const label = ` ${VIEW_LABELS[view]} `
    const width = displayWidth(label)
    tabs.push({ view, start: x, end: x + width })
    line += (view === snapshot.view ? style(label, inverse, bright) : style(label, dim)) + ' '
    x += width + 1
  }
  if (snapshot.activeCount > 0) {
    const busy = ` ${snapshot.spinner} ${snapshot.activeCount} running`
    if (x + displayWidth(busy) <= columns) {
      line += style(busy, yellow)
      x += displayWidth(busy)
    }
  }
  return { line: line + ' '.repeat(Math.max(0, columns - x)), tabs }
}

function renderFilterAndSearch(snapshot: ViewSnapshot, columns: number): { line: string; filterWidth: number } {
  const filter = ` Filter: [${FILTER_LABELS[snapshot.filter]}] `
  const filterWidth = displayWidth(filter)
  const searchWidth = Math.max(0, columns - filterWidth - 1)
  const editing = snapshot.inputMode === 'search'
  const searchText = editing
    ? ` / ${snapshot.query}█`
    : snapshot.query
      ? ` / ${snapshot.query}`
      : ' / press / to search'
  const search = fit(searchText, searchWidth)
  const line =
    style(filter, snapshot.filter === 'all' ? dim : yellow) +
    ' ' +
    (editing ? style(search, inverse) : snapshot.query ? search : style(search, dim))
  return { line, filterWidth }
}

function emptyMessage(snapshot: ViewSnapshot): string {
  if (!snapshot.loaded) return snapshot.loading ? 'Loading...' : ''
  if (snapshot.total > 0) return 'No packages match the filter'
  switch (snapshot.view) {
    case 'search':
      return snapshot.query ? 'No packages found' : 'Type / to search for packages'
    case 'installed':
      return 'No installed packages'
    case 'upgrades':
      return 'All packages are up to date'
  }
}

function listTitle(snapshot: ViewSnapshot): string {
  const count = snapshot.rows.length === snapshot.total ? `${snapshot.total}` : `${snapshot.rows.length}/${snapshot.total}`
  let title = ` ${VIEW_LABELS[snapshot.view]} (${count})`
  if (snapshot.markedCount > 0) title += ` · ${snapshot.markedCount} marked`
  if (snapshot.loading) title += ` ${snapshot.spinner}`
  return title
}

/**
 * Scroll offset that keeps the cursor within `listRows`
 */
export function effectiveScroll(snapshot: ViewSnapshot, listRows: number): number {
  let offset = clamp(snapshot.scrollOffset, 0, Math.max(0, snapshot.rows.length - listRows))
  if (snapshot.cursor !== null) {
    if (snapshot.cursor < offset) offset = snapshot.cursor
    else if (snapshot.cursor >= offset + listRows) offset = snapshot.cursor - listRows + 1
  }
  return offset
}

function scrollbarCell(row: number, listRows: number, total: number, offset: number): string {
  const thumb = Math.max(1, Math.round((listRows * listRows) / total))
  const maxOffset = Math.max(1, total - listRows)
  const position = Math.round((offset / maxOffset) * (listRows - thumb))
  return row >= position && row < position + thumb ? '█' : '│'
}

function renderRow(row: PackageRow, columns: Column[], spinner: string, width: number): string {
  const marker = row.marked ? '✓ ' : '  '
  const text = fit(marker + columns.map((column) => fit(column.cell(row, spinner), column.width)).join(' '), width)
  if (row.selected) return style(text, inverse)
  if (row.operation?.status.state === 'failed') return style(text, red)
  if (row.operation?.status.state === 'succeeded') return style(text, green)
  return text
}

function wrap(text: string, width: number): string[] {
  const lines: string[] = []
  let current = ''
  for (const word of text.split(/\s+/).filter(Boolean)) {
    if (current && displayWidth(current) + 1 + displayWidth(word) > width) {
      lines.push(current)
      current = word
    } else {
      current = current ? `${current} ${word}` : word
    }
  }
  if (current) lines.push(current)
  return lines
}

function overlayContent(overlay: OverlaySnapshot, width: number): { title: string; lines: string[] } | null {
  switch (overlay.type) {
    case 'none':
      return null
    case 'help':
      return { title: 'Help', lines: HELP_LINES }
    case 'confirm':
      return { title: 'Confirm', lines: [...overlay.lines, '', '[y] Yes   [n] No'] }
    case 'detail': {
      const { pkg, details } = overlay
      const lines = [
        `Name:      ${details?.name || pkg?.name || ''}`,
        `Id:        ${details?.id || pkg?.id || ''}`,
        `Version:   ${details?.version || pkg?.version || ''}`
      ]
      if (pkg?.availableVersion) lines.push(`Available: ${pkg.availableVersion}`)
      if (overlay.loading) {
        lines.push('', 'Loading details...')
      } else if (overlay.error) {
        lines.push('', `Error: ${overlay.error}`)
      } else if (details) {
        lines.push(
          `Source:    ${details.source}`,
          `Publisher: ${details.publisher}`,
          `License:   ${details.license}`,
          `Homepage:  ${details.homepage}`,
          '',
          ...wrap(details.description, width)
        )
      }
      return { title: 'Details', lines }
    }
  }
}

/**
 * Draws a centered box over full rows of `lines`
 */
function drawOverlay(lines: string[], overlay: OverlaySnapshot, size: TerminalSize): void {
  const maxInner = Math.max(10, size.columns - 8)
  const content = overlayContent(overlay, Math.min(maxInner, 70))
  if (!content) return

  const inner = Math.min(maxInner, Math.max(displayWidth(content.title) + 2, ...content.lines.map(displayWidth)))
  const body = content.lines.slice(0, Math.max(0, size.rows - 4))
  const boxWidth = inner + 4
  const left = Math.max(0, Math.floor((size.columns - boxWidth) / 2))
  const top = Math.max(0, Math.floor((size.rows - body.length - 2) / 2))
  const pad = ' '.repeat(left)
  const right = ' '.repeat(Math.max(0, size.columns - left - boxWidth))

  const titleBar = `─ ${content.title} ${'─'.repeat(Math.max(0, inner - displayWidth(content.title) - 1))}`
  const boxLines = [
    `┌${titleBar}┐`,
    ...body.map((line) => `│ ${fit(line, inner)} │`),
    `└${'─'.repeat(inner + 2)}┘`
  ]
  boxLines.forEach((line, index) => {
    const y = top + index
    if (y < lines.length) lines[y] = pad + style(line, bright) + right
  })
}

function hints(snapshot: ViewSnapshot): string {
  if (snapshot.overlay.type === 'confirm') return ' y confirm  n cancel'
  if (snapshot.overlay.type !== 'none') return ' Esc close'
  if (snapshot.inputMode === 'search') return ' Enter search  Esc cancel  Backspace delete'
  const marking = snapshot.view === 'upgrades' ? '  Space mark  U upgrade marked' : ''
  return ` q quit  ? help  / search  f filter  r refresh  Enter details  i install  x uninstall  u upgrade${marking}`
}

export function render(snapshot: ViewSnapshot, size: TerminalSize): RenderResult {
  const columns = Math.max(20, size.columns)
  const listRows = Math.max(1, size.rows - CHROME_ROWS)
  const total = snapshot.rows.length
  const hasScrollbar = total > listRows
  const contentWidth = hasScrollbar ? columns - 1 : columns
  const offset = effectiveScroll(snapshot, listRows)
  const lines: string[] = []

  const tabBar = renderTabs(snapshot, columns)
  lines.push(tabBar.line)

  const filterAndSearch = renderFilterAndSearch(snapshot, columns)
  lines.push(filterAndSearch.line)

  lines.push(style(fit(listTitle(snapshot), columns), bright))

  const tableColumns = columnsFor(snapshot, contentWidth)
  lines.push(style(fit('  ' + tableColumns.map((column) => fit(column.title, column.width)).join(' '), columns), dim))

  for (let i = 0; i < listRows; i++) {
    const row = snapshot.rows[offset + i]
    let line: string
    if (row) {
      line = renderRow(row, tableColumns, snapshot.spinner, contentWidth)
    } else if (i === 0 && total === 0) {
      line = style(fit(`  ${emptyMessage(snapshot)}`, contentWidth), dim)
    } else {
      line = ' '.repeat(contentWidth)
    }
    if (hasScrollbar) line += style(scrollbarCell(i, listRows, total, offset), dim)
    lines.push(line)
  }

  const status = snapshot.status
  const statusText = fit(status ? ` ${status.text}` : '', columns)
  lines.push(status?.tone === 'error' ? style(statusText, red) : status?.tone === 'success' ? style(statusText, green) : statusText)
  lines.push(style(fit(truncate(hints(snapshot), columns), columns), dim))

  drawOverlay(lines, snapshot.overlay, { columns, rows: lines.length })

  const filterWidth = filterAndSearch.filterWidth
  return {
    frame: lines.join('\n'),
    layout: {
      tabBar: { x: 0, y: 0, width: columns, height: 1 },
      tabs: tabBar.tabs,
      filterBar: { x: 0, y: 1, width: filterWidth, height: 1 },
      searchBar: { x: filterWidth + 1, y: 1, width: Math.max(0, columns - filterWidth - 1), height: 1 },
      packageList: { x: 0, y: 2, width: columns, height: listRows + 2 },
      listContentY: LIST_CONTENT_Y,
      listRows,
      scrollOffset: offset,
      scrollbarX: hasScrollbar ? columns - 1 : null
    }
  }
}
