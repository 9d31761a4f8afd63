/**
 * Read-only projection of AppState handed to the renderer
 */

import {
  SPINNER_FRAMES,
  isActive,
  operationKey,
  type MutationKind,
  type Operation,
  type Package,
  type PackageDetails,
  type SourceFilter,
  type View
} from '@wingetdash/shared'
import {
  activeOperations,
  findPackage,
  isViewLoading,
  operationFor,
  visiblePackages,
  type AppState,
  type InputMode,
  type StatusLine
} from './state.js'

export interface PackageRow {
  pkg: Package
  selected: boolean
  marked: boolean
  operation?: Operation
}

export type OverlaySnapshot =
  | { type: 'none' }
  | { type: 'help' }
  | { type: 'detail'; pkg: Package | undefined; details: PackageDetails | undefined; loading: boolean; error?: string }
  | { type: 'confirm'; lines: readonly string[] }

export interface ViewSnapshot {
  view: View
  filter: SourceFilter
  query: string
  inputMode: InputMode
  rows: readonly PackageRow[]
  /** Size of the unfiltered list */
  total: number
  cursor: number | null
  scrollOffset: number
  loaded: boolean
  loading: boolean
  markedCount: number
  activeCount: number
  overlay: OverlaySnapshot
  status: StatusLine | null
  spinner: string
}

const CONFIRM_VERBS: Record<MutationKind, string> = {
  install: 'Install',
  uninstall: 'Uninstall',
  upgrade: 'Upgrade'
}

function overlaySnapshot(state: AppState): OverlaySnapshot {
  const { overlay } = state
  switch (overlay.type) {
    case 'none':
    case 'help':
      return { type: overlay.type }
    case 'detail': {
      const operation = state.operations[operationKey('details', overlay.packageId)]
      const detail: Extract<OverlaySnapshot, { type: 'detail' }> = {
        type: 'detail',
        pkg: findPackage(state, overlay.packageId),
        details: state.details[overlay.packageId],
        loading: operation !== undefined && isActive(operation)
      }
      if (operation !== undefined && operation.status.state === 'failed') {
        detail.error = operation.status.message
      }
      return detail
    }
    case 'confirm':
      return {
        type: 'confirm',
        lines: overlay.requests.map((request) => `${CONFIRM_VERBS[request.kind]} ${request.packageName}?`)
      }
  }
}

export function snapshot(state: AppState): ViewSnapshot {
  const current = state.views[state.view]
  const rows = visiblePackages(state).map((pkg, index): PackageRow => {
    const row: PackageRow = { pkg, selected: index === current.cursor, marked: current.marked.includes(pkg.id) }
    const operation = operationFor(state, pkg.id)
    if (operation) row.operation = operation
    return Object.freeze(row)
  })

  return Object.freeze({
    view: state.view,
    filter: state.filter,
    query: state.query,
    inputMode: state.inputMode,
    rows: Object.freeze(rows),
    total: current.packages.length,
    cursor: current.cursor,
    scrollOffset: current.scrollOffset,
    loaded: current.loaded,
    loading: isViewLoading(state, state.view),
    markedCount: current.marked.length,
    activeCount: activeOperations(state).length,
    overlay: Object.freeze(overlaySnapshot(state)),
    status: state.status,
    spinner: SPINNER_FRAMES[state.tick % SPINNER_FRAMES.length]
  })
}
