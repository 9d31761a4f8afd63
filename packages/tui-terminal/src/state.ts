/**
 * Application state owned by the controller and advanced by the reducer
 */

import {
  DEFAULT_CONFIG,
  VIEWS,
  isActive,
  matchesFilter,
  operationKey,
  type MutationKind,
  type Operation,
  type OperationKind,
  type Package,
  type PackageDetails,
  type SourceFilter,
  type View
} from '@wingetdash/shared'

export interface ViewState {
  packages: readonly Package[]
  /** Index into the filtered list; null when it is empty */
  cursor: number | null
  scrollOffset: number
  marked: readonly string[]
  loaded: boolean
}

export interface MutationRequest {
  kind: MutationKind
  packageId: string
  packageName: string
}

export type Overlay =
  | { type: 'none' }
  | { type: 'help' }
  | { type: 'detail'; packageId: string }
  | { type: 'confirm'; requests: readonly MutationRequest[] }

export type OverlayType = Overlay['type']

export type InputMode = 'normal' | 'search'

export interface StatusLine {
  text: string
  tone: 'info' | 'success' | 'error'
}

export interface AppOptions {
  confirmOperations: boolean
  pageSize: number
}

export interface AppState {
  view: View
  filter: SourceFilter
  views: Readonly<Record<View, ViewState>>
  /** Search text as typed, including unsubmitted edits */
  query: string
  /** The query the SEARCH list was last fetched for */
  submittedQuery: string
  inputMode: InputMode
  operations: Readonly<Record<string, Operation>>
  latestSequence: Readonly<Record<string, number>>
  nextSequence: number
  overlay: Overlay
  details: Readonly<Record<string, PackageDetails>>
  status: StatusLine | null
  /** Rows the package list can show, reported by the renderer */
  viewportRows: number
  tick: number
  quit: boolean
  options: AppOptions
}

export interface InitialStateOptions extends Partial<AppOptions> {
  view?: View
}

export function emptyViewState(): ViewState {
  return { packages: [], cursor: null, scrollOffset: 0, marked: [], loaded: false }
}

export function createInitialState(options: InitialStateOptions = {}): AppState {
  const views: Record<View, ViewState> = {
    search: emptyViewState(),
    installed: emptyViewState(),
    upgrades: emptyViewState()
  }
  return {
    view: options.view ?? DEFAULT_CONFIG.defaultView,
    filter: 'all',
    views,
    query: '',
    submittedQuery: '',
    inputMode: 'normal',
    operations: {},
    latestSequence: {},
    nextSequence: 1,
    overlay: { type: 'none' },
    details: {},
    status: null,
    viewportRows: DEFAULT_CONFIG.pageSize,
    tick: 0,
    quit: false,
    options: {
      confirmOperations: options.confirmOperations ?? DEFAULT_CONFIG.confirmOperations,
      pageSize: options.pageSize ?? DEFAULT_CONFIG.pageSize
    }
  }
}

// Selectors

export function visiblePackages(state: AppState, view: View = state.view): Package[] {
  return state.views[view].packages.filter((pkg) => matchesFilter(state.filter, pkg))
}

export function selectedPackage(state: AppState): Package | undefined {
  const { cursor } = state.views[state.view]
  if (cursor === null) return undefined
  return visiblePackages(state)[cursor]
}

export function findPackage(state: AppState, id: string): Package | undefined {
  for (const view of VIEWS) {
    const found = state.views[view].packages.find((pkg) => pkg.id === id)
    if (found) return found
  }
  return undefined
}

export function getOperation(state: AppState, kind: OperationKind, target: string): Operation | undefined {
  return state.operations[operationKey(kind, target)]
}

export function hasActiveOperation(state: AppState, kind: OperationKind, target: string): boolean {
  const operation = getOperation(state, kind, target)
  return operation !== undefined && isActive(operation)
}

/**
 * The newest install/uninstall/upgrade touching a package, for the status column
 */
export function operationFor(state: AppState, packageId: string): Operation | undefined {
  let latest: Operation | undefined
  for (const operation of Object.values(state.operations)) {
    if (operation.target !== packageId || operation.kind === 'details') continue
    if (!latest || operation.sequence > latest.sequence) latest = operation
  }
  return latest
}

export function activeOperations(state: AppState): Operation[] {
  return Object.values(state.operations).filter(isActive)
}

export function isViewLoading(state: AppState, view: View): boolean {
  return view === 'search' ? hasActiveOperation(state, 'search', 'search') : hasActiveOperation(state, 'refresh', view)
}
