/**
 * Application state machine
 *
 * `apply` is a pure function of the current state and one message. It never
 * talks to the backend: work it wants done comes back as `submit` effects,
 * which the controller hands to the dispatcher once the new state is
 * committed. Results come back later as `operation-result` messages carrying
 * the sequence number the operation was created with; only the newest
 * sequence per (kind, target) is applied.
 */

import {
  FILTER_LABELS,
  VIEWS,
  clamp,
  cycleFilter,
  describeOperation,
  isActive,
  isMutationKind,
  isTerminal,
  isView,
  mergeDetails,
  nextView,
  operationKey,
  plural,
  previousView,
  type MutationKind,
  type Operation,
  type OperationKind,
  type Package,
  type View
} from '@wingetdash/shared'
import type {
  AppMessage,
  Effect,
  KeyCommand,
  NavigateTarget,
  OperationRef,
  OperationResultMessage,
  SubmitRequest
} from './messages.js'
import {
  findPackage,
  hasActiveOperation,
  isViewLoading,
  selectedPackage,
  visiblePackages,
  type AppState,
  type MutationRequest,
  type StatusLine,
  type ViewState
} from './state.js'

export interface Transition {
  state: AppState
  effects: Effect[]
}

type NavigateCommand = Extract<KeyCommand, { type: 'navigate' }>

function none(state: AppState): Transition {
  return { state, effects: [] }
}

function submit(request: SubmitRequest): Effect {
  return { type: 'submit', request }
}

function withStatus(state: AppState, text: string, tone: StatusLine['tone'] = 'info'): AppState {
  return { ...state, status: { text, tone } }
}

function updateView(state: AppState, view: View, update: (current: ViewState) => ViewState): AppState {
  return { ...state, views: { ...state.views, [view]: update(state.views[view]) } }
}

/**
 * Keeps the cursor inside the rows the list can show
 */
function fitScroll(current: ViewState, length: number, rows: number): ViewState {
  let offset = clamp(current.scrollOffset, 0, Math.max(0, length - rows))
  if (current.cursor !== null) {
    if (current.cursor < offset) offset = current.cursor
    else if (current.cursor >= offset + rows) offset = current.cursor - rows + 1
  } else {
    offset = 0
  }
  return offset === current.scrollOffset ? current : { ...current, scrollOffset: offset }
}

function setCursor(state: AppState, view: View, cursor: number | null): AppState {
  const length = visiblePackages(state, view).length
  const next = length === 0 ? null : clamp(cursor ?? 0, 0, length - 1)
  return updateView(state, view, (current) => fitScroll({ ...current, cursor: next }, length, state.viewportRows))
}

/**
 * Swaps a view's list in one step. The cursor is clamped into the new
 * visible list and marks for packages that disappeared are dropped.
 */
function replaceList(state: AppState, view: View, packages: readonly Package[]): AppState {
  const ids = new Set(packages.map((pkg) => pkg.id))
  const next = updateView(state, view, (current) => ({
    ...current,
    packages,
    loaded: true,
    marked: current.marked.filter((id) => ids.has(id))
  }))
  return setCursor(next, view, state.views[view].cursor)
}

// Operation bookkeeping

function beginOperation(
  state: AppState,
  kind: OperationKind,
  target: string,
  label: string
): { state: AppState; sequence: number } {
  const sequence = state.nextSequence
  const key = operationKey(kind, target)
  const operation: Operation = { kind, target, status: { state: 'pending' }, sequence, origin: state.view, label }
  return {
    sequence,
    state: {
      ...state,
      nextSequence: sequence + 1,
      operations: { ...state.operations, [key]: operation },
      latestSequence: { ...state.latestSequence, [key]: sequence }
    }
  }
}

function removeOperation(state: AppState, key: string): AppState {
  if (!(key in state.operations)) return state
  const operations = { ...state.operations }
  delete operations[key]
  return { ...state, operations }
}

function replaceOperation(state: AppState, key: string, operation: Operation): AppState {
  return { ...state, operations: { ...state.operations, [key]: operation } }
}

/**
 * Consumes a sequence number for `key` so any result still in flight is discarded
 */
function invalidate(state: AppState, key: string): AppState {
  const sequence = state.nextSequence
  return removeOperation(
    { ...state, nextSequence: sequence + 1, latestSequence: { ...state.latestSequence, [key]: sequence } },
    key
  )
}

function dropDetails(state: AppState, id: string): AppState {
  if (!(id in state.details)) return state
  const details = { ...state.details }
  delete details[id]
  return { ...state, details }
}

// Fetches

function startFetch(state: AppState, view: View): Transition {
  if (view === 'search') {
    const query = state.submittedQuery
    if (!query) {
      return none(replaceList(invalidate(state, operationKey('search', 'search')), 'search', []))
    }
    const begun = beginOperation(state, 'search', 'search', `Searching for "${query}"`)
    return {
      state: withStatus(begun.state, `Searching for "${query}"...`),
      effects: [submit({ kind: 'search', target: 'search', sequence: begun.sequence, query, filter: state.filter })]
    }
  }

  const begun = beginOperation(state, 'refresh', view, describeOperation('refresh', view))
  return {
    state: begun.state,
    effects: [submit({ kind: 'refresh', target: view, sequence: begun.sequence })]
  }
}

function ensureDetails(state: AppState, pkg: Package): Transition {
  if (pkg.id in state.details || hasActiveOperation(state, 'details', pkg.id)) {
    return none(state)
  }
  const begun = beginOperation(state, 'details', pkg.id, describeOperation('details', pkg.name))
  return {
    state: begun.state,
    effects: [submit({ kind: 'details', target: pkg.id, sequence: begun.sequence })]
  }
}

/**
 * Keeps an open detail overlay on the selected package
 */
function followSelection(state: AppState): Transition {
  if (state.overlay.type !== 'detail') return none(state)
  const pkg = selectedPackage(state)
  if (!pkg) return none({ ...state, overlay: { type: 'none' } })
  if (pkg.id === state.overlay.packageId) return none(state)
  return ensureDetails({ ...state, overlay: { type: 'detail', packageId: pkg.id } }, pkg)
}

// Mutations

function dispatchMutations(state: AppState, requests: readonly MutationRequest[]): Transition {
  let next = state
  const effects: Effect[] = []
  const started: string[] = []
  for (const request of requests) {
    if (hasActiveOperation(next, request.kind, request.packageId)) continue
    const label = describeOperation(request.kind, request.packageName)
    const begun = beginOperation(next, request.kind, request.packageId, label)
    next = begun.state
    effects.push(submit({ kind: request.kind, target: request.packageId, sequence: begun.sequence }))
    started.push(label)
  }

  const dispatched = new Set(requests.map((request) => request.packageId))
  next = updateView(next, 'upgrades', (current) => ({
    ...current,
    marked: current.marked.filter((id) => !dispatched.has(id))
  }))

  if (started.length === 0) {
    return none(withStatus(next, 'Already in progress', 'error'))
  }
  const text = started.length === 1 ? `${started[0]}...` : `Started ${plural(started.length, 'operation')}`
  return { state: withStatus(next, text), effects }
}

function requestMutation(state: AppState, kind: MutationKind): Transition {
  const pkg = selectedPackage(state)
  if (!pkg) {
    return none(withStatus(state, 'No package selected', 'error'))
  }
  if (hasActiveOperation(state, kind, pkg.id)) {
    return none(withStatus(state, `${describeOperation(kind, pkg.name)} is already in progress`, 'error'))
  }
  const request: MutationRequest = { kind, packageId: pkg.id, packageName: pkg.name }
  if (state.options.confirmOperations) {
    return none({ ...state, overlay: { type: 'confirm', requests: [request] } })
  }
  return dispatchMutations(state, [request])
}

function upgradeMarked(state: AppState): Transition {
  if (state.view !== 'upgrades') {
    return none(withStatus(state, 'Batch upgrades run from the Upgrades view'))
  }
  const current = state.views.upgrades
  const requests: MutationRequest[] = []
  for (const id of current.marked) {
    const pkg = current.packages.find((candidate) => candidate.id === id)
    if (pkg) requests.push({ kind: 'upgrade', packageId: pkg.id, packageName: pkg.name })
  }
  if (requests.length === 0) {
    return none(withStatus(state, 'No packages marked'))
  }
  if (state.options.confirmOperations) {
    return none({ ...state, overlay: { type: 'confirm', requests } })
  }
  return dispatchMutations(state, requests)
}

function toggleMark(state: AppState): Transition {
  if (state.view !== 'upgrades') {
    return none(withStatus(state, 'Marking is only available in the Upgrades view'))
  }
  const pkg = selectedPackage(state)
  if (!pkg) return none(state)
  return none(
    updateView(state, 'upgrades', (current) => ({
      ...current,
      marked: current.marked.includes(pkg.id)
        ? current.marked.filter((id) => id !== pkg.id)
        : [...current.marked, pkg.id]
    }))
  )
}

// Navigation

function navigationTarget(to: NavigateTarget, current: number, length: number, page: number): number {
  switch (to) {
    case 'up':
      return (current - 1 + length) % length
    case 'down':
      return (current + 1) % length
    case 'page-up':
      return current - page
    case 'page-down':
      return current + page
    case 'home':
      return 0
    case 'end':
      return length - 1
  }
}

function navigate(state: AppState, cmd: NavigateCommand): Transition {
  const length = visiblePackages(state).length
  if (length === 0) return none(state)
  const current = state.views[state.view].cursor ?? 0
  const target =
    'by' in cmd ? current + cmd.by : navigationTarget(cmd.to, current, length, state.options.pageSize)
  return followSelection(setCursor(state, state.view, target))
}

function switchView(state: AppState, to: View | 'next' | 'previous'): Transition {
  const view = to === 'next' ? nextView(state.view) : to === 'previous' ? previousView(state.view) : to
  if (view === state.view) return none(state)
  const next: AppState = {
    ...state,
    view,
    overlay: state.overlay.type === 'detail' ? { type: 'none' } : state.overlay
  }
  if (!next.views[view].loaded && !isViewLoading(next, view)) {
    return startFetch(next, view)
  }
  return none(next)
}

function applyCycleFilter(state: AppState): Transition {
  const filter = cycleFilter(state.filter)
  let next = withStatus({ ...state, filter }, `Filter: ${FILTER_LABELS[filter]}`)
  for (const view of VIEWS) {
    next = setCursor(next, view, next.views[view].cursor)
  }
  return followSelection(next)
}

function submitSearch(state: AppState): Transition {
  const query = state.query.trim()
  return startFetch(
    { ...state, query, submittedQuery: query, inputMode: 'normal', view: 'search', overlay: { type: 'none' } },
    'search'
  )
}

function toggleDetail(state: AppState): Transition {
  if (state.overlay.type === 'detail') {
    return none({ ...state, overlay: { type: 'none' } })
  }
  const pkg = selectedPackage(state)
  if (!pkg) return none(state)
  return ensureDetails({ ...state, overlay: { type: 'detail', packageId: pkg.id } }, pkg)
}

function closeOverlay(state: AppState): Transition {
  if (state.overlay.type === 'none') return none(state)
  const next: AppState = { ...state, overlay: { type: 'none' } }
  return none(state.overlay.type === 'confirm' ? withStatus(next, 'Cancelled') : next)
}

function dismissOperations(state: AppState): Transition {
  const operations: Record<string, Operation> = {}
  for (const [key, operation] of Object.entries(state.operations)) {
    if (!isTerminal(operation)) operations[key] = operation
  }
  return none({ ...state, operations, status: null })
}

function applyCommand(state: AppState, cmd: KeyCommand): Transition {
  switch (cmd.type) {
    case 'navigate':
      return navigate(state, cmd)
    case 'select':
      return followSelection(setCursor(state, state.view, cmd.index))
    case 'switch-view':
      return switchView(state, cmd.to)
    case 'cycle-filter':
      return applyCycleFilter(state)
    case 'focus-search':
      return none({ ...state, inputMode: 'search', overlay: { type: 'none' } })
    case 'search-input':
      return none({ ...state, query: state.query + cmd.text })
    case 'search-backspace':
      return none({ ...state, query: Array.from(state.query).slice(0, -1).join('') })
    case 'cancel-search':
      return none({ ...state, inputMode: 'normal', query: state.submittedQuery })
    case 'submit-search':
      return submitSearch(state)
    case 'request':
      return requestMutation(state, cmd.kind)
    case 'confirm':
      if (state.overlay.type !== 'confirm') return none(state)
      return dispatchMutations({ ...state, overlay: { type: 'none' } }, state.overlay.requests)
    case 'cancel':
      return state.overlay.type === 'confirm' ? closeOverlay(state) : none(state)
    case 'toggle-mark':
      return toggleMark(state)
    case 'upgrade-marked':
      return upgradeMarked(state)
    case 'refresh':
      return startFetch(state, state.view)
    case 'toggle-help':
      return none({ ...state, overlay: state.overlay.type === 'help' ? { type: 'none' } : { type: 'help' } })
    case 'toggle-detail':
      return toggleDetail(state)
    case 'close-overlay':
      return closeOverlay(state)
    case 'dismiss-operations':
      return dismissOperations(state)
    case 'quit':
      return none({ ...state, quit: true })
    case 'noop':
      return none(state)
  }
}

// Results

function fetchedView(operation: Operation): View | undefined {
  if (operation.kind === 'search') return 'search'
  return isView(operation.target) ? operation.target : undefined
}

/**
 * A finished install/uninstall/upgrade changes what every listing shows.
 * The origin view is reloaded now, the others when next opened.
 */
function afterMutation(state: AppState, operation: Operation): Transition {
  let next = dropDetails(state, operation.target)
  for (const view of VIEWS) {
    if (view !== operation.origin && view !== 'search') {
      next = updateView(next, view, (current) => ({ ...current, loaded: false }))
    }
  }
  return startFetch(next, operation.origin)
}

/**
 * Runs the follow-up refresh while keeping the outcome in the status line
 */
function settleMutation(state: AppState, operation: Operation): Transition {
  const transition = afterMutation(state, operation)
  return { ...transition, state: { ...transition.state, status: state.status } }
}

function applyFailure(state: AppState, key: string, operation: Operation, message: string): Transition {
  const failed = replaceOperation(state, key, { ...operation, status: { state: 'failed', message } })
  if (isMutationKind(operation.kind)) {
    return settleMutation(withStatus(failed, `${operation.label} failed: ${message}`, 'error'), operation)
  }
  return none(withStatus(failed, `Error: ${message}`, 'error'))
}

function applyResult(state: AppState, message: OperationResultMessage): Transition {
  const key = operationKey(message.kind, message.target)
  if (state.latestSequence[key] !== message.sequence) return none(state)
  const operation = state.operations[key]
  if (!operation || !isActive(operation)) return none(state)

  const { outcome } = message
  if (!outcome.ok) {
    return applyFailure(state, key, operation, outcome.message)
  }

  const { payload } = outcome
  switch (operation.kind) {
    case 'search':
    case 'refresh': {
      const view = fetchedView(operation)
      if (!view) return none(removeOperation(state, key))
      const packages = payload.type === 'packages' ? payload.packages : []
      const next = replaceList(removeOperation(state, key), view, packages)
      if (operation.kind === 'search') {
        return followSelection(withStatus(next, `${plural(packages.length, 'package')} found`, 'success'))
      }
      return followSelection(next)
    }
    case 'details': {
      const next = removeOperation(state, key)
      if (payload.type !== 'details') return none(next)
      const details = mergeDetails(payload.details, findPackage(state, operation.target))
      return none({ ...next, details: { ...next.details, [operation.target]: details } })
    }
    case 'install':
    case 'uninstall':
    case 'upgrade': {
      const succeeded = replaceOperation(state, key, { ...operation, status: { state: 'succeeded' } })
      return settleMutation(withStatus(succeeded, `${operation.label} finished`, 'success'), operation)
    }
  }
}

function markRunning(state: AppState, ref: OperationRef): AppState {
  const key = operationKey(ref.kind, ref.target)
  const operation = state.operations[key]
  if (!operation || operation.sequence !== ref.sequence || operation.status.state !== 'pending') return state
  return replaceOperation(state, key, { ...operation, status: { state: 'running' } })
}

function rejectOperation(state: AppState, ref: OperationRef, reason: string): AppState {
  const key = operationKey(ref.kind, ref.target)
  const operation = state.operations[key]
  if (!operation || operation.sequence !== ref.sequence) return state
  return withStatus(removeOperation(state, key), reason, 'error')
}

function setViewport(state: AppState, rows: number): AppState {
  const viewportRows = Math.max(1, rows)
  if (viewportRows === state.viewportRows) return state
  let next: AppState = { ...state, viewportRows }
  for (const view of VIEWS) {
    const length = visiblePackages(next, view).length
    next = updateView(next, view, (current) => fitScroll(current, length, viewportRows))
  }
  return next
}

export function apply(state: AppState, message: AppMessage): Transition {
  switch (message.type) {
    case 'start':
      return startFetch(state, state.view)
    case 'command':
      return applyCommand(state, message.command)
    case 'operation-result':
      return applyResult(state, message)
    case 'operation-dispatched':
      return none(markRunning(state, message))
    case 'operation-rejected':
      return none(rejectOperation(state, message, message.reason))
    case 'viewport':
      return none(setViewport(state, message.rows))
    case 'tick':
      return none({ ...state, tick: state.tick + 1 })
  }
}
