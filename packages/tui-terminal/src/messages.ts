/**
 * Messages consumed by the reducer and effects it hands back
 */

import type {
  FetchKind,
  MutationKind,
  OperationKind,
  Package,
  PackageDetails,
  SourceFilter,
  View
} from '@wingetdash/shared'

export type NavigateTarget = 'up' | 'down' | 'page-up' | 'page-down' | 'home' | 'end'

export type KeyCommand =
  | { type: 'navigate'; to: NavigateTarget }
  | { type: 'navigate'; by: number }
  | { type: 'select'; index: number }
  | { type: 'switch-view'; to: View | 'next' | 'previous' }
  | { type: 'cycle-filter' }
  | { type: 'focus-search' }
  | { type: 'search-input'; text: string }
  | { type: 'search-backspace' }
  | { type: 'cancel-search' }
  | { type: 'submit-search' }
  | { type: 'request'; kind: MutationKind }
  | { type: 'confirm' }
  | { type: 'cancel' }
  | { type: 'toggle-mark' }
  | { type: 'upgrade-marked' }
  | { type: 'refresh' }
  | { type: 'toggle-help' }
  | { type: 'toggle-detail' }
  | { type: 'close-overlay' }
  | { type: 'dismiss-operations' }
  | { type: 'quit' }
  | { type: 'noop' }

export type ResultPayload =
  | { type: 'packages'; packages: readonly Package[] }
  | { type: 'details'; details: PackageDetails }
  | { type: 'none' }

export type OperationOutcome = { ok: true; payload: ResultPayload } | { ok: false; message: string }

export interface OperationRef {
  kind: OperationKind
  target: string
  sequence: number
}

export interface OperationResultMessage extends OperationRef {
  type: 'operation-result'
  outcome: OperationOutcome
}

export type AppMessage =
  | { type: 'start' }
  | { type: 'command'; command: KeyCommand }
  | OperationResultMessage
  | ({ type: 'operation-dispatched' } & OperationRef)
  | ({ type: 'operation-rejected'; reason: string } & OperationRef)
  | { type: 'viewport'; rows: number }
  | { type: 'tick' }

/** Views backed by a listing call rather than a search */
export type ListView = Exclude<View, 'search'>

export type SubmitRequest =
  | { kind: MutationKind | 'details'; target: string; sequence: number }
  | { kind: Extract<FetchKind, 'search'>; target: 'search'; sequence: number; query: string; filter: SourceFilter }
  | { kind: Extract<FetchKind, 'refresh'>; target: ListView; sequence: number }

export type Effect = { type: 'submit'; request: SubmitRequest }

export function command(cmd: KeyCommand): AppMessage {
  return { type: 'command', command: cmd }
}
