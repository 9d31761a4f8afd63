import { expect, vi } from 'vitest'
import { createPackage, emptyDetails, type Package } from '@wingetdash/shared'
import type { PackageBackend } from '@wingetdash/winget-client'
import type { AppMessage, KeyCommand, ListView, OperationOutcome, SubmitRequest } from './messages.js'
import { apply, type Transition } from './reducer.js'
import type { AppState } from './state.js'

export function pkg(id: string, name: string, source = 'winget', availableVersion?: string): Package {
  return createPackage({ id, name, version: '1.0', source, ...(availableVersion ? { availableVersion } : {}) })
}

export function cmd(command: KeyCommand): AppMessage {
  return { type: 'command', command }
}

export function result(request: SubmitRequest, outcome: OperationOutcome): AppMessage {
  return { type: 'operation-result', kind: request.kind, target: request.target, sequence: request.sequence, outcome }
}

export function packagesResult(request: SubmitRequest, packages: Package[]): AppMessage {
  return result(request, { ok: true, payload: { type: 'packages', packages } })
}

export function only(transition: Transition): SubmitRequest {
  expect(transition.effects).toHaveLength(1)
  return transition.effects[0].request
}

export function run(state: AppState, ...messages: AppMessage[]): AppState {
  return messages.reduce((current, message) => apply(current, message).state, state)
}

/**
 * Opens `view`, refreshes it and feeds back `packages`
 */
export function load(state: AppState, view: ListView, packages: Package[]): AppState {
  const started = apply({ ...state, view }, cmd({ type: 'refresh' }))
  return apply(started.state, packagesResult(only(started), packages)).state
}

export function stripAnsi(text: string): string {
  return text.replace(/\x1b\[[0-9;]*m/g, '')
}

export class Deferred<T> {
  readonly promise: Promise<T>
  resolve: (value: T) => void = () => {}
  reject: (reason: unknown) => void = () => {}

  constructor() {
    this.promise = new Promise<T>((resolve, reject) => {
      this.resolve = resolve
      this.reject = reject
    })
  }
}

export function stubBackend(overrides: Partial<PackageBackend> = {}): PackageBackend {
  return {
    listInstalled: vi.fn(async () => []),
    search: vi.fn(async () => []),
    listUpgrades: vi.fn(async () => []),
    fetchDetails: vi.fn(async (id: string) => emptyDetails(id)),
    install: vi.fn(async () => {}),
    uninstall: vi.fn(async () => {}),
    upgrade: vi.fn(async () => {}),
    ...overrides
  }
}

export const nextTurn = () => new Promise<void>((resolve) => setImmediate(resolve))
