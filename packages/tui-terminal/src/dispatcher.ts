/**
 * Operation Dispatcher
 *
 * Turns submit effects into backend calls. Each accepted request runs as one
 * un-awaited unit of work that publishes exactly one `operation-result`
 * message on `results$`.
 */

import { Subject, type Observable } from 'rxjs'
import { v4 as uuidv4 } from 'uuid'
import {
  CommandRejected,
  describeOperation,
  isMutationKind,
  operationKey,
  toErrorMessage,
  type Logger
} from '@wingetdash/shared'
import type { PackageBackend } from '@wingetdash/winget-client'
import type { OperationOutcome, OperationResultMessage, ResultPayload, SubmitRequest } from './messages.js'

export type OperationHandle =
  | { accepted: true; id: string; sequence: number }
  | { accepted: false; reason: string }

export interface DispatcherOptions {
  backend: PackageBackend
  logger?: Logger
  /** Run install/uninstall/upgrade one at a time (default true) */
  serializeMutations?: boolean
}

export class OperationDispatcher {
  private readonly backend: PackageBackend
  private readonly logger: Logger | undefined
  private readonly serializeMutations: boolean
  private readonly results = new Subject<OperationResultMessage>()
  private readonly active = new Map<string, number>()
  private readonly inFlight = new Set<Promise<void>>()
  private mutationLane: Promise<void> = Promise.resolve()

  constructor(options: DispatcherOptions) {
    this.backend = options.backend
    this.logger = options.logger
    this.serializeMutations = options.serializeMutations ?? true
  }

  get results$(): Observable<OperationResultMessage> {
    return this.results.asObservable()
  }

  /** Number of (kind, target) pairs with a tracked unit */
  get activeCount(): number {
    return this.active.size
  }

  /**
   * Accepts or refuses a request. Search and refresh requests replace the
   * tracked unit for their key; every other kind is refused while one runs.
   */
  submit(request: SubmitRequest): OperationHandle {
    const key = operationKey(request.kind, request.target)
    const supersedes = request.kind === 'search' || request.kind === 'refresh'

    if (this.active.has(key) && !supersedes) {
      const rejection = new CommandRejected('duplicate', `${describeOperation(request.kind, request.target)} is already running`)
      this.logger?.warn('Rejected %s: %s', key, rejection.message)
      return { accepted: false, reason: rejection.message }
    }

    this.active.set(key, request.sequence)
    const id = uuidv4()
    this.logger?.debug('Dispatching %s #%d (%s)', key, request.sequence, id)

    const unit = this.schedule(request)
      .then((outcome) => {
        if (this.active.get(key) === request.sequence) {
          this.active.delete(key)
        }
        if (outcome.ok) {
          this.logger?.info('%s #%d succeeded', key, request.sequence)
        } else {
          this.logger?.warn('%s #%d failed: %s', key, request.sequence, outcome.message)
        }
        this.results.next({
          type: 'operation-result',
          kind: request.kind,
          target: request.target,
          sequence: request.sequence,
          outcome
        })
      })
      .catch((error: unknown) => {
        this.logger?.error('Result handling for %s failed: %s', key, toErrorMessage(error))
      })
      .finally(() => {
        this.inFlight.delete(unit)
      })
    this.inFlight.add(unit)

    return { accepted: true, id, sequence: request.sequence }
  }

  /**
   * Resolves once every unit submitted so far, and any submitted while
   * waiting, has published its result
   */
  async idle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight])
    }
  }

  /** Completes `results$`; units still running finish without publishing */
  close(): void {
    this.results.complete()
  }

  private schedule(request: SubmitRequest): Promise<OperationOutcome> {
    if (!this.serializeMutations || !isMutationKind(request.kind)) {
      return this.invoke(request)
    }
    const run = this.mutationLane.then(() => this.invoke(request))
    this.mutationLane = run.then(
      () => undefined,
      () => undefined
    )
    return run
  }

  private async invoke(request: SubmitRequest): Promise<OperationOutcome> {
    try {
      return { ok: true, payload: await this.call(request) }
    } catch (error) {
      return { ok: false, message: toErrorMessage(error) }
    }
  }

  private async call(request: SubmitRequest): Promise<ResultPayload> {
    switch (request.kind) {
      case 'search':
        return { type: 'packages', packages: await this.backend.search(request.query, request.filter) }
      case 'refresh': {
        const packages =
          request.target === 'installed' ? await this.backend.listInstalled() : await this.backend.listUpgrades()
        return { type: 'packages', packages }
      }
      case 'details':
        return { type: 'details', details: await this.backend.fetchDetails(request.target) }
      case 'install':
        await this.backend.install(request.target)
        return { type: 'none' }
      case 'uninstall':
        await this.backend.uninstall(request.target)
        return { type: 'none' }
      case 'upgrade':
        await this.backend.upgrade(request.target)
        return { type: 'none' }
    }
  }
}
