/**
 * Single owner of AppState
 *
 * Every message, whether from the keyboard, the mouse, the dispatcher or the
 * spinner timer, goes through `send`, which applies messages strictly one at
 * a time and hands the resulting effects to the dispatcher after the new
 * state is committed.
 */

import { BehaviorSubject, type Observable, type Subscription } from 'rxjs'
import type { Logger } from '@wingetdash/shared'
import type { OperationDispatcher } from './dispatcher.js'
import type { AppMessage, Effect } from './messages.js'
import { apply } from './reducer.js'
import { createInitialState, type AppState } from './state.js'

export interface AppControllerOptions {
  dispatcher: OperationDispatcher
  initialState?: AppState
  logger?: Logger
}

export class AppController {
  private readonly dispatcher: OperationDispatcher
  private readonly logger: Logger | undefined
  private readonly states: BehaviorSubject<AppState>
  private readonly queue: AppMessage[] = []
  private current: AppState
  private processing = false

  constructor(options: AppControllerOptions) {
    this.dispatcher = options.dispatcher
    this.logger = options.logger
    this.current = options.initialState ?? createInitialState()
    this.states = new BehaviorSubject(this.current)
  }

  get state(): AppState {
    return this.current
  }

  /** Emits the committed state after each batch of messages */
  get state$(): Observable<AppState> {
    return this.states.asObservable()
  }

  send(message: AppMessage): void {
    this.queue.push(message)
    if (this.processing) return

    this.processing = true
    try {
      let next = this.queue.shift()
      while (next) {
        const transition = apply(this.current, next)
        this.current = transition.state
        for (const effect of transition.effects) {
          this.run(effect)
        }
        next = this.queue.shift()
      }
    } finally {
      this.processing = false
    }
    this.states.next(this.current)
  }

  /**
   * Routes dispatcher results back into `send`
   */
  connect(): Subscription {
    return this.dispatcher.results$.subscribe((message) => this.send(message))
  }

  /** Resolves once the dispatcher has nothing in flight */
  async whenIdle(): Promise<void> {
    await this.dispatcher.idle()
  }

  private run(effect: Effect): void {
    const { request } = effect
    const ref = { kind: request.kind, target: request.target, sequence: request.sequence }
    const handle = this.dispatcher.submit(request)
    if (handle.accepted) {
      this.queue.push({ type: 'operation-dispatched', ...ref })
    } else {
      this.logger?.debug('Submit refused: %s', handle.reason)
      this.queue.push({ type: 'operation-rejected', reason: handle.reason, ...ref })
    }
  }
}
