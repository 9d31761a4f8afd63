/**
 * Main TUI Application
 *
 * Wires the terminal, the dispatcher and the controller together. Keyboard
 * and mouse input, dispatcher results and the spinner timer all end up as
 * messages on the controller; every committed state is rendered.
 */

import type { ReadStream, WriteStream } from 'node:tty'
import { Observable, Subscription, filter, interval, map } from 'rxjs'
import { toErrorMessage, type Logger } from '@wingetdash/shared'
import type { RuntimeConfig } from '@wingetdash/backend-core'
import type { PackageBackend } from '@wingetdash/winget-client'
import { AppController } from './controller.js'
import { OperationDispatcher } from './dispatcher.js'
import { mapInput, type InputContext } from './input.js'
import { InputDecoder, type RawInputEvent } from './keys.js'
import type { LayoutRegions } from './layout.js'
import type { KeyCommand } from './messages.js'
import { render } from './renderer.js'
import { Screen } from './screen.js'
import { snapshot } from './snapshot.js'
import { activeOperations, createInitialState, visiblePackages, type AppState } from './state.js'

export type TuiDependencies = {
  stdin: ReadStream
  stdout: WriteStream
  backend: PackageBackend
  config: Pick<RuntimeConfig, 'confirmOperations' | 'pageSize' | 'serializeMutations' | 'defaultView'>
  logger: Logger
}

const TICK_MS = 100

function inputEvents(stdin: ReadStream): Observable<RawInputEvent> {
  return new Observable<RawInputEvent>((subscriber) => {
    const decoder = new InputDecoder()
    const onData = (chunk: string | Buffer) => {
      for (const event of decoder.decode(chunk)) subscriber.next(event)
    }
    stdin.on('data', onData)
    return () => {
      stdin.off('data', onData)
    }
  })
}

function resizeEvents(stdout: WriteStream): Observable<void> {
  return new Observable<void>((subscriber) => {
    const onResize = () => subscriber.next()
    stdout.on('resize', onResize)
    return () => {
      stdout.off('resize', onResize)
    }
  })
}

export function inputContext(state: AppState, layout: LayoutRegions | null): InputContext {
  return {
    inputMode: state.inputMode,
    overlay: state.overlay.type,
    layout,
    visibleCount: visiblePackages(state).length
  }
}

/**
 * Main TUI application runner
 *
 * Takes over the terminal until the user quits, then restores it. Rejects
 * if the loop fails; the terminal is restored first.
 */
export async function tuiUI(dependencies: TuiDependencies): Promise<void> {
  const { stdin, stdout, backend, config, logger } = dependencies
  const screen = new Screen(stdin, stdout)
  const dispatcher = new OperationDispatcher({
    backend,
    logger: logger.createChild('dispatcher'),
    serializeMutations: config.serializeMutations
  })
  const controller = new AppController({
    dispatcher,
    logger: logger.createChild('controller'),
    initialState: createInitialState({
      view: config.defaultView,
      confirmOperations: config.confirmOperations,
      pageSize: config.pageSize
    })
  })

  let layout: LayoutRegions | null = null

  const draw = (state: AppState): void => {
    const result = render(snapshot(state), screen.size())
    screen.draw(result.frame)
    layout = result.layout
    if (result.layout.listRows !== state.viewportRows) {
      controller.send({ type: 'viewport', rows: result.layout.listRows })
    }
  }

  return new Promise<void>((resolve, reject) => {
    const subscriptions = new Subscription()
    let finished = false

    const finish = (error?: unknown): void => {
      if (finished) return
      finished = true
      subscriptions.unsubscribe()
      dispatcher.close()
      screen.restore()
      if (error === undefined) {
        logger.info('Exiting')
        resolve()
      } else {
        reject(error)
      }
    }

    const guard =
      <T>(handler: (value: T) => void) =>
      (value: T): void => {
        try {
          handler(value)
        } catch (error) {
          logger.error('Event loop failed: %s', toErrorMessage(error))
          finish(error)
        }
      }

    screen.enter()
    logger.info('Started in %s view', controller.state.view)

    subscriptions.add(controller.connect())
    subscriptions.add(
      controller.state$.subscribe(
        guard((state: AppState) => {
          if (state.quit) {
            finish()
          } else {
            draw(state)
          }
        })
      )
    )
    subscriptions.add(
      inputEvents(stdin)
        .pipe(map((event) => mapInput(event, inputContext(controller.state, layout))))
        .subscribe(guard((command: KeyCommand) => controller.send({ type: 'command', command })))
    )
    subscriptions.add(
      interval(TICK_MS)
        .pipe(filter(() => activeOperations(controller.state).length > 0))
        .subscribe(guard(() => controller.send({ type: 'tick' })))
    )
    subscriptions.add(
      resizeEvents(stdout).subscribe(
        guard(() => {
          screen.invalidate()
          draw(controller.state)
        })
      )
    )

    guard(() => controller.send({ type: 'start' }))(undefined)
  })
}
