import { describe, it, expect, vi } from 'vitest'
import type { Package } from '@wingetdash/shared'
import { MemoryBackend } from '@wingetdash/winget-client'
import { AppController } from './controller.js'
import { OperationDispatcher } from './dispatcher.js'
import { createInitialState, type AppState } from './state.js'
import { Deferred, cmd, nextTurn, pkg, stubBackend } from './test-utils.js'

function memoryBackend(): MemoryBackend {
  return new MemoryBackend({
    catalog: [
      { id: 'Foo.Foo', name: 'Foo', version: '1.0', source: 'winget' },
      { id: 'Bar.Bar', name: 'Bar', version: '2.0', source: 'winget' },
      { id: 'Baz.Baz', name: 'Baz', version: '3.0', source: 'msstore' }
    ],
    installed: [
      { id: 'Foo.Foo', version: '1.0' },
      { id: 'Bar.Bar', version: '1.0' },
      { id: 'Baz.Baz', version: '3.0' }
    ]
  })
}

function setup(dispatcher: OperationDispatcher, confirmOperations = false): AppController {
  const controller = new AppController({ dispatcher, initialState: createInitialState({ confirmOperations }) })
  controller.connect()
  return controller
}

const ids = (state: AppState, view: 'search' | 'installed' | 'upgrades') =>
  state.views[view].packages.map((entry) => entry.id)

describe('AppController', () => {
  it('loads the starting view', async () => {
    const controller = setup(new OperationDispatcher({ backend: memoryBackend() }))

    controller.send({ type: 'start' })
    expect(controller.state.operations['refresh:installed']?.status).toEqual({ state: 'running' })

    await controller.whenIdle()
    expect(ids(controller.state, 'installed')).toEqual(['Bar.Bar', 'Baz.Baz', 'Foo.Foo'])
    expect(controller.state.views.installed.cursor).toBe(0)
    expect(controller.state.operations).toEqual({})
  })

  it('uninstalls a package and refreshes the list it came from', async () => {
    const controller = setup(new OperationDispatcher({ backend: memoryBackend() }))
    controller.send({ type: 'start' })
    await controller.whenIdle()

    controller.send(cmd({ type: 'navigate', to: 'end' }))
    controller.send(cmd({ type: 'request', kind: 'uninstall' }))
    expect(controller.state.status).toEqual({ text: 'Uninstalling Foo...', tone: 'info' })

    await controller.whenIdle()
    const { state } = controller
    expect(ids(state, 'installed')).toEqual(['Bar.Bar', 'Baz.Baz'])
    expect(state.views.installed.cursor).toBe(1)
    expect(state.views.upgrades.loaded).toBe(false)
    expect(state.operations['uninstall:Foo.Foo']?.status).toEqual({ state: 'succeeded' })
    expect(state.status).toEqual({ text: 'Uninstalling Foo finished', tone: 'success' })
  })

  it('keeps the newest search when results arrive out of order', async () => {
    const older = new Deferred<Package[]>()
    const newer = new Deferred<Package[]>()
    const search = vi.fn().mockReturnValueOnce(older.promise).mockReturnValueOnce(newer.promise)
    const controller = setup(new OperationDispatcher({ backend: stubBackend({ search }) }))

    controller.send(cmd({ type: 'focus-search' }))
    controller.send(cmd({ type: 'search-input', text: 'git' }))
    controller.send(cmd({ type: 'submit-search' }))
    controller.send(cmd({ type: 'focus-search' }))
    controller.send(cmd({ type: 'search-input', text: 'hub' }))
    controller.send(cmd({ type: 'submit-search' }))
    expect(search.mock.calls).toEqual([
      ['git', 'all'],
      ['github', 'all']
    ])

    newer.resolve([pkg('GitHub.cli', 'GitHub CLI')])
    await nextTurn()
    older.resolve([pkg('Git.Git', 'Git')])
    await controller.whenIdle()

    expect(ids(controller.state, 'search')).toEqual(['GitHub.cli'])
    expect(controller.state.status).toEqual({ text: '1 package found', tone: 'success' })
  })

  it('refuses a repeated request while the first one runs', async () => {
    const pending = new Deferred<void>()
    const upgrade = vi.fn(() => pending.promise)
    const backend = stubBackend({ listInstalled: vi.fn(async () => [pkg('Foo.Foo', 'Foo')]), upgrade })
    const controller = setup(new OperationDispatcher({ backend }))
    controller.send({ type: 'start' })
    await controller.whenIdle()

    controller.send(cmd({ type: 'request', kind: 'upgrade' }))
    controller.send(cmd({ type: 'request', kind: 'upgrade' }))
    expect(controller.state.status).toEqual({ text: 'Upgrading Foo is already in progress', tone: 'error' })

    pending.resolve()
    await controller.whenIdle()
    expect(upgrade).toHaveBeenCalledTimes(1)
  })

  it('clears an operation the dispatcher turns down', () => {
    const backend = stubBackend({
      listInstalled: vi.fn(async () => []),
      upgrade: vi.fn(() => new Deferred<void>().promise)
    })
    const dispatcher = new OperationDispatcher({ backend })
    const initial = createInitialState({ confirmOperations: false })
    const controller = new AppController({
      dispatcher,
      initialState: {
        ...initial,
        views: { ...initial.views, installed: { ...initial.views.installed, packages: [pkg('Foo.Foo', 'Foo')], cursor: 0, loaded: true } }
      }
    })
    controller.connect()

    dispatcher.submit({ kind: 'upgrade', target: 'Foo.Foo', sequence: 99 })
    controller.send(cmd({ type: 'request', kind: 'upgrade' }))

    expect(controller.state.operations['upgrade:Foo.Foo']).toBeUndefined()
    expect(controller.state.status).toEqual({ text: 'Upgrading Foo.Foo is already running', tone: 'error' })
  })

  it('publishes the committed state once per send', () => {
    const controller = setup(new OperationDispatcher({ backend: stubBackend() }))
    const seen: number[] = []
    controller.state$.subscribe((state) => seen.push(state.nextSequence))

    controller.send({ type: 'start' })
    controller.send({ type: 'tick' })

    expect(seen).toEqual([1, 2, 2])
  })
})
