import { describe, it, expect } from 'vitest'
import { apply } from './reducer.js'
import { snapshot } from './snapshot.js'
import { createInitialState } from './state.js'
import { cmd, load, only, pkg, result, run } from './test-utils.js'

const git = pkg('Git.Git', 'Git')
const vim = pkg('vim.vim', 'Vim', 'winget', '9.1')
const store = pkg('9NBLGGH4NNS1', 'App Installer', 'msstore')

describe('snapshot', () => {
  it('projects the visible rows with selection and marks', () => {
    const state = run(
      load(createInitialState(), 'upgrades', [git, vim, store]),
      cmd({ type: 'navigate', to: 'down' }),
      cmd({ type: 'toggle-mark' }),
      cmd({ type: 'cycle-filter' })
    )
    const view = snapshot(state)

    expect(view.view).toBe('upgrades')
    expect(view.filter).toBe('winget')
    expect(view.total).toBe(3)
    expect(view.markedCount).toBe(1)
    expect(view.rows.map((row) => [row.pkg.id, row.selected, row.marked])).toEqual([
      ['Git.Git', false, false],
      ['vim.vim', true, true]
    ])
  })

  it('is frozen', () => {
    const view = snapshot(load(createInitialState(), 'installed', [git]))

    expect(Object.isFrozen(view)).toBe(true)
    expect(Object.isFrozen(view.rows)).toBe(true)
    expect(Object.isFrozen(view.rows[0])).toBe(true)
  })

  it('reports loading and the spinner frame', () => {
    const started = apply(createInitialState(), { type: 'start' }).state
    const ticked = run(started, { type: 'tick' }, { type: 'tick' })

    expect(snapshot(started)).toMatchObject({ loading: true, loaded: false, activeCount: 1, spinner: '⠋' })
    expect(snapshot(ticked).spinner).toBe('⠹')
  })

  it('attaches the running operation to its row', () => {
    const loaded = load(createInitialState({ confirmOperations: false }), 'installed', [git])
    const request = only(apply(loaded, cmd({ type: 'request', kind: 'uninstall' })))
    const state = apply(loaded, cmd({ type: 'request', kind: 'uninstall' })).state

    expect(snapshot(state).rows[0].operation).toEqual({
      kind: 'uninstall',
      target: 'Git.Git',
      status: { state: 'pending' },
      sequence: request.sequence,
      origin: 'installed',
      label: 'Uninstalling Git'
    })
  })

  it('describes the confirm dialog', () => {
    const state = run(load(createInitialState(), 'installed', [git]), cmd({ type: 'request', kind: 'uninstall' }))

    expect(snapshot(state).overlay).toEqual({ type: 'confirm', lines: ['Uninstall Git?'] })
  })

  it('describes the detail overlay while loading and after a failure', () => {
    const loaded = load(createInitialState(), 'installed', [git])
    const opened = apply(loaded, cmd({ type: 'toggle-detail' }))
    const request = only(opened)

    expect(snapshot(opened.state).overlay).toEqual({ type: 'detail', pkg: git, details: undefined, loading: true })

    const failed = run(opened.state, result(request, { ok: false, message: 'network down' }))
    expect(snapshot(failed).overlay).toEqual({
      type: 'detail',
      pkg: git,
      details: undefined,
      loading: false,
      error: 'network down'
    })
  })
})
