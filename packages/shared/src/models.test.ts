import { describe, it, expect } from 'vitest'
import {
  createPackage,
  cycleFilter,
  matchesFilter,
  mergeDetails,
  nextView,
  parseSource,
  previousView,
  samePackage,
  withDetails,
  emptyDetails
} from './models.js'

describe('createPackage', () => {
  it('normalizes the source and freezes the result', () => {
    const pkg = createPackage({ id: 'Git.Git', name: 'Git', version: '2.45.0', source: 'WinGet' })
    expect(pkg.source).toBe('winget')
    expect(Object.isFrozen(pkg)).toBe(true)
    expect('availableVersion' in pkg).toBe(false)
  })

  it('maps empty or unknown sources to unknown', () => {
    expect(parseSource('')).toBe('unknown')
    expect(parseSource(undefined)).toBe('unknown')
    expect(parseSource('chocolatey')).toBe('unknown')
    expect(parseSource(' msstore ')).toBe('msstore')
  })

  it('compares packages by id and source only', () => {
    const a = createPackage({ id: 'Foo', name: 'Foo', version: '1.0', source: 'winget' })
    const b = createPackage({ id: 'Foo', name: 'Foo renamed', version: '2.0', source: 'winget' })
    const c = createPackage({ id: 'Foo', name: 'Foo', version: '1.0', source: 'msstore' })
    expect(samePackage(a, b)).toBe(true)
    expect(samePackage(a, c)).toBe(false)
  })
})

describe('details', () => {
  const pkg = createPackage({ id: 'Foo.Bar', name: 'Foo Bar', version: '1.2.3', source: 'winget' })

  it('withDetails returns a new frozen package', () => {
    const details = { ...emptyDetails('Foo.Bar'), publisher: 'Foo Inc', license: 'MIT' }
    const enriched = withDetails(pkg, details)
    expect(enriched).not.toBe(pkg)
    expect(enriched.publisher).toBe('Foo Inc')
    expect(enriched.license).toBe('MIT')
    expect(Object.isFrozen(enriched)).toBe(true)
    expect(pkg.publisher).toBeUndefined()
  })

  it('mergeDetails fills empty identity fields from the listed package', () => {
    const merged = mergeDetails({ ...emptyDetails(''), description: 'A tool' }, pkg)
    expect(merged).toEqual({
      id: 'Foo.Bar',
      name: 'Foo Bar',
      version: '1.2.3',
      source: 'winget',
      publisher: '',
      description: 'A tool',
      homepage: '',
      license: ''
    })
  })
})

describe('filters and views', () => {
  it('cycles all -> winget -> msstore -> all', () => {
    expect(cycleFilter('all')).toBe('winget')
    expect(cycleFilter('winget')).toBe('msstore')
    expect(cycleFilter('msstore')).toBe('all')
  })

  it('matches by source', () => {
    const store = createPackage({ id: '9NBLGGH4NNS1', name: 'App Installer', source: 'msstore' })
    expect(matchesFilter('all', store)).toBe(true)
    expect(matchesFilter('msstore', store)).toBe(true)
    expect(matchesFilter('winget', store)).toBe(false)
  })

  it('cycles views in both directions', () => {
    expect(nextView('search')).toBe('installed')
    expect(nextView('upgrades')).toBe('search')
    expect(previousView('search')).toBe('upgrades')
    expect(previousView('installed')).toBe('search')
  })
})
