/**
 * Package data model helpers
 */

import type {
  MutationKind,
  Operation,
  OperationKind,
  Package,
  PackageDetails,
  PackageSource,
  SourceFilter,
  View
} from './types.js'

export const VIEWS: readonly View[] = ['search', 'installed', 'upgrades']

export const VIEW_LABELS: Record<View, string> = {
  search: 'Search',
  installed: 'Installed',
  upgrades: 'Upgrades'
}

export const FILTER_LABELS: Record<SourceFilter, string> = {
  all: 'All',
  winget: 'winget',
  msstore: 'msstore'
}

export function parseSource(value: string | undefined): PackageSource {
  const normalized = (value ?? '').trim().toLowerCase()
  if (normalized === 'winget') return 'winget'
  if (normalized === 'msstore') return 'msstore'
  return 'unknown'
}

export interface PackageInit {
  id: string
  name: string
  version?: string
  availableVersion?: string
  source?: string
}

export function createPackage(init: PackageInit): Package {
  const pkg: Package = {
    id: init.id,
    name: init.name,
    version: init.version ?? '',
    source: parseSource(init.source),
    ...(init.availableVersion ? { availableVersion: init.availableVersion } : {})
  }
  return Object.freeze(pkg)
}

export function samePackage(a: Package, b: Package): boolean {
  return a.id === b.id && a.source === b.source
}

/**
 * Returns a new frozen package with the lazily fetched detail fields.
 */
export function withDetails(pkg: Package, details: PackageDetails): Package {
  return Object.freeze({
    ...pkg,
    publisher: details.publisher,
    description: details.description,
    license: details.license,
    homepage: details.homepage
  })
}

/**
 * Fills identity fields the details call left empty from the listed package.
 */
export function mergeDetails(details: PackageDetails, known: Package | undefined): PackageDetails {
  if (!known) return details
  return {
    ...details,
    id: details.id || known.id,
    name: details.name || known.name,
    version: details.version || known.version,
    source: details.source || (known.source === 'unknown' ? '' : known.source)
  }
}

export function emptyDetails(id: string): PackageDetails {
  return { id, name: '', version: '', publisher: '', description: '', homepage: '', license: '', source: '' }
}

export function cycleFilter(filter: SourceFilter): SourceFilter {
  switch (filter) {
    case 'all':
      return 'winget'
    case 'winget':
      return 'msstore'
    case 'msstore':
      return 'all'
  }
}

export function matchesFilter(filter: SourceFilter, pkg: Package): boolean {
  return filter === 'all' || pkg.source === filter
}

export function nextView(view: View): View {
  return VIEWS[(VIEWS.indexOf(view) + 1) % VIEWS.length]
}

export function previousView(view: View): View {
  return VIEWS[(VIEWS.indexOf(view) + VIEWS.length - 1) % VIEWS.length]
}

export function isView(value: string): value is View {
  return VIEWS.some((view) => view === value)
}

export function isMutationKind(kind: OperationKind): kind is MutationKind {
  return kind === 'install' || kind === 'uninstall' || kind === 'upgrade'
}

export function operationKey(kind: OperationKind, target: string): string {
  return `${kind}:${target}`
}

export function isActive(operation: Operation): boolean {
  return operation.status.state === 'pending' || operation.status.state === 'running'
}

export function isTerminal(operation: Operation): boolean {
  return !isActive(operation)
}

export function describeOperation(kind: OperationKind, target: string): string {
  switch (kind) {
    case 'install':
      return `Installing ${target}`
    case 'uninstall':
      return `Uninstalling ${target}`
    case 'upgrade':
      return `Upgrading ${target}`
    case 'search':
      return 'Searching'
    case 'refresh':
      return `Loading ${target}`
    case 'details':
      return `Loading details for ${target}`
  }
}
