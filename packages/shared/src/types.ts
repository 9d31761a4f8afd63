/**
 * Shared TypeScript types and interfaces
 */

// Basic types
export type ID = string

// Package catalog types
export type PackageSource = 'winget' | 'msstore' | 'unknown'

export type SourceFilter = 'all' | 'winget' | 'msstore'

export type View = 'search' | 'installed' | 'upgrades'

export interface PackageDetails {
  id: ID
  name: string
  version: string
  publisher: string
  description: string
  homepage: string
  license: string
  source: string
}

/**
 * A package as listed by the package manager. Frozen by `createPackage`;
 * a refresh replaces the whole object.
 */
export interface Package {
  readonly id: ID
  readonly name: string
  readonly version: string
  /** Only present in upgrade listings */
  readonly availableVersion?: string
  readonly source: PackageSource
  readonly publisher?: string
  readonly description?: string
  readonly license?: string
  readonly homepage?: string
}

// Operation types
export type MutationKind = 'install' | 'uninstall' | 'upgrade'
export type FetchKind = 'search' | 'refresh'
export type OperationKind = MutationKind | FetchKind | 'details'

export type OperationStatus =
  | { state: 'pending' }
  | { state: 'running' }
  | { state: 'succeeded' }
  | { state: 'failed'; message: string }

export interface Operation {
  kind: OperationKind
  /** Package id, or the view name for search/refresh */
  target: string
  status: OperationStatus
  sequence: number
  origin: View
  label: string
}

// Configuration types
export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
  setLevel(level: LogLevel): void
  getLevel(): LogLevel
  createChild(childNamespace: string): Logger
}
