import type { Package, PackageDetails, SourceFilter } from '@wingetdash/shared';

/**
 * What the dashboard needs from a package manager.
 *
 * Calls can take seconds (network search, installers). Callers on the
 * interactive path must never await them directly; the operation dispatcher
 * runs them off the input loop and reports back with a message. Failures
 * reject with a `BackendError`.
 */
export interface PackageBackend {
  listInstalled(): Promise<Package[]>;
  search(query: string, filter: SourceFilter): Promise<Package[]>;
  listUpgrades(): Promise<Package[]>;
  install(id: string): Promise<void>;
  uninstall(id: string): Promise<void>;
  upgrade(id: string): Promise<void>;
  fetchDetails(id: string): Promise<PackageDetails>;
}
