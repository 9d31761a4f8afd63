import { readFileSync } from 'node:fs';
import { setTimeout as delay } from 'node:timers/promises';
import {
  BackendError,
  createPackage,
  isRecord,
  matchesFilter,
  type Package,
  type PackageDetails,
  type SourceFilter
} from '@wingetdash/shared';
import type { PackageBackend } from './backend.js';

export interface CatalogEntry {
  id: string;
  name: string;
  version: string;
  source: string;
  publisher?: string;
  description?: string;
  homepage?: string;
  license?: string;
}

export interface InstalledEntry {
  id: string;
  version: string;
}

export interface MemoryBackendOptions {
  catalog: CatalogEntry[];
  installed?: InstalledEntry[];
  /** Artificial delay applied to every call */
  latencyMs?: number;
}

/**
 * In-process package manager over a fixed catalog. Backs `--demo` mode and
 * the coordination tests.
 */
export class MemoryBackend implements PackageBackend {
  private readonly catalog = new Map<string, CatalogEntry>();
  private readonly installed = new Map<string, string>();
  private readonly latencyMs: number;

  constructor(options: MemoryBackendOptions) {
    for (const entry of options.catalog) {
      this.catalog.set(entry.id, entry);
    }
    for (const entry of options.installed ?? []) {
      this.installed.set(entry.id, entry.version);
    }
    this.latencyMs = options.latencyMs ?? 0;
  }

  async listInstalled(): Promise<Package[]> {
    await this.wait();
    const packages: Package[] = [];
    for (const [id, version] of this.installed) {
      const entry = this.catalog.get(id);
      packages.push(
        createPackage({
          id,
          name: entry?.name ?? id,
          version,
          source: entry?.source ?? '',
          ...(entry && entry.version !== version ? { availableVersion: entry.version } : {}),
        })
      );
    }
    return sortByName(packages);
  }

  async search(query: string, filter: SourceFilter): Promise<Package[]> {
    await this.wait();
    const needle = query.trim().toLowerCase();
    if (!needle) {
      return [];
    }
    const matches = [...this.catalog.values()]
      .filter((entry) => entry.id.toLowerCase().includes(needle) || entry.name.toLowerCase().includes(needle))
      .map((entry) => createPackage(entry))
      .filter((pkg) => matchesFilter(filter, pkg));
    return sortByName(matches);
  }

  async listUpgrades(): Promise<Package[]> {
    await this.wait();
    const upgrades: Package[] = [];
    for (const [id, version] of this.installed) {
      const entry = this.catalog.get(id);
      if (entry && entry.version !== version) {
        upgrades.push(
          createPackage({ id, name: entry.name, version, availableVersion: entry.version, source: entry.source })
        );
      }
    }
    return sortByName(upgrades);
  }

  async fetchDetails(id: string): Promise<PackageDetails> {
    await this.wait();
    const entry = this.requireEntry(id);
    return {
      id: entry.id,
      name: entry.name,
      version: this.installed.get(id) ?? entry.version,
      publisher: entry.publisher ?? '',
      description: entry.description ?? '',
      homepage: entry.homepage ?? '',
      license: entry.license ?? '',
      source: entry.source,
    };
  }

  async install(id: string): Promise<void> {
    await this.wait();
    const entry = this.requireEntry(id);
    if (this.installed.has(id)) {
      throw new BackendError('exit', `${id} is already installed`);
    }
    this.installed.set(id, entry.version);
  }

  async uninstall(id: string): Promise<void> {
    await this.wait();
    if (!this.installed.delete(id)) {
      throw new BackendError('exit', `${id} is not installed`);
    }
  }

  async upgrade(id: string): Promise<void> {
    await this.wait();
    const entry = this.requireEntry(id);
    const current = this.installed.get(id);
    if (current === undefined || current === entry.version) {
      throw new BackendError('exit', `No applicable upgrade found for ${id}`);
    }
    this.installed.set(id, entry.version);
  }

  private requireEntry(id: string): CatalogEntry {
    const entry = this.catalog.get(id);
    if (!entry) {
      throw new BackendError('exit', `No package found matching ${id}`);
    }
    return entry;
  }

  private async wait(): Promise<void> {
    if (this.latencyMs > 0) {
      await delay(this.latencyMs);
    }
  }
}

function sortByName(packages: Package[]): Package[] {
  return packages.sort((a, b) => a.name.localeCompare(b.name));
}

function isCatalogEntry(value: unknown): value is CatalogEntry {
  return (
    isRecord(value) &&
    typeof value.id === 'string' &&
    typeof value.name === 'string' &&
    typeof value.version === 'string' &&
    typeof value.source === 'string'
  );
}

function isInstalledEntry(value: unknown): value is InstalledEntry {
  return isRecord(value) && typeof value.id === 'string' && typeof value.version === 'string';
}

/**
 * Reads the bundled demo catalog from data/demo-catalog.json
 */
export function loadDemoCatalog(): Pick<MemoryBackendOptions, 'catalog' | 'installed'> {
  const raw: unknown = JSON.parse(readFileSync(new URL('../data/demo-catalog.json', import.meta.url), 'utf-8'));
  if (!isRecord(raw) || !Array.isArray(raw.catalog) || !Array.isArray(raw.installed)) {
    throw new Error('demo-catalog.json is malformed');
  }
  return {
    catalog: raw.catalog.filter(isCatalogEntry),
    installed: raw.installed.filter(isInstalledEntry),
  };
}
