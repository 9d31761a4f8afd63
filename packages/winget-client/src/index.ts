// Backend capability contract
export type { PackageBackend } from './backend.js';

// winget CLI implementation
export {
  WingetClient,
  type WingetClientConfig,
  type CommandEvent,
  type CommandFinishedEvent
} from './client.js';

// Output parsing
export { cleanOutput, parsePackageTable, parseShowOutput } from './parser.js';

// In-process alternate backend
export {
  MemoryBackend,
  loadDemoCatalog,
  type CatalogEntry,
  type InstalledEntry,
  type MemoryBackendOptions
} from './memory-backend.js';
