// Main exports for the backend-core package
export * from './config.js';
export * from './resolver.js';

// Re-export commonly used types
export type { DashboardConfigFile } from './config.js';

export type {
  RuntimeConfig,
  RuntimeFlags,
  RuntimeConfigResolverOptions
} from './resolver.js';
