import { readFile } from 'fs/promises';
import { join } from 'path';
import { homedir } from 'os';
import { isRecord, safeJsonParse } from '@wingetdash/shared';

/**
 * Expands tilde (~) in file paths to the user's home directory
 */
export function expandHomePath(filePath: string): string {
  if (filePath.startsWith('~/')) {
    return join(homedir(), filePath.slice(2));
  }
  return filePath;
}

/**
 * Shape of config.json. Every key is optional; unknown keys are ignored.
 */
export interface DashboardConfigFile {
  wingetPath?: string;
  logLevel?: string;
  logFile?: string;
  commandTimeoutMs?: number;
  confirmOperations?: boolean;
  pageSize?: number;
  serializeMutations?: boolean;
  defaultView?: string;
}

/**
 * Returns the appropriate user configuration directory for the current platform
 */
export function getUserConfigDir(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env
): string {
  switch (platform) {
    case 'darwin': // macOS
      return join(homedir(), 'Library', 'Application Support', 'wingetdash');
    case 'win32': // Windows
      return join(env.APPDATA || join(homedir(), 'AppData', 'Roaming'), 'wingetdash');
    default: // Linux and other Unix-like systems
      return join(env.XDG_CONFIG_HOME || join(homedir(), '.config'), 'wingetdash');
  }
}

/**
 * Returns the configuration file path
 */
export function getConfigPath(): string {
  return join(getUserConfigDir(), 'config.json');
}

export function getDefaultLogPath(): string {
  return join(getUserConfigDir(), 'wingetdash.log');
}

/**
 * Keeps only the keys whose values have the expected primitive type
 */
export function sanitizeConfigFile(raw: unknown): DashboardConfigFile {
  if (!isRecord(raw)) {
    return {};
  }

  const record: Record<string, unknown> = raw;
  const config: DashboardConfigFile = {};
  const str = (key: string): string | undefined => {
    const value = record[key];
    return typeof value === 'string' ? value : undefined;
  };
  const num = (key: string): number | undefined => {
    const value = record[key];
    return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
  };
  const bool = (key: string): boolean | undefined => {
    const value = record[key];
    return typeof value === 'boolean' ? value : undefined;
  };

  const wingetPath = str('wingetPath');
  if (wingetPath !== undefined) config.wingetPath = wingetPath;
  const logLevel = str('logLevel');
  if (logLevel !== undefined) config.logLevel = logLevel;
  const logFile = str('logFile');
  if (logFile !== undefined) config.logFile = logFile;
  const commandTimeoutMs = num('commandTimeoutMs');
  if (commandTimeoutMs !== undefined) config.commandTimeoutMs = commandTimeoutMs;
  const confirmOperations = bool('confirmOperations');
  if (confirmOperations !== undefined) config.confirmOperations = confirmOperations;
  const pageSize = num('pageSize');
  if (pageSize !== undefined) config.pageSize = pageSize;
  const serializeMutations = bool('serializeMutations');
  if (serializeMutations !== undefined) config.serializeMutations = serializeMutations;
  const defaultView = str('defaultView');
  if (defaultView !== undefined) config.defaultView = defaultView;

  return config;
}

/**
 * Loads configuration from the config file. A missing or unreadable file
 * yields an empty configuration.
 */
export async function loadConfig(configPath: string = getConfigPath()): Promise<DashboardConfigFile> {
  let content: string;
  try {
    content = await readFile(expandHomePath(configPath), 'utf-8');
  } catch {
    return {};
  }
  return sanitizeConfigFile(safeJsonParse(content));
}
