import { DEFAULT_CONFIG, isLogLevel, isView, type LogLevel, type View } from '@wingetdash/shared';
import { expandHomePath, getDefaultLogPath, type DashboardConfigFile } from './config.js';

export interface RuntimeConfig {
  wingetPath: string;
  logLevel: LogLevel;
  logFile: string;
  commandTimeoutMs: number;
  confirmOperations: boolean;
  pageSize: number;
  serializeMutations: boolean;
  defaultView: View;
}

export interface RuntimeFlags {
  wingetPath?: string;
  logLevel?: string;
  logFile?: string;
}

export interface RuntimeConfigResolverOptions {
  persisted?: DashboardConfigFile;
  env?: NodeJS.ProcessEnv;
  flags?: RuntimeFlags;
}

function parseBooleanEnv(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return undefined;
}

function parseIntegerEnv(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : undefined;
}

/**
 * Returns the first candidate that passes the check
 */
function firstValid<T>(candidates: Array<unknown>, check: (value: unknown) => value is T, fallback: T): T {
  for (const candidate of candidates) {
    if (candidate !== undefined && check(candidate)) {
      return candidate;
    }
  }
  return fallback;
}

const isNonEmptyString = (value: unknown): value is string => typeof value === 'string' && value.trim() !== '';
const isLevel = (value: unknown): value is LogLevel => typeof value === 'string' && isLogLevel(value);
const isViewName = (value: unknown): value is View => typeof value === 'string' && isView(value);
const isNonNegativeInteger = (value: unknown): value is number =>
  typeof value === 'number' && Number.isInteger(value) && value >= 0;
const isPositiveInteger = (value: unknown): value is number =>
  typeof value === 'number' && Number.isInteger(value) && value > 0;
const isBoolean = (value: unknown): value is boolean => typeof value === 'boolean';

/**
 * Resolves the runtime configuration following the precedence rules
 *
 * 1. Command line flags
 * 2. WINGETDASH_* environment variables
 * 3. Config file
 * 4. Built-in defaults
 *
 * Invalid values are skipped field by field, so a bad entry falls through
 * to the next layer instead of failing the whole resolution.
 */
export function resolveRuntimeConfig(options: RuntimeConfigResolverOptions = {}): RuntimeConfig {
  const { persisted = {}, env = process.env, flags = {} } = options;

  const logFile = firstValid(
    [flags.logFile, env.WINGETDASH_LOG_FILE, persisted.logFile],
    isNonEmptyString,
    getDefaultLogPath()
  );

  return {
    wingetPath: firstValid(
      [flags.wingetPath, env.WINGETDASH_WINGET_PATH, persisted.wingetPath],
      isNonEmptyString,
      DEFAULT_CONFIG.wingetPath
    ),
    logLevel: firstValid(
      [flags.logLevel, env.WINGETDASH_LOG_LEVEL, persisted.logLevel],
      isLevel,
      DEFAULT_CONFIG.logLevel
    ),
    logFile: expandHomePath(logFile),
    commandTimeoutMs: firstValid(
      [parseIntegerEnv(env.WINGETDASH_TIMEOUT_MS), persisted.commandTimeoutMs],
      isNonNegativeInteger,
      DEFAULT_CONFIG.commandTimeoutMs
    ),
    confirmOperations: firstValid(
      [parseBooleanEnv(env.WINGETDASH_CONFIRM), persisted.confirmOperations],
      isBoolean,
      DEFAULT_CONFIG.confirmOperations
    ),
    pageSize: firstValid([persisted.pageSize], isPositiveInteger, DEFAULT_CONFIG.pageSize),
    serializeMutations: firstValid([persisted.serializeMutations], isBoolean, DEFAULT_CONFIG.serializeMutations),
    defaultView: firstValid([persisted.defaultView], isViewName, DEFAULT_CONFIG.defaultView),
  };
}
