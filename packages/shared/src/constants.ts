/**
 * Shared constants
 */

export const APP_NAME = 'wingetdash'
export const APP_VERSION = '0.1.0'

export const DEFAULT_CONFIG = {
  wingetPath: 'winget',
  logLevel: 'info',
  commandTimeoutMs: 10 * 60 * 1000,
  confirmOperations: true,
  pageSize: 20,
  serializeMutations: true,
  defaultView: 'installed'
} as const

export const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'] as const

export const TERMINAL_COLORS = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  inverse: '\x1b[7m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m'
} as const
