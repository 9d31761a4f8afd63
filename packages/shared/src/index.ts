/**
 * Shared utilities and types for wingetdash
 *
 * Common functionality used across multiple packages in the wingetdash monorepo.
 */

// Common types and interfaces
export * from './types.js'

// Package model helpers
export * from './models.js'

// Errors
export * from './errors.js'

// Logging
export * from './logger.js'

// Utility functions
export * from './utils.js'

// Constants
export * from './constants.js'
