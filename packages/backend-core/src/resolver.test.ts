import { describe, it, expect } from 'vitest';
import { resolveRuntimeConfig } from './resolver.js';
import { getDefaultLogPath } from './config.js';

describe('resolveRuntimeConfig', () => {
  it('returns defaults when nothing is configured', () => {
    expect(resolveRuntimeConfig({ env: {} })).toEqual({
      wingetPath: 'winget',
      logLevel: 'info',
      logFile: getDefaultLogPath(),
      commandTimeoutMs: 600000,
      confirmOperations: true,
      pageSize: 20,
      serializeMutations: true,
      defaultView: 'installed'
    });
  });

  it('prefers flags over env over the config file', () => {
    const config = resolveRuntimeConfig({
      persisted: { wingetPath: 'file-winget', logLevel: 'warn' },
      env: { WINGETDASH_WINGET_PATH: 'env-winget', WINGETDASH_LOG_LEVEL: 'error' },
      flags: { logLevel: 'debug' }
    });
    expect(config.wingetPath).toBe('env-winget');
    expect(config.logLevel).toBe('debug');
  });

  it('skips invalid values field by field', () => {
    const config = resolveRuntimeConfig({
      persisted: { logLevel: 'verbose', pageSize: -3, defaultView: 'upgrades', commandTimeoutMs: 1000 },
      env: { WINGETDASH_TIMEOUT_MS: 'soon', WINGETDASH_CONFIRM: 'no' }
    });
    expect(config.logLevel).toBe('info');
    expect(config.pageSize).toBe(20);
    expect(config.defaultView).toBe('upgrades');
    expect(config.commandTimeoutMs).toBe(1000);
    expect(config.confirmOperations).toBe(false);
  });

  it('accepts a zero timeout to disable it', () => {
    expect(resolveRuntimeConfig({ env: { WINGETDASH_TIMEOUT_MS: '0' } }).commandTimeoutMs).toBe(0);
  });
});
