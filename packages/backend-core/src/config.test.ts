import { describe, it, expect, vi, beforeEach } from 'vitest';
import { join } from 'path';
import { homedir } from 'os';

vi.mock('fs/promises', () => ({ readFile: vi.fn() }));

import { readFile } from 'fs/promises';
import { getUserConfigDir, loadConfig, sanitizeConfigFile } from './config.js';

const readFileMock = vi.mocked(readFile);

describe('getUserConfigDir', () => {
  it('uses XDG_CONFIG_HOME on Linux', () => {
    expect(getUserConfigDir('linux', { XDG_CONFIG_HOME: '/tmp/xdg' })).toBe(join('/tmp/xdg', 'wingetdash'));
  });

  it('falls back to ~/.config on Linux', () => {
    expect(getUserConfigDir('linux', {})).toBe(join(homedir(), '.config', 'wingetdash'));
  });

  it('uses APPDATA on Windows', () => {
    expect(getUserConfigDir('win32', { APPDATA: 'C:\\Users\\test\\AppData\\Roaming' })).toBe(
      join('C:\\Users\\test\\AppData\\Roaming', 'wingetdash')
    );
  });
});

describe('sanitizeConfigFile', () => {
  it('keeps well-typed keys and drops the rest', () => {
    expect(
      sanitizeConfigFile({
        wingetPath: 'C:\\tools\\winget.exe',
        pageSize: '20',
        confirmOperations: false,
        commandTimeoutMs: 5000,
        theme: 'dark'
      })
    ).toEqual({
      wingetPath: 'C:\\tools\\winget.exe',
      confirmOperations: false,
      commandTimeoutMs: 5000
    });
  });

  it('returns an empty config for non-objects', () => {
    expect(sanitizeConfigFile(null)).toEqual({});
    expect(sanitizeConfigFile([1, 2])).toEqual({});
  });
});

describe('loadConfig', () => {
  beforeEach(() => {
    readFileMock.mockReset();
  });

  it('parses the config file', async () => {
    readFileMock.mockResolvedValueOnce('{"logLevel":"debug","serializeMutations":false}');
    await expect(loadConfig('/etc/wingetdash.json')).resolves.toEqual({ logLevel: 'debug', serializeMutations: false });
    expect(readFileMock).toHaveBeenCalledWith('/etc/wingetdash.json', 'utf-8');
  });

  it('returns {} when the file is missing', async () => {
    readFileMock.mockRejectedValueOnce(Object.assign(new Error('ENOENT'), { code: 'ENOENT' }));
    await expect(loadConfig('/missing.json')).resolves.toEqual({});
  });

  it('returns {} when the file is not JSON', async () => {
    readFileMock.mockResolvedValueOnce('not json');
    await expect(loadConfig('/broken.json')).resolves.toEqual({});
  });
});
