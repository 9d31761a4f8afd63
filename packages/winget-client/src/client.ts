import { spawn } from 'node:child_process';
import { EventEmitter } from 'node:events';
import {
  BackendError,
  DEFAULT_CONFIG,
  type Logger,
  type Package,
  type PackageDetails,
  type SourceFilter
} from '@wingetdash/shared';
import type { PackageBackend } from './backend.js';
import { cleanOutput, parsePackageTable, parseShowOutput } from './parser.js';

export interface WingetClientConfig {
  wingetPath?: string;
  /** Kill winget after this many milliseconds; 0 disables the timeout */
  timeoutMs?: number;
  env?: Record<string, string>;
  logger?: Logger;
}

export interface CommandEvent {
  args: string[];
}

export interface CommandFinishedEvent {
  args: string[];
  exitCode: number | null;
  durationMs: number;
}

interface CommandOutput {
  stdout: string;
  stderr: string;
  exitCode: number;
}

const AGREEMENTS = ['--accept-source-agreements'];
const PACKAGE_AGREEMENTS = ['--accept-package-agreements'];
const NON_INTERACTIVE = ['--disable-interactivity'];

/**
 * Talks to the winget CLI. Emits `command` before each run and
 * `command-finished` once the child process has exited.
 */
export class WingetClient extends EventEmitter implements PackageBackend {
  private readonly wingetPath: string;
  private readonly timeoutMs: number;
  private readonly env: Record<string, string>;
  private readonly logger?: Logger;

  constructor(config: WingetClientConfig = {}) {
    super();
    this.wingetPath = config.wingetPath || DEFAULT_CONFIG.wingetPath;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_CONFIG.commandTimeoutMs;
    this.env = config.env || {};
    this.logger = config.logger;
  }

  async listInstalled(): Promise<Package[]> {
    const output = await this.runListing(['list', ...AGREEMENTS, ...NON_INTERACTIVE]);
    return parsePackageTable(output);
  }

  async search(query: string, filter: SourceFilter): Promise<Package[]> {
    const args = ['search', query, ...AGREEMENTS, ...NON_INTERACTIVE];
    if (filter !== 'all') {
      args.push('--source', filter);
    }
    const output = await this.runListing(args);
    return parsePackageTable(output, filter === 'all' ? undefined : filter);
  }

  async listUpgrades(): Promise<Package[]> {
    const output = await this.runListing(['upgrade', ...AGREEMENTS, ...NON_INTERACTIVE]);
    return parsePackageTable(output);
  }

  async fetchDetails(id: string): Promise<PackageDetails> {
    const output = await this.runListing(['show', '--id', id, '--exact', ...AGREEMENTS, ...NON_INTERACTIVE]);
    const details = parseShowOutput(output);
    if (!details.id && /No package found/i.test(output)) {
      throw new BackendError('exit', `No package found matching ${id}`);
    }
    return details;
  }

  async install(id: string): Promise<void> {
    await this.runMutation(['install', '--id', id, '--exact', ...AGREEMENTS, ...PACKAGE_AGREEMENTS, ...NON_INTERACTIVE]);
  }

  async uninstall(id: string): Promise<void> {
    await this.runMutation(['uninstall', '--id', id, '--exact', ...AGREEMENTS, ...NON_INTERACTIVE]);
  }

  async upgrade(id: string): Promise<void> {
    await this.runMutation(['upgrade', '--id', id, '--exact', ...AGREEMENTS, ...PACKAGE_AGREEMENTS, ...NON_INTERACTIVE]);
  }

  /**
   * winget exits non-zero when a listing has no results but still prints
   * something, so output wins over the exit code here.
   */
  private async runListing(args: string[]): Promise<string> {
    const result = await this.execute(args);
    if (result.exitCode !== 0 && result.stdout.trim() === '') {
      throw new BackendError('exit', `winget failed: ${lastLines(result.stderr) || `exit code ${result.exitCode}`}`, {
        exitCode: result.exitCode,
      });
    }
    return result.stdout;
  }

  private async runMutation(args: string[]): Promise<void> {
    const result = await this.execute(args);
    if (result.exitCode !== 0) {
      const detail = lastLines(result.stderr) || lastLines(result.stdout) || `exit code ${result.exitCode}`;
      throw new BackendError('exit', `winget ${args[0]} failed: ${detail}`, { exitCode: result.exitCode });
    }
  }

  private execute(args: string[]): Promise<CommandOutput> {
    const startedAt = Date.now();
    const { wingetPath, timeoutMs, logger } = this;
    logger?.debug(`Running ${wingetPath} ${args.join(' ')}`);
    this.emit('command', { args } satisfies CommandEvent);

    return new Promise((resolve, reject) => {
      const child = spawn(wingetPath, args, {
        env: { ...process.env, ...this.env },
        stdio: ['ignore', 'pipe', 'pipe'],
        windowsHide: true,
      });

      let stdout = '';
      let stderr = '';
      let settled = false;
      let timer: NodeJS.Timeout | undefined;

      const finish = (exitCode: number | null) => {
        if (timer) clearTimeout(timer);
        const durationMs = Date.now() - startedAt;
        this.emit('command-finished', { args, exitCode, durationMs } satisfies CommandFinishedEvent);
        logger?.debug(`winget ${args[0]} exited with ${exitCode} after ${durationMs}ms`);
      };

      if (timeoutMs > 0) {
        timer = setTimeout(() => {
          if (settled) return;
          settled = true;
          child.kill();
          finish(null);
          reject(new BackendError('timeout', `winget ${args[0]} timed out after ${Math.round(timeoutMs / 1000)}s`));
        }, timeoutMs);
      }

      child.stdout?.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('close', (exitCode: number | null) => {
        if (settled) return;
        settled = true;
        finish(exitCode);
        resolve({ stdout: cleanOutput(stdout), stderr: cleanOutput(stderr), exitCode: exitCode ?? -1 });
      });

      child.on('error', (error: NodeJS.ErrnoException) => {
        if (settled) return;
        settled = true;
        finish(null);
        const message =
          error.code === 'ENOENT' ? 'Failed to run winget. Is it installed?' : `Failed to run winget: ${error.message}`;
        logger?.warn(message);
        reject(new BackendError('spawn', message, { cause: error }));
      });
    });
  }
}

function lastLines(text: string, count = 2): string {
  return text
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line !== '')
    .slice(-count)
    .join(' ');
}
