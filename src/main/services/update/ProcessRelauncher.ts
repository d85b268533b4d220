import path from 'node:path';
import { spawn } from 'node:child_process';
import type { VerificationResult } from '@shared/contracts';
import type { LogSink } from '@main/services/logging/Logger';
import { errorReason } from '@main/services/update/UpdateErrors';

export interface AppRelauncher {
  relaunch(entryPath: string): Promise<VerificationResult>;
}

interface ProcessRelauncherOptions {
  logger: LogSink;
  exitCurrentApp: () => void;
  schedule?: (fn: () => void, delayMs: number) => void;
  delayMs?: number;
  args?: string[];
  spawnFn?: typeof spawn;
}

export class ProcessRelauncher implements AppRelauncher {
  private readonly logger: LogSink;
  private readonly exitCurrentApp: () => void;
  private readonly schedule: (fn: () => void, delayMs: number) => void;
  private readonly delayMs: number;
  private readonly args: string[];
  private readonly spawnFn: typeof spawn;

  constructor(options: ProcessRelauncherOptions) {
    this.logger = options.logger;
    this.exitCurrentApp = options.exitCurrentApp;
    this.schedule = options.schedule ?? ((fn, delayMs) => void setTimeout(fn, delayMs));
    this.delayMs = Number.isFinite(options.delayMs) ? Math.max(0, Math.trunc(options.delayMs ?? 120)) : 120;
    this.args = options.args ?? [];
    this.spawnFn = options.spawnFn ?? spawn;
  }

  relaunch(entryPath: string): Promise<VerificationResult> {
    this.logger.info('update.relaunch.scheduled', { entryPath, delayMs: this.delayMs });

    return new Promise((resolve) => {
      this.schedule(() => {
        const fail = (error: unknown) => {
          const reason = errorReason(error);
          this.logger.error('update.relaunch.spawn_error', { entryPath, reason });
          resolve({ ok: false, error: `Falha ao relancar ${entryPath}: ${reason}` });
        };

        try {
          const child = this.spawnFn(entryPath, this.args, {
            cwd: path.dirname(entryPath),
            detached: true,
            stdio: 'ignore',
            env: {
              ...process.env
            }
          });
          child.unref();
          observeChildSpawn(
            child,
            () => {
              this.logger.info('update.relaunch.spawned', { entryPath, pid: child.pid ?? null });
              resolve({ ok: true, error: null });
              this.exitCurrentApp();
            },
            fail
          );
        } catch (error) {
          fail(error);
        }
      }, this.delayMs);
    });
  }
}

function observeChildSpawn(
  child: {
    once?: (event: 'spawn' | 'error', listener: (...args: unknown[]) => void) => unknown;
  },
  onSpawn: () => void,
  onError: (error: unknown) => void
): void {
  if (typeof child.once !== 'function') {
    onSpawn();
    return;
  }

  let settled = false;
  child.once('error', (error) => {
    if (settled) {
      return;
    }
    settled = true;
    onError(error);
  });
  child.once('spawn', () => {
    if (settled) {
      return;
    }
    settled = true;
    onSpawn();
  });
}
