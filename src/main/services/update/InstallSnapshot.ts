import fs from 'node:fs';
import path from 'node:path';
import type { LogSink } from '@main/services/logging/Logger';
import { errorReason } from '@main/services/update/UpdateErrors';

export interface InstallRollback {
  capture(installDir: string): Promise<string>;
  restore(snapshotPath: string, installDir: string): Promise<void>;
  discard(snapshotPath: string): Promise<void>;
}

interface InstallSnapshotOptions {
  logger: LogSink;
  rollbackDir: string;
  now?: () => Date;
}

export class InstallSnapshot implements InstallRollback {
  private readonly logger: LogSink;
  private readonly rollbackDir: string;
  private readonly now: () => Date;

  constructor(options: InstallSnapshotOptions) {
    this.logger = options.logger;
    this.rollbackDir = options.rollbackDir;
    this.now = options.now ?? (() => new Date());
  }

  async capture(installDir: string): Promise<string> {
    await fs.promises.mkdir(this.rollbackDir, { recursive: true });
    const stamp = this.now().toISOString().replace(/[:.]/g, '-');
    const snapshotPath = await fs.promises.mkdtemp(path.join(this.rollbackDir, `install-${stamp}-`));

    await fs.promises.cp(installDir, snapshotPath, {
      recursive: true,
      verbatimSymlinks: true,
      preserveTimestamps: true
    });
    this.logger.info('update.install.snapshot_captured', { installDir, snapshotPath });
    return snapshotPath;
  }

  async restore(snapshotPath: string, installDir: string): Promise<void> {
    const stats = await fs.promises.stat(snapshotPath);
    if (!stats.isDirectory()) {
      throw new Error(`Snapshot de rollback invalido: ${snapshotPath}`);
    }

    // Installers may remove the install dir before failing.
    await fs.promises.mkdir(installDir, { recursive: true });
    const entries = await fs.promises.readdir(installDir);
    for (const entry of entries) {
      await fs.promises.rm(path.join(installDir, entry), { recursive: true, force: true });
    }

    await fs.promises.cp(snapshotPath, installDir, {
      recursive: true,
      verbatimSymlinks: true,
      preserveTimestamps: true
    });
    this.logger.info('update.install.snapshot_restored', { installDir, snapshotPath });
  }

  async discard(snapshotPath: string): Promise<void> {
    try {
      await fs.promises.rm(snapshotPath, { recursive: true, force: true });
    } catch (error) {
      this.logger.warn('update.install.snapshot_discard_error', { snapshotPath, reason: errorReason(error) });
    }
  }
}
