import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { LogSink } from '@main/services/logging/Logger';
import { describeShellFailure, runCommand, type RunCommandFn } from '@main/services/update/command-runner';
import { errorReason } from '@main/services/update/UpdateErrors';
import {
  installFailed,
  installOk,
  type PlatformInstaller,
  type PlatformInstallResult
} from '@main/services/update/PlatformInstaller';

const HDIUTIL_TIMEOUT_MS = 2 * 60 * 1000;
const COPY_TIMEOUT_MS = 10 * 60 * 1000;

interface MacDmgInstallerOptions {
  logger: LogSink;
  runCommand?: RunCommandFn;
  tempDir?: string;
}

/**
 * Mounts the disk image read-only, swaps the `.app` bundle found at its root
 * into the install directory and always detaches the image afterwards.
 */
export class MacDmgInstaller implements PlatformInstaller {
  readonly kind = 'macos-dmg';
  readonly platform = 'macos';
  private readonly logger: LogSink;
  private readonly runCommandFn: RunCommandFn;
  private readonly tempDir: string;

  constructor(options: MacDmgInstallerOptions) {
    this.logger = options.logger;
    this.runCommandFn = options.runCommand ?? runCommand;
    this.tempDir = options.tempDir ?? os.tmpdir();
  }

  canHandle(artifactPath: string): boolean {
    return artifactPath.trim().toLowerCase().endsWith('.dmg');
  }

  async apply(artifactPath: string, installDir: string): Promise<PlatformInstallResult> {
    if (!this.canHandle(artifactPath)) {
      return installFailed('Artefato staged nao e uma imagem .dmg.');
    }

    const mountPoint = await fs.promises.mkdtemp(path.join(this.tempDir, 'update-dmg-'));
    const attach = await this.runCommandFn(
      'hdiutil',
      ['attach', artifactPath, '-nobrowse', '-readonly', '-mountpoint', mountPoint],
      HDIUTIL_TIMEOUT_MS
    );
    if (attach.exitCode !== 0 || attach.timedOut) {
      await fs.promises.rm(mountPoint, { recursive: true, force: true });
      return installFailed(describeShellFailure('hdiutil attach', attach));
    }

    try {
      return await this.replaceBundle(mountPoint, installDir);
    } finally {
      const detach = await this.runCommandFn('hdiutil', ['detach', mountPoint, '-force'], HDIUTIL_TIMEOUT_MS);
      if (detach.exitCode !== 0) {
        this.logger.warn('update.install.dmg_detach_error', {
          mountPoint,
          reason: describeShellFailure('hdiutil detach', detach)
        });
      }
      await fs.promises.rm(mountPoint, { recursive: true, force: true });
    }
  }

  private async replaceBundle(mountPoint: string, installDir: string): Promise<PlatformInstallResult> {
    let bundleName: string | undefined;
    try {
      const entries = await fs.promises.readdir(mountPoint);
      bundleName = entries.find((entry) => entry.toLowerCase().endsWith('.app'));
    } catch (error) {
      return installFailed(`Falha ao ler imagem montada: ${errorReason(error)}`);
    }
    if (!bundleName) {
      return installFailed('Imagem .dmg nao contem bundle .app.');
    }

    const targetPath = path.join(installDir, bundleName);
    const tempPath = `${targetPath}.update-tmp`;
    await fs.promises.rm(tempPath, { recursive: true, force: true });

    const copy = await this.runCommandFn('ditto', [path.join(mountPoint, bundleName), tempPath], COPY_TIMEOUT_MS);
    if (copy.exitCode !== 0 || copy.timedOut) {
      await fs.promises.rm(tempPath, { recursive: true, force: true });
      return installFailed(describeShellFailure('ditto', copy));
    }

    try {
      await fs.promises.rm(targetPath, { recursive: true, force: true });
      await fs.promises.rename(tempPath, targetPath);
    } catch (error) {
      return installFailed(`Falha ao substituir ${bundleName}: ${errorReason(error)}`);
    }

    this.logger.info('update.install.dmg_bundle_replaced', { bundleName, targetPath });
    return installOk();
  }
}
