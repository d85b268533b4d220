import fs from 'node:fs';
import path from 'node:path';
import type { LogSink } from '@main/services/logging/Logger';
import { errorReason } from '@main/services/update/UpdateErrors';
import {
  installFailed,
  installOk,
  type PlatformInstaller,
  type PlatformInstallResult
} from '@main/services/update/PlatformInstaller';

export type AppImageFileOps = Pick<typeof fs.promises, 'copyFile' | 'chmod' | 'rename' | 'rm'>;

interface AppImageInstallerOptions {
  logger: LogSink;
  mainEntry: string;
  fileOps?: AppImageFileOps;
}

export class AppImageInstaller implements PlatformInstaller {
  readonly kind = 'appimage';
  readonly platform = 'linux';
  private readonly logger: LogSink;
  private readonly mainEntry: string;
  private readonly fileOps: AppImageFileOps;

  constructor(options: AppImageInstallerOptions) {
    this.logger = options.logger;
    this.mainEntry = options.mainEntry;
    this.fileOps = options.fileOps ?? fs.promises;
  }

  canHandle(artifactPath: string): boolean {
    return artifactPath.trim().toLowerCase().endsWith('.appimage');
  }

  async apply(artifactPath: string, installDir: string): Promise<PlatformInstallResult> {
    if (!this.canHandle(artifactPath)) {
      return installFailed('Artefato staged nao e um AppImage suportado.');
    }

    const targetPath = path.resolve(installDir, this.mainEntry);
    const tempPath = `${targetPath}.update-tmp`;

    try {
      await this.fileOps.copyFile(artifactPath, tempPath);
      await this.fileOps.chmod(tempPath, 0o755);
      await this.fileOps.rename(tempPath, targetPath);
    } catch (error) {
      await this.fileOps.rm(tempPath, { force: true });
      this.logger.error('update.install.appimage_error', {
        artifactPath,
        targetPath,
        reason: errorReason(error)
      });
      return installFailed(`Falha ao substituir AppImage: ${errorReason(error)}`);
    }

    this.logger.info('update.install.appimage_replaced', { artifactPath, targetPath });
    return installOk();
  }
}
