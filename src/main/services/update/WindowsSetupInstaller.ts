import type { LogSink } from '@main/services/logging/Logger';
import { describeShellFailure, runCommand, type RunCommandFn } from '@main/services/update/command-runner';
import {
  installFailed,
  installOk,
  type PlatformInstaller,
  type PlatformInstallResult
} from '@main/services/update/PlatformInstaller';

const SETUP_TIMEOUT_MS = 10 * 60 * 1000;

interface WindowsSetupInstallerOptions {
  logger: LogSink;
  runCommand?: RunCommandFn;
  timeoutMs?: number;
}

export class WindowsSetupInstaller implements PlatformInstaller {
  readonly kind = 'windows-setup';
  readonly platform = 'windows';
  private readonly logger: LogSink;
  private readonly runCommandFn: RunCommandFn;
  private readonly timeoutMs: number;

  constructor(options: WindowsSetupInstallerOptions) {
    this.logger = options.logger;
    this.runCommandFn = options.runCommand ?? runCommand;
    this.timeoutMs = Number.isFinite(options.timeoutMs)
      ? Math.max(1000, Math.trunc(options.timeoutMs ?? SETUP_TIMEOUT_MS))
      : SETUP_TIMEOUT_MS;
  }

  canHandle(artifactPath: string): boolean {
    return artifactPath.trim().toLowerCase().endsWith('.exe');
  }

  async apply(artifactPath: string, installDir: string): Promise<PlatformInstallResult> {
    if (!this.canHandle(artifactPath)) {
      return installFailed('Artefato staged nao e um instalador .exe.');
    }

    const args = ['/VERYSILENT', '/SUPPRESSMSGBOXES', '/NORESTART', `/DIR=${installDir}`];
    this.logger.info('update.install.windows_setup_start', { artifactPath, installDir });
    const result = await this.runCommandFn(artifactPath, args, this.timeoutMs);

    if (result.exitCode !== 0 || result.timedOut) {
      const message = describeShellFailure('Instalador', result);
      this.logger.error('update.install.windows_setup_error', { artifactPath, reason: message });
      return installFailed(message);
    }

    return installOk();
  }
}
