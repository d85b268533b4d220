import type { UpdatePlatform } from '@shared/contracts';
import {
  installFailed,
  type ArtifactInstaller,
  type PlatformInstaller,
  type PlatformInstallResult
} from '@main/services/update/PlatformInstaller';

export class CompositePlatformInstaller implements ArtifactInstaller {
  constructor(
    private readonly platform: UpdatePlatform,
    private readonly installers: PlatformInstaller[]
  ) {}

  canHandle(artifactPath: string): boolean {
    return this.pick(artifactPath) !== null;
  }

  async apply(artifactPath: string, installDir: string): Promise<PlatformInstallResult> {
    const installer = this.pick(artifactPath);
    if (!installer) {
      return installFailed(`Nenhum instalador compativel com ${artifactPath} em ${this.platform}.`);
    }

    return installer.apply(artifactPath, installDir);
  }

  private pick(artifactPath: string): PlatformInstaller | null {
    return (
      this.installers.find(
        (installer) => installer.platform === this.platform && installer.canHandle(artifactPath)
      ) ?? null
    );
  }
}
