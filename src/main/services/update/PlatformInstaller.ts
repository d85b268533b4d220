import type { UpdatePlatform } from '@shared/contracts';

export interface PlatformInstallResult {
  ok: boolean;
  error: string | null;
}

export interface PlatformInstaller {
  readonly kind: 'appimage' | 'windows-setup' | 'macos-dmg';
  readonly platform: UpdatePlatform;
  canHandle(artifactPath: string): boolean;
  apply(artifactPath: string, installDir: string): Promise<PlatformInstallResult>;
}

export type ArtifactInstaller = Pick<PlatformInstaller, 'canHandle' | 'apply'>;

export function installOk(): PlatformInstallResult {
  return { ok: true, error: null };
}

export function installFailed(error: string): PlatformInstallResult {
  return { ok: false, error };
}
