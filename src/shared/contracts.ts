export type UpdateChannel = 'stable' | 'test';
export type UpdatePlatform = 'macos' | 'windows' | 'linux';

export interface VersionIdentifier {
  major: number;
  minor: number;
  patch: number;
  prerelease: string | null;
  buildMetadata: string | null;
}

export interface ReleaseCandidate {
  version: VersionIdentifier;
  displayVersion: string;
  downloadUrl: string;
  artifactSizeBytes: number;
  checksumSha256: string | null;
  signature: string | null;
  releaseNotesUrl: string | null;
  releaseNotes: string | null;
  publishedAt: string | null;
  channel: UpdateChannel;
}

export interface VerificationResult {
  ok: boolean;
  error: string | null;
}

export type UpdateErrorKind =
  | 'malformed_version'
  | 'feed_parse'
  | 'insecure_url'
  | 'integrity'
  | 'download'
  | 'install'
  | 'fatal';

export type UpdateSessionState =
  | 'idle'
  | 'checking'
  | 'update-available'
  | 'downloading'
  | 'verified'
  | 'installing'
  | 'restart-pending'
  | 'failed'
  | 'cancelled';

export interface UpdateSessionError {
  kind: UpdateErrorKind;
  message: string;
  retryable: boolean;
}

export interface UpdateSessionSnapshot {
  state: UpdateSessionState;
  candidate: ReleaseCandidate | null;
  stagedArtifactPath: string | null;
  error: UpdateSessionError | null;
  progressFraction: number;
  checkedAt: string | null;
  upToDate: boolean;
}

export type UpdateOutcome =
  | 'up-to-date'
  | 'update-available'
  | 'in-progress'
  | 'ready-to-restart'
  | 'retry-safe'
  | 'manual-remediation'
  | 'cancelled';

export type UpdateSessionEvent =
  | { type: 'state'; session: UpdateSessionSnapshot }
  | { type: 'progress'; fraction: number };

export interface UpdateInstallResult {
  ok: boolean;
  message: string;
  session: UpdateSessionSnapshot;
}

export type UpdateCheckFrequency = 'on-startup' | 'daily' | 'weekly' | 'monthly' | 'never';
export type UpdateCheckResultKind = 'update-available' | 'no-update' | 'error';

export interface UpdatePolicy {
  channel: UpdateChannel;
  checkFrequency: UpdateCheckFrequency;
  ignoredVersions: string[];
  lastCheckAt: string | null;
  lastCheckResult: UpdateCheckResultKind | null;
  updatedAt: string;
}

export interface UpdatePolicyPatch {
  channel?: UpdateChannel;
  checkFrequency?: UpdateCheckFrequency;
}

export interface InstallLayout {
  mainEntry: string;
  requiredComponents: string[];
}

export interface UpdateClientConfig {
  feedBaseUrl: string;
  requestTimeoutMs: number;
  download: {
    maxAttempts: number;
    initialBackoffMs: number;
    maxBackoffMs: number;
  };
  relaunchDelayMs: number;
  layout: InstallLayout;
  signaturePublicKeyPem: string | null;
}
