import path from 'node:path';
import type { UpdateClientConfig, UpdateOutcome, UpdatePlatform } from '@shared/contracts';
import type { LogSink } from '@main/services/logging/Logger';
import { AppImageInstaller } from '@main/services/update/AppImageInstaller';
import { CompositePlatformInstaller } from '@main/services/update/CompositePlatformInstaller';
import { Downloader } from '@main/services/update/Downloader';
import { FeedClient } from '@main/services/update/FeedClient';
import { InstallOrchestrator } from '@main/services/update/InstallOrchestrator';
import { InstallSnapshot } from '@main/services/update/InstallSnapshot';
import { Ed25519SignatureScheme, IntegrityVerifier } from '@main/services/update/IntegrityVerifier';
import { MacDmgInstaller } from '@main/services/update/MacDmgInstaller';
import { ProcessRelauncher } from '@main/services/update/ProcessRelauncher';
import type { UpdatePolicySource } from '@main/services/update/UpdatePolicyStore';
import { VersionComparator } from '@main/services/update/VersionComparator';
import { WindowsSetupInstaller } from '@main/services/update/WindowsSetupInstaller';

export const EXIT_CODES = {
  OK: 0,
  RETRYABLE_FAILURE: 1,
  MANUAL_REMEDIATION: 2,
  INVALID_ARGUMENTS: 3
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export interface UpdateClientOptions {
  dataDir: string;
  installDir: string;
  currentVersion: string;
  platform: UpdatePlatform;
  config: UpdateClientConfig;
  logger: LogSink;
  policy: UpdatePolicySource;
  exitCurrentApp: () => void;
  userAgent?: string;
}

export function createUpdateClient(options: UpdateClientOptions): InstallOrchestrator {
  const { config, logger } = options;
  const comparator = new VersionComparator();
  const verifier = new IntegrityVerifier(
    config.signaturePublicKeyPem ? new Ed25519SignatureScheme(config.signaturePublicKeyPem) : null
  );
  const updatesDir = path.join(options.dataDir, 'updates');

  return new InstallOrchestrator({
    logger,
    comparator,
    feedClient: new FeedClient({
      logger,
      verifier,
      comparator,
      timeoutMs: config.requestTimeoutMs,
      userAgent: options.userAgent
    }),
    downloader: new Downloader({
      logger,
      verifier,
      comparator,
      timeoutMs: config.requestTimeoutMs,
      maxAttempts: config.download.maxAttempts,
      initialBackoffMs: config.download.initialBackoffMs,
      maxBackoffMs: config.download.maxBackoffMs,
      userAgent: options.userAgent
    }),
    installer: new CompositePlatformInstaller(options.platform, [
      new AppImageInstaller({ logger, mainEntry: config.layout.mainEntry }),
      new WindowsSetupInstaller({ logger }),
      new MacDmgInstaller({ logger })
    ]),
    rollback: new InstallSnapshot({ logger, rollbackDir: path.join(updatesDir, 'rollback') }),
    relauncher: new ProcessRelauncher({
      logger,
      exitCurrentApp: options.exitCurrentApp,
      delayMs: config.relaunchDelayMs
    }),
    policy: options.policy,
    feedBaseUrl: config.feedBaseUrl,
    platform: options.platform,
    currentVersion: options.currentVersion,
    installDir: options.installDir,
    stagingDir: path.join(updatesDir, 'staging'),
    layout: config.layout
  });
}

export function resolveUpdatePlatform(value: string | undefined, fallback: NodeJS.Platform = process.platform): UpdatePlatform | null {
  const normalized = (value ?? fallback).trim().toLowerCase();
  switch (normalized) {
    case 'macos':
    case 'darwin':
      return 'macos';
    case 'windows':
    case 'win32':
      return 'windows';
    case 'linux':
      return 'linux';
    default:
      return null;
  }
}

export function exitCodeForOutcome(outcome: UpdateOutcome): ExitCode {
  switch (outcome) {
    case 'up-to-date':
    case 'update-available':
    case 'ready-to-restart':
    case 'in-progress':
      return EXIT_CODES.OK;
    case 'retry-safe':
    case 'cancelled':
      return EXIT_CODES.RETRYABLE_FAILURE;
    case 'manual-remediation':
      return EXIT_CODES.MANUAL_REMEDIATION;
  }
}
