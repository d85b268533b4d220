import fs from 'node:fs';
import path from 'node:path';
import type {
  InstallLayout,
  ReleaseCandidate,
  UpdateInstallResult,
  UpdateOutcome,
  UpdatePlatform,
  UpdateSessionError,
  UpdateSessionEvent,
  UpdateSessionSnapshot,
  UpdateSessionState,
  VerificationResult,
  VersionIdentifier
} from '@shared/contracts';
import type { LogSink } from '@main/services/logging/Logger';
import { throwIfCancelled } from '@main/services/update/abort-signals';
import type { Downloader } from '@main/services/update/Downloader';
import type { FeedClient } from '@main/services/update/FeedClient';
import type { InstallRollback } from '@main/services/update/InstallSnapshot';
import { verifyInstallLayout } from '@main/services/update/install-layout';
import type { ArtifactInstaller } from '@main/services/update/PlatformInstaller';
import type { AppRelauncher } from '@main/services/update/ProcessRelauncher';
import { isSameOrInside } from '@main/services/update/staging-paths';
import {
  FatalUpdateError,
  InstallError,
  OperationCancelledError,
  errorReason,
  toSessionError
} from '@main/services/update/UpdateErrors';
import { isCheckDue, type UpdatePolicySource } from '@main/services/update/UpdatePolicyStore';
import { VersionComparator } from '@main/services/update/VersionComparator';

export type UpdateSessionListener = (event: UpdateSessionEvent) => void;

const TRANSITIONS: Record<UpdateSessionState, readonly UpdateSessionState[]> = {
  idle: ['checking'],
  checking: ['idle', 'update-available', 'failed', 'cancelled'],
  'update-available': ['idle', 'downloading', 'failed'],
  downloading: ['verified', 'failed', 'cancelled'],
  verified: ['installing', 'failed'],
  installing: ['restart-pending', 'failed'],
  'restart-pending': ['idle', 'failed'],
  failed: ['checking'],
  cancelled: ['checking']
};

const BUSY_STATES: ReadonlySet<UpdateSessionState> = new Set([
  'update-available',
  'downloading',
  'verified',
  'installing',
  'restart-pending'
]);

interface InstallOrchestratorOptions {
  logger: LogSink;
  feedClient: Pick<FeedClient, 'resolveFeedUrl' | 'fetchCandidates' | 'selectBest'>;
  downloader: Pick<Downloader, 'stage'>;
  installer: ArtifactInstaller;
  rollback: InstallRollback;
  relauncher: AppRelauncher;
  policy: UpdatePolicySource;
  feedBaseUrl: string;
  platform: UpdatePlatform;
  currentVersion: string;
  installDir: string;
  stagingDir: string;
  layout: InstallLayout;
  comparator?: VersionComparator;
  verifyLayout?: (installDir: string, layout: InstallLayout, platform: UpdatePlatform) => Promise<VerificationResult>;
  now?: () => Date;
}

export function isLegalTransition(from: UpdateSessionState, to: UpdateSessionState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function describeOutcome(session: UpdateSessionSnapshot): UpdateOutcome {
  switch (session.state) {
    case 'idle':
      return 'up-to-date';
    case 'update-available':
      return 'update-available';
    case 'restart-pending':
      return 'ready-to-restart';
    case 'cancelled':
      return 'cancelled';
    case 'failed':
      return session.error?.retryable === false ? 'manual-remediation' : 'retry-safe';
    case 'checking':
    case 'downloading':
    case 'verified':
    case 'installing':
      return 'in-progress';
  }
}

/**
 * Owns the single update session of the process. Every state change goes
 * through `transition`, which rejects anything outside the fixed table, so
 * overlapping cycles cannot happen.
 */
export class InstallOrchestrator {
  private readonly logger: LogSink;
  private readonly feedClient: InstallOrchestratorOptions['feedClient'];
  private readonly downloader: InstallOrchestratorOptions['downloader'];
  private readonly installer: ArtifactInstaller;
  private readonly rollback: InstallRollback;
  private readonly relauncher: AppRelauncher;
  private readonly policy: UpdatePolicySource;
  private readonly comparator: VersionComparator;
  private readonly verifyLayout: NonNullable<InstallOrchestratorOptions['verifyLayout']>;
  private readonly now: () => Date;
  private readonly feedBaseUrl: string;
  private readonly platform: UpdatePlatform;
  private readonly currentVersion: VersionIdentifier;
  private readonly installDir: string;
  private readonly stagingDir: string;
  private readonly layout: InstallLayout;
  private readonly listeners = new Set<UpdateSessionListener>();
  private session: UpdateSessionSnapshot = createIdleSession(null, false);
  private activeController: AbortController | null = null;
  private inFlightCheck: Promise<UpdateSessionSnapshot> | null = null;

  constructor(options: InstallOrchestratorOptions) {
    this.logger = options.logger;
    this.feedClient = options.feedClient;
    this.downloader = options.downloader;
    this.installer = options.installer;
    this.rollback = options.rollback;
    this.relauncher = options.relauncher;
    this.policy = options.policy;
    this.comparator = options.comparator ?? new VersionComparator();
    this.verifyLayout = options.verifyLayout ?? verifyInstallLayout;
    this.now = options.now ?? (() => new Date());
    this.feedBaseUrl = options.feedBaseUrl;
    this.platform = options.platform;
    this.currentVersion = this.comparator.parse(options.currentVersion);
    this.installDir = path.resolve(options.installDir);
    this.stagingDir = path.resolve(options.stagingDir);
    this.layout = options.layout;

    if (isSameOrInside(this.stagingDir, this.installDir) || isSameOrInside(this.installDir, this.stagingDir)) {
      throw new Error(
        `Diretorio de staging (${this.stagingDir}) nao pode coincidir com o diretorio de instalacao (${this.installDir}).`
      );
    }
  }

  getSessionState(): UpdateSessionSnapshot {
    return this.session;
  }

  subscribe(listener: UpdateSessionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  checkNow(): Promise<UpdateSessionSnapshot> {
    if (this.session.state === 'checking' && this.inFlightCheck) {
      this.logger.debug('update.check.reused_in_flight', {});
      return this.inFlightCheck;
    }

    if (BUSY_STATES.has(this.session.state)) {
      this.logger.warn('update.check.rejected_busy', { state: this.session.state });
      return Promise.resolve(this.session);
    }

    const check = this.runCheck().finally(() => {
      this.inFlightCheck = null;
    });
    this.inFlightCheck = check;
    return check;
  }

  async checkIfDue(now: Date = this.now()): Promise<UpdateSessionSnapshot> {
    const policy = this.policy.get();
    if (!isCheckDue(policy, now)) {
      this.logger.debug('update.check.not_due', {
        checkFrequency: policy.checkFrequency,
        lastCheckAt: policy.lastCheckAt
      });
      return this.session;
    }

    return this.checkNow();
  }

  dismiss(options: { ignoreVersion?: boolean } = {}): UpdateSessionSnapshot {
    const candidate = this.session.candidate;
    if (this.session.state !== 'update-available' || !candidate) {
      this.logger.warn('update.dismiss.rejected_state', { state: this.session.state });
      return this.session;
    }

    const version = this.comparator.format(candidate.version);
    if (options.ignoreVersion && this.policy.ignoreVersion) {
      this.policy.ignoreVersion(version);
    }

    this.logger.info('update.dismiss', { version, ignored: options.ignoreVersion === true });
    return this.transition('idle', {
      candidate: null,
      stagedArtifactPath: null,
      error: null,
      progressFraction: 0,
      upToDate: false
    });
  }

  async downloadUpdate(): Promise<UpdateSessionSnapshot> {
    const candidate = this.session.candidate;
    if (this.session.state !== 'update-available' || !candidate) {
      this.logger.warn('update.download.rejected_state', { state: this.session.state });
      return this.session;
    }

    const controller = new AbortController();
    this.activeController = controller;
    this.transition('downloading', { progressFraction: 0, error: null });

    try {
      const stagedArtifactPath = await this.downloader.stage(candidate, this.stagingDir, {
        signal: controller.signal,
        onProgress: (fraction) => this.reportProgress(fraction)
      });
      throwIfCancelled(controller.signal);

      this.logger.info('update.download.verified', {
        version: this.comparator.format(candidate.version),
        stagedArtifactPath
      });
      return this.transition('verified', { stagedArtifactPath, progressFraction: 1 });
    } catch (error) {
      if (isCancellation(error, controller.signal)) {
        await this.clearStaging();
        this.logger.info('update.download.cancelled', { version: this.comparator.format(candidate.version) });
        return this.transition('cancelled', { stagedArtifactPath: null, progressFraction: 0 });
      }

      this.logger.error('update.download.error', {
        version: this.comparator.format(candidate.version),
        reason: errorReason(error)
      });
      return this.fail(toSessionError(error, 'download'));
    } finally {
      this.activeController = null;
    }
  }

  async installUpdate(): Promise<UpdateInstallResult> {
    const { candidate, stagedArtifactPath } = this.session;
    if (this.session.state !== 'verified' || !candidate || !stagedArtifactPath) {
      this.logger.warn('update.install.rejected_state', { state: this.session.state });
      return {
        ok: false,
        message: 'Nenhum update verificado para instalar.',
        session: this.session
      };
    }

    const version = this.comparator.format(candidate.version);
    this.transition('installing', {});
    this.logger.info('update.install.start', { version, stagedArtifactPath, installDir: this.installDir });

    if (!this.installer.canHandle(stagedArtifactPath)) {
      return this.installFailure(
        new InstallError(`Nenhum instalador compativel com ${path.basename(stagedArtifactPath)}.`)
      );
    }

    let snapshotPath: string;
    try {
      snapshotPath = await this.rollback.capture(this.installDir);
    } catch (error) {
      return this.installFailure(
        new InstallError(`Nao foi possivel criar snapshot para rollback: ${errorReason(error)}`)
      );
    }

    const applied = await this.applyArtifact(stagedArtifactPath);
    if (!applied.ok) {
      const reason = applied.error ?? 'instalador reportou falha';
      const restored = await this.restoreSnapshot(snapshotPath, reason);
      if (!restored) {
        return this.installFailure(
          new FatalUpdateError(
            `Instalacao falhou (${reason}) e o rollback nao foi possivel. Reinstale manualmente; snapshot em ${snapshotPath}.`
          )
        );
      }

      await this.rollback.discard(snapshotPath);
      return this.installFailure(new InstallError(`Instalacao falhou: ${reason}. Instalacao anterior restaurada.`));
    }

    const layout = await this.verifyLayout(this.installDir, this.layout, this.platform);
    if (!layout.ok) {
      const reason = layout.error ?? 'estrutura incompleta';
      const restored = await this.restoreSnapshot(snapshotPath, reason);
      const hint = restored
        ? 'Instalacao anterior restaurada, mas reinstale manualmente.'
        : `Reinstale manualmente; snapshot em ${snapshotPath}.`;
      return this.installFailure(new FatalUpdateError(`Verificacao pos-instalacao falhou: ${reason}. ${hint}`));
    }

    await this.rollback.discard(snapshotPath);
    this.transition('restart-pending', {});
    this.logger.info('update.install.finish', { version });
    await this.clearStaging();

    const mainEntry = path.resolve(this.installDir, this.layout.mainEntry);
    const relaunch = await this.relauncher.relaunch(mainEntry);
    if (!relaunch.ok) {
      return this.installFailure(
        new FatalUpdateError(
          `Update ${version} instalado, mas o relancamento falhou: ${relaunch.error ?? 'erro desconhecido'}. Abra o aplicativo manualmente.`
        )
      );
    }

    const session = this.transition('idle', createIdleSession(this.session.checkedAt, false));
    return {
      ok: true,
      message: `Update ${version} instalado; aplicativo relancado.`,
      session
    };
  }

  cancel(): boolean {
    const state = this.session.state;
    if ((state !== 'checking' && state !== 'downloading') || !this.activeController) {
      this.logger.info('update.cancel.ignored', { state });
      return false;
    }

    this.logger.info('update.cancel.requested', { state });
    this.activeController.abort(new OperationCancelledError());
    return true;
  }

  private async runCheck(): Promise<UpdateSessionSnapshot> {
    const controller = new AbortController();
    this.activeController = controller;
    this.transition('checking', createIdleSession(this.session.checkedAt, false));
    let feedUrl: string | null = null;

    try {
      const policy = this.policy.get();
      feedUrl = this.feedClient.resolveFeedUrl(this.feedBaseUrl, this.platform, policy.channel);
      this.logger.info('update.check.start', {
        feedUrl,
        channel: policy.channel,
        currentVersion: this.comparator.format(this.currentVersion)
      });

      await this.clearStaging();
      const candidates = await this.feedClient.fetchCandidates(feedUrl, this.platform, {
        signal: controller.signal
      });
      throwIfCancelled(controller.signal);

      const best = this.feedClient.selectBest(candidates, this.currentVersion, policy.channel);
      throwIfCancelled(controller.signal);
      const checkedAt = this.now().toISOString();

      if (!best || this.isIgnored(best, policy.ignoredVersions)) {
        if (best) {
          this.logger.info('update.check.ignored_version', { version: this.comparator.format(best.version) });
        }
        this.policy.recordCheck?.('no-update', this.now());
        this.logger.info('update.check.finish', { outcome: 'up-to-date' });
        return this.transition('idle', { checkedAt, upToDate: true });
      }

      this.policy.recordCheck?.('update-available', this.now());
      this.logger.info('update.check.finish', {
        outcome: 'available',
        version: this.comparator.format(best.version)
      });
      return this.transition('update-available', { candidate: freezeCandidate(best), checkedAt });
    } catch (error) {
      if (isCancellation(error, controller.signal)) {
        this.logger.info('update.check.cancelled', { feedUrl });
        return this.transition('cancelled', {});
      }

      this.logger.error('update.check.error', { feedUrl, reason: errorReason(error) });
      this.policy.recordCheck?.('error', this.now());
      return this.fail(toSessionError(error, 'download'), { checkedAt: this.now().toISOString() });
    } finally {
      this.activeController = null;
    }
  }

  private async applyArtifact(artifactPath: string): Promise<VerificationResult> {
    try {
      return await this.installer.apply(artifactPath, this.installDir);
    } catch (error) {
      return { ok: false, error: errorReason(error) };
    }
  }

  private async restoreSnapshot(snapshotPath: string, reason: string): Promise<boolean> {
    this.logger.warn('update.install.rollback', { snapshotPath, installDir: this.installDir, reason });
    try {
      await this.rollback.restore(snapshotPath, this.installDir);
      return true;
    } catch (error) {
      this.logger.error('update.install.rollback_error', { snapshotPath, reason: errorReason(error) });
      return false;
    }
  }

  private async installFailure(error: InstallError | FatalUpdateError): Promise<UpdateInstallResult> {
    this.logger.error('update.install.error', { kind: error.kind, reason: error.message });
    const session = await this.fail(error.toSessionError());
    return { ok: false, message: error.message, session };
  }

  private async fail(
    error: UpdateSessionError,
    patch: Partial<UpdateSessionSnapshot> = {}
  ): Promise<UpdateSessionSnapshot> {
    await this.clearStaging();
    return this.transition('failed', { ...patch, error, stagedArtifactPath: null });
  }

  private isIgnored(candidate: ReleaseCandidate, ignoredVersions: string[]): boolean {
    return ignoredVersions.some((text) => {
      const ignored = this.comparator.tryParse(text);
      return ignored !== null && this.comparator.compare(ignored, candidate.version) === 0;
    });
  }

  private reportProgress(fraction: number): void {
    if (this.session.state !== 'downloading') {
      return;
    }

    const clamped = Math.max(0, Math.min(1, fraction));
    this.session = Object.freeze({ ...this.session, progressFraction: clamped });
    this.emit({ type: 'progress', fraction: clamped });
  }

  private async clearStaging(): Promise<void> {
    try {
      await fs.promises.rm(this.stagingDir, { recursive: true, force: true });
      await fs.promises.mkdir(this.stagingDir, { recursive: true });
    } catch (error) {
      this.logger.warn('update.staging.clear_error', { stagingDir: this.stagingDir, reason: errorReason(error) });
    }
  }

  private transition(next: UpdateSessionState, patch: Partial<UpdateSessionSnapshot>): UpdateSessionSnapshot {
    const from = this.session.state;
    if (!isLegalTransition(from, next)) {
      throw new Error(`Transicao de update invalida: ${from} -> ${next}`);
    }

    this.session = Object.freeze({ ...this.session, ...patch, state: next });
    this.logger.debug('update.session.transition', { from, to: next });
    this.emit({ type: 'state', session: this.session });
    return this.session;
  }

  private emit(event: UpdateSessionEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.logger.error('update.session.listener_error', { type: event.type, reason: errorReason(error) });
      }
    }
  }
}

function createIdleSession(checkedAt: string | null, upToDate: boolean): UpdateSessionSnapshot {
  return {
    state: 'idle',
    candidate: null,
    stagedArtifactPath: null,
    error: null,
    progressFraction: 0,
    checkedAt,
    upToDate
  };
}

function freezeCandidate(candidate: ReleaseCandidate): ReleaseCandidate {
  return Object.freeze({ ...candidate, version: Object.freeze({ ...candidate.version }) });
}

function isCancellation(error: unknown, signal: AbortSignal): boolean {
  return error instanceof OperationCancelledError || signal.aborted;
}
