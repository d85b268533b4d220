import fs from 'node:fs';
import path from 'node:path';
import type { ReleaseCandidate } from '@shared/contracts';
import type { LogSink } from '@main/services/logging/Logger';
import { sleep as defaultSleep, throwIfCancelled, withTimeout } from '@main/services/update/abort-signals';
import { IntegrityVerifier } from '@main/services/update/IntegrityVerifier';
import { fetchOverHttps } from '@main/services/update/secure-fetch';
import { fileNameFromUrl, sanitizePathSegment } from '@main/services/update/staging-paths';
import {
  DownloadError,
  InsecureUrlError,
  IntegrityError,
  OperationCancelledError,
  UpdateError,
  errorReason
} from '@main/services/update/UpdateErrors';
import { VersionComparator } from '@main/services/update/VersionComparator';

export interface StageOptions {
  signal?: AbortSignal;
  onProgress?: (fraction: number) => void;
}

interface DownloaderOptions {
  logger: LogSink;
  verifier?: IntegrityVerifier;
  comparator?: VersionComparator;
  timeoutMs?: number;
  maxAttempts?: number;
  initialBackoffMs?: number;
  maxBackoffMs?: number;
  userAgent?: string;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

class HttpStatusError extends DownloadError {
  constructor(readonly status: number, url: string) {
    super(`Falha no download do artefato: HTTP ${status} (${url}).`);
  }
}

export class Downloader {
  private readonly logger: LogSink;
  private readonly verifier: IntegrityVerifier;
  private readonly comparator: VersionComparator;
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly initialBackoffMs: number;
  private readonly maxBackoffMs: number;
  private readonly userAgent: string;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(options: DownloaderOptions) {
    this.logger = options.logger;
    this.verifier = options.verifier ?? new IntegrityVerifier();
    this.comparator = options.comparator ?? new VersionComparator();
    this.timeoutMs = positiveInt(options.timeoutMs, 10_000);
    this.maxAttempts = positiveInt(options.maxAttempts, 3);
    this.initialBackoffMs = nonNegativeInt(options.initialBackoffMs, 500);
    this.maxBackoffMs = Math.max(this.initialBackoffMs, nonNegativeInt(options.maxBackoffMs, 8_000));
    this.userAgent = options.userAgent ?? 'UpdateClient/1.0';
    this.sleep = options.sleep ?? defaultSleep;
  }

  backoffDelayMs(attempt: number): number {
    return Math.min(this.initialBackoffMs * 2 ** Math.max(0, attempt - 1), this.maxBackoffMs);
  }

  async stage(candidate: ReleaseCandidate, destinationDir: string, options: StageOptions = {}): Promise<string> {
    const transport = this.verifier.verifyTransport(candidate.downloadUrl);
    if (!transport.ok) {
      throw new InsecureUrlError(`Download rejeitado: ${transport.error ?? candidate.downloadUrl}`);
    }

    const version = this.comparator.format(candidate.version);
    const targetDir = path.join(destinationDir, sanitizePathSegment(version));
    const artifactPath = path.join(targetDir, fileNameFromUrl(candidate.downloadUrl));
    const partPath = `${artifactPath}.part`;

    await fs.promises.mkdir(targetDir, { recursive: true });
    this.logger.info('update.download.start', {
      version,
      url: candidate.downloadUrl,
      sizeBytes: candidate.artifactSizeBytes
    });

    try {
      await this.downloadWithRetry(candidate, partPath, options);
      await this.verifyStaged(candidate, partPath);
      await fs.promises.rename(partPath, artifactPath);
    } catch (error) {
      await fs.promises.rm(partPath, { force: true });
      await fs.promises.rm(artifactPath, { force: true });
      this.logger.warn('update.download.discarded', {
        version,
        partPath,
        reason: errorReason(error)
      });
      throw error;
    }

    this.logger.info('update.download.staged', { version, artifactPath });
    return artifactPath;
  }

  private async downloadWithRetry(candidate: ReleaseCandidate, partPath: string, options: StageOptions): Promise<void> {
    for (let attempt = 1; ; attempt += 1) {
      throwIfCancelled(options.signal);
      await fs.promises.rm(partPath, { force: true });

      try {
        await this.fetchToFile(candidate, partPath, options);
        return;
      } catch (error) {
        if (!isTransient(error) || attempt >= this.maxAttempts) {
          if (error instanceof DownloadError && isTransient(error)) {
            throw new DownloadError(
              `Download falhou apos ${attempt} tentativa(s): ${error.message}`,
              { cause: error }
            );
          }
          throw error;
        }

        const delayMs = this.backoffDelayMs(attempt);
        this.logger.warn('update.download.retry', {
          attempt,
          maxAttempts: this.maxAttempts,
          delayMs,
          reason: errorReason(error)
        });
        await this.sleep(delayMs, options.signal);
      }
    }
  }

  private async fetchToFile(candidate: ReleaseCandidate, partPath: string, options: StageOptions): Promise<void> {
    const { signal, onProgress } = options;
    const timed = withTimeout(signal, this.timeoutMs);
    const handle = await fs.promises.open(partPath, 'w');
    const expected = candidate.artifactSizeBytes;
    let received = 0;

    try {
      const response = await fetchOverHttps(
        candidate.downloadUrl,
        {
          headers: {
            Accept: 'application/octet-stream',
            'User-Agent': this.userAgent
          },
          signal: timed.signal
        },
        this.verifier
      );

      if (!response.ok) {
        throw new HttpStatusError(response.status, candidate.downloadUrl);
      }
      if (!response.body) {
        throw new DownloadError('Resposta de download sem corpo.');
      }

      const reader = response.body.getReader();
      while (true) {
        const { done, value } = await reader.read();
        if (done) {
          break;
        }

        throwIfCancelled(signal);
        timed.refresh();
        received += value.byteLength;
        if (received > expected) {
          await reader.cancel();
          throw new IntegrityError(`Artefato excede o tamanho anunciado de ${expected} bytes.`);
        }

        await handle.write(value);
        onProgress?.(expected > 0 ? Math.min(1, received / expected) : 1);
      }

      if (expected === 0) {
        onProgress?.(1);
      }
    } catch (error) {
      if (signal?.aborted) {
        throw new OperationCancelledError('Download cancelado.');
      }
      if (error instanceof UpdateError || error instanceof OperationCancelledError) {
        throw error;
      }
      if (timed.timedOut()) {
        throw new DownloadError(`Download sem resposta por ${this.timeoutMs} ms.`, { cause: error });
      }
      throw new DownloadError(`Falha de rede no download: ${errorReason(error)}`, { cause: error });
    } finally {
      timed.dispose();
      await handle.close();
    }
  }

  private async verifyStaged(candidate: ReleaseCandidate, filePath: string): Promise<void> {
    const size = await this.verifier.verifySize(filePath, candidate.artifactSizeBytes);
    if (!size.ok) {
      throw new IntegrityError(size.error ?? 'Tamanho do artefato nao confere.');
    }

    if (candidate.checksumSha256) {
      const checksum = await this.verifier.verifyChecksum(filePath, candidate.checksumSha256);
      if (!checksum.ok) {
        throw new IntegrityError(checksum.error ?? 'Checksum do artefato nao confere.');
      }
    }

    if (candidate.signature && this.verifier.hasSignatureScheme()) {
      const signature = await this.verifier.verifySignature(filePath, candidate.signature);
      if (!signature.ok) {
        throw new IntegrityError(signature.error ?? 'Assinatura do artefato invalida.');
      }
    }
  }
}

function isTransient(error: unknown): boolean {
  if (error instanceof HttpStatusError) {
    return error.status >= 500 || error.status === 408 || error.status === 429;
  }

  return error instanceof DownloadError;
}

function positiveInt(value: number | undefined, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? Math.max(1, Math.trunc(value)) : fallback;
}

function nonNegativeInt(value: number | undefined, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? Math.max(0, Math.trunc(value)) : fallback;
}
