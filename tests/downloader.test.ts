import crypto from 'node:crypto';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import type { ReleaseCandidate } from '@shared/contracts';
import { Downloader } from '@main/services/update/Downloader';
import { IntegrityVerifier } from '@main/services/update/IntegrityVerifier';
import {
  DownloadError,
  InsecureUrlError,
  IntegrityError,
  OperationCancelledError
} from '@main/services/update/UpdateErrors';
import { VersionComparator } from '@main/services/update/VersionComparator';

const tempDirs: string[] = [];
const ARTIFACT_URL = 'https://updates.example.com/releases/app-1.0.1.AppImage';

afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();

  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe('Downloader', () => {
  it('faz streaming do artefato para staging e so publica o arquivo apos verificar', async () => {
    const payload = Buffer.from('conteudo-do-appimage');
    const stagingDir = createTempDir();
    vi.stubGlobal('fetch', vi.fn(async () => new Response(new Uint8Array(payload))));
    const progress: number[] = [];

    const downloader = new Downloader({ logger: mockLogger() });
    const stagedPath = await downloader.stage(candidate(payload), stagingDir, {
      onProgress: (fraction) => progress.push(fraction)
    });

    expect(stagedPath).toBe(path.join(stagingDir, '1.0.1', 'app-1.0.1.AppImage'));
    expect(fs.readFileSync(stagedPath)).toEqual(payload);
    expect(fs.readdirSync(path.join(stagingDir, '1.0.1'))).toEqual(['app-1.0.1.AppImage']);
    expect(progress.at(-1)).toBe(1);
  });

  it('remove o arquivo staged quando um byte corrompido quebra o checksum', async () => {
    const payload = Buffer.from('artefato-integro');
    const corrupted = Buffer.from(payload);
    corrupted[3] = (corrupted[3] ?? 0) ^ 0x01;
    const stagingDir = createTempDir();
    vi.stubGlobal('fetch', vi.fn(async () => new Response(new Uint8Array(corrupted))));

    const downloader = new Downloader({ logger: mockLogger() });
    const partPath = path.join(stagingDir, '1.0.1', 'app-1.0.1.AppImage.part');

    await expect(downloader.stage(candidate(payload), stagingDir)).rejects.toThrow(
      new IntegrityError(`Checksum SHA-256 nao confere para ${partPath}.`)
    );
    expect(fs.readdirSync(path.join(stagingDir, '1.0.1'))).toEqual([]);
  });

  it('falha com IntegrityError quando o tamanho nao confere', async () => {
    const stagingDir = createTempDir();
    vi.stubGlobal('fetch', vi.fn(async () => new Response(new Uint8Array(Buffer.from('abcd')))));
    const downloader = new Downloader({ logger: mockLogger() });

    await expect(
      downloader.stage({ ...candidate(Buffer.from('abcd')), artifactSizeBytes: 8, checksumSha256: null }, stagingDir)
    ).rejects.toThrow(new IntegrityError('Tamanho nao confere: esperado 8, obtido 4.'));
    expect(fs.readdirSync(path.join(stagingDir, '1.0.1'))).toEqual([]);
  });

  it('interrompe corpo maior que o tamanho anunciado', async () => {
    const stagingDir = createTempDir();
    vi.stubGlobal('fetch', vi.fn(async () => new Response(new Uint8Array(Buffer.from('abcdef')))));
    const downloader = new Downloader({ logger: mockLogger() });

    await expect(
      downloader.stage({ ...candidate(Buffer.from('ab')), checksumSha256: null }, stagingDir)
    ).rejects.toThrow(new IntegrityError('Artefato excede o tamanho anunciado de 2 bytes.'));
  });

  it('repete falhas transitorias com backoff exponencial', async () => {
    const payload = Buffer.from('retry-ok');
    const stagingDir = createTempDir();
    const fetchMock = vi
      .fn()
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockResolvedValueOnce(new Response('indisponivel', { status: 503 }))
      .mockResolvedValueOnce(new Response(new Uint8Array(payload)));
    vi.stubGlobal('fetch', fetchMock);
    const sleep = vi.fn(async (_ms: number) => undefined);
    const logger = mockLogger();

    const downloader = new Downloader({ logger, sleep, maxAttempts: 3, initialBackoffMs: 500, maxBackoffMs: 8_000 });
    const stagedPath = await downloader.stage(candidate(payload), stagingDir);

    expect(fs.readFileSync(stagedPath)).toEqual(payload);
    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([delayMs]) => delayMs)).toEqual([500, 1000]);
    expect(logger.warn).toHaveBeenCalledWith('update.download.retry', {
      attempt: 2,
      maxAttempts: 3,
      delayMs: 1000,
      reason: `Falha no download do artefato: HTTP 503 (${ARTIFACT_URL}).`
    });
  });

  it('nao repete erro HTTP 4xx permanente', async () => {
    const stagingDir = createTempDir();
    const fetchMock = vi.fn(async () => new Response('nao existe', { status: 404 }));
    vi.stubGlobal('fetch', fetchMock);
    const sleep = vi.fn(async (_ms: number) => undefined);

    const downloader = new Downloader({ logger: mockLogger(), sleep });

    await expect(downloader.stage(candidate(Buffer.from('x')), stagingDir)).rejects.toThrow(
      new DownloadError(`Falha no download do artefato: HTTP 404 (${ARTIFACT_URL}).`)
    );
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('reporta DownloadError apos esgotar as tentativas', async () => {
    const stagingDir = createTempDir();
    const fetchMock = vi.fn(async () => new Response('erro', { status: 500 }));
    vi.stubGlobal('fetch', fetchMock);
    const sleep = vi.fn(async (_ms: number) => undefined);

    const downloader = new Downloader({ logger: mockLogger(), sleep, maxAttempts: 2 });

    await expect(downloader.stage(candidate(Buffer.from('x')), stagingDir)).rejects.toThrow(
      new DownloadError(
        `Download falhou apos 2 tentativa(s): Falha no download do artefato: HTTP 500 (${ARTIFACT_URL}).`
      )
    );
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(sleep.mock.calls.map(([delayMs]) => delayMs)).toEqual([500]);
  });

  it('cancelamento no meio do download nao deixa arquivo parcial', async () => {
    const payload = Buffer.from('aabbcc');
    const chunks = [Buffer.from('aa'), Buffer.from('bb'), Buffer.from('cc')];
    const stagingDir = createTempDir();
    vi.stubGlobal(
      'fetch',
      vi.fn(
        async () =>
          new Response(
            new ReadableStream<Uint8Array>({
              pull(controller) {
                const next = chunks.shift();
                if (next) {
                  controller.enqueue(new Uint8Array(next));
                } else {
                  controller.close();
                }
              }
            })
          )
      )
    );
    const abort = new AbortController();

    const downloader = new Downloader({ logger: mockLogger() });
    const staging = downloader.stage(candidate(payload), stagingDir, {
      signal: abort.signal,
      onProgress: () => abort.abort()
    });

    await expect(staging).rejects.toBeInstanceOf(OperationCancelledError);
    expect(fs.readdirSync(path.join(stagingDir, '1.0.1'))).toEqual([]);
  });

  it('rejeita URL de download insegura sem acessar a rede', async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);
    const downloader = new Downloader({ logger: mockLogger() });

    await expect(
      downloader.stage({ ...candidate(Buffer.from('x')), downloadUrl: 'http://updates.example.com/app.AppImage' }, createTempDir())
    ).rejects.toBeInstanceOf(InsecureUrlError);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('recusa redirecionamento para http sem repetir nem deixar arquivo', async () => {
    const stagingDir = createTempDir();
    const fetchMock = vi.fn(
      async () =>
        new Response(null, { status: 302, headers: { Location: 'http://mirror.example.com/app-1.0.1.AppImage' } })
    );
    vi.stubGlobal('fetch', fetchMock);
    const sleep = vi.fn(async (_ms: number) => undefined);

    const downloader = new Downloader({ logger: mockLogger(), sleep });

    await expect(downloader.stage(candidate(Buffer.from('payload')), stagingDir)).rejects.toThrow(
      new InsecureUrlError('Redirecionamento rejeitado: URL deve usar HTTPS, recebido: http')
    );
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
    expect(fs.readdirSync(path.join(stagingDir, '1.0.1'))).toEqual([]);
  });

  it('segue redirecionamento https e baixa do destino final', async () => {
    const payload = Buffer.from('via-mirror');
    const stagingDir = createTempDir();
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(
        new Response(null, { status: 307, headers: { Location: 'https://cdn.example.com/app-1.0.1.AppImage' } })
      )
      .mockResolvedValueOnce(new Response(new Uint8Array(payload)));
    vi.stubGlobal('fetch', fetchMock);

    const downloader = new Downloader({ logger: mockLogger() });
    const stagedPath = await downloader.stage(candidate(payload), stagingDir);

    expect(fs.readFileSync(stagedPath)).toEqual(payload);
    expect(fetchMock.mock.calls.map(([url]) => url)).toEqual([
      ARTIFACT_URL,
      'https://cdn.example.com/app-1.0.1.AppImage'
    ]);
  });

  it('exige assinatura valida quando ha esquema configurado', async () => {
    const payload = Buffer.from('assinado');
    const stagingDir = createTempDir();
    vi.stubGlobal('fetch', vi.fn(async () => new Response(new Uint8Array(payload))));
    const verify = vi.fn(async () => ({ ok: false, error: 'assinatura recusada' }));

    const downloader = new Downloader({
      logger: mockLogger(),
      verifier: new IntegrityVerifier({ name: 'fake', verify })
    });

    await expect(
      downloader.stage({ ...candidate(payload), signature: 'c2ln' }, stagingDir)
    ).rejects.toThrow(new IntegrityError('assinatura recusada'));
    expect(verify).toHaveBeenCalledWith(path.join(stagingDir, '1.0.1', 'app-1.0.1.AppImage.part'), 'c2ln');
  });

  it('limita o backoff ao maximo configurado', () => {
    const downloader = new Downloader({ logger: mockLogger(), initialBackoffMs: 500, maxBackoffMs: 8_000 });

    expect([1, 2, 3, 4, 5, 6].map((attempt) => downloader.backoffDelayMs(attempt))).toEqual([
      500, 1000, 2000, 4000, 8000, 8000
    ]);
  });
});

function candidate(payload: Buffer): ReleaseCandidate {
  const version = new VersionComparator().parse('1.0.1');
  return {
    version,
    displayVersion: 'Version 1.0.1',
    downloadUrl: ARTIFACT_URL,
    artifactSizeBytes: payload.length,
    checksumSha256: crypto.createHash('sha256').update(payload).digest('hex'),
    signature: null,
    releaseNotesUrl: null,
    releaseNotes: null,
    publishedAt: null,
    channel: 'stable'
  };
}

function createTempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'update-downloader-'));
  tempDirs.push(dir);
  return dir;
}

function mockLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  };
}
