import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { ConfigStore } from '@main/services/config/ConfigStore';
import {
  EXIT_CODES,
  createUpdateClient,
  exitCodeForOutcome,
  resolveUpdatePlatform
} from '@main/services/update/UpdateClientFactory';
import { UpdatePolicyStore } from '@main/services/update/UpdatePolicyStore';

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe('UpdateClientFactory', () => {
  it('resolve plataforma a partir de nome ou process.platform', () => {
    expect(resolveUpdatePlatform('macos')).toBe('macos');
    expect(resolveUpdatePlatform(undefined, 'darwin')).toBe('macos');
    expect(resolveUpdatePlatform(' Windows ')).toBe('windows');
    expect(resolveUpdatePlatform(undefined, 'win32')).toBe('windows');
    expect(resolveUpdatePlatform(undefined, 'linux')).toBe('linux');
    expect(resolveUpdatePlatform(undefined, 'freebsd')).toBeNull();
  });

  it('mapeia resultado da sessao para codigo de saida', () => {
    expect(exitCodeForOutcome('up-to-date')).toBe(EXIT_CODES.OK);
    expect(exitCodeForOutcome('update-available')).toBe(EXIT_CODES.OK);
    expect(exitCodeForOutcome('ready-to-restart')).toBe(EXIT_CODES.OK);
    expect(exitCodeForOutcome('retry-safe')).toBe(EXIT_CODES.RETRYABLE_FAILURE);
    expect(exitCodeForOutcome('cancelled')).toBe(EXIT_CODES.RETRYABLE_FAILURE);
    expect(exitCodeForOutcome('manual-remediation')).toBe(EXIT_CODES.MANUAL_REMEDIATION);
  });

  it('monta orquestrador ocioso a partir da configuracao', () => {
    const dataDir = createTempDir();
    const installDir = createTempDir();

    const orchestrator = createUpdateClient({
      dataDir,
      installDir,
      currentVersion: '1.0.0',
      platform: 'linux',
      config: new ConfigStore(dataDir).get(),
      logger: mockLogger(),
      policy: new UpdatePolicyStore(dataDir),
      exitCurrentApp: vi.fn()
    });

    expect(orchestrator.getSessionState().state).toBe('idle');
  });

  it('recusa diretorio de dados dentro da instalacao', () => {
    const installDir = createTempDir();
    const dataDir = path.join(installDir, 'data');

    expect(() =>
      createUpdateClient({
        dataDir,
        installDir,
        currentVersion: '1.0.0',
        platform: 'linux',
        config: new ConfigStore(dataDir).get(),
        logger: mockLogger(),
        policy: new UpdatePolicyStore(dataDir),
        exitCurrentApp: vi.fn()
      })
    ).toThrow(/nao pode coincidir/);
  });
});

function createTempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'update-factory-'));
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
