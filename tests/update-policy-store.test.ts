import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import type { UpdatePolicy } from '@shared/contracts';
import { UpdatePolicyStore, isCheckDue } from '@main/services/update/UpdatePolicyStore';

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe('UpdatePolicyStore', () => {
  it('cria politica default e persiste patch valido', () => {
    const dir = createTempDir();

    const store = new UpdatePolicyStore(dir);
    const initial = store.get();
    expect(initial.channel).toBe('stable');
    expect(initial.checkFrequency).toBe('on-startup');
    expect(initial.ignoredVersions).toEqual([]);
    expect(initial.lastCheckAt).toBeNull();

    const updated = store.set({ channel: 'test', checkFrequency: 'weekly' });
    expect(updated.channel).toBe('test');
    expect(updated.checkFrequency).toBe('weekly');

    const reloaded = new UpdatePolicyStore(dir).get();
    expect(reloaded.channel).toBe('test');
    expect(reloaded.checkFrequency).toBe('weekly');
  });

  it('registra resultado da ultima verificacao', () => {
    const store = new UpdatePolicyStore(createTempDir());

    const policy = store.recordCheck('no-update', new Date('2026-03-01T10:00:00.000Z'));

    expect(policy.lastCheckAt).toBe('2026-03-01T10:00:00.000Z');
    expect(policy.lastCheckResult).toBe('no-update');
  });

  it('ignora e volta a oferecer versoes sem duplicar entradas', () => {
    const store = new UpdatePolicyStore(createTempDir());

    store.ignoreVersion(' 1.0.1 ');
    store.ignoreVersion('1.0.1');
    expect(store.ignoreVersion('1.0.2-test1').ignoredVersions).toEqual(['1.0.1', '1.0.2-test1']);

    expect(store.unignoreVersion('1.0.1').ignoredVersions).toEqual(['1.0.2-test1']);
    expect(store.unignoreVersion('9.9.9').ignoredVersions).toEqual(['1.0.2-test1']);
  });

  it('get devolve copia independente do estado interno', () => {
    const store = new UpdatePolicyStore(createTempDir());
    store.ignoreVersion('1.0.1');

    store.get().ignoredVersions.push('2.0.0');

    expect(store.get().ignoredVersions).toEqual(['1.0.1']);
  });

  it('autocorrige arquivo invalido', () => {
    const dir = createTempDir();
    const updateDir = path.join(dir, 'updates');
    fs.mkdirSync(updateDir, { recursive: true });
    fs.writeFileSync(
      path.join(updateDir, 'policy.json'),
      '{"policy":{"channel":"zzz","checkFrequency":"hourly","ignoredVersions":["1.0.1",3,"1.0.1"],"lastCheckAt":"ontem"}}',
      'utf-8'
    );

    const policy = new UpdatePolicyStore(dir).get();

    expect(policy.channel).toBe('stable');
    expect(policy.checkFrequency).toBe('on-startup');
    expect(policy.ignoredVersions).toEqual(['1.0.1']);
    expect(policy.lastCheckAt).toBeNull();
    expect(Number.isFinite(Date.parse(policy.updatedAt))).toBe(true);
  });

  it('substitui JSON corrompido pela politica default', () => {
    const dir = createTempDir();
    const updateDir = path.join(dir, 'updates');
    fs.mkdirSync(updateDir, { recursive: true });
    fs.writeFileSync(path.join(updateDir, 'policy.json'), '{quebrado', 'utf-8');

    expect(new UpdatePolicyStore(dir).get().channel).toBe('stable');
    const persisted: unknown = JSON.parse(fs.readFileSync(path.join(updateDir, 'policy.json'), 'utf-8'));
    expect(persisted).toMatchObject({ policy: { channel: 'stable', checkFrequency: 'on-startup' } });
  });
});

describe('isCheckDue', () => {
  const now = new Date('2026-03-08T12:00:00.000Z');

  it('nunca verifica com frequencia never', () => {
    expect(isCheckDue(policy({ checkFrequency: 'never', lastCheckAt: null }), now)).toBe(false);
  });

  it('verifica quando nunca houve verificacao ou a data e invalida', () => {
    expect(isCheckDue(policy({ lastCheckAt: null }), now)).toBe(true);
    expect(isCheckDue(policy({ lastCheckAt: 'ontem' }), now)).toBe(true);
  });

  it('respeita o intervalo de cada frequencia', () => {
    expect(isCheckDue(policy({ checkFrequency: 'on-startup', lastCheckAt: '2026-03-08T11:30:00.000Z' }), now)).toBe(false);
    expect(isCheckDue(policy({ checkFrequency: 'on-startup', lastCheckAt: '2026-03-08T11:00:00.000Z' }), now)).toBe(true);
    expect(isCheckDue(policy({ checkFrequency: 'daily', lastCheckAt: '2026-03-07T13:00:00.000Z' }), now)).toBe(false);
    expect(isCheckDue(policy({ checkFrequency: 'daily', lastCheckAt: '2026-03-07T12:00:00.000Z' }), now)).toBe(true);
    expect(isCheckDue(policy({ checkFrequency: 'weekly', lastCheckAt: '2026-03-02T12:00:00.000Z' }), now)).toBe(false);
    expect(isCheckDue(policy({ checkFrequency: 'weekly', lastCheckAt: '2026-03-01T12:00:00.000Z' }), now)).toBe(true);
    expect(isCheckDue(policy({ checkFrequency: 'monthly', lastCheckAt: '2026-02-10T12:00:00.000Z' }), now)).toBe(false);
    expect(isCheckDue(policy({ checkFrequency: 'monthly', lastCheckAt: '2026-02-06T12:00:00.000Z' }), now)).toBe(true);
  });
});

function policy(patch: Partial<UpdatePolicy>): UpdatePolicy {
  return {
    channel: 'stable',
    checkFrequency: 'on-startup',
    ignoredVersions: [],
    lastCheckAt: null,
    lastCheckResult: null,
    updatedAt: '2026-03-01T00:00:00.000Z',
    ...patch
  };
}

function createTempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'update-policy-'));
  tempDirs.push(dir);
  return dir;
}
