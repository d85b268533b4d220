import fs from 'node:fs';
import path from 'node:path';
import type {
  UpdateChannel,
  UpdateCheckFrequency,
  UpdateCheckResultKind,
  UpdatePolicy,
  UpdatePolicyPatch
} from '@shared/contracts';

interface PersistedUpdatePolicyFile {
  policy: UpdatePolicy;
}

export interface UpdatePolicySource {
  get(): UpdatePolicy;
  recordCheck?(result: UpdateCheckResultKind, checkedAt?: Date): UpdatePolicy;
  ignoreVersion?(version: string): UpdatePolicy;
}

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

const CHECK_INTERVAL_MS: Record<Exclude<UpdateCheckFrequency, 'never'>, number> = {
  'on-startup': HOUR_MS,
  daily: DAY_MS,
  weekly: 7 * DAY_MS,
  monthly: 30 * DAY_MS
};

const CHECK_FREQUENCIES: readonly UpdateCheckFrequency[] = ['on-startup', 'daily', 'weekly', 'monthly', 'never'];
const CHECK_RESULTS: readonly UpdateCheckResultKind[] = ['update-available', 'no-update', 'error'];

const DEFAULT_POLICY_BASE = {
  channel: 'stable',
  checkFrequency: 'on-startup'
} as const;

export class UpdatePolicyStore implements UpdatePolicySource {
  private readonly filePath: string;
  private cache: UpdatePolicy;

  constructor(baseDir: string) {
    const updateDir = path.join(baseDir, 'updates');
    fs.mkdirSync(updateDir, { recursive: true });
    this.filePath = path.join(updateDir, 'policy.json');
    this.cache = this.load();
  }

  get(): UpdatePolicy {
    return { ...this.cache, ignoredVersions: [...this.cache.ignoredVersions] };
  }

  set(patch: UpdatePolicyPatch): UpdatePolicy {
    return this.commit({
      ...this.cache,
      channel: patch.channel ?? this.cache.channel,
      checkFrequency: patch.checkFrequency ?? this.cache.checkFrequency
    });
  }

  recordCheck(result: UpdateCheckResultKind, checkedAt: Date = new Date()): UpdatePolicy {
    return this.commit({
      ...this.cache,
      lastCheckAt: checkedAt.toISOString(),
      lastCheckResult: result
    });
  }

  ignoreVersion(version: string): UpdatePolicy {
    const normalized = version.trim();
    if (!normalized || this.cache.ignoredVersions.includes(normalized)) {
      return this.get();
    }

    return this.commit({
      ...this.cache,
      ignoredVersions: [...this.cache.ignoredVersions, normalized]
    });
  }

  unignoreVersion(version: string): UpdatePolicy {
    const normalized = version.trim();
    if (!this.cache.ignoredVersions.includes(normalized)) {
      return this.get();
    }

    return this.commit({
      ...this.cache,
      ignoredVersions: this.cache.ignoredVersions.filter((item) => item !== normalized)
    });
  }

  private commit(next: UpdatePolicy): UpdatePolicy {
    this.cache = {
      ...next,
      updatedAt: new Date().toISOString()
    };
    this.persist(this.cache);
    return this.get();
  }

  private load(): UpdatePolicy {
    if (!fs.existsSync(this.filePath)) {
      const initial = createDefaultPolicy();
      this.persist(initial);
      return initial;
    }

    try {
      const raw = fs.readFileSync(this.filePath, 'utf-8');
      const parsed: unknown = JSON.parse(raw);
      const normalized = normalizePolicy(isRecord(parsed) ? parsed.policy : null);
      this.persist(normalized);
      return normalized;
    } catch {
      const fallback = createDefaultPolicy();
      this.persist(fallback);
      return fallback;
    }
  }

  private persist(policy: UpdatePolicy): void {
    const file: PersistedUpdatePolicyFile = { policy };
    fs.writeFileSync(this.filePath, JSON.stringify(file, null, 2), 'utf-8');
  }
}

export function isCheckDue(policy: UpdatePolicy, now: Date = new Date()): boolean {
  if (policy.checkFrequency === 'never') {
    return false;
  }
  if (!policy.lastCheckAt) {
    return true;
  }

  const last = Date.parse(policy.lastCheckAt);
  if (!Number.isFinite(last)) {
    return true;
  }

  return now.getTime() - last >= CHECK_INTERVAL_MS[policy.checkFrequency];
}

function createDefaultPolicy(): UpdatePolicy {
  return {
    channel: DEFAULT_POLICY_BASE.channel,
    checkFrequency: DEFAULT_POLICY_BASE.checkFrequency,
    ignoredVersions: [],
    lastCheckAt: null,
    lastCheckResult: null,
    updatedAt: new Date().toISOString()
  };
}

function normalizePolicy(input: unknown): UpdatePolicy {
  if (!isRecord(input)) {
    return createDefaultPolicy();
  }

  const fallback = createDefaultPolicy();
  const ignored = Array.isArray(input.ignoredVersions)
    ? input.ignoredVersions.filter((item): item is string => typeof item === 'string' && item.trim().length > 0)
    : [];

  return {
    channel: normalizeChannel(input.channel),
    checkFrequency: pickOne(CHECK_FREQUENCIES, input.checkFrequency) ?? fallback.checkFrequency,
    ignoredVersions: [...new Set(ignored.map((item) => item.trim()))],
    lastCheckAt: isIso(input.lastCheckAt) ? input.lastCheckAt : null,
    lastCheckResult: pickOne(CHECK_RESULTS, input.lastCheckResult),
    updatedAt: isIso(input.updatedAt) ? input.updatedAt : fallback.updatedAt
  };
}

function normalizeChannel(value: unknown): UpdateChannel {
  return value === 'test' ? 'test' : 'stable';
}

function pickOne<T extends string>(allowed: readonly T[], value: unknown): T | null {
  return allowed.find((item) => item === value) ?? null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isIso(value: unknown): value is string {
  return typeof value === 'string' && Number.isFinite(Date.parse(value));
}
