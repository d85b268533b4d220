import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { UpdateClientConfig } from '@shared/contracts';

const httpsUrl = z
  .string()
  .url()
  .refine((value) => value.startsWith('https://'), 'feedBaseUrl deve usar HTTPS');

const relativePath = z
  .string()
  .min(1)
  .refine((value) => !path.isAbsolute(value), 'caminho deve ser relativo ao diretorio de instalacao');

const configSchema = z.object({
  feedBaseUrl: httpsUrl.default('https://updates.example.com'),
  requestTimeoutMs: z.number().int().positive().default(10_000),
  download: z
    .object({
      maxAttempts: z.number().int().min(1).max(10).default(3),
      initialBackoffMs: z.number().int().nonnegative().default(500),
      maxBackoffMs: z.number().int().nonnegative().default(8_000)
    })
    .default({}),
  relaunchDelayMs: z.number().int().nonnegative().default(120),
  layout: z
    .object({
      mainEntry: relativePath.default('app'),
      requiredComponents: z.array(relativePath).default([])
    })
    .default({}),
  signaturePublicKeyPem: z.string().min(1).nullable().default(null)
});

const DEFAULT_CONFIG: UpdateClientConfig = configSchema.parse({});

export interface ConfigEnvironmentOverrides {
  feedBaseUrl?: string;
  requestTimeoutMs?: number;
  maxAttempts?: number;
}

export class ConfigStore {
  private readonly filePath: string;
  private cache: UpdateClientConfig;

  constructor(baseDir: string) {
    const configDir = path.join(baseDir, 'config');
    fs.mkdirSync(configDir, { recursive: true });
    this.filePath = path.join(configDir, 'update-client.config.json');
    this.cache = this.load();
  }

  get(): UpdateClientConfig {
    return this.cache;
  }

  setFeedBaseUrl(url: string): UpdateClientConfig {
    const parsed = httpsUrl.safeParse(url.trim().replace(/\/+$/, ''));
    if (!parsed.success) {
      return this.cache;
    }

    this.cache = { ...this.cache, feedBaseUrl: parsed.data };
    this.persist(this.cache);
    return this.cache;
  }

  private load(): UpdateClientConfig {
    if (!fs.existsSync(this.filePath)) {
      this.persist(DEFAULT_CONFIG);
      return DEFAULT_CONFIG;
    }

    const parsed = configSchema.safeParse(readJsonFile(this.filePath));
    if (parsed.success) {
      return parsed.data;
    }

    this.persist(DEFAULT_CONFIG);
    return DEFAULT_CONFIG;
  }

  private persist(config: UpdateClientConfig): void {
    fs.writeFileSync(this.filePath, JSON.stringify(config, null, 2), 'utf-8');
  }
}

export function applyConfigOverrides(
  config: UpdateClientConfig,
  overrides: ConfigEnvironmentOverrides
): UpdateClientConfig {
  const feedBaseUrl = overrides.feedBaseUrl ? httpsUrl.safeParse(overrides.feedBaseUrl) : null;

  return {
    ...config,
    feedBaseUrl: feedBaseUrl?.success ? feedBaseUrl.data : config.feedBaseUrl,
    requestTimeoutMs: overrides.requestTimeoutMs ?? config.requestTimeoutMs,
    download: {
      ...config.download,
      maxAttempts: overrides.maxAttempts ?? config.download.maxAttempts
    }
  };
}

function readJsonFile(filePath: string): unknown {
  try {
    return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch {
    return null;
  }
}
