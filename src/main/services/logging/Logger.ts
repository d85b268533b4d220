import fs from 'node:fs';
import path from 'node:path';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogEntry {
  ts: string;
  level: LogLevel;
  message: string;
  meta?: unknown;
}

export type LogSink = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

// Log keys follow `update.<stage>.<event>`.
export const UPDATE_LOG_STAGES = [
  'check',
  'feed',
  'download',
  'staging',
  'install',
  'relaunch',
  'session',
  'cancel',
  'dismiss',
  'policy',
  'cli'
] as const;

export type UpdateLogStage = (typeof UPDATE_LOG_STAGES)[number];

export interface LogEntryFilter {
  stage?: UpdateLogStage;
  minLevel?: LogLevel;
}

interface LoggerOptions {
  mirrorFilePath?: string | null;
  minLevel?: LogLevel;
  consoleStream?: Pick<NodeJS.WritableStream, 'write'> | null;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export class Logger {
  private readonly filePath: string;
  private readonly mirrorFilePath: string | null;
  private readonly minLevel: LogLevel;
  private readonly consoleStream: Pick<NodeJS.WritableStream, 'write'> | null;
  private readonly maxBytes = 2 * 1024 * 1024;

  constructor(baseDir: string, options?: LoggerOptions) {
    const logDir = path.join(baseDir, 'logs');
    fs.mkdirSync(logDir, { recursive: true });
    this.filePath = path.join(logDir, 'update-client.log');
    this.mirrorFilePath = normalizeMirrorPath(options?.mirrorFilePath);
    this.minLevel = isLogLevel(options?.minLevel) ? options.minLevel : 'debug';
    this.consoleStream = options?.consoleStream ?? null;
    if (this.mirrorFilePath) {
      fs.mkdirSync(path.dirname(this.mirrorFilePath), { recursive: true });
    }
  }

  debug(message: string, meta?: unknown): void {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.write('warn', message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.write('error', message, meta);
  }

  entries(limit?: number, filter: LogEntryFilter = {}): LogEntry[] {
    const files = [`${this.filePath}.1`, this.filePath];
    const entries: LogEntry[] = [];

    for (const file of files) {
      if (!fs.existsSync(file)) {
        continue;
      }

      const text = fs.readFileSync(file, 'utf-8');
      for (const raw of text.split('\n')) {
        const line = raw.trim();
        if (!line) {
          continue;
        }

        const entry = parseLogLine(line);
        if (matchesFilter(entry, filter)) {
          entries.push(entry);
        }
      }
    }

    if (typeof limit !== 'number' || !Number.isFinite(limit) || limit <= 0 || entries.length <= limit) {
      return entries;
    }

    return entries.slice(-Math.trunc(limit));
  }

  private write(level: LogLevel, message: string, meta?: unknown): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.minLevel]) {
      return;
    }

    const line = JSON.stringify({
      ts: new Date().toISOString(),
      level,
      message,
      meta
    });

    this.rotateIfNeeded();
    fs.appendFileSync(this.filePath, `${line}\n`);
    if (this.mirrorFilePath) {
      try {
        fs.appendFileSync(this.mirrorFilePath, `${line}\n`);
      } catch {
        // espelho opcional
      }
    }

    this.consoleStream?.write(`[${level}] ${message}${meta === undefined ? '' : ` ${JSON.stringify(meta)}`}\n`);
  }

  private rotateIfNeeded(): void {
    if (!fs.existsSync(this.filePath)) {
      return;
    }

    const stats = fs.statSync(this.filePath);
    if (stats.size < this.maxBytes) {
      return;
    }

    const rotated = `${this.filePath}.1`;
    if (fs.existsSync(rotated)) {
      fs.rmSync(rotated, { force: true });
    }
    fs.renameSync(this.filePath, rotated);
  }
}

function parseLogLine(line: string): LogEntry {
  try {
    const parsed: unknown = JSON.parse(line);
    if (typeof parsed !== 'object' || parsed === null) {
      return { ts: new Date().toISOString(), level: 'info', message: line };
    }

    const record: Record<string, unknown> = { ...parsed };
    return {
      ts: typeof record.ts === 'string' ? record.ts : new Date().toISOString(),
      level: isLogLevel(record.level) ? record.level : 'info',
      message: typeof record.message === 'string' ? record.message : line,
      meta: record.meta
    };
  } catch {
    return {
      ts: new Date().toISOString(),
      level: 'info',
      message: line
    };
  }
}

export function logStageOf(message: string): UpdateLogStage | null {
  const [scope, stage] = message.split('.');
  if (scope !== 'update') {
    return null;
  }

  return UPDATE_LOG_STAGES.find((known) => known === stage) ?? null;
}

function matchesFilter(entry: LogEntry, filter: LogEntryFilter): boolean {
  if (filter.minLevel && LEVEL_RANK[entry.level] < LEVEL_RANK[filter.minLevel]) {
    return false;
  }

  return !filter.stage || logStageOf(entry.message) === filter.stage;
}

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function normalizeMirrorPath(value: string | null | undefined): string | null {
  if (typeof value !== 'string') {
    return null;
  }
  const normalized = value.trim();
  return normalized ? normalized : null;
}
