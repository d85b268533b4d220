import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { z } from 'zod';
import type { ReleaseCandidate, UpdateChannel, UpdatePlatform, VersionIdentifier } from '@shared/contracts';
import type { LogSink } from '@main/services/logging/Logger';
import { withTimeout } from '@main/services/update/abort-signals';
import { IntegrityVerifier, isSha256Hex } from '@main/services/update/IntegrityVerifier';
import { fetchOverHttps } from '@main/services/update/secure-fetch';
import {
  DownloadError,
  FeedParseError,
  InsecureUrlError,
  OperationCancelledError,
  UpdateError,
  errorReason
} from '@main/services/update/UpdateErrors';
import { VersionComparator } from '@main/services/update/VersionComparator';

const textSchema = z
  .union([z.string(), z.object({ '#text': z.string() }).passthrough()])
  .transform((value) => (typeof value === 'string' ? value : value['#text']).trim());

const documentSchema = z.object({
  rss: z.object({
    channel: z.union([z.object({ item: z.array(z.unknown()).optional() }).passthrough(), z.literal('')])
  })
});

const itemSchema = z.object({
  title: textSchema.optional(),
  description: textSchema.optional(),
  pubDate: textSchema.optional(),
  'sparkle:version': textSchema.optional(),
  'sparkle:shortVersionString': textSchema.optional(),
  'sparkle:releaseNotesLink': textSchema.optional(),
  enclosure: z.array(z.unknown()).optional()
});

const enclosureSchema = z.object({
  '@_url': z.string().min(1),
  '@_length': z.string().regex(/^\d+$/, 'length deve ser um inteiro nao negativo'),
  '@_sparkle:os': z.string().optional(),
  '@_sparkle:edSignature': z.string().optional(),
  '@_sparkle:dsaSignature': z.string().optional()
});

type FeedEnclosure = z.infer<typeof enclosureSchema>;

interface FeedClientOptions {
  logger: LogSink;
  verifier?: IntegrityVerifier;
  comparator?: VersionComparator;
  timeoutMs?: number;
  userAgent?: string;
}

export class FeedClient {
  private readonly logger: LogSink;
  private readonly verifier: IntegrityVerifier;
  private readonly comparator: VersionComparator;
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    parseTagValue: false,
    parseAttributeValue: false,
    isArray: (_name, jPath) => jPath === 'rss.channel.item' || jPath === 'rss.channel.item.enclosure'
  });

  constructor(options: FeedClientOptions) {
    this.logger = options.logger;
    this.verifier = options.verifier ?? new IntegrityVerifier();
    this.comparator = options.comparator ?? new VersionComparator();
    this.timeoutMs = Number.isFinite(options.timeoutMs) ? Math.max(1, Math.trunc(options.timeoutMs ?? 10_000)) : 10_000;
    this.userAgent = options.userAgent ?? 'UpdateClient/1.0';
  }

  resolveFeedUrl(baseUrl: string, platform: UpdatePlatform, channel: UpdateChannel): string {
    return `${baseUrl.replace(/\/+$/, '')}/${platform}/${channel}/appcast.xml`;
  }

  async fetchCandidates(
    feedUrl: string,
    platform: UpdatePlatform,
    options?: { signal?: AbortSignal }
  ): Promise<IterableIterator<ReleaseCandidate>> {
    const transport = this.verifier.verifyTransport(feedUrl);
    if (!transport.ok) {
      throw new InsecureUrlError(`Feed rejeitado: ${transport.error ?? feedUrl}`);
    }

    const xml = await this.fetchText(feedUrl, options?.signal);
    const items = this.parseDocument(xml);
    this.logger.info('update.feed.parsed', { feedUrl, platform, items: items.length });
    return this.candidatesFromItems(items, platform);
  }

  parseCandidates(xml: string, platform: UpdatePlatform): IterableIterator<ReleaseCandidate> {
    return this.candidatesFromItems(this.parseDocument(xml), platform);
  }

  selectBest(
    candidates: Iterable<ReleaseCandidate>,
    currentVersion: VersionIdentifier,
    channel: UpdateChannel
  ): ReleaseCandidate | null {
    let best: ReleaseCandidate | null = null;

    for (const candidate of candidates) {
      if (!this.comparator.isEligible(currentVersion, candidate.version, channel)) {
        continue;
      }

      if (!best || this.comparator.compare(candidate.version, best.version) > 0) {
        best = candidate;
      }
    }

    return best;
  }

  private parseDocument(xml: string): unknown[] {
    const validation = XMLValidator.validate(xml);
    if (validation !== true) {
      throw new FeedParseError(
        `Feed com XML invalido (linha ${validation.err.line}): ${validation.err.msg}`
      );
    }

    let raw: unknown;
    try {
      raw = this.parser.parse(xml);
    } catch (error) {
      throw new FeedParseError(`Falha ao interpretar feed: ${errorReason(error)}`, { cause: error });
    }

    const document = documentSchema.safeParse(raw);
    if (!document.success) {
      throw new FeedParseError(
        `Estrutura de feed invalida: ${document.error.issues
          .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
          .join('; ')}`
      );
    }

    const channel = document.data.rss.channel;
    return channel === '' ? [] : channel.item ?? [];
  }

  private *candidatesFromItems(items: unknown[], platform: UpdatePlatform): IterableIterator<ReleaseCandidate> {
    for (const [index, item] of items.entries()) {
      const result = this.toCandidate(item, platform);
      if ('reason' in result) {
        this.logger.warn('update.feed.entry_skipped', { index, reason: result.reason });
        continue;
      }

      yield result.candidate;
    }
  }

  private toCandidate(raw: unknown, platform: UpdatePlatform): { candidate: ReleaseCandidate } | { reason: string } {
    const parsed = itemSchema.safeParse(raw);
    if (!parsed.success) {
      return { reason: `item mal formado: ${parsed.error.issues.map((issue) => issue.message).join('; ')}` };
    }

    const item = parsed.data;
    const enclosure = pickEnclosure(item.enclosure ?? [], platform);
    if (!enclosure) {
      return { reason: `nenhum enclosure valido para ${platform}` };
    }

    const transport = this.verifier.verifyTransport(enclosure['@_url']);
    if (!transport.ok) {
      return { reason: `enclosure inseguro: ${transport.error ?? enclosure['@_url']}` };
    }

    const artifactSizeBytes = Number(enclosure['@_length']);
    if (!Number.isSafeInteger(artifactSizeBytes)) {
      return { reason: `length fora do intervalo: ${enclosure['@_length']}` };
    }

    const versionText = item['sparkle:shortVersionString'] || item['sparkle:version'] || '';
    if (!versionText) {
      return { reason: 'item sem versao' };
    }
    if (/^\d+$/.test(versionText)) {
      return { reason: `versao "${versionText}" e numero de build, nao versao semantica` };
    }

    const version = this.comparator.tryParse(versionText);
    if (!version) {
      return { reason: `versao mal formada: ${versionText}` };
    }

    const rawSignature = (enclosure['@_sparkle:edSignature'] ?? enclosure['@_sparkle:dsaSignature'] ?? '').trim();
    const checksumSha256 = isSha256Hex(rawSignature) ? rawSignature.toLowerCase() : null;
    const releaseNotesUrl = item['sparkle:releaseNotesLink'] || null;

    return {
      candidate: {
        version,
        displayVersion: item.title || this.comparator.formatDisplay(version),
        downloadUrl: enclosure['@_url'],
        artifactSizeBytes,
        checksumSha256,
        signature: checksumSha256 === null && rawSignature ? rawSignature : null,
        releaseNotesUrl: releaseNotesUrl && this.verifier.verifyTransport(releaseNotesUrl).ok ? releaseNotesUrl : null,
        releaseNotes: item.description || null,
        publishedAt: normalizePubDate(item.pubDate),
        channel: this.comparator.isStable(version) ? 'stable' : 'test'
      }
    };
  }

  private async fetchText(url: string, signal: AbortSignal | undefined): Promise<string> {
    const timed = withTimeout(signal, this.timeoutMs);
    try {
      const response = await fetchOverHttps(
        url,
        {
          headers: {
            Accept: 'application/rss+xml, application/xml, text/xml',
            'User-Agent': this.userAgent
          },
          signal: timed.signal
        },
        this.verifier
      );

      if (!response.ok) {
        throw new DownloadError(`Feed respondeu HTTP ${response.status} para ${url}`);
      }

      return await response.text();
    } catch (error) {
      if (signal?.aborted) {
        throw new OperationCancelledError('Verificacao de updates cancelada.');
      }
      if (timed.timedOut()) {
        throw new DownloadError(`Tempo esgotado ao buscar feed (${this.timeoutMs} ms).`, { cause: error });
      }
      if (error instanceof UpdateError) {
        throw error;
      }
      throw new DownloadError(`Falha de rede ao buscar feed: ${errorReason(error)}`, { cause: error });
    } finally {
      timed.dispose();
    }
  }
}

function pickEnclosure(enclosures: unknown[], platform: UpdatePlatform): FeedEnclosure | null {
  let generic: FeedEnclosure | null = null;

  for (const raw of enclosures) {
    const parsed = enclosureSchema.safeParse(raw);
    if (!parsed.success) {
      continue;
    }

    const os = parsed.data['@_sparkle:os']?.trim().toLowerCase();
    if (os === platform) {
      return parsed.data;
    }
    if (!os && !generic) {
      generic = parsed.data;
    }
  }

  return generic;
}

function normalizePubDate(value: string | undefined): string | null {
  if (!value) {
    return null;
  }

  const parsed = Date.parse(value);
  return Number.isFinite(parsed) ? new Date(parsed).toISOString() : null;
}
