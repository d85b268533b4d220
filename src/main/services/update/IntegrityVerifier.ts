import crypto from 'node:crypto';
import fs from 'node:fs';
import type { VerificationResult } from '@shared/contracts';

const CHECKSUM_CHUNK_BYTES = 1024 * 1024;
const SHA256_HEX_PATTERN = /^[a-fA-F0-9]{64}$/;
export const DEFAULT_SIGNED_ARTIFACT_MAX_BYTES = 1024 * 1024 * 1024;

export interface ArtifactSignatureScheme {
  readonly name: string;
  verify(filePath: string, signatureBase64: string): Promise<VerificationResult>;
}

export class IntegrityVerifier {
  constructor(private readonly signatureScheme: ArtifactSignatureScheme | null = null) {}

  hasSignatureScheme(): boolean {
    return this.signatureScheme !== null;
  }

  verifyTransport(url: string): VerificationResult {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      return fail(`URL invalida: ${url}`);
    }

    if (parsed.protocol !== 'https:') {
      return fail(`URL deve usar HTTPS, recebido: ${parsed.protocol.replace(/:$/, '') || 'sem esquema'}`);
    }
    if (!parsed.hostname) {
      return fail('URL sem host.');
    }

    return pass();
  }

  async verifyChecksum(filePath: string, expectedHex: string): Promise<VerificationResult> {
    const expected = expectedHex.trim().toLowerCase();
    if (!expected) {
      return fail('Checksum esperado ausente.');
    }
    if (!isSha256Hex(expected)) {
      return fail('Checksum esperado nao e um SHA-256 hexadecimal valido.');
    }

    let actual: Buffer;
    try {
      actual = await digestFile(filePath);
    } catch (error) {
      return fail(describeFileError(filePath, error, 'Falha ao calcular checksum'));
    }

    if (!crypto.timingSafeEqual(actual, Buffer.from(expected, 'hex'))) {
      return fail(`Checksum SHA-256 nao confere para ${filePath}.`);
    }

    return pass();
  }

  async verifySize(filePath: string, expectedBytes: number): Promise<VerificationResult> {
    if (!Number.isSafeInteger(expectedBytes) || expectedBytes < 0) {
      return fail('Tamanho esperado invalido.');
    }

    try {
      const stats = await fs.promises.stat(filePath);
      if (stats.size !== expectedBytes) {
        return fail(`Tamanho nao confere: esperado ${expectedBytes}, obtido ${stats.size}.`);
      }
      return pass();
    } catch (error) {
      return fail(describeFileError(filePath, error, 'Falha ao verificar tamanho'));
    }
  }

  async verifySignature(filePath: string, signatureBase64: string): Promise<VerificationResult> {
    if (!this.signatureScheme) {
      return fail('Nenhum esquema de assinatura configurado.');
    }

    return this.signatureScheme.verify(filePath, signatureBase64);
  }
}

/**
 * Pure Ed25519 signs the whole message in one pass, so the artifact is read
 * into memory. Files above `maxBytes` are refused instead.
 */
export class Ed25519SignatureScheme implements ArtifactSignatureScheme {
  readonly name = 'ed25519';
  private readonly publicKey: crypto.KeyObject;

  constructor(
    publicKeyPem: string,
    private readonly maxBytes = DEFAULT_SIGNED_ARTIFACT_MAX_BYTES
  ) {
    this.publicKey = crypto.createPublicKey(publicKeyPem);
  }

  async verify(filePath: string, signatureBase64: string): Promise<VerificationResult> {
    const signature = parseBase64Signature(signatureBase64);
    if (!signature) {
      return fail('Assinatura ausente ou mal formada.');
    }

    try {
      const stats = await fs.promises.stat(filePath);
      if (stats.size > this.maxBytes) {
        return fail(`Artefato grande demais para assinatura Ed25519: ${stats.size} bytes (limite ${this.maxBytes}).`);
      }

      const bytes = await fs.promises.readFile(filePath);
      return crypto.verify(null, bytes, this.publicKey, signature)
        ? pass()
        : fail(`Assinatura Ed25519 invalida para ${filePath}.`);
    } catch (error) {
      return fail(describeFileError(filePath, error, 'Falha ao verificar assinatura'));
    }
  }
}

export function isSha256Hex(value: string): boolean {
  return SHA256_HEX_PATTERN.test(value);
}

async function digestFile(filePath: string): Promise<Buffer> {
  const hash = crypto.createHash('sha256');
  const stream = fs.createReadStream(filePath, { highWaterMark: CHECKSUM_CHUNK_BYTES });
  for await (const chunk of stream) {
    hash.update(chunk);
  }
  return hash.digest();
}

function parseBase64Signature(value: string): Buffer | null {
  const normalized = value.replace(/\s+/g, '');
  if (!normalized || !/^[A-Za-z0-9+/]+={0,2}$/.test(normalized)) {
    return null;
  }

  const bytes = Buffer.from(normalized, 'base64');
  return bytes.length > 0 ? bytes : null;
}

function describeFileError(filePath: string, error: unknown, prefix: string): string {
  if (isErrnoException(error) && error.code === 'ENOENT') {
    return `Arquivo nao encontrado: ${filePath}`;
  }

  return `${prefix}: ${error instanceof Error ? error.message : String(error)}`;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function pass(): VerificationResult {
  return { ok: true, error: null };
}

function fail(error: string): VerificationResult {
  return { ok: false, error };
}
