import { describe, expect, it } from 'vitest';
import { sleep, throwIfCancelled, withTimeout } from '@main/services/update/abort-signals';
import { fileNameFromUrl, isSameOrInside, sanitizePathSegment } from '@main/services/update/staging-paths';
import { OperationCancelledError } from '@main/services/update/UpdateErrors';

describe('staging-paths', () => {
  it('gera nomes de arquivo seguros a partir da URL do artefato', () => {
    expect(fileNameFromUrl('https://updates.example.com/linux/app%201.0.1.AppImage?token=x')).toBe(
      'app_1.0.1.AppImage'
    );
    expect(fileNameFromUrl('https://updates.example.com/')).toBe('update-artifact.bin');
    expect(fileNameFromUrl('nao e url')).toBe('update-artifact.bin');
  });

  it('neutraliza separadores e prefixo oculto', () => {
    expect(sanitizePathSegment('../../etc/passwd')).toBe('__.._etc_passwd');
    expect(sanitizePathSegment('.hidden')).toBe('_hidden');
    expect(sanitizePathSegment('   ')).toBe('file');
  });

  it('detecta caminho igual ou contido em outro', () => {
    expect(isSameOrInside('/opt/app', '/opt/app')).toBe(true);
    expect(isSameOrInside('/opt/app/staging', '/opt/app')).toBe(true);
    expect(isSameOrInside('/opt/app-staging', '/opt/app')).toBe(false);
    expect(isSameOrInside('/opt', '/opt/app')).toBe(false);
  });
});

describe('abort-signals', () => {
  it('aborta por timeout e informa expiracao', async () => {
    const timed = withTimeout(undefined, 10);

    await new Promise<void>((resolve) => timed.signal.addEventListener('abort', () => resolve(), { once: true }));

    expect(timed.timedOut()).toBe(true);
    timed.dispose();
  });

  it('propaga cancelamento do sinal pai sem marcar timeout', () => {
    const parent = new AbortController();
    const timed = withTimeout(parent.signal, 10_000);

    parent.abort();

    expect(timed.signal.aborted).toBe(true);
    expect(timed.timedOut()).toBe(false);
    expect(() => throwIfCancelled(timed.signal)).toThrow(OperationCancelledError);
    timed.dispose();
  });

  it('interrompe sleep quando o sinal e abortado', async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);

    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(OperationCancelledError);
    await expect(sleep(1)).resolves.toBeUndefined();
  });
});
