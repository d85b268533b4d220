import type { IntegrityVerifier } from '@main/services/update/IntegrityVerifier';
import { DownloadError, InsecureUrlError } from '@main/services/update/UpdateErrors';

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);
export const MAX_REDIRECTS = 5;

/**
 * fetch with redirects followed by hand, so every hop goes through the
 * transport check before it is requested.
 */
export async function fetchOverHttps(
  url: string,
  init: Omit<RequestInit, 'redirect'>,
  verifier: IntegrityVerifier,
  maxRedirects = MAX_REDIRECTS
): Promise<Response> {
  let currentUrl = url;

  for (let hop = 0; ; hop += 1) {
    const transport = verifier.verifyTransport(currentUrl);
    if (!transport.ok) {
      throw new InsecureUrlError(`Redirecionamento rejeitado: ${transport.error ?? currentUrl}`);
    }

    const response = await fetch(currentUrl, { ...init, redirect: 'manual' });
    if (!REDIRECT_STATUSES.has(response.status)) {
      return response;
    }

    const location = response.headers.get('location');
    await response.body?.cancel();
    if (!location) {
      throw new DownloadError(`Redirecionamento HTTP ${response.status} sem Location (${currentUrl}).`);
    }
    if (hop >= maxRedirects) {
      throw new DownloadError(`Redirecionamentos demais (limite ${maxRedirects}) a partir de ${url}.`);
    }

    currentUrl = new URL(location, currentUrl).toString();
  }
}
