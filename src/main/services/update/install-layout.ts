import fs from 'node:fs';
import path from 'node:path';
import type { InstallLayout, UpdatePlatform, VerificationResult } from '@shared/contracts';

export async function verifyInstallLayout(
  installDir: string,
  layout: InstallLayout,
  platform: UpdatePlatform
): Promise<VerificationResult> {
  const mainEntry = path.resolve(installDir, layout.mainEntry);

  let stats: fs.Stats;
  try {
    stats = await fs.promises.stat(mainEntry);
  } catch {
    return { ok: false, error: `Entrada principal ausente apos instalacao: ${mainEntry}` };
  }
  if (!stats.isFile()) {
    return { ok: false, error: `Entrada principal nao e um arquivo: ${mainEntry}` };
  }

  if (platform !== 'windows') {
    try {
      await fs.promises.access(mainEntry, fs.constants.X_OK);
    } catch {
      return { ok: false, error: `Entrada principal sem permissao de execucao: ${mainEntry}` };
    }
  }

  const missing: string[] = [];
  for (const component of layout.requiredComponents) {
    try {
      await fs.promises.access(path.resolve(installDir, component), fs.constants.F_OK);
    } catch {
      missing.push(component);
    }
  }

  if (missing.length > 0) {
    return { ok: false, error: `Componentes de runtime ausentes: ${missing.join(', ')}` };
  }

  return { ok: true, error: null };
}
