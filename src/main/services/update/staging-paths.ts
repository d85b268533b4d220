import path from 'node:path';

export function sanitizePathSegment(value: string): string {
  const trimmed = value.trim();
  const safe = trimmed.replace(/[^a-zA-Z0-9._-]+/g, '_').replace(/^\.+/, '_');
  return safe || 'file';
}

export function fileNameFromUrl(url: string): string {
  try {
    const parsed = new URL(url);
    const name = path.posix.basename(decodeURIComponent(parsed.pathname));
    return sanitizePathSegment(name || 'update-artifact.bin');
  } catch {
    return 'update-artifact.bin';
  }
}

export function isSameOrInside(candidatePath: string, parentPath: string): boolean {
  const relative = path.relative(path.resolve(parentPath), path.resolve(candidatePath));
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
}
