import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

/**
 * Service version
 *
 * Read from package.json (one level up from src/, two from dist/src/),
 * overridable with SERVICE_VERSION.
 */
function readPackageVersion(relative: string): string | null {
  try {
    const pkgPath = fileURLToPath(new URL(relative, import.meta.url));
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
    return null;
  } catch {
    return null;
  }
}

export const SERVICE_VERSION =
  process.env.SERVICE_VERSION ??
  readPackageVersion('../package.json') ??
  readPackageVersion('../../package.json') ??
  '0.0.0';
