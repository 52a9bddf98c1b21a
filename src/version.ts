import { readFileSync } from 'node:fs';

/**
 * Build version from package.json, which sits one level above both
 * `src/` and the compiled `dist/`.
 */
function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

export const VERSION = readVersion();
