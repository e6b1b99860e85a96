import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

/**
 * Version of the installed pkgset package, read from the nearest package.json
 * above this module (works from both src/ and dist/src/).
 */
export function getVersion(): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  for (;;) {
    try {
      const raw: unknown = JSON.parse(readFileSync(join(dir, 'package.json'), 'utf8'));
      if (typeof raw === 'object' && raw !== null && 'version' in raw && typeof raw.version === 'string') {
        return raw.version;
      }
    } catch {
      // not here, keep walking up
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return '0.0.0';
    }
    dir = parent;
  }
}
