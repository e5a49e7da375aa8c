/**
 * CLI version, read from the package manifest next to src/ and dist/
 */

import * as fs from 'fs';

let cached: string | undefined;

export function getVersion(): string {
  if (cached === undefined) {
    try {
      const manifest: unknown = JSON.parse(
        fs.readFileSync(new URL('../../package.json', import.meta.url), 'utf-8')
      );
      const version =
        manifest && typeof manifest === 'object' && 'version' in manifest ? manifest.version : undefined;
      cached = typeof version === 'string' ? version : '0.0.0';
    } catch {
      cached = '0.0.0';
    }
  }
  return cached;
}
