/**
 * CLI Version Utility
 *
 * Reads version from package.json at runtime to avoid hardcoding.
 */

import { join } from 'node:path';
import { readFileSync, existsSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

function readVersion(pkgPath: string): string | undefined {
  if (!existsSync(pkgPath)) return undefined;
  const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return undefined;
}

/**
 * Get CLI version from package.json
 *
 * Uses multiple strategies to find package.json:
 * 1. Relative to this module (src/lib/version.ts -> package.json)
 * 2. Process.cwd() fallback (running in the monorepo)
 */
export function getVersion(): string {
  const candidates = [
    fileURLToPath(new URL('../../package.json', import.meta.url)),
    join(process.cwd(), 'packages', 'cli', 'package.json'),
  ];

  for (const pkgPath of candidates) {
    try {
      const version = readVersion(pkgPath);
      if (version) return version;
    } catch {
      // Unreadable or malformed; try the next candidate
    }
  }

  return '0.0.0-unknown';
}
