import { readFileSync } from 'fs';
import { join } from 'path';

/**
 * Package version from package.json (same relative path from src/ and dist/)
 */
export function getVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(join(__dirname, '../../package.json'), 'utf8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return 'unknown';
}
