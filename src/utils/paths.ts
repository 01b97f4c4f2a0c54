/**
 * Filesystem locations for the knowledge server
 */

import { dirname, join, resolve } from 'node:path';
import { homedir } from 'node:os';
import { fileURLToPath } from 'node:url';

/**
 * Package root: the directory above src/ (or dist/ once built).
 */
export function getPackageRoot(): string {
  return resolve(dirname(fileURLToPath(import.meta.url)), '..', '..');
}

/**
 * The dataset bundled with the package.
 */
export function getDefaultDataDirectory(): string {
  return join(getPackageRoot(), 'data');
}

/**
 * Expand a leading "~" and resolve against the working directory.
 */
export function expandPath(path: string): string {
  if (path === '~' || path.startsWith('~/')) {
    return join(homedir(), path.slice(1));
  }
  return resolve(path);
}
