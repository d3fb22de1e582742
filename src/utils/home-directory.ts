/**
 * Home Directory Utilities
 *
 * Centralized module for all home directory operations.
 * Handles path resolution.
 */

import { homedir } from 'os';
import { resolve } from 'path';

/**
 * Get the home directory path.
 */
export function getHomeDirectory(): string {
  return homedir();
}

/**
 * Expand tilde notation to full home directory path.
 *
 * Accepts both `~/` and `~\` so configuration written on Windows expands too.
 */
export function expandTilde(path: string): string {
  if (path === '~' || path === '~/' || path === '~\\') {
    return getHomeDirectory();
  }

  if (path.startsWith('~/') || path.startsWith('~\\')) {
    return resolve(getHomeDirectory(), path.slice(2));
  }

  return path;
}
