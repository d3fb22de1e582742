import path, { type PlatformPath } from 'path';
import type { SupportedPlatform } from '../types/index.js';

/**
 * Path helpers that follow the target platform's separator rules rather than
 * the host's, so generated scripts and conda locations are spelled correctly.
 */

export function pathFor(platform: SupportedPlatform): PlatformPath {
  return platform === 'win32' ? path.win32 : path.posix;
}

/**
 * Compare two paths on the target platform (case-insensitive on Windows)
 */
export function pathsEqual(a: string, b: string, platform: SupportedPlatform): boolean {
  const p = pathFor(platform);
  const strip = (value: string): string => p.normalize(value).replace(/[\\/]+$/, '');
  const left = strip(a);
  const right = strip(b);
  return platform === 'win32' ? left.toLowerCase() === right.toLowerCase() : left === right;
}

/**
 * Last path segment of a download URL, used to name the staged installer
 */
export function fileNameFromUrl(url: string, fallback: string = 'installer'): string {
  try {
    const segments = new URL(url).pathname.split('/').filter(Boolean);
    const last = segments[segments.length - 1];
    return last ? decodeURIComponent(last) : fallback;
  } catch {
    return fallback;
  }
}
