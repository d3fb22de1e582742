import type { SupportedPlatform } from '../../types/index.js';
import { FILE_PATTERNS } from '../../constants/index.js';
import { pathFor } from '../../utils/paths.js';

/**
 * Locations inside a conda installation root.
 */

export function condaExecutable(root: string, platform: SupportedPlatform): string {
  return platform === 'win32'
    ? pathFor(platform).join(root, 'Scripts', 'conda.exe')
    : pathFor(platform).join(root, 'bin', 'conda');
}

export function condaActivateScript(root: string, platform: SupportedPlatform): string {
  return platform === 'win32'
    ? pathFor(platform).join(root, 'Scripts', 'activate.bat')
    : pathFor(platform).join(root, 'bin', 'activate');
}

export function environmentPrefix(root: string, envName: string, platform: SupportedPlatform): string {
  return pathFor(platform).join(root, FILE_PATTERNS.ENVS_DIR, envName);
}
