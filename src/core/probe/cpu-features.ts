/**
 * CPU instruction-set detection.
 *
 * Node exposes no CPUID access, so each platform is asked through its own
 * diagnostic source. Every failure degrades to "feature absent".
 */

import { readFile } from 'fs/promises';

import type { SupportedPlatform } from '../../types/index.js';
import type { CommandRunner } from '../../utils/process.js';
import { logger } from '../../utils/logger.js';
import type { CpuFeatures } from './capability-flags.js';

const AVX_TOKENS = new Set(['avx', 'avx1.0']);
const SSE4_TOKENS = new Set(['sse4_1', 'sse4_2', 'sse4.1', 'sse4.2']);

// PF_AVX_INSTRUCTIONS_AVAILABLE = 39, PF_SSE4_1_INSTRUCTIONS_AVAILABLE = 37
const WINDOWS_FEATURE_SCRIPT = [
  "$sig = '[DllImport(\"kernel32.dll\")] public static extern bool IsProcessorFeaturePresent(uint feature);'",
  '$k = Add-Type -MemberDefinition $sig -Name Kernel32Features -Namespace Envstrap -PassThru',
  '$found = @()',
  "if ($k::IsProcessorFeaturePresent(39)) { $found += 'avx' }",
  "if ($k::IsProcessorFeaturePresent(37)) { $found += 'sse4_1' }",
  "$found -join ' '"
].join('; ');

export const NO_CPU_FEATURES: CpuFeatures = { hasAVX: false, hasSSE4: false };

/**
 * Interpret a whitespace-separated list of feature names (any case).
 */
export function parseFeatureTokens(text: string): CpuFeatures {
  const tokens = text.toLowerCase().split(/\s+/).filter(Boolean);
  return {
    hasAVX: tokens.some(token => AVX_TOKENS.has(token)),
    hasSSE4: tokens.some(token => SSE4_TOKENS.has(token))
  };
}

/**
 * Extract features from /proc/cpuinfo, looking only at the `flags` lines.
 */
export function parseProcCpuinfo(text: string): CpuFeatures {
  const flagLines = text
    .split(/\r?\n/)
    .filter(line => /^flags\s*:/.test(line))
    .map(line => line.slice(line.indexOf(':') + 1));
  return parseFeatureTokens(flagLines.join(' '));
}

export interface CpuFeatureSourceOptions {
  runner: CommandRunner;
  platform: SupportedPlatform;
  readTextFile?: (path: string) => Promise<string>;
  timeoutMs?: number;
}

export async function detectCpuFeatures(options: CpuFeatureSourceOptions): Promise<CpuFeatures> {
  const { runner, platform, timeoutMs } = options;

  try {
    switch (platform) {
      case 'linux': {
        const read = options.readTextFile ?? ((path: string) => readFile(path, 'utf8'));
        return parseProcCpuinfo(await read('/proc/cpuinfo'));
      }
      case 'darwin': {
        const result = await runner.run(
          'sysctl',
          ['-n', 'machdep.cpu.features', 'machdep.cpu.leaf7_features'],
          { timeoutMs }
        );
        // leaf7 is missing on Apple silicon, but the first key still prints
        return parseFeatureTokens(result.stdout);
      }
      case 'win32': {
        const result = await runner.run(
          'powershell.exe',
          ['-NoProfile', '-NonInteractive', '-Command', WINDOWS_FEATURE_SCRIPT],
          { timeoutMs }
        );
        return result.exitCode === 0 ? parseFeatureTokens(result.stdout) : NO_CPU_FEATURES;
      }
    }
  } catch (error) {
    logger.debug('CPU feature detection failed', error);
  }
  return NO_CPU_FEATURES;
}
