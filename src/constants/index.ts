/**
 * Shared constants for the envstrap CLI
 * Single source of truth for file names, pipeline step names and the
 * built-in configuration defaults.
 */

import type { EnvstrapConfig, PlatformInstallers, SupportedPlatform } from '../types/index.js';

export const FILE_PATTERNS = {
  CONFIG_FILE_NAMES: ['envstrap.yml', 'envstrap.yaml'],
  GIT_DIR: '.git',
  ENVS_DIR: 'envs'
} as const;

/**
 * Pipeline steps in execution order.
 */
export const PIPELINE_STEPS = [
  'InstallPrerequisites',
  'CloneSource',
  'ProvisionEnvironment',
  'InstallArtifact',
  'RunSetup',
  'CreateLauncher'
] as const;

export type PipelineStepName = typeof PIPELINE_STEPS[number];

export const TOOL_LABELS = {
  'version-control': 'git',
  'environment-manager': 'conda'
} as const;

/** Exit code used when the user declines to continue at a cancel point. */
export const CANCELLED_EXIT_CODE = 130;

const MINICONDA_BASE_URL = 'https://repo.anaconda.com/miniconda';
const GIT_FOR_WINDOWS_URL =
  'https://github.com/git-for-windows/git/releases/download/v2.47.1.windows.1/Git-2.47.1-64-bit.exe';

function minicondaInstallers(arch: string): PlatformInstallers {
  const linuxArch = arch === 'arm64' ? 'aarch64' : 'x86_64';
  const macArch = arch === 'arm64' ? 'arm64' : 'x86_64';
  const shellInstaller = { command: 'bash', args: ['{installer}', '-b', '-p', '{root}'] };

  return {
    linux: { url: `${MINICONDA_BASE_URL}/Miniconda3-latest-Linux-${linuxArch}.sh`, ...shellInstaller },
    darwin: { url: `${MINICONDA_BASE_URL}/Miniconda3-latest-MacOSX-${macArch}.sh`, ...shellInstaller },
    win32: {
      url: `${MINICONDA_BASE_URL}/Miniconda3-latest-Windows-x86_64.exe`,
      args: ['/InstallationType=JustMe', '/RegisterPython=0', '/AddToPath=0', '/S', '/D={root}']
    }
  };
}

/**
 * Built-in defaults. Paths may start with `~/` (or `~\` on Windows) and are
 * expanded when the configuration is loaded.
 */
export function getDefaultConfig(
  platform: SupportedPlatform = currentPlatform(),
  arch: string = process.arch
): EnvstrapConfig {
  const isWindows = platform === 'win32';

  return {
    appName: 'app',
    repository: {
      url: ''
    },
    environment: {
      name: 'app',
      runtime: 'python=3.10'
    },
    stagingDir: './staging',
    targetDirectory: isWindows ? '~\\app' : '~/app',
    desktopDir: isWindows ? '~\\Desktop' : '~/Desktop',
    artifact: {
      prefix: 'dlib',
      genericName: 'dlib.whl',
      extension: 'whl',
      suffixes: {
        gpu: '_gpu',
        avx: '_avx',
        sse4: '_sse4',
        none: '_none'
      },
      installCommand: ['python', '-m', 'pip', 'install']
    },
    setup: {
      entryPoint: 'setup.py',
      args: ['--installer'],
      gpuFlag: '--gpu'
    },
    launcher: {
      entryPoint: 'main.py',
      args: []
    },
    tools: {
      versionControl: {
        command: 'git',
        installedCommand: {
          win32: 'C:\\Program Files\\Git\\cmd\\git.exe'
        },
        installer: {
          win32: { url: GIT_FOR_WINDOWS_URL, args: ['/NORESTART', '/VERYSILENT', '/SP-', '/SUPPRESSMSGBOXES'] }
        }
      },
      environmentManager: {
        defaultRoot: isWindows ? '~\\Miniconda3' : '~/miniconda3',
        alternateRoot: isWindows ? 'C:\\ProgramData\\Miniconda3' : '~/anaconda3',
        installer: minicondaInstallers(arch)
      }
    }
  };
}

export function currentPlatform(): SupportedPlatform {
  switch (process.platform) {
    case 'win32':
      return 'win32';
    case 'darwin':
      return 'darwin';
    default:
      return 'linux';
  }
}
