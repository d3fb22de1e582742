// Core types for the envstrap CLI

/**
 * Platforms envstrap knows how to provision.
 */
export type SupportedPlatform = 'linux' | 'darwin' | 'win32';

/**
 * External programs the installer can detect and install on demand.
 */
export type ToolName = 'version-control' | 'environment-manager';

export const TOOL_NAMES: readonly ToolName[] = ['version-control', 'environment-manager'];

/**
 * Installer download for a single platform. `args` may contain the
 * `{installer}` and `{root}` placeholders.
 */
export interface InstallerSpec {
  url: string;
  command?: string;
  args: string[];
}

export type PlatformInstallers = Partial<Record<SupportedPlatform, InstallerSpec>>;

export interface VersionControlConfig {
  command: string;
  /** Command to use after the installer has run (not yet on PATH in this process). */
  installedCommand: Partial<Record<SupportedPlatform, string>>;
  minimumVersion?: string;
  installer: PlatformInstallers;
}

export interface EnvironmentManagerConfig {
  defaultRoot: string;
  alternateRoot: string;
  installer: PlatformInstallers;
}

export interface ArtifactSuffixes {
  gpu: string;
  avx: string;
  sse4: string;
  none: string;
}

export interface ArtifactConfig {
  prefix: string;
  genericName: string;
  extension: string;
  suffixes: ArtifactSuffixes;
  /** Package installer run inside the environment, followed by the artifact path. */
  installCommand: string[];
}

export interface EnvstrapConfig {
  appName: string;
  repository: {
    url: string;
    ref?: string;
  };
  environment: {
    name: string;
    runtime: string;
  };
  stagingDir: string;
  targetDirectory: string;
  desktopDir: string;
  artifact: ArtifactConfig;
  setup: {
    entryPoint: string;
    args: string[];
    gpuFlag: string;
  };
  launcher: {
    entryPoint: string;
    args: string[];
  };
  tools: {
    versionControl: VersionControlConfig;
    environmentManager: EnvironmentManagerConfig;
  };
  commandTimeoutMs?: number;
  downloadTimeoutMs?: number;
}

/**
 * User choices collected by the presentation layer.
 */
export interface UserOverrides {
  targetDirectory?: string;
  noGpu?: boolean;
  customEnvironmentManagerPath?: string;
}

/**
 * Outcome of a single pipeline step. Any non-zero exit code ends the run.
 */
export interface StepResult {
  exitCode: number;
  message: string;
}

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class EnvstrapError extends Error {
  public code: string;
  public details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'EnvstrapError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  CONFIG_ERROR = 'CONFIG_ERROR',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  DOWNLOAD_FAILED = 'DOWNLOAD_FAILED',
  SUBPROCESS_FAILED = 'SUBPROCESS_FAILED'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
