import { dirname, join, resolve } from 'path';
import yaml from 'js-yaml';
import semver from 'semver';

import type {
  EnvstrapConfig,
  InstallerSpec,
  PlatformInstallers,
  SupportedPlatform
} from '../types/index.js';
import { FILE_PATTERNS, currentPlatform, getDefaultConfig } from '../constants/index.js';
import { exists, readTextFile } from '../utils/fs.js';
import { expandTilde } from '../utils/home-directory.js';
import { logger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';

/**
 * Configuration management for the envstrap CLI.
 * Reads envstrap.yml and layers it over the built-in defaults.
 */

type RawObject = Record<string, unknown>;

const PLATFORMS: readonly SupportedPlatform[] = ['linux', 'darwin', 'win32'];

function isRecord(value: unknown): value is RawObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: RawObject, key: string, path: string): RawObject {
  const value = raw[key];
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    throw new ConfigError(`Invalid configuration: '${path}${key}' must be a mapping`);
  }
  return value;
}

function readString(raw: RawObject, key: string, fallback: string, path: string): string {
  const value = raw[key];
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== 'string') {
    throw new ConfigError(`Invalid configuration: '${path}${key}' must be a string`);
  }
  return value;
}

function readOptionalString(
  raw: RawObject,
  key: string,
  fallback: string | undefined,
  path: string
): string | undefined {
  const value = raw[key];
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== 'string') {
    throw new ConfigError(`Invalid configuration: '${path}${key}' must be a string`);
  }
  return value;
}

function readStringList(raw: RawObject, key: string, fallback: string[], path: string): string[] {
  const value = raw[key];
  if (value === undefined || value === null) {
    return [...fallback];
  }
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ConfigError(`Invalid configuration: '${path}${key}' must be a list of strings`);
  }
  return value;
}

function readOptionalNumber(raw: RawObject, key: string, fallback: number | undefined, path: string): number | undefined {
  const value = raw[key];
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new ConfigError(`Invalid configuration: '${path}${key}' must be a non-negative number`);
  }
  return value;
}

function readVersion(raw: RawObject, key: string, fallback: string | undefined, path: string): string | undefined {
  const value = readOptionalString(raw, key, fallback, path);
  if (value !== undefined && !semver.valid(value)) {
    throw new ConfigError(`Invalid configuration: '${path}${key}' must be a semantic version such as 2.30.0`);
  }
  return value;
}

function readInstallers(raw: RawObject, key: string, fallback: PlatformInstallers, path: string): PlatformInstallers {
  const block = section(raw, key, path);
  const result: PlatformInstallers = { ...fallback };

  for (const platform of PLATFORMS) {
    if (!(platform in block)) {
      continue;
    }
    const entry = block[platform];
    const entryPath = `${path}${key}.${platform}`;
    if (entry === null) {
      delete result[platform];
      continue;
    }
    if (!isRecord(entry)) {
      throw new ConfigError(`Invalid configuration: '${entryPath}' must be a mapping`);
    }
    const base: InstallerSpec | undefined = fallback[platform];
    const url = readString(entry, 'url', base?.url ?? '', `${entryPath}.`);
    if (!url) {
      throw new ConfigError(`Invalid configuration: '${entryPath}.url' is required`);
    }
    result[platform] = {
      url,
      command: readOptionalString(entry, 'command', base?.command, `${entryPath}.`),
      args: readStringList(entry, 'args', base?.args ?? [], `${entryPath}.`)
    };
  }

  return result;
}

function readPlatformStrings(
  raw: RawObject,
  key: string,
  fallback: Partial<Record<SupportedPlatform, string>>,
  path: string
): Partial<Record<SupportedPlatform, string>> {
  const block = section(raw, key, path);
  const result = { ...fallback };
  for (const platform of PLATFORMS) {
    const value = readOptionalString(block, platform, undefined, `${path}${key}.`);
    if (value !== undefined) {
      result[platform] = value;
    }
  }
  return result;
}

/**
 * Merge a parsed YAML document over the defaults, validating every field.
 * `baseDir` anchors relative paths (the directory holding the config file).
 */
export function resolveConfig(raw: unknown, defaults: EnvstrapConfig, baseDir: string): EnvstrapConfig {
  if (raw === undefined || raw === null) {
    raw = {};
  }
  if (!isRecord(raw)) {
    throw new ConfigError('Invalid configuration: the document root must be a mapping');
  }

  const repository = section(raw, 'repository', '');
  const environment = section(raw, 'environment', '');
  const artifact = section(raw, 'artifact', '');
  const suffixes = section(artifact, 'suffixes', 'artifact.');
  const setup = section(raw, 'setup', '');
  const launcher = section(raw, 'launcher', '');
  const tools = section(raw, 'tools', '');
  const versionControl = section(tools, 'versionControl', 'tools.');
  const environmentManager = section(tools, 'environmentManager', 'tools.');
  const vcDefaults = defaults.tools.versionControl;
  const emDefaults = defaults.tools.environmentManager;

  return {
    appName: readString(raw, 'appName', defaults.appName, ''),
    repository: {
      url: readString(repository, 'url', defaults.repository.url, 'repository.'),
      ref: readOptionalString(repository, 'ref', defaults.repository.ref, 'repository.')
    },
    environment: {
      name: readString(environment, 'name', defaults.environment.name, 'environment.'),
      runtime: readString(environment, 'runtime', defaults.environment.runtime, 'environment.')
    },
    stagingDir: resolve(baseDir, expandTilde(readString(raw, 'stagingDir', defaults.stagingDir, ''))),
    targetDirectory: expandTilde(readString(raw, 'targetDirectory', defaults.targetDirectory, '')),
    desktopDir: expandTilde(readString(raw, 'desktopDir', defaults.desktopDir, '')),
    artifact: {
      prefix: readString(artifact, 'prefix', defaults.artifact.prefix, 'artifact.'),
      genericName: readString(artifact, 'genericName', defaults.artifact.genericName, 'artifact.'),
      extension: readString(artifact, 'extension', defaults.artifact.extension, 'artifact.'),
      suffixes: {
        gpu: readString(suffixes, 'gpu', defaults.artifact.suffixes.gpu, 'artifact.suffixes.'),
        avx: readString(suffixes, 'avx', defaults.artifact.suffixes.avx, 'artifact.suffixes.'),
        sse4: readString(suffixes, 'sse4', defaults.artifact.suffixes.sse4, 'artifact.suffixes.'),
        none: readString(suffixes, 'none', defaults.artifact.suffixes.none, 'artifact.suffixes.')
      },
      installCommand: readStringList(artifact, 'installCommand', defaults.artifact.installCommand, 'artifact.')
    },
    setup: {
      entryPoint: readString(setup, 'entryPoint', defaults.setup.entryPoint, 'setup.'),
      args: readStringList(setup, 'args', defaults.setup.args, 'setup.'),
      gpuFlag: readString(setup, 'gpuFlag', defaults.setup.gpuFlag, 'setup.')
    },
    launcher: {
      entryPoint: readString(launcher, 'entryPoint', defaults.launcher.entryPoint, 'launcher.'),
      args: readStringList(launcher, 'args', defaults.launcher.args, 'launcher.')
    },
    tools: {
      versionControl: {
        command: readString(versionControl, 'command', vcDefaults.command, 'tools.versionControl.'),
        installedCommand: readPlatformStrings(versionControl, 'installedCommand', vcDefaults.installedCommand, 'tools.versionControl.'),
        minimumVersion: readVersion(versionControl, 'minimumVersion', vcDefaults.minimumVersion, 'tools.versionControl.'),
        installer: readInstallers(versionControl, 'installer', vcDefaults.installer, 'tools.versionControl.')
      },
      environmentManager: {
        defaultRoot: expandTilde(readString(environmentManager, 'defaultRoot', emDefaults.defaultRoot, 'tools.environmentManager.')),
        alternateRoot: expandTilde(readString(environmentManager, 'alternateRoot', emDefaults.alternateRoot, 'tools.environmentManager.')),
        installer: readInstallers(environmentManager, 'installer', emDefaults.installer, 'tools.environmentManager.')
      }
    },
    commandTimeoutMs: readOptionalNumber(raw, 'commandTimeoutMs', defaults.commandTimeoutMs, ''),
    downloadTimeoutMs: readOptionalNumber(raw, 'downloadTimeoutMs', defaults.downloadTimeoutMs, '')
  };
}

export interface ConfigManagerOptions {
  /** Directory searched for envstrap.yml when no explicit path is given. */
  cwd: string;
  /** Explicit --config path; must exist. */
  configPath?: string;
  platform?: SupportedPlatform;
}

export class ConfigManager {
  private config: EnvstrapConfig | null = null;
  private configPath: string | null = null;

  constructor(private readonly options: ConfigManagerOptions) {}

  /**
   * Find the config file: the explicit path, else the first known name in cwd
   */
  private async findConfigFile(): Promise<string | null> {
    if (this.options.configPath) {
      const explicit = resolve(this.options.cwd, expandTilde(this.options.configPath));
      if (!(await exists(explicit))) {
        throw new ConfigError(`Configuration file not found: ${explicit}`);
      }
      return explicit;
    }

    for (const fileName of FILE_PATTERNS.CONFIG_FILE_NAMES) {
      const path = join(this.options.cwd, fileName);
      if (await exists(path)) {
        return path;
      }
    }
    return null;
  }

  /**
   * Load configuration from file, falling back to defaults if none exists
   */
  async load(): Promise<EnvstrapConfig> {
    if (this.config) {
      return this.config;
    }

    const defaults = getDefaultConfig(this.options.platform ?? currentPlatform());
    const configPath = await this.findConfigFile();

    if (!configPath) {
      logger.debug('Config file not found, using defaults');
      this.config = resolveConfig({}, defaults, this.options.cwd);
      return this.config;
    }

    logger.debug(`Loading config from: ${configPath}`);
    const content = await readTextFile(configPath);
    let parsed: unknown;
    try {
      parsed = yaml.load(content, { filename: configPath });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Failed to parse ${configPath}: ${reason}`, { configPath });
    }

    this.configPath = configPath;
    this.config = resolveConfig(parsed, defaults, dirname(configPath));
    return this.config;
  }

  /**
   * Path of the loaded config file, or null when running on defaults
   */
  getConfigPath(): string | null {
    return this.configPath;
  }
}

/**
 * Fail early when the configuration cannot drive an installation.
 */
export function assertInstallable(config: EnvstrapConfig): void {
  if (!config.repository.url) {
    throw new ConfigError(
      `No source repository configured. Set 'repository.url' in ${FILE_PATTERNS.CONFIG_FILE_NAMES[0]}.`
    );
  }
  if (!config.environment.name.trim()) {
    throw new ConfigError(`'environment.name' must not be empty`);
  }
}
