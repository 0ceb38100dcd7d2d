/**
 * @module config-service
 *
 * Central access to environment-driven configuration. Every setting the
 * backends read comes from here rather than from scattered `process.env`
 * lookups.
 *
 * ```typescript
 * import { ConfigService } from './config/config-service.js';
 *
 * const config = ConfigService.getInstance();
 * spawn(config.rattlerBuildBin, args);
 * ```
 */

import { LogLevel } from '../utils/logger.js';

export const DEFAULT_CHANNEL_ALIAS = 'https://conda.anaconda.org/';
export const DEFAULT_MANIFEST_FILE = 'pixi.toml';

/** Values the CLI may override after parsing its flags. */
export interface ConfigOverrides {
  logLevel?: LogLevel;
}

/**
 * Read-only configuration singleton, initialized from the environment on first
 * access.
 */
export class ConfigService {
  private static instance: ConfigService | null = null;

  /** Minimum log level (`LOG_LEVEL`, default INFO). */
  readonly logLevel: LogLevel;

  /** Cache directory handed to the build engine (`BUILD_BACKEND_CACHE_DIR`). */
  readonly cacheDir: string | null;

  /** Executable used to resolve and build recipes (`RATTLER_BUILD_BIN`). */
  readonly rattlerBuildBin: string;

  /** Base URL that named channels are joined to (`CONDA_CHANNEL_ALIAS`). */
  readonly channelAlias: string;

  /** Manifest used by the CLI commands when none is given (`PIXI_PROJECT_MANIFEST`). */
  readonly manifestPath: string;

  private constructor(env: NodeJS.ProcessEnv, overrides: ConfigOverrides) {
    this.logLevel = overrides.logLevel ?? ConfigService.parseLogLevel(env.LOG_LEVEL) ?? LogLevel.INFO;
    this.cacheDir = env.BUILD_BACKEND_CACHE_DIR || null;
    this.rattlerBuildBin = env.RATTLER_BUILD_BIN || 'rattler-build';
    this.channelAlias = ensureTrailingSlash(env.CONDA_CHANNEL_ALIAS || DEFAULT_CHANNEL_ALIAS);
    this.manifestPath = env.PIXI_PROJECT_MANIFEST || DEFAULT_MANIFEST_FILE;
  }

  /**
   * Parses a level name such as `debug` or `WARN`. Returns `undefined` for
   * anything else.
   */
  static parseLogLevel(raw: string | undefined): LogLevel | undefined {
    if (!raw) return undefined;
    switch (raw.trim().toUpperCase()) {
      case 'DEBUG':
      case 'TRACE':
        return LogLevel.DEBUG;
      case 'INFO':
        return LogLevel.INFO;
      case 'WARN':
      case 'WARNING':
        return LogLevel.WARN;
      case 'ERROR':
        return LogLevel.ERROR;
      default:
        return undefined;
    }
  }

  static getInstance(): ConfigService {
    if (ConfigService.instance === null) {
      ConfigService.instance = new ConfigService(process.env, {});
    }
    return ConfigService.instance;
  }

  /**
   * Rebuilds the singleton with CLI overrides applied on top of the
   * environment. Called once, before any backend is created.
   */
  static configure(overrides: ConfigOverrides, env: NodeJS.ProcessEnv = process.env): ConfigService {
    ConfigService.instance = new ConfigService(env, overrides);
    return ConfigService.instance;
  }

  /** Drops the singleton so the next access re-reads the environment. Tests only. */
  static resetForTesting(): void {
    ConfigService.instance = null;
  }
}

function ensureTrailingSlash(url: string): string {
  return url.endsWith('/') ? url : `${url}/`;
}
