/**
 * Everything the engine needs besides the recipe: platforms, channels, hash
 * and the directory layout of a build.
 */

import { mkdir } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';

import { hashInfoFromVariant, type HashInfo, type Variant } from '../conda/hash.js';
import type { Platform } from '../conda/platform.js';
import {
  currentPlatformWithVirtualPackages,
  type PlatformWithVirtualPackages,
} from '../conda/virtual-packages.js';
import { DiagnosticBuilder, DiagnosticCode } from '../diagnostics/diagnostics.js';
import type { Recipe } from './types.js';

export interface Directories {
  /** Directory containing the manifest the recipe was derived from. */
  readonly recipeDir: string;
  readonly recipePath: string;
  readonly cacheDir: string;
  readonly hostPrefix: string;
  readonly buildPrefix: string;
  readonly workDir: string;
  readonly buildDir: string;
  readonly outputDir: string;
}

export type ChannelPriority = 'strict' | 'disabled';

export interface PackagingSettings {
  readonly archiveType: 'conda' | 'tar.bz2';
  readonly compressionLevel: 'default' | 'highest' | 'lowest';
}

export interface BuildConfiguration {
  /** `noarch` for noarch recipes, otherwise the host platform. */
  readonly targetPlatform: Platform;
  readonly hostPlatform: PlatformWithVirtualPackages;
  readonly buildPlatform: PlatformWithVirtualPackages;
  readonly hash: HashInfo;
  readonly variant: Variant;
  readonly directories: Directories;
  /** Channel base URLs, highest priority first. */
  readonly channels: readonly string[];
  readonly channelPriority: ChannelPriority;
  readonly timestamp: Date;
  readonly packaging: PackagingSettings;
}

// Long host prefixes leave room for prefix replacement at install time.
const HOST_PREFIX_NAME = `host_env${'_placehold'.repeat(25)}`.slice(0, 255);

export interface DirectoryOptions {
  readonly name: string;
  readonly recipePath: string;
  readonly outputDir: string;
  /** Omit the timestamp from the build directory so repeated builds reuse it. */
  readonly noBuildId: boolean;
  readonly timestamp: Date;
}

export function setupDirectories({ name, recipePath, outputDir, noBuildId, timestamp }: DirectoryOptions): Directories {
  const output = resolve(outputDir);
  const buildDir = join(
    output,
    'bld',
    noBuildId ? `rattler-build_${name}` : `rattler-build_${name}_${timestamp.getTime()}`
  );
  return {
    recipeDir: dirname(resolve(recipePath)),
    recipePath: resolve(recipePath),
    cacheDir: join(output, 'build_cache'),
    hostPrefix: join(buildDir, HOST_PREFIX_NAME),
    buildPrefix: join(buildDir, 'build_env'),
    workDir: join(buildDir, 'work'),
    buildDir,
    outputDir: output,
  };
}

export interface BuildConfigurationOptions {
  readonly recipe: Recipe;
  readonly manifestPath: string;
  readonly channels: readonly string[];
  readonly workDirectory: string;
  readonly buildPlatform?: PlatformWithVirtualPackages;
  readonly hostPlatform?: PlatformWithVirtualPackages;
  readonly noBuildId?: boolean;
}

/**
 * Creates the work directory and the configuration for building `recipe`.
 * Platforms that are not given default to the running machine.
 */
export async function createBuildConfiguration(options: BuildConfigurationOptions): Promise<BuildConfiguration> {
  const { recipe, manifestPath, channels, workDirectory } = options;

  try {
    await mkdir(workDirectory, { recursive: true });
  } catch (error) {
    DiagnosticBuilder.error(DiagnosticCode.A001_WorkDirectoryCreateFailed)
      .withMessage(`failed to create work directory ${workDirectory}`)
      .withCause(error)
      .throw();
  }

  let { buildPlatform, hostPlatform } = options;
  if (buildPlatform === undefined || hostPlatform === undefined) {
    const current = currentPlatformWithVirtualPackages();
    buildPlatform = buildPlatform ?? current;
    hostPlatform = hostPlatform ?? current;
  }

  const timestamp = new Date();
  const variant: Variant = {};

  return {
    targetPlatform: recipe.build.noarch === null ? hostPlatform.platform : 'noarch',
    hostPlatform,
    buildPlatform,
    hash: hashInfoFromVariant(variant, recipe.build.noarch),
    variant,
    directories: setupDirectories({
      name: recipe.package.name,
      recipePath: manifestPath,
      outputDir: workDirectory,
      noBuildId: options.noBuildId ?? true,
      timestamp,
    }),
    channels: [...channels],
    channelPriority: 'strict',
    timestamp,
    packaging: { archiveType: 'conda', compressionLevel: 'default' },
  };
}
