/**
 * In-memory model of the parts of a `pixi.toml` project manifest that the build
 * backends read.
 */

import type { Platform, PlatformSelector } from '../conda/platform.js';

export type SpecType = 'build' | 'host' | 'run';

export const SPEC_TYPES: readonly SpecType[] = ['build', 'host', 'run'];

/** `numpy = ">=1.0"` */
export interface VersionSpec {
  readonly kind: 'version';
  readonly version: string;
}

/** `numpy = { version = ">=1.0", build = "py*", channel = "conda-forge" }` */
export interface DetailedSpec {
  readonly kind: 'detailed';
  readonly version?: string;
  readonly build?: string;
  readonly buildNumber?: string;
  readonly channel?: string;
  readonly subdir?: string;
  readonly md5?: string;
  readonly sha256?: string;
}

/** `mylib = { path = "../mylib" }`; a path to a package archive is a binary spec. */
export interface PathSpec {
  readonly kind: 'path';
  readonly path: string;
}

/** `mylib = { git = "https://...", rev = "abc" }` */
export interface GitSpec {
  readonly kind: 'git';
  readonly git: string;
  readonly rev?: string;
  readonly branch?: string;
  readonly tag?: string;
  readonly subdirectory?: string;
}

/** `mylib = { url = "https://.../mylib-1.0-0.conda" }` */
export interface UrlSpec {
  readonly kind: 'url';
  readonly url: string;
  readonly md5?: string;
  readonly sha256?: string;
}

export type DependencySpec = VersionSpec | DetailedSpec | PathSpec | GitSpec | UrlSpec;

export type DependencyTable = ReadonlyMap<string, DependencySpec>;

export interface FeatureDependencies {
  readonly run: DependencyTable;
  readonly host: DependencyTable;
  readonly build: DependencyTable;
}

export interface TargetTable {
  readonly selector: Platform | PlatformSelector;
  readonly dependencies: FeatureDependencies;
}

export interface Feature {
  readonly name: string;
  readonly dependencies: FeatureDependencies;
  /** `target.<selector>` tables in declaration order. */
  readonly targets: readonly TargetTable[];
}

export interface ProjectMetadata {
  readonly name?: string;
  readonly version?: string;
  readonly description?: string;
  readonly license?: string;
  readonly licenseFile?: string;
  readonly homepage?: string;
  readonly repository?: string;
  readonly documentation?: string;
  readonly channels: readonly string[];
  readonly platforms: readonly Platform[];
}

export interface ProjectManifest {
  /** Absolute path of the manifest file. */
  readonly path: string;
  /** Directory containing the manifest. */
  readonly root: string;
  readonly project: ProjectMetadata;
  readonly defaultFeature: Feature;
  /** Named features (`[feature.<name>]`); the backends only read the default feature. */
  readonly features: ReadonlyMap<string, Feature>;
}

export const DEFAULT_FEATURE_NAME = 'default';
