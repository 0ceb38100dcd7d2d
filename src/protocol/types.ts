/**
 * Wire types of the build backend protocol. Field names are the camelCase
 * names the orchestrator sends.
 */

import type { Platform } from '../conda/platform.js';
import type { GenericVirtualPackage } from '../conda/virtual-packages.js';

export const METHODS = {
  initialize: 'initialize',
  condaMetadata: 'conda/getMetadata',
  condaBuild: 'conda/build',
} as const;

export type MethodName = (typeof METHODS)[keyof typeof METHODS];

export interface FrontendCapabilities {
  readonly [capability: string]: unknown;
}

export interface BackendCapabilities {
  readonly providesCondaMetadata?: boolean;
  readonly providesCondaBuild?: boolean;
}

export interface InitializeParams {
  /** Path of the manifest, or of the directory that contains it. */
  readonly manifestPath: string;
  readonly capabilities: FrontendCapabilities;
  readonly cacheDirectory?: string;
}

export interface InitializeResult {
  readonly capabilities: BackendCapabilities;
}

export interface ChannelConfiguration {
  /** Channel alias named channels are resolved against. */
  readonly baseUrl: string;
}

export interface PlatformAndVirtualPackages {
  readonly platform: Platform;
  readonly virtualPackages?: readonly GenericVirtualPackage[];
}

export interface CondaMetadataParams {
  /** Channels to use instead of the manifest's. */
  readonly channelBaseUrls?: readonly string[];
  readonly channelConfiguration: ChannelConfiguration;
  readonly buildPlatform?: PlatformAndVirtualPackages;
  readonly hostPlatform?: PlatformAndVirtualPackages;
  readonly workDirectory: string;
}

export interface CondaPackageMetadata {
  readonly name: string;
  readonly version: string;
  readonly build: string;
  readonly buildNumber: number;
  readonly subdir: string;
  readonly depends: readonly string[];
  readonly constraints: readonly string[];
  readonly license?: string;
  readonly licenseFamily?: string;
  readonly noarch?: 'python' | 'generic';
}

export interface CondaMetadataResult {
  readonly packages: readonly CondaPackageMetadata[];
  readonly inputGlobs?: readonly string[];
}

/** Selects outputs to build; unset fields match anything. */
export interface CondaOutputIdentifier {
  readonly name?: string;
  readonly version?: string;
  readonly build?: string;
  readonly subdir?: string;
}

export interface CondaBuildParams {
  readonly hostPlatform?: PlatformAndVirtualPackages;
  readonly buildPlatformVirtualPackages?: readonly GenericVirtualPackage[];
  readonly channelBaseUrls?: readonly string[];
  readonly channelConfiguration: ChannelConfiguration;
  readonly outputs?: readonly CondaOutputIdentifier[];
  readonly workDirectory: string;
}

export interface CondaBuiltPackage {
  readonly outputFile: string;
  readonly inputGlobs: readonly string[];
  readonly name: string;
  readonly version: string;
  readonly build: string;
  readonly subdir: string;
}

export interface CondaBuildResult {
  readonly packages: readonly CondaBuiltPackage[];
}
