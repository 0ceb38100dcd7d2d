/**
 * The seam between the backends and the tool that solves environments and
 * produces package archives.
 */

import type { ChannelConfig } from '../conda/channel.js';
import type { Logger } from '../utils/logger.js';
import type { BuildConfiguration } from '../recipe/build-configuration.js';
import type { Recipe } from '../recipe/types.js';

/** A recipe paired with the configuration to build it with. */
export interface Output {
  readonly recipe: Recipe;
  readonly buildConfiguration: BuildConfiguration;
}

export interface FinalizedRunDependencies {
  /** Match specs of the run requirements after pinning, e.g. `numpy >=1.0`. */
  readonly depends: readonly string[];
  readonly constraints: readonly string[];
}

export interface ResolvedOutput {
  readonly output: Output;
  readonly name: string;
  readonly version: string;
  readonly buildString: string;
  readonly subdir: string;
  /** License family as rendered by the engine, e.g. `BSD`. */
  readonly licenseFamily?: string;
  readonly finalizedDependencies: { readonly run: FinalizedRunDependencies };
}

export interface ToolConfiguration {
  readonly channelConfig: ChannelConfig;
  readonly cacheDir?: string;
  /** Run the recipe tests after building. */
  readonly testing: boolean;
  /** Keep the build directory after a successful build. */
  readonly keepBuild: boolean;
  readonly logger: Logger;
}

export interface EngineRequest {
  /** Path of the rendered recipe file. */
  readonly recipePath: string;
  readonly output: Output;
  readonly tool: ToolConfiguration;
}

export interface BuiltPackage {
  readonly output: ResolvedOutput;
  /** Absolute path of the produced archive. */
  readonly packagePath: string;
}

export interface BuildEngine {
  resolveDependencies(request: EngineRequest): Promise<ResolvedOutput>;
  build(request: EngineRequest): Promise<BuiltPackage>;
}
