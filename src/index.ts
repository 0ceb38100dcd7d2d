/**
 * @module conda-build-backends
 *
 * Build backends that translate a pixi project manifest into a conda recipe
 * and serve it to a package manager over JSON-RPC.
 *
 * **Pipeline**:
 * ```
 * pixi.toml → loadManifest → classifyDependencies → buildRecipe → TemporaryRenderedRecipe → rattler-build
 * ```
 *
 * @example Serving the python backend on stdio
 * ```typescript
 * import { Server, runStdio, pythonBackendFactory } from 'conda-build-backends';
 *
 * await runStdio(new Server(pythonBackendFactory()));
 * ```
 */

// Backends
export { CondaBuildBackend, CondaBuildBackendFactory } from './backends/conda-backend.js';
export { pythonBackendFactory, pythonPolicy, PYTHON_INPUT_GLOBS } from './backends/python.js';
export { cmakeBackendFactory, cmakePolicy, CMAKE_INPUT_GLOBS, parseCMakeLanguages } from './backends/cmake.js';

// Protocol
export type { Protocol, ProtocolFactory, InitializedProtocol } from './protocol/protocol.js';
export * from './protocol/types.js';
export { Server, RequestDispatcher, toResponseError, BACKEND_ERROR_CODE } from './server/server.js';
export { createTransport, listen, runStdio, type Framing, type ListenOptions } from './server/transports.js';
export { LineMessageReader, LineMessageWriter } from './server/line-framing.js';

// Manifest and recipes
export { loadManifest, parseManifest, parseManifestContent, resolveManifestPath } from './manifest/manifest-parser.js';
export type { ProjectManifest, DependencySpec, SpecType } from './manifest/types.js';
export {
  classifyDependencies,
  ensureHostPackages,
  DependencySet,
  MatchSpecExtractor,
  type ClassifiedDependencies,
} from './recipe/dependencies.js';
export { buildRecipe, requirePackageName } from './recipe/recipe-builder.js';
export type { Recipe } from './recipe/types.js';
export type { EcosystemPolicy } from './recipe/policy.js';
export { TemporaryRenderedRecipe, recipeToYaml } from './recipe/rendered-recipe.js';
export { createBuildConfiguration, type BuildConfiguration } from './recipe/build-configuration.js';

// Conda primitives
export { MatchSpec, type NamelessMatchSpec } from './conda/match-spec.js';
export { currentPlatform, parsePlatform, type Platform } from './conda/platform.js';
export { channelToBaseUrl, type ChannelConfig } from './conda/channel.js';

// Engine
export { RattlerBuildEngine } from './engine/rattler-build.js';
export type { BuildEngine, EngineRequest, ResolvedOutput, BuiltPackage } from './engine/types.js';

// Diagnostics and configuration
export * from './diagnostics/index.js';
export { ConfigService } from './config/config-service.js';
export { createLogger, Logger, LogLevel } from './utils/logger.js';
