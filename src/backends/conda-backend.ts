/**
 * The {@link Protocol} implementation shared by every ecosystem. What differs
 * between python and cmake projects lives in an {@link EcosystemPolicy}.
 */

import { channelConfigFromAlias, type ChannelConfig } from '../conda/channel.js';
import { computeBuildString } from '../conda/hash.js';
import { currentPlatform, type Platform } from '../conda/platform.js';
import { currentPlatformWithVirtualPackages, type PlatformWithVirtualPackages } from '../conda/virtual-packages.js';
import { ConfigService } from '../config/config-service.js';
import { DiagnosticBuilder, DiagnosticCode } from '../diagnostics/diagnostics.js';
import { RattlerBuildEngine } from '../engine/rattler-build.js';
import type { BuildEngine, Output, ResolvedOutput, ToolConfiguration } from '../engine/types.js';
import { loadManifest } from '../manifest/manifest-parser.js';
import { resolvedProjectChannels, supportsTargetPlatform } from '../manifest/manifest-ext.js';
import type { ProjectManifest } from '../manifest/types.js';
import type { Protocol, ProtocolFactory, InitializedProtocol } from '../protocol/protocol.js';
import type {
  BackendCapabilities,
  CondaBuildParams,
  CondaBuildResult,
  CondaMetadataParams,
  CondaMetadataResult,
  CondaOutputIdentifier,
  CondaPackageMetadata,
  FrontendCapabilities,
  InitializeParams,
  PlatformAndVirtualPackages,
} from '../protocol/types.js';
import { createBuildConfiguration } from '../recipe/build-configuration.js';
import type { EcosystemPolicy } from '../recipe/policy.js';
import { buildRecipe, requirePackageName } from '../recipe/recipe-builder.js';
import { TemporaryRenderedRecipe } from '../recipe/rendered-recipe.js';
import { createLogger, logPerformance, type Logger } from '../utils/logger.js';

interface OutputRequest {
  readonly channelConfig: ChannelConfig;
  readonly channels: readonly string[];
  readonly hostPlatform: PlatformWithVirtualPackages;
  readonly buildPlatform: PlatformWithVirtualPackages;
  readonly workDirectory: string;
}

function withVirtualPackages(platform: PlatformAndVirtualPackages): PlatformWithVirtualPackages {
  return { platform: platform.platform, virtualPackages: platform.virtualPackages ?? [] };
}

function outputMatches(selector: CondaOutputIdentifier, candidate: Required<CondaOutputIdentifier>): boolean {
  return (
    (selector.name === undefined || selector.name === candidate.name) &&
    (selector.version === undefined || selector.version === candidate.version) &&
    (selector.build === undefined || selector.build === candidate.build) &&
    (selector.subdir === undefined || selector.subdir === candidate.subdir)
  );
}

function packageMetadata(resolved: ResolvedOutput): CondaPackageMetadata {
  const { recipe } = resolved.output;
  const { license } = recipe.about;
  const { licenseFamily } = resolved;
  const { noarch } = recipe.build;
  return {
    name: resolved.name,
    version: resolved.version,
    build: resolved.buildString,
    buildNumber: recipe.build.number,
    subdir: resolved.subdir,
    depends: [...resolved.finalizedDependencies.run.depends],
    constraints: [...resolved.finalizedDependencies.run.constraints],
    ...(license === undefined ? {} : { license }),
    ...(licenseFamily === undefined ? {} : { licenseFamily }),
    ...(noarch === null ? {} : { noarch }),
  };
}

export class CondaBuildBackend implements Protocol {
  constructor(
    readonly manifest: ProjectManifest,
    private readonly policy: EcosystemPolicy,
    private readonly engine: BuildEngine,
    private readonly logger: Logger,
    private readonly cacheDir?: string
  ) {}

  capabilities(_frontend: FrontendCapabilities): BackendCapabilities {
    return { providesCondaMetadata: true, providesCondaBuild: true };
  }

  async getCondaMetadata(params: CondaMetadataParams): Promise<CondaMetadataResult> {
    const startedAt = Date.now();
    const channelConfig = channelConfigFromAlias(params.channelConfiguration.baseUrl, this.manifest.root);
    const current = currentPlatformWithVirtualPackages();
    const hostPlatform = params.hostPlatform ? withVirtualPackages(params.hostPlatform) : current;
    const buildPlatform = params.buildPlatform ? withVirtualPackages(params.buildPlatform) : current;

    const output = await this.prepareOutput({
      channelConfig,
      channels: params.channelBaseUrls ?? resolvedProjectChannels(this.manifest, channelConfig),
      hostPlatform,
      buildPlatform,
      workDirectory: params.workDirectory,
    });

    const artifact = await TemporaryRenderedRecipe.fromOutput(output, this.logger);
    const tool = this.toolConfiguration(channelConfig);
    const resolved = await artifact.withinContext(recipePath =>
      this.engine.resolveDependencies({ recipePath, output, tool })
    );

    logPerformance({
      component: `backend:${this.policy.name}`,
      operation: 'conda/getMetadata',
      duration: Date.now() - startedAt,
      metadata: { package: resolved.name, subdir: resolved.subdir },
    });
    return { packages: [packageMetadata(resolved)], inputGlobs: [...this.policy.inputGlobs()] };
  }

  async buildConda(params: CondaBuildParams): Promise<CondaBuildResult> {
    const startedAt = Date.now();
    const channelConfig = channelConfigFromAlias(params.channelConfiguration.baseUrl, this.manifest.root);
    const current = currentPlatformWithVirtualPackages();
    const hostPlatform = params.hostPlatform ? withVirtualPackages(params.hostPlatform) : current;
    const buildPlatform = {
      platform: current.platform,
      virtualPackages: params.buildPlatformVirtualPackages ?? current.virtualPackages,
    };

    const output = await this.prepareOutput({
      channelConfig,
      channels: params.channelBaseUrls ?? resolvedProjectChannels(this.manifest, channelConfig),
      hostPlatform,
      buildPlatform,
      workDirectory: params.workDirectory,
    });
    this.ensureOutputRequested(output, params.outputs);

    const artifact = await TemporaryRenderedRecipe.fromOutput(output, this.logger);
    const tool = this.toolConfiguration(channelConfig);
    const built = await artifact.withinContext(recipePath => this.engine.build({ recipePath, output, tool }));

    logPerformance({
      component: `backend:${this.policy.name}`,
      operation: 'conda/build',
      duration: Date.now() - startedAt,
      metadata: { package: built.packagePath },
    });
    return {
      packages: [
        {
          outputFile: built.packagePath,
          inputGlobs: [...this.policy.inputGlobs()],
          name: built.output.name,
          version: built.output.version,
          build: built.output.buildString,
          subdir: built.output.subdir,
        },
      ],
    };
  }

  /** Builds the recipe and its configuration for one request. */
  private async prepareOutput(request: OutputRequest): Promise<Output> {
    this.ensureSupportedPlatform(request.hostPlatform.platform);
    const recipe = buildRecipe({
      manifest: this.manifest,
      policy: this.policy,
      hostPlatform: request.hostPlatform.platform,
      buildPlatform: request.buildPlatform.platform,
      channelConfig: request.channelConfig,
    });
    const buildConfiguration = await createBuildConfiguration({
      recipe,
      manifestPath: this.manifest.path,
      channels: request.channels,
      workDirectory: request.workDirectory,
      hostPlatform: request.hostPlatform,
      buildPlatform: request.buildPlatform,
    });
    this.logger.debug('prepared output', {
      name: recipe.package.name,
      version: recipe.package.version,
      targetPlatform: buildConfiguration.targetPlatform,
    });
    return { recipe, buildConfiguration };
  }

  private ensureSupportedPlatform(platform: Platform): void {
    if (!this.policy.requiresSupportedPlatform || supportsTargetPlatform(this.manifest, platform)) return;
    DiagnosticBuilder.error(DiagnosticCode.P003_UnsupportedTargetPlatform)
      .withMessage(`the project does not support the target platform (${platform})`)
      .withHelp(`add '${platform}' to the platforms of ${this.manifest.path}`)
      .throw();
  }

  private ensureOutputRequested(output: Output, selectors: readonly CondaOutputIdentifier[] | undefined): void {
    if (selectors === undefined || selectors.length === 0) return;
    const { recipe, buildConfiguration } = output;
    const candidate = {
      name: recipe.package.name,
      version: recipe.package.version,
      build: computeBuildString(buildConfiguration.hash, recipe.build.number),
      subdir: buildConfiguration.targetPlatform,
    };
    if (selectors.some(selector => outputMatches(selector, candidate))) return;
    DiagnosticBuilder.error(DiagnosticCode.D003_NoMatchingOutput)
      .withMessage(`none of the requested outputs matches ${candidate.name}-${candidate.version}-${candidate.build} (${candidate.subdir})`)
      .throw();
  }

  private toolConfiguration(channelConfig: ChannelConfig): ToolConfiguration {
    return {
      channelConfig,
      ...(this.cacheDir === undefined ? {} : { cacheDir: this.cacheDir }),
      testing: false,
      keepBuild: true,
      logger: this.logger.child('engine'),
    };
  }
}

export class CondaBuildBackendFactory implements ProtocolFactory<CondaBuildBackend> {
  constructor(
    private readonly policy: EcosystemPolicy,
    private readonly engine: BuildEngine = new RattlerBuildEngine(),
    private readonly logger: Logger = createLogger(`backend:${policy.name}`)
  ) {}

  get name(): string {
    return this.policy.name;
  }

  async initialize(params: InitializeParams): Promise<InitializedProtocol<CondaBuildBackend>> {
    const manifest = loadManifest(params.manifestPath);
    requirePackageName(manifest);
    const cacheDir = params.cacheDirectory ?? ConfigService.getInstance().cacheDir ?? undefined;
    const backend = new CondaBuildBackend(manifest, this.policy, this.engine, this.logger, cacheDir);
    this.logger.info('initialized backend', { manifest: manifest.path, platform: currentPlatform() });
    return { protocol: backend, result: { capabilities: backend.capabilities(params.capabilities) } };
  }
}
