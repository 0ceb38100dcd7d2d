import type { ChannelConfig } from '../conda/channel.js';
import { isValidPackageName, MatchSpec } from '../conda/match-spec.js';
import { isWindows, type Platform } from '../conda/platform.js';
import { DiagnosticBuilder, DiagnosticCode } from '../diagnostics/diagnostics.js';
import { versionOrDefault } from '../manifest/manifest-ext.js';
import type { ProjectManifest } from '../manifest/types.js';
import { deepFreeze } from '../utils/freeze.js';
import { compilerPackage } from './compilers.js';
import { classifyDependencies, ensureHostPackages, MatchSpecExtractor } from './dependencies.js';
import type { EcosystemPolicy } from './policy.js';
import type { About, Recipe } from './types.js';

export interface RecipeContext {
  readonly manifest: ProjectManifest;
  readonly policy: EcosystemPolicy;
  readonly hostPlatform: Platform;
  readonly buildPlatform: Platform;
  readonly channelConfig: ChannelConfig;
}

/** The project name, or a configuration error when the manifest has none. */
export function requirePackageName(manifest: ProjectManifest): string {
  const name = manifest.project.name;
  if (name === undefined) {
    return DiagnosticBuilder.error(DiagnosticCode.M009_MissingPackageName)
      .withMessage("a 'name' field is required in the project manifest")
      .withHelp(`add 'name = "..."' to the [project] table of ${manifest.path}`)
      .throw();
  }
  if (!isValidPackageName(name)) {
    return DiagnosticBuilder.error(DiagnosticCode.M003_InvalidPackageName)
      .withMessage(`invalid package name: ${name}`)
      .throw();
  }
  return name;
}

function aboutFrom(manifest: ProjectManifest): About {
  const { description, license, licenseFile, homepage, repository, documentation } = manifest.project;
  return {
    ...(description === undefined ? {} : { summary: description }),
    ...(license === undefined ? {} : { license }),
    ...(licenseFile === undefined ? {} : { licenseFile }),
    ...(homepage === undefined ? {} : { homepage }),
    ...(repository === undefined ? {} : { repository }),
    ...(documentation === undefined ? {} : { documentation }),
  };
}

/**
 * Builds the recipe for the project. The result is frozen; a different
 * platform or channel configuration needs a new call.
 */
export function buildRecipe({ manifest, policy, hostPlatform, buildPlatform, channelConfig }: RecipeContext): Recipe {
  const name = requirePackageName(manifest);
  const version = versionOrDefault(manifest);

  const dependencies = classifyDependencies(manifest, policy.platformSpecificDependencies ? hostPlatform : undefined);
  ensureHostPackages(dependencies, policy.implicitHostPackages(dependencies));

  const extractor = new MatchSpecExtractor(channelConfig).withIgnoreSelf(true);
  const compilers = policy.languages(manifest).map(language => new MatchSpec(compilerPackage(hostPlatform, language)));

  const script = policy.renderBuildScript({
    manifest,
    dependencies,
    buildPlatform: isWindows(buildPlatform) ? 'windows' : 'unix',
  });

  return deepFreeze<Recipe>({
    schemaVersion: 1,
    package: { name, version },
    source: [...policy.source(manifest)],
    build: { number: 0, script, noarch: policy.noarch },
    requirements: {
      build: [...extractor.extract(dependencies.build), ...compilers],
      host: extractor.extract(dependencies.host),
      run: extractor.extract(dependencies.run),
    },
    about: aboutFrom(manifest),
  });
}
