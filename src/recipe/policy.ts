import type { NoArchKind } from '../conda/hash.js';
import type { ProjectManifest } from '../manifest/types.js';
import type { BuildPlatformClass } from './build-script.js';
import type { ClassifiedDependencies } from './dependencies.js';
import type { RecipeSource } from './types.js';

export interface ScriptContext {
  readonly manifest: ProjectManifest;
  readonly dependencies: ClassifiedDependencies;
  readonly buildPlatform: BuildPlatformClass;
}

/**
 * Everything that differs between ecosystems. A backend is a generic
 * {@link CondaBuildBackend} plus one of these.
 */
export interface EcosystemPolicy {
  /** Short name used in logs and the CLI, e.g. `python`. */
  readonly name: string;
  readonly noarch: NoArchKind;
  /** Whether `target.<selector>` dependency tables apply. */
  readonly platformSpecificDependencies: boolean;
  /** Reject host platforms the manifest does not list. */
  readonly requiresSupportedPlatform: boolean;

  /** Tools that must be present in the host environment. */
  implicitHostPackages(dependencies: ClassifiedDependencies): readonly string[];
  renderBuildScript(context: ScriptContext): string[];
  /** Source languages; each adds a compiler to the build requirements. */
  languages(manifest: ProjectManifest): readonly string[];
  source(manifest: ProjectManifest): readonly RecipeSource[];
  /** Files whose change invalidates a build, relative to the project root. */
  inputGlobs(): readonly string[];
}
