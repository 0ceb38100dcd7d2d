/**
 * Shared test fixtures: throwaway projects on disk and an in-process engine.
 */

import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

import { computeBuildString } from '../../src/conda/hash.js';
import type { BuildEngine, BuiltPackage, EngineRequest, ResolvedOutput } from '../../src/engine/types.js';
import { parseManifestContent } from '../../src/manifest/manifest-parser.js';
import type { ProjectManifest } from '../../src/manifest/types.js';

export const DEMO_MANIFEST = `
[project]
name = "demo"
channels = ["conda-forge"]
platforms = ["linux-64", "osx-arm64", "win-64"]

[dependencies]
numpy = ">=1.0"
`;

/** Parses manifest text that is expected to be valid. */
export function manifestFrom(toml: string, path = '/work/demo/pixi.toml'): ProjectManifest {
  const result = parseManifestContent(toml, path);
  if (Array.isArray(result)) {
    throw new Error(`unexpected diagnostics: ${result.map(d => d.message).join('; ')}`);
  }
  return result;
}

/** Writes `files` (relative path → content) into a fresh temporary directory. */
export async function createProject(files: Readonly<Record<string, string>>): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), 'build-backend-test-'));
  for (const [relative, content] of Object.entries(files)) {
    const path = join(dir, relative);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content, 'utf-8');
  }
  return dir;
}

export async function removeProject(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/** What the engine would report when it changes nothing about the output. */
export function resolvedFromRequest(request: EngineRequest): ResolvedOutput {
  const { recipe, buildConfiguration } = request.output;
  return {
    output: request.output,
    name: recipe.package.name,
    version: recipe.package.version,
    buildString: computeBuildString(buildConfiguration.hash, recipe.build.number),
    subdir: buildConfiguration.targetPlatform,
    finalizedDependencies: {
      run: { depends: recipe.requirements.run.map(String), constraints: [] },
    },
  };
}

/**
 * Records every request together with the rendered recipe as it was on disk
 * while the engine ran. Fails every call while `failure` is set, and reports
 * `licenseFamily` when it is set.
 */
export class FakeEngine implements BuildEngine {
  readonly requests: EngineRequest[] = [];
  readonly renderedRecipes: string[] = [];
  failure: Error | undefined;
  licenseFamily: string | undefined;

  async resolveDependencies(request: EngineRequest): Promise<ResolvedOutput> {
    await this.record(request);
    const resolved = resolvedFromRequest(request);
    return this.licenseFamily === undefined ? resolved : { ...resolved, licenseFamily: this.licenseFamily };
  }

  async build(request: EngineRequest): Promise<BuiltPackage> {
    await this.record(request);
    const output = resolvedFromRequest(request);
    const packagePath = join(
      request.output.buildConfiguration.directories.outputDir,
      output.subdir,
      `${output.name}-${output.version}-${output.buildString}.conda`
    );
    return { output, packagePath };
  }

  private async record(request: EngineRequest): Promise<void> {
    this.requests.push(request);
    this.renderedRecipes.push(await readFile(request.recipePath, 'utf-8'));
    if (this.failure !== undefined) throw this.failure;
  }
}
