import { randomBytes } from 'node:crypto';
import { rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import YAML from 'yaml';

import { DiagnosticBuilder, DiagnosticCode } from '../diagnostics/diagnostics.js';
import type { Output } from '../engine/types.js';
import { createLogger, type Logger } from '../utils/logger.js';
import type { Recipe, RecipeSource } from './types.js';

function sourceToYaml(source: RecipeSource): Record<string, unknown> {
  switch (source.kind) {
    case 'path':
      return { path: source.path, use_gitignore: source.useGitignore };
    case 'git':
      return source.rev === undefined ? { git: source.url } : { git: source.url, rev: source.rev };
    case 'url':
      return source.sha256 === undefined ? { url: source.url } : { url: source.url, sha256: source.sha256 };
  }
}

/** Renders `recipe` in the engine's recipe format (snake_case keys). */
export function recipeToYaml(recipe: Recipe): string {
  const { build, about } = recipe;
  const document = {
    schema_version: recipe.schemaVersion,
    package: { name: recipe.package.name, version: recipe.package.version },
    ...(recipe.source.length === 0 ? {} : { source: recipe.source.map(sourceToYaml) }),
    build: {
      number: build.number,
      ...(build.string === undefined ? {} : { string: build.string }),
      ...(build.noarch === null ? {} : { noarch: build.noarch }),
      script: [...build.script],
    },
    requirements: {
      build: recipe.requirements.build.map(String),
      host: recipe.requirements.host.map(String),
      run: recipe.requirements.run.map(String),
    },
    about: {
      ...(about.summary === undefined ? {} : { summary: about.summary }),
      ...(about.license === undefined ? {} : { license: about.license }),
      ...(about.licenseFile === undefined ? {} : { license_file: about.licenseFile }),
      ...(about.homepage === undefined ? {} : { homepage: about.homepage }),
      ...(about.repository === undefined ? {} : { repository: about.repository }),
      ...(about.documentation === undefined ? {} : { documentation: about.documentation }),
    },
  };
  return YAML.stringify(document);
}

/**
 * A rendered recipe written next to the build outputs for the engine to read.
 *
 * The file is removed when the operation using it succeeds. After a failure it
 * stays on disk so the recipe that failed can be inspected.
 */
export class TemporaryRenderedRecipe {
  private constructor(
    readonly path: string,
    private readonly logger: Logger
  ) {}

  static async fromOutput(output: Output, logger: Logger = createLogger('rendered-recipe')): Promise<TemporaryRenderedRecipe> {
    const dir = output.buildConfiguration.directories.outputDir;
    const path = join(dir, `.rendered-recipe-${randomBytes(8).toString('hex')}.yaml`);
    try {
      await writeFile(path, recipeToYaml(output.recipe), { encoding: 'utf-8', flag: 'wx' });
    } catch (error) {
      DiagnosticBuilder.error(DiagnosticCode.A002_RecipeWriteFailed)
        .withMessage(`failed to write rendered recipe to ${path}`)
        .withCause(error)
        .throw();
    }
    logger.debug('wrote rendered recipe', { path });
    return new TemporaryRenderedRecipe(path, logger);
  }

  /**
   * Runs `operation` with the recipe path. Deletes the file on success; on
   * failure keeps it and rethrows the original error.
   */
  async withinContext<T>(operation: (recipePath: string) => Promise<T>): Promise<T> {
    let result: T;
    try {
      result = await operation(this.path);
    } catch (error) {
      this.logger.warn('operation failed, keeping rendered recipe', { path: this.path });
      throw error;
    }
    await this.release();
    return result;
  }

  /** Deletes the file. Only called once the operation has succeeded. */
  async release(): Promise<void> {
    try {
      await rm(this.path);
    } catch (error) {
      DiagnosticBuilder.error(DiagnosticCode.A003_RecipeRemoveFailed)
        .withMessage(`failed to remove rendered recipe ${this.path}`)
        .withCause(error)
        .throw();
    }
  }
}
