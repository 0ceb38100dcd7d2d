import { RattlerBuildEngine } from '../engine/rattler-build.js';
import type { BuildEngine } from '../engine/types.js';
import { renderPythonScript } from '../recipe/build-script.js';
import { selectInstaller } from '../recipe/dependencies.js';
import type { EcosystemPolicy } from '../recipe/policy.js';
import { CondaBuildBackendFactory } from './conda-backend.js';

/**
 * Files that can affect a python build. Build tools differ in what they read,
 * so this errs on the side of including too much.
 */
export const PYTHON_INPUT_GLOBS: readonly string[] = Object.freeze([
  // sources
  '**/*.py',
  '**/*.pyx',
  '**/*.c',
  '**/*.cpp',
  '**/*.sh',
  // data
  '**/*.json',
  '**/*.yaml',
  '**/*.yml',
  '**/*.txt',
  // project configuration
  'setup.py',
  'setup.cfg',
  'pyproject.toml',
  'requirements*.txt',
  'Pipfile',
  'Pipfile.lock',
  'poetry.lock',
  'tox.ini',
  // build configuration
  'Makefile',
  'MANIFEST.in',
  'tests/**/*.py',
  'docs/**/*.rst',
  'docs/**/*.md',
  // versioning
  'VERSION',
  'version.py',
]);

/** Pure python packages installed with pip (or uv when the project uses it). */
export const pythonPolicy: EcosystemPolicy = {
  name: 'python',
  noarch: 'python',
  platformSpecificDependencies: false,
  requiresSupportedPlatform: false,

  implicitHostPackages: dependencies => [selectInstaller(dependencies), 'python'],

  renderBuildScript: ({ dependencies, buildPlatform }) =>
    renderPythonScript({ installer: selectInstaller(dependencies), buildPlatform }),

  languages: () => [],

  source: manifest => [{ kind: 'path', path: manifest.root, useGitignore: true }],

  inputGlobs: () => PYTHON_INPUT_GLOBS,
};

export function pythonBackendFactory(engine: BuildEngine = new RattlerBuildEngine()): CondaBuildBackendFactory {
  return new CondaBuildBackendFactory(pythonPolicy, engine);
}
