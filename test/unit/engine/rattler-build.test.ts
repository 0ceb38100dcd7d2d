import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { pythonPolicy } from '../../../src/backends/python.js';
import { computeBuildString } from '../../../src/conda/hash.js';
import { DiagnosticCode, isDiagnosticError } from '../../../src/diagnostics/diagnostics.js';
import {
  buildArguments,
  engineEnvironment,
  parseRenderedOutputs,
  RattlerBuildEngine,
  type CommandRunner,
  type ProcessResult,
  type RunOptions,
} from '../../../src/engine/rattler-build.js';
import type { EngineRequest, Output, ToolConfiguration } from '../../../src/engine/types.js';
import { createBuildConfiguration } from '../../../src/recipe/build-configuration.js';
import { buildRecipe } from '../../../src/recipe/recipe-builder.js';
import { createLogger } from '../../../src/utils/logger.js';
import { createProject, DEMO_MANIFEST, manifestFrom, removeProject } from '../../helpers/fixtures.js';

const channelConfig = { channelAlias: 'https://conda.anaconda.org/', rootDir: '/work/demo' };
const linux = { platform: 'linux-64' as const, virtualPackages: [] };

const RENDERED = JSON.stringify([
  {
    recipe: {
      package: { name: 'demo', version: '0dev0' },
      build: { string: 'pyh123_0' },
      about: { license: 'BSD-3-Clause', license_family: 'BSD' },
    },
    build_configuration: { target_platform: 'noarch' },
    finalized_dependencies: {
      run: { depends: [{ spec: 'numpy >=1.0' }, 'python >=3.8'], constraints: ['scipy <2'] },
    },
  },
]);

interface Call {
  readonly command: string;
  readonly args: readonly string[];
  readonly options: RunOptions;
}

/** A runner that answers every call with the next queued result. */
function scriptedRunner(results: ProcessResult[], calls: Call[]): CommandRunner {
  return async (command, args, options) => {
    calls.push({ command, args, options });
    const next = results.shift();
    if (next === undefined) throw new Error('unexpected call');
    return next;
  };
}

describe('rattler-build engine', () => {
  let dir = '';
  let output: Output;

  const tool = (overrides: Partial<ToolConfiguration> = {}): ToolConfiguration => ({
    channelConfig,
    testing: false,
    keepBuild: true,
    logger: createLogger('test'),
    ...overrides,
  });

  const request = (overrides: Partial<ToolConfiguration> = {}): EngineRequest => ({
    recipePath: '/tmp/recipe.yaml',
    output,
    tool: tool(overrides),
  });

  before(async () => {
    dir = await createProject({});
    const manifest = manifestFrom(DEMO_MANIFEST);
    const recipe = buildRecipe({ manifest, policy: pythonPolicy, hostPlatform: 'linux-64', buildPlatform: 'linux-64', channelConfig });
    const buildConfiguration = await createBuildConfiguration({
      recipe,
      manifestPath: manifest.path,
      channels: ['https://conda.anaconda.org/conda-forge/'],
      workDirectory: dir,
      hostPlatform: linux,
      buildPlatform: linux,
    });
    output = { recipe, buildConfiguration };
  });

  after(async () => {
    await removeProject(dir);
  });

  describe('buildArguments', () => {
    it('renders with a solve in render mode', () => {
      assert.deepEqual(buildArguments(request(), 'render'), [
        'build',
        '--recipe',
        '/tmp/recipe.yaml',
        '--output-dir',
        dir,
        '--target-platform',
        'noarch',
        '--build-platform',
        'linux-64',
        '--host-platform',
        'linux-64',
        '--package-format',
        'conda',
        '--channel-priority',
        'strict',
        '--channel-alias',
        'https://conda.anaconda.org/',
        '--channel',
        'https://conda.anaconda.org/conda-forge/',
        '--render-only',
        '--with-solve',
      ]);
    });

    it('controls tests and build retention in build mode', () => {
      assert.deepEqual(buildArguments(request(), 'build').slice(-3), ['--test', 'skip', '--keep-build']);
      assert.deepEqual(buildArguments(request({ testing: true, keepBuild: false }), 'build').slice(-2), ['--test', 'native']);
    });
  });

  describe('parseRenderedOutputs', () => {
    it('reads identity and finalized dependencies', () => {
      const [resolved] = parseRenderedOutputs(RENDERED, output);
      assert.equal(resolved?.name, 'demo');
      assert.equal(resolved?.version, '0dev0');
      assert.equal(resolved?.buildString, 'pyh123_0');
      assert.equal(resolved?.subdir, 'noarch');
      assert.equal(resolved?.licenseFamily, 'BSD');
      assert.deepEqual(resolved?.finalizedDependencies.run, {
        depends: ['numpy >=1.0', 'python >=3.8'],
        constraints: ['scipy <2'],
      });
    });

    it('falls back to the requested output', () => {
      const [resolved] = parseRenderedOutputs('[{}]', output);
      assert.equal(resolved?.name, 'demo');
      assert.equal(resolved?.version, '0dev0');
      assert.equal(resolved?.buildString, computeBuildString(output.buildConfiguration.hash, 0));
      assert.equal(resolved?.subdir, 'noarch');
      assert.equal(resolved?.licenseFamily, undefined);
      assert.deepEqual(resolved?.finalizedDependencies.run, { depends: [], constraints: [] });
    });

    it('rejects output that is not a JSON list', () => {
      const isInvalid = (error: unknown): boolean =>
        isDiagnosticError(error) && error.code === DiagnosticCode.E002_EngineOutputInvalid;
      assert.throws(() => parseRenderedOutputs('not json', output), isInvalid);
      assert.throws(() => parseRenderedOutputs('{"a":1}', output), isInvalid);
    });
  });

  describe('engineEnvironment', () => {
    it('is empty without virtual packages or a cache directory', () => {
      assert.deepEqual(engineEnvironment(request()), {});
    });

    it('carries the cache directory', () => {
      assert.deepEqual(engineEnvironment(request({ cacheDir: '/tmp/rattler-cache' })), {
        RATTLER_CACHE_DIR: '/tmp/rattler-cache',
      });
    });
  });

  describe('RattlerBuildEngine', () => {
    it('resolves dependencies with the configured executable', async () => {
      const calls: Call[] = [];
      const engine = new RattlerBuildEngine('rb-test', scriptedRunner([{ code: 0, stdout: RENDERED, stderr: '' }], calls));

      const resolved = await engine.resolveDependencies(request());
      assert.equal(resolved.buildString, 'pyh123_0');
      assert.equal(calls.length, 1);
      assert.equal(calls[0]?.command, 'rb-test');
      assert.ok(calls[0]?.args.includes('--render-only'));
      assert.equal(calls[0]?.options.env, undefined);
    });

    it('passes the cache directory through the environment', async () => {
      const calls: Call[] = [];
      const engine = new RattlerBuildEngine('rb-test', scriptedRunner([{ code: 0, stdout: RENDERED, stderr: '' }], calls));
      await engine.resolveDependencies(request({ cacheDir: '/tmp/rattler-cache' }));
      assert.equal(calls[0]?.options.env?.RATTLER_CACHE_DIR, '/tmp/rattler-cache');
    });

    it('hands the virtual packages of the request to rattler-build', async () => {
      const calls: Call[] = [];
      const engine = new RattlerBuildEngine('rb-test', scriptedRunner([{ code: 0, stdout: RENDERED, stderr: '' }], calls));
      const withVirtualPackages: Output = {
        ...output,
        buildConfiguration: {
          ...output.buildConfiguration,
          hostPlatform: { platform: 'linux-64', virtualPackages: [{ name: '__glibc', version: '2.17', buildString: '0' }] },
          buildPlatform: {
            platform: 'linux-64',
            virtualPackages: [
              { name: '__glibc', version: '2.28', buildString: '0' },
              { name: '__cuda', version: '12.0', buildString: '0' },
            ],
          },
        },
      };

      await engine.resolveDependencies({ ...request(), output: withVirtualPackages });
      const env = calls[0]?.options.env;
      assert.equal(env?.CONDA_OVERRIDE_GLIBC, '2.17');
      assert.equal(env?.CONDA_OVERRIDE_CUDA, '12.0');
    });

    it('reports a failing run with the end of stderr', async () => {
      const engine = new RattlerBuildEngine(
        'rb-test',
        scriptedRunner([{ code: 1, stdout: '', stderr: 'resolving\nerror: nothing provides foo\n' }], [])
      );
      await assert.rejects(engine.resolveDependencies(request()), error => {
        assert.ok(isDiagnosticError(error));
        assert.equal(error.code, DiagnosticCode.E001_EngineFailed);
        assert.equal(error.message, 'rb-test exited with status 1');
        assert.equal(error.diagnostic.help, 'resolving\nerror: nothing provides foo');
        return true;
      });
    });

    it('reports an executable that cannot be started', async () => {
      const missing = Object.assign(new Error('spawn rb-test ENOENT'), { code: 'ENOENT' });
      const engine = new RattlerBuildEngine('rb-test', async () => {
        throw missing;
      });
      await assert.rejects(engine.resolveDependencies(request()), error => {
        assert.ok(isDiagnosticError(error));
        assert.equal(error.message, 'failed to start rb-test');
        assert.equal(error.cause, missing);
        return true;
      });
    });

    it('builds and locates the produced archive', async () => {
      await mkdir(join(dir, 'noarch'), { recursive: true });
      await writeFile(join(dir, 'noarch', 'demo-0dev0-pyh123_0.conda'), '');
      const calls: Call[] = [];
      const engine = new RattlerBuildEngine(
        'rb-test',
        scriptedRunner(
          [
            { code: 0, stdout: RENDERED, stderr: '' },
            { code: 0, stdout: '', stderr: '' },
          ],
          calls
        )
      );

      const built = await engine.build(request());
      assert.equal(built.packagePath, join(dir, 'noarch', 'demo-0dev0-pyh123_0.conda'));
      assert.equal(built.output.name, 'demo');
      assert.deepEqual(
        calls.map(call => call.args.includes('--render-only')),
        [true, false]
      );
    });

    it('reports E003 when no archive was produced', async () => {
      const rendered = RENDERED.replace('pyh123_0', 'pyh999_0').replace('"noarch"', '"linux-64"');
      const engine = new RattlerBuildEngine(
        'rb-test',
        scriptedRunner(
          [
            { code: 0, stdout: rendered, stderr: '' },
            { code: 0, stdout: '', stderr: '' },
          ],
          []
        )
      );
      await assert.rejects(
        engine.build(request()),
        error => isDiagnosticError(error) && error.code === DiagnosticCode.E003_PackageArchiveMissing
      );
    });
  });
});
