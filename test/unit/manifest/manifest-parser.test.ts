import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { join } from 'node:path';

import { DiagnosticCode, isDiagnosticError, type Diagnostic } from '../../../src/diagnostics/diagnostics.js';
import {
  loadManifest,
  parseDependencySpec,
  parseManifest,
  parseManifestContent,
  resolveManifestPath,
} from '../../../src/manifest/manifest-parser.js';
import { versionOrDefault } from '../../../src/manifest/manifest-ext.js';
import { createProject, DEMO_MANIFEST, manifestFrom, removeProject } from '../../helpers/fixtures.js';

const PATH = '/work/demo/pixi.toml';

function diagnosticsOf(toml: string): Diagnostic[] {
  const result = parseManifestContent(toml, PATH);
  assert.ok(Array.isArray(result), 'expected diagnostics');
  return result;
}

function codesOf(toml: string): DiagnosticCode[] {
  return diagnosticsOf(toml).map(diagnostic => diagnostic.code);
}

describe('parseManifestContent', () => {
  it('reads project metadata and dependencies', () => {
    const manifest = manifestFrom(DEMO_MANIFEST, PATH);
    assert.equal(manifest.path, PATH);
    assert.equal(manifest.root, '/work/demo');
    assert.equal(manifest.project.name, 'demo');
    assert.equal(manifest.project.version, undefined);
    assert.deepEqual(manifest.project.channels, ['conda-forge']);
    assert.deepEqual(manifest.project.platforms, ['linux-64', 'osx-arm64', 'win-64']);
    assert.deepEqual(manifest.defaultFeature.dependencies.run.get('numpy'), { kind: 'version', version: '>=1.0' });
    assert.equal(manifest.defaultFeature.dependencies.host.size, 0);
  });

  it('stores a constraint that mixes and with or as declared', () => {
    const manifest = manifestFrom(`${DEMO_MANIFEST}scipy = ">=1,<2|>=3"\n`);
    assert.deepEqual(manifest.defaultFeature.dependencies.run.get('scipy'), { kind: 'version', version: '>=1,<2|>=3' });
  });

  it('defaults the version to 0dev0', () => {
    assert.equal(versionOrDefault(manifestFrom(DEMO_MANIFEST)), '0dev0');
  });

  it('reads about fields', () => {
    const manifest = manifestFrom(`
[project]
name = "demo"
version = "1.2.0"
description = "A demo package"
license = "MIT"
license-file = "LICENSE"
homepage = "https://example.test"
channels = []
platforms = []
`);
    assert.equal(manifest.project.version, '1.2.0');
    assert.equal(manifest.project.description, 'A demo package');
    assert.equal(manifest.project.license, 'MIT');
    assert.equal(manifest.project.licenseFile, 'LICENSE');
    assert.equal(manifest.project.homepage, 'https://example.test');
  });

  it('reads detailed, git and target dependencies', () => {
    const manifest = manifestFrom(`
[project]
name = "demo"
channels = ["conda-forge"]
platforms = ["linux-64", "win-64"]

[host-dependencies]
pytest = { version = ">=7", channel = "conda-forge", build = "py*" }
mylib = { git = "https://example.test/mylib.git", rev = "abc123" }

[target.linux-64.host-dependencies]
openssl = "3.*"

[target.win.dependencies]
pywin32 = "*"

[feature.test.dependencies]
pytest-cov = "*"
`);
    const host = manifest.defaultFeature.dependencies.host;
    assert.deepEqual(host.get('pytest'), { kind: 'detailed', version: '>=7', build: 'py*', channel: 'conda-forge' });
    assert.deepEqual(host.get('mylib'), { kind: 'git', git: 'https://example.test/mylib.git', rev: 'abc123' });

    const selectors = manifest.defaultFeature.targets.map(target => target.selector);
    assert.deepEqual(selectors, ['linux-64', 'win']);
    assert.deepEqual(manifest.defaultFeature.targets[0]?.dependencies.host.get('openssl'), { kind: 'version', version: '3.*' });
    assert.deepEqual(manifest.defaultFeature.targets[1]?.dependencies.run.get('pywin32'), { kind: 'version', version: '*' });

    assert.deepEqual([...manifest.features.keys()], ['test']);
  });

  it('reports TOML syntax errors as M001', () => {
    assert.deepEqual(codesOf('[project\nname = "demo"'), [DiagnosticCode.M001_ManifestParseError]);
  });

  it('reports a missing [project] table', () => {
    const [diagnostic] = diagnosticsOf('[dependencies]\nnumpy = "*"\n');
    assert.equal(diagnostic?.code, DiagnosticCode.M008_ManifestSchemaViolation);
    assert.equal(diagnostic?.message, "missing required field 'project' at /");
  });

  it('reports unknown fields of a dependency table', () => {
    const codes = codesOf(`
[project]
name = "demo"
channels = []
platforms = []

[dependencies]
numpy = { versoin = "1.0" }
`);
    assert.ok(codes.includes(DiagnosticCode.M007_UnknownManifestField));
  });

  it('checks names, versions, platforms and selectors', () => {
    const codes = codesOf(`
[project]
name = "Bad Name"
version = "v1"
channels = ["conda-forge"]
platforms = ["linux-64", "amiga"]

[target.beos.dependencies]
numpy = "*"
`);
    assert.deepEqual(codes, [
      DiagnosticCode.M003_InvalidPackageName,
      DiagnosticCode.M004_InvalidVersion,
      DiagnosticCode.P001_UnknownPlatform,
      DiagnosticCode.M006_InvalidTargetSelector,
    ]);
  });

  it('reports invalid version constraints as M005', () => {
    const [diagnostic] = diagnosticsOf(`
[project]
name = "demo"
channels = []
platforms = []

[dependencies]
numpy = ">=1.0 <2"
`);
    assert.equal(diagnostic?.code, DiagnosticCode.M005_InvalidDependencySpec);
    assert.equal(diagnostic?.message, "invalid version constraint '>=1.0 <2' for dependency 'numpy'");
  });

  it('reports invalid channels as P002', () => {
    const codes = codesOf(`
[project]
name = "demo"
channels = ["not a channel"]
platforms = []
`);
    assert.deepEqual(codes, [DiagnosticCode.P002_InvalidChannel]);
  });
});

describe('parseDependencySpec', () => {
  it('rejects more than one source', () => {
    assert.throws(
      () => parseDependencySpec('lib', { path: '../lib', git: 'https://example.test/lib.git' }),
      /combines path and git; only one source may be given/
    );
  });

  it('keeps url hashes', () => {
    assert.deepEqual(parseDependencySpec('bar', { url: 'https://example.test/bar-1.0-0.conda', sha256: 'abc' }), {
      kind: 'url',
      url: 'https://example.test/bar-1.0-0.conda',
      sha256: 'abc',
    });
  });
});

describe('loading from disk', () => {
  let dir = '';

  before(async () => {
    dir = await createProject({ 'pixi.toml': DEMO_MANIFEST, 'broken/pixi.toml': '[project]\nversion = "v1"\nchannels = []\nplatforms = ["amiga"]\n' });
  });

  after(async () => {
    await removeProject(dir);
  });

  it('accepts the project directory instead of the file', () => {
    assert.equal(resolveManifestPath(dir), join(dir, 'pixi.toml'));
    assert.equal(loadManifest(dir).project.name, 'demo');
  });

  it('reports a missing manifest as M002', () => {
    const result = parseManifest(join(dir, 'missing.toml'));
    assert.ok(Array.isArray(result));
    assert.equal(result[0]?.code, DiagnosticCode.M002_ManifestFileNotFound);
  });

  it('raises the first problem and lists the rest in help', () => {
    try {
      loadManifest(join(dir, 'broken'));
      assert.fail('loadManifest should throw');
    } catch (error) {
      assert.ok(isDiagnosticError(error));
      assert.equal(error.code, DiagnosticCode.M004_InvalidVersion);
      assert.equal(
        error.diagnostic.help,
        "use a conda version such as '1.2.0'\n1 more problem(s): 'amiga' is not a known platform"
      );
    }
  });
});
