import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import * as fc from 'fast-check';

import { MatchSpec } from '../../src/conda/match-spec.js';
import type { DependencySpec } from '../../src/manifest/types.js';
import {
  ANY_VERSION,
  DependencySet,
  ensureHostPackages,
  isSourceSpec,
  MatchSpecExtractor,
  type ClassifiedDependencies,
} from '../../src/recipe/dependencies.js';

const packageName = fc.constantFrom('numpy', 'pip', 'python', 'uv', 'scipy', 'cmake', 'ninja');
const versionSpec = fc
  .constantFrom('*', '>=1.0', '3.*', '==2.1')
  .map((version): DependencySpec => ({ kind: 'version', version }));
const dependencySet = fc
  .array(fc.tuple(packageName, versionSpec), { maxLength: 6 })
  .map(entries => new DependencySet(entries));
const classified = fc.record({ build: dependencySet, host: dependencySet, run: dependencySet });
const toolNames = fc.uniqueArray(packageName, { maxLength: 4 });

function copy(deps: ClassifiedDependencies): ClassifiedDependencies {
  return { build: deps.build.clone(), host: deps.host.clone(), run: deps.run.clone() };
}

function entriesOf(set: DependencySet): [string, DependencySpec][] {
  return [...set.entries()];
}

const channelConfig = { channelAlias: 'https://conda.anaconda.org/', rootDir: '/work/demo' };

describe('dependency classification properties', () => {
  it('ensureHostPackages is idempotent', () => {
    fc.assert(
      fc.property(classified, toolNames, (generated, names) => {
        const once = copy(generated);
        ensureHostPackages(once, names);
        const twice = copy(once);
        ensureHostPackages(twice, names);
        assert.deepEqual(entriesOf(twice.host), entriesOf(once.host));
      })
    );
  });

  it('ensureHostPackages only adds, taking the run spec when there is one', () => {
    fc.assert(
      fc.property(classified, toolNames, (generated, names) => {
        const deps = copy(generated);
        ensureHostPackages(deps, names);

        for (const [name, spec] of generated.host) assert.deepEqual(deps.host.get(name), spec);
        for (const name of names) {
          const expected = generated.host.get(name) ?? generated.run.get(name) ?? ANY_VERSION;
          assert.deepEqual(deps.host.get(name), expected);
        }
        assert.deepEqual(entriesOf(deps.run), entriesOf(generated.run));
        assert.deepEqual(entriesOf(deps.build), entriesOf(generated.build));
      })
    );
  });

  it('treats names case-insensitively', () => {
    fc.assert(
      fc.property(packageName, versionSpec, (name, spec) => {
        const set = new DependencySet([[name.toUpperCase(), spec]]);
        assert.equal(set.has(name), true);
        assert.deepEqual(set.names(), [name]);
      })
    );
  });

  it('extracts one match spec per binary dependency, in order', () => {
    fc.assert(
      fc.property(dependencySet, set => {
        const specs = new MatchSpecExtractor(channelConfig).withIgnoreSelf(true).extract(set);
        assert.deepEqual(
          specs.map(spec => spec.name),
          set.names()
        );
        assert.ok(specs.every(spec => spec instanceof MatchSpec));
      })
    );
  });

  it('never treats a version spec as a source dependency', () => {
    fc.assert(fc.property(versionSpec, spec => !isSourceSpec(spec)));
  });
});
