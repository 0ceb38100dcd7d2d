/**
 * Classification of manifest dependencies into build/host/run sets and their
 * conversion to match specs.
 */

import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';

import { channelToBaseUrl, type ChannelConfig } from '../conda/channel.js';
import { MatchSpec, isAnyVersion, normalizePackageName, type NamelessMatchSpec } from '../conda/match-spec.js';
import { isPlatform, selectorMatches, type Platform } from '../conda/platform.js';
import { DiagnosticBuilder, DiagnosticCode } from '../diagnostics/diagnostics.js';
import { SPEC_TYPES, type DependencySpec, type DependencyTable, type FeatureDependencies, type ProjectManifest } from '../manifest/types.js';

/** The unconstrained specification (`*`). */
export const ANY_VERSION: DependencySpec = Object.freeze({ kind: 'version', version: '*' });

/**
 * Dependencies keyed by normalized package name. Iteration follows insertion
 * order so that rendered recipes are stable.
 */
export class DependencySet {
  private readonly specs: Map<string, DependencySpec>;

  constructor(entries: Iterable<readonly [string, DependencySpec]> = []) {
    this.specs = new Map();
    for (const [name, spec] of entries) this.set(name, spec);
  }

  get size(): number {
    return this.specs.size;
  }

  has(name: string): boolean {
    return this.specs.has(normalizePackageName(name));
  }

  get(name: string): DependencySpec | undefined {
    return this.specs.get(normalizePackageName(name));
  }

  /** Adds or replaces the spec for `name`. */
  set(name: string, spec: DependencySpec): void {
    this.specs.set(normalizePackageName(name), spec);
  }

  names(): string[] {
    return [...this.specs.keys()];
  }

  entries(): IterableIterator<[string, DependencySpec]> {
    return this.specs.entries();
  }

  [Symbol.iterator](): IterableIterator<[string, DependencySpec]> {
    return this.entries();
  }

  clone(): DependencySet {
    return new DependencySet(this.specs);
  }
}

export interface ClassifiedDependencies {
  readonly build: DependencySet;
  readonly host: DependencySet;
  readonly run: DependencySet;
}

function merge(target: DependencySet, table: DependencyTable): void {
  for (const [name, spec] of table) target.set(name, spec);
}

function mergeAll(sets: ClassifiedDependencies, deps: FeatureDependencies): void {
  for (const kind of SPEC_TYPES) merge(sets[kind], deps[kind]);
}

/**
 * Collects the default feature's dependencies for `platform`.
 *
 * Base tables come first, then matching selector tables (`unix`, `linux`,
 * `osx`, `win`) and finally the exact platform table, so later entries
 * override earlier ones. Without a platform only the base tables are used.
 */
export function classifyDependencies(manifest: ProjectManifest, platform: Platform | undefined): ClassifiedDependencies {
  const sets: ClassifiedDependencies = {
    build: new DependencySet(),
    host: new DependencySet(),
    run: new DependencySet(),
  };
  const feature = manifest.defaultFeature;
  mergeAll(sets, feature.dependencies);
  if (platform === undefined) return sets;

  const matching = feature.targets.filter(target => selectorMatches(target.selector, platform));
  for (const target of matching.filter(t => !isPlatform(t.selector))) mergeAll(sets, target.dependencies);
  for (const target of matching.filter(t => isPlatform(t.selector))) mergeAll(sets, target.dependencies);
  return sets;
}

/**
 * Makes sure every tool in `names` is available in the host environment. A
 * tool already in host is left alone; otherwise its run spec is copied, or the
 * unconstrained spec is used.
 */
export function ensureHostPackages(deps: ClassifiedDependencies, names: readonly string[]): void {
  for (const name of names) {
    if (deps.host.has(name)) continue;
    deps.host.set(name, deps.run.get(name) ?? ANY_VERSION);
  }
}

export type Installer = 'pip' | 'uv';

/** `uv` when the project depends on it anywhere, `pip` otherwise. */
export function selectInstaller(deps: ClassifiedDependencies): Installer {
  return deps.build.has('uv') || deps.host.has('uv') || deps.run.has('uv') ? 'uv' : 'pip';
}

const ARCHIVE_SUFFIXES = ['.conda', '.tar.bz2'];

export function isPackageArchive(location: string): boolean {
  const lower = location.toLowerCase().split(/[?#]/)[0] ?? '';
  return ARCHIVE_SUFFIXES.some(suffix => lower.endsWith(suffix));
}

/** `true` for specs that must be built from source rather than fetched. */
export function isSourceSpec(spec: DependencySpec): boolean {
  switch (spec.kind) {
    case 'git':
      return true;
    case 'path':
      return !isPackageArchive(spec.path);
    case 'url':
      return !isPackageArchive(spec.url);
    default:
      return false;
  }
}

/**
 * Converts dependency sets into match specs.
 *
 * ```typescript
 * const specs = new MatchSpecExtractor(channelConfig).withIgnoreSelf(true).extract(deps.host);
 * ```
 */
export class MatchSpecExtractor {
  constructor(
    private readonly channelConfig: ChannelConfig,
    private readonly ignoreSelf: boolean = false
  ) {}

  /** Drop path dependencies that point at the project itself. */
  withIgnoreSelf(ignoreSelf: boolean): MatchSpecExtractor {
    return new MatchSpecExtractor(this.channelConfig, ignoreSelf);
  }

  extract(dependencies: DependencySet): MatchSpec[] {
    const specs: MatchSpec[] = [];
    for (const [name, spec] of dependencies) {
      if (isSourceSpec(spec)) {
        if (this.ignoreSelf && this.pointsAtRoot(spec)) continue;
        DiagnosticBuilder.error(DiagnosticCode.D001_RecursiveSourceDependency)
          .withMessage(`recursive source dependencies are not yet supported: '${name}'`)
          .withHelp('depend on a released package, or a package archive, instead')
          .throw();
      }
      specs.push(MatchSpec.fromNameless(this.toNameless(spec), name));
    }
    return specs;
  }

  private pointsAtRoot(spec: DependencySpec): boolean {
    if (spec.kind !== 'path') return false;
    const root = resolve(this.channelConfig.rootDir);
    return resolve(root, spec.path) === root;
  }

  private toNameless(spec: DependencySpec): NamelessMatchSpec {
    switch (spec.kind) {
      case 'version':
        return isAnyVersion(spec.version) ? {} : { version: spec.version };
      case 'detailed': {
        const { kind: _kind, channel, version, ...rest } = spec;
        return {
          ...rest,
          ...(isAnyVersion(version) ? {} : { version }),
          ...(channel === undefined ? {} : { channel: channelToBaseUrl(channel, this.channelConfig) }),
        };
      }
      case 'path':
        return { url: pathToFileURL(resolve(this.channelConfig.rootDir, spec.path)).href };
      case 'url':
        return {
          url: spec.url,
          ...(spec.md5 === undefined ? {} : { md5: spec.md5 }),
          ...(spec.sha256 === undefined ? {} : { sha256: spec.sha256 }),
        };
      case 'git':
        return DiagnosticBuilder.error(DiagnosticCode.D001_RecursiveSourceDependency)
          .withMessage(`git dependencies cannot be converted to a match spec: ${spec.git}`)
          .throw();
    }
  }
}
