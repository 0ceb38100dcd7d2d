import type { MatchSpec } from '../conda/match-spec.js';
import type { NoArchKind } from '../conda/hash.js';

export interface PathSource {
  readonly kind: 'path';
  readonly path: string;
  readonly useGitignore: boolean;
}

export interface GitSource {
  readonly kind: 'git';
  readonly url: string;
  readonly rev?: string;
}

export interface UrlSource {
  readonly kind: 'url';
  readonly url: string;
  readonly sha256?: string;
}

export type RecipeSource = PathSource | GitSource | UrlSource;

export interface RecipeBuild {
  readonly number: number;
  /** Explicit build string; derived from the hash when absent. */
  readonly string?: string;
  readonly script: readonly string[];
  readonly noarch: NoArchKind;
}

export interface Requirements {
  readonly build: readonly MatchSpec[];
  readonly host: readonly MatchSpec[];
  readonly run: readonly MatchSpec[];
}

export interface About {
  readonly summary?: string;
  readonly license?: string;
  readonly licenseFile?: string;
  readonly homepage?: string;
  readonly repository?: string;
  readonly documentation?: string;
}

/** A canonical conda recipe for a single output. */
export interface Recipe {
  readonly schemaVersion: 1;
  readonly package: { readonly name: string; readonly version: string };
  readonly source: readonly RecipeSource[];
  readonly build: RecipeBuild;
  readonly requirements: Requirements;
  readonly about: About;
}
