/**
 * A thin model of conda match specs.
 *
 * The version and build expressions are kept as opaque strings; only a shallow
 * syntax check is applied so that obviously broken constraints are reported
 * against the dependency that declared them.
 */

import { DiagnosticBuilder, DiagnosticCode } from '../diagnostics/diagnostics.js';

/** A match spec without a package name, as declared next to a dependency. */
export interface NamelessMatchSpec {
  readonly version?: string;
  readonly build?: string;
  readonly buildNumber?: string;
  /** Base URL of the channel the package must come from. */
  readonly channel?: string;
  readonly subdir?: string;
  readonly md5?: string;
  readonly sha256?: string;
  /** Direct URL of a package archive. */
  readonly url?: string;
}

const PACKAGE_NAME = /^[a-z0-9_][a-z0-9_.-]*$/;
const VERSION_TERM = /^(==|!=|>=|<=|~=|>|<|=)?\s*[0-9A-Za-z_.*+!]+$/;

export function normalizePackageName(name: string): string {
  return name.trim().toLowerCase();
}

export function isValidPackageName(name: string): boolean {
  return PACKAGE_NAME.test(name);
}

/** `true` for the "any version" constraint. */
export function isAnyVersion(version: string | undefined): boolean {
  return version === undefined || version.trim() === '' || version.trim() === '*';
}

/**
 * Checks a version constraint such as `>=1.0,<2`, `1.2.*` or `3.11|3.12` and
 * returns it with surrounding whitespace removed.
 */
export function parseVersionSpec(raw: string, packageName: string): string {
  const spec = raw.trim();
  if (isAnyVersion(spec)) return '*';

  // `|` binds looser than `,`
  const alternatives = spec.split('|').map(alternative => alternative.split(',').map(term => term.trim()));
  const valid = alternatives.every(terms => terms.every(term => VERSION_TERM.test(term)));
  if (!valid) {
    DiagnosticBuilder.error(DiagnosticCode.D002_InvalidMatchSpec)
      .withMessage(`invalid version constraint '${raw}' for dependency '${packageName}'`)
      .withHelp("use a conda version constraint such as '>=1.2', '1.2.*' or '>=1,<2'")
      .throw();
  }
  return alternatives.map(terms => terms.join(',')).join('|');
}

export class MatchSpec {
  readonly name: string;
  readonly spec: NamelessMatchSpec;

  constructor(name: string, spec: NamelessMatchSpec = {}) {
    const normalized = normalizePackageName(name);
    if (!isValidPackageName(normalized)) {
      DiagnosticBuilder.error(DiagnosticCode.D002_InvalidMatchSpec)
        .withMessage(`'${name}' is not a valid package name`)
        .throw();
    }
    this.name = normalized;
    this.spec = Object.freeze({ ...spec });
  }

  static fromNameless(spec: NamelessMatchSpec, name: string): MatchSpec {
    return new MatchSpec(name, spec);
  }

  /**
   * Renders the conda string form: `[channel[/subdir]::]name[ version[ build]][key=value, ...]`.
   */
  toString(): string {
    const { version, build, buildNumber, channel, subdir, md5, sha256, url } = this.spec;
    let out = '';
    if (channel !== undefined) {
      const base = channel.endsWith('/') ? channel.slice(0, -1) : channel;
      out += subdir !== undefined ? `${base}/${subdir}::` : `${base}::`;
    }
    out += this.name;

    const hasVersion = !isAnyVersion(version);
    if (hasVersion || build !== undefined) {
      out += ` ${hasVersion && version !== undefined ? version.trim() : '*'}`;
    }
    if (build !== undefined) {
      out += ` ${build}`;
    }

    const brackets: string[] = [];
    if (buildNumber !== undefined) brackets.push(`build_number="${buildNumber}"`);
    if (channel === undefined && subdir !== undefined) brackets.push(`subdir="${subdir}"`);
    if (md5 !== undefined) brackets.push(`md5="${md5}"`);
    if (sha256 !== undefined) brackets.push(`sha256="${sha256}"`);
    if (url !== undefined) brackets.push(`url="${url}"`);
    if (brackets.length > 0) out += `[${brackets.join(', ')}]`;

    return out;
  }

  toJSON(): string {
    return this.toString();
  }
}
