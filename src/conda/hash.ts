import { createHash } from 'node:crypto';

/** How a package is noarch, if at all. */
export type NoArchKind = 'python' | 'generic' | null;

export interface HashInfo {
  /** `h` followed by seven hex digits of the variant digest. */
  readonly hash: string;
  /** `py` for noarch python packages, empty otherwise. */
  readonly prefix: string;
}

export type Variant = Readonly<Record<string, string>>;

function canonicalVariant(variant: Variant): string {
  const sorted: Record<string, string> = {};
  for (const key of Object.keys(variant).sort()) {
    sorted[key] = variant[key] ?? '';
  }
  return JSON.stringify(sorted);
}

export function hashInfoFromVariant(variant: Variant, noarch: NoArchKind): HashInfo {
  const digest = createHash('sha1').update(canonicalVariant(variant)).digest('hex');
  return {
    hash: `h${digest.slice(0, 7)}`,
    prefix: noarch === 'python' ? 'py' : '',
  };
}

export function computeBuildString(hash: HashInfo, buildNumber: number): string {
  return `${hash.prefix}${hash.hash}_${buildNumber}`;
}
