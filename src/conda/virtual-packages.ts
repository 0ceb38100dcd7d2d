/**
 * Virtual packages describe properties of the machine a package is installed
 * on (`__glibc`, `__osx`, `__cuda`, ...). The solver treats them as already
 * installed packages.
 */

import { release } from 'node:os';

import { currentPlatform, isLinux, isOsx, isUnix, isWindows, type Platform } from './platform.js';

export interface GenericVirtualPackage {
  readonly name: string;
  readonly version: string;
  readonly buildString: string;
}

export interface PlatformWithVirtualPackages {
  readonly platform: Platform;
  readonly virtualPackages: readonly GenericVirtualPackage[];
}

/**
 * Values taken from `CONDA_OVERRIDE_*`. `undefined` means "detect", an empty
 * string means "pretend the package is absent".
 */
export interface VirtualPackageOverrides {
  readonly osx?: string;
  readonly glibc?: string;
  readonly cuda?: string;
  readonly archspec?: string;
}

export function overridesFromEnv(env: NodeJS.ProcessEnv = process.env): VirtualPackageOverrides {
  return {
    osx: env.CONDA_OVERRIDE_OSX,
    glibc: env.CONDA_OVERRIDE_GLIBC,
    cuda: env.CONDA_OVERRIDE_CUDA,
    archspec: env.CONDA_OVERRIDE_ARCHSPEC,
  };
}

interface GlibcReportHeader {
  glibcVersionRuntime?: unknown;
}

function hasHeader(report: object): report is { header: GlibcReportHeader } {
  return 'header' in report && typeof report.header === 'object' && report.header !== null;
}

function detectGlibc(): string | undefined {
  const report = process.report?.getReport();
  if (typeof report !== 'object' || report === null || !hasHeader(report)) return undefined;
  const version = report.header.glibcVersionRuntime;
  return typeof version === 'string' ? version : undefined;
}

function kernelVersion(): string {
  // "6.5.0-14-generic" -> "6.5.0"
  const match = /^\d+(\.\d+)*/.exec(release());
  return match ? match[0] : '0';
}

const ARCHSPEC: Readonly<Record<string, string>> = Object.freeze({
  '64': 'x86_64',
  '32': 'x86',
  aarch64: 'aarch64',
  arm64: 'arm64',
  armv6l: 'armv6l',
  armv7l: 'armv7l',
  ppc64le: 'ppc64le',
  ppc64: 'ppc64',
  s390x: 's390x',
  riscv64: 'riscv64',
  riscv32: 'riscv32',
});

export function archspecFor(platform: Platform): string | undefined {
  const arch = platform.slice(platform.indexOf('-') + 1);
  return ARCHSPEC[arch];
}

function pick(override: string | undefined, detected: string | undefined): string | undefined {
  if (override === undefined) return detected;
  return override === '' ? undefined : override;
}

/**
 * Virtual packages of `platform`. Only the running platform is probed for
 * glibc, kernel and macOS versions; other platforms rely on overrides.
 */
export function detectVirtualPackages(
  platform: Platform = currentPlatform(),
  overrides: VirtualPackageOverrides = overridesFromEnv()
): GenericVirtualPackage[] {
  const native = platform === currentPlatform();
  const packages: GenericVirtualPackage[] = [];
  const push = (name: string, version: string, buildString = '0'): void => {
    packages.push({ name, version, buildString });
  };

  if (isUnix(platform)) push('__unix', '0');
  if (isWindows(platform)) push('__win', '0');

  if (isLinux(platform)) {
    push('__linux', native ? kernelVersion() : '0');
    const glibc = pick(overrides.glibc, native ? detectGlibc() : undefined);
    if (glibc !== undefined) push('__glibc', glibc);
  }

  if (isOsx(platform)) {
    const osx = pick(overrides.osx, native ? process.env.MACOSX_DEPLOYMENT_TARGET : undefined);
    if (osx !== undefined) push('__osx', osx);
  }

  const cuda = pick(overrides.cuda, undefined);
  if (cuda !== undefined) push('__cuda', cuda);

  const archspec = pick(overrides.archspec, archspecFor(platform));
  if (archspec !== undefined) push('__archspec', '1', archspec);

  return packages;
}

export function currentPlatformWithVirtualPackages(): PlatformWithVirtualPackages {
  const platform = currentPlatform();
  return { platform, virtualPackages: detectVirtualPackages(platform) };
}

const OVERRIDE_VARIABLES: Readonly<Record<string, string>> = Object.freeze({
  __glibc: 'CONDA_OVERRIDE_GLIBC',
  __osx: 'CONDA_OVERRIDE_OSX',
  __cuda: 'CONDA_OVERRIDE_CUDA',
  __archspec: 'CONDA_OVERRIDE_ARCHSPEC',
});

/**
 * The `CONDA_OVERRIDE_*` variables under which a solver sees `packages`.
 * `__archspec` carries the microarchitecture in its build string.
 */
export function overrideVariables(packages: readonly GenericVirtualPackage[]): Record<string, string> {
  const variables: Record<string, string> = {};
  for (const pkg of packages) {
    const variable: string | undefined = OVERRIDE_VARIABLES[pkg.name];
    if (variable === undefined) continue;
    variables[variable] = pkg.name === '__archspec' ? pkg.buildString : pkg.version;
  }
  return variables;
}

export function formatVirtualPackage(pkg: GenericVirtualPackage): string {
  return `${pkg.name}=${pkg.version}=${pkg.buildString}`;
}
