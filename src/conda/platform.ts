/**
 * Conda platform identifiers (the `subdir` of a channel) and helpers to classify
 * them.
 */

import { DiagnosticBuilder, DiagnosticCode } from '../diagnostics/diagnostics.js';

export const KNOWN_PLATFORMS = [
  'noarch',
  'linux-32',
  'linux-64',
  'linux-aarch64',
  'linux-armv6l',
  'linux-armv7l',
  'linux-ppc64le',
  'linux-ppc64',
  'linux-s390x',
  'linux-riscv32',
  'linux-riscv64',
  'osx-64',
  'osx-arm64',
  'win-32',
  'win-64',
  'win-arm64',
  'emscripten-wasm32',
  'wasi-wasm32',
  'zos-z',
] as const;

export type Platform = (typeof KNOWN_PLATFORMS)[number];

/** Selectors accepted as keys of a manifest `target` table besides exact platforms. */
export const PLATFORM_SELECTORS = ['unix', 'linux', 'osx', 'win'] as const;

export type PlatformSelector = (typeof PLATFORM_SELECTORS)[number];

const PLATFORM_SET: ReadonlySet<string> = new Set(KNOWN_PLATFORMS);
const SELECTOR_SET: ReadonlySet<string> = new Set(PLATFORM_SELECTORS);

export function isPlatform(value: string): value is Platform {
  return PLATFORM_SET.has(value);
}

export function isPlatformSelector(value: string): value is PlatformSelector {
  return SELECTOR_SET.has(value);
}

export function parsePlatform(value: string): Platform {
  const normalized = value.trim().toLowerCase();
  if (isPlatform(normalized)) return normalized;
  return DiagnosticBuilder.error(DiagnosticCode.P001_UnknownPlatform)
    .withMessage(`'${value}' is not a known platform`)
    .withHelp(`valid platforms are: ${KNOWN_PLATFORMS.join(', ')}`)
    .throw();
}

export function isWindows(platform: Platform): boolean {
  return platform.startsWith('win-');
}

export function isOsx(platform: Platform): boolean {
  return platform.startsWith('osx-');
}

export function isLinux(platform: Platform): boolean {
  return platform.startsWith('linux-');
}

export function isUnix(platform: Platform): boolean {
  return isLinux(platform) || isOsx(platform) || platform === 'emscripten-wasm32' || platform === 'wasi-wasm32';
}

/** `true` when a `target.<selector>` table applies to the platform. */
export function selectorMatches(selector: Platform | PlatformSelector, platform: Platform): boolean {
  switch (selector) {
    case 'unix':
      return isUnix(platform);
    case 'linux':
      return isLinux(platform);
    case 'osx':
      return isOsx(platform);
    case 'win':
      return isWindows(platform);
    default:
      return selector === platform;
  }
}

const ARCH_SUFFIX: Readonly<Record<string, string>> = Object.freeze({
  x64: '64',
  ia32: '32',
  arm64: 'arm64',
  arm: 'armv7l',
  ppc64: 'ppc64le',
  s390x: 's390x',
  riscv64: 'riscv64',
});

/**
 * The platform of the running process. Falls back to `noarch` when Node reports
 * a combination conda has no subdir for.
 */
export function currentPlatform(
  nodePlatform: NodeJS.Platform = process.platform,
  nodeArch: string = process.arch
): Platform {
  const os = nodePlatform === 'darwin' ? 'osx' : nodePlatform === 'win32' ? 'win' : nodePlatform === 'linux' ? 'linux' : null;
  if (os === null) return 'noarch';

  let arch = ARCH_SUFFIX[nodeArch];
  if (arch === undefined) return 'noarch';
  if (os === 'linux' && arch === 'arm64') arch = 'aarch64';

  const candidate = `${os}-${arch}`;
  return isPlatform(candidate) ? candidate : 'noarch';
}
