import { readFileSync } from 'node:fs';
import { join } from 'node:path';

import { RattlerBuildEngine } from '../engine/rattler-build.js';
import type { BuildEngine } from '../engine/types.js';
import type { ProjectManifest } from '../manifest/types.js';
import { renderCMakeScript } from '../recipe/build-script.js';
import type { EcosystemPolicy } from '../recipe/policy.js';
import { CondaBuildBackendFactory } from './conda-backend.js';

export const CMAKE_INPUT_GLOBS: readonly string[] = Object.freeze([
  '**/*.{c,cc,cxx,cpp,h,hpp,hxx}',
  '**/*.{cmake,cmake.in}',
  '**/CMakeLists.txt',
]);

const DEFAULT_LANGUAGES: readonly string[] = ['cxx'];

const CMAKE_LANGUAGES = new Set([
  'c',
  'cxx',
  'fortran',
  'cuda',
  'hip',
  'asm',
  'asm_nasm',
  'asm-att',
  'asm_masm',
  'objc',
  'objcxx',
  'swift',
  'csharp',
  'ispc',
]);

const PROJECT_KEYWORDS = new Set(['version', 'description', 'homepage_url', 'languages']);

function tokens(args: string): string[] {
  return args
    .split(/\s+/)
    .map(token => token.replace(/^"|"$/g, ''))
    .filter(token => token !== '');
}

function projectLanguages(args: string[]): string[] {
  const lowered = args.map(arg => arg.toLowerCase());
  const start = lowered.indexOf('languages');
  if (start >= 0) {
    const end = lowered.findIndex((arg, i) => i > start && PROJECT_KEYWORDS.has(arg));
    return lowered.slice(start + 1, end < 0 ? undefined : end);
  }
  // project(<name> <lang>...) without keywords
  if (lowered.slice(1).some(arg => PROJECT_KEYWORDS.has(arg))) return [];
  return lowered.slice(1);
}

/**
 * Languages enabled by a `CMakeLists.txt`, lowercased (`c`, `cxx`, `fortran`,
 * ...), from `project(... LANGUAGES ...)` and `enable_language(...)`.
 */
export function parseCMakeLanguages(content: string): string[] {
  const source = content.replace(/#[^\n]*/g, '');
  const found: string[] = [];

  for (const match of source.matchAll(/\bproject\s*\(([^)]*)\)/gi)) {
    found.push(...projectLanguages(tokens(match[1] ?? '')));
  }
  for (const match of source.matchAll(/\benable_language\s*\(([^)]*)\)/gi)) {
    found.push(...tokens(match[1] ?? '').map(arg => arg.toLowerCase()));
  }

  return [...new Set(found.filter(language => CMAKE_LANGUAGES.has(language)))];
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/** Compiler languages of the project, `cxx` when they cannot be determined. */
export function cmakeLanguages(manifest: ProjectManifest): readonly string[] {
  let content: string;
  try {
    content = readFileSync(join(manifest.root, 'CMakeLists.txt'), 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) return DEFAULT_LANGUAGES;
    throw error;
  }
  const languages = parseCMakeLanguages(content);
  return languages.length > 0 ? languages : DEFAULT_LANGUAGES;
}

/** Native projects configured with CMake and built with Ninja. */
export const cmakePolicy: EcosystemPolicy = {
  name: 'cmake',
  noarch: null,
  platformSpecificDependencies: true,
  requiresSupportedPlatform: true,

  implicitHostPackages: () => ['cmake', 'ninja'],

  renderBuildScript: ({ manifest, buildPlatform }) => renderCMakeScript({ buildPlatform, sourceDir: manifest.root }),

  languages: cmakeLanguages,

  // the build script points cmake at the project directory directly
  source: () => [],

  inputGlobs: () => CMAKE_INPUT_GLOBS,
};

export function cmakeBackendFactory(engine: BuildEngine = new RattlerBuildEngine()): CondaBuildBackendFactory {
  return new CondaBuildBackendFactory(cmakePolicy, engine);
}
