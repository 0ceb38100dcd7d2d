import { isOsx, isWindows, type Platform } from '../conda/platform.js';

type NativeLanguage = 'c' | 'cxx';

interface CompilerRow {
  readonly matches: (platform: Platform) => boolean;
  readonly compilers: Readonly<Record<NativeLanguage, string>>;
}

// First matching row wins.
const NATIVE_COMPILERS: readonly CompilerRow[] = Object.freeze([
  { matches: isWindows, compilers: { c: 'vs2017', cxx: 'vs2017' } },
  { matches: isOsx, compilers: { c: 'clang', cxx: 'clangxx' } },
  { matches: (platform: Platform) => platform === 'emscripten-wasm32', compilers: { c: 'emscripten', cxx: 'emscripten' } },
  { matches: () => true, compilers: { c: 'gcc', cxx: 'gxx' } },
]);

/** Compilers that do not depend on the platform. */
const PLATFORM_AGNOSTIC: Readonly<Record<string, string>> = Object.freeze({ fortran: 'gfortran' });

function isNativeLanguage(language: string): language is NativeLanguage {
  return language === 'c' || language === 'cxx';
}

/**
 * Name stem of the compiler package for `language` on `platform`, e.g. `gxx`
 * for C++ on linux. Languages without an entry are their own compiler name.
 */
export function defaultCompiler(platform: Platform, language: string): string {
  const lang = language.toLowerCase();
  const agnostic = PLATFORM_AGNOSTIC[lang];
  if (agnostic !== undefined) return agnostic;
  if (!isNativeLanguage(lang)) return lang;

  const row = NATIVE_COMPILERS.find(candidate => candidate.matches(platform));
  return row ? row.compilers[lang] : lang;
}

/** The build requirement for a compiler, `<stem>_<platform>`. */
export function compilerPackage(platform: Platform, language: string): string {
  return `${defaultCompiler(platform, language)}_${platform}`;
}
