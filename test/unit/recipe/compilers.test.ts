import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { compilerPackage, defaultCompiler } from '../../../src/recipe/compilers.js';

describe('defaultCompiler', () => {
  it('picks the native toolchain of the platform', () => {
    assert.equal(defaultCompiler('linux-64', 'c'), 'gcc');
    assert.equal(defaultCompiler('linux-aarch64', 'cxx'), 'gxx');
    assert.equal(defaultCompiler('osx-arm64', 'cxx'), 'clangxx');
    assert.equal(defaultCompiler('osx-64', 'c'), 'clang');
    assert.equal(defaultCompiler('win-64', 'cxx'), 'vs2017');
    assert.equal(defaultCompiler('emscripten-wasm32', 'c'), 'emscripten');
  });

  it('uses gfortran everywhere', () => {
    assert.equal(defaultCompiler('win-64', 'fortran'), 'gfortran');
    assert.equal(defaultCompiler('osx-arm64', 'Fortran'), 'gfortran');
  });

  it('passes other languages through', () => {
    assert.equal(defaultCompiler('linux-64', 'cuda'), 'cuda');
  });
});

describe('compilerPackage', () => {
  it('appends the platform', () => {
    assert.equal(compilerPackage('linux-64', 'cxx'), 'gxx_linux-64');
    assert.equal(compilerPackage('win-64', 'c'), 'vs2017_win-64');
  });
});
