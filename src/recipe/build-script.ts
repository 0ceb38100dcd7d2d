/**
 * Build script templates. Each renders to an ordered list of shell command
 * lines; the engine runs them with `bash` on unix and `cmd.exe` on windows.
 */

import type { Installer } from './dependencies.js';

export type BuildPlatformClass = 'windows' | 'unix';

export interface PythonScriptContext {
  readonly installer: Installer;
  readonly buildPlatform: BuildPlatformClass;
}

export interface CMakeScriptContext {
  readonly buildPlatform: BuildPlatformClass;
  /** Directory holding the top-level `CMakeLists.txt`. */
  readonly sourceDir: string;
}

const WINDOWS_CHECK = 'if errorlevel 1 exit 1';

export function renderPythonScript({ installer, buildPlatform }: PythonScriptContext): string[] {
  const windows = buildPlatform === 'windows';
  const python = windows ? '%PYTHON%' : '$PYTHON';
  const srcDir = windows ? '%SRC_DIR%' : '$SRC_DIR';

  const install =
    installer === 'uv'
      ? `uv pip install --python ${python} -vv --no-deps --no-build-isolation ${srcDir}`
      : `${python} -m pip install --ignore-installed -vv --no-deps --no-build-isolation ${srcDir}`;

  return windows ? [install, WINDOWS_CHECK] : [install];
}

function quote(path: string, windows: boolean): string {
  if (!/[\s"']/.test(path)) return path;
  return windows ? `"${path}"` : `'${path.replace(/'/g, `'\\''`)}'`;
}

export function renderCMakeScript({ buildPlatform, sourceDir }: CMakeScriptContext): string[] {
  if (buildPlatform === 'windows') {
    const source = quote(sourceDir, true);
    return [
      'cmake %CMAKE_ARGS% -GNinja -DCMAKE_BUILD_TYPE=Release -DCMAKE_INSTALL_PREFIX=%LIBRARY_PREFIX% ' +
        `-DCMAKE_EXPORT_COMPILE_COMMANDS=ON -DBUILD_SHARED_LIBS=ON -B %SRC_DIR%\\..\\build -S ${source}`,
      WINDOWS_CHECK,
      'cmake --build %SRC_DIR%\\..\\build',
      WINDOWS_CHECK,
      'cmake --install %SRC_DIR%\\..\\build',
      WINDOWS_CHECK,
    ];
  }

  const source = quote(sourceDir, false);
  return [
    'cmake $CMAKE_ARGS -GNinja -DCMAKE_BUILD_TYPE=Release -DCMAKE_INSTALL_PREFIX=$PREFIX ' +
      `-DCMAKE_EXPORT_COMPILE_COMMANDS=ON -DBUILD_SHARED_LIBS=ON -B $SRC_DIR/../build -S ${source}`,
    'cmake --build $SRC_DIR/../build',
    'cmake --install $SRC_DIR/../build',
  ];
}
