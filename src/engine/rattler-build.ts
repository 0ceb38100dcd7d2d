/**
 * {@link BuildEngine} backed by the `rattler-build` executable.
 */

import { spawn } from 'node:child_process';
import { readdir } from 'node:fs/promises';
import { join } from 'node:path';

import { computeBuildString } from '../conda/hash.js';
import { overrideVariables } from '../conda/virtual-packages.js';
import { ConfigService } from '../config/config-service.js';
import { DiagnosticBuilder, DiagnosticCode } from '../diagnostics/diagnostics.js';
import type { Logger } from '../utils/logger.js';
import type {
  BuildEngine,
  BuiltPackage,
  EngineRequest,
  FinalizedRunDependencies,
  Output,
  ResolvedOutput,
} from './types.js';

export interface ProcessResult {
  readonly code: number | null;
  readonly stdout: string;
  readonly stderr: string;
}

export interface RunOptions {
  readonly logger: Logger;
  readonly env?: NodeJS.ProcessEnv;
}

export type CommandRunner = (command: string, args: readonly string[], options: RunOptions) => Promise<ProcessResult>;

const STDERR_TAIL_LINES = 20;

/** Runs a command without a shell, forwarding its stderr to the debug log line by line. */
export const spawnCommand: CommandRunner = (command, args, { logger, env }) =>
  new Promise<ProcessResult>((resolve, reject) => {
    const child = spawn(command, [...args], { stdio: ['ignore', 'pipe', 'pipe'], shell: false, env: env ?? process.env });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let pending = '';

    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => {
      stderr.push(chunk);
      const lines = (pending + chunk.toString('utf-8')).split('\n');
      pending = lines.pop() ?? '';
      for (const line of lines) if (line.trim() !== '') logger.debug(line);
    });
    child.on('error', reject);
    child.on('close', code => {
      if (pending.trim() !== '') logger.debug(pending);
      resolve({
        code,
        stdout: Buffer.concat(stdout).toString('utf-8'),
        stderr: Buffer.concat(stderr).toString('utf-8'),
      });
    });
  });

export type EngineMode = 'render' | 'build';

/**
 * Variables added to the environment of rattler-build: the virtual packages of
 * the request as `CONDA_OVERRIDE_*` (host wins over build, since the host
 * environment decides the run dependencies) and the cache directory.
 */
export function engineEnvironment(request: EngineRequest): Record<string, string> {
  const { hostPlatform, buildPlatform } = request.output.buildConfiguration;
  const { cacheDir } = request.tool;
  return {
    ...overrideVariables(buildPlatform.virtualPackages),
    ...overrideVariables(hostPlatform.virtualPackages),
    ...(cacheDir === undefined ? {} : { RATTLER_CACHE_DIR: cacheDir }),
  };
}

/** Command line for `rattler-build build` for the given request. */
export function buildArguments(request: EngineRequest, mode: EngineMode): string[] {
  const { output, tool } = request;
  const config = output.buildConfiguration;
  const args = [
    'build',
    '--recipe',
    request.recipePath,
    '--output-dir',
    config.directories.outputDir,
    '--target-platform',
    config.targetPlatform,
    '--build-platform',
    config.buildPlatform.platform,
    '--host-platform',
    config.hostPlatform.platform,
    '--package-format',
    config.packaging.archiveType,
    '--channel-priority',
    config.channelPriority,
    '--channel-alias',
    tool.channelConfig.channelAlias,
  ];
  for (const channel of config.channels) args.push('--channel', channel);
  if (mode === 'render') {
    args.push('--render-only', '--with-solve');
  } else {
    args.push('--test', tool.testing ? 'native' : 'skip');
    if (tool.keepBuild) args.push('--keep-build');
  }
  return args;
}

type Json = Record<string, unknown>;

function isJsonObject(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function objectAt(value: Json, ...keys: string[]): Json | undefined {
  let current: unknown = value;
  for (const key of keys) {
    if (!isJsonObject(current)) return undefined;
    current = current[key];
  }
  return isJsonObject(current) ? current : undefined;
}

function stringAt(value: Json | undefined, key: string): string | undefined {
  const field = value?.[key];
  if (typeof field === 'string') return field;
  if (typeof field === 'number') return String(field);
  return undefined;
}

function specList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.flatMap(entry => {
    if (typeof entry === 'string') return [entry];
    const spec = isJsonObject(entry) ? entry.spec : undefined;
    return typeof spec === 'string' ? [spec] : [];
  });
}

function invalidOutput(message: string, cause?: unknown): never {
  const builder = DiagnosticBuilder.error(DiagnosticCode.E002_EngineOutputInvalid)
    .withMessage(message)
    .withHelp('check that RATTLER_BUILD_BIN points at a compatible rattler-build release');
  if (cause !== undefined) builder.withCause(cause);
  return builder.throw();
}

/**
 * Parses the JSON printed by `--render-only`. Values missing from it fall back
 * to what the backend asked for.
 */
export function parseRenderedOutputs(stdout: string, output: Output): ResolvedOutput[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout);
  } catch (error) {
    return invalidOutput('rattler-build printed invalid JSON', error);
  }
  if (!Array.isArray(parsed)) return invalidOutput('rattler-build did not print a list of outputs');

  return parsed.map(entry => {
    if (!isJsonObject(entry)) return invalidOutput('rattler-build printed an output that is not an object');
    const pkg = objectAt(entry, 'recipe', 'package');
    const build = objectAt(entry, 'recipe', 'build');
    const run = objectAt(entry, 'finalized_dependencies', 'run');
    const licenseFamily = stringAt(objectAt(entry, 'recipe', 'about'), 'license_family');
    const config = output.buildConfiguration;
    const finalized: FinalizedRunDependencies = {
      depends: specList(run?.depends),
      constraints: specList(run?.constraints),
    };
    return {
      output,
      name: stringAt(pkg, 'name') ?? output.recipe.package.name,
      version: stringAt(pkg, 'version') ?? output.recipe.package.version,
      buildString: stringAt(build, 'string') ?? computeBuildString(config.hash, output.recipe.build.number),
      subdir: stringAt(objectAt(entry, 'build_configuration'), 'target_platform') ?? config.targetPlatform,
      ...(licenseFamily === undefined ? {} : { licenseFamily }),
      finalizedDependencies: { run: finalized },
    };
  });
}

function tail(text: string, lines: number): string {
  return text.trimEnd().split('\n').slice(-lines).join('\n');
}

export class RattlerBuildEngine implements BuildEngine {
  constructor(
    private readonly executable: string = ConfigService.getInstance().rattlerBuildBin,
    private readonly run: CommandRunner = spawnCommand
  ) {}

  async resolveDependencies(request: EngineRequest): Promise<ResolvedOutput> {
    const stdout = await this.invoke(request, 'render');
    const [first] = parseRenderedOutputs(stdout, request.output);
    if (first === undefined) return invalidOutput('rattler-build rendered no outputs');
    return first;
  }

  async build(request: EngineRequest): Promise<BuiltPackage> {
    const resolved = await this.resolveDependencies(request);
    await this.invoke(request, 'build');
    const packagePath = await this.findPackage(request.output, resolved);
    return { output: resolved, packagePath };
  }

  private async invoke(request: EngineRequest, mode: EngineMode): Promise<string> {
    const args = buildArguments(request, mode);
    const { logger } = request.tool;
    const extra = engineEnvironment(request);
    logger.info(`running ${this.executable} (${mode})`, { args, env: extra });
    const env = Object.keys(extra).length === 0 ? undefined : { ...process.env, ...extra };

    let result: ProcessResult;
    try {
      result = await this.run(this.executable, args, env === undefined ? { logger } : { logger, env });
    } catch (error) {
      return DiagnosticBuilder.error(DiagnosticCode.E001_EngineFailed)
        .withMessage(`failed to start ${this.executable}`)
        .withHelp('install rattler-build or set RATTLER_BUILD_BIN')
        .withCause(error)
        .throw();
    }

    if (result.code !== 0) {
      return DiagnosticBuilder.error(DiagnosticCode.E001_EngineFailed)
        .withMessage(`${this.executable} exited with status ${String(result.code)}`)
        .withHelp(tail(result.stderr, STDERR_TAIL_LINES) || 'no output on stderr')
        .throw();
    }
    return result.stdout;
  }

  private async findPackage(output: Output, resolved: ResolvedOutput): Promise<string> {
    const dir = join(output.buildConfiguration.directories.outputDir, resolved.subdir);
    const prefix = `${resolved.name}-${resolved.version}-`;
    const exact = `${prefix}${resolved.buildString}.conda`;

    let entries: string[];
    try {
      entries = await readdir(dir);
    } catch (error) {
      return DiagnosticBuilder.error(DiagnosticCode.E003_PackageArchiveMissing)
        .withMessage(`no package directory at ${dir}`)
        .withCause(error)
        .throw();
    }

    const match = entries.find(entry => entry === exact) ?? entries.find(e => e.startsWith(prefix) && e.endsWith('.conda'));
    if (match === undefined) {
      return DiagnosticBuilder.error(DiagnosticCode.E003_PackageArchiveMissing)
        .withMessage(`rattler-build did not produce ${exact} in ${dir}`)
        .throw();
    }
    return join(dir, match);
  }
}
