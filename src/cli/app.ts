/**
 * Command line of a build backend. Without a command the process serves the
 * JSON-RPC protocol; `get-metadata` and `build` drive a backend directly,
 * which is handy when debugging a manifest.
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { cac } from 'cac';
import YAML from 'yaml';

import { ConfigService } from '../config/config-service.js';
import { parseManifest, resolveManifestPath } from '../manifest/manifest-parser.js';
import type { Protocol, ProtocolFactory } from '../protocol/protocol.js';
import type { CondaBuildResult, CondaMetadataResult } from '../protocol/types.js';
import { Server } from '../server/server.js';
import { FRAMINGS, isFraming, listen, runStdio, type Framing } from '../server/transports.js';
import { LogLevel } from '../utils/logger.js';
import { DiagnosticsError } from './utils/error-handler.js';
import { info, success, warn } from './utils/logger.js';

export const VERSION = '0.1.0';

export interface CliOptions {
  /** Executable name shown in `--help`. */
  readonly name: string;
  /** Called after the configuration is in place, so loggers pick up `--log-level`. */
  readonly createFactory: () => ProtocolFactory;
  readonly env?: NodeJS.ProcessEnv;
  readonly stdout?: (text: string) => void;
}

interface GlobalFlags {
  readonly logLevel?: unknown;
}

interface ServeFlags extends GlobalFlags {
  readonly port?: unknown;
  readonly host?: unknown;
  readonly framing?: unknown;
}

interface BuildFlags extends GlobalFlags {
  readonly workDir?: unknown;
}

export function parsePort(value: unknown): number | undefined {
  if (value === undefined) return undefined;
  const port = typeof value === 'number' ? value : Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`invalid port: ${String(value)}`);
  }
  return port;
}

export function parseFraming(value: unknown): Framing {
  if (value === undefined) return 'newline';
  if (typeof value === 'string' && isFraming(value)) return value;
  throw new Error(`invalid framing: ${String(value)} (expected one of ${FRAMINGS.join(', ')})`);
}

function parseLogLevelFlag(value: unknown): LogLevel | undefined {
  if (value === undefined) return undefined;
  const level = typeof value === 'string' ? ConfigService.parseLogLevel(value) : undefined;
  if (level === undefined) throw new Error(`invalid log level: ${String(value)}`);
  return level;
}

function configure(flags: GlobalFlags, env: NodeJS.ProcessEnv): ConfigService {
  const logLevel = parseLogLevelFlag(flags.logLevel);
  return ConfigService.configure(logLevel === undefined ? {} : { logLevel }, env);
}

/** Initializes the backend, reporting every problem of the manifest rather than the first. */
async function initialize(factory: ProtocolFactory, manifest: string): Promise<Protocol> {
  const parsed = parseManifest(manifest);
  if (Array.isArray(parsed)) throw new DiagnosticsError(parsed);
  const { protocol } = await factory.initialize({ manifestPath: manifest, capabilities: {} });
  return protocol;
}

export async function getMetadata(factory: ProtocolFactory, manifest: string): Promise<CondaMetadataResult> {
  const protocol = await initialize(factory, manifest);
  if (protocol.getCondaMetadata === undefined) {
    throw new Error('this backend does not provide conda metadata');
  }
  const workDirectory = await mkdtemp(join(tmpdir(), 'build-backend-'));
  let result: CondaMetadataResult;
  try {
    result = await protocol.getCondaMetadata({
      channelConfiguration: { baseUrl: ConfigService.getInstance().channelAlias },
      workDirectory,
    });
  } catch (error) {
    // the rendered recipe in there is what a failed solve needs for debugging
    warn(`keeping work directory ${workDirectory}`);
    throw error;
  }
  await rm(workDirectory, { recursive: true, force: true });
  return result;
}

export async function build(factory: ProtocolFactory, manifest: string, workDir?: string): Promise<CondaBuildResult> {
  const protocol = await initialize(factory, manifest);
  if (protocol.buildConda === undefined) {
    throw new Error('this backend does not build conda packages');
  }
  const workDirectory = workDir ?? join(dirname(resolveManifestPath(manifest)), '.build-backend');
  return protocol.buildConda({
    channelConfiguration: { baseUrl: ConfigService.getInstance().channelAlias },
    workDirectory,
  });
}

/** Parses `argv` (as in `process.argv`) and runs the matched command. */
export async function runCli(argv: readonly string[], options: CliOptions): Promise<void> {
  const env = options.env ?? process.env;
  const stdout = options.stdout ?? ((text: string) => void process.stdout.write(text));
  const cli = cac(options.name);

  cli.option('--log-level <level>', 'Minimum log level (debug, info, warn, error)');

  cli
    .command('', 'Serve the build backend protocol on stdio, or on TCP with --port')
    .option('--port <port>', 'Listen for JSON-RPC connections on this TCP port')
    .option('--host <host>', 'Address to bind with --port', { default: '127.0.0.1' })
    .option('--framing <framing>', 'Message framing: newline or headers', { default: 'newline' })
    .action(async (flags: ServeFlags) => {
      const port = parsePort(flags.port);
      const framing = parseFraming(flags.framing);
      configure(flags, env);
      const server = new Server(options.createFactory());
      if (port === undefined) {
        await runStdio(server, framing);
        return;
      }
      await listen(server, port, { host: typeof flags.host === 'string' ? flags.host : '127.0.0.1', framing });
    });

  cli
    .command('get-metadata [manifest]', 'Print the conda metadata of a project as YAML')
    .action(async (manifest: string | undefined, flags: GlobalFlags) => {
      const config = configure(flags, env);
      const result = await getMetadata(options.createFactory(), manifest ?? config.manifestPath);
      stdout(YAML.stringify(result));
    });

  cli
    .command('build [manifest]', 'Build the conda package of a project')
    .option('--work-dir <dir>', 'Directory for the rendered recipe and build outputs')
    .action(async (manifest: string | undefined, flags: BuildFlags) => {
      const config = configure(flags, env);
      const workDir = typeof flags.workDir === 'string' ? flags.workDir : undefined;
      const result = await build(options.createFactory(), manifest ?? config.manifestPath, workDir);
      for (const pkg of result.packages) {
        success(`Successfully built '${pkg.outputFile}'`);
        info(`input globs: ${pkg.inputGlobs.join(', ')}`);
      }
    });

  cli.help();
  cli.version(VERSION);
  const parsed = cli.parse([...argv], { run: false });
  // cac has already printed help or version
  if (parsed.options.help || parsed.options.version) return;
  await cli.runMatchedCommand();
}
