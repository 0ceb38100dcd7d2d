/**
 * Reads `pixi.toml`, validates it against `schemas/manifest.schema.json` and
 * turns it into a {@link ProjectManifest}.
 */

import { readFileSync, statSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import * as TOML from 'smol-toml';

import { channelToBaseUrl } from '../conda/channel.js';
import { isValidPackageName, normalizePackageName, parseVersionSpec } from '../conda/match-spec.js';
import { isPlatform, isPlatformSelector, KNOWN_PLATFORMS, PLATFORM_SELECTORS, type Platform } from '../conda/platform.js';
import { DEFAULT_CHANNEL_ALIAS, DEFAULT_MANIFEST_FILE } from '../config/config-service.js';
import {
  DiagnosticBuilder,
  DiagnosticCode,
  DiagnosticError,
  isDiagnosticError,
  type Diagnostic,
} from '../diagnostics/diagnostics.js';
import { createAjv, readSchema, type ErrorObject, type ValidateFunction } from '../utils/schemas.js';
import {
  DEFAULT_FEATURE_NAME,
  type DependencySpec,
  type DependencyTable,
  type Feature,
  type FeatureDependencies,
  type ProjectManifest,
  type ProjectMetadata,
  type TargetTable,
} from './types.js';

let validator: ValidateFunction | null = null;

function manifestValidator(): ValidateFunction {
  if (validator === null) {
    validator = createAjv().compile(readSchema('manifest.schema.json'));
  }
  return validator;
}

type TomlRecord = Record<string, unknown>;

function isRecord(value: unknown): value is TomlRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(record: TomlRecord, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
}

function recordField(record: TomlRecord, key: string): TomlRecord {
  const value = record[key];
  return isRecord(value) ? value : {};
}

function manifestError(code: DiagnosticCode, message: string, help?: string): Diagnostic {
  const builder = DiagnosticBuilder.error(code).withMessage(message);
  if (help !== undefined) builder.withHelp(help);
  return builder.build();
}

/**
 * A manifest path may name the file or the directory holding `pixi.toml`.
 */
export function resolveManifestPath(path: string): string {
  const absolute = resolve(path);
  try {
    if (statSync(absolute).isDirectory()) return join(absolute, DEFAULT_MANIFEST_FILE);
  } catch (error) {
    if (!isErrnoException(error) || error.code !== 'ENOENT') throw error;
  }
  return absolute;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Parses the manifest at `path`.
 *
 * @returns the manifest, or every problem found in it
 */
export function parseManifest(path: string): ProjectManifest | Diagnostic[] {
  const manifestPath = resolveManifestPath(path);

  let content: string;
  try {
    content = readFileSync(manifestPath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return [manifestError(DiagnosticCode.M002_ManifestFileNotFound, `manifest file not found: ${manifestPath}`)];
    }
    const reason = error instanceof Error ? error.message : String(error);
    return [manifestError(DiagnosticCode.M001_ManifestParseError, `failed to read ${manifestPath}: ${reason}`)];
  }

  return parseManifestContent(content, manifestPath);
}

/** Parses manifest text as if it were read from `manifestPath`. */
export function parseManifestContent(content: string, manifestPath: string): ProjectManifest | Diagnostic[] {
  let document: TomlRecord;
  try {
    document = TOML.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return [manifestError(DiagnosticCode.M001_ManifestParseError, `failed to parse ${manifestPath}: ${reason}`)];
  }

  const validate = manifestValidator();
  if (!validate(document)) {
    return (validate.errors ?? []).map(mapAjvErrorToDiagnostic);
  }

  const diagnostics: Diagnostic[] = [];
  const root = dirname(manifestPath);
  const project = parseProject(recordField(document, 'project'), root, diagnostics);
  const defaultFeature = parseFeature(DEFAULT_FEATURE_NAME, document, diagnostics);

  const features = new Map<string, Feature>();
  for (const [name, table] of Object.entries(recordField(document, 'feature'))) {
    if (isRecord(table)) features.set(name, parseFeature(name, table, diagnostics));
  }

  if (diagnostics.length > 0) return diagnostics;

  return { path: manifestPath, root, project, defaultFeature, features };
}

/**
 * Like {@link parseManifest}, but raises the first problem as a
 * {@link DiagnosticError}.
 */
export function loadManifest(path: string): ProjectManifest {
  const result = parseManifest(path);
  if (!Array.isArray(result)) return result;

  const [first, ...rest] = result;
  if (first === undefined) {
    return DiagnosticBuilder.error(DiagnosticCode.M001_ManifestParseError)
      .withMessage(`failed to parse manifest from ${path}`)
      .throw();
  }
  if (rest.length === 0) throw new DiagnosticError(first);
  const help = [first.help, `${rest.length} more problem(s): ${rest.map(d => d.message).join('; ')}`]
    .filter(part => part !== undefined)
    .join('\n');
  throw new DiagnosticError({ ...first, help });
}

const VERSION = /^[0-9][0-9A-Za-z_.+!]*$/;

function parseProject(table: TomlRecord, root: string, diagnostics: Diagnostic[]): ProjectMetadata {
  let name = optionalString(table, 'name');
  if (name !== undefined) {
    name = normalizePackageName(name);
    if (!isValidPackageName(name)) {
      diagnostics.push(
        manifestError(
          DiagnosticCode.M003_InvalidPackageName,
          `invalid package name: ${name}`,
          'package names consist of lowercase letters, digits, "_", "-" and "."'
        )
      );
    }
  }

  const version = optionalString(table, 'version');
  if (version !== undefined && !VERSION.test(version)) {
    diagnostics.push(
      manifestError(DiagnosticCode.M004_InvalidVersion, `invalid version: ${version}`, "use a conda version such as '1.2.0'")
    );
  }

  const channels: string[] = [];
  const rawChannels = table.channels;
  for (const entry of Array.isArray(rawChannels) ? rawChannels : []) {
    const channel = typeof entry === 'string' ? entry : isRecord(entry) ? optionalString(entry, 'channel') : undefined;
    if (channel === undefined) continue;
    try {
      channelToBaseUrl(channel, { channelAlias: DEFAULT_CHANNEL_ALIAS, rootDir: root });
      channels.push(channel);
    } catch (error) {
      if (!isDiagnosticError(error)) throw error;
      diagnostics.push(error.diagnostic);
    }
  }

  const platforms: Platform[] = [];
  const rawPlatforms = table.platforms;
  for (const entry of Array.isArray(rawPlatforms) ? rawPlatforms : []) {
    if (typeof entry === 'string' && isPlatform(entry)) {
      platforms.push(entry);
    } else {
      diagnostics.push(
        manifestError(
          DiagnosticCode.P001_UnknownPlatform,
          `'${String(entry)}' is not a known platform`,
          `valid platforms are: ${KNOWN_PLATFORMS.join(', ')}`
        )
      );
    }
  }

  const text = (key: string): string | undefined => optionalString(table, key);
  const description = text('description');
  const license = text('license');
  const licenseFile = text('license-file');
  const homepage = text('homepage');
  const repository = text('repository');
  const documentation = text('documentation');

  return {
    ...(name === undefined ? {} : { name }),
    ...(version === undefined ? {} : { version }),
    ...(description === undefined ? {} : { description }),
    ...(license === undefined ? {} : { license }),
    ...(licenseFile === undefined ? {} : { licenseFile }),
    ...(homepage === undefined ? {} : { homepage }),
    ...(repository === undefined ? {} : { repository }),
    ...(documentation === undefined ? {} : { documentation }),
    channels,
    platforms,
  };
}

function parseFeature(name: string, table: TomlRecord, diagnostics: Diagnostic[]): Feature {
  const targets: TargetTable[] = [];
  for (const [selector, targetTable] of Object.entries(recordField(table, 'target'))) {
    if (!isPlatform(selector) && !isPlatformSelector(selector)) {
      diagnostics.push(
        manifestError(
          DiagnosticCode.M006_InvalidTargetSelector,
          `'${selector}' is not a valid target selector`,
          `use a platform name or one of: ${PLATFORM_SELECTORS.join(', ')}`
        )
      );
      continue;
    }
    if (isRecord(targetTable)) {
      targets.push({ selector, dependencies: parseFeatureDependencies(targetTable, diagnostics) });
    }
  }
  return { name, dependencies: parseFeatureDependencies(table, diagnostics), targets };
}

function parseFeatureDependencies(table: TomlRecord, diagnostics: Diagnostic[]): FeatureDependencies {
  return {
    run: parseDependencyTable(recordField(table, 'dependencies'), diagnostics),
    host: parseDependencyTable(recordField(table, 'host-dependencies'), diagnostics),
    build: parseDependencyTable(recordField(table, 'build-dependencies'), diagnostics),
  };
}

function parseDependencyTable(table: TomlRecord, diagnostics: Diagnostic[]): DependencyTable {
  const dependencies = new Map<string, DependencySpec>();
  for (const [rawName, rawSpec] of Object.entries(table)) {
    const name = normalizePackageName(rawName);
    if (!isValidPackageName(name)) {
      diagnostics.push(manifestError(DiagnosticCode.M005_InvalidDependencySpec, `invalid dependency name: ${rawName}`));
      continue;
    }
    try {
      dependencies.set(name, parseDependencySpec(name, rawSpec));
    } catch (error) {
      if (!isDiagnosticError(error)) throw error;
      diagnostics.push(
        error.code === DiagnosticCode.M005_InvalidDependencySpec
          ? error.diagnostic
          : { ...error.diagnostic, code: DiagnosticCode.M005_InvalidDependencySpec }
      );
    }
  }
  return dependencies;
}

/** Converts one dependency value (`"*"`, `">=1.0"` or an inline table). */
export function parseDependencySpec(name: string, raw: unknown): DependencySpec {
  if (typeof raw === 'string') {
    return { kind: 'version', version: parseVersionSpec(raw, name) };
  }
  if (!isRecord(raw)) {
    return DiagnosticBuilder.error(DiagnosticCode.M005_InvalidDependencySpec)
      .withMessage(`dependency '${name}' must be a version string or a table`)
      .throw();
  }

  const sources = ['path', 'git', 'url'].filter(key => raw[key] !== undefined);
  if (sources.length > 1) {
    return DiagnosticBuilder.error(DiagnosticCode.M005_InvalidDependencySpec)
      .withMessage(`dependency '${name}' combines ${sources.join(' and ')}; only one source may be given`)
      .throw();
  }

  const path = optionalString(raw, 'path');
  if (path !== undefined) return { kind: 'path', path };

  const text = (key: string): string | undefined => optionalString(raw, key);
  const md5 = text('md5');
  const sha256 = text('sha256');
  const hashes = { ...(md5 === undefined ? {} : { md5 }), ...(sha256 === undefined ? {} : { sha256 }) };

  const git = text('git');
  if (git !== undefined) {
    const rev = text('rev');
    const branch = text('branch');
    const tag = text('tag');
    const subdirectory = text('subdirectory');
    return {
      kind: 'git',
      git,
      ...(rev === undefined ? {} : { rev }),
      ...(branch === undefined ? {} : { branch }),
      ...(tag === undefined ? {} : { tag }),
      ...(subdirectory === undefined ? {} : { subdirectory }),
    };
  }

  const url = text('url');
  if (url !== undefined) return { kind: 'url', url, ...hashes };

  const version = text('version');
  const build = text('build');
  const buildNumber = text('build-number');
  const channel = text('channel');
  const subdir = text('subdir');
  return {
    kind: 'detailed',
    ...(version === undefined ? {} : { version: parseVersionSpec(version, name) }),
    ...(build === undefined ? {} : { build }),
    ...(buildNumber === undefined ? {} : { buildNumber }),
    ...(channel === undefined ? {} : { channel }),
    ...(subdir === undefined ? {} : { subdir }),
    ...hashes,
  };
}

function mapAjvErrorToDiagnostic(error: ErrorObject): Diagnostic {
  const fieldPath = error.instancePath || '/';
  if (error.keyword === 'additionalProperties') {
    const property: unknown = error.params.additionalProperty;
    return manifestError(DiagnosticCode.M007_UnknownManifestField, `unknown manifest field '${String(property)}' at ${fieldPath}`);
  }
  if (error.keyword === 'required') {
    const property: unknown = error.params.missingProperty;
    return manifestError(DiagnosticCode.M008_ManifestSchemaViolation, `missing required field '${String(property)}' at ${fieldPath}`);
  }
  return manifestError(
    DiagnosticCode.M008_ManifestSchemaViolation,
    `invalid manifest: ${fieldPath} ${error.message ?? 'is invalid'}`
  );
}
