import { homedir } from 'node:os';
import { isAbsolute, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';

import { DiagnosticBuilder, DiagnosticCode } from '../diagnostics/diagnostics.js';

/** How channel names and paths are turned into base URLs. */
export interface ChannelConfig {
  /** Base URL that named channels (`conda-forge`) are appended to. Ends in `/`. */
  readonly channelAlias: string;
  /** Directory relative channel paths are resolved against. */
  readonly rootDir: string;
}

export function channelConfigFromAlias(channelAlias: string, rootDir: string): ChannelConfig {
  return { channelAlias: withTrailingSlash(channelAlias), rootDir };
}

const URL_SCHEME = /^[a-z][a-z0-9+.-]*:\/\//i;
const WINDOWS_DRIVE = /^[a-z]:[\\/]/i;
const CHANNEL_NAME = /^[A-Za-z0-9_.-]+(\/[A-Za-z0-9_.-]+)*$/;

function withTrailingSlash(url: string): string {
  return url.endsWith('/') ? url : `${url}/`;
}

function isPathLike(channel: string): boolean {
  return (
    channel.startsWith('.') ||
    channel.startsWith('/') ||
    channel.startsWith('~') ||
    channel.startsWith('\\') ||
    WINDOWS_DRIVE.test(channel)
  );
}

function invalidChannel(channel: string, cause?: unknown): never {
  const builder = DiagnosticBuilder.error(DiagnosticCode.P002_InvalidChannel)
    .withMessage(`'${channel}' is not a valid channel`)
    .withHelp('use a channel name (conda-forge), a URL or a path to a local channel');
  if (cause !== undefined) builder.withCause(cause);
  return builder.throw();
}

/**
 * Resolves a channel as written in a manifest to the base URL packages are
 * fetched from. The result always ends with `/`.
 */
export function channelToBaseUrl(channel: string, config: ChannelConfig): string {
  const trimmed = channel.trim();
  if (trimmed === '') invalidChannel(channel);

  if (URL_SCHEME.test(trimmed)) {
    try {
      return withTrailingSlash(new URL(trimmed).href);
    } catch (error) {
      return invalidChannel(channel, error);
    }
  }

  if (isPathLike(trimmed)) {
    const expanded = trimmed.startsWith('~') ? homedir() + trimmed.slice(1) : trimmed;
    const absolute = isAbsolute(expanded) || WINDOWS_DRIVE.test(expanded) ? expanded : resolve(config.rootDir, expanded);
    return withTrailingSlash(pathToFileURL(absolute).href);
  }

  if (!CHANNEL_NAME.test(trimmed)) invalidChannel(channel);
  return `${withTrailingSlash(config.channelAlias)}${trimmed}/`;
}
