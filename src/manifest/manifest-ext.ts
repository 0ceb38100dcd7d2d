import { channelToBaseUrl, type ChannelConfig } from '../conda/channel.js';
import type { Platform } from '../conda/platform.js';
import type { ProjectManifest } from './types.js';

/** Version used when the manifest declares none. */
export const DEFAULT_VERSION = '0dev0';

/** Base URLs of the channels listed in `[project]`, in declaration order. */
export function resolvedProjectChannels(manifest: ProjectManifest, channelConfig: ChannelConfig): string[] {
  return manifest.project.channels.map(channel => channelToBaseUrl(channel, channelConfig));
}

export function supportsTargetPlatform(manifest: ProjectManifest, platform: Platform): boolean {
  return manifest.project.platforms.includes(platform);
}

export function versionOrDefault(manifest: ProjectManifest): string {
  return manifest.project.version ?? DEFAULT_VERSION;
}
