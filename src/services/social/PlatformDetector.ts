import { PLATFORMS, type Platform, type Post, type SnapshotStore, type Target } from '@/types/social';
import { FetchError } from '@/utils/errors';
import logger from '@/utils/logger';
import type { FetchOrchestrator } from './FetchOrchestrator';
import { createTarget } from './target';

export interface Detection {
  target: Target;
  posts: readonly Post[];
}

const HOST_PLATFORMS: Array<[RegExp, Platform]> = [
  [/^(www\.|mobile\.)?(x|twitter)\.com$/i, 'x'],
  [/^(www\.)?instagram\.com$/i, 'ig'],
];

export function platformFromUrl(input: string): Platform | null {
  const trimmed = input.trim();
  if (!/^(https?:\/\/)?[^\s/]+\.[a-z]+\//i.test(trimmed)) return null;

  let host: string;
  try {
    host = new URL(/^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`).hostname;
  } catch {
    return null;
  }

  for (const [pattern, platform] of HOST_PLATFORMS) {
    if (pattern.test(host)) return platform;
  }
  return null;
}

/**
 * Resolves an account whose platform the user did not name. Order: profile
 * URL host, then a cached snapshot with posts, then live probes (X first).
 */
export class PlatformDetector {
  constructor(
    private readonly orchestrator: FetchOrchestrator,
    private readonly store: SnapshotStore,
  ) {}

  async detect(rawHandle: string, force = false): Promise<Detection> {
    const fromUrl = platformFromUrl(rawHandle);
    if (fromUrl) {
      const target = createTarget(fromUrl, rawHandle);
      return { target, posts: await this.orchestrator.resolve(target, force) };
    }

    const targets = PLATFORMS.map((platform) => createTarget(platform, rawHandle));

    if (!force) {
      const cachedTarget = await this.mostRecentCached(targets);
      if (cachedTarget) {
        return { target: cachedTarget, posts: await this.orchestrator.resolve(cachedTarget) };
      }
    }

    let firstEmpty: Detection | null = null;
    let lastError: FetchError | null = null;

    for (const target of targets) {
      try {
        const posts = await this.orchestrator.resolve(target, force);
        if (posts.length > 0) return { target, posts };
        firstEmpty ??= { target, posts };
      } catch (error) {
        if (!(error instanceof FetchError)) throw error;
        logger.debug(`Probe failed for ${target.platform}:${target.handle}`, { error: error.message });
        lastError = error;
      }
    }

    if (firstEmpty) return firstEmpty;
    if (lastError) throw lastError;
    return { target: targets[0], posts: [] };
  }

  private async mostRecentCached(targets: Target[]): Promise<Target | null> {
    let best: { target: Target; fetchedAt: number } | null = null;
    for (const target of targets) {
      try {
        const snapshot = await this.store.get(target);
        if (!snapshot || snapshot.posts.length === 0) continue;
        const fetchedAt = snapshot.fetchedAt.getTime();
        if (!best || fetchedAt > best.fetchedAt) best = { target, fetchedAt };
      } catch (error) {
        logger.warn(`Snapshot lookup failed during detection`, {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
    return best?.target ?? null;
  }
}
