import type { Post, ProviderClient, Snapshot, SnapshotStore, Target } from '@/types/social';
import { FetchError } from '@/utils/errors';
import logger from '@/utils/logger';
import { normalizeWithReport } from './normalizers';
import { decideStaleness } from './staleness';
import { computeFingerprint, targetKey } from './target';

export interface FetchOrchestratorOptions {
  freshnessWindowMs: number;
  clock?: () => Date;
}

/**
 * Serves a target's posts from the snapshot cache while it is fresh and
 * otherwise makes a single provider call, replacing the cached snapshot.
 */
export class FetchOrchestrator {
  private readonly clock: () => Date;

  constructor(
    private readonly provider: ProviderClient,
    private readonly store: SnapshotStore,
    private readonly options: FetchOrchestratorOptions,
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  async resolve(target: Target, force = false): Promise<readonly Post[]> {
    const key = targetKey(target);
    const cached = await this.readCache(target);
    const staleness = decideStaleness(target, cached, {
      freshnessWindowMs: this.options.freshnessWindowMs,
      force,
      now: this.clock(),
    });

    if (staleness === 'FRESH' && cached) {
      logger.debug(`Serving ${key} from cache (${cached.posts.length} posts)`);
      return cached.posts;
    }

    logger.debug(`Fetching ${key} live (${staleness}${force ? ', forced' : ''})`);

    let posts: Post[];
    try {
      const raw = await this.provider.fetch(target.platform, target.handle);
      const report = normalizeWithReport(target.platform, raw);
      if (report.skipped.length > 0) {
        logger.warn(`Skipped ${report.skipped.length} malformed post(s) for ${key}`, {
          reasons: report.skipped,
        });
      }
      posts = report.posts;
    } catch (error) {
      logger.warn(`Live fetch failed for ${key}:`, error instanceof Error ? error.message : error);
      throw new FetchError(target, error);
    }

    const snapshot: Snapshot = Object.freeze({
      target,
      fetchedAt: this.clock(),
      fingerprint: computeFingerprint(posts),
      posts: Object.freeze(posts),
    });

    if (cached && cached.fingerprint === snapshot.fingerprint) {
      logger.debug(`No new posts for ${key} since ${cached.fetchedAt.toISOString()}`);
    }

    await this.writeCache(snapshot);
    return snapshot.posts;
  }

  private async readCache(target: Target): Promise<Snapshot | null> {
    try {
      return await this.store.get(target);
    } catch (error) {
      logger.warn(`Snapshot read failed for ${targetKey(target)}, fetching live`, {
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  private async writeCache(snapshot: Snapshot): Promise<void> {
    try {
      await this.store.put(snapshot.target, snapshot);
    } catch (error) {
      logger.warn(`Snapshot write failed for ${targetKey(snapshot.target)}`, {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
