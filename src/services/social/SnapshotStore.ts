import type { Pool } from 'pg';
import { isPlatform, type Post, type Snapshot, type SnapshotStore, type Target } from '@/types/social';
import { createDatabaseError } from '@/utils/dbErrors';
import logger from '@/utils/logger';
import { targetKey } from './target';

interface SnapshotRow {
  platform: string;
  handle: string;
  fetched_at: Date | string;
  fingerprint: string;
  posts: unknown;
}

export class MemorySnapshotStore implements SnapshotStore {
  private snapshots = new Map<string, Snapshot>();

  async get(target: Target): Promise<Snapshot | null> {
    return this.snapshots.get(targetKey(target)) ?? null;
  }

  async put(target: Target, snapshot: Snapshot): Promise<void> {
    this.snapshots.set(targetKey(target), snapshot);
  }

  get size(): number {
    return this.snapshots.size;
  }
}

export interface CachedPost {
  id: string;
  url: string;
  caption: string;
  mediaUrl: string | null;
  isVideo: boolean;
  timestamp: string;
}

export function toCachedPosts(posts: readonly Post[]): CachedPost[] {
  return posts.map((post) => ({
    id: post.id,
    url: post.url,
    caption: post.caption,
    mediaUrl: post.mediaUrl ?? null,
    isVideo: post.isVideo,
    timestamp: post.timestamp.toISOString(),
  }));
}

/** Rebuilds a post read back from the JSONB column; null when the entry is unusable. */
export function reviveCachedPost(value: unknown): Post | null {
  if (typeof value !== 'object' || value === null) return null;
  const record: Record<string, unknown> = { ...value };
  const { id, url, caption, mediaUrl, isVideo, timestamp } = record;

  if (typeof id !== 'string' || typeof url !== 'string' || typeof timestamp !== 'string') {
    return null;
  }
  const parsed = new Date(timestamp);
  if (Number.isNaN(parsed.getTime())) return null;

  return Object.freeze({
    id,
    url,
    caption: typeof caption === 'string' ? caption : '',
    mediaUrl: typeof mediaUrl === 'string' ? mediaUrl : undefined,
    isVideo: isVideo === true,
    timestamp: parsed,
  });
}

export class PgSnapshotStore implements SnapshotStore {
  constructor(private pool: Pool) {}

  async ensureSchema(): Promise<void> {
    try {
      await this.pool.query(`
        CREATE TABLE IF NOT EXISTS social_snapshots (
          platform TEXT NOT NULL,
          handle TEXT NOT NULL,
          fetched_at TIMESTAMPTZ NOT NULL,
          fingerprint TEXT NOT NULL,
          posts JSONB NOT NULL DEFAULT '[]'::jsonb,
          PRIMARY KEY (platform, handle)
        )
      `);
    } catch (error) {
      throw createDatabaseError(error, 'creating social_snapshots');
    }
  }

  async get(target: Target): Promise<Snapshot | null> {
    let rows: SnapshotRow[];
    try {
      const result = await this.pool.query<SnapshotRow>(
        `SELECT platform, handle, fetched_at, fingerprint, posts
         FROM social_snapshots
         WHERE platform = $1 AND handle = $2`,
        [target.platform, target.handle],
      );
      rows = result.rows;
    } catch (error) {
      throw createDatabaseError(error, 'reading snapshot');
    }

    const row = rows[0];
    if (!row || !isPlatform(row.platform)) return null;
    return this.mapRowToSnapshot(row, target);
  }

  async put(target: Target, snapshot: Snapshot): Promise<void> {
    const posts = toCachedPosts(snapshot.posts);

    try {
      await this.pool.query(
        `INSERT INTO social_snapshots (platform, handle, fetched_at, fingerprint, posts)
         VALUES ($1, $2, $3, $4, $5::jsonb)
         ON CONFLICT (platform, handle)
         DO UPDATE SET fetched_at = EXCLUDED.fetched_at,
                       fingerprint = EXCLUDED.fingerprint,
                       posts = EXCLUDED.posts`,
        [target.platform, target.handle, snapshot.fetchedAt, snapshot.fingerprint, JSON.stringify(posts)],
      );
    } catch (error) {
      throw createDatabaseError(error, 'writing snapshot');
    }
  }

  private mapRowToSnapshot(row: SnapshotRow, target: Target): Snapshot {
    const rawPosts = Array.isArray(row.posts) ? row.posts : [];
    const posts: Post[] = [];
    for (const raw of rawPosts) {
      const post = reviveCachedPost(raw);
      if (post) posts.push(post);
    }
    if (posts.length !== rawPosts.length) {
      logger.warn(`Dropped ${rawPosts.length - posts.length} unreadable cached post(s) for ${targetKey(target)}`);
    }

    return Object.freeze({
      target,
      fetchedAt: new Date(row.fetched_at),
      fingerprint: row.fingerprint,
      posts: Object.freeze(posts),
    });
  }
}
