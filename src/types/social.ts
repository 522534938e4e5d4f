export const PLATFORMS = ['x', 'ig'] as const;

export type Platform = (typeof PLATFORMS)[number];

export interface Target {
  readonly platform: Platform;
  readonly handle: string;
}

export interface Post {
  readonly id: string;
  readonly url: string;
  readonly caption: string;
  readonly mediaUrl?: string;
  readonly isVideo: boolean;
  readonly timestamp: Date;
}

export interface Snapshot {
  readonly target: Target;
  readonly fetchedAt: Date;
  readonly fingerprint: string;
  readonly posts: readonly Post[];
}

export type Staleness = 'FRESH' | 'STALE' | 'UNKNOWN';

export interface Page {
  posts: readonly Post[];
  pageIndex: number;
  pageCount: number;
  hasPrevious: boolean;
  hasNext: boolean;
}

/**
 * Snapshot cache keyed by the normalized `(platform, handle)` pair.
 * `put` replaces whatever was stored for the target.
 */
export interface SnapshotStore {
  get(target: Target): Promise<Snapshot | null>;
  put(target: Target, snapshot: Snapshot): Promise<void>;
}

/** Raw payloads are opaque until a normalizer narrows them. */
export interface ProviderClient {
  fetch(platform: Platform, handle: string): Promise<unknown>;
}

export function isPlatform(value: unknown): value is Platform {
  return typeof value === 'string' && PLATFORMS.some((platform) => platform === value);
}
