import type { Snapshot, Staleness, Target } from '@/types/social';

export interface StalenessOptions {
  freshnessWindowMs: number;
  force?: boolean;
  now?: Date;
}

export function decideStaleness(
  target: Target,
  cached: Snapshot | null | undefined,
  options: StalenessOptions,
): Staleness {
  if (!cached || cached.target.platform !== target.platform || cached.target.handle !== target.handle) {
    return 'UNKNOWN';
  }
  if (options.force) return 'STALE';

  const now = options.now ?? new Date();
  const age = now.getTime() - cached.fetchedAt.getTime();
  return age > options.freshnessWindowMs ? 'STALE' : 'FRESH';
}
