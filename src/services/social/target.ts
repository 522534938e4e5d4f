import { createHash } from 'crypto';
import type { Platform, Post, Target } from '@/types/social';
import { InvalidHandleError } from '@/utils/errors';

const HANDLE_PATTERN = /^[a-z0-9._]{1,30}$/;
const FINGERPRINT_DEPTH = 5;

/**
 * Reduces user input to a bare lower-cased handle. Accepts `@name`, `name`
 * and profile URLs such as `https://x.com/name?s=20` or `instagram.com/name/`.
 */
export function normalizeHandle(input: string): string {
  let handle = (input || '').trim();
  handle = handle.split('?')[0].split('#')[0].replace(/\/+$/, '');

  if (/^(https?:\/\/)?(www\.|mobile\.)?[a-z0-9-]+\.[a-z.]+\//i.test(handle)) {
    const withoutScheme = handle.replace(/^https?:\/\//i, '');
    const segments = withoutScheme.split('/').filter(Boolean);
    handle = segments[1] ?? '';
  }

  return handle.replace(/^@+/, '').trim().toLowerCase();
}

export function isValidHandle(handle: string): boolean {
  return HANDLE_PATTERN.test(handle);
}

export function createTarget(platform: Platform, input: string): Target {
  const handle = normalizeHandle(input);
  if (!isValidHandle(handle)) {
    throw new InvalidHandleError(input);
  }
  return Object.freeze({ platform, handle });
}

export function targetKey(target: Target): string {
  return `${target.platform}:${target.handle}`;
}

export function computeFingerprint(posts: readonly Post[]): string {
  if (posts.length === 0) return 'empty';
  const ids = posts.slice(0, FINGERPRINT_DEPTH).map((post) => post.id);
  return createHash('sha256').update(ids.join('|')).digest('hex');
}
