import he from 'he';
import validator from 'validator';
import type { Platform, Post } from '@/types/social';
import { MalformedPayloadError, MalformedPostError } from '@/utils/errors';

type RawRecord = Record<string, unknown>;

// Twitter snowflake ids carry their creation time in the top 42 bits.
const TWITTER_EPOCH_MS = 1288834974657n;

export interface NormalizeReport {
  posts: Post[];
  skipped: string[];
}

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function asHttpUrl(value: unknown): string | undefined {
  const url = asString(value);
  if (!url) return undefined;
  return validator.isURL(url, { protocols: ['http', 'https'], require_protocol: true })
    ? url
    : undefined;
}

function dig(value: unknown, ...path: string[]): unknown {
  let current = value;
  for (const key of path) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

function extractXItems(raw: unknown): unknown[] {
  if (Array.isArray(raw)) return raw;
  if (isRecord(raw)) {
    for (const key of ['data', 'statuses', 'results']) {
      const value = raw[key];
      if (Array.isArray(value)) return value;
    }
  }
  throw new MalformedPayloadError('x', 'expected a tweet list');
}

function extractInstagramItems(raw: unknown): unknown[] {
  const timeline = dig(raw, 'data', 'user', 'edge_owner_to_timeline_media', 'edges');
  if (Array.isArray(timeline)) return timeline;
  if (isRecord(raw)) {
    if (Array.isArray(raw.edges)) return raw.edges;
    if (Array.isArray(raw.items)) return raw.items;
  }
  throw new MalformedPayloadError('ig', 'expected a profile timeline');
}

function snowflakeTime(id: string): Date {
  return new Date(Number((BigInt(id) >> 22n) + TWITTER_EPOCH_MS));
}

function checkedTimestamp(platform: Platform, date: Date, id: string): Date {
  if (Number.isNaN(date.getTime())) {
    throw new MalformedPostError(platform, `timestamp out of range for ${id}`);
  }
  return date;
}

function pickXMedia(item: RawRecord): { mediaUrl?: string; isVideo: boolean } {
  const media = dig(item, 'extended_entities', 'media');
  if (!Array.isArray(media) || !isRecord(media[0])) return { isVideo: false };

  const first = media[0];
  if (first.type === 'video' || first.type === 'animated_gif') {
    const variants = dig(first, 'video_info', 'variants');
    if (Array.isArray(variants)) {
      const mp4 = variants
        .filter(isRecord)
        .filter((variant) => variant.content_type === 'video/mp4' && asHttpUrl(variant.url))
        .sort((a, b) => Number(b.bitrate ?? 0) - Number(a.bitrate ?? 0));
      const best = mp4.length > 0 ? asHttpUrl(mp4[0].url) : undefined;
      if (best) return { mediaUrl: best, isVideo: true };
    }
  }

  const photo = asHttpUrl(first.media_url_https) ?? asHttpUrl(first.media_url);
  return photo ? { mediaUrl: photo, isVideo: false } : { isVideo: false };
}

function normalizeXItem(item: unknown): Post {
  if (!isRecord(item)) throw new MalformedPostError('x', 'item is not an object');

  const rawId = item.id_str ?? item.id;
  const id = typeof rawId === 'number' ? String(rawId) : asString(rawId);
  if (!id || !/^\d+$/.test(id)) throw new MalformedPostError('x', 'missing tweet id');

  const createdAt = asString(item.created_at);
  const parsed = createdAt ? new Date(createdAt) : undefined;
  const timestamp = checkedTimestamp(
    'x',
    parsed && !Number.isNaN(parsed.getTime()) ? parsed : snowflakeTime(id),
    id,
  );

  const text = asString(item.full_text) ?? asString(item.text);
  const { mediaUrl, isVideo } = pickXMedia(item);

  return Object.freeze({
    id,
    url: `https://x.com/i/status/${id}`,
    caption: text ? he.decode(text) : '',
    mediaUrl,
    isVideo,
    timestamp,
  });
}

function normalizeInstagramItem(item: unknown): Post {
  const node = isRecord(item) && isRecord(item.node) ? item.node : item;
  if (!isRecord(node)) throw new MalformedPostError('ig', 'item is not an object');

  const shortcode = asString(node.shortcode);
  if (!shortcode) throw new MalformedPostError('ig', 'missing shortcode');

  const takenAt = node.taken_at_timestamp;
  if (typeof takenAt !== 'number' || !Number.isFinite(takenAt)) {
    throw new MalformedPostError('ig', `missing timestamp for ${shortcode}`);
  }

  const captionEdges = dig(node, 'edge_media_to_caption', 'edges');
  const caption =
    Array.isArray(captionEdges) && captionEdges.length > 0
      ? asString(dig(captionEdges[0], 'node', 'text'))
      : undefined;

  const videoUrl = node.is_video === true ? asHttpUrl(node.video_url) : undefined;
  const mediaUrl = videoUrl ?? asHttpUrl(node.display_url);

  return Object.freeze({
    id: shortcode,
    url: `https://www.instagram.com/p/${shortcode}/`,
    caption: caption ?? '',
    mediaUrl,
    isVideo: videoUrl !== undefined,
    timestamp: checkedTimestamp('ig', new Date(takenAt * 1000), shortcode),
  });
}

const platformNormalizers: Record<
  Platform,
  { extract: (raw: unknown) => unknown[]; map: (item: unknown) => Post }
> = {
  x: { extract: extractXItems, map: normalizeXItem },
  ig: { extract: extractInstagramItems, map: normalizeInstagramItem },
};

export function normalizeWithReport(platform: Platform, raw: unknown): NormalizeReport {
  const { extract, map } = platformNormalizers[platform];
  const items = extract(raw);
  const posts: Post[] = [];
  const skipped: string[] = [];

  for (const item of items) {
    try {
      posts.push(map(item));
    } catch (error) {
      if (!(error instanceof MalformedPostError)) throw error;
      skipped.push(error.message);
    }
  }

  // Array.prototype.sort is stable, so equal timestamps keep provider order.
  posts.sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime());
  return { posts, skipped };
}

/**
 * Maps a raw provider payload to posts, newest first. Malformed items are
 * skipped; an unrecognizable envelope throws `MalformedPayloadError`.
 */
export function normalizePosts(platform: Platform, raw: unknown): Post[] {
  return normalizeWithReport(platform, raw).posts;
}
