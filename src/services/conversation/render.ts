import he from 'he';
import type { Page, Platform, Post } from '@/types/social';
import type { InlineKeyboard } from '@/types/transport';
import type { Translate } from '@/utils/i18n';
import { encodeCallback, type LatestCommand } from './callbackData';

// Telegram caps media captions at 1024 characters after entity parsing.
export const MAX_CAPTION_LENGTH = 900;

/** Cuts on code points so a surrogate pair is never split. */
export function truncateCaption(caption: string, max: number = MAX_CAPTION_LENGTH): string {
  const codePoints = Array.from(caption);
  if (codePoints.length <= max) return caption;
  return `${codePoints.slice(0, max - 1).join('').trimEnd()}…`;
}

export function renderPost(post: Post, platform: Platform, t: Translate): string {
  const link = `<a href="${he.escape(post.url)}">${t('post.view', { platform: t(`platforms.${platform}`) })}</a>`;
  const caption = post.caption.trim();
  return caption ? `${link}\n\n${he.escape(truncateCaption(caption))}` : link;
}

/** Text stand-in for a post whose media could not be sent. */
export function renderPostFallback(post: Post, platform: Platform, t: Translate): string {
  const body = renderPost(post, platform, t);
  if (!post.mediaUrl) return body;
  return `${body}\n\n<a href="${he.escape(post.mediaUrl)}">${t('post.media')}</a>`;
}

export function renderPageStatus(page: Page, t: Translate, key = 'delivery.pageStatus'): string {
  return t(key, { page: page.pageIndex + 1, pages: page.pageCount });
}

export function navigationKeyboard(
  command: LatestCommand,
  account: string,
  page: Page,
  t: Translate,
): InlineKeyboard {
  const arrows: InlineKeyboard[number] = [];
  if (page.hasPrevious) {
    arrows.push({
      text: t('delivery.prev'),
      callbackData: encodeCallback({ type: 'page', command, account, pageIndex: page.pageIndex - 1 }),
    });
  }
  if (page.hasNext) {
    arrows.push({
      text: t('delivery.next'),
      callbackData: encodeCallback({ type: 'page', command, account, pageIndex: page.pageIndex + 1 }),
    });
  }

  const refresh = [
    { text: t('delivery.refresh'), callbackData: encodeCallback({ type: 'refresh', command, account }) },
  ];
  return arrows.length > 0 ? [arrows, refresh] : [refresh];
}

export function menuKeyboard(t: Translate): InlineKeyboard {
  return [
    [
      { text: t('menu.x'), callbackData: encodeCallback({ type: 'menu', action: 'x' }) },
      { text: t('menu.ig'), callbackData: encodeCallback({ type: 'menu', action: 'ig' }) },
    ],
    [
      { text: t('menu.auto'), callbackData: encodeCallback({ type: 'menu', action: 'auto' }) },
      { text: t('menu.help'), callbackData: encodeCallback({ type: 'menu', action: 'help' }) },
    ],
  ];
}
