import type { ChatTransport, InlineKeyboard } from '@/types/transport';
import type { Post } from '@/types/social';
import { DeleteError, SendError } from '@/utils/errors';

export interface SentMessage {
  id: number;
  chatId: number;
  kind: 'text' | 'photo' | 'video';
  html: string;
  mediaUrl?: string;
  keyboard?: InlineKeyboard;
}

/** Records every outbound call; message ids count up from 100. */
export class FakeTransport implements ChatTransport {
  messages: SentMessage[] = [];
  edits: Array<{ chatId: number; messageId: number; html: string; keyboard?: InlineKeyboard }> = [];
  deleted: Array<{ chatId: number; messageId: number }> = [];
  answered: string[] = [];
  typing: number[] = [];
  failMedia = false;
  failText = false;
  failTextContaining: string | null = null;
  failDelete = false;
  private nextId = 100;

  async sendText(chatId: number, html: string, keyboard?: InlineKeyboard): Promise<number> {
    if (this.failText || (this.failTextContaining !== null && html.includes(this.failTextContaining))) {
      throw new SendError('text rejected');
    }
    const id = this.nextId++;
    this.messages.push({ id, chatId, kind: 'text', html, keyboard });
    return id;
  }

  async sendMedia(
    chatId: number,
    mediaUrl: string,
    captionHtml: string,
    isVideo: boolean,
    keyboard?: InlineKeyboard,
  ): Promise<number> {
    if (this.failMedia) throw new SendError('wrong file identifier/HTTP URL specified');
    const id = this.nextId++;
    this.messages.push({ id, chatId, kind: isVideo ? 'video' : 'photo', html: captionHtml, mediaUrl, keyboard });
    return id;
  }

  async editText(chatId: number, messageId: number, html: string, keyboard?: InlineKeyboard): Promise<void> {
    this.edits.push({ chatId, messageId, html, keyboard });
  }

  async deleteMessage(chatId: number, messageId: number): Promise<void> {
    if (this.failDelete) throw new DeleteError('message to delete not found');
    this.deleted.push({ chatId, messageId });
  }

  async answerCallback(callbackId: string): Promise<void> {
    this.answered.push(callbackId);
  }

  async sendTyping(chatId: number): Promise<void> {
    this.typing.push(chatId);
  }
}

export function makePost(index: number, overrides: Partial<Post> = {}): Post {
  return {
    id: String(1000 + index),
    url: `https://x.com/i/status/${1000 + index}`,
    caption: `post ${index}`,
    isVideo: false,
    timestamp: new Date(Date.UTC(2024, 0, 1, 0, 0, 0) - index * 60_000),
    ...overrides,
  };
}

/** Provider payload in the X envelope, newest first. */
export function xPayload(count: number, withMedia = false): { data: Array<Record<string, unknown>> } {
  return {
    data: Array.from({ length: count }, (_, i) => ({
      id_str: String(2000 - i),
      created_at: new Date(Date.UTC(2024, 4, 1, 12, 0, 0) - i * 3_600_000).toISOString(),
      full_text: `tweet ${i}`,
      ...(withMedia
        ? { extended_entities: { media: [{ type: 'photo', media_url_https: `https://pbs.twimg.com/media/${i}.jpg` }] } }
        : {}),
    })),
  };
}

/** Provider payload in the Instagram web profile envelope, newest first. */
export function igPayload(count: number): unknown {
  return {
    data: {
      user: {
        edge_owner_to_timeline_media: {
          edges: Array.from({ length: count }, (_, i) => ({
            node: {
              shortcode: `C${i}`,
              taken_at_timestamp: 1_714_564_800 - i * 3600,
              edge_media_to_caption: { edges: [{ node: { text: `gram ${i}` } }] },
              is_video: false,
            },
          })),
        },
      },
    },
  };
}
