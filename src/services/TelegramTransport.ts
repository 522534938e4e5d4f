import { Markup, type Telegram } from 'telegraf';
import type { InlineKeyboardMarkup } from 'telegraf/types';
import type { ChatTransport, InlineKeyboard } from '@/types/transport';
import { DeleteError, SendError } from '@/utils/errors';
import type { RateLimiter } from '@/utils/rateLimiter';

function toMarkup(keyboard?: InlineKeyboard): InlineKeyboardMarkup | undefined {
  if (!keyboard || keyboard.length === 0) return undefined;
  return Markup.inlineKeyboard(
    keyboard.map((row) => row.map((button) => Markup.button.callback(button.text, button.callbackData))),
  ).reply_markup;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** `ChatTransport` over the Bot API, HTML parse mode throughout. */
export class TelegramTransport implements ChatTransport {
  constructor(
    private readonly telegram: Telegram,
    private readonly limiter: RateLimiter,
  ) {}

  async sendText(chatId: number, html: string, keyboard?: InlineKeyboard): Promise<number> {
    try {
      const message = await this.limiter.schedule(() =>
        this.telegram.sendMessage(chatId, html, {
          parse_mode: 'HTML',
          reply_markup: toMarkup(keyboard),
        }),
      );
      return message.message_id;
    } catch (error) {
      throw new SendError(`sendMessage to ${chatId} failed: ${describe(error)}`, error);
    }
  }

  async sendMedia(
    chatId: number,
    mediaUrl: string,
    captionHtml: string,
    isVideo: boolean,
    keyboard?: InlineKeyboard,
  ): Promise<number> {
    const extra = {
      caption: captionHtml,
      parse_mode: 'HTML' as const,
      reply_markup: toMarkup(keyboard),
    };

    try {
      const message = await this.limiter.schedule(async () =>
        isVideo
          ? await this.telegram.sendVideo(chatId, mediaUrl, extra)
          : await this.telegram.sendPhoto(chatId, mediaUrl, extra),
      );
      return message.message_id;
    } catch (error) {
      throw new SendError(`send ${isVideo ? 'video' : 'photo'} to ${chatId} failed: ${describe(error)}`, error);
    }
  }

  async editText(chatId: number, messageId: number, html: string, keyboard?: InlineKeyboard): Promise<void> {
    try {
      await this.limiter.schedule(() =>
        this.telegram.editMessageText(chatId, messageId, undefined, html, {
          parse_mode: 'HTML',
          reply_markup: toMarkup(keyboard),
        }),
      );
    } catch (error) {
      throw new SendError(`editMessageText ${messageId} in ${chatId} failed: ${describe(error)}`, error);
    }
  }

  async deleteMessage(chatId: number, messageId: number): Promise<void> {
    try {
      await this.limiter.schedule(() => this.telegram.deleteMessage(chatId, messageId));
    } catch (error) {
      throw new DeleteError(`deleteMessage ${messageId} in ${chatId} failed: ${describe(error)}`, error);
    }
  }

  async answerCallback(callbackId: string, text?: string): Promise<void> {
    await this.limiter.schedule(() => this.telegram.answerCbQuery(callbackId, text));
  }

  async sendTyping(chatId: number): Promise<void> {
    await this.limiter.schedule(() => this.telegram.sendChatAction(chatId, 'typing'));
  }
}
