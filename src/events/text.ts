import type BotClient from '@/services/Client';
import { handleCommandError } from '@/utils/errorHandler';
import { sanitizeInput } from '@/utils/validation';
import type { Chat } from 'telegraf/types';
import { message } from 'telegraf/filters';

/** Plain text: a pending username answer, otherwise a hint in private chats. */
export default class TextEvent {
  private client: BotClient;

  constructor(c: BotClient) {
    this.client = c;
    c.on(message('text'), (ctx) => {
      const { chat, from, text } = ctx.message;
      c.detach('text message', () => this.handleText(chat, text, from?.language_code, from?.id));
    });
  }

  private async handleText(chat: Chat, text: string, locale?: string, userId?: number): Promise<void> {
    const { transport, conversation, localizer } = this.client;
    const t = localizer.translator(locale);

    try {
      if (text.startsWith('/')) {
        if (chat.type === 'private') {
          await transport.sendText(chat.id, t('common.unknownCommand'));
        }
        return;
      }

      const handled = await conversation.handleText(chat.id, locale, sanitizeInput(text), userId);
      if (!handled && chat.type === 'private') {
        await transport.sendText(chat.id, t('common.idleHint'));
      }
    } catch (error) {
      await handleCommandError({ transport, t, chatId: chat.id, error, commandName: 'text' });
    }
  }
}
