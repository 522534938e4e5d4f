import type BotClient from '@/services/Client';
import type { CallbackRequest } from '@/services/conversation/ConversationController';
import { handleCommandError } from '@/utils/errorHandler';
import { callbackQuery } from 'telegraf/filters';

export default class CallbackQueryEvent {
  private client: BotClient;

  constructor(c: BotClient) {
    this.client = c;
    c.on(callbackQuery('data'), (ctx) => {
      const { id, from, data, message } = ctx.callbackQuery;
      const request: CallbackRequest = {
        chatId: message?.chat.id ?? from.id,
        messageId: message?.message_id,
        callbackId: id,
        data,
        locale: from.language_code,
        userId: from.id,
      };
      c.detach('callback query', () => this.handleCallback(request, from.id, from.username));
    });
  }

  private async handleCallback(request: CallbackRequest, userId: number, username?: string): Promise<void> {
    try {
      await this.client.conversation.handleCallback(request);
    } catch (error) {
      await handleCommandError({
        transport: this.client.transport,
        t: this.client.localizer.translator(request.locale),
        chatId: request.chatId,
        error,
        commandName: `callback ${request.data}`,
        userId,
        username,
      });
    }
  }
}
