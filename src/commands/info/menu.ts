import type { CommandProps } from '@/types/command';
import { createCommandLogger } from '@/utils/commandLogger';
import { createErrorHandler } from '@/utils/errorHandler';

const commandLogger = createCommandLogger('menu');
const errorHandler = createErrorHandler('menu');

export default {
  name: 'menu',
  async execute(client, request) {
    commandLogger.logAction({ chatType: request.chatType });
    try {
      await client.conversation.showMenu(request.chatId, request.locale);
    } catch (error) {
      await errorHandler({
        transport: client.transport,
        t: client.localizer.translator(request.locale),
        chatId: request.chatId,
        error,
        userId: request.userId,
      });
    }
  },
} satisfies CommandProps;
