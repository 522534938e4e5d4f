import type { CommandProps } from '@/types/command';
import { createCommandLogger } from '@/utils/commandLogger';
import { createErrorHandler } from '@/utils/errorHandler';

const commandLogger = createCommandLogger('help');
const errorHandler = createErrorHandler('help');

export default {
  name: 'help',
  async execute(client, request) {
    commandLogger.logAction({ chatType: request.chatType });
    try {
      await client.conversation.showHelp(request.chatId, request.locale);
    } catch (error) {
      await errorHandler({
        transport: client.transport,
        t: client.localizer.translator(request.locale),
        chatId: request.chatId,
        error,
        userId: request.userId,
        username: request.username,
      });
    }
  },
} satisfies CommandProps;
