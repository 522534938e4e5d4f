import type { CommandProps } from '@/types/command';
import { createCommandLogger } from '@/utils/commandLogger';
import { createErrorHandler } from '@/utils/errorHandler';
import { sanitizeInput } from '@/utils/validation';
import type { LatestCommand } from './callbackData';

export function createLatestCommand(name: LatestCommand): CommandProps {
  const commandLogger = createCommandLogger(name);
  const errorHandler = createErrorHandler(name);

  return {
    name,
    execute: async (client, request) => {
      const t = client.localizer.translator(request.locale);
      const account = sanitizeInput(request.args);

      commandLogger.logAction({
        chatType: request.chatType,
        additionalInfo: account ? `account ${account}` : 'no account (prompting)',
      });

      try {
        await client.conversation.showLatest(request.chatId, request.locale, name, account, request.userId);
      } catch (error) {
        await errorHandler({
          transport: client.transport,
          t,
          chatId: request.chatId,
          error,
          userId: request.userId,
          username: request.username,
        });
      }
    },
  };
}
