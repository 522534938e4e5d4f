import type { ChatTransport } from '@/types/transport';
import type { Translate } from './i18n';
import logger from './logger';

export interface ErrorHandlerOptions {
  transport: Pick<ChatTransport, 'sendText'>;
  t: Translate;
  chatId: number;
  error: unknown;
  commandName: string;
  userId?: number;
  username?: string;
}

export async function handleCommandError(options: ErrorHandlerOptions): Promise<void> {
  const { transport, t, chatId, error, commandName, userId, username } = options;

  const userInfo = username ? `${username} (${userId ?? 'unknown'})` : String(userId ?? 'unknown');
  const message = error instanceof Error ? error.message : String(error);
  logger.error(`Error in ${commandName} command for user ${userInfo}: ${message}`);

  try {
    await transport.sendText(chatId, t('common.error'));
  } catch (replyError) {
    logger.error(`Failed to send error message for ${commandName} command: ${replyError}`);
  }
}

export function createErrorHandler(commandName: string) {
  return async (options: Omit<ErrorHandlerOptions, 'commandName'>) => {
    return handleCommandError({ ...options, commandName });
  };
}
