import logger from './logger';

export type ChatKind = 'private' | 'group' | 'supergroup' | 'channel';

export interface CommandLogOptions {
  commandName: string;
  additionalInfo?: string;
  chatType?: ChatKind;
}

export function logUserAction(options: CommandLogOptions): void {
  const { commandName, chatType, additionalInfo } = options;

  let logMessage = `User executed ${commandName} command`;

  if (chatType === 'private') {
    logMessage += ` in DM`;
  } else if (chatType) {
    logMessage += ` in ${chatType}`;
  }

  if (additionalInfo) {
    logMessage += ` with ${additionalInfo}`;
  }

  logger.info(logMessage);
}

export function createCommandLogger(commandName: string) {
  return {
    logAction: (options: Omit<CommandLogOptions, 'commandName'> = {}) => {
      logUserAction({ ...options, commandName });
    },
  };
}
