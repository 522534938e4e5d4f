import type BotClient from '@/services/Client';
import type { ChatKind } from '@/utils/commandLogger';

export type CommandClient = Pick<BotClient, 'transport' | 'conversation' | 'localizer'>;

export interface CommandRequest {
  chatId: number;
  chatType: ChatKind;
  userId?: number;
  username?: string;
  locale?: string;
  args: string;
}

export interface CommandProps {
  name: string;
  category?: string;
  execute: (client: CommandClient, request: CommandRequest) => Promise<void>;
}

export function isCommand(value: unknown): value is CommandProps {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    typeof value.name === 'string' &&
    'execute' in value &&
    typeof value.execute === 'function'
  );
}
