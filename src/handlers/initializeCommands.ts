import type BotClient from '@/services/Client';
import { srcDir } from '@/services/Client';
import { isCommand, type CommandRequest } from '@/types/command';
import logger from '@/utils/logger';
import { readdirSync } from 'fs';
import path from 'path';
import type { Context } from 'telegraf';
import { pathToFileURL } from 'url';

function requestFrom(ctx: Context, args: string): CommandRequest | null {
  if (!ctx.chat) return null;
  return {
    chatId: ctx.chat.id,
    chatType: ctx.chat.type,
    userId: ctx.from?.id,
    username: ctx.from?.username,
    locale: ctx.from?.language_code,
    args,
  };
}

export default async (c: BotClient) => {
  logger.info('Processing commands...');
  const cmdDir = path.join(srcDir, 'commands');
  const published: Array<{ command: string; description: string }> = [];

  for (const cat of readdirSync(cmdDir)) {
    const commandFiles = readdirSync(path.join(cmdDir, cat)).filter(
      (f) => (f.endsWith('.js') || f.endsWith('.ts')) && !f.includes('.test.'),
    );
    for (const file of commandFiles) {
      const commandUrl = pathToFileURL(path.join(cmdDir, cat, file)).href;
      const mod: unknown = await import(commandUrl);
      const command = typeof mod === 'object' && mod !== null && 'default' in mod ? mod.default : undefined;
      if (!isCommand(command)) {
        logger.warn(`No command in file ${cat}/${file}.. Skipping`);
        continue;
      }
      command.category = cat;
      c.commands.set(command.name, command);

      c.command(command.name, (ctx) => {
        const request = requestFrom(ctx, ctx.payload);
        if (!request) return;
        c.detach(`/${command.name}`, () => command.execute(c, request));
      });

      published.push({
        command: command.name,
        description: c.localizer.text(`commands.${command.name}.description`),
      });
    }
  }

  try {
    await c.telegram.setMyCommands(published);
    logger.info(`✅ ${published.length} commands registered successfully`);
  } catch (error) {
    logger.error('Error on publishing commands:', error);
    logger.info('Bot will continue running with existing commands');
  }
};
