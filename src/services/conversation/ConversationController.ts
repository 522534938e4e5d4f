import he from 'he';
import type { Detection } from '@/services/social/PlatformDetector';
import type { FetchOrchestrator } from '@/services/social/FetchOrchestrator';
import { createTarget } from '@/services/social/target';
import type { Platform, Post } from '@/types/social';
import type { ChatTransport } from '@/types/transport';
import type { CleanupScheduler } from '@/utils/cleanupScheduler';
import { checkCooldown, createCooldownManager, setCooldown, type CooldownManager } from '@/utils/cooldown';
import { FetchError, InvalidHandleError, SendError } from '@/utils/errors';
import { sleep } from '@/utils/http';
import type { Localizer, Translate } from '@/utils/i18n';
import logger from '@/utils/logger';
import { createMemoryManager, type MemoryManager } from '@/utils/memoryManager';
import { pageOf } from '@/utils/pagination';
import {
  commandForMenu,
  commandForPlatform,
  decodeCallback,
  platformForCommand,
  type LatestCommand,
} from './callbackData';
import {
  menuKeyboard,
  navigationKeyboard,
  renderPageStatus,
  renderPost,
  renderPostFallback,
} from './render';

export type ConversationState = { mode: 'IDLE' } | { mode: 'AWAITING_USERNAME'; command: LatestCommand };

export interface ControllerOptions {
  pageSize: number;
  cleanupDelayMs: number;
  sendPacingMs: number;
  promptTimeoutMs: number;
  /** Minimum gap between lookups by one user; 0 disables it. */
  lookupCooldownMs?: number;
  pause?: (ms: number) => Promise<void>;
  now?: () => number;
}

export interface ControllerDeps {
  orchestrator: Pick<FetchOrchestrator, 'resolve'>;
  detector: { detect(rawHandle: string, force?: boolean): Promise<Detection> };
  transport: ChatTransport;
  scheduler: Pick<CleanupScheduler, 'schedule'>;
  localizer: Localizer;
}

export interface CallbackRequest {
  chatId: number;
  messageId?: number;
  callbackId: string;
  data: string;
  locale?: string;
  userId?: number;
}

interface DeliveryRequest {
  chatId: number;
  t: Translate;
  command: LatestCommand;
  account: string;
  force: boolean;
  pageIndex: number;
  intro: boolean;
  navigationMessageId?: number;
}

/**
 * Per-chat conversation flow: prompts for a handle when none was given,
 * resolves posts, then delivers one page and registers every delivered
 * message for cleanup.
 */
export class ConversationController {
  private readonly states: MemoryManager<number, { command: LatestCommand }>;
  private readonly pause: (ms: number) => Promise<void>;
  private readonly cooldowns: CooldownManager;

  constructor(
    private readonly deps: ControllerDeps,
    private readonly options: ControllerOptions,
  ) {
    this.states = createMemoryManager<number, { command: LatestCommand }>({
      maxAge: options.promptTimeoutMs,
      maxSize: 10_000,
      now: options.now,
    });
    this.pause = options.pause ?? sleep;
    this.cooldowns = createCooldownManager('lookup', options.lookupCooldownMs ?? 0);
  }

  stateOf(chatId: number): ConversationState {
    const awaiting = this.states.get(chatId);
    return awaiting ? { mode: 'AWAITING_USERNAME', command: awaiting.command } : { mode: 'IDLE' };
  }

  async showLatest(
    chatId: number,
    locale: string | undefined,
    command: LatestCommand,
    input: string,
    userId?: number,
  ): Promise<void> {
    const account = input.trim();
    if (!account) {
      await this.promptForHandle(chatId, locale, command);
      return;
    }

    this.states.delete(chatId);
    const t = this.deps.localizer.translator(locale);
    if (await this.coolingDown(chatId, userId, t)) return;

    await this.deliver({
      chatId,
      t,
      command,
      account,
      force: false,
      pageIndex: 0,
      intro: true,
    });
  }

  async promptForHandle(chatId: number, locale: string | undefined, command: LatestCommand): Promise<void> {
    this.states.set(chatId, { command });
    const t = this.deps.localizer.translator(locale);
    await this.deps.transport.sendText(chatId, t(`commands.${command}.prompt`));
  }

  /** Returns false when the chat was not waiting for a username. */
  async handleText(chatId: number, locale: string | undefined, text: string, userId?: number): Promise<boolean> {
    const awaiting = this.states.get(chatId);
    if (!awaiting) return false;

    this.states.delete(chatId);
    const account = text.trim();
    if (!account) {
      const t = this.deps.localizer.translator(locale);
      await this.deps.transport.sendText(chatId, t(`commands.${awaiting.command}.usage`));
      return true;
    }

    await this.showLatest(chatId, locale, awaiting.command, account, userId);
    return true;
  }

  async cancel(chatId: number, locale: string | undefined): Promise<void> {
    const t = this.deps.localizer.translator(locale);
    const wasWaiting = this.states.get(chatId) !== undefined;
    this.states.delete(chatId);
    await this.deps.transport.sendText(chatId, t(wasWaiting ? 'commands.cancel.done' : 'commands.cancel.nothing'));
  }

  async showMenu(chatId: number, locale: string | undefined): Promise<void> {
    const t = this.deps.localizer.translator(locale);
    await this.deps.transport.sendText(chatId, t('menu.welcome'), menuKeyboard(t));
  }

  async showHelp(chatId: number, locale: string | undefined): Promise<void> {
    const t = this.deps.localizer.translator(locale);
    await this.deps.transport.sendText(chatId, t('commands.help.text'));
  }

  async handleCallback(request: CallbackRequest): Promise<void> {
    const { chatId, messageId, callbackId, data, locale, userId } = request;
    const t = this.deps.localizer.translator(locale);
    const action = decodeCallback(data);

    await this.deps.transport.answerCallback(callbackId).catch((error) => {
      logger.debug('answerCallbackQuery failed', { error: error instanceof Error ? error.message : String(error) });
    });

    if (!action) {
      logger.warn(`Unknown callback payload: ${data}`);
      await this.deps.transport.sendText(chatId, t('common.unknownAction'));
      return;
    }

    switch (action.type) {
      case 'menu':
        if (action.action === 'help') {
          await this.showHelp(chatId, locale);
        } else {
          await this.promptForHandle(chatId, locale, commandForMenu(action.action));
        }
        return;

      case 'page':
        await this.deliver({
          chatId,
          t,
          command: action.command,
          account: action.account,
          force: false,
          pageIndex: action.pageIndex,
          intro: false,
          navigationMessageId: messageId,
        });
        return;

      case 'refresh':
        if (await this.coolingDown(chatId, userId, t)) return;
        if (messageId !== undefined) {
          await this.editQuietly(chatId, messageId, t('delivery.refreshing'));
        }
        await this.deliver({
          chatId,
          t,
          command: action.command,
          account: action.account,
          force: true,
          pageIndex: 0,
          intro: true,
        });
        return;
    }
  }

  /** Sends the wait notice and returns true while the requester is cooling down. */
  private async coolingDown(chatId: number, userId: number | undefined, t: Translate): Promise<boolean> {
    const key = String(userId ?? chatId);
    const cooldown = checkCooldown(this.cooldowns, key, t);
    if (cooldown.onCooldown && cooldown.message) {
      await this.deps.transport.sendText(chatId, cooldown.message);
      return true;
    }
    setCooldown(this.cooldowns, key);
    return false;
  }

  private async lookup(command: LatestCommand, account: string, force: boolean): Promise<Detection> {
    const platform = platformForCommand(command);
    if (!platform) {
      return this.deps.detector.detect(account, force);
    }
    const target = createTarget(platform, account);
    return { target, posts: await this.deps.orchestrator.resolve(target, force) };
  }

  private async deliver(request: DeliveryRequest): Promise<void> {
    const { chatId, t, command } = request;

    await this.deps.transport.sendTyping(chatId).catch((error) => {
      logger.debug('sendChatAction failed', { error: error instanceof Error ? error.message : String(error) });
    });

    let detection: Detection;
    try {
      detection = await this.lookup(command, request.account, request.force);
    } catch (error) {
      if (error instanceof InvalidHandleError) {
        await this.deps.transport.sendText(chatId, t(`commands.${command}.usage`));
        return;
      }
      if (error instanceof FetchError) {
        await this.deps.transport.sendText(
          chatId,
          t('delivery.fetchFailed', { account: he.escape(error.target.handle) }),
        );
        return;
      }
      throw error;
    }

    const { target, posts } = detection;
    const vars = { account: he.escape(target.handle), platform: t(`platforms.${target.platform}`) };

    if (posts.length === 0) {
      await this.deps.transport.sendText(chatId, t('delivery.noPosts', vars));
      return;
    }

    const page = pageOf(posts, request.pageIndex, this.options.pageSize);
    const resolvedCommand = commandForPlatform(target.platform);

    if (request.navigationMessageId !== undefined) {
      await this.editQuietly(chatId, request.navigationMessageId, renderPageStatus(page, t, 'delivery.pageShown'));
    }
    let sent = 0;

    const paced = async <T>(send: () => Promise<T>): Promise<T> => {
      if (sent > 0 && this.options.sendPacingMs > 0) {
        await this.pause(this.options.sendPacingMs);
      }
      sent++;
      return send();
    };

    if (request.intro) {
      const introId = await paced(() =>
        this.deps.transport.sendText(chatId, t('delivery.intro', { ...vars, count: posts.length })),
      );
      await this.trackForCleanup(chatId, introId);
    }

    for (const post of page.posts) {
      const postId = await paced(() => this.sendPost(chatId, post, target.platform, t));
      if (postId !== null) {
        await this.trackForCleanup(chatId, postId);
      }
    }

    const navId = await paced(() =>
      this.deps.transport.sendText(
        chatId,
        renderPageStatus(page, t),
        navigationKeyboard(resolvedCommand, target.handle, page, t),
      ),
    );
    await this.trackForCleanup(chatId, navId);
  }

  private async sendPost(chatId: number, post: Post, platform: Platform, t: Translate): Promise<number | null> {
    if (post.mediaUrl) {
      try {
        return await this.deps.transport.sendMedia(chatId, post.mediaUrl, renderPost(post, platform, t), post.isVideo);
      } catch (error) {
        if (!(error instanceof SendError)) throw error;
        logger.warn(`Media send failed for post ${post.id}, sending as text`, { error: error.message });
        return this.sendTextSafely(chatId, renderPostFallback(post, platform, t), post.id);
      }
    }
    return this.sendTextSafely(chatId, renderPost(post, platform, t), post.id);
  }

  private async sendTextSafely(chatId: number, html: string, postId: string): Promise<number | null> {
    try {
      return await this.deps.transport.sendText(chatId, html);
    } catch (error) {
      logger.error(`Could not deliver post ${postId} to chat ${chatId}`, {
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  private async trackForCleanup(chatId: number, messageId: number): Promise<void> {
    await this.deps.scheduler.schedule(chatId, messageId, this.options.cleanupDelayMs);
  }

  private async editQuietly(chatId: number, messageId: number, html: string): Promise<void> {
    try {
      await this.deps.transport.editText(chatId, messageId, html);
    } catch (error) {
      logger.debug(`Could not edit message ${messageId} in chat ${chatId}`, {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
