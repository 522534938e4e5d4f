import type { ChatTransport } from '@/types/transport';
import logger from './logger';
import type { PendingDeletion, PendingDeletionStore } from './pendingDeletionDb';

interface ActiveDeletion {
  deletion: PendingDeletion;
  timeoutId: NodeJS.Timeout;
}

// setTimeout overflows above 2^31-1 ms; longer delays are re-armed in steps.
const MAX_TIMEOUT_MS = 2_147_483_647;

/**
 * Deletes delivered messages after a delay. Every obligation fires at most
 * once and is discarded whatever the outcome of the delete.
 */
export class CleanupScheduler {
  private active = new Map<string, ActiveDeletion>();

  constructor(
    private readonly transport: Pick<ChatTransport, 'deleteMessage'>,
    private readonly store: PendingDeletionStore,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  get pendingCount(): number {
    return this.active.size;
  }

  async schedule(chatId: number, messageId: number, delayMs: number): Promise<void> {
    const deletion: PendingDeletion = {
      chatId,
      messageId,
      fireAt: new Date(this.clock().getTime() + Math.max(0, delayMs)),
    };

    try {
      await this.store.save(deletion);
    } catch (error) {
      logger.warn(`Could not persist cleanup for message ${messageId} in chat ${chatId}`, {
        error: error instanceof Error ? error.message : String(error),
      });
    }

    this.arm(deletion);
  }

  async fire(deletion: PendingDeletion): Promise<void> {
    const key = this.keyOf(deletion);
    const entry = this.active.get(key);
    if (entry) clearTimeout(entry.timeoutId);
    this.active.delete(key);

    try {
      await this.transport.deleteMessage(deletion.chatId, deletion.messageId);
      logger.debug(`Deleted message ${deletion.messageId} in chat ${deletion.chatId}`);
    } catch (error) {
      logger.debug(`Cleanup delete failed for message ${deletion.messageId} in chat ${deletion.chatId}`, {
        error: error instanceof Error ? error.message : String(error),
      });
    }

    try {
      await this.store.remove(deletion.chatId, deletion.messageId);
    } catch (error) {
      logger.warn(`Could not drop cleanup record for message ${deletion.messageId}`, {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  /**
   * Re-arms persisted obligations. Overdue ones get a zero delay and fire on
   * the timer queue, so startup does not wait on their deletes.
   */
  async restore(): Promise<number> {
    const deletions = await this.store.list();
    const now = this.clock().getTime();
    let overdue = 0;

    for (const deletion of deletions) {
      if (deletion.fireAt.getTime() <= now) overdue++;
      this.arm(deletion);
    }

    logger.info(`Restored ${deletions.length} pending deletion(s), ${overdue} overdue`);
    return deletions.length;
  }

  stop(): void {
    for (const { timeoutId } of this.active.values()) {
      clearTimeout(timeoutId);
    }
    this.active.clear();
  }

  private arm(deletion: PendingDeletion): void {
    const key = this.keyOf(deletion);
    const existing = this.active.get(key);
    if (existing) clearTimeout(existing.timeoutId);

    const remaining = Math.max(0, deletion.fireAt.getTime() - this.clock().getTime());
    const timeoutId = setTimeout(
      () => {
        if (deletion.fireAt.getTime() > this.clock().getTime()) {
          this.arm(deletion);
          return;
        }
        this.fire(deletion).catch((error) => {
          logger.error('Cleanup task failed:', error);
        });
      },
      Math.min(remaining, MAX_TIMEOUT_MS),
    );
    timeoutId.unref();

    this.active.set(key, { deletion, timeoutId });
  }

  private keyOf(deletion: PendingDeletion): string {
    return `${deletion.chatId}:${deletion.messageId}`;
  }
}
