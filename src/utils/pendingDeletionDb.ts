import type { Pool } from 'pg';
import { createDatabaseError } from './dbErrors';

export interface PendingDeletion {
  chatId: number;
  messageId: number;
  fireAt: Date;
}

export interface PendingDeletionStore {
  save(deletion: PendingDeletion): Promise<void>;
  remove(chatId: number, messageId: number): Promise<void>;
  list(): Promise<PendingDeletion[]>;
}

interface PendingDeletionRow {
  chat_id: string | number;
  message_id: string | number;
  fire_at: Date | string;
}

function deletionKey(chatId: number, messageId: number): string {
  return `${chatId}:${messageId}`;
}

export class MemoryPendingDeletionStore implements PendingDeletionStore {
  private deletions = new Map<string, PendingDeletion>();

  async save(deletion: PendingDeletion): Promise<void> {
    this.deletions.set(deletionKey(deletion.chatId, deletion.messageId), { ...deletion });
  }

  async remove(chatId: number, messageId: number): Promise<void> {
    this.deletions.delete(deletionKey(chatId, messageId));
  }

  async list(): Promise<PendingDeletion[]> {
    return [...this.deletions.values()].sort((a, b) => a.fireAt.getTime() - b.fireAt.getTime());
  }
}

export class PgPendingDeletionStore implements PendingDeletionStore {
  constructor(private pool: Pool) {}

  async ensureSchema(): Promise<void> {
    try {
      await this.pool.query(`
        CREATE TABLE IF NOT EXISTS pending_deletions (
          chat_id BIGINT NOT NULL,
          message_id BIGINT NOT NULL,
          fire_at TIMESTAMPTZ NOT NULL,
          PRIMARY KEY (chat_id, message_id)
        )
      `);
    } catch (error) {
      throw createDatabaseError(error, 'creating pending_deletions');
    }
  }

  async save(deletion: PendingDeletion): Promise<void> {
    const query = `
      INSERT INTO pending_deletions (chat_id, message_id, fire_at)
      VALUES ($1, $2, $3)
      ON CONFLICT (chat_id, message_id) DO UPDATE SET fire_at = EXCLUDED.fire_at
    `;

    try {
      await this.pool.query(query, [deletion.chatId, deletion.messageId, deletion.fireAt]);
    } catch (error) {
      throw createDatabaseError(error, 'saving pending deletion');
    }
  }

  async remove(chatId: number, messageId: number): Promise<void> {
    try {
      await this.pool.query('DELETE FROM pending_deletions WHERE chat_id = $1 AND message_id = $2', [
        chatId,
        messageId,
      ]);
    } catch (error) {
      throw createDatabaseError(error, 'removing pending deletion');
    }
  }

  async list(): Promise<PendingDeletion[]> {
    const query = `
      SELECT chat_id, message_id, fire_at FROM pending_deletions
      ORDER BY fire_at ASC
    `;

    try {
      const result = await this.pool.query<PendingDeletionRow>(query);
      return result.rows.map((row) => ({
        chatId: Number(row.chat_id),
        messageId: Number(row.message_id),
        fireAt: new Date(row.fire_at),
      }));
    } catch (error) {
      throw createDatabaseError(error, 'fetching pending deletions');
    }
  }
}
