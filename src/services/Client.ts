import * as config from '@/config';
import CallbackQueryEvent from '@/events/callbackQuery';
import TextEvent from '@/events/text';
import initializeCommands from '@/handlers/initializeCommands';
import type { CommandProps } from '@/types/command';
import type { SnapshotStore } from '@/types/social';
import type { ChatTransport } from '@/types/transport';
import { CleanupScheduler } from '@/utils/cleanupScheduler';
import { Localizer } from '@/utils/i18n';
import logger from '@/utils/logger';
import {
  MemoryPendingDeletionStore,
  PgPendingDeletionStore,
  type PendingDeletionStore,
} from '@/utils/pendingDeletionDb';
import { createPool } from '@/utils/pgClient';
import { createRateLimiter } from '@/utils/rateLimiter';
import path from 'path';
import type { Pool } from 'pg';
import { Telegraf, type Context } from 'telegraf';
import { fileURLToPath } from 'url';
import { ConversationController } from './conversation/ConversationController';
import { FetchOrchestrator } from './social/FetchOrchestrator';
import { PlatformDetector } from './social/PlatformDetector';
import { ScraperClient } from './social/ScraperClient';
import { MemorySnapshotStore, PgSnapshotStore } from './social/SnapshotStore';
import { TelegramTransport } from './TelegramTransport';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const srcDir = path.join(__dirname, '..');

export default class BotClient extends Telegraf<Context> {
  public commands = new Map<string, CommandProps>();
  public localizer = new Localizer();
  public readonly transport: ChatTransport;
  private pool: Pool | null = null;
  private scheduler: CleanupScheduler | null = null;
  private conversationController: ConversationController | null = null;

  constructor(token: string = config.TOKEN) {
    super(token, { handlerTimeout: 90_000 });
    this.transport = new TelegramTransport(this.telegram, createRateLimiter(config.TELEGRAM_MAX_PER_SECOND));

    this.catch((error, ctx) => {
      logger.error(`Unhandled error while processing update ${ctx.update.update_id}:`, error);
    });
  }

  get conversation(): ConversationController {
    if (!this.conversationController) {
      throw new Error('BotClient.init() has not completed');
    }
    return this.conversationController;
  }

  public async init() {
    await this.localizer.loadDirectory();
    const { snapshots, deletions } = await this.setupDatabase();
    await this.setupConversation(snapshots, deletions);
    await initializeCommands(this);
    this.setupEvents();
  }

  /** Runs an update handler off the polling loop so one slow chat does not hold up the rest. */
  public detach(label: string, task: () => Promise<void>): void {
    task().catch((error) => {
      logger.error(`Unhandled error in ${label}:`, error);
    });
  }

  public async shutdown(signal?: string): Promise<void> {
    logger.info(`Received ${signal ?? 'shutdown'}: stopping bot and closing database pool...`);
    this.scheduler?.stop();
    try {
      this.stop(signal);
    } catch (error) {
      logger.debug('Bot was not polling', { error: error instanceof Error ? error.message : String(error) });
    }
    if (this.pool) {
      await this.pool.end();
      logger.info('Database pool closed.');
    }
  }

  private setupEvents() {
    logger.info('Initializing events...');
    new CallbackQueryEvent(this);
    new TextEvent(this);
  }

  private async setupDatabase(): Promise<{ snapshots: SnapshotStore; deletions: PendingDeletionStore }> {
    if (!config.DATABASE_URL) {
      logger.warn(
        'DATABASE_URL is not set: snapshots and pending deletions are kept in memory and lost on restart',
      );
      return { snapshots: new MemorySnapshotStore(), deletions: new MemoryPendingDeletionStore() };
    }

    this.pool = await createPool({
      connectionString: config.DATABASE_URL,
      sslMode: config.PGSSLMODE,
      sslRootCert: config.PGSSLROOTCERT,
    });

    const snapshots = new PgSnapshotStore(this.pool);
    const deletions = new PgPendingDeletionStore(this.pool);
    await snapshots.ensureSchema();
    await deletions.ensureSchema();
    logger.info('Database ready');
    return { snapshots, deletions };
  }

  private async setupConversation(snapshots: SnapshotStore, deletions: PendingDeletionStore) {
    const provider = new ScraperClient({
      apiKey: config.SCRAPER_API_KEY,
      endpoints: {
        x: { host: config.X_API_HOST, path: config.X_API_PATH },
        ig: { host: config.IG_API_HOST, path: config.IG_API_PATH },
      },
      postLimit: config.PROVIDER_POST_LIMIT,
      timeoutMs: config.PROVIDER_TIMEOUT_MS,
      maxRetries: config.PROVIDER_MAX_RETRIES,
    });
    const orchestrator = new FetchOrchestrator(provider, snapshots, {
      freshnessWindowMs: config.FRESHNESS_WINDOW_MS,
    });

    this.scheduler = new CleanupScheduler(this.transport, deletions);
    try {
      await this.scheduler.restore();
    } catch (error) {
      logger.error('Failed to restore pending deletions:', error);
    }

    this.conversationController = new ConversationController(
      {
        orchestrator,
        detector: new PlatformDetector(orchestrator, snapshots),
        transport: this.transport,
        scheduler: this.scheduler,
        localizer: this.localizer,
      },
      {
        pageSize: config.PAGE_SIZE,
        cleanupDelayMs: config.CLEANUP_DELAY_MS,
        sendPacingMs: config.SEND_PACING_MS,
        promptTimeoutMs: config.PROMPT_TIMEOUT_MS,
        lookupCooldownMs: config.LATEST_COOLDOWN_MS,
      },
    );
  }
}
