import { beforeAll, describe, expect, it, vi, type Mock } from 'vitest';
import { FetchOrchestrator } from '@/services/social/FetchOrchestrator';
import { PlatformDetector } from '@/services/social/PlatformDetector';
import { MemorySnapshotStore } from '@/services/social/SnapshotStore';
import { FakeTransport, igPayload, xPayload } from '@/testing/fakes';
import type { Platform } from '@/types/social';
import { ProviderError } from '@/utils/errors';
import { Localizer } from '@/utils/i18n';
import { ConversationController, type ControllerOptions } from './ConversationController';

const localizer = new Localizer();

beforeAll(async () => {
  await localizer.loadDirectory();
});

const REFRESH = { text: '🔄 Refresh', callbackData: 'refresh_xlatest_alice' };

function setup(
  provide: (platform: Platform, handle: string) => Promise<unknown>,
  options: Partial<ControllerOptions> = {},
) {
  const transport = new FakeTransport();
  const store = new MemorySnapshotStore();
  const fetchMock: Mock<[Platform, string], Promise<unknown>> = vi.fn(provide);
  const orchestrator = new FetchOrchestrator({ fetch: fetchMock }, store, { freshnessWindowMs: 60_000 });
  const scheduler = { schedule: vi.fn(async (_chatId: number, _messageId: number, _delayMs: number) => {}) };
  const controller = new ConversationController(
    {
      orchestrator,
      detector: new PlatformDetector(orchestrator, store),
      transport,
      scheduler,
      localizer,
    },
    { pageSize: 5, cleanupDelayMs: 1000, sendPacingMs: 0, promptTimeoutMs: 60_000, ...options },
  );
  return { controller, transport, scheduler, fetchMock };
}

const texts = (transport: FakeTransport) => transport.messages.map((m) => m.html);

describe('ConversationController delivery', () => {
  it('sends a single message and schedules nothing when there are no posts', async () => {
    const { controller, transport, scheduler } = setup(async () => ({ data: [] }));

    await controller.showLatest(1, undefined, 'xlatest', 'Ghost');

    expect(texts(transport)).toEqual(['No public posts found for <b>@ghost</b> on 𝕏.']);
    expect(scheduler.schedule).not.toHaveBeenCalled();
  });

  it('delivers an intro, one page of posts and a navigation message', async () => {
    const { controller, transport, scheduler } = setup(async () => xPayload(12));

    await controller.showLatest(1, 'en', 'xlatest', 'alice');

    expect(texts(transport)).toEqual([
      '📰 Latest posts from <b>@alice</b> on 𝕏 (12 found)',
      '<a href="https://x.com/i/status/2000">View on 𝕏</a>\n\ntweet 0',
      '<a href="https://x.com/i/status/1999">View on 𝕏</a>\n\ntweet 1',
      '<a href="https://x.com/i/status/1998">View on 𝕏</a>\n\ntweet 2',
      '<a href="https://x.com/i/status/1997">View on 𝕏</a>\n\ntweet 3',
      '<a href="https://x.com/i/status/1996">View on 𝕏</a>\n\ntweet 4',
      'Page 1 of 3',
    ]);
    expect(transport.messages[6].keyboard).toEqual([
      [{ text: 'Next ▶️', callbackData: 'page_xlatest_alice_1' }],
      [REFRESH],
    ]);
    expect(scheduler.schedule.mock.calls).toEqual([100, 101, 102, 103, 104, 105, 106].map((id) => [1, id, 1000]));
  });

  it('sends media posts as photos', async () => {
    const { controller, transport } = setup(async () => xPayload(1, true));

    await controller.showLatest(1, undefined, 'xlatest', 'alice');

    expect(transport.messages[1]).toMatchObject({
      kind: 'photo',
      mediaUrl: 'https://pbs.twimg.com/media/0.jpg',
      html: '<a href="https://x.com/i/status/2000">View on 𝕏</a>\n\ntweet 0',
    });
  });

  it('falls back to text with a media link when the media send fails', async () => {
    const { controller, transport, scheduler } = setup(async () => xPayload(1, true));
    transport.failMedia = true;

    await controller.showLatest(1, undefined, 'xlatest', 'alice');

    expect(texts(transport)).toEqual([
      '📰 Latest posts from <b>@alice</b> on 𝕏 (1 found)',
      '<a href="https://x.com/i/status/2000">View on 𝕏</a>\n\ntweet 0\n\n<a href="https://pbs.twimg.com/media/0.jpg">Open media</a>',
      'Page 1 of 1',
    ]);
    expect(transport.messages[2].keyboard).toEqual([[REFRESH]]);
    expect(scheduler.schedule).toHaveBeenCalledTimes(3);
    expect(scheduler.schedule).toHaveBeenCalledWith(1, 101, 1000);
  });

  it('skips a post whose fallback also fails and keeps going', async () => {
    const { controller, transport, scheduler } = setup(async () => xPayload(1, true));
    transport.failMedia = true;
    transport.failTextContaining = 'Open media';

    await expect(controller.showLatest(1, undefined, 'xlatest', 'alice')).resolves.toBeUndefined();

    expect(texts(transport)).toEqual(['📰 Latest posts from <b>@alice</b> on 𝕏 (1 found)', 'Page 1 of 1']);
    expect(scheduler.schedule).toHaveBeenCalledTimes(2);
  });

  it('detects the platform and keys navigation to the detected command', async () => {
    const { controller, transport } = setup(async (platform) => (platform === 'x' ? { data: [] } : igPayload(2)));

    await controller.showLatest(1, undefined, 'latest', 'alice');

    expect(texts(transport)).toEqual([
      '📰 Latest posts from <b>@alice</b> on Instagram (2 found)',
      '<a href="https://www.instagram.com/p/C0/">View on Instagram</a>\n\ngram 0',
      '<a href="https://www.instagram.com/p/C1/">View on Instagram</a>\n\ngram 1',
      'Page 1 of 1',
    ]);
    expect(transport.messages[3].keyboard).toEqual([
      [{ text: '🔄 Refresh', callbackData: 'refresh_iglatest_alice' }],
    ]);
  });

  it('answers an invalid handle with the usage text', async () => {
    const { controller, transport, fetchMock } = setup(async () => xPayload(1));

    await controller.showLatest(1, undefined, 'xlatest', 'not valid!');

    expect(texts(transport)).toEqual(['Usage: /xlatest username (or an x.com link)']);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('reports a failed fetch without scheduling cleanup', async () => {
    const { controller, transport, scheduler } = setup(async () => {
      throw new ProviderError('http', 'x provider responded 503', 503);
    });

    await controller.showLatest(1, undefined, 'xlatest', 'alice');

    expect(texts(transport)).toEqual(["Couldn't fetch posts for <b>@alice</b> right now. Please try again later."]);
    expect(scheduler.schedule).not.toHaveBeenCalled();
  });

  it('paces successive sends', async () => {
    const pause = vi.fn(async (_ms: number) => {});
    const { controller } = setup(async () => xPayload(2), { sendPacingMs: 250, pause });

    await controller.showLatest(1, undefined, 'xlatest', 'alice');

    expect(pause.mock.calls).toEqual([[250], [250], [250]]);
  });
});

describe('ConversationController callbacks', () => {
  it('renders the requested page from the cache and retires the clicked buttons', async () => {
    const { controller, transport, fetchMock } = setup(async () => xPayload(12));
    await controller.showLatest(1, undefined, 'xlatest', 'alice');
    const before = transport.messages.length;

    await controller.handleCallback({ chatId: 1, messageId: 106, callbackId: 'cb-1', data: 'page_xlatest_alice_2' });

    expect(transport.answered).toEqual(['cb-1']);
    expect(transport.edits).toEqual([{ chatId: 1, messageId: 106, html: 'Showing page 3 of 3', keyboard: undefined }]);
    expect(transport.messages.slice(before).map((m) => m.html)).toEqual([
      '<a href="https://x.com/i/status/1990">View on 𝕏</a>\n\ntweet 10',
      '<a href="https://x.com/i/status/1989">View on 𝕏</a>\n\ntweet 11',
      'Page 3 of 3',
    ]);
    expect(transport.messages[transport.messages.length - 1].keyboard).toEqual([
      [{ text: '◀️ Prev', callbackData: 'page_xlatest_alice_1' }],
      [REFRESH],
    ]);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('forces a live fetch on refresh', async () => {
    const { controller, transport, fetchMock } = setup(async () => xPayload(2));
    await controller.showLatest(1, undefined, 'xlatest', 'alice');
    const before = transport.messages.length;

    await controller.handleCallback({ chatId: 1, messageId: 103, callbackId: 'cb-2', data: 'refresh_xlatest_alice' });

    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(transport.edits[0].html).toBe('Refreshing…');
    expect(transport.messages[before].html).toBe('📰 Latest posts from <b>@alice</b> on 𝕏 (2 found)');
  });

  it('prompts from the menu buttons', async () => {
    const { controller, transport } = setup(async () => xPayload(1));

    await controller.handleCallback({ chatId: 1, callbackId: 'cb', data: 'menu_x' });

    expect(texts(transport)).toEqual(['Send the 𝕏 username or profile link to look up. Send /cancel to stop.']);
    expect(controller.stateOf(1)).toEqual({ mode: 'AWAITING_USERNAME', command: 'xlatest' });
  });

  it('answers unknown payloads', async () => {
    const { controller, transport } = setup(async () => xPayload(1));

    await controller.handleCallback({ chatId: 1, callbackId: 'cb', data: 'bogus' });

    expect(transport.answered).toEqual(['cb']);
    expect(texts(transport)).toEqual(['That button has expired. Use /menu to start again.']);
  });
});

describe('ConversationController prompts', () => {
  it('waits for a username and uses the next text message', async () => {
    const { controller, transport, fetchMock } = setup(async () => igPayload(1));

    await controller.showLatest(1, undefined, 'iglatest', '   ');
    expect(texts(transport)).toEqual([
      'Send the Instagram username or profile link to look up. Send /cancel to stop.',
    ]);
    expect(controller.stateOf(1)).toEqual({ mode: 'AWAITING_USERNAME', command: 'iglatest' });

    await expect(controller.handleText(1, undefined, 'alice')).resolves.toBe(true);
    expect(fetchMock).toHaveBeenCalledWith('ig', 'alice');
    expect(controller.stateOf(1)).toEqual({ mode: 'IDLE' });
    await expect(controller.handleText(1, undefined, 'alice')).resolves.toBe(false);
  });

  it('keeps chats independent', async () => {
    const { controller } = setup(async () => xPayload(1));

    await controller.promptForHandle(1, undefined, 'xlatest');

    expect(controller.stateOf(2)).toEqual({ mode: 'IDLE' });
    await expect(controller.handleText(2, undefined, 'alice')).resolves.toBe(false);
  });

  it('returns to idle after the prompt times out', async () => {
    let now = 0;
    const { controller } = setup(async () => xPayload(1), { now: () => now });

    await controller.promptForHandle(1, undefined, 'xlatest');
    now = 60_001;

    expect(controller.stateOf(1)).toEqual({ mode: 'IDLE' });
    await expect(controller.handleText(1, undefined, 'alice')).resolves.toBe(false);
  });

  it('cancels a pending prompt', async () => {
    const { controller, transport } = setup(async () => xPayload(1));

    await controller.promptForHandle(1, undefined, 'latest');
    await controller.cancel(1, undefined);
    await controller.cancel(1, undefined);

    expect(texts(transport).slice(1)).toEqual(['Cancelled.', 'Nothing to cancel.']);
    expect(controller.stateOf(1)).toEqual({ mode: 'IDLE' });
  });

  it('shows the menu with one button per action', async () => {
    const { controller, transport } = setup(async () => xPayload(1));

    await controller.showMenu(1, undefined);

    expect(transport.messages[0].html).toBe(
      '👋 Hi! I fetch the latest public posts from X and Instagram profiles.\nPick a platform below, or use /help.',
    );
    expect(transport.messages[0].keyboard?.flat().map((b) => b.callbackData)).toEqual([
      'menu_x',
      'menu_ig',
      'menu_auto',
      'menu_help',
    ]);
  });
});

describe('ConversationController lookup cooldown', () => {
  const WAIT = 'Please wait 60s before using this command again.';

  it('applies to a username sent in reply to a prompt', async () => {
    const { controller, transport, fetchMock } = setup(async () => xPayload(1), { lookupCooldownMs: 60_000 });

    await controller.showLatest(1, undefined, 'xlatest', 'alice', 42);
    await controller.promptForHandle(1, undefined, 'xlatest');
    await expect(controller.handleText(1, undefined, 'bob', 42)).resolves.toBe(true);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(texts(transport).at(-1)).toBe(WAIT);
    expect(controller.stateOf(1)).toEqual({ mode: 'IDLE' });
  });

  it('applies to refresh clicks per user', async () => {
    const { controller, transport, fetchMock } = setup(async () => xPayload(1), { lookupCooldownMs: 60_000 });

    await controller.showLatest(1, undefined, 'xlatest', 'alice', 42);
    await controller.handleCallback({ chatId: 1, messageId: 102, callbackId: 'cb1', data: 'refresh_xlatest_alice', userId: 42 });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(transport.edits).toEqual([]);
    expect(texts(transport).at(-1)).toBe(WAIT);

    await controller.handleCallback({ chatId: 1, messageId: 102, callbackId: 'cb2', data: 'refresh_xlatest_alice', userId: 43 });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('leaves page clicks alone', async () => {
    const { controller, transport } = setup(async () => xPayload(12), { lookupCooldownMs: 60_000 });

    await controller.showLatest(1, undefined, 'xlatest', 'alice', 42);
    await controller.handleCallback({ chatId: 1, messageId: 106, callbackId: 'cb', data: 'page_xlatest_alice_1', userId: 42 });

    expect(texts(transport)).not.toContain(WAIT);
    expect(texts(transport).at(-1)).toBe('Page 2 of 3');
  });
});
