import { beforeAll, describe, expect, it, vi } from 'vitest';
import { commandRequest, createTestClient } from '@/testing/client';
import { xPayload } from '@/testing/fakes';
import { Localizer } from '@/utils/i18n';
import { createLatestCommand } from './latestCommand';

const localizer = new Localizer();

beforeAll(async () => {
  await localizer.loadDirectory();
});

const provider = () => ({ fetch: vi.fn(async () => xPayload(1)) });

describe('latest commands', () => {
  it('prompts for a username when none is given', async () => {
    const { client, transport, conversation } = createTestClient(localizer, provider());
    const command = createLatestCommand('xlatest');

    await command.execute(client, commandRequest('   '));

    expect(transport.messages.map((m) => m.html)).toEqual([
      'Send the 𝕏 username or profile link to look up. Send /cancel to stop.',
    ]);
    expect(conversation.stateOf(9)).toEqual({ mode: 'AWAITING_USERNAME', command: 'xlatest' });
  });

  it('applies the per-user cooldown to lookups', async () => {
    const { client, transport } = createTestClient(localizer, provider(), { lookupCooldownMs: 60_000 });
    const command = createLatestCommand('xlatest');

    await command.execute(client, commandRequest('alice'));
    const afterFirst = transport.messages.length;
    await command.execute(client, commandRequest('alice'));

    expect(transport.messages.length).toBe(afterFirst + 1);
    expect(transport.messages[afterFirst].html).toBe('Please wait 60s before using this command again.');
  });

  it('does not hold prompts back during the cooldown', async () => {
    const { client, transport } = createTestClient(localizer, provider(), { lookupCooldownMs: 60_000 });
    const command = createLatestCommand('xlatest');

    await command.execute(client, commandRequest('alice'));
    const afterFirst = transport.messages.length;
    await command.execute(client, commandRequest(''));

    expect(transport.messages.slice(afterFirst).map((m) => m.html)).toEqual([
      'Send the 𝕏 username or profile link to look up. Send /cancel to stop.',
    ]);
  });

  it('reports unexpected failures to the chat', async () => {
    const { client, transport, conversation } = createTestClient(localizer, provider());
    vi.spyOn(conversation, 'showLatest').mockRejectedValue(new Error('boom'));
    const command = createLatestCommand('iglatest');

    await command.execute(client, commandRequest('alice'));

    expect(transport.messages.map((m) => m.html)).toEqual(['Something went wrong. Please try again later.']);
  });
});
