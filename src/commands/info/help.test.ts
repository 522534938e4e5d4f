import { beforeAll, describe, expect, it } from 'vitest';
import { commandRequest, createTestClient } from '@/testing/client';
import { Localizer } from '@/utils/i18n';
import help from './help';

const localizer = new Localizer();
const provider = { fetch: async () => ({ data: [] }) };

beforeAll(async () => {
  await localizer.loadDirectory();
});

describe('/help', () => {
  it('lists the commands', async () => {
    const { client, transport } = createTestClient(localizer, provider);

    await help.execute(client, commandRequest(''));

    expect(transport.messages).toHaveLength(1);
    expect(transport.messages[0].html.startsWith('<b>Commands</b>\n/latest username')).toBe(true);
  });

  it('falls back to the generic error when the help text cannot be sent', async () => {
    const { client, transport } = createTestClient(localizer, provider);
    transport.failTextContaining = '<b>Commands</b>';

    await help.execute(client, commandRequest(''));

    expect(transport.messages.map((m) => m.html)).toEqual(['Something went wrong. Please try again later.']);
  });
});
