import { beforeAll, describe, expect, it } from 'vitest';
import { Localizer } from './i18n';

describe('Localizer', () => {
  const localizer = new Localizer();

  beforeAll(() => {
    localizer.add('en-US', { greeting: 'Hello {name}', nested: { only: 'english only' } });
    localizer.add('es-ES', { greeting: 'Hola {name}' });
  });

  it('resolves exact, language-only and fuzzy locales', () => {
    expect(localizer.text('greeting', 'es-ES', { name: 'Ana' })).toBe('Hola Ana');
    expect(localizer.text('greeting', 'es-MX', { name: 'Ana' })).toBe('Hola Ana');
    expect(localizer.text('greeting', 'fr', { name: 'Ana' })).toBe('Hello Ana');
    expect(localizer.text('greeting', undefined, { name: 'Ana' })).toBe('Hello Ana');
  });

  it('falls back to en-US for keys a locale lacks', () => {
    expect(localizer.text('nested.only', 'es-ES')).toBe('english only');
  });

  it('reports missing keys', () => {
    expect(localizer.text('nested.absent', 'en-US')).toBe('Missing translation for key: nested.absent');
  });

  it('inserts values literally', () => {
    expect(localizer.translator('en-US')('greeting', { name: '$& cash' })).toBe('Hello $& cash');
  });

  it('loads the bundled locale files', async () => {
    const bundled = new Localizer();
    await bundled.loadDirectory();

    expect(bundled.size).toBeGreaterThanOrEqual(1);
    expect(bundled.text('delivery.pageStatus', 'en', { page: 2, pages: 4 })).toBe('Page 2 of 4');
  });
});
