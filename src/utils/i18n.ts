import { promises } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import logger from './logger';

export interface LocaleTree {
  [key: string]: string | LocaleTree;
}

export type TranslationVars = Record<string, string | number>;
export type Translate = (key: string, vars?: TranslationVars) => string;

export const FALLBACK_LOCALE = 'en-US';
export const localesDir = path.join(path.dirname(fileURLToPath(import.meta.url)), '..', '..', 'locales');

function isLocaleTree(value: unknown): value is LocaleTree {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  return Object.values(value).every((entry) => typeof entry === 'string' || isLocaleTree(entry));
}

function lookup(tree: LocaleTree | undefined, keyPath: string): string | undefined {
  let current: string | LocaleTree | undefined = tree;
  for (const segment of keyPath.split('.')) {
    if (current === undefined || typeof current === 'string') return undefined;
    current = current[segment];
  }
  return typeof current === 'string' ? current : undefined;
}

export class Localizer {
  private locales = new Map<string, LocaleTree>();

  get size(): number {
    return this.locales.size;
  }

  add(locale: string, tree: LocaleTree): void {
    this.locales.set(locale, tree);
  }

  async loadDirectory(dir: string = localesDir): Promise<void> {
    logger.info('Loading localization files...');
    let localeFiles: string[];
    try {
      localeFiles = (await promises.readdir(dir)).filter((f) => f.endsWith('.json'));
    } catch (error) {
      logger.error('Failed to read locales directory:', error);
      throw new Error('Failed to initialize localization');
    }

    await Promise.all(
      localeFiles.map(async (file) => {
        try {
          const data = await promises.readFile(path.join(dir, file), { encoding: 'utf8' });
          const parsed: unknown = JSON.parse(data);
          if (!isLocaleTree(parsed)) {
            logger.error(`Locale file ${file} is not a string tree`);
            return;
          }
          const localeKey = file.split('.')[0];
          this.locales.set(localeKey, parsed);
          logger.debug(`Loaded locale: ${localeKey}`);
        } catch (error) {
          logger.error(`Failed to load locale file ${file}:`, error);
        }
      }),
    );

    logger.info(`Loaded ${this.locales.size} locale(s)`);
  }

  /** Exact locale, then language only, then any region of the language, then en-US. */
  resolveLocale(locale?: string): LocaleTree | undefined {
    const requested = locale || FALLBACK_LOCALE;
    const exact = this.locales.get(requested);
    if (exact) return exact;

    const langOnly = requested.split('-')[0];
    const byLanguage = this.locales.get(langOnly);
    if (byLanguage) return byLanguage;

    const fuzzyLocale = Array.from(this.locales.keys()).find((k) => k.startsWith(langOnly + '-'));
    return fuzzyLocale ? this.locales.get(fuzzyLocale) : this.locales.get(FALLBACK_LOCALE);
  }

  text(key: string, locale?: string, vars: TranslationVars = {}): string {
    let text = lookup(this.resolveLocale(locale), key);
    if (text === undefined) {
      text = lookup(this.locales.get(FALLBACK_LOCALE), key);
    }
    if (text === undefined) {
      return `Missing translation for key: ${key}`;
    }

    for (const [varName, value] of Object.entries(vars)) {
      text = text.replace(new RegExp(`{${varName}}`, 'g'), () => String(value));
    }
    return text;
  }

  translator(locale?: string): Translate {
    return (key, vars) => this.text(key, locale, vars);
  }
}
