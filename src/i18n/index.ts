import { logger } from '../lib/logger';
import { de } from './de';
import { en, type I18nKey } from './en';

export const supportedLocales = ['en', 'de'] as const;
export type AppLocale = (typeof supportedLocales)[number];

type TranslationParams = Record<string, string | number>;
type Dictionary = Record<I18nKey, string>;

const dictionaries: Record<AppLocale, Dictionary> = {
  en,
  de
};

const fallbackLocale: AppLocale = 'en';
const isStrictMissingKeyMode = process.env.NODE_ENV !== 'production';

function interpolate(template: string, params?: TranslationParams): string {
  if (!params) {
    return template;
  }

  return template.replace(/\{(\w+)\}/g, (_match, key: string) => {
    const value = params[key];
    return value === undefined ? `{${key}}` : String(value);
  });
}

export function normalizeLocale(value: unknown): AppLocale | null {
  if (typeof value !== 'string') {
    return null;
  }

  const normalized = value.trim().toLowerCase();
  if (normalized === 'de' || normalized.startsWith('de-')) {
    return 'de';
  }

  if (normalized === 'en' || normalized.startsWith('en-')) {
    return 'en';
  }

  return null;
}

function verifyDictionaryShape(): void {
  const enKeys = new Set(Object.keys(en));
  const deKeys = new Set(Object.keys(de));

  const missingInDe = [...enKeys].filter((key) => !deKeys.has(key));
  const extraInDe = [...deKeys].filter((key) => !enKeys.has(key));

  if (missingInDe.length === 0 && extraInDe.length === 0) {
    return;
  }

  const error = new Error(
    `i18n dictionaries are out of sync: missingInDe=${missingInDe.join(',')} extraInDe=${extraInDe.join(',')}`,
  );

  if (isStrictMissingKeyMode) {
    throw error;
  }

  logger.error({ error }, 'i18n dictionary mismatch');
}

verifyDictionaryShape();

export function resolveLocale(input: { userLocale?: string | null; guildLocale?: string | null }): AppLocale {
  return normalizeLocale(input.userLocale) ?? normalizeLocale(input.guildLocale) ?? fallbackLocale;
}

export function t(locale: AppLocale, key: I18nKey, params?: TranslationParams): string {
  const primary = dictionaries[locale][key];
  if (typeof primary === 'string') {
    return interpolate(primary, params);
  }

  const fallback = dictionaries[fallbackLocale][key];
  if (typeof fallback === 'string') {
    logger.warn(
      {
        feature: 'i18n',
        action: 'missing_key',
        locale,
        key
      },
      'Missing i18n key in primary locale, using fallback',
    );
    return interpolate(fallback, params);
  }

  const error = new Error(`Missing i18n key: ${key}`);
  if (isStrictMissingKeyMode) {
    throw error;
  }

  logger.error({ error, locale, key }, 'Missing i18n key in all locales');
  return key;
}

export type { I18nKey };
