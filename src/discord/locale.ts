import { resolveLocale, t, type AppLocale, type I18nKey } from '../i18n';

type LocaleAwareInteraction = {
  guildLocale?: string | null;
  locale?: string | null;
};

export type Translator = {
  locale: AppLocale;
  t: (key: I18nKey, params?: Record<string, string | number>) => string;
};

export function resolveInteractionLocale(interaction: LocaleAwareInteraction): AppLocale {
  return resolveLocale({
    guildLocale: interaction.guildLocale,
    userLocale: interaction.locale
  });
}

export function createTranslator(locale: AppLocale): Translator {
  return {
    locale,
    t: (key, params) => t(locale, key, params)
  };
}

export function createInteractionTranslator(interaction: LocaleAwareInteraction): Translator {
  return createTranslator(resolveInteractionLocale(interaction));
}
