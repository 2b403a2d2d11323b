import { describe, expect, it } from 'vitest';
import { de } from '../../src/i18n/de';
import { en } from '../../src/i18n/en';
import { normalizeLocale, resolveLocale, t } from '../../src/i18n';

describe('i18n', () => {
  it('keeps both dictionaries in sync', () => {
    expect(Object.keys(de).sort()).toEqual(Object.keys(en).sort());
  });

  it('prefers the user locale over the guild locale', () => {
    expect(resolveLocale({ userLocale: 'de', guildLocale: 'en-US' })).toBe('de');
    expect(resolveLocale({ userLocale: 'fr', guildLocale: 'de' })).toBe('de');
    expect(resolveLocale({})).toBe('en');
  });

  it('normalizes regional variants', () => {
    expect(normalizeLocale('en-GB')).toBe('en');
    expect(normalizeLocale(' DE-at ')).toBe('de');
    expect(normalizeLocale('pt-BR')).toBeNull();
    expect(normalizeLocale(42)).toBeNull();
  });

  it('interpolates parameters and leaves unknown ones in place', () => {
    expect(t('en', 'admin.submissions_toggled', { state: 'enabled' })).toBe('Submissions are now enabled.');
    expect(t('de', 'admin.submissions_toggled', { state: 'aktiviert' })).toBe('Einsendungen sind jetzt aktiviert.');
    expect(t('en', 'admin.submissions_toggled')).toBe('Submissions are now {state}.');
  });
});
