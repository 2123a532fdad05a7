import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  DEFAULT_LOCALES_DIR,
  detectSystemLanguage,
  formatMessage,
  LocaleManager,
  REQUIRED_LOCALE_KEYS,
  validateLocaleData,
} from './locale.js';

function completeLocale(name: string, overrides: Record<string, string> = {}): Record<string, string> {
  const strings: Record<string, string> = {};
  for (const key of REQUIRED_LOCALE_KEYS) {
    strings[key] = `${name}:${key}`;
  }
  return { ...strings, _lang_name_: name, ...overrides };
}

describe('formatMessage', () => {
  it('substitutes named placeholders', () => {
    expect(formatMessage('Moved {moved_count} files into {dir_count} directories.', { moved_count: 2, dir_count: 1 })).toBe(
      'Moved 2 files into 1 directories.'
    );
  });

  it('leaves unknown placeholders in place', () => {
    expect(formatMessage('{a} and {b}', { a: 'x' })).toBe('x and {b}');
  });
});

describe('detectSystemLanguage', () => {
  it('reads the language from locale variables in order', () => {
    expect(detectSystemLanguage({ LANG: 'tr_TR.UTF-8' })).toBe('tr');
    expect(detectSystemLanguage({ LC_ALL: 'de_DE', LANG: 'tr_TR.UTF-8' })).toBe('de');
    expect(detectSystemLanguage({ LC_ALL: 'C', LANG: 'de-AT' })).toBe('de');
  });

  it('falls back when nothing usable is set', () => {
    expect(detectSystemLanguage({})).toBe('en');
    expect(detectSystemLanguage({ LANG: 'POSIX' }, 'tr')).toBe('tr');
  });
});

describe('validateLocaleData', () => {
  it('lists missing required keys', () => {
    const { missing } = validateLocaleData({ _lang_name_: 'Partial', usage: 'x' });
    expect(missing).toContain('cancelled');
    expect(missing).not.toContain('usage');
  });

  it('rejects non-string values and non-objects', () => {
    expect(() => validateLocaleData({ usage: 3 })).toThrow('Locale key "usage" must map to a string');
    expect(() => validateLocaleData(['a'])).toThrow('Locale file must contain a JSON object');
  });
});

describe('shipped locales', () => {
  it('define exactly the required keys', () => {
    for (const code of ['en', 'tr', 'de']) {
      const data = JSON.parse(readFileSync(join(DEFAULT_LOCALES_DIR, `${code}.json`), 'utf-8'));
      expect(Object.keys(data).sort()).toEqual([...REQUIRED_LOCALE_KEYS].sort());
    }
  });

  it('load through the default directory', () => {
    const manager = new LocaleManager({ language: 'tr' });
    expect(manager.getCurrentLanguage()).toBe('tr');
    expect(manager.t('cancelled')).toBe('İşlem iptal edildi.');
    expect(manager.getAvailableLanguages()).toEqual({ de: 'Deutsch', en: 'English', tr: 'Türkçe' });
  });
});

describe('LocaleManager', () => {
  let localesDir: string;

  beforeEach(() => {
    localesDir = mkdtempSync(join(tmpdir(), 'prefix-organizer-locales-'));
    writeFileSync(join(localesDir, 'en.json'), JSON.stringify(completeLocale('English', { cancelled: 'Cancelled {who}.' })));
    writeFileSync(join(localesDir, 'xx.json'), JSON.stringify(completeLocale('Test')));
    writeFileSync(join(localesDir, 'broken.json'), JSON.stringify({ _lang_name_: 'Broken' }));
    writeFileSync(join(localesDir, 'notes.txt'), 'ignored');
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(localesDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('lists only complete locale files', () => {
    const manager = new LocaleManager({ localesDir, language: 'en' });
    expect(manager.getAvailableLanguages()).toEqual({ en: 'English', xx: 'Test' });
  });

  it('translates and formats keys', () => {
    const manager = new LocaleManager({ localesDir, language: 'en' });
    expect(manager.t('cancelled', { who: 'by user' })).toBe('Cancelled by user.');
  });

  it('follows the environment when set to auto', () => {
    const manager = new LocaleManager({ localesDir, language: 'auto', env: { LANG: 'xx_XX.UTF-8' } });
    expect(manager.getCurrentLanguage()).toBe('xx');
    expect(manager.t('cancelled')).toBe('Test:cancelled');
  });

  it('falls back to the default language for unknown or incomplete locales', () => {
    const manager = new LocaleManager({ localesDir, language: 'broken' });
    expect(manager.getCurrentLanguage()).toBe('en');
    expect(manager.setLanguage('zz')).toBe(false);
    expect(manager.setLanguage('xx')).toBe(true);
    expect(manager.getCurrentLanguage()).toBe('xx');
  });

  it('returns keys when no locale can be loaded', () => {
    const manager = new LocaleManager({ localesDir: join(localesDir, 'missing'), language: 'en' });
    expect(manager.t('cancelled')).toBe('cancelled');
    expect(manager.getAvailableLanguages()).toEqual({});
  });
});
