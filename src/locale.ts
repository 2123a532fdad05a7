/**
 * Translated CLI messages, loaded from locales/<code>.json
 */

import { existsSync, readdirSync, readFileSync } from 'fs';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { AppError, logger } from './logger.js';

export const DEFAULT_LOCALES_DIR = fileURLToPath(new URL('../locales/', import.meta.url));

export const DEFAULT_LANGUAGE = 'en';

export const REQUIRED_LOCALE_KEYS = [
  '_lang_name_',
  'usage',
  'error_configuration',
  'error_invalid_config',
  'error_unexpected',
  'error_no_directory',
  'analyzing_files',
  'scanning_dirs',
  'plan_summary',
  'plan_category',
  'unclassified_files',
  'nothing_to_organize',
  'reverse_summary',
  'reverse_settings_restore',
  'reverse_settings_keep',
  'nothing_to_reverse',
  'confirm_organize',
  'confirm_reverse',
  'cancelled',
  'dry_run_notice',
  'organize_result',
  'reverse_result',
  'planned_result',
  'removed_dirs',
  'skipped_result',
  'errors_header',
  'and_x_more',
  'reason_conflict',
  'reason_source_missing',
  'item_moved',
  'item_planned',
  'item_skipped',
  'item_failed',
  'dir_non_empty',
  'dir_failed',
] as const;

export type LocaleKey = (typeof REQUIRED_LOCALE_KEYS)[number];

export type LocaleStrings = Record<string, string>;

export type LocaleParams = Record<string, string | number>;

/**
 * Check a parsed locale file: a flat map of strings holding every required key
 */
export function validateLocaleData(data: unknown): { strings: LocaleStrings; missing: string[] } {
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new AppError('Locale file must contain a JSON object', 'LOCALE_INVALID');
  }

  const strings: LocaleStrings = {};
  for (const [key, value] of Object.entries(data)) {
    if (typeof value !== 'string') {
      throw new AppError(`Locale key "${key}" must map to a string`, 'LOCALE_INVALID', 1, { key });
    }
    strings[key] = value;
  }

  const missing = REQUIRED_LOCALE_KEYS.filter(key => !(key in strings));
  return { strings, missing };
}

export function loadLocaleFile(filePath: string): LocaleStrings {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new AppError(
      `Could not read locale file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      'LOCALE_INVALID',
      1,
      { filePath }
    );
  }

  const { strings, missing } = validateLocaleData(parsed);
  if (missing.length > 0) {
    throw new AppError(`Locale file ${filePath} is missing keys: ${missing.join(', ')}`, 'LOCALE_INCOMPLETE', 1, {
      filePath,
      missing,
    });
  }

  return strings;
}

/**
 * Language code from LC_ALL, LC_MESSAGES or LANG ("tr_TR.UTF-8" -> "tr")
 */
export function detectSystemLanguage(env: NodeJS.ProcessEnv, fallback: string = DEFAULT_LANGUAGE): string {
  for (const name of ['LC_ALL', 'LC_MESSAGES', 'LANG'] as const) {
    const value = env[name]?.trim();
    if (!value || value === 'C' || value === 'POSIX') continue;

    const code = value.split('.')[0].split(/[_-]/)[0].toLowerCase();
    if (/^[a-z]{2,3}$/.test(code)) {
      return code;
    }
  }

  return fallback;
}

export function formatMessage(template: string, params: LocaleParams = {}): string {
  return template.replace(/\{(\w+)\}/g, (placeholder, name: string) =>
    name in params ? String(params[name]) : placeholder
  );
}

export interface LocaleManagerOptions {
  localesDir?: string;
  defaultLanguage?: string;
  /** A language code, or 'auto' to follow the environment */
  language?: string;
  env?: NodeJS.ProcessEnv;
}

export class LocaleManager {
  private localesDir: string;
  private defaultLanguage: string;
  private availableLanguages = new Map<string, string>();
  private translations: LocaleStrings = {};
  private currentLanguage: string;
  private log = logger.child('LocaleManager');

  constructor(options: LocaleManagerOptions = {}) {
    this.localesDir = options.localesDir ?? DEFAULT_LOCALES_DIR;
    this.defaultLanguage = options.defaultLanguage ?? DEFAULT_LANGUAGE;
    this.currentLanguage = this.defaultLanguage;
    this.loadAvailableLanguages();

    const requested =
      !options.language || options.language === 'auto'
        ? detectSystemLanguage(options.env ?? process.env, this.defaultLanguage)
        : options.language;
    this.setLanguage(requested);
  }

  /**
   * Scan the locales directory; only complete, valid files become available
   */
  private loadAvailableLanguages(): void {
    if (!existsSync(this.localesDir)) {
      this.log.warn(`Locales directory not found: ${this.localesDir}`);
      return;
    }

    for (const fileName of readdirSync(this.localesDir).sort()) {
      if (!fileName.endsWith('.json')) continue;

      const code = fileName.slice(0, -'.json'.length);
      try {
        const strings = loadLocaleFile(join(this.localesDir, fileName));
        this.availableLanguages.set(code, strings._lang_name_);
      } catch (error) {
        this.log.warn(`Ignoring locale ${code}`, {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  /**
   * Switch language; unknown codes fall back to the default language.
   * Returns whether the requested language is now active.
   */
  setLanguage(code: string): boolean {
    const target = this.availableLanguages.has(code) ? code : this.defaultLanguage;

    if (target !== code) {
      this.log.debug(`Language "${code}" not available, using "${target}"`);
    }

    if (!this.availableLanguages.has(target)) {
      this.currentLanguage = target;
      this.translations = {};
      return false;
    }

    this.translations = loadLocaleFile(join(this.localesDir, `${target}.json`));
    this.currentLanguage = target;
    return target === code;
  }

  /**
   * Translated string; the key itself when no translation exists
   */
  t(key: LocaleKey, params?: LocaleParams): string {
    return formatMessage(this.translations[key] ?? key, params);
  }

  getAvailableLanguages(): Record<string, string> {
    return Object.fromEntries(this.availableLanguages);
  }

  getCurrentLanguage(): string {
    return this.currentLanguage;
  }
}
