/**
 * Configuration system with YAML and JSON support
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import YAML from 'js-yaml';
import { ConfigurationError, isLogLevel, logger, LogLevel } from './logger.js';
import { DEFAULT_SEPARATOR, validateSeparator } from './planner.js';
import { ConflictPolicy } from './types.js';

export interface OrganizerSettings {
  separator: string;
  removePrefix: boolean;
  verbose: boolean;
  confirm: boolean;
  onConflict: ConflictPolicy;
}

export interface AppConfig {
  organizer: OrganizerSettings;
  /** 'auto' follows the system language */
  locale: string;
  logLevel: LogLevel;
  lastDirectory?: string;
}

/**
 * Values a single invocation runs with, after every source has been applied
 */
export interface RunSettings extends OrganizerSettings {
  locale: string;
}

export interface SettingOverrides {
  separator?: string;
  removePrefix?: boolean;
  verbose?: boolean;
  confirm?: boolean;
  onConflict?: string;
  locale?: string;
}

export const DEFAULT_CONFIG_PATH = './organizer.yaml';

export const DEFAULT_CONFIG: AppConfig = {
  organizer: {
    separator: DEFAULT_SEPARATOR,
    removePrefix: false,
    verbose: false,
    confirm: true,
    onConflict: 'skip'
  },
  locale: 'auto',
  logLevel: 'info'
};

const CONFLICT_POLICIES: readonly ConflictPolicy[] = ['skip', 'rename'];

function isConflictPolicy(value: unknown): value is ConflictPolicy {
  return typeof value === 'string' && (CONFLICT_POLICIES as readonly string[]).includes(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function cloneConfig(config: AppConfig): AppConfig {
  return structuredClone(config);
}

/**
 * Configuration manager
 */
export class ConfigManager {
  private config: AppConfig;
  private configPath: string;
  private isDirty = false;
  private loadErrors: string[] = [];

  constructor(configPath: string = DEFAULT_CONFIG_PATH) {
    this.configPath = configPath;
    this.config = this.loadConfig();
  }

  /**
   * Load configuration from file or use defaults
   */
  private loadConfig(): AppConfig {
    if (!existsSync(this.configPath)) {
      logger.debug(
        `Config file not found: ${this.configPath}, using defaults`,
        { path: this.configPath },
        'ConfigManager'
      );
      return cloneConfig(DEFAULT_CONFIG);
    }

    try {
      const content = readFileSync(this.configPath, 'utf-8');
      let config: unknown;

      if (this.configPath.endsWith('.json')) {
        config = JSON.parse(content);
      } else if (this.configPath.endsWith('.yaml') || this.configPath.endsWith('.yml')) {
        config = YAML.load(content);
      } else {
        throw new Error(`Unsupported config format: ${this.configPath}`);
      }

      logger.debug(
        `Loaded configuration from ${this.configPath}`,
        undefined,
        'ConfigManager'
      );

      // Merge with defaults
      return this.mergeConfigs(cloneConfig(DEFAULT_CONFIG), config ?? {});
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn(`Failed to load config: ${message}`, undefined, 'ConfigManager');
      this.loadErrors.push(`Failed to load ${this.configPath}: ${message}`);
      return cloneConfig(DEFAULT_CONFIG);
    }
  }

  /**
   * Merge user config with defaults (user config takes precedence).
   * Values of the wrong type are dropped and reported by validate().
   */
  private mergeConfigs(defaults: AppConfig, user: unknown): AppConfig {
    const merged = defaults;

    if (!isRecord(user)) {
      this.loadErrors.push('Configuration root must be a mapping');
      return merged;
    }

    const organizer = user.organizer;
    if (isRecord(organizer)) {
      const target = merged.organizer;
      const booleanKeys = ['removePrefix', 'verbose', 'confirm'] as const;

      if (organizer.separator !== undefined) {
        if (typeof organizer.separator === 'string') {
          target.separator = organizer.separator;
        } else {
          this.loadErrors.push('organizer.separator must be a string');
        }
      }

      for (const key of booleanKeys) {
        const value = organizer[key];
        if (value === undefined) continue;
        if (typeof value === 'boolean') {
          target[key] = value;
        } else {
          this.loadErrors.push(`organizer.${key} must be a boolean`);
        }
      }

      if (organizer.onConflict !== undefined) {
        if (isConflictPolicy(organizer.onConflict)) {
          target.onConflict = organizer.onConflict;
        } else {
          this.loadErrors.push(`organizer.onConflict must be one of: ${CONFLICT_POLICIES.join(', ')}`);
        }
      }
    } else if (organizer !== undefined) {
      this.loadErrors.push('organizer must be a mapping');
    }

    if (user.locale !== undefined) {
      if (typeof user.locale === 'string') {
        merged.locale = user.locale;
      } else {
        this.loadErrors.push('locale must be a string');
      }
    }

    if (user.logLevel !== undefined) {
      if (isLogLevel(user.logLevel)) {
        merged.logLevel = user.logLevel;
      } else {
        this.loadErrors.push('logLevel must be one of: debug, info, warn, error');
      }
    }

    if (typeof user.lastDirectory === 'string' && user.lastDirectory.trim()) {
      merged.lastDirectory = user.lastDirectory;
    }

    return merged;
  }

  /**
   * Get complete configuration
   */
  getAll(): AppConfig {
    return cloneConfig(this.config);
  }

  getLastDirectory(): string | undefined {
    return this.config.lastDirectory;
  }

  /**
   * Remember the directory of the latest run
   */
  setLastDirectory(directory: string): void {
    if (this.config.lastDirectory === directory) return;
    this.config.lastDirectory = directory;
    this.isDirty = true;
    logger.debug('Config updated: lastDirectory', { value: directory }, 'ConfigManager');
  }

  /**
   * Save configuration to file
   */
  save(): void {
    if (!this.isDirty) return;

    try {
      mkdirSync(dirname(this.configPath), { recursive: true });
      let content: string;

      if (this.configPath.endsWith('.json')) {
        content = JSON.stringify(this.config, null, 2);
      } else {
        content = YAML.dump(this.config, { indent: 2 });
      }

      writeFileSync(this.configPath, content);
      this.isDirty = false;

      logger.debug(
        `Configuration saved to ${this.configPath}`,
        undefined,
        'ConfigManager'
      );
    } catch (error) {
      logger.error(
        `Failed to save config: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error : undefined,
        'ConfigManager'
      );
    }
  }

  /**
   * Validate configuration
   */
  validate(): { valid: boolean; errors: string[] } {
    const errors = [...this.loadErrors];

    try {
      validateSeparator(this.config.organizer.separator);
    } catch (error) {
      errors.push(`organizer.separator: ${error instanceof Error ? error.message : String(error)}`);
    }

    if (this.config.locale !== 'auto' && !/^[a-z]{2,3}$/.test(this.config.locale)) {
      errors.push('locale must be "auto" or a language code such as "en"');
    }

    return {
      valid: errors.length === 0,
      errors
    };
  }

  /**
   * Export configuration as YAML
   */
  toYAML(): string {
    return YAML.dump(this.config);
  }

  /**
   * Get config file path
   */
  getPath(): string {
    return this.configPath;
  }

  hasFile(): boolean {
    return existsSync(this.configPath);
  }
}

function parseBooleanEnv(name: string, value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === '') return undefined;

  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;

  throw new ConfigurationError(`${name} must be a boolean, got "${value}"`, 'INVALID_ENVIRONMENT', { name });
}

/**
 * Combine defaults, the config file, environment and flags, in that order of
 * precedence, into the settings for one run.
 */
export function resolveRunSettings(
  config: AppConfig,
  env: NodeJS.ProcessEnv = process.env,
  overrides: SettingOverrides = {}
): RunSettings {
  const separator =
    overrides.separator ?? (env.ORGANIZER_SEPARATOR || undefined) ?? config.organizer.separator;
  const removePrefix =
    overrides.removePrefix ??
    parseBooleanEnv('ORGANIZER_REMOVE_PREFIX', env.ORGANIZER_REMOVE_PREFIX) ??
    config.organizer.removePrefix;
  const onConflict = overrides.onConflict ?? config.organizer.onConflict;
  const locale = overrides.locale ?? (env.ORGANIZER_LOCALE || undefined) ?? config.locale;

  if (!isConflictPolicy(onConflict)) {
    throw new ConfigurationError(
      `Conflict policy must be one of: ${CONFLICT_POLICIES.join(', ')}`,
      'INVALID_CONFLICT_POLICY',
      { onConflict }
    );
  }

  return {
    separator: validateSeparator(separator),
    removePrefix,
    verbose: overrides.verbose ?? config.organizer.verbose,
    confirm: overrides.confirm ?? config.organizer.confirm,
    onConflict,
    locale
  };
}
