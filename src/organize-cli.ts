#!/usr/bin/env node
/**
 * prefix-organizer CLI: sort files into subdirectories by filename prefix,
 * or move them back out with --reverse.
 */

import { config } from 'dotenv';
import { realpathSync } from 'fs';
import { resolve } from 'path';
import { createInterface } from 'readline';
import { fileURLToPath } from 'url';
import { ConfigManager, DEFAULT_CONFIG_PATH, RunSettings, resolveRunSettings } from './config.js';
import { assertTargetDirectory, listDirectory, listReverseSource } from './directory-listing.js';
import { applyPlan, applyReverse, ExecutionOptions } from './executor.js';
import { LocaleManager } from './locale.js';
import { ConfigurationError, handleError, Logger, logger } from './logger.js';
import { buildForwardPlan, buildReversePlan } from './planner.js';
import {
  exitCodeForReport,
  formatExecutionReport,
  formatPlanPreview,
  formatReportEntry,
  formatReversePreview,
} from './report-format.js';
import { ExecutionReport } from './types.js';

export interface CliOptions {
  directory?: string;
  separator?: string;
  removePrefix?: boolean;
  verbose?: boolean;
  yes: boolean;
  reverse: boolean;
  dryRun: boolean;
  onConflict?: string;
  lang?: string;
  configPath?: string;
  showConfig: boolean;
  help: boolean;
}

export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  confirm: (message: string) => Promise<boolean>;
  env: NodeJS.ProcessEnv;
  cwd: string;
  logger?: Logger;
}

export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = { yes: false, reverse: false, dryRun: false, showConfig: false, help: false };

  const valueFor = (flag: string, index: number): string => {
    const value = argv[index];
    if (value === undefined) {
      throw new ConfigurationError(`Missing value for ${flag}`, 'INVALID_ARGUMENT', { flag });
    }
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    switch (arg) {
      case '-s':
      case '--separator':
        options.separator = valueFor(arg, ++i);
        continue;
      case '-r':
      case '--remove-prefix':
        options.removePrefix = true;
        continue;
      case '-v':
      case '--verbose':
        options.verbose = true;
        continue;
      case '-y':
      case '--yes':
        options.yes = true;
        continue;
      case '--reverse':
        options.reverse = true;
        continue;
      case '--dry-run':
        options.dryRun = true;
        continue;
      case '--on-conflict':
        options.onConflict = valueFor(arg, ++i);
        continue;
      case '--lang':
        options.lang = valueFor(arg, ++i);
        continue;
      case '--config':
        options.configPath = valueFor(arg, ++i);
        continue;
      case '--show-config':
        options.showConfig = true;
        continue;
      case '-h':
      case '--help':
        options.help = true;
        continue;
    }

    if (arg.startsWith('-') && arg.length > 1) {
      throw new ConfigurationError(`Unknown argument: ${arg}`, 'INVALID_ARGUMENT', { arg });
    }

    if (options.directory !== undefined) {
      throw new ConfigurationError(`Unexpected argument: ${arg}`, 'INVALID_ARGUMENT', { arg });
    }
    options.directory = arg;
  }

  return options;
}

/**
 * y/N prompt; a closed input counts as "no"
 */
export async function confirmOnTerminal(
  message: string,
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Promise<boolean> {
  const rl = createInterface({ input, output });

  return new Promise((resolve) => {
    let answered = false;

    rl.on('close', () => {
      if (!answered) {
        output.write('\n');
        resolve(false);
      }
    });

    rl.question(`${message} (y/N) `, (answer) => {
      answered = true;
      rl.close();
      resolve(answer.trim().toLowerCase() === 'y');
    });
  });
}

function defaultIO(): CliIO {
  return {
    stdout: line => console.log(line),
    stderr: line => console.error(line),
    confirm: message => confirmOnTerminal(message),
    env: process.env,
    cwd: process.cwd(),
  };
}

interface RunContext {
  directory: string;
  settings: RunSettings;
  options: CliOptions;
  locale: LocaleManager;
  io: CliIO;
  execution: ExecutionOptions;
}

async function organize(context: RunContext): Promise<ExecutionReport<unknown> | null> {
  const { directory, settings, options, locale, io } = context;

  io.stdout(locale.t('analyzing_files', { directory }));
  const snapshot = listDirectory(directory);
  const plan = buildForwardPlan(snapshot.files, settings.separator, settings.removePrefix);
  formatPlanPreview(plan, locale, { verbose: settings.verbose }).forEach(io.stdout);

  if (plan.items.length === 0) {
    io.stdout(locale.t('nothing_to_organize'));
    return null;
  }

  if (settings.confirm && !options.dryRun && !(await io.confirm(locale.t('confirm_organize')))) {
    io.stdout(locale.t('cancelled'));
    return null;
  }

  return applyPlan(plan.items, directory, context.execution);
}

async function reverse(context: RunContext): Promise<ExecutionReport<unknown> | null> {
  const { directory, settings, options, locale, io } = context;

  io.stdout(locale.t('scanning_dirs', { directory }));
  const items = buildReversePlan(listReverseSource(directory), settings.separator, settings.removePrefix);

  if (items.length === 0) {
    io.stdout(locale.t('nothing_to_reverse'));
    return null;
  }

  formatReversePreview(items, settings, locale, { verbose: settings.verbose }).forEach(io.stdout);

  if (settings.confirm && !options.dryRun && !(await io.confirm(locale.t('confirm_reverse')))) {
    io.stdout(locale.t('cancelled'));
    return null;
  }

  return applyReverse(items, directory, context.execution);
}

/**
 * Run one invocation and return the process exit code
 */
export async function runCli(argv: string[], io: CliIO = defaultIO()): Promise<number> {
  const log = io.logger ?? logger;
  let locale = new LocaleManager({ language: io.env.ORGANIZER_LOCALE || 'auto', env: io.env });

  try {
    const options = parseArgs(argv);
    if (options.lang) {
      locale.setLanguage(options.lang);
    }

    if (options.help) {
      io.stdout(locale.t('usage'));
      return 0;
    }

    const configPath = resolve(io.cwd, options.configPath ?? (io.env.ORGANIZER_CONFIG || DEFAULT_CONFIG_PATH));
    const manager = new ConfigManager(configPath);
    const validation = manager.validate();
    if (!validation.valid) {
      io.stderr(locale.t('error_invalid_config', { path: configPath }));
      validation.errors.forEach(error => io.stderr(`  - ${error}`));
      return 2;
    }

    const appConfig = manager.getAll();
    if (!io.env.LOG_LEVEL) {
      log.setMinLevel(appConfig.logLevel);
    }

    const settings = resolveRunSettings(appConfig, io.env, {
      separator: options.separator,
      removePrefix: options.removePrefix,
      verbose: options.verbose,
      confirm: options.yes ? false : undefined,
      onConflict: options.onConflict,
      locale: options.lang,
    });
    locale = new LocaleManager({ language: settings.locale, env: io.env });

    if (options.showConfig) {
      io.stdout(manager.toYAML().trimEnd());
      return 0;
    }

    const directoryArg = options.directory ?? appConfig.lastDirectory;
    if (!directoryArg) {
      io.stderr(locale.t('error_no_directory'));
      io.stdout(locale.t('usage'));
      return 1;
    }

    const context: RunContext = {
      directory: assertTargetDirectory(resolve(io.cwd, directoryArg)),
      settings,
      options,
      locale,
      io,
      execution: {
        dryRun: options.dryRun,
        verbose: settings.verbose,
        formatEntry: entry => `  ${formatReportEntry(entry, locale)}`,
        write: io.stdout,
        onConflict: settings.onConflict,
        logger: log,
      },
    };

    const report = options.reverse ? await reverse(context) : await organize(context);
    if (!report) {
      return 0;
    }

    formatExecutionReport(report, locale).forEach(io.stdout);

    // Only a config file the user created remembers the directory
    if (!report.dryRun && manager.hasFile()) {
      manager.setLastDirectory(context.directory);
      manager.save();
    }

    return exitCodeForReport(report);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      io.stderr(locale.t('error_configuration', { message: error.message }));
      return error.exitCode;
    }

    const appError = handleError(error, 'organize-cli');
    io.stderr(locale.t('error_unexpected', { message: appError.message }));
    return appError.exitCode;
  }
}

async function main(): Promise<void> {
  config({ override: false });
  process.exitCode = await runCli(process.argv.slice(2));
}

function isInvokedDirectly(): boolean {
  if (!process.argv[1]) return false;
  try {
    return realpathSync(fileURLToPath(import.meta.url)) === realpathSync(resolve(process.argv[1]));
  } catch {
    return false;
  }
}

if (isInvokedDirectly()) {
  main().catch((error) => {
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = 1;
  });
}
