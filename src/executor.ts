/**
 * Applies forward and reverse plans to the filesystem, one item at a time.
 *
 * Nothing is ever overwritten: an occupied destination is either skipped or,
 * under the `rename` policy, replaced by the first free `name (n).ext`.
 * A failing item is recorded and the batch carries on; there is no rollback.
 * No locking either, so the directory must not change underneath a run.
 */

import fs from 'node:fs';
import path from 'node:path';
import { errorCode, Logger, logger as rootLogger } from './logger.js';
import {
  ConflictPolicy,
  Direction,
  DirectoryCleanup,
  ExecutionCounts,
  ExecutionReport,
  ItemOutcome,
  PlanItem,
  ReportEntry,
  ReverseItem,
} from './types.js';

export interface ExecutionOptions {
  dryRun?: boolean;
  /** Write one line per item as soon as it is done */
  verbose?: boolean;
  onConflict?: ConflictPolicy;
  /** Verbose line for an entry; `describeEntry` by default */
  formatEntry?: (entry: ReportEntry<unknown>) => string;
  /** Destination of verbose lines; console.log by default */
  write?: (line: string) => void;
  /** Receives one debug line per item whether or not verbose is set */
  logger?: Logger;
}

interface EntryOutput {
  log: Logger;
  verbose: boolean;
  formatEntry: (entry: ReportEntry<unknown>) => string;
  write: (line: string) => void;
}

interface MoveContext {
  dryRun: boolean;
  onConflict: ConflictPolicy;
  /** Destinations taken by earlier items of a dry run */
  claimed: Set<string>;
}

const MAX_RENAME_ATTEMPTS = 1000;

function pathExists(target: string): boolean {
  try {
    fs.lstatSync(target);
    return true;
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Whether `name` is the lossy UTF-8 decoding of an entry whose raw name is
 * not valid UTF-8. Such an entry cannot be addressed through `name`.
 */
function isUndecodableEntry(directory: string, name: string): boolean {
  try {
    return fs
      .readdirSync(directory, { encoding: 'buffer' })
      .some(raw => raw.toString('utf8') === name && !raw.equals(Buffer.from(name, 'utf8')));
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

function isTaken(target: string, context: MoveContext): boolean {
  return context.claimed.has(target) || pathExists(target);
}

function freeName(directory: string, name: string, context: MoveContext): string {
  const parsed = path.parse(name);

  for (let attempt = 1; attempt <= MAX_RENAME_ATTEMPTS; attempt++) {
    const candidate = `${parsed.name} (${attempt})${parsed.ext}`;
    if (!isTaken(path.join(directory, candidate), context)) {
      return candidate;
    }
  }

  throw new Error(`Unable to find a free name for ${name} in ${directory}`);
}

function failure(error: unknown): ItemOutcome {
  return {
    status: 'failed',
    error: {
      message: error instanceof Error ? error.message : String(error),
      code: errorCode(error),
    },
  };
}

/**
 * Move one file. `displayDir` is the destination directory relative to the
 * base directory ('' for the base itself).
 */
function moveFile(
  sourcePath: string,
  baseDirectory: string,
  displayDir: string,
  destinationName: string,
  context: MoveContext
): ItemOutcome {
  const destinationDir = path.join(baseDirectory, displayDir);
  const display = (name: string) => (displayDir ? `${displayDir}/${name}` : name);

  try {
    if (!pathExists(sourcePath)) {
      if (isUndecodableEntry(path.dirname(sourcePath), path.basename(sourcePath))) {
        return {
          status: 'failed',
          error: {
            message: `File name is not valid UTF-8 and cannot be moved: ${path.basename(sourcePath)}`,
            code: 'UNDECODABLE_NAME',
          },
        };
      }
      return { status: 'skipped', reason: 'source-missing', destination: display(destinationName) };
    }

    if (!context.dryRun) {
      fs.mkdirSync(destinationDir, { recursive: true });
    }

    let finalName = destinationName;
    if (isTaken(path.join(destinationDir, finalName), context)) {
      if (context.onConflict === 'skip') {
        return { status: 'skipped', reason: 'conflict', destination: display(destinationName) };
      }
      finalName = freeName(destinationDir, destinationName, context);
    }

    const destinationPath = path.join(destinationDir, finalName);

    if (context.dryRun) {
      context.claimed.add(destinationPath);
      return { status: 'planned', destination: display(finalName) };
    }

    fs.renameSync(sourcePath, destinationPath);
    return { status: 'moved', destination: display(finalName) };
  } catch (error) {
    return failure(error);
  }
}

function emptyCounts(): ExecutionCounts {
  return { moved: 0, planned: 0, skipped: 0, failed: 0, total: 0 };
}

/**
 * `source -> destination: status`, untranslated
 */
export function describeEntry(entry: ReportEntry<unknown>): string {
  const { outcome } = entry;
  const detail =
    outcome.status === 'failed'
      ? `failed (${outcome.error.message})`
      : outcome.status === 'skipped'
        ? `skipped (${outcome.reason})`
        : outcome.status;
  const target = outcome.status === 'failed' ? '' : ` -> ${outcome.destination}`;
  return `${entry.source}${target}: ${detail}`;
}

function createOutput(options: ExecutionOptions): EntryOutput {
  return {
    log: (options.logger ?? rootLogger).child('Executor'),
    verbose: options.verbose ?? false,
    formatEntry: options.formatEntry ?? describeEntry,
    write: options.write ?? (line => console.log(line)),
  };
}

function recordEntry<TItem>(report: ExecutionReport<TItem>, entry: ReportEntry<TItem>, output: EntryOutput): void {
  report.entries.push(entry);
  report.counts[entry.outcome.status] += 1;
  report.counts.total += 1;

  output.log.debug(describeEntry(entry));
  if (output.verbose) {
    output.write(output.formatEntry(entry));
  }
}

function createReport<TItem>(direction: Direction, dryRun: boolean): ExecutionReport<TItem> {
  return { direction, dryRun, entries: [], counts: emptyCounts(), directories: [] };
}

function createContext(options: ExecutionOptions): MoveContext {
  return {
    dryRun: options.dryRun ?? false,
    onConflict: options.onConflict ?? 'skip',
    claimed: new Set(),
  };
}

export function applyPlan(
  items: readonly PlanItem[],
  baseDirectory: string,
  options: ExecutionOptions = {}
): ExecutionReport<PlanItem> {
  const output = createOutput(options);
  const context = createContext(options);
  const report = createReport<PlanItem>('forward', context.dryRun);

  for (const item of items) {
    const outcome = moveFile(
      path.join(baseDirectory, item.sourceName),
      baseDirectory,
      item.destinationSubdir,
      item.destinationName,
      context
    );
    recordEntry(report, { item, source: item.sourceName, outcome }, output);
  }

  return report;
}

function cleanupSubdirectory(
  baseDirectory: string,
  subdirName: string,
  entries: ReportEntry<ReverseItem>[],
  dryRun: boolean
): DirectoryCleanup {
  const subdirPath = path.join(baseDirectory, subdirName);

  try {
    const remaining = fs.readdirSync(subdirPath);

    if (dryRun) {
      const leaving = entries.filter(entry => entry.outcome.status === 'planned').length;
      return remaining.length === leaving
        ? { subdirName, status: 'planned-removal' }
        : { subdirName, status: 'kept', reason: `${remaining.length - leaving} entries would remain` };
    }

    if (remaining.length > 0) {
      return { subdirName, status: 'non-empty', reason: `${remaining.length} entries remain` };
    }

    fs.rmdirSync(subdirPath);
    return { subdirName, status: 'removed' };
  } catch (error) {
    return {
      subdirName,
      status: 'failed',
      reason: error instanceof Error ? error.message : String(error),
    };
  }
}

export function applyReverse(
  items: readonly ReverseItem[],
  baseDirectory: string,
  options: ExecutionOptions = {}
): ExecutionReport<ReverseItem> {
  const output = createOutput(options);
  const { log } = output;
  const context = createContext(options);
  const report = createReport<ReverseItem>('reverse', context.dryRun);
  const bySubdir = new Map<string, ReportEntry<ReverseItem>[]>();

  for (const item of items) {
    const outcome = moveFile(
      path.join(baseDirectory, item.subdirName, item.fileInSubdir),
      baseDirectory,
      '',
      item.restoredName,
      context
    );
    const entry = { item, source: `${item.subdirName}/${item.fileInSubdir}`, outcome };
    recordEntry(report, entry, output);

    const group = bySubdir.get(item.subdirName);
    if (group) {
      group.push(entry);
    } else {
      bySubdir.set(item.subdirName, [entry]);
    }
  }

  for (const [subdirName, entries] of bySubdir) {
    const cleanup = cleanupSubdirectory(baseDirectory, subdirName, entries, context.dryRun);
    report.directories.push(cleanup);

    if (cleanup.status === 'non-empty' || cleanup.status === 'failed') {
      log.warn(`Subdirectory ${subdirName} left in place`, { status: cleanup.status, reason: cleanup.reason });
    } else {
      log.debug(`Subdirectory ${subdirName}: ${cleanup.status}`);
    }
  }

  return report;
}
