/**
 * Text rendering of plans and execution reports for the CLI
 */

import { LocaleKey, LocaleParams } from './locale.js';
import { groupPlanBySubdir } from './planner.js';
import { ExecutionReport, Plan, ReportEntry, ReverseItem, SkipReason } from './types.js';

export interface Translator {
  t(key: LocaleKey, params?: LocaleParams): string;
}

export interface PreviewOptions {
  verbose?: boolean;
  /** Files listed per group before "... and N more" */
  limit?: number;
}

const DEFAULT_LIMIT = 5;

const SKIP_REASON_KEYS: Record<SkipReason, LocaleKey> = {
  conflict: 'reason_conflict',
  'source-missing': 'reason_source_missing',
};

function listWithLimit(lines: string[], limit: number, locale: Translator, indent: string): string[] {
  if (lines.length <= limit) {
    return lines.map(line => `${indent}${line}`);
  }
  return [
    ...lines.slice(0, limit).map(line => `${indent}${line}`),
    `${indent}${locale.t('and_x_more', { count: lines.length - limit })}`,
  ];
}

export function formatPlanPreview(plan: Plan, locale: Translator, options: PreviewOptions = {}): string[] {
  const limit = options.limit ?? DEFAULT_LIMIT;
  const groups = groupPlanBySubdir(plan);
  const lines = [locale.t('plan_summary', { file_count: plan.items.length, category_count: groups.length })];

  if (options.verbose) {
    for (const group of groups) {
      lines.push(locale.t('plan_category', { category: group.subdir, count: group.items.length }));
      const files = group.items.map(item =>
        item.destinationName === item.sourceName ? item.sourceName : `${item.sourceName} -> ${item.destinationName}`
      );
      lines.push(...listWithLimit(files, limit, locale, '  '));
    }
  }

  if (plan.skipped.length > 0) {
    lines.push(locale.t('unclassified_files', { count: plan.skipped.length }));
  }

  return lines;
}

export function formatReversePreview(
  items: readonly ReverseItem[],
  settings: { separator: string; removePrefix: boolean },
  locale: Translator,
  options: PreviewOptions = {}
): string[] {
  const limit = options.limit ?? DEFAULT_LIMIT;
  const bySubdir = new Map<string, ReverseItem[]>();
  for (const item of items) {
    bySubdir.set(item.subdirName, [...(bySubdir.get(item.subdirName) ?? []), item]);
  }

  const lines = [locale.t('reverse_summary', { file_count: items.length, subdir_count: bySubdir.size })];
  lines.push(
    settings.removePrefix
      ? locale.t('reverse_settings_restore', { separator: settings.separator })
      : locale.t('reverse_settings_keep')
  );

  if (options.verbose) {
    for (const [subdir, group] of bySubdir) {
      lines.push(locale.t('plan_category', { category: subdir, count: group.length }));
      const files = group.map(item => `${item.subdirName}/${item.fileInSubdir} -> ${item.restoredName}`);
      lines.push(...listWithLimit(files, limit, locale, '  '));
    }
  }

  return lines;
}

/**
 * One translated line for an item outcome
 */
export function formatReportEntry(entry: ReportEntry<unknown>, locale: Translator): string {
  const { outcome } = entry;
  switch (outcome.status) {
    case 'moved':
      return locale.t('item_moved', { source: entry.source, destination: outcome.destination });
    case 'planned':
      return locale.t('item_planned', { source: entry.source, destination: outcome.destination });
    case 'skipped':
      return locale.t('item_skipped', {
        source: entry.source,
        destination: outcome.destination,
        reason: locale.t(SKIP_REASON_KEYS[outcome.reason]),
      });
    case 'failed':
      return locale.t('item_failed', { source: entry.source, error: outcome.error.message });
  }
}

function problemLines(report: ExecutionReport<unknown>, locale: Translator): string[] {
  const problems = report.entries
    .filter(entry => entry.outcome.status === 'skipped' || entry.outcome.status === 'failed')
    .map(entry => formatReportEntry(entry, locale));

  for (const directory of report.directories) {
    if (directory.status === 'non-empty') {
      problems.push(locale.t('dir_non_empty', { subdir: directory.subdirName }));
    } else if (directory.status === 'failed') {
      problems.push(locale.t('dir_failed', { subdir: directory.subdirName, error: directory.reason ?? '' }));
    }
  }

  return problems;
}

export function formatExecutionReport(
  report: ExecutionReport<unknown>,
  locale: Translator,
  options: Pick<PreviewOptions, 'limit'> = {}
): string[] {
  const limit = options.limit ?? DEFAULT_LIMIT;
  const lines: string[] = [];

  if (report.dryRun) {
    lines.push(locale.t('planned_result', { count: report.counts.planned }));
  } else if (report.direction === 'forward') {
    const directories = new Set<string>();
    for (const { outcome } of report.entries) {
      if (outcome.status === 'moved') {
        directories.add(outcome.destination.split('/')[0]);
      }
    }
    lines.push(locale.t('organize_result', { moved_count: report.counts.moved, dir_count: directories.size }));
  } else {
    lines.push(locale.t('reverse_result', { moved_count: report.counts.moved }));
    const removed = report.directories.filter(directory => directory.status === 'removed').length;
    if (removed > 0) {
      lines.push(locale.t('removed_dirs', { count: removed }));
    }
  }

  if (report.counts.skipped > 0) {
    lines.push(locale.t('skipped_result', { count: report.counts.skipped }));
  }

  const problems = problemLines(report, locale);
  if (problems.length > 0) {
    lines.push(locale.t('errors_header', { count: problems.length }));
    lines.push(...listWithLimit(problems, limit, locale, '  - '));
  }

  if (report.dryRun) {
    lines.push(locale.t('dry_run_notice'));
  }

  return lines;
}

/**
 * 0 when nothing failed, including runs with nothing to do
 */
export function exitCodeForReport(report: ExecutionReport<unknown>): number {
  const cleanupFailed = report.directories.some(directory => directory.status === 'failed');
  return report.counts.failed > 0 || cleanupFailed ? 1 : 0;
}
