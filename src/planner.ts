/**
 * Plan construction. Pure functions over directory snapshots; nothing here
 * touches the filesystem.
 */

import { ConfigurationError } from './logger.js';
import { Plan, PlanGroup, PlanItem, ReverseItem, ReverseListing } from './types.js';

export const DEFAULT_SEPARATOR = '-';

// Names that address the directory itself or its parent
const RESERVED_SUBDIR_NAMES = new Set(['.', '..']);

export function validateSeparator(separator: string): string {
  const codePoints = Array.from(separator);

  if (codePoints.length === 0) {
    throw new ConfigurationError('Separator must not be empty', 'INVALID_SEPARATOR', { separator });
  }

  if (codePoints.length > 1) {
    throw new ConfigurationError(
      `Separator must be a single character, got "${separator}"`,
      'INVALID_SEPARATOR',
      { separator }
    );
  }

  if (/\p{Cc}/u.test(separator)) {
    throw new ConfigurationError('Separator must be a printable character', 'INVALID_SEPARATOR', {
      separator,
    });
  }

  if (separator === '/' || separator === '\\') {
    throw new ConfigurationError('Separator must not be a path separator', 'INVALID_SEPARATOR', {
      separator,
    });
  }

  return separator;
}

/**
 * Text before the first separator, or null when the name has no usable prefix.
 */
export function extractPrefix(fileName: string, separator: string): string | null {
  const index = fileName.indexOf(separator);
  if (index <= 0) {
    return null;
  }

  const prefix = fileName.slice(0, index);
  return RESERVED_SUBDIR_NAMES.has(prefix) ? null : prefix;
}

export function buildForwardPlan(fileNames: readonly string[], separator: string, removePrefix: boolean): Plan {
  validateSeparator(separator);

  const items: PlanItem[] = [];
  const skipped: string[] = [];

  for (const name of fileNames) {
    const prefix = extractPrefix(name, separator);
    if (prefix === null) {
      skipped.push(name);
      continue;
    }

    let destinationName = name;
    if (removePrefix) {
      const remainder = name.slice(prefix.length + separator.length);
      // "a-" would strip to an unnamed file
      if (remainder.length > 0) {
        destinationName = remainder;
      }
    }

    items.push({ sourceName: name, destinationSubdir: prefix, destinationName });
  }

  return { items, skipped };
}

/**
 * Separator and prefix removal must be the ones the forward run used; the
 * directory itself does not record them.
 */
export function buildReversePlan(listing: ReverseListing, separator: string, removePrefix: boolean): ReverseItem[] {
  validateSeparator(separator);

  const items: ReverseItem[] = [];

  for (const { subdirName, files } of listing) {
    for (const fileInSubdir of files) {
      items.push({
        subdirName,
        fileInSubdir,
        restoredName: removePrefix ? `${subdirName}${separator}${fileInSubdir}` : fileInSubdir,
      });
    }
  }

  return items;
}

export function groupPlanBySubdir(plan: Plan): PlanGroup[] {
  const groups = new Map<string, PlanItem[]>();

  for (const item of plan.items) {
    const existing = groups.get(item.destinationSubdir);
    if (existing) {
      existing.push(item);
    } else {
      groups.set(item.destinationSubdir, [item]);
    }
  }

  return Array.from(groups, ([subdir, items]) => ({ subdir, items }));
}
