/**
 * Core types for prefix-based directory organization
 */

/**
 * Immediate entries of a directory, split by kind, in listing order.
 * Symlinks to regular files are files; other links, sockets and special
 * entries appear in neither list.
 */
export interface DirectorySnapshot {
  files: string[];
  directories: string[];
}

export interface PlanItem {
  sourceName: string;
  destinationSubdir: string;
  destinationName: string;
}

export interface Plan {
  items: PlanItem[];
  /** Unclassified file names, left in place */
  skipped: string[];
}

export interface PlanGroup {
  subdir: string;
  items: PlanItem[];
}

export interface ReverseListingEntry {
  subdirName: string;
  files: string[];
}

export type ReverseListing = ReverseListingEntry[];

export interface ReverseItem {
  subdirName: string;
  fileInSubdir: string;
  restoredName: string;
}

export type ConflictPolicy = 'skip' | 'rename';

export type Direction = 'forward' | 'reverse';

export type SkipReason = 'conflict' | 'source-missing';

export type ItemOutcome =
  | { status: 'moved'; destination: string }
  | { status: 'planned'; destination: string }
  | { status: 'skipped'; reason: SkipReason; destination: string }
  | { status: 'failed'; error: { message: string; code?: string } };

export type OutcomeStatus = ItemOutcome['status'];

export interface ReportEntry<TItem> {
  item: TItem;
  /** Path of the source, relative to the base directory */
  source: string;
  outcome: ItemOutcome;
}

export type DirectoryCleanupStatus = 'removed' | 'non-empty' | 'failed' | 'planned-removal' | 'kept';

export interface DirectoryCleanup {
  subdirName: string;
  status: DirectoryCleanupStatus;
  reason?: string;
}

export interface ExecutionCounts extends Record<OutcomeStatus, number> {
  total: number;
}

export interface ExecutionReport<TItem = PlanItem | ReverseItem> {
  direction: Direction;
  dryRun: boolean;
  entries: ReportEntry<TItem>[];
  counts: ExecutionCounts;
  /** Reverse cleanup results; always empty for forward runs */
  directories: DirectoryCleanup[];
}
