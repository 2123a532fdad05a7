/**
 * One-level directory listings for the planner. Never recurses.
 */

import fs from 'node:fs';
import path from 'node:path';
import { ConfigurationError, logger } from './logger.js';
import { DirectorySnapshot, ReverseListing } from './types.js';

const log = logger.child('DirectoryListing');

export function assertTargetDirectory(directory: string): string {
  const resolved = path.resolve(directory);

  let stats: fs.Stats;
  try {
    stats = fs.statSync(resolved);
  } catch {
    throw new ConfigurationError(`Directory not found: ${resolved}`, 'INVALID_TARGET_DIRECTORY', {
      directory: resolved,
    });
  }

  if (!stats.isDirectory()) {
    throw new ConfigurationError(`Not a directory: ${resolved}`, 'INVALID_TARGET_DIRECTORY', {
      directory: resolved,
    });
  }

  return resolved;
}

// Broken links and links to directories are neither
function isLinkToFile(linkPath: string): boolean {
  try {
    return fs.statSync(linkPath).isFile();
  } catch {
    return false;
  }
}

/**
 * Symlinks to regular files count as files and are moved as links.
 * Symlinked directories are not listed.
 */
export function listDirectory(directory: string): DirectorySnapshot {
  const entries = fs.readdirSync(directory, { withFileTypes: true });
  const files: string[] = [];
  const directories: string[] = [];

  for (const entry of entries) {
    if (entry.isDirectory()) {
      directories.push(entry.name);
    } else if (entry.isFile() || (entry.isSymbolicLink() && isLinkToFile(path.join(directory, entry.name)))) {
      files.push(entry.name);
    }
  }

  return { files, directories };
}

export function listReverseSource(directory: string): ReverseListing {
  const { directories } = listDirectory(directory);

  return directories.map(subdirName => {
    try {
      return { subdirName, files: listDirectory(path.join(directory, subdirName)).files };
    } catch (error) {
      log.warn(`Skipping unreadable subdirectory ${subdirName}`, {
        error: error instanceof Error ? error.message : String(error),
      });
      return { subdirName, files: [] };
    }
  });
}
