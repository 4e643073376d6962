/**
 * Text File Discovery
 *
 * Recursively finds `.txt` files (extension matched case-insensitively)
 * under an input directory using fast-glob. Dotfiles and dot-directories
 * are included; symbolic links are listed but never followed into.
 *
 * A directory that cannot be read is reported through `onError` and its
 * subtree is skipped. Traversal itself never throws.
 *
 * Results come in walk order: siblings sorted by name, a directory's
 * contents in place of the directory.
 */

import { access, constants } from 'node:fs/promises';
import { extname, relative, resolve, sep } from 'node:path';
import fg from 'fast-glob';

/** Extension of ingestible files, compared lowercased */
export const TEXT_FILE_EXTENSION = '.txt';

/**
 * A discovered input file.
 */
export interface DiscoveredFile {
  /** Absolute path */
  path: string;
  /** Path relative to the input root, used as a record's source_file */
  relativePath: string;
}

export interface DiscoverOptions {
  /** Called for each path that could not be traversed */
  onError?: (path: string, error: Error) => void;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Whether a path names an ingestible text file.
 */
export function isTextFile(path: string): boolean {
  return extname(path).toLowerCase() === TEXT_FILE_EXTENSION;
}

async function checkReadable(directory: string, options: DiscoverOptions): Promise<boolean> {
  try {
    await access(directory, constants.R_OK | constants.X_OK);
    return true;
  } catch (error) {
    options.onError?.(directory, toError(error));
    return false;
  }
}

/**
 * Order relative paths the way a depth-first walk with sorted directory
 * listings visits them, comparing one path segment at a time.
 */
export function compareWalkOrder(a: string, b: string): number {
  const left = a.split(sep);
  const right = b.split(sep);
  const shared = Math.min(left.length, right.length);

  for (let i = 0; i < shared; i++) {
    const x = left[i] ?? '';
    const y = right[i] ?? '';
    if (x !== y) {
      return x < y ? -1 : 1;
    }
  }

  return left.length - right.length;
}

/**
 * Discover every text file under `rootPath`.
 *
 * @returns Files in walk order
 *
 * @example
 * ```ts
 * const files = await discoverTextFiles('./corpus', {
 *   onError: (path, error) => logger.warn(`Skipping ${path}: ${error.message}`),
 * });
 * ```
 */
export async function discoverTextFiles(
  rootPath: string,
  options: DiscoverOptions = {}
): Promise<DiscoveredFile[]> {
  const absoluteRoot = resolve(rootPath);

  if (!(await checkReadable(absoluteRoot, options))) {
    return [];
  }

  // Directories are listed too, so unreadable ones can be reported:
  // with suppressErrors fast-glob skips them without telling anyone.
  const entries = await fg('**', {
    cwd: absoluteRoot,
    absolute: true,
    dot: true,
    onlyFiles: false,
    objectMode: true,
    followSymbolicLinks: false,
    suppressErrors: true,
  });

  const files: DiscoveredFile[] = [];
  const unreadable: string[] = [];

  for (const entry of entries) {
    if (entry.dirent.isDirectory()) {
      if (!(await checkReadable(entry.path, options))) {
        unreadable.push(entry.path + sep);
      }
      continue;
    }

    // Regular files and links; a link's target is resolved when it is read
    if (!entry.dirent.isFile() && !entry.dirent.isSymbolicLink()) {
      continue;
    }

    if (!isTextFile(entry.name)) {
      continue;
    }

    files.push({
      path: entry.path,
      relativePath: relative(absoluteRoot, entry.path),
    });
  }

  return files
    .filter((file) => !unreadable.some((prefix) => file.path.startsWith(prefix)))
    .sort((a, b) => compareWalkOrder(a.relativePath, b.relativePath));
}
