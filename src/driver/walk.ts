import { readdir } from 'node:fs/promises';
import path from 'node:path';

export type WalkOptions = {
  /**
   * Directory names that are not descended into.
   */
  exclude?: readonly string[];
};

/**
 * Yields `root` and every directory below it, depth-first.
 *
 * Order:
 * - a directory is yielded before its subdirectories
 * - subdirectories are visited in code-unit order of their names
 *
 * Symbolic links are not followed.
 */
export async function* walkDirectories(
  root: string,
  options: WalkOptions = {}
): AsyncGenerator<string> {
  const excluded = new Set(options.exclude);

  // Read first: an unreadable directory fails before it is yielded.
  const entries = await readdir(root, { withFileTypes: true });
  yield root;

  const children = entries
    .filter(entry => entry.isDirectory() && !excluded.has(entry.name))
    .map(entry => entry.name)
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

  for (const child of children) {
    yield* walkDirectories(path.join(root, child), options);
  }
}
