import { readdir } from 'node:fs/promises';
import { join } from 'node:path';

function byName(a: { name: string }, b: { name: string }): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

/**
 * Yield every regular file beneath `root`, depth first
 *
 * Entries of each directory are visited in code-unit order of their names,
 * files and subdirectories interleaved; a subdirectory is descended into
 * when it is reached. Symbolic links are not followed. A directory is read
 * only when the walk reaches it, so files renamed earlier in the walk are
 * not revisited.
 */
export async function* walkFiles(root: string): AsyncGenerator<string> {
  const entries = await readdir(root, { withFileTypes: true });
  entries.sort(byName);

  for (const entry of entries) {
    const entryPath = join(root, entry.name);

    if (entry.isDirectory()) {
      yield* walkFiles(entryPath);
    } else if (entry.isFile()) {
      yield entryPath;
    }
  }
}
