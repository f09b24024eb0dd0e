import { readdir, stat } from 'node:fs/promises';
import { join } from 'node:path';

/**
 * Count regular files at a path, descending into directories
 */
export async function countFiles(path: string): Promise<number> {
  const info = await stat(path);
  if (!info.isDirectory()) {
    return info.isFile() ? 1 : 0;
  }
  let total = 0;
  for (const entry of await readdir(path, { withFileTypes: true })) {
    if (entry.isDirectory()) {
      total += await countFiles(join(path, entry.name));
    } else if (entry.isFile()) {
      total++;
    }
  }
  return total;
}
