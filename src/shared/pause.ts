import fs from 'fs/promises';
import path from 'path';

// A filesystem check rather than a git query: a paused cycle must not touch either repository.
export async function isPaused(repoPath: string, lockFileName: string): Promise<boolean> {
  try {
    await fs.access(path.join(repoPath, lockFileName));
    return true;
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') return false;
    throw err;
  }
}
