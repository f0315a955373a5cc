import fs from 'fs/promises';
import { createReadStream, createWriteStream } from 'fs';
import path from 'path';
import { randomBytes } from 'crypto';
import { pipeline } from 'stream/promises';
import { MirrorError, MirrorErrorCode } from '../shared/errors.js';
import type { ChangeSet } from './change-detector.js';

export interface ApplyReport {
  copied: string[];
  deleted: string[];
}

async function copyIntoMirror(sourceRoot: string, mirrorRoot: string, file: string): Promise<void> {
  const srcPath = path.join(sourceRoot, file);
  const dstPath = path.join(mirrorRoot, file);
  try {
    await fs.access(srcPath);
  } catch {
    throw new MirrorError(MirrorErrorCode.APPLY_FAILED, `Source file does not exist: ${srcPath}`, { file });
  }
  // Written beside the target and renamed over it, so a failed copy leaves the old file intact.
  const tmpPath = `${dstPath}.mirror-sync-${randomBytes(4).toString('hex')}.tmp`;
  try {
    await fs.mkdir(path.dirname(dstPath), { recursive: true });
    await pipeline(createReadStream(srcPath), createWriteStream(tmpPath));
    await fs.rename(tmpPath, dstPath);
  } catch (err) {
    await fs.rm(tmpPath, { force: true });
    throw new MirrorError(MirrorErrorCode.APPLY_FAILED, `Failed to copy ${file} into mirror`, {
      cause: err instanceof Error ? err.message : String(err),
      file,
    });
  }
}

async function removeFromMirror(mirrorRoot: string, file: string): Promise<boolean> {
  try {
    await fs.unlink(path.join(mirrorRoot, file));
    return true;
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') return false;
    throw new MirrorError(MirrorErrorCode.APPLY_FAILED, `Failed to delete ${file} from mirror`, {
      cause: err instanceof Error ? err.message : String(err),
      file,
    });
  }
}

// Added, then modified, then deleted. The first failure stops the rest; paths already
// written stay written and the next cycle's diff picks up whatever is still pending.
export async function applyChangeSet(changes: ChangeSet, sourceRoot: string, mirrorRoot: string): Promise<ApplyReport> {
  const report: ApplyReport = { copied: [], deleted: [] };

  for (const file of [...changes.added, ...changes.modified]) {
    await copyIntoMirror(sourceRoot, mirrorRoot, file);
    report.copied.push(file);
  }

  for (const file of changes.deleted) {
    if (await removeFromMirror(mirrorRoot, file)) report.deleted.push(file);
  }

  return report;
}
