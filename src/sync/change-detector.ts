import fs from 'fs/promises';
import path from 'path';
import { createInclusionMatcher, type InclusionRule } from './inclusion.js';
import type { CommitIdentifier, RepositoryGateway, RepositoryRef } from '../gateway/types.js';

export interface ChangeSet {
  added: string[];
  modified: string[];
  deleted: string[];
  resultingCommit?: CommitIdentifier;
}

export function emptyChangeSet(): ChangeSet {
  return { added: [], modified: [], deleted: [] };
}

export function changeCount(changes: ChangeSet): number {
  return changes.added.length + changes.modified.length + changes.deleted.length;
}

async function statFile(filePath: string): Promise<{ size: number } | null> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile() ? { size: stat.size } : null;
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') return null;
    throw err;
  }
}

async function sameContent(sourceFile: string, mirrorFile: string): Promise<boolean> {
  const [src, dst] = await Promise.all([statFile(sourceFile), statFile(mirrorFile)]);
  if (!src || !dst || src.size !== dst.size) return false;
  const [a, b] = await Promise.all([fs.readFile(sourceFile), fs.readFile(mirrorFile)]);
  return a.equals(b);
}

/**
 * Works out what the mirror still needs from the source this cycle.
 *
 * Candidates come from the source's diff against its previous revision (tracked) and its
 * untracked files; both keep the order git reported them in. A tracked path still present
 * in the source working tree is *modified*, a missing one *deleted*; untracked paths are
 * *added*. Paths the mirror already agrees with are left out, so a cycle with no new
 * source edits yields an empty set.
 */
export class ChangeSetDetector {
  constructor(private readonly gateway: RepositoryGateway) {}

  async detect(source: RepositoryRef, mirror: RepositoryRef, rule: InclusionRule): Promise<ChangeSet> {
    // Both queries run before any classification so a failing query leaves nothing half-built.
    const trackedChanges = await this.gateway.changedPathsSincePrevious(source);
    const newFiles = await this.gateway.untrackedPaths(source);

    const include = createInclusionMatcher(rule);
    const changes = emptyChangeSet();
    const seen = new Set<string>();

    // No rename detection: a rename arrives as a deletion plus an untracked addition.
    for (const file of trackedChanges) {
      if (seen.has(file) || !include(file)) continue;
      seen.add(file);
      const sourceFile = path.join(source.path, file);
      const mirrorFile = path.join(mirror.path, file);
      if (await statFile(sourceFile)) {
        if (!(await sameContent(sourceFile, mirrorFile))) changes.modified.push(file);
      } else if (await statFile(mirrorFile)) {
        changes.deleted.push(file);
      }
    }

    for (const file of newFiles) {
      if (seen.has(file) || !include(file)) continue;
      seen.add(file);
      if (!(await sameContent(path.join(source.path, file), path.join(mirror.path, file)))) {
        changes.added.push(file);
      }
    }

    return changes;
  }
}
