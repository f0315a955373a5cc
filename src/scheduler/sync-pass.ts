import { asMirrorError } from '../shared/errors.js';
import { isPaused } from '../shared/pause.js';
import { applyChangeSet } from '../sync/change-applier.js';
import { changeCount, type ChangeSet, type ChangeSetDetector } from '../sync/change-detector.js';
import type { BranchResolver } from '../sync/branch-resolver.js';
import type { CommitGenerator } from '../sync/commit-generator.js';
import type { InclusionRule } from '../sync/inclusion.js';
import type { RepositoryRef } from '../gateway/types.js';
import type { Pass, SyncOutcome } from './types.js';

export interface SyncPassSettings {
  source: RepositoryRef;
  mirror: RepositoryRef;
  rule: InclusionRule;
  pauseLockFile: string;
  dryRun: boolean;
}

export interface SyncPassComponents {
  resolver: BranchResolver;
  detector: ChangeSetDetector;
  committer: CommitGenerator;
}

// pause check → branch → detect → apply → commit, strictly in that order.
export class SyncPass implements Pass<ChangeSet> {
  readonly kind = 'sync' as const;

  constructor(
    private readonly settings: SyncPassSettings,
    private readonly components: SyncPassComponents
  ) {}

  async run(): Promise<SyncOutcome> {
    const { source, mirror, rule, pauseLockFile, dryRun } = this.settings;
    const { resolver, detector, committer } = this.components;
    try {
      // Checked on disk rather than through the gateway: a paused pass issues no gateway verb.
      if (await isPaused(source.path, pauseLockFile)) {
        return { status: 'noop', reason: `paused: ${pauseLockFile} present in source` };
      }

      const resolution = await resolver.resolve(source, mirror, { dryRun });
      const changes = await detector.detect(source, mirror, rule);
      if (changeCount(changes) === 0) {
        return { status: 'noop', reason: 'no changes', value: changes };
      }
      if (dryRun) {
        // The mirror was not switched, so the detector compared against the branch it is on now.
        const branchNote = resolution.performed
          ? ''
          : `, after ${resolution.action} of ${resolution.branch}; measured against the mirror's current checkout`;
        return { status: 'noop', reason: `dry run: would apply ${changeCount(changes)} change(s)${branchNote}`, value: changes };
      }

      await applyChangeSet(changes, source.path, mirror.path);
      const committed = await committer.commitChangeSet(source, mirror, changes);
      if (committed.resultingCommit === undefined) {
        return { status: 'noop', reason: 'nothing to commit', value: committed };
      }
      return { status: 'completed', value: committed };
    } catch (err) {
      return { status: 'failed', error: asMirrorError(err) };
    }
  }
}
