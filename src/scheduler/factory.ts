import { GitCliGateway } from '../gateway/git-cli-gateway.js';
import { BranchResolver } from '../sync/branch-resolver.js';
import { ChangeSetDetector } from '../sync/change-detector.js';
import { CommitGenerator } from '../sync/commit-generator.js';
import { FixupCommitter } from '../fixup/fixup-committer.js';
import { CycleScheduler, type OutcomeListener } from './cycle-scheduler.js';
import { FixupPass } from './fixup-pass.js';
import { MirrorLock } from './mirror-lock.js';
import { SyncPass } from './sync-pass.js';
import type { MirrorSyncSettings } from '../config/types.js';
import type { RepositoryGateway } from '../gateway/types.js';

export interface MirrorSyncRuntime {
  gateway: RepositoryGateway;
  syncPass: SyncPass;
  fixupPass: FixupPass;
  scheduler: CycleScheduler;
}

export interface RuntimeOverrides {
  gateway?: RepositoryGateway;
  now?: () => Date;
  onOutcome?: OutcomeListener;
}

// Both passes share one gateway, one BranchResolver and one MirrorLock.
export function createRuntime(settings: MirrorSyncSettings, overrides: RuntimeOverrides = {}): MirrorSyncRuntime {
  const gateway =
    overrides.gateway ?? new GitCliGateway({ remoteName: settings.remoteName, timeoutMs: settings.commandTimeoutMs });
  const resolver = new BranchResolver(gateway);

  const syncPass = new SyncPass(
    {
      source: settings.source,
      mirror: settings.mirror,
      rule: settings.rule,
      pauseLockFile: settings.pauseLockFile,
      dryRun: settings.dryRun,
    },
    {
      resolver,
      detector: new ChangeSetDetector(gateway),
      committer: new CommitGenerator(gateway, {
        template: settings.commitTemplate,
        author: settings.author,
        now: overrides.now,
      }),
    }
  );

  const fixupPass = new FixupPass(
    { source: settings.source, mirror: settings.mirror, dryRun: settings.dryRun },
    new FixupCommitter(gateway, resolver, {
      messagePrefix: settings.fixupMessagePrefix,
      autosquash: settings.autosquash,
      author: settings.author,
      now: overrides.now,
    })
  );

  const scheduler = new CycleScheduler(
    { sync: syncPass, fixup: fixupPass },
    {
      syncIntervalMs: settings.syncIntervalMs,
      fixupIntervalMs: settings.fixupIntervalMs,
      lock: new MirrorLock(),
      onOutcome: overrides.onOutcome,
    }
  );

  return { gateway, syncPass, fixupPass, scheduler };
}
