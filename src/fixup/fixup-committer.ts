import { MirrorError, MirrorErrorCode, asMirrorError, describeError } from '../shared/errors.js';
import { componentLogger, type Logger } from '../shared/logger.js';
import { buildFixupMessage, formatTimestamp } from '../sync/message.js';
import type { BranchResolver } from '../sync/branch-resolver.js';
import type { BranchName, CommitAuthor, CommitIdentifier, RepositoryGateway, RepositoryRef } from '../gateway/types.js';

export type FixupSkipReason = 'clean' | 'no-history' | 'nothing-staged' | 'dry-run';

export interface FixupOutcome {
  branch: BranchName;
  baseCommit?: CommitIdentifier;
  fixupCommit?: CommitIdentifier;
  filesModified: number;
  succeeded: boolean;
  /** True once the fixup has been folded into its base by the autosquash rebase. */
  squashed: boolean;
  skipped?: FixupSkipReason;
  /** Set when the autosquash rebase failed after the fixup commit was created. */
  error?: MirrorError;
}

export interface FixupCommitterOptions {
  messagePrefix: string;
  autosquash: boolean;
  author?: CommitAuthor;
  now?: () => Date;
}

interface BaseSelection {
  base: CommitIdentifier;
  // Where the autosquash rebase starts: the base's parent, or the root when it has none.
  onto: CommitIdentifier | 'root';
}

export class FixupCommitter {
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(
    private readonly gateway: RepositoryGateway,
    private readonly resolver: BranchResolver,
    private readonly options: FixupCommitterOptions
  ) {
    this.now = options.now ?? (() => new Date());
    this.log = componentLogger('fixup');
  }

  async run(source: RepositoryRef, mirror: RepositoryRef, opts: { dryRun?: boolean } = {}): Promise<FixupOutcome> {
    if (!(await this.gateway.isRepository(mirror))) {
      throw new MirrorError(MirrorErrorCode.NOT_A_REPOSITORY, `Mirror is not a git repository: ${mirror.path}`);
    }

    const { branch } = await this.resolver.resolve(source, mirror, { dryRun: opts.dryRun });
    const idle = { branch, filesModified: 0, succeeded: true, squashed: false };

    if (!(await this.gateway.hasUncommittedChanges(mirror))) {
      return { ...idle, skipped: 'clean' };
    }

    const selection = await this.selectBase(mirror);
    if (!selection) {
      return { ...idle, skipped: 'no-history' };
    }
    const { base, onto } = selection;

    if (opts.dryRun) {
      return { ...idle, baseCommit: base, skipped: 'dry-run' };
    }

    await this.gateway.stageModifiedOnly(mirror);
    const staged = await this.gateway.stagedPaths(mirror);
    if (staged.length === 0) {
      // Only untracked files were pending; `add -u` leaves those alone.
      return { ...idle, baseCommit: base, skipped: 'nothing-staged' };
    }

    const message = buildFixupMessage(this.options.messagePrefix, base, formatTimestamp(this.now()));
    const fixupCommit = await this.gateway.fixupCommit(mirror, base, message, this.options.author);
    const outcome: FixupOutcome = {
      branch,
      baseCommit: base,
      fixupCommit,
      filesModified: staged.length,
      succeeded: true,
      squashed: false,
    };

    if (!this.options.autosquash) return outcome;

    try {
      await this.gateway.autosquashRebase(mirror, onto);
      return { ...outcome, squashed: true };
    } catch (err) {
      // The fixup commit stays in history for a later cycle or a manual squash.
      this.log.debug({ mirror: mirror.path, fixupCommit, error: describeError(err) }, 'Autosquash rebase failed');
      return { ...outcome, succeeded: false, error: asMirrorError(err) };
    }
  }

  private async selectBase(mirror: RepositoryRef): Promise<BaseSelection | null> {
    const previous = await this.gateway.revisionBefore(mirror, 1);
    if (previous) {
      return { base: previous, onto: (await this.gateway.revisionBefore(mirror, 2)) ?? 'root' };
    }
    const head = await this.gateway.revisionBefore(mirror, 0);
    return head ? { base: head, onto: 'root' } : null;
  }
}
