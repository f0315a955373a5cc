import { asMirrorError } from '../shared/errors.js';
import type { FixupCommitter, FixupOutcome } from '../fixup/fixup-committer.js';
import type { RepositoryRef } from '../gateway/types.js';
import type { FixupPassOutcome, Pass } from './types.js';

const SKIP_REASONS: Record<NonNullable<FixupOutcome['skipped']>, string> = {
  clean: 'no uncommitted changes in mirror',
  'no-history': 'mirror has no commit to fix up',
  'nothing-staged': 'only untracked files pending',
  'dry-run': 'dry run: would stage modified files and create a fixup commit',
};

export interface FixupPassSettings {
  source: RepositoryRef;
  mirror: RepositoryRef;
  dryRun: boolean;
}

export class FixupPass implements Pass<FixupOutcome> {
  readonly kind = 'fixup' as const;

  constructor(
    private readonly settings: FixupPassSettings,
    private readonly committer: FixupCommitter
  ) {}

  async run(): Promise<FixupPassOutcome> {
    const { source, mirror, dryRun } = this.settings;
    try {
      const outcome = await this.committer.run(source, mirror, { dryRun });
      if (outcome.skipped) {
        return { status: 'noop', reason: SKIP_REASONS[outcome.skipped], value: outcome };
      }
      if (!outcome.succeeded && outcome.error) {
        return { status: 'failed', error: outcome.error, value: outcome };
      }
      return { status: 'completed', value: outcome };
    } catch (err) {
      return { status: 'failed', error: asMirrorError(err) };
    }
  }
}
