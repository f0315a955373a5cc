/** A repository on disk and the git executable used to operate on it. */
export interface RepositoryRef {
  readonly path: string;
  readonly executableName: string;
}

export type BranchName = string;

/** Opaque revision token; only ever truncated for display. */
export type CommitIdentifier = string;

export type BranchScope = 'local' | 'remote';

export interface CommitAuthor {
  name: string;
  email: string;
}

export type CommitResult =
  | { kind: 'committed'; commit: CommitIdentifier }
  | { kind: 'nothing-to-commit' };

/**
 * Queries and mutations issued against the version-control system.
 *
 * Every verb names the repository it works on; implementations must not depend on the
 * process working directory. Failures are thrown as MirrorError (NOT_A_REPOSITORY,
 * BRANCH_CONFLICT, REBASE_CONFLICT, TOOL_FAILED). No-op conditions are return values.
 */
export interface RepositoryGateway {
  isRepository(repo: RepositoryRef): Promise<boolean>;
  /** Null when HEAD is detached or the branch name is empty. */
  currentBranch(repo: RepositoryRef): Promise<BranchName | null>;
  branchExists(repo: RepositoryRef, name: BranchName, scope: BranchScope): Promise<boolean>;
  /** Creates the branch and checks it out; from the remote tracking branch when `fromRemote`. */
  createBranch(repo: RepositoryRef, name: BranchName, fromRemote: boolean): Promise<void>;
  checkout(repo: RepositoryRef, name: BranchName): Promise<void>;
  /** Paths changed since HEAD^, or the staged paths when HEAD has no parent. */
  changedPathsSincePrevious(repo: RepositoryRef): Promise<string[]>;
  untrackedPaths(repo: RepositoryRef): Promise<string[]>;
  stagedPaths(repo: RepositoryRef): Promise<string[]>;
  stageAll(repo: RepositoryRef): Promise<void>;
  stageModifiedOnly(repo: RepositoryRef): Promise<void>;
  commit(repo: RepositoryRef, message: string, author?: CommitAuthor): Promise<CommitResult>;
  fixupCommit(
    repo: RepositoryRef,
    baseCommit: CommitIdentifier,
    message: string,
    author?: CommitAuthor
  ): Promise<CommitIdentifier>;
  /** Rewrites everything after `onto` (or the whole history for 'root'), folding fixup commits. */
  autosquashRebase(repo: RepositoryRef, onto: CommitIdentifier | 'root'): Promise<void>;
  /** HEAD~n, or null when history is not that deep. revisionBefore(repo, 0) is HEAD. */
  revisionBefore(repo: RepositoryRef, n: number): Promise<CommitIdentifier | null>;
  hasUncommittedChanges(repo: RepositoryRef): Promise<boolean>;
  /**
   * True while the pause-lock file exists at the repository root. Kept for alternate backends
   * and library callers; SyncPass checks the file directly so a paused pass issues no verb.
   */
  hasPaused(repo: RepositoryRef, lockFileName: string): Promise<boolean>;
}
