import { run, type CommandRunner, type ExecResult } from '../shared/exec.js';
import { MirrorError, MirrorErrorCode } from '../shared/errors.js';
import { isPaused } from '../shared/pause.js';
import { componentLogger, type Logger } from '../shared/logger.js';
import type {
  BranchName,
  BranchScope,
  CommitAuthor,
  CommitIdentifier,
  CommitResult,
  RepositoryGateway,
  RepositoryRef,
} from './types.js';

export interface GitCliGatewayOptions {
  /** Remote whose tracking branches are consulted when a branch is missing locally. */
  remoteName?: string;
  /** Per-invocation timeout; unset means a hung git process hangs the pass. */
  timeoutMs?: number;
  runner?: CommandRunner;
}

// git prints "[branch 1a2b3c4] subject" (or "[main (root-commit) 1a2b3c4] subject") on commit.
const COMMIT_LINE = /^\[[^\]]*?\s([0-9a-f]{7,40})\]/m;
const NOTHING_TO_COMMIT = /nothing to commit|nothing added to commit|no changes added to commit/;
const NOT_A_REPOSITORY = /not a git repository/i;
const MISSING_REVISION = /unknown revision|bad revision|ambiguous argument/i;

export function parseCommitId(stdout: string): CommitIdentifier | null {
  return stdout.match(COMMIT_LINE)?.[1] ?? null;
}

// -z output: NUL-terminated, unquoted paths.
export function parsePathList(stdout: string): string[] {
  return stdout.split('\0').filter(p => p.length > 0);
}

function authorArgs(author?: CommitAuthor): string[] {
  return author ? ['--author', `${author.name} <${author.email}>`] : [];
}

export class GitCliGateway implements RepositoryGateway {
  private readonly remoteName: string;
  private readonly timeoutMs?: number;
  private readonly runner: CommandRunner;
  private readonly log: Logger;

  constructor(options: GitCliGatewayOptions = {}) {
    this.remoteName = options.remoteName ?? 'origin';
    this.timeoutMs = options.timeoutMs;
    this.runner = options.runner ?? run;
    this.log = componentLogger('gateway');
  }

  private async git(repo: RepositoryRef, args: string[], env?: Record<string, string>): Promise<ExecResult> {
    this.log.debug({ repo: repo.path, args }, 'git');
    return this.runner(repo.executableName, args, { cwd: repo.path, env, timeoutMs: this.timeoutMs });
  }

  private failure(repo: RepositoryRef, args: string[], result: ExecResult, code = MirrorErrorCode.TOOL_FAILED): MirrorError {
    if (NOT_A_REPOSITORY.test(result.stderr)) {
      return new MirrorError(MirrorErrorCode.NOT_A_REPOSITORY, `Not a git repository: ${repo.path}`);
    }
    return new MirrorError(code, `git ${args[0]} exited with ${result.exitCode} in ${repo.path}`, {
      args,
      stdout: result.stdout,
      stderr: result.stderr,
    });
  }

  private async gitOrThrow(repo: RepositoryRef, args: string[], code?: MirrorErrorCode): Promise<ExecResult> {
    const result = await this.git(repo, args);
    if (result.exitCode !== 0) throw this.failure(repo, args, result, code);
    return result;
  }

  async isRepository(repo: RepositoryRef): Promise<boolean> {
    const result = await this.git(repo, ['rev-parse', '--git-dir']);
    return result.exitCode === 0;
  }

  async currentBranch(repo: RepositoryRef): Promise<BranchName | null> {
    const result = await this.gitOrThrow(repo, ['branch', '--show-current']);
    const branch = result.stdout.trim();
    return branch === '' ? null : branch;
  }

  async branchExists(repo: RepositoryRef, name: BranchName, scope: BranchScope): Promise<boolean> {
    const ref = scope === 'local' ? `refs/heads/${name}` : `refs/remotes/${this.remoteName}/${name}`;
    const args = ['show-ref', '--verify', '--quiet', ref];
    const result = await this.git(repo, args);
    if (result.exitCode === 0) return true;
    if (result.exitCode === 1) return false;
    throw this.failure(repo, args, result);
  }

  async createBranch(repo: RepositoryRef, name: BranchName, fromRemote: boolean): Promise<void> {
    const args = ['checkout', '-b', name];
    if (fromRemote) args.push(`${this.remoteName}/${name}`);
    await this.gitOrThrow(repo, args, MirrorErrorCode.BRANCH_CONFLICT);
  }

  async checkout(repo: RepositoryRef, name: BranchName): Promise<void> {
    await this.gitOrThrow(repo, ['checkout', name], MirrorErrorCode.BRANCH_CONFLICT);
  }

  async changedPathsSincePrevious(repo: RepositoryRef): Promise<string[]> {
    const args = ['diff', '--name-only', '-z', 'HEAD^'];
    const result = await this.git(repo, args);
    if (result.exitCode === 0) return parsePathList(result.stdout);
    if (!MISSING_REVISION.test(result.stderr)) throw this.failure(repo, args, result);

    // No parent revision (first commit, or nothing committed yet): fall back to the index.
    return this.stagedPaths(repo);
  }

  async untrackedPaths(repo: RepositoryRef): Promise<string[]> {
    const result = await this.gitOrThrow(repo, ['ls-files', '--others', '--exclude-standard', '-z']);
    return parsePathList(result.stdout);
  }

  async stagedPaths(repo: RepositoryRef): Promise<string[]> {
    const result = await this.gitOrThrow(repo, ['diff', '--name-only', '-z', '--cached']);
    return parsePathList(result.stdout);
  }

  async stageAll(repo: RepositoryRef): Promise<void> {
    await this.gitOrThrow(repo, ['add', '-A']);
  }

  async stageModifiedOnly(repo: RepositoryRef): Promise<void> {
    await this.gitOrThrow(repo, ['add', '-u']);
  }

  async commit(repo: RepositoryRef, message: string, author?: CommitAuthor): Promise<CommitResult> {
    const args = ['commit', '-m', message, ...authorArgs(author)];
    const result = await this.git(repo, args);
    if (result.exitCode !== 0) {
      if (NOTHING_TO_COMMIT.test(result.stdout)) return { kind: 'nothing-to-commit' };
      throw this.failure(repo, args, result);
    }
    return { kind: 'committed', commit: this.commitIdFrom(repo, result) };
  }

  async fixupCommit(
    repo: RepositoryRef,
    baseCommit: CommitIdentifier,
    message: string,
    author?: CommitAuthor
  ): Promise<CommitIdentifier> {
    const result = await this.gitOrThrow(repo, [
      'commit',
      `--fixup=${baseCommit}`,
      '-m',
      message,
      ...authorArgs(author),
    ]);
    return this.commitIdFrom(repo, result);
  }

  async autosquashRebase(repo: RepositoryRef, onto: CommitIdentifier | 'root'): Promise<void> {
    const args = ['rebase', '-i', '--autosquash', onto === 'root' ? '--root' : onto];
    // Accept the generated todo list and every message unedited.
    const result = await this.git(repo, args, { GIT_SEQUENCE_EDITOR: 'true', GIT_EDITOR: 'true' });
    if (result.exitCode === 0) return;

    const abort = await this.git(repo, ['rebase', '--abort']);
    if (abort.exitCode !== 0) {
      this.log.warn({ repo: repo.path, stderr: abort.stderr }, 'git rebase --abort failed');
    }
    throw this.failure(repo, args, result, MirrorErrorCode.REBASE_CONFLICT);
  }

  async revisionBefore(repo: RepositoryRef, n: number): Promise<CommitIdentifier | null> {
    const rev = n === 0 ? 'HEAD' : `HEAD~${n}`;
    const args = ['rev-parse', '--verify', '--quiet', rev];
    const result = await this.git(repo, args);
    if (result.exitCode === 0) return result.stdout.trim();
    if (result.exitCode === 1) return null;
    throw this.failure(repo, args, result);
  }

  async hasUncommittedChanges(repo: RepositoryRef): Promise<boolean> {
    const result = await this.gitOrThrow(repo, ['status', '--porcelain']);
    return result.stdout.trim().length > 0;
  }

  async hasPaused(repo: RepositoryRef, lockFileName: string): Promise<boolean> {
    return isPaused(repo.path, lockFileName);
  }

  private commitIdFrom(repo: RepositoryRef, result: ExecResult): CommitIdentifier {
    const commit = parseCommitId(result.stdout);
    if (!commit) {
      throw new MirrorError(MirrorErrorCode.TOOL_FAILED, `Could not extract commit hash from git output in ${repo.path}`, {
        stdout: result.stdout,
      });
    }
    return commit;
  }
}
