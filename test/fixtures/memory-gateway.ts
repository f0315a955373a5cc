/**
 * In-memory RepositoryGateway for tests.
 *
 * Branches, history and the index live in memory; file contents live in real directories
 * (usually temp dirs), so the detector and applier see genuine files. Each repository is
 * keyed by its path and must be registered with addRepository() first.
 *
 * Helpers:
 * - addRepository(path, opts): register a repository and its branches
 * - commitFiles(path, files): write (or delete, for null) files and record a commit
 * - failOn(verb, error): make the next call to a verb throw
 * - calls / callsTo(verb): every verb invocation, in order
 */

import fs from 'fs/promises';
import path from 'path';
import { MirrorError, MirrorErrorCode } from '../../src/shared/errors.js';
import { isPaused } from '../../src/shared/pause.js';
import type {
  BranchName,
  BranchScope,
  CommitAuthor,
  CommitIdentifier,
  CommitResult,
  RepositoryGateway,
  RepositoryRef,
} from '../../src/gateway/types.js';

export interface MemoryCommit {
  id: CommitIdentifier;
  message: string;
  paths: string[];
  author?: CommitAuthor;
  fixupOf?: CommitIdentifier;
}

interface MemoryRepo {
  currentBranch: BranchName | null;
  localBranches: Set<BranchName>;
  remoteBranches: Set<BranchName>;
  commits: MemoryCommit[];
  tracked: Map<string, Buffer>;
  staged: Set<string>;
}

export type GatewayVerb = keyof RepositoryGateway;

export interface RecordedCall {
  verb: GatewayVerb;
  repo: string;
  args: unknown[];
}

export interface AddRepositoryOptions {
  branch?: BranchName | null;
  localBranches?: BranchName[];
  remoteBranches?: BranchName[];
}

export function repoRef(repoPath: string): RepositoryRef {
  return { path: repoPath, executableName: 'git' };
}

async function walk(root: string, dir = ''): Promise<string[]> {
  const entries = await fs.readdir(path.join(root, dir), { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    const rel = dir ? `${dir}/${entry.name}` : entry.name;
    if (entry.isDirectory()) files.push(...(await walk(root, rel)));
    else if (entry.isFile()) files.push(rel);
  }
  return files.sort();
}

async function readIfPresent(file: string): Promise<Buffer | null> {
  try {
    return await fs.readFile(file);
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') return null;
    throw err;
  }
}

export class MemoryGateway implements RepositoryGateway {
  readonly calls: RecordedCall[] = [];
  private readonly repos = new Map<string, MemoryRepo>();
  private readonly failures = new Map<GatewayVerb, MirrorError>();
  private nextId = 1;

  // ═══════════════════════════════════════════════════════════════════════
  // TEST HELPERS
  // ═══════════════════════════════════════════════════════════════════════

  addRepository(repoPath: string, opts: AddRepositoryOptions = {}): RepositoryRef {
    const branch = opts.branch === undefined ? 'main' : opts.branch;
    const localBranches = new Set(opts.localBranches ?? []);
    if (branch) localBranches.add(branch);
    this.repos.set(repoPath, {
      currentBranch: branch,
      localBranches,
      remoteBranches: new Set(opts.remoteBranches ?? []),
      commits: [],
      tracked: new Map(),
      staged: new Set(),
    });
    return repoRef(repoPath);
  }

  /** Writes the files (null deletes) and records them as one commit, bypassing the index. */
  async commitFiles(repoPath: string, files: Record<string, string | null>, message = 'edit'): Promise<CommitIdentifier> {
    const repo = this.state(repoPath);
    for (const [file, content] of Object.entries(files)) {
      const target = path.join(repoPath, file);
      if (content === null) {
        await fs.rm(target, { force: true });
        repo.tracked.delete(file);
      } else {
        await fs.mkdir(path.dirname(target), { recursive: true });
        await fs.writeFile(target, content, 'utf-8');
        repo.tracked.set(file, Buffer.from(content, 'utf-8'));
      }
    }
    return this.record(repo, { message, paths: Object.keys(files) });
  }

  setCurrentBranch(repoPath: string, branch: BranchName | null): void {
    const repo = this.state(repoPath);
    repo.currentBranch = branch;
    if (branch) repo.localBranches.add(branch);
  }

  history(repoPath: string): MemoryCommit[] {
    return this.state(repoPath).commits.map(c => ({ ...c, paths: [...c.paths] }));
  }

  localBranches(repoPath: string): BranchName[] {
    return [...this.state(repoPath).localBranches].sort();
  }

  failOn(verb: GatewayVerb, error: MirrorError): void {
    this.failures.set(verb, error);
  }

  callsTo(verb: GatewayVerb): RecordedCall[] {
    return this.calls.filter(c => c.verb === verb);
  }

  verbs(): GatewayVerb[] {
    return this.calls.map(c => c.verb);
  }

  // ═══════════════════════════════════════════════════════════════════════
  // RepositoryGateway
  // ═══════════════════════════════════════════════════════════════════════

  async isRepository(repo: RepositoryRef): Promise<boolean> {
    this.note('isRepository', repo);
    return this.repos.has(repo.path);
  }

  async currentBranch(repo: RepositoryRef): Promise<BranchName | null> {
    return this.enter('currentBranch', repo).currentBranch;
  }

  async branchExists(repo: RepositoryRef, name: BranchName, scope: BranchScope): Promise<boolean> {
    const state = this.enter('branchExists', repo, name, scope);
    return (scope === 'local' ? state.localBranches : state.remoteBranches).has(name);
  }

  async createBranch(repo: RepositoryRef, name: BranchName, fromRemote: boolean): Promise<void> {
    const state = this.enter('createBranch', repo, name, fromRemote);
    if (state.localBranches.has(name) || (fromRemote && !state.remoteBranches.has(name))) {
      throw new MirrorError(MirrorErrorCode.BRANCH_CONFLICT, `Cannot create branch ${name}`);
    }
    state.localBranches.add(name);
    state.currentBranch = name;
  }

  async checkout(repo: RepositoryRef, name: BranchName): Promise<void> {
    const state = this.enter('checkout', repo, name);
    if (!state.localBranches.has(name)) {
      throw new MirrorError(MirrorErrorCode.BRANCH_CONFLICT, `No such branch: ${name}`);
    }
    state.currentBranch = name;
  }

  async changedPathsSincePrevious(repo: RepositoryRef): Promise<string[]> {
    const state = this.enter('changedPathsSincePrevious', repo);
    if (state.commits.length < 2) return [...state.staged];
    return [...(state.commits.at(-1)?.paths ?? [])];
  }

  async untrackedPaths(repo: RepositoryRef): Promise<string[]> {
    const state = this.enter('untrackedPaths', repo);
    return (await walk(repo.path)).filter(file => !state.tracked.has(file));
  }

  async stagedPaths(repo: RepositoryRef): Promise<string[]> {
    return [...this.enter('stagedPaths', repo).staged];
  }

  async stageAll(repo: RepositoryRef): Promise<void> {
    const state = this.enter('stageAll', repo);
    for (const file of await this.dirtyPaths(repo.path, state, true)) state.staged.add(file);
  }

  async stageModifiedOnly(repo: RepositoryRef): Promise<void> {
    const state = this.enter('stageModifiedOnly', repo);
    for (const file of await this.dirtyPaths(repo.path, state, false)) state.staged.add(file);
  }

  async commit(repo: RepositoryRef, message: string, author?: CommitAuthor): Promise<CommitResult> {
    const state = this.enter('commit', repo, message, author);
    if (state.staged.size === 0) return { kind: 'nothing-to-commit' };
    return { kind: 'committed', commit: await this.commitIndex(repo.path, state, { message, author }) };
  }

  async fixupCommit(
    repo: RepositoryRef,
    baseCommit: CommitIdentifier,
    message: string,
    author?: CommitAuthor
  ): Promise<CommitIdentifier> {
    const state = this.enter('fixupCommit', repo, baseCommit, message, author);
    if (state.staged.size === 0) {
      throw new MirrorError(MirrorErrorCode.TOOL_FAILED, 'nothing staged for fixup', { stderr: 'nothing to commit' });
    }
    return this.commitIndex(repo.path, state, { message, author, fixupOf: baseCommit });
  }

  // Folds each fixup commit after `onto` into its target and drops it from history.
  async autosquashRebase(repo: RepositoryRef, onto: CommitIdentifier | 'root'): Promise<void> {
    const state = this.enter('autosquashRebase', repo, onto);
    const start = onto === 'root' ? 0 : state.commits.findIndex(c => c.id === onto) + 1;
    if (start === 0 && onto !== 'root') {
      throw new MirrorError(MirrorErrorCode.REBASE_CONFLICT, `Unknown revision ${onto}`);
    }
    const kept: MemoryCommit[] = state.commits.slice(0, start);
    for (const commit of state.commits.slice(start)) {
      const target = commit.fixupOf ? kept.find(c => c.id === commit.fixupOf) : undefined;
      if (target) target.paths = [...new Set([...target.paths, ...commit.paths])];
      else kept.push(commit);
    }
    state.commits = kept;
  }

  async revisionBefore(repo: RepositoryRef, n: number): Promise<CommitIdentifier | null> {
    const { commits } = this.enter('revisionBefore', repo, n);
    return commits[commits.length - 1 - n]?.id ?? null;
  }

  async hasUncommittedChanges(repo: RepositoryRef): Promise<boolean> {
    const state = this.enter('hasUncommittedChanges', repo);
    return state.staged.size > 0 || (await this.dirtyPaths(repo.path, state, true)).length > 0;
  }

  async hasPaused(repo: RepositoryRef, lockFileName: string): Promise<boolean> {
    this.note('hasPaused', repo, lockFileName);
    return isPaused(repo.path, lockFileName);
  }

  // ═══════════════════════════════════════════════════════════════════════
  // INTERNALS
  // ═══════════════════════════════════════════════════════════════════════

  private state(repoPath: string): MemoryRepo {
    const repo = this.repos.get(repoPath);
    if (!repo) throw new MirrorError(MirrorErrorCode.NOT_A_REPOSITORY, `Not a git repository: ${repoPath}`);
    return repo;
  }

  private note(verb: GatewayVerb, repo: RepositoryRef, ...args: unknown[]): void {
    this.calls.push({ verb, repo: repo.path, args });
    const failure = this.failures.get(verb);
    if (failure) {
      this.failures.delete(verb);
      throw failure;
    }
  }

  private enter(verb: GatewayVerb, repo: RepositoryRef, ...args: unknown[]): MemoryRepo {
    this.note(verb, repo, ...args);
    return this.state(repo.path);
  }

  // Tracked files whose disk content differs or is gone; untracked files too when asked.
  private async dirtyPaths(repoPath: string, state: MemoryRepo, includeUntracked: boolean): Promise<string[]> {
    const dirty: string[] = [];
    for (const [file, committed] of state.tracked) {
      const current = await readIfPresent(path.join(repoPath, file));
      if (!current || !current.equals(committed)) dirty.push(file);
    }
    if (includeUntracked) {
      for (const file of await walk(repoPath)) {
        if (!state.tracked.has(file)) dirty.push(file);
      }
    }
    return dirty.sort();
  }

  private async commitIndex(
    repoPath: string,
    state: MemoryRepo,
    fields: Omit<MemoryCommit, 'id' | 'paths'>
  ): Promise<CommitIdentifier> {
    const paths = [...state.staged].sort();
    for (const file of paths) {
      const current = await readIfPresent(path.join(repoPath, file));
      if (current) state.tracked.set(file, current);
      else state.tracked.delete(file);
    }
    state.staged.clear();
    return this.record(state, { ...fields, paths });
  }

  private record(state: MemoryRepo, fields: Omit<MemoryCommit, 'id'>): CommitIdentifier {
    // Deterministic 40-hex ids: commit 1 is "00000001" repeated five times.
    const id = this.nextId.toString(16).padStart(8, '0').repeat(5);
    this.nextId++;
    state.commits.push({ id, ...fields });
    return id;
  }
}
