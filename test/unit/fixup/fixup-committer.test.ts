import { FixupCommitter, type FixupCommitterOptions } from '../../../src/fixup/fixup-committer.js';
import { BranchResolver } from '../../../src/sync/branch-resolver.js';
import { MirrorError, MirrorErrorCode } from '../../../src/shared/errors.js';
import { MemoryGateway, repoRef } from '../../fixtures/memory-gateway.js';
import { makeTempDir, removeDirs, writeFiles } from '../../fixtures/temp-dirs.js';
import type { RepositoryRef } from '../../../src/gateway/types.js';

const now = (): Date => new Date(2026, 2, 1, 9, 5, 7);

describe('FixupCommitter', () => {
  let gateway: MemoryGateway;
  let source: RepositoryRef;
  let mirror: RepositoryRef;

  function committer(overrides: Partial<FixupCommitterOptions> = {}): FixupCommitter {
    return new FixupCommitter(gateway, new BranchResolver(gateway), {
      messagePrefix: 'fixup! ',
      autosquash: true,
      now,
      ...overrides,
    });
  }

  beforeEach(async () => {
    gateway = new MemoryGateway();
    source = gateway.addRepository('/work/src', { branch: 'main' });
    mirror = gateway.addRepository(await makeTempDir('mirror'), { branch: 'main' });
  });

  afterEach(async () => {
    await removeDirs(mirror.path);
  });

  it('does nothing when the mirror is clean', async () => {
    await gateway.commitFiles(mirror.path, { 'a.cpp': 'a\n' });
    const outcome = await committer().run(source, mirror);
    expect(outcome).toEqual({ branch: 'main', filesModified: 0, succeeded: true, squashed: false, skipped: 'clean' });
    expect(gateway.callsTo('stageModifiedOnly')).toEqual([]);
    expect(gateway.callsTo('fixupCommit')).toEqual([]);
    expect(gateway.history(mirror.path)).toHaveLength(1);
  });

  it('creates a fixup for HEAD~1 and squashes it away', async () => {
    const first = await gateway.commitFiles(mirror.path, { 'a.cpp': 'a\n' }, 'first');
    const second = await gateway.commitFiles(mirror.path, { 'b.cpp': 'b\n' }, 'second');
    await writeFiles(mirror.path, { 'a.cpp': 'a, edited in the mirror\n' });

    const outcome = await committer().run(source, mirror);

    const fixupCall = gateway.callsTo('fixupCommit')[0];
    expect(fixupCall?.args).toEqual([first, `fixup! Automated fixup for ${first.slice(0, 8)} @ 2026-03-01 09:05:07`, undefined]);
    expect(outcome).toEqual({
      branch: 'main',
      baseCommit: first,
      fixupCommit: expect.any(String),
      filesModified: 1,
      succeeded: true,
      squashed: true,
    });
    expect(gateway.callsTo('autosquashRebase')[0]?.args).toEqual(['root']);
    expect(gateway.history(mirror.path).map(c => c.id)).toEqual([first, second]);
    expect(await gateway.hasUncommittedChanges(mirror)).toBe(false);
  });

  it('rebases onto the parent of the base commit', async () => {
    const first = await gateway.commitFiles(mirror.path, { 'a.cpp': 'a\n' });
    const second = await gateway.commitFiles(mirror.path, { 'b.cpp': 'b\n' });
    await gateway.commitFiles(mirror.path, { 'c.cpp': 'c\n' });
    await writeFiles(mirror.path, { 'b.cpp': 'b2\n' });

    const outcome = await committer().run(source, mirror);
    expect(outcome.baseCommit).toBe(second);
    expect(gateway.callsTo('autosquashRebase')[0]?.args).toEqual([first]);
    expect(gateway.history(mirror.path)).toHaveLength(3);
  });

  it('targets HEAD itself when it is the only commit', async () => {
    const only = await gateway.commitFiles(mirror.path, { 'a.cpp': 'a\n' });
    await writeFiles(mirror.path, { 'a.cpp': 'a2\n' });
    const outcome = await committer().run(source, mirror);
    expect(outcome.baseCommit).toBe(only);
    expect(outcome.squashed).toBe(true);
    expect(gateway.history(mirror.path).map(c => c.id)).toEqual([only]);
  });

  it('skips a mirror without history', async () => {
    await writeFiles(mirror.path, { 'a.cpp': 'a\n' });
    const outcome = await committer().run(source, mirror);
    expect(outcome.skipped).toBe('no-history');
    expect(gateway.callsTo('stageModifiedOnly')).toEqual([]);
  });

  it('leaves untracked files alone', async () => {
    await gateway.commitFiles(mirror.path, { 'a.cpp': 'a\n' });
    await writeFiles(mirror.path, { 'scratch.cpp': 'tmp\n' });
    const outcome = await committer().run(source, mirror);
    expect(outcome.skipped).toBe('nothing-staged');
    expect(outcome.filesModified).toBe(0);
    expect(gateway.callsTo('fixupCommit')).toEqual([]);
  });

  it('keeps the fixup commit when the autosquash rebase fails', async () => {
    await gateway.commitFiles(mirror.path, { 'a.cpp': 'a\n' });
    await gateway.commitFiles(mirror.path, { 'b.cpp': 'b\n' });
    await writeFiles(mirror.path, { 'a.cpp': 'conflicting\n' });
    gateway.failOn('autosquashRebase', new MirrorError(MirrorErrorCode.REBASE_CONFLICT, 'git rebase exited with 1'));

    const outcome = await committer().run(source, mirror);
    expect(outcome.succeeded).toBe(false);
    expect(outcome.squashed).toBe(false);
    expect(outcome.error?.code).toBe(MirrorErrorCode.REBASE_CONFLICT);
    expect(outcome.fixupCommit).toBeDefined();
    const log = gateway.history(mirror.path);
    expect(log).toHaveLength(3);
    expect(log[2]?.id).toBe(outcome.fixupCommit);
  });

  it('stops after the fixup commit when autosquash is off', async () => {
    await gateway.commitFiles(mirror.path, { 'a.cpp': 'a\n' });
    await writeFiles(mirror.path, { 'a.cpp': 'a2\n' });
    const outcome = await committer({ autosquash: false }).run(source, mirror);
    expect(outcome.succeeded).toBe(true);
    expect(outcome.squashed).toBe(false);
    expect(gateway.callsTo('autosquashRebase')).toEqual([]);
    expect(gateway.history(mirror.path)).toHaveLength(2);
  });

  it('only reports the base in dry-run mode', async () => {
    const only = await gateway.commitFiles(mirror.path, { 'a.cpp': 'a\n' });
    await writeFiles(mirror.path, { 'a.cpp': 'a2\n' });
    const outcome = await committer().run(source, mirror, { dryRun: true });
    expect(outcome).toEqual({
      branch: 'main',
      baseCommit: only,
      filesModified: 0,
      succeeded: true,
      squashed: false,
      skipped: 'dry-run',
    });
    expect(gateway.callsTo('stageModifiedOnly')).toEqual([]);
  });

  it('switches the mirror to the source branch first', async () => {
    gateway.setCurrentBranch('/work/src', 'feature');
    await gateway.commitFiles(mirror.path, { 'a.cpp': 'a\n' });
    const outcome = await committer().run(source, mirror);
    expect(outcome.branch).toBe('feature');
    expect(await gateway.currentBranch(mirror)).toBe('feature');
  });

  it('refuses a mirror that is not a repository', async () => {
    await expect(committer().run(source, repoRef('/work/elsewhere'))).rejects.toMatchObject({
      code: MirrorErrorCode.NOT_A_REPOSITORY,
    });
  });
});
