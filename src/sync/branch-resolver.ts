import { MirrorError, MirrorErrorCode } from '../shared/errors.js';
import { componentLogger, type Logger } from '../shared/logger.js';
import type { BranchName, RepositoryGateway, RepositoryRef } from '../gateway/types.js';

export type BranchAction = 'unchanged' | 'checkout' | 'create-from-remote' | 'create-local';

export interface BranchResolution {
  branch: BranchName;
  action: BranchAction;
  /** False when the action was only decided (dry run). */
  performed: boolean;
}

export interface ResolveOptions {
  dryRun?: boolean;
}

/**
 * Keeps the mirror checked out on the branch the source is on.
 *
 * Runs before any diff or commit in both passes; a failure here fails the cycle and the
 * next cycle resolves again from scratch.
 */
export class BranchResolver {
  private readonly log: Logger;

  constructor(private readonly gateway: RepositoryGateway) {
    this.log = componentLogger('branch-resolver');
  }

  async resolve(source: RepositoryRef, mirror: RepositoryRef, options: ResolveOptions = {}): Promise<BranchResolution> {
    const target = await this.gateway.currentBranch(source);
    if (!target) {
      throw new MirrorError(
        MirrorErrorCode.BRANCH_UNRESOLVABLE,
        `Source repository has no current branch (detached HEAD?): ${source.path}`
      );
    }

    const current = await this.gateway.currentBranch(mirror);
    if (current === target) {
      return { branch: target, action: 'unchanged', performed: true };
    }

    const action = await this.chooseAction(mirror, target);
    this.log.info({ from: current, to: target, action, dryRun: !!options.dryRun }, 'Switching mirror branch');
    if (options.dryRun) {
      return { branch: target, action, performed: false };
    }

    switch (action) {
      case 'checkout':
        await this.gateway.checkout(mirror, target);
        break;
      case 'create-from-remote':
        await this.gateway.createBranch(mirror, target, true);
        break;
      case 'create-local':
        // Name match only: the new branch starts from whatever the mirror's HEAD is.
        await this.gateway.createBranch(mirror, target, false);
        break;
    }
    return { branch: target, action, performed: true };
  }

  private async chooseAction(mirror: RepositoryRef, target: BranchName): Promise<Exclude<BranchAction, 'unchanged'>> {
    if (await this.gateway.branchExists(mirror, target, 'local')) return 'checkout';
    if (await this.gateway.branchExists(mirror, target, 'remote')) return 'create-from-remote';
    return 'create-local';
  }
}
