import { componentLogger, type Logger } from '../shared/logger.js';
import { changeCount, type ChangeSet } from './change-detector.js';
import { buildSyncMessage, formatTimestamp, shortHash } from './message.js';
import type { CommitAuthor, RepositoryGateway, RepositoryRef } from '../gateway/types.js';

export interface CommitGeneratorOptions {
  /** Commit subject template; `${timestamp}` and `${hash}` are substituted. */
  template: string;
  author?: CommitAuthor;
  now?: () => Date;
}

// An explicit identity only when both halves are configured; otherwise the mirror's own git config applies.
export function resolveAuthor(name?: string | null, email?: string | null): CommitAuthor | undefined {
  if (!name?.trim() || !email?.trim()) return undefined;
  return { name: name.trim(), email: email.trim() };
}

export class CommitGenerator {
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(
    private readonly gateway: RepositoryGateway,
    private readonly options: CommitGeneratorOptions
  ) {
    this.now = options.now ?? (() => new Date());
    this.log = componentLogger('commit-generator');
  }

  /**
   * Stages and commits an applied change set as one mirror commit. Returns the change set
   * with `resultingCommit` set when a commit was made; an empty set never reaches the gateway.
   */
  async commitChangeSet(source: RepositoryRef, mirror: RepositoryRef, changes: ChangeSet): Promise<ChangeSet> {
    if (changeCount(changes) === 0) return changes;

    await this.gateway.stageAll(mirror);
    const message = buildSyncMessage(
      this.options.template,
      {
        timestamp: formatTimestamp(this.now()),
        hash: shortHash(await this.gateway.revisionBefore(source, 0)),
      },
      changes
    );

    const result = await this.gateway.commit(mirror, message, this.options.author);
    if (result.kind === 'nothing-to-commit') {
      this.log.info({ mirror: mirror.path }, 'Mirror already matched the change set; nothing to commit');
      return { ...changes };
    }
    return { ...changes, resultingCommit: result.commit };
  }
}
