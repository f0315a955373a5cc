import type { CommitAuthor, RepositoryRef } from '../gateway/types.js';
import type { InclusionRule } from '../sync/inclusion.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Validated settings every pass and the scheduler run from. Paths are absolute. */
export interface MirrorSyncSettings {
  source: RepositoryRef;
  mirror: RepositoryRef;
  remoteName: string;
  commandTimeoutMs?: number;
  rule: InclusionRule;
  syncIntervalMs: number;
  fixupIntervalMs: number;
  pauseLockFile: string;
  commitTemplate: string;
  fixupMessagePrefix: string;
  autosquash: boolean;
  author?: CommitAuthor;
  dryRun: boolean;
  logLevel: LogLevel;
}
