import type { ChangeSet } from '../sync/change-detector.js';
import type { FixupOutcome } from '../fixup/fixup-committer.js';
import type { MirrorError } from '../shared/errors.js';

export type PassKind = 'sync' | 'fixup';

/**
 * Result of one pass. `noop` is a successful pass that changed nothing (paused, empty
 * change set, clean mirror, dry run); `failed` carries the error that ended the pass and,
 * when the pass got far enough to produce one, its partial result.
 */
export type PassOutcome<T> =
  | { status: 'completed'; value: T }
  | { status: 'noop'; reason: string; value?: T }
  | { status: 'failed'; error: MirrorError; value?: T };

export type SyncOutcome = PassOutcome<ChangeSet>;
export type FixupPassOutcome = PassOutcome<FixupOutcome>;

/** A finished pass, tagged with its kind so listeners can narrow the outcome. */
export type PassReport = { kind: 'sync'; outcome: SyncOutcome } | { kind: 'fixup'; outcome: FixupPassOutcome };

export interface Pass<T> {
  readonly kind: PassKind;
  run(): Promise<PassOutcome<T>>;
}
