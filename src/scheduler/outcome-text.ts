import { describeError } from '../shared/errors.js';
import { changeSummary, shortHash } from '../sync/message.js';
import type { ChangeSet } from '../sync/change-detector.js';
import type { FixupOutcome } from '../fixup/fixup-committer.js';
import type { FixupPassOutcome, PassReport, SyncOutcome } from './types.js';

function describeSync(value: ChangeSet): string {
  return `committed ${shortHash(value.resultingCommit)} ${changeSummary(value)}`;
}

function describeFixup(value: FixupOutcome): string {
  const base = shortHash(value.baseCommit);
  const files = `${value.filesModified} file${value.filesModified === 1 ? '' : 's'}`;
  const tail = value.squashed ? 'squashed' : 'not squashed';
  return `committed ${shortHash(value.fixupCommit)} as fixup of ${base} on ${value.branch} (${files}), ${tail}`;
}

/** One progress line per pass, as printed by the CLI. */
export function formatSyncOutcome(outcome: SyncOutcome): string {
  switch (outcome.status) {
    case 'completed':
      return `sync: ${describeSync(outcome.value)}`;
    case 'noop':
      return `sync: ${outcome.reason}`;
    case 'failed':
      return `sync: failed ${describeError(outcome.error)}`;
  }
}

export function formatFixupOutcome(outcome: FixupPassOutcome): string {
  switch (outcome.status) {
    case 'completed':
      return `fixup: ${describeFixup(outcome.value)}`;
    case 'noop':
      return `fixup: ${outcome.reason}`;
    case 'failed':
      // An autosquash failure still leaves a fixup commit worth reporting.
      return outcome.value?.fixupCommit
        ? `fixup: ${describeFixup(outcome.value)}; failed ${describeError(outcome.error)}`
        : `fixup: failed ${describeError(outcome.error)}`;
  }
}

export function formatPassReport(report: PassReport): string {
  return report.kind === 'sync' ? formatSyncOutcome(report.outcome) : formatFixupOutcome(report.outcome);
}
