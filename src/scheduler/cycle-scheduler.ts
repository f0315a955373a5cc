import { asMirrorError, describeError } from '../shared/errors.js';
import { componentLogger, type Logger } from '../shared/logger.js';
import { MirrorLock } from './mirror-lock.js';
import type { ChangeSet } from '../sync/change-detector.js';
import type { FixupOutcome } from '../fixup/fixup-committer.js';
import type { FixupPassOutcome, Pass, PassKind, PassOutcome, PassReport, SyncOutcome } from './types.js';

export type OutcomeListener = (report: PassReport) => void;

interface PassSlot<T> {
  current?: Promise<PassOutcome<T>>;
}

export interface CycleSchedulerOptions {
  syncIntervalMs: number;
  fixupIntervalMs: number;
  lock?: MirrorLock;
  onOutcome?: OutcomeListener;
}

/**
 * Drives sync and fixup passes on two independent fixed-interval timers.
 *
 * A tick whose previous pass of the same kind is still running is dropped, never queued.
 * Passes of different kinds may be due at once; they take turns on one MirrorLock.
 * Stopping clears the timers and waits for whatever pass is in flight.
 */
export class CycleScheduler {
  private readonly lock: MirrorLock;
  private readonly log: Logger;
  private readonly slots: { sync: PassSlot<ChangeSet>; fixup: PassSlot<FixupOutcome> } = { sync: {}, fixup: {} };
  private readonly skipped: Record<PassKind, number> = { sync: 0, fixup: 0 };
  private timers: NodeJS.Timeout[] = [];

  constructor(
    private readonly passes: { sync: Pass<ChangeSet>; fixup: Pass<FixupOutcome> },
    private readonly options: CycleSchedulerOptions
  ) {
    this.lock = options.lock ?? new MirrorLock();
    this.log = componentLogger('scheduler');
  }

  get running(): boolean {
    return this.timers.length > 0;
  }

  /** Ticks dropped because the previous pass of the same kind had not finished. */
  get skippedTicks(): Readonly<Record<PassKind, number>> {
    return { ...this.skipped };
  }

  start(kinds: readonly PassKind[] = ['sync', 'fixup']): void {
    if (this.running) return;
    for (const kind of kinds) {
      const interval = kind === 'sync' ? this.options.syncIntervalMs : this.options.fixupIntervalMs;
      this.timers.push(setInterval(() => this.tick(kind), interval));
      this.log.info({ kind, intervalMs: interval }, 'Timer armed');
    }
  }

  async stop(): Promise<void> {
    for (const timer of this.timers) clearInterval(timer);
    this.timers = [];
    await Promise.allSettled([this.slots.sync.current, this.slots.fixup.current]);
  }

  /** Runs one sync pass now, or joins the one already running. */
  runSync(): Promise<SyncOutcome> {
    return this.execute(this.passes.sync, this.slots.sync, outcome => ({ kind: 'sync', outcome }));
  }

  /** Runs one fixup pass now, or joins the one already running. */
  runFixup(): Promise<FixupPassOutcome> {
    return this.execute(this.passes.fixup, this.slots.fixup, outcome => ({ kind: 'fixup', outcome }));
  }

  runOnce(kind: PassKind): Promise<SyncOutcome | FixupPassOutcome> {
    return kind === 'sync' ? this.runSync() : this.runFixup();
  }

  /**
   * Runs one `first` pass, arms the timers for `kinds` once it has finished, and stops when
   * `stopRequested` settles. A stop requested during the first pass waits for that pass and
   * never arms the timers.
   */
  async runUntil(stopRequested: Promise<unknown>, first: PassKind, kinds: readonly PassKind[]): Promise<void> {
    const firstDone = this.runOnce(first).then(() => true);
    const finishedFirst = await Promise.race([stopRequested.then(() => false), firstDone]);
    if (finishedFirst) this.start(kinds);
    await stopRequested;
    this.log.info({ first, finishedFirst }, 'Stop requested; waiting for the running pass');
    await this.stop();
  }

  private tick(kind: PassKind): void {
    if (this.slots[kind].current) {
      this.skipped[kind]++;
      this.log.debug({ kind }, 'Previous pass still running; tick skipped');
      return;
    }
    this.runOnce(kind).catch(err => this.log.error({ kind, error: describeError(err) }, 'Pass rejected unexpectedly'));
  }

  private execute<T>(
    pass: Pass<T>,
    slot: PassSlot<T>,
    toReport: (outcome: PassOutcome<T>) => PassReport
  ): Promise<PassOutcome<T>> {
    if (slot.current) return slot.current;
    const promise = this.lock
      .runExclusive(() => pass.run())
      .catch((err): PassOutcome<T> => ({ status: 'failed', error: asMirrorError(err) }))
      .then(outcome => {
        this.report(toReport(outcome));
        return outcome;
      })
      .finally(() => {
        slot.current = undefined;
      });
    slot.current = promise;
    return promise;
  }

  private report(report: PassReport): void {
    const { kind, outcome } = report;
    switch (outcome.status) {
      case 'completed':
        this.log.info({ kind }, 'Pass completed');
        break;
      case 'noop':
        this.log.debug({ kind, reason: outcome.reason }, 'Pass made no changes');
        break;
      case 'failed':
        this.log.error({ kind, code: outcome.error.code, retryable: outcome.error.retryable }, describeError(outcome.error));
        break;
    }
    try {
      this.options.onOutcome?.(report);
    } catch (err) {
      this.log.warn({ kind, error: describeError(err) }, 'Outcome listener threw');
    }
  }
}
