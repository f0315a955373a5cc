export enum MirrorErrorCode {
  CONFIG_INVALID = 'CONFIG_INVALID',
  NOT_A_REPOSITORY = 'NOT_A_REPOSITORY',
  BRANCH_UNRESOLVABLE = 'BRANCH_UNRESOLVABLE',
  BRANCH_CONFLICT = 'BRANCH_CONFLICT',
  REBASE_CONFLICT = 'REBASE_CONFLICT',
  APPLY_FAILED = 'APPLY_FAILED',
  TOOL_FAILED = 'TOOL_FAILED',
}

// Only a failed tool invocation may succeed when the next cycle repeats it unchanged.
const RETRYABLE_CODES: ReadonlySet<MirrorErrorCode> = new Set([MirrorErrorCode.TOOL_FAILED]);

export class MirrorError extends Error {
  readonly code: MirrorErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: MirrorErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'MirrorError';
    this.code = code;
    this.context = context;
  }

  get retryable(): boolean {
    return RETRYABLE_CODES.has(this.code);
  }
}

export function isMirrorError(err: unknown, code?: MirrorErrorCode): err is MirrorError {
  return err instanceof MirrorError && (code === undefined || err.code === code);
}

// Anything thrown inside a pass that is not already classified counts as a tool failure.
export function asMirrorError(err: unknown, code = MirrorErrorCode.TOOL_FAILED): MirrorError {
  if (err instanceof MirrorError) return err;
  return new MirrorError(code, err instanceof Error ? err.message : String(err));
}

// One line for any thrown value, with the tool's stderr appended when it was captured.
export function describeError(err: unknown): string {
  if (err instanceof MirrorError) {
    const stderr = err.context?.['stderr'];
    const detail = typeof stderr === 'string' && stderr.trim() ? `: ${stderr.trim().split('\n')[0]}` : '';
    return `[${err.code}] ${err.message}${detail}`;
  }
  return err instanceof Error ? err.message : String(err);
}
