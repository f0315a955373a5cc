import execa from 'execa';
import { MirrorError, MirrorErrorCode } from './errors.js';

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  signal?: string;
}

export interface ExecOptions {
  cwd?: string;
  env?: Record<string, string>;
  timeoutMs?: number;
}

// Signature shared by run() and the stubs the gateway tests inject in its place.
export type CommandRunner = (command: string, args: string[], options?: ExecOptions) => Promise<ExecResult>;

export async function run(command: string, args: string[], options?: ExecOptions): Promise<ExecResult> {
  const result = await execa(command, args, {
    cwd: options?.cwd,
    env: options?.env,
    timeout: options?.timeoutMs,
    reject: false,
  });
  // With reject: false a spawn failure (binary missing, bad cwd) resolves without an exit code.
  if (typeof result.exitCode !== 'number' && !result.signal) {
    throw new MirrorError(MirrorErrorCode.TOOL_FAILED, `Command failed to spawn: ${command}`, {
      command: result.command,
      cwd: options?.cwd,
    });
  }
  return {
    stdout: result.stdout ?? '',
    stderr: result.stderr ?? '',
    exitCode: typeof result.exitCode === 'number' ? result.exitCode : 128,
    signal: result.signal ?? undefined,
  };
}
