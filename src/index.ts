export * from './shared/errors.js';
export { parseDuration, formatDuration } from './shared/duration.js';
export { run, type CommandRunner, type ExecOptions, type ExecResult } from './shared/exec.js';
export { logger, componentLogger, type Logger } from './shared/logger.js';

export type * from './gateway/types.js';
export { GitCliGateway, parseCommitId, parsePathList, type GitCliGatewayOptions } from './gateway/git-cli-gateway.js';

export * from './sync/inclusion.js';
export * from './sync/branch-resolver.js';
export * from './sync/change-detector.js';
export * from './sync/change-applier.js';
export * from './sync/commit-generator.js';
export * from './sync/message.js';
export * from './fixup/fixup-committer.js';

export type * from './scheduler/types.js';
export { MirrorLock } from './scheduler/mirror-lock.js';
export { SyncPass, type SyncPassSettings, type SyncPassComponents } from './scheduler/sync-pass.js';
export { FixupPass, type FixupPassSettings } from './scheduler/fixup-pass.js';
export { CycleScheduler, type CycleSchedulerOptions, type OutcomeListener } from './scheduler/cycle-scheduler.js';
export { createRuntime, type MirrorSyncRuntime, type RuntimeOverrides } from './scheduler/factory.js';
export { formatSyncOutcome, formatFixupOutcome, formatPassReport } from './scheduler/outcome-text.js';

export { loadConfig, resolveSettings, writeDefaultConfig, DEFAULT_CONFIG, DEFAULT_CONFIG_PATH, type ConfigResult } from './config/loader.js';
export { FileConfigSchema, type FileConfig } from './config/schema.js';
export type { MirrorSyncSettings, LogLevel } from './config/types.js';
