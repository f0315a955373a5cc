#!/usr/bin/env node

import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { Command } from 'commander';

import { logger } from './shared/logger.js';
import { MirrorErrorCode, describeError, isMirrorError } from './shared/errors.js';
import { formatDuration } from './shared/duration.js';
import { DEFAULT_CONFIG_PATH, loadConfig, resolveSettings, writeDefaultConfig } from './config/loader.js';
import { createRuntime, type MirrorSyncRuntime } from './scheduler/factory.js';
import { formatPassReport } from './scheduler/outcome-text.js';
import type { PassKind, PassOutcome } from './scheduler/types.js';
import type { MirrorSyncSettings } from './config/types.js';

type GlobalOptions = {
  config?: string;
  dryRun?: boolean;
  verbose?: boolean;
};

type LoopOptions = {
  continuous?: boolean;
};

const EXIT_PASS_FAILED = 1;
const EXIT_CONFIG_INVALID = 2;

const program = new Command();

program
  .name('mirror-sync')
  .description('Mirror source-file changes into a second clone and fold mirror-side edits into fixup commits')
  .version('0.1.0')
  .option('-c, --config <path>', 'config file (default: $MIRROR_SYNC_CONFIG or ~/.config/mirror-sync/config.yaml)')
  .option('--dry-run', 'decide what each pass would do without changing either repository')
  .option('-v, --verbose', 'debug logging on stderr');

function configPathFrom(opts: GlobalOptions): string {
  return resolve(opts.config ?? process.env['MIRROR_SYNC_CONFIG'] ?? DEFAULT_CONFIG_PATH);
}

// Sets the log level before any component takes its child logger.
async function prepare(opts: GlobalOptions): Promise<MirrorSyncSettings> {
  const { config, configPath, firstRun } = loadConfig(configPathFrom(opts));
  if (firstRun) {
    console.log(`Wrote default config to ${configPath}; set source.path and mirror.path, then run again.`);
  }
  const settings = await resolveSettings(config, configPath);
  logger.level = opts.verbose ? 'debug' : (process.env['LOG_LEVEL'] ?? settings.logLevel);
  return { ...settings, dryRun: settings.dryRun || !!opts.dryRun };
}

function printBanner(settings: MirrorSyncSettings, kinds: readonly PassKind[]): void {
  console.log(`source: ${settings.source.path}`);
  console.log(`mirror: ${settings.mirror.path}`);
  for (const kind of kinds) {
    const interval = kind === 'sync' ? settings.syncIntervalMs : settings.fixupIntervalMs;
    console.log(`${kind}: every ${formatDuration(interval)}${settings.dryRun ? ' (dry run)' : ''}`);
  }
}

function startRuntime(settings: MirrorSyncSettings): MirrorSyncRuntime {
  return createRuntime(settings, { onOutcome: report => console.log(formatPassReport(report)) });
}

function untilSignalled(): Promise<NodeJS.Signals> {
  return new Promise(done => {
    const onSignal = (signal: NodeJS.Signals): void => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      done(signal);
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  });
}

// The handlers go in before the first pass, so a signal during it waits for that pass to end.
async function runUntilSignalled(runtime: MirrorSyncRuntime, first: PassKind, kinds: readonly PassKind[]): Promise<void> {
  const signalled = untilSignalled();
  await runtime.scheduler.runUntil(signalled, first, kinds);
  console.log(`Stopped on ${await signalled}`);
}

function exitCodeFor(outcome: PassOutcome<unknown>): void {
  if (outcome.status === 'failed') process.exitCode = EXIT_PASS_FAILED;
}

// ── Pass commands ──────────────────────────────────────────────

program
  .command('sync')
  .description('Copy source changes into the mirror and commit them')
  .option('--continuous', 'keep syncing on the configured interval until interrupted')
  .action(async (opts: LoopOptions, command: Command) => {
    const settings = await prepare(command.optsWithGlobals<GlobalOptions>());
    const runtime = startRuntime(settings);
    if (!opts.continuous) {
      exitCodeFor(await runtime.scheduler.runSync());
      return;
    }
    printBanner(settings, ['sync']);
    await runUntilSignalled(runtime, 'sync', ['sync']);
  });

program
  .command('fixup')
  .description('Fold modified mirror files into a fixup commit and autosquash it')
  .option('--continuous', 'keep running fixup passes on the configured interval until interrupted')
  .action(async (opts: LoopOptions, command: Command) => {
    const settings = await prepare(command.optsWithGlobals<GlobalOptions>());
    const runtime = startRuntime(settings);
    if (!opts.continuous) {
      exitCodeFor(await runtime.scheduler.runFixup());
      return;
    }
    printBanner(settings, ['fixup']);
    await runUntilSignalled(runtime, 'fixup', ['fixup']);
  });

program
  .command('run')
  .description('Sync once, then run sync and fixup passes on their intervals until interrupted')
  .action(async (_opts: unknown, command: Command) => {
    const settings = await prepare(command.optsWithGlobals<GlobalOptions>());
    const runtime = startRuntime(settings);
    printBanner(settings, ['sync', 'fixup']);
    await runUntilSignalled(runtime, 'sync', ['sync', 'fixup']);
  });

// ── Config commands ────────────────────────────────────────────

program
  .command('init-config')
  .description('Write the commented default config file')
  .option('-f, --force', 'overwrite an existing file')
  .action((opts: { force?: boolean }, command: Command) => {
    const configPath = configPathFrom(command.optsWithGlobals<GlobalOptions>());
    if (existsSync(configPath) && !opts.force) {
      console.error(`Config already exists: ${configPath} (use --force to overwrite)`);
      process.exitCode = EXIT_CONFIG_INVALID;
      return;
    }
    writeDefaultConfig(configPath);
    console.log(`Wrote ${configPath}`);
  });

program
  .command('validate-config')
  .description('Load and validate the config file, then print the resolved settings')
  .action(async (_opts: unknown, command: Command) => {
    const settings = await prepare(command.optsWithGlobals<GlobalOptions>());
    console.log('Config OK');
    printBanner(settings, ['sync', 'fixup']);
    console.log(`extensions: ${[...settings.rule.extensions].join(', ') || '(none)'}`);
    console.log(`include: ${settings.rule.includeGlobs.join(', ') || '(none)'}`);
    console.log(`exclude: ${settings.rule.excludeGlobs.join(', ') || '(none)'}`);
    console.log(`pause file: ${settings.pauseLockFile}`);
    console.log(`autosquash: ${settings.autosquash ? 'on' : 'off'}`);
    console.log(`author: ${settings.author ? `${settings.author.name} <${settings.author.email}>` : '(git default)'}`);
  });

program.parseAsync().catch((err: unknown) => {
  if (isMirrorError(err, MirrorErrorCode.CONFIG_INVALID)) {
    console.error(err.message);
    process.exitCode = EXIT_CONFIG_INVALID;
    return;
  }
  console.error(`Fatal: ${describeError(err)}`);
  process.exitCode = EXIT_PASS_FAILED;
});
