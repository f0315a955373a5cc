// Config loader: reads ~/.config/mirror-sync/config.yaml and deep-merges it over defaults.
// On first run (no config file) the commented default file is written and firstRun is true;
// the empty repository paths in it then fail validation until the user fills them in.
// Add new keys to FileConfigSchema, DEFAULT_CONFIG and DEFAULT_CONFIG_YAML together.
import { readFileSync, writeFileSync, mkdirSync, existsSync } from 'node:fs';
import { stat } from 'node:fs/promises';
import { join, dirname, resolve } from 'node:path';
import { homedir } from 'node:os';
import { parse as parseYaml } from 'yaml';
import { FileConfigSchema, type FileConfig } from './schema.js';
import type { MirrorSyncSettings } from './types.js';
import { parseDuration } from '../shared/duration.js';
import { MirrorError, MirrorErrorCode } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { createInclusionRule } from '../sync/inclusion.js';
import { resolveAuthor } from '../sync/commit-generator.js';

export const DEFAULT_CONFIG_PATH = join(homedir(), '.config', 'mirror-sync', 'config.yaml');

export const DEFAULT_CONFIG: FileConfig = {
  source: { path: '' },
  mirror: { path: '' },
  git: { executable: 'git', remote: 'origin', command_timeout: null },
  include: { extensions: ['.cpp', '.h', '.hpp'], patterns: [] },
  exclude: { patterns: [] },
  sync: {
    interval: '5m',
    pause_lock_file: '.sync-paused',
    commit_template: 'Auto-sync: ${timestamp} @ ${hash}',
  },
  fixup: { interval: '1h', message_prefix: 'fixup! ', autosquash: true },
  author: { name: null, email: null },
  dry_run: false,
  log_level: 'info',
};

export const DEFAULT_CONFIG_YAML = `# mirror-sync configuration
# Generated automatically. All values shown are defaults except the two repository paths.

# Repository being edited; its current branch decides the mirror's branch.
source:
  path: ""

# Clone that receives the changes and the fixup commits.
mirror:
  path: ""

git:
  executable: git
  remote: origin
  # Per-invocation timeout (e.g. 2m); null waits indefinitely.
  command_timeout: null

# A path propagates when its extension is listed or an include pattern matches,
# unless an exclude pattern matches. Patterns are globs relative to the repository root.
include:
  extensions: [".cpp", ".h", ".hpp"]
  patterns: []

exclude:
  patterns: []

sync:
  interval: 5m
  # While this file exists in the source repository, sync passes are skipped.
  pause_lock_file: .sync-paused
  # Tokens: \${timestamp} and \${hash} (short hash of the source HEAD).
  commit_template: "Auto-sync: \${timestamp} @ \${hash}"

fixup:
  interval: 1h
  message_prefix: "fixup! "
  autosquash: true

# Used only when both are set; otherwise the mirror's git identity applies.
author:
  name: null
  email: null

dry_run: false

# debug | info | warn | error
log_level: info
`;

export interface ConfigResult {
  config: FileConfig;
  configPath: string;
  firstRun: boolean;
}

export function writeDefaultConfig(configPath: string): void {
  mkdirSync(dirname(configPath), { recursive: true });
  writeFileSync(configPath, DEFAULT_CONFIG_YAML, 'utf-8');
}

export function loadConfig(explicitPath?: string): ConfigResult {
  const configPath = resolve(explicitPath ?? process.env['MIRROR_SYNC_CONFIG'] ?? DEFAULT_CONFIG_PATH);

  if (!existsSync(configPath)) {
    logger.info({ configPath }, 'No config file found; generating defaults (first run)');
    try {
      writeDefaultConfig(configPath);
    } catch (err) {
      logger.warn({ configPath, error: err }, 'Could not write default config file');
    }
    return { config: structuredClone(DEFAULT_CONFIG), configPath, firstRun: true };
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new MirrorError(MirrorErrorCode.CONFIG_INVALID, `Failed to parse config file: ${configPath}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }
  if (parsed !== null && parsed !== undefined && !isRecord(parsed)) {
    throw new MirrorError(MirrorErrorCode.CONFIG_INVALID, `Config file must contain a YAML mapping: ${configPath}`);
  }

  const merged = deepMerge(DEFAULT_CONFIG, isRecord(parsed) ? parsed : {});
  const result = FileConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new MirrorError(MirrorErrorCode.CONFIG_INVALID, `Invalid config ${configPath}: ${issues.join('; ')}`, { issues });
  }
  return { config: result.data, configPath, firstRun: false };
}

export function expandHome(p: string): string {
  if (p === '~') return homedir();
  return p.startsWith('~/') ? join(homedir(), p.slice(2)) : p;
}

async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await stat(p)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Turns a loaded config into settings: repository paths are resolved against the config
 * file's directory and must be existing, distinct directories. Every problem is collected
 * into one CONFIG_INVALID error.
 */
export async function resolveSettings(config: FileConfig, configPath: string): Promise<MirrorSyncSettings> {
  const baseDir = dirname(configPath);
  const sourcePath = resolve(baseDir, expandHome(config.source.path));
  const mirrorPath = resolve(baseDir, expandHome(config.mirror.path));
  const issues: string[] = [];

  if (!config.source.path) issues.push('source.path: source repository path is required');
  else if (!(await isDirectory(sourcePath))) issues.push(`source.path: not a directory: ${sourcePath}`);
  if (!config.mirror.path) issues.push('mirror.path: mirror repository path is required');
  else if (!(await isDirectory(mirrorPath))) issues.push(`mirror.path: not a directory: ${mirrorPath}`);
  if (config.source.path && config.mirror.path && sourcePath === mirrorPath) {
    issues.push('mirror.path: must differ from source.path');
  }

  const syncIntervalMs = parseDuration(config.sync.interval);
  const fixupIntervalMs = parseDuration(config.fixup.interval);
  if (syncIntervalMs === null) issues.push(`sync.interval: invalid duration "${config.sync.interval}"`);
  if (fixupIntervalMs === null) issues.push(`fixup.interval: invalid duration "${config.fixup.interval}"`);

  if (issues.length > 0 || syncIntervalMs === null || fixupIntervalMs === null) {
    throw new MirrorError(MirrorErrorCode.CONFIG_INVALID, `Invalid config ${configPath}: ${issues.join('; ')}`, { issues });
  }

  const executableName = config.git.executable;
  return {
    source: { path: sourcePath, executableName },
    mirror: { path: mirrorPath, executableName },
    remoteName: config.git.remote,
    commandTimeoutMs: config.git.command_timeout ? (parseDuration(config.git.command_timeout) ?? undefined) : undefined,
    rule: createInclusionRule({
      extensions: config.include.extensions,
      includeGlobs: config.include.patterns,
      excludeGlobs: config.exclude.patterns,
    }),
    syncIntervalMs,
    fixupIntervalMs,
    pauseLockFile: config.sync.pause_lock_file,
    commitTemplate: config.sync.commit_template,
    fixupMessagePrefix: config.fixup.message_prefix,
    autosquash: config.fixup.autosquash,
    author: resolveAuthor(config.author.name, config.author.email),
    dryRun: config.dry_run,
    logLevel: config.log_level,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Deep merge b into a (a provides defaults, b overrides). */
function deepMerge(a: Record<string, unknown>, b: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...a };
  for (const key of Object.keys(b)) {
    const aVal = a[key];
    const bVal = b[key];
    if (isRecord(aVal) && isRecord(bVal)) {
      result[key] = deepMerge(aVal, bVal);
    } else if (bVal !== undefined) {
      result[key] = bVal;
    }
  }
  return result;
}
