import { z } from 'zod';
import { parseDuration } from '../shared/duration.js';

const duration = z
  .string()
  .refine(value => parseDuration(value) !== null, { message: 'expected a positive duration such as 90s, 5m or 1h30m' });

const optionalText = z.string().nullable();

/** Shape of config.yaml after defaults are merged in. Keys mirror the YAML file. */
export const FileConfigSchema = z.object({
  source: z.object({ path: z.string().min(1, 'source repository path is required') }),
  mirror: z.object({ path: z.string().min(1, 'mirror repository path is required') }),
  git: z.object({
    executable: z.string().min(1),
    remote: z.string().min(1),
    command_timeout: duration.nullable(),
  }),
  include: z.object({
    extensions: z.array(z.string()),
    patterns: z.array(z.string()),
  }),
  exclude: z.object({
    patterns: z.array(z.string()),
  }),
  sync: z.object({
    interval: duration,
    pause_lock_file: z.string().min(1),
    commit_template: z.string().min(1),
  }),
  fixup: z.object({
    interval: duration,
    message_prefix: z.string(),
    autosquash: z.boolean(),
  }),
  author: z.object({
    name: optionalText,
    email: optionalText,
  }),
  dry_run: z.boolean(),
  log_level: z.enum(['debug', 'info', 'warn', 'error']),
});

export type FileConfig = z.infer<typeof FileConfigSchema>;
