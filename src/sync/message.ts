import type { ChangeSet } from './change-detector.js';

// The only tokens a commit template may carry; anything else is copied verbatim.
export interface TemplateTokens {
  timestamp: string;
  hash: string;
}

const TOKEN = /\$\{(timestamp|hash)\}/g;

export function renderTemplate(template: string, tokens: TemplateTokens): string {
  return template.replace(TOKEN, (_match, name: keyof TemplateTokens) => tokens[name]);
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** Local time as `YYYY-MM-DD HH:mm:ss`. */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function shortHash(commit: string | null | undefined): string {
  return commit ? commit.slice(0, 8) : 'pending';
}

export function changeSummary(changes: ChangeSet): string {
  const { added, modified, deleted } = changes;
  const total = added.length + modified.length + deleted.length;
  return `(${total} files: +${added.length} ~${modified.length} -${deleted.length})`;
}

export function buildSyncMessage(template: string, tokens: TemplateTokens, changes: ChangeSet): string {
  return `${renderTemplate(template, tokens)} ${changeSummary(changes)}`;
}

export function buildFixupMessage(prefix: string, baseCommit: string, timestamp: string): string {
  return `${prefix}Automated fixup for ${baseCommit.slice(0, 8)} @ ${timestamp}`;
}
