import path from 'path';
import picomatch from 'picomatch';

export interface InclusionRule {
  readonly extensions: ReadonlySet<string>;
  readonly includeGlobs: readonly string[];
  readonly excludeGlobs: readonly string[];
}

export type PathMatcher = (relativePath: string) => boolean;

export function normalizeExtension(ext: string): string {
  const lower = ext.trim().toLowerCase();
  return lower.startsWith('.') ? lower : `.${lower}`;
}

export function createInclusionRule(input: {
  extensions?: readonly string[];
  includeGlobs?: readonly string[];
  excludeGlobs?: readonly string[];
}): InclusionRule {
  return {
    extensions: new Set((input.extensions ?? []).filter(e => e.trim() !== '').map(normalizeExtension)),
    includeGlobs: [...(input.includeGlobs ?? [])],
    excludeGlobs: [...(input.excludeGlobs ?? [])],
  };
}

function globMatcher(globs: readonly string[]): PathMatcher {
  if (globs.length === 0) return () => false;
  return picomatch([...globs], { dot: true });
}

// Included when the extension matches or any include glob matches; any exclude glob then wins.
export function createInclusionMatcher(rule: InclusionRule): PathMatcher {
  const included = globMatcher(rule.includeGlobs);
  const excluded = globMatcher(rule.excludeGlobs);
  return (relativePath: string): boolean => {
    const posixPath = relativePath.split(path.sep).join('/');
    const ext = path.posix.extname(posixPath).toLowerCase();
    const candidate = (ext !== '' && rule.extensions.has(ext)) || included(posixPath);
    return candidate && !excluded(posixPath);
  };
}
