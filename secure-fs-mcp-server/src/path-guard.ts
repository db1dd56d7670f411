import fs from 'fs';
import path from 'path';
import { accessDenied } from './errors.js';
import { expandHome } from './utils.js';

function stripTrailingSep(value: string): string {
  const { root } = path.parse(value);
  let out = value;
  while (out.length > root.length && out.endsWith(path.sep)) {
    out = out.slice(0, -1);
  }
  return out;
}

/**
 * Resolves symlinks on the longest existing prefix of an absolute path and
 * appends the non-existent remainder as-is, so targets that are about to be
 * created still canonicalise.
 */
export function canonicalize(absolute: string): string {
  const pending: string[] = [];
  let current = absolute;
  for (;;) {
    try {
      const real = fs.realpathSync(current);
      return pending.length > 0 ? path.join(real, ...pending.reverse()) : real;
    } catch (err) {
      const code = err instanceof Error && 'code' in err ? err.code : undefined;
      if (code !== 'ENOENT' && code !== 'ENOTDIR') throw err;
      const parent = path.dirname(current);
      if (parent === current) return absolute;
      pending.push(path.basename(current));
      current = parent;
    }
  }
}

function isWithin(root: string, candidate: string): boolean {
  const r = root.toLowerCase();
  const c = candidate.toLowerCase();
  if (c === r) return true;
  const prefix = r.endsWith(path.sep) ? r : r + path.sep;
  return c.startsWith(prefix);
}

export class PathGuard {
  readonly roots: readonly string[];

  constructor(roots: string[]) {
    const normalized: string[] = [];
    for (const raw of roots) {
      const expanded = expandHome(String(raw || '').trim());
      if (!expanded) continue;
      if (!path.isAbsolute(expanded)) {
        throw new Error(`Allowed directory must be an absolute path: ${raw}`);
      }
      const root = stripTrailingSep(canonicalize(path.resolve(expanded)));
      if (!normalized.includes(root)) normalized.push(root);
    }
    if (normalized.length === 0) {
      throw new Error('At least one allowed directory is required.');
    }
    this.roots = Object.freeze(normalized);
  }

  normalize(requestedPath: string): string {
    const absolute = path.resolve(expandHome(requestedPath));
    const resolved = canonicalize(absolute);
    if (!this.isAllowed(resolved)) {
      throw accessDenied(resolved, this.roots);
    }
    return resolved;
  }

  isAllowed(absolutePath: string): boolean {
    const candidate = path.resolve(absolutePath);
    return this.roots.some((root) => isWithin(root, candidate));
  }
}
