import fs from 'fs';
import os from 'os';
import path from 'path';

export type ParsedArgs = { _: string[] } & Record<string, string | boolean | string[] | undefined>;

export function parseArgs(argv: string[]): ParsedArgs {
  const args = Array.isArray(argv) ? argv : [];
  const result: ParsedArgs = { _: [] };
  const assign = (name: string, value: string | boolean) => {
    const current = result[name];
    if (typeof value === 'string' && typeof current === 'string') {
      result[name] = [current, value];
    } else if (typeof value === 'string' && Array.isArray(current)) {
      result[name] = [...current, value];
    } else {
      result[name] = value;
    }
  };
  for (let i = 0; i < args.length; i += 1) {
    const token = args[i];
    if (!token.startsWith('-')) {
      result._.push(token);
      continue;
    }
    const isLong = token.startsWith('--');
    const key = isLong ? token.slice(2) : token.slice(1);
    if (!key) continue;
    const eq = key.indexOf('=');
    if (eq !== -1) {
      assign(key.slice(0, eq), key.slice(eq + 1));
      continue;
    }
    const next = args[i + 1];
    if (next && !next.startsWith('-')) {
      assign(key, next);
      i += 1;
    } else {
      assign(key, true);
    }
  }
  return result;
}

export function ensureDir(dirPath: string) {
  if (!dirPath) return;
  fs.mkdirSync(dirPath, { recursive: true });
}

export function normalizeId(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}

export function normalizeName(value: string): string {
  return String(value || '')
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9_-]+/g, '_')
    .replace(/^_+|_+$/g, '') || 'secure_fs';
}

export function parseCsv(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.flatMap((item) => parseCsv(item));
  }
  if (typeof value !== 'string') return [];
  return value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

export function clampNumber(value: unknown, min: number, max: number, fallback: number): number {
  const num = typeof value === 'number' ? value : Number(value);
  if (value === undefined || value === '' || !Number.isFinite(num)) return fallback;
  return Math.min(Math.max(num, min), max);
}

export function getHomeDir(): string {
  const home = process.env.HOME || process.env.USERPROFILE || os.homedir();
  return typeof home === 'string' && home.trim() ? home.trim() : os.homedir();
}

export function expandHome(input: string): string {
  if (input === '~') return getHomeDir();
  if (input.startsWith('~/') || input.startsWith(`~${path.sep}`)) {
    return path.join(getHomeDir(), input.slice(2));
  }
  return input;
}

export function resolveStateDir(serverName: string): string {
  const base = process.env.MCP_STATE_ROOT && process.env.MCP_STATE_ROOT.trim()
    ? process.env.MCP_STATE_ROOT.trim()
    : path.join(getHomeDir(), '.mcp-servers');
  return path.join(base, normalizeName(serverName));
}

export function isBinaryBuffer(buffer: Buffer): boolean {
  const len = Math.min(buffer.length, 8000);
  for (let i = 0; i < len; i += 1) {
    if (buffer[i] === 0) return true;
  }
  return false;
}
