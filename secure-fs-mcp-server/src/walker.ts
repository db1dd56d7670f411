import fs from 'fs';
import path from 'path';
import { minimatch } from 'minimatch';
import { FsToolError, fromNodeError } from './errors.js';
import { Logger, silentLogger } from './logger.js';
import {
  ContentMatch,
  ContentSearchReport,
  DirectoryEntry,
  EntryType,
  SearchOutcome,
  SkippedFile,
  TreeNode,
} from './types.js';
import { isBinaryBuffer } from './utils.js';

export const DEFAULT_MAX_TREE_DEPTH = 64;

function requireDirectory(dirPath: string) {
  let stat: fs.Stats;
  try {
    stat = fs.statSync(dirPath);
  } catch (err) {
    throw fromNodeError(err, 'read directory', dirPath);
  }
  if (!stat.isDirectory()) {
    throw new FsToolError('InvalidArgument', 'Provided path is not a directory', { path: dirPath });
  }
}

function readEntries(dirPath: string): fs.Dirent[] {
  try {
    return fs.readdirSync(dirPath, { withFileTypes: true });
  } catch (err) {
    throw fromNodeError(err, 'read directory', dirPath);
  }
}

// Symlinks are classified by what they point at; dangling ones count as files.
function entryType(dirPath: string, entry: fs.Dirent): EntryType {
  if (entry.isDirectory()) return 'directory';
  if (!entry.isSymbolicLink()) return 'file';
  try {
    return fs.statSync(path.join(dirPath, entry.name)).isDirectory() ? 'directory' : 'file';
  } catch {
    return 'file';
  }
}

function toOutcome<T>(matches: T[]): SearchOutcome<T> {
  return matches.length > 0 ? { status: 'matches', matches } : { status: 'no_matches', matches: [] };
}

export function listDirectory(dirPath: string): DirectoryEntry[] {
  requireDirectory(dirPath);
  return readEntries(dirPath).map((entry) => ({
    name: entry.name,
    type: entryType(dirPath, entry),
  }));
}

export interface TreeOptions {
  maxDepth?: number;
  isAllowed?: (candidate: string) => boolean;
}

const allowAll = () => true;

/**
 * Nested listing of `dirPath`. A directory already visited (by real path),
 * lying below `maxDepth`, or resolving outside `isAllowed` is returned with
 * empty, truncated children.
 */
export function buildTree(dirPath: string, options: TreeOptions = {}): TreeNode[] {
  requireDirectory(dirPath);
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_TREE_DEPTH;
  const isAllowed = options.isAllowed ?? allowAll;
  const visited = new Set<string>([fs.realpathSync(dirPath)]);

  const walk = (current: string, depth: number): TreeNode[] =>
    readEntries(current).map((entry) => {
      const type = entryType(current, entry);
      const node: TreeNode = { name: entry.name, type };
      if (type !== 'directory') return node;
      const childPath = path.join(current, entry.name);
      const real = fs.realpathSync(childPath);
      if (depth >= maxDepth || visited.has(real) || !isAllowed(real)) {
        node.children = [];
        node.truncated = true;
        return node;
      }
      visited.add(real);
      node.children = walk(childPath, depth + 1);
      return node;
    });

  return walk(dirPath, 1);
}

/**
 * Right-anchored glob match over path segments: a pattern with N segments is
 * tested against the last N segments of `target`; an absolute pattern must
 * match the whole path.
 */
export function matchesTrailingSegments(target: string, pattern: string): boolean {
  const patternParts = pattern.split(/[\\/]+/).filter(Boolean);
  if (patternParts.length === 0) return false;
  const targetParts = target.split(/[\\/]+/).filter(Boolean);
  if (patternParts.length > targetParts.length) return false;
  if (path.isAbsolute(pattern) && patternParts.length !== targetParts.length) return false;
  const tail = targetParts.slice(targetParts.length - patternParts.length);
  return tail.every((part, i) => minimatch(part, patternParts[i], { dot: true }));
}

export function searchFiles(
  basePath: string,
  pattern: string,
  excludePatterns: string[],
  isAllowed: (candidate: string) => boolean
): SearchOutcome<string> {
  requireDirectory(basePath);
  const needle = pattern.toLowerCase();
  const results: string[] = [];

  const visit = (dir: string) => {
    if (excludePatterns.some((exclude) => matchesTrailingSegments(dir, exclude))) return;
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(dir, { withFileTypes: true });
    } catch {
      // Unreadable subdirectories are left out of the walk.
      return;
    }
    const subdirs: string[] = [];
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.name.toLowerCase().includes(needle) && isAllowed(fullPath)) {
        results.push(fullPath);
      }
      if (entry.isDirectory()) subdirs.push(fullPath);
    }
    subdirs.forEach(visit);
  };

  visit(basePath);
  return toOutcome(results);
}

export interface ContentSearchOptions {
  recursive?: boolean;
  filePattern?: string;
  logger?: Logger;
  isAllowed?: (candidate: string) => boolean;
}

const OUTSIDE_REASON = 'link target outside allowed directories';

function toPosix(value: string): string {
  return value.split(path.sep).join('/');
}

interface CollectedFiles {
  files: string[];
  outside: string[];
}

function collectFiles(
  basePath: string,
  pattern: string,
  recursive: boolean,
  isAllowed: (candidate: string) => boolean
): CollectedFiles {
  const usesPath = pattern.includes('/');
  const files: string[] = [];
  const outside: string[] = [];
  const visit = (dir: string) => {
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(dir, { withFileTypes: true });
    } catch {
      return;
    }
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (recursive) visit(fullPath);
        continue;
      }
      const subject = usesPath ? toPosix(path.relative(basePath, fullPath)) : entry.name;
      if (!minimatch(subject, pattern, { dot: true })) continue;
      if (entry.isFile()) {
        files.push(fullPath);
      } else if (entry.isSymbolicLink()) {
        let real: string;
        try {
          real = fs.realpathSync(fullPath);
          if (!fs.statSync(real).isFile()) continue;
        } catch {
          continue;
        }
        if (isAllowed(real)) {
          files.push(fullPath);
        } else {
          outside.push(fullPath);
        }
      }
    }
  };
  visit(basePath);
  return { files, outside };
}

/**
 * Case-insensitive line search over files under `basePath` whose name (or
 * relative path, when the pattern contains `/`) matches `filePattern`.
 * Unreadable files, binary files and symlinks resolving outside `isAllowed`
 * are reported in `skipped` and do not stop the search.
 */
export function searchContent(
  basePath: string,
  query: string,
  options: ContentSearchOptions = {}
): ContentSearchReport {
  requireDirectory(basePath);
  const logger = options.logger ?? silentLogger;
  const needle = query.toLowerCase();
  const matches: ContentMatch[] = [];
  const skipped: SkippedFile[] = [];

  const { files, outside } = collectFiles(
    basePath,
    options.filePattern || '*',
    options.recursive ?? true,
    options.isAllowed ?? allowAll
  );
  for (const filePath of outside) {
    logger.warn(`Skipping ${filePath}: ${OUTSIDE_REASON}`);
    skipped.push({ file_path: filePath, reason: OUTSIDE_REASON });
  }

  for (const filePath of files) {
    let buffer: Buffer;
    try {
      buffer = fs.readFileSync(filePath);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      logger.warn(`Could not read or search file ${filePath}: ${reason}`);
      skipped.push({ file_path: filePath, reason });
      continue;
    }
    if (isBinaryBuffer(buffer)) {
      logger.warn(`Skipping binary file ${filePath}`);
      skipped.push({ file_path: filePath, reason: 'binary content' });
      continue;
    }
    const lines = buffer.toString('utf8').split(/\r\n|\r|\n/);
    // A trailing line break does not start another line.
    if (lines[lines.length - 1] === '') lines.pop();
    lines.forEach((line, index) => {
      if (line.toLowerCase().includes(needle)) {
        matches.push({ file_path: filePath, line_number: index + 1, line_content: line.trim() });
      }
    });
  }

  return { ...toOutcome(matches), skipped };
}
