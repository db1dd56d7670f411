import fs from 'fs';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Logger } from './logger.js';
import { captureFsError, makeTempDir, removeDir } from './test-helpers.js';
import { ContentMatch, TreeNode } from './types.js';
import { buildTree, listDirectory, matchesTrailingSegments, searchContent, searchFiles } from './walker.js';

const byName = <T extends { name: string }>(a: T, b: T) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0);

function sortTree(nodes: TreeNode[]): TreeNode[] {
  return nodes
    .map((node) => (node.children ? { ...node, children: sortTree(node.children) } : node))
    .sort(byName);
}

function sortMatches(matches: ContentMatch[]): ContentMatch[] {
  return [...matches].sort((a, b) =>
    a.file_path === b.file_path ? a.line_number - b.line_number : a.file_path < b.file_path ? -1 : 1
  );
}

describe('walker', () => {
  let root: string;
  const allowAll = () => true;

  const write = (relative: string, content: string | Buffer) => {
    const target = path.join(root, relative);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, content);
    return target;
  };

  beforeEach(() => {
    root = makeTempDir();
  });

  afterEach(() => {
    removeDir(root);
  });

  describe('listDirectory', () => {
    it('should tag immediate children as files or directories', () => {
      write('a.txt', 'a');
      write('nested/b.txt', 'b');

      expect(listDirectory(root).sort(byName)).toEqual([
        { name: 'a.txt', type: 'file' },
        { name: 'nested', type: 'directory' },
      ]);
    });

    it('should classify symlinks by their target', () => {
      fs.mkdirSync(path.join(root, 'real'));
      fs.symlinkSync(path.join(root, 'real'), path.join(root, 'alias'));
      fs.symlinkSync(path.join(root, 'missing'), path.join(root, 'dangling'));

      expect(listDirectory(root).sort(byName)).toEqual([
        { name: 'alias', type: 'directory' },
        { name: 'dangling', type: 'file' },
        { name: 'real', type: 'directory' },
      ]);
    });

    it('should reject a file path', () => {
      const file = write('a.txt', 'a');
      const error = captureFsError(() => listDirectory(file));

      expect(error.kind).toBe('InvalidArgument');
      expect(error.message).toBe('Provided path is not a directory');
    });

    it('should report a missing directory as not found', () => {
      expect(captureFsError(() => listDirectory(path.join(root, 'nope'))).kind).toBe('NotFound');
    });
  });

  describe('buildTree', () => {
    it('should nest children under directories only', () => {
      write('c.txt', 'c');
      write('a/b.txt', 'b');
      write('a/deeper/d.txt', 'd');

      expect(sortTree(buildTree(root))).toEqual([
        {
          name: 'a',
          type: 'directory',
          children: [
            { name: 'b.txt', type: 'file' },
            { name: 'deeper', type: 'directory', children: [{ name: 'd.txt', type: 'file' }] },
          ],
        },
        { name: 'c.txt', type: 'file' },
      ]);
    });

    it('should not loop through a symlink back to an ancestor', () => {
      write('a/b.txt', 'b');
      fs.symlinkSync(root, path.join(root, 'a', 'loop'));

      expect(sortTree(buildTree(root))).toEqual([
        {
          name: 'a',
          type: 'directory',
          children: [
            { name: 'b.txt', type: 'file' },
            { name: 'loop', type: 'directory', children: [], truncated: true },
          ],
        },
      ]);
    });

    it('should stop descending at the depth limit', () => {
      write('a/b/c.txt', 'c');

      expect(buildTree(root, { maxDepth: 1 })).toEqual([
        { name: 'a', type: 'directory', children: [], truncated: true },
      ]);
      expect(buildTree(root, { maxDepth: 2 })).toEqual([
        { name: 'a', type: 'directory', children: [{ name: 'b', type: 'directory', children: [], truncated: true }] },
      ]);
    });

    it('should not descend through a symlink that resolves outside the allowed area', () => {
      write('data/a.txt', 'a');
      write('outside/secret.txt', 's');
      const data = path.join(root, 'data');
      fs.symlinkSync(path.join(root, 'outside'), path.join(data, 'leakdir'));
      const insideData = (candidate: string) => candidate === data || candidate.startsWith(data + path.sep);

      expect(sortTree(buildTree(data, { isAllowed: insideData }))).toEqual([
        { name: 'a.txt', type: 'file' },
        { name: 'leakdir', type: 'directory', children: [], truncated: true },
      ]);
    });
  });

  describe('matchesTrailingSegments', () => {
    it('should match a bare name against the last segment', () => {
      expect(matchesTrailingSegments('/srv/app/node_modules', 'node_modules')).toBe(true);
      expect(matchesTrailingSegments('/srv/app/node_modules/pkg', 'node_modules')).toBe(false);
    });

    it('should anchor multi-segment patterns on the right', () => {
      expect(matchesTrailingSegments('/srv/app/build/cache', 'build/*')).toBe(true);
      expect(matchesTrailingSegments('/srv/app/build', 'app/build/cache')).toBe(false);
    });

    it('should require absolute patterns to match the whole path', () => {
      expect(matchesTrailingSegments('/srv/app', '/srv/app')).toBe(true);
      expect(matchesTrailingSegments('/x/srv/app', '/srv/app')).toBe(false);
    });

    it('should match dot directories with wildcards', () => {
      expect(matchesTrailingSegments('/srv/app/.git', '*')).toBe(true);
      expect(matchesTrailingSegments('/srv/app/.cache', '.*')).toBe(true);
    });

    it('should ignore empty patterns', () => {
      expect(matchesTrailingSegments('/srv/app', '')).toBe(false);
    });
  });

  describe('searchFiles', () => {
    it('should match names case-insensitively', () => {
      write('report.txt', 'r');
      write('Report2.csv', 'r');
      write('x.txt', 'x');

      const outcome = searchFiles(root, 'report', [], allowAll);
      expect(outcome.status).toBe('matches');
      expect(outcome.matches.sort()).toEqual([path.join(root, 'Report2.csv'), path.join(root, 'report.txt')]);
    });

    it('should include matching directories and recurse into them', () => {
      write('reports/q1.txt', 'q');
      write('misc/old-report.md', 'o');

      expect(searchFiles(root, 'REPORT', [], allowAll).matches.sort()).toEqual([
        path.join(root, 'misc', 'old-report.md'),
        path.join(root, 'reports'),
      ]);
    });

    it('should not descend into excluded directories', () => {
      write('src/report.ts', 's');
      write('node_modules/report-lib/index.js', 'n');
      write('src/node_modules/report.js', 'n');

      expect(searchFiles(root, 'report', ['node_modules'], allowAll).matches).toEqual([
        path.join(root, 'src', 'report.ts'),
      ]);
    });

    it('should drop results that fail the allow-list re-check', () => {
      write('report.txt', 'r');
      expect(searchFiles(root, 'report', [], () => false)).toEqual({ status: 'no_matches', matches: [] });
    });

    it('should return a tagged empty outcome when nothing matches', () => {
      write('a.txt', 'a');
      expect(searchFiles(root, 'zzz', [], allowAll)).toEqual({ status: 'no_matches', matches: [] });
    });
  });

  describe('searchContent', () => {
    let logger: Logger;

    beforeEach(() => {
      logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
      write('report.txt', 'alpha\nQuarterly REPORT here\n');
      write('x.txt', 'nothing to see\n');
      write('sub/notes.md', 'see the report\r\n   indented Report line   \n');
    });

    it('should record 1-based line numbers and trimmed lines', () => {
      const report = searchContent(root, 'report', { logger });

      expect(report.status).toBe('matches');
      expect(sortMatches(report.matches)).toEqual([
        { file_path: path.join(root, 'report.txt'), line_number: 2, line_content: 'Quarterly REPORT here' },
        { file_path: path.join(root, 'sub', 'notes.md'), line_number: 1, line_content: 'see the report' },
        { file_path: path.join(root, 'sub', 'notes.md'), line_number: 2, line_content: 'indented Report line' },
      ]);
      expect(report.skipped).toEqual([]);
    });

    it('should stay at the top level when not recursive', () => {
      const report = searchContent(root, 'report', { recursive: false });

      expect(report.matches).toEqual([
        { file_path: path.join(root, 'report.txt'), line_number: 2, line_content: 'Quarterly REPORT here' },
      ]);
    });

    it('should filter files by name pattern', () => {
      const report = searchContent(root, 'report', { filePattern: '*.md' });
      expect(report.matches.map((match) => match.file_path)).toEqual([
        path.join(root, 'sub', 'notes.md'),
        path.join(root, 'sub', 'notes.md'),
      ]);
    });

    it('should match patterns with a slash against the relative path', () => {
      write('other/notes.md', 'report');
      const report = searchContent(root, 'report', { filePattern: 'sub/*.md' });
      expect(new Set(report.matches.map((match) => match.file_path))).toEqual(
        new Set([path.join(root, 'sub', 'notes.md')])
      );
    });

    it('should skip binary files with a warning and keep searching', () => {
      const binary = write('blob.dat', Buffer.from([0x72, 0x65, 0x70, 0x6f, 0x72, 0x74, 0x00, 0x01]));
      const report = searchContent(root, 'report', { logger });

      expect(report.skipped).toEqual([{ file_path: binary, reason: 'binary content' }]);
      expect(logger.warn).toHaveBeenCalledWith(`Skipping binary file ${binary}`);
      expect(report.matches).toHaveLength(3);
    });

    it('should decode invalid UTF-8 with replacement characters', () => {
      const file = write('latin.txt', Buffer.concat([Buffer.from('caf'), Buffer.from([0xff]), Buffer.from(' report')]));
      const report = searchContent(root, 'report', { filePattern: 'latin.txt' });

      expect(report.matches).toEqual([{ file_path: file, line_number: 1, line_content: 'caf\uFFFD report' }]);
    });

    it('should skip symlinked files whose target is outside the allowed area', () => {
      const privateDir = path.join(root, 'private');
      const secret = write('private/secret.txt', 'report secret');
      const leak = path.join(root, 'leak.txt');
      fs.symlinkSync(secret, leak);

      const report = searchContent(root, 'report', {
        recursive: false,
        logger,
        isAllowed: (candidate) => !candidate.startsWith(privateDir + path.sep),
      });

      expect(report.matches).toEqual([
        { file_path: path.join(root, 'report.txt'), line_number: 2, line_content: 'Quarterly REPORT here' },
      ]);
      expect(report.skipped).toEqual([{ file_path: leak, reason: 'link target outside allowed directories' }]);
      expect(logger.warn).toHaveBeenCalledWith(`Skipping ${leak}: link target outside allowed directories`);
    });

    it('should search symlinked files that stay inside the allowed area', () => {
      const alias = path.join(root, 'alias.txt');
      fs.symlinkSync(path.join(root, 'report.txt'), alias);

      const report = searchContent(root, 'report', { recursive: false, isAllowed: () => true });
      expect(sortMatches(report.matches)).toEqual([
        { file_path: alias, line_number: 2, line_content: 'Quarterly REPORT here' },
        { file_path: path.join(root, 'report.txt'), line_number: 2, line_content: 'Quarterly REPORT here' },
      ]);
    });

    it('should treat a lone carriage return as a line break', () => {
      const file = write('mac.txt', 'first\rsecond report\rthird\r');
      const report = searchContent(root, 'report', { filePattern: 'mac.txt' });

      expect(report.matches).toEqual([{ file_path: file, line_number: 2, line_content: 'second report' }]);
    });

    it('should not count a trailing line break as an extra line', () => {
      write('two.txt', 'a\nb\n');
      const report = searchContent(root, '', { filePattern: 'two.txt' });

      expect(report.matches.map((match) => match.line_number)).toEqual([1, 2]);
    });

    it('should return a tagged empty outcome when nothing matches', () => {
      expect(searchContent(root, 'absent-text')).toEqual({ status: 'no_matches', matches: [], skipped: [] });
    });

    it('should reject a base path that is not a directory', () => {
      const error = captureFsError(() => searchContent(path.join(root, 'x.txt'), 'nothing'));
      expect(error.kind).toBe('InvalidArgument');
    });
  });
});
