import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { FsToolError, isFsToolError } from './errors.js';
import { FsOps } from './fs-ops.js';
import { Logger, silentLogger } from './logger.js';

export interface ServerOptions {
  serverName: string;
  fsOps: FsOps;
  logger?: Logger;
}

type ToolResult = { content: { type: 'text'; text: string }[]; isError?: boolean };

const NO_MATCHES_MESSAGE = 'No matches found';

export function createSecureFsServer(options: ServerOptions) {
  const { serverName, fsOps } = options;
  const logger = options.logger ?? silentLogger;
  const server = new McpServer({ name: serverName, version: '0.1.1' });
  const rootsNote = `Allowed directories: ${fsOps.guard.roots.join(', ')}. Paths outside them are rejected.`;

  const run = (tool: string, fn: () => object): ToolResult => {
    try {
      return textResult({ ...fn(), server: serverName });
    } catch (err) {
      const error = isFsToolError(err)
        ? err
        : new FsToolError('IOFailure', err instanceof Error ? err.message : String(err));
      if (isFsToolError(err)) {
        logger.warn(`${tool} failed (${error.kind}): ${error.message}`);
      } else {
        logger.error(`${tool} failed unexpectedly:`, err);
      }
      return errorResult(serverName, error);
    }
  };

  server.registerTool(
    'read_file',
    {
      title: 'Read a file',
      description: ['Read the entire contents of a UTF-8 text file.', rootsNote].join('\n'),
      inputSchema: z.object({ path: z.string().min(1).describe('Path to the file to read') }),
    },
    async ({ path }) => run('read_file', () => fsOps.readFile(path))
  );

  server.registerTool(
    'write_file',
    {
      title: 'Write to a file',
      description: 'Write UTF-8 content to a file, creating it or overwriting existing content.',
      inputSchema: z.object({
        path: z.string().min(1).describe('Path to write to. Existing file will be overwritten.'),
        content: z.string().describe('UTF-8 encoded text content to write.'),
      }),
    },
    async ({ path, content }) => run('write_file', () => fsOps.writeFile(path, content))
  );

  server.registerTool(
    'edit_file',
    {
      title: 'Edit a file with diff',
      description: [
        'Apply exact-match text replacements in order; each edit replaces the first occurrence of oldText.',
        'With dryRun=true, return a unified diff and leave the file untouched.',
      ].join('\n'),
      inputSchema: z.object({
        path: z.string().min(1).describe('Path to the file to edit.'),
        edits: z
          .array(
            z.object({
              oldText: z.string().describe('Text to find and replace (exact match required)'),
              newText: z.string().describe('Replacement text'),
            })
          )
          .describe('List of edits to apply.'),
        dryRun: z.boolean().optional().describe('If true, only return diff without modifying file.'),
      }),
    },
    async ({ path, edits, dryRun }) => run('edit_file', () => fsOps.editFile(path, edits, dryRun ?? false))
  );

  server.registerTool(
    'create_directory',
    {
      title: 'Create a directory',
      description: 'Create a directory. Intermediate directories are created automatically.',
      inputSchema: z.object({ path: z.string().min(1).describe('Directory path to create.') }),
    },
    async ({ path }) => run('create_directory', () => fsOps.createDirectory(path))
  );

  server.registerTool(
    'list_directory',
    {
      title: 'List a directory',
      description: 'List the immediate children of a directory with their type (file or directory).',
      inputSchema: z.object({ path: z.string().min(1).describe('Directory path to list contents for.') }),
    },
    async ({ path }) => run('list_directory', () => ({ entries: fsOps.listDirectory(path) }))
  );

  server.registerTool(
    'directory_tree',
    {
      title: 'Recursive directory tree',
      description: 'Return a nested tree of a directory. Revisited or too-deep directories are marked truncated.',
      inputSchema: z.object({ path: z.string().min(1).describe('Directory path for which to return recursive tree.') }),
    },
    async ({ path }) => run('directory_tree', () => ({ tree: fsOps.directoryTree(path) }))
  );

  server.registerTool(
    'search_files',
    {
      title: 'Search for files',
      description: [
        'Find files and directories whose name contains pattern (case-insensitive).',
        'Directories matching an exclude glob are not descended into.',
      ].join('\n'),
      inputSchema: z.object({
        path: z.string().min(1).describe('Base directory to search in.'),
        pattern: z.string().describe('Filename pattern (case-insensitive substring match).'),
        excludePatterns: z.array(z.string()).optional().describe('Glob patterns of directories to exclude.'),
      }),
    },
    async ({ path, pattern, excludePatterns }) =>
      run('search_files', () => {
        const outcome = fsOps.searchFiles(path, pattern, excludePatterns ?? []);
        return outcome.status === 'matches' ? outcome : { ...outcome, message: NO_MATCHES_MESSAGE };
      })
  );

  server.registerTool(
    'search_content',
    {
      title: 'Search for content within files',
      description: 'Case-insensitive text search across files matching file_pattern. Unreadable files are skipped.',
      inputSchema: z.object({
        path: z.string().min(1).describe('Base directory to search within.'),
        search_query: z.string().min(1).describe('Text content to search for (case-insensitive).'),
        recursive: z.boolean().optional().describe('Whether to search recursively in subdirectories.'),
        file_pattern: z.string().optional().describe("Glob pattern to filter files (e.g. '*.py')."),
      }),
    },
    async ({ path, search_query, recursive, file_pattern }) =>
      run('search_content', () => {
        const report = fsOps.searchContent(path, search_query, recursive ?? true, file_pattern || '*');
        return report.status === 'matches' ? report : { ...report, message: NO_MATCHES_MESSAGE };
      })
  );

  server.registerTool(
    'delete_path',
    {
      title: 'Delete a file or directory (two-step confirmation)',
      description: [
        'Step 1: call without confirmation_token to receive a token.',
        'Step 2: call again with the token and the same path and recursive values to delete.',
        'Tokens are single-use and expire. Use recursive=true to delete non-empty directories.',
      ].join('\n'),
      inputSchema: z.object({
        path: z.string().min(1).describe('Path to the file or directory to delete.'),
        recursive: z.boolean().optional().describe('Delete directories recursively. Required if not empty.'),
        confirmation_token: z.string().optional().describe('Token from the initial request.'),
      }),
    },
    async ({ path, recursive, confirmation_token }) =>
      run('delete_path', () => fsOps.deletePath(path, recursive ?? false, confirmation_token))
  );

  server.registerTool(
    'move_path',
    {
      title: 'Move or rename a file or directory',
      description: 'Move or rename source_path to destination_path. Both must be inside allowed directories.',
      inputSchema: z.object({
        source_path: z.string().min(1).describe('The current path of the file or directory.'),
        destination_path: z.string().min(1).describe('The new path for the file or directory.'),
      }),
    },
    async ({ source_path, destination_path }) =>
      run('move_path', () => fsOps.movePath(source_path, destination_path))
  );

  server.registerTool(
    'get_metadata',
    {
      title: 'Get file or directory metadata',
      description: 'Return type, size and UTC timestamps for a path.',
      inputSchema: z.object({ path: z.string().min(1).describe('Path to get metadata for.') }),
    },
    async ({ path }) => run('get_metadata', () => fsOps.getMetadata(path))
  );

  server.registerTool(
    'list_allowed_directories',
    {
      title: 'List access-permitted directories',
      description: 'Show all directories this server can access.',
      inputSchema: z.object({}),
    },
    async () => run('list_allowed_directories', () => fsOps.listAllowedDirectories())
  );

  return server;
}

function textResult(payload: Record<string, unknown>): ToolResult {
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(payload, null, 2) }],
  };
}

function errorResult(serverName: string, error: FsToolError): ToolResult {
  return {
    content: [
      {
        type: 'text' as const,
        text: JSON.stringify(
          { error: { kind: error.kind, message: error.message, ...error.details }, server: serverName },
          null,
          2
        ),
      },
    ],
    isError: true,
  };
}
