#!/usr/bin/env node
import path from 'path';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { ConfirmationStore, MemoryConfirmationStore, SqliteConfirmationStore } from './confirmation-store.js';
import { ConfirmationManager, DEFAULT_TOKEN_TTL_SECONDS } from './confirmations.js';
import { FsOps } from './fs-ops.js';
import { createLogger } from './logger.js';
import { PathGuard } from './path-guard.js';
import { createSecureFsServer } from './server.js';
import {
  clampNumber,
  ensureDir,
  normalizeId,
  normalizeName,
  parseArgs,
  parseCsv,
  resolveStateDir,
} from './utils.js';
import { DEFAULT_MAX_TREE_DEPTH } from './walker.js';

const args = parseArgs(process.argv.slice(2));
if (args.help || args.h) {
  printHelp();
  process.exit(0);
}

const serverName = normalizeName(String(args.name || 'secure_fs'));
const logger = createLogger(serverName);

const rootArgs = parseCsv(args.root);
const allowedDirs = rootArgs.length > 0
  ? rootArgs
  : parseCsv(process.env.SECURE_FS_ALLOWED_DIRS).length > 0
    ? parseCsv(process.env.SECURE_FS_ALLOWED_DIRS)
    : args._;

let guard: PathGuard;
try {
  guard = new PathGuard(allowedDirs);
} catch (err) {
  logger.error(err instanceof Error ? err.message : String(err));
  printHelp();
  process.exit(1);
}

const ttlSeconds = clampNumber(args['token-ttl-seconds'], 5, 3600, DEFAULT_TOKEN_TTL_SECONDS);
const maxTreeDepth = clampNumber(args['max-tree-depth'], 1, 256, DEFAULT_MAX_TREE_DEPTH);
const backend = normalizeId(args.confirmations) === 'memory' ? 'memory' : 'sqlite';

function openStore(): { store: ConfirmationStore; location: string } {
  if (backend === 'memory') {
    return { store: new MemoryConfirmationStore(), location: 'memory' };
  }
  const stateDir = resolveStateDir(serverName);
  ensureDir(stateDir);
  const dbPath =
    normalizeId(args.db) ||
    normalizeId(process.env.SECURE_FS_CONFIRMATIONS_DB) ||
    path.join(stateDir, `${serverName}.db.sqlite`);
  ensureDir(path.dirname(dbPath));
  return { store: new SqliteConfirmationStore(dbPath), location: dbPath };
}

const { store, location } = openStore();
const confirmations = new ConfirmationManager({ store, ttlSeconds });
const fsOps = new FsOps({ guard, confirmations, logger, maxTreeDepth });
const server = createSecureFsServer({ serverName, fsOps, logger });

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info(
    `Secure filesystem MCP server ready (roots=${guard.roots.join(', ')}, confirmations=${location}, ttl=${ttlSeconds}s).`
  );
}

main().catch((err) => {
  logger.error('Server crashed:', err);
  store.close();
  process.exit(1);
});

function printHelp() {
  console.log(`Usage: secure-fs-mcp-server [--root <path>]... [options] [allowed-dir...]

Options:
  --root <path>               Allowed directory (repeatable or comma separated)
                              Falls back to SECURE_FS_ALLOWED_DIRS, then positional args
  --name <id>                 MCP server name (default secure_fs)
  --confirmations <kind>      Confirmation store: sqlite (default) or memory
  --db <path>                 SQLite path for pending confirmations
  --token-ttl-seconds <n>     Confirmation token lifetime (default ${DEFAULT_TOKEN_TTL_SECONDS})
  --max-tree-depth <n>        Depth limit for directory_tree (default ${DEFAULT_MAX_TREE_DEPTH})
  --help                      Show help`);
}
