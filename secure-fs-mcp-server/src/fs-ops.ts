import fs from 'fs';
import path from 'path';
import { ConfirmationManager } from './confirmations.js';
import { FsToolError, fromNodeError } from './errors.js';
import { Logger, silentLogger } from './logger.js';
import { PathGuard } from './path-guard.js';
import { applyEdits, createUnifiedDiff } from './text-edit.js';
import {
  ConfirmationRequiredResult,
  ContentSearchReport,
  DiffResult,
  DirectoryEntry,
  EditOperation,
  PathMetadata,
  SearchOutcome,
  SuccessResult,
  TreeNode,
} from './types.js';
import { DEFAULT_MAX_TREE_DEPTH, buildTree, listDirectory, searchContent, searchFiles } from './walker.js';

export interface FsOpsOptions {
  guard: PathGuard;
  confirmations: ConfirmationManager;
  logger?: Logger;
  maxTreeDepth?: number;
}

function toUtc(ms: number): string {
  return new Date(ms).toISOString();
}

export class FsOps {
  readonly guard: PathGuard;
  private confirmations: ConfirmationManager;
  private logger: Logger;
  private maxTreeDepth: number;

  constructor(options: FsOpsOptions) {
    this.guard = options.guard;
    this.confirmations = options.confirmations;
    this.logger = options.logger ?? silentLogger;
    this.maxTreeDepth = options.maxTreeDepth ?? DEFAULT_MAX_TREE_DEPTH;
  }

  readFile(requestedPath: string): { content: string } {
    const target = this.guard.normalize(requestedPath);
    try {
      return { content: fs.readFileSync(target, 'utf8') };
    } catch (err) {
      throw fromNodeError(err, 'read file', requestedPath);
    }
  }

  writeFile(requestedPath: string, content: string): SuccessResult {
    const target = this.guard.normalize(requestedPath);
    try {
      fs.writeFileSync(target, content, 'utf8');
    } catch (err) {
      throw fromNodeError(err, 'write to', requestedPath);
    }
    return { message: `Successfully wrote to ${requestedPath}` };
  }

  /**
   * All edits are applied in memory first; the file is written only when every
   * edit matched and this is not a dry run.
   */
  editFile(requestedPath: string, edits: EditOperation[], dryRun = false): SuccessResult | DiffResult {
    const target = this.guard.normalize(requestedPath);
    let original: string;
    try {
      original = fs.readFileSync(target, 'utf8');
    } catch (err) {
      throw fromNodeError(err, 'read file for editing', requestedPath);
    }
    const modified = applyEdits(original, edits);
    if (dryRun) {
      return { diff: createUnifiedDiff(requestedPath, original, modified) };
    }
    try {
      fs.writeFileSync(target, modified, 'utf8');
    } catch (err) {
      throw fromNodeError(err, 'write edited file', requestedPath);
    }
    return { message: `Successfully edited file ${requestedPath}` };
  }

  createDirectory(requestedPath: string): SuccessResult {
    const target = this.guard.normalize(requestedPath);
    try {
      fs.mkdirSync(target, { recursive: true });
    } catch (err) {
      throw fromNodeError(err, 'create directory', requestedPath);
    }
    return { message: `Successfully created directory ${requestedPath}` };
  }

  listDirectory(requestedPath: string): DirectoryEntry[] {
    return listDirectory(this.guard.normalize(requestedPath));
  }

  directoryTree(requestedPath: string): TreeNode[] {
    return buildTree(this.guard.normalize(requestedPath), {
      maxDepth: this.maxTreeDepth,
      isAllowed: (candidate) => this.guard.isAllowed(candidate),
    });
  }

  searchFiles(requestedPath: string, pattern: string, excludePatterns: string[] = []): SearchOutcome<string> {
    const base = this.guard.normalize(requestedPath);
    return searchFiles(base, pattern, excludePatterns, (candidate) => this.guard.isAllowed(candidate));
  }

  searchContent(requestedPath: string, query: string, recursive = true, filePattern = '*'): ContentSearchReport {
    const base = this.guard.normalize(requestedPath);
    return searchContent(base, query, {
      recursive,
      filePattern,
      logger: this.logger,
      isAllowed: (candidate) => this.guard.isAllowed(candidate),
    });
  }

  /**
   * Without a token this only issues one; with a token it validates and
   * consumes it, then deletes. The token is gone before the deletion starts,
   * so it cannot be redeemed twice.
   */
  deletePath(
    requestedPath: string,
    recursive = false,
    confirmationToken?: string
  ): SuccessResult | ConfirmationRequiredResult {
    const target = this.guard.normalize(requestedPath);

    if (!confirmationToken) {
      if (!fs.existsSync(target)) {
        throw new FsToolError('NotFound', `Path not found: ${requestedPath}`);
      }
      const pending = this.confirmations.request(target, recursive);
      return {
        status: 'confirmation_required',
        message: `Confirm deletion of ${requestedPath} with token ${pending.token}`,
        confirmation_token: pending.token,
        expires_at: pending.expiresAt,
      };
    }

    this.confirmations.consume(confirmationToken, target, recursive);

    let stat: fs.Stats;
    try {
      stat = fs.lstatSync(target);
    } catch (err) {
      throw fromNodeError(err, 'delete', requestedPath);
    }
    try {
      if (stat.isFile() || stat.isSymbolicLink()) {
        fs.unlinkSync(target);
        return { message: `Successfully deleted file: ${requestedPath}` };
      }
      if (!stat.isDirectory()) {
        throw new FsToolError('InvalidArgument', `Path is not a file or directory: ${requestedPath}`);
      }
      if (recursive) {
        fs.rmSync(target, { recursive: true });
        return { message: `Successfully deleted directory recursively: ${requestedPath}` };
      }
      fs.rmdirSync(target);
      return { message: `Successfully deleted empty directory: ${requestedPath}` };
    } catch (err) {
      throw fromNodeError(err, 'delete', requestedPath);
    }
  }

  /**
   * Moving onto an existing directory places the source inside it; any other
   * existing destination is replaced.
   */
  movePath(sourcePath: string, destinationPath: string): SuccessResult {
    const source = this.guard.normalize(sourcePath);
    let destination = this.guard.normalize(destinationPath);
    if (!fs.existsSync(source)) {
      throw new FsToolError('NotFound', `Source path not found: ${sourcePath}`);
    }
    const label = `'${sourcePath}' to '${destinationPath}'`;
    try {
      if (fs.existsSync(destination) && fs.statSync(destination).isDirectory()) {
        destination = path.join(destination, path.basename(source));
      }
      try {
        fs.renameSync(source, destination);
      } catch (err) {
        if (!(err instanceof Error && 'code' in err && err.code === 'EXDEV')) throw err;
        fs.cpSync(source, destination, { recursive: true });
        fs.rmSync(source, { recursive: true, force: true });
      }
    } catch (err) {
      throw fromNodeError(err, 'move', label);
    }
    return { message: `Successfully moved ${label}` };
  }

  getMetadata(requestedPath: string): PathMetadata {
    const target = this.guard.normalize(requestedPath);
    let stat: fs.Stats;
    try {
      stat = fs.statSync(target);
    } catch (err) {
      throw fromNodeError(err, 'get metadata for', requestedPath);
    }
    const type = stat.isFile() ? 'file' : stat.isDirectory() ? 'directory' : 'other';
    // birthtimeMs is 0 where the platform does not record creation time.
    const created = stat.birthtimeMs > 0 ? stat.birthtimeMs : stat.ctimeMs;
    return {
      path: target,
      type,
      size_bytes: stat.size,
      modification_time_utc: toUtc(stat.mtimeMs),
      creation_time_utc: toUtc(created),
      last_metadata_change_time_utc: toUtc(stat.ctimeMs),
    };
  }

  listAllowedDirectories(): { allowed_directories: string[] } {
    return { allowed_directories: [...this.guard.roots] };
  }
}
