export type FsErrorKind =
  | 'AccessDenied'
  | 'NotFound'
  | 'PermissionDenied'
  | 'EditNotFound'
  | 'InvalidToken'
  | 'TokenExpired'
  | 'ParameterMismatch'
  | 'DirectoryNotEmpty'
  | 'InvalidArgument'
  | 'IOFailure';

export class FsToolError extends Error {
  readonly kind: FsErrorKind;
  readonly details: Record<string, unknown>;

  constructor(kind: FsErrorKind, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = 'FsToolError';
    this.kind = kind;
    this.details = details;
  }
}

export function isFsToolError(err: unknown): err is FsToolError {
  return err instanceof FsToolError;
}

export function accessDenied(requestedPath: string, allowedRoots: readonly string[]): FsToolError {
  return new FsToolError('AccessDenied', 'Requested path is outside allowed directories.', {
    requested_path: requestedPath,
    allowed_directories: [...allowedRoots],
  });
}

function errnoCode(err: unknown): string {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return '';
}

/**
 * Maps an fs failure onto the error taxonomy. `action` reads as
 * "Failed to <action> <target>" in the IOFailure message.
 */
export function fromNodeError(err: unknown, action: string, target: string): FsToolError {
  if (isFsToolError(err)) return err;
  const message = err instanceof Error ? err.message : String(err);
  switch (errnoCode(err)) {
    case 'ENOENT':
      return new FsToolError('NotFound', `Path not found: ${target}`);
    case 'EACCES':
    case 'EPERM':
      return new FsToolError('PermissionDenied', `Permission denied to ${action} ${target}`);
    case 'ENOTEMPTY':
    case 'EEXIST':
      if (action === 'delete') {
        return new FsToolError(
          'DirectoryNotEmpty',
          `Directory not empty. Use 'recursive=true' to delete non-empty directories. Original error: ${message}`
        );
      }
      break;
    case 'ENOTDIR':
      return new FsToolError('InvalidArgument', `Not a directory: ${target}`);
    case 'EISDIR':
      return new FsToolError('InvalidArgument', `Path is a directory: ${target}`);
    default:
      break;
  }
  return new FsToolError('IOFailure', `Failed to ${action} ${target}: ${message}`);
}
