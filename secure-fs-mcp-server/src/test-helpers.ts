import fs from 'fs';
import os from 'os';
import path from 'path';
import { FsToolError } from './errors.js';

export function makeTempDir(prefix = 'secure-fs-'): string {
  return fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), prefix)));
}

export function removeDir(dir: string) {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function captureFsError(fn: () => unknown): FsToolError {
  try {
    fn();
  } catch (err) {
    if (err instanceof FsToolError) return err;
    throw err;
  }
  throw new Error('Expected an FsToolError to be thrown');
}
