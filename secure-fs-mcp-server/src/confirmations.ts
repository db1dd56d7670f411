import crypto from 'crypto';
import { ConfirmationStore } from './confirmation-store.js';
import { FsToolError } from './errors.js';
import { PendingConfirmation } from './types.js';

export const DEFAULT_TOKEN_TTL_SECONDS = 60;
const TOKEN_LENGTH = 5;
const MAX_TOKEN_ATTEMPTS = 100;

export interface ConfirmationManagerOptions {
  store: ConfirmationStore;
  ttlSeconds?: number;
  now?: () => Date;
  generateToken?: () => string;
}

type ConsumeOutcome = { ok: true; record: PendingConfirmation } | { ok: false; error: FsToolError };

export function randomToken(): string {
  return crypto.randomBytes(Math.ceil(TOKEN_LENGTH / 2)).toString('hex').slice(0, TOKEN_LENGTH);
}

/**
 * Two-phase confirmation for destructive operations. `request` issues a
 * single-use token bound to (path, recursive); `consume` redeems it.
 *
 * Expired entries stay in the store for one more TTL so a late confirmation
 * still reports TokenExpired instead of InvalidToken.
 */
export class ConfirmationManager {
  readonly ttlSeconds: number;
  private store: ConfirmationStore;
  private now: () => Date;
  private generateToken: () => string;

  constructor(options: ConfirmationManagerOptions) {
    this.store = options.store;
    this.ttlSeconds = options.ttlSeconds ?? DEFAULT_TOKEN_TTL_SECONDS;
    this.now = options.now ?? (() => new Date());
    this.generateToken = options.generateToken ?? randomToken;
  }

  request(path: string, recursive: boolean): PendingConfirmation {
    return this.store.transaction(() => {
      const now = this.now();
      this.purge(now);
      const token = this.uniqueToken();
      const record: PendingConfirmation = {
        token,
        path,
        recursive,
        expiresAt: new Date(now.getTime() + this.ttlSeconds * 1000).toISOString(),
      };
      this.store.put(record);
      return record;
    });
  }

  consume(token: string, path: string, recursive: boolean): PendingConfirmation {
    // Failures are returned out of the transaction rather than thrown inside
    // it, so the removal of an expired token is committed, not rolled back.
    const outcome = this.store.transaction((): ConsumeOutcome => {
      const record = this.store.get(token);
      if (!record) {
        return { ok: false, error: new FsToolError('InvalidToken', 'Invalid or expired confirmation token.') };
      }
      if (this.now().getTime() > Date.parse(record.expiresAt)) {
        this.store.delete(token);
        return {
          ok: false,
          error: new FsToolError('TokenExpired', 'Confirmation token has expired.', {
            expired_at: record.expiresAt,
          }),
        };
      }
      if (record.path !== path || record.recursive !== recursive) {
        return {
          ok: false,
          error: new FsToolError(
            'ParameterMismatch',
            'Request parameters (path, recursive) do not match the original request for this token.'
          ),
        };
      }
      this.store.delete(token);
      return { ok: true, record };
    });
    if (!outcome.ok) throw outcome.error;
    return outcome.record;
  }

  listPending(): PendingConfirmation[] {
    return this.store.transaction(() => {
      const now = this.now();
      this.purge(now);
      return this.store.list().filter((entry) => Date.parse(entry.expiresAt) >= now.getTime());
    });
  }

  private purge(now: Date) {
    this.store.purgeExpired(new Date(now.getTime() - this.ttlSeconds * 1000));
  }

  private uniqueToken(): string {
    for (let attempt = 0; attempt < MAX_TOKEN_ATTEMPTS; attempt += 1) {
      const token = this.generateToken();
      if (!this.store.get(token)) return token;
    }
    throw new FsToolError('IOFailure', 'Could not allocate a unique confirmation token.');
  }
}
