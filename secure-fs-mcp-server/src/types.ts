export type EntryType = 'file' | 'directory';

export interface DirectoryEntry {
  name: string;
  type: EntryType;
}

export interface TreeNode extends DirectoryEntry {
  children?: TreeNode[];
  truncated?: boolean;
}

export interface EditOperation {
  oldText: string;
  newText: string;
}

export interface ContentMatch {
  file_path: string;
  line_number: number;
  line_content: string;
}

export type SearchOutcome<T> =
  | { status: 'matches'; matches: T[] }
  | { status: 'no_matches'; matches: T[] };

export interface SkippedFile {
  file_path: string;
  reason: string;
}

export type ContentSearchReport = SearchOutcome<ContentMatch> & { skipped: SkippedFile[] };

export interface PendingConfirmation {
  token: string;
  path: string;
  recursive: boolean;
  expiresAt: string;
}

export interface SuccessResult {
  message: string;
}

export interface DiffResult {
  diff: string;
}

export interface ConfirmationRequiredResult {
  status: 'confirmation_required';
  message: string;
  confirmation_token: string;
  expires_at: string;
}

export interface PathMetadata {
  path: string;
  type: 'file' | 'directory' | 'other';
  size_bytes: number;
  modification_time_utc: string;
  creation_time_utc: string;
  last_metadata_change_time_utc: string;
}
