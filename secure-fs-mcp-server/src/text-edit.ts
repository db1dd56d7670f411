import { createTwoFilesPatch } from 'diff';
import { FsToolError } from './errors.js';
import { EditOperation } from './types.js';

const PREVIEW_CHARS = 50;

/**
 * Applies edits in order against the progressively edited text. Each edit
 * replaces only the first occurrence of its oldText.
 */
export function applyEdits(original: string, edits: EditOperation[]): string {
  let modified = original;
  for (const edit of edits) {
    const index = modified.indexOf(edit.oldText);
    if (index === -1) {
      throw new FsToolError(
        'EditNotFound',
        `Edit failed: oldText not found in content: '${edit.oldText.slice(0, PREVIEW_CHARS)}...'`,
        { old_text_preview: edit.oldText.slice(0, PREVIEW_CHARS) }
      );
    }
    modified = modified.slice(0, index) + edit.newText + modified.slice(index + edit.oldText.length);
  }
  return modified;
}

/** Empty when the content is unchanged. */
export function createUnifiedDiff(displayPath: string, original: string, modified: string): string {
  if (original === modified) return '';
  return createTwoFilesPatch(`a/${displayPath}`, `b/${displayPath}`, original, modified);
}
