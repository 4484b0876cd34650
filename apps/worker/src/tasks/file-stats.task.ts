import { decodeText, success } from '@pkg/jobs';
import type { TaskOutcome } from '@pkg/jobs';

/**
 * Line separators and characters (code points, not UTF-16 units) of a UTF-8
 * file. Invalid UTF-8 throws DecodeError.
 */
export function fileStats(input: Buffer): TaskOutcome {
  const text = decodeText(input);

  let lines = 0;
  let characters = 0;
  for (const char of text) {
    characters++;
    if (char === '\n') {
      lines++;
    }
  }

  return success({ lines, characters });
}
