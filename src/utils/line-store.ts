/**
 * Line-oriented rewrites over flat text files.
 *
 * Every set file is persisted through these helpers. A rewrite only touches
 * the disk when the transformed lines differ from what was read, so no-op
 * edits leave modification times alone.
 */

import { readTextFile, writeTextFile } from './fs.js';
import { logger } from './logger.js';

/**
 * Per-line transform: return the replacement line, or null to drop it.
 */
export type LineTransform = (line: string) => string | null;

/**
 * Split file content into physical lines. A final newline terminates the
 * last line rather than starting an empty one.
 */
export function splitLines(content: string): string[] {
  if (content.length === 0) {
    return [];
  }
  const lines = content.split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

export function joinLines(lines: readonly string[]): string {
  return lines.map(line => `${line}\n`).join('');
}

/**
 * Read the raw lines of a file.
 */
export async function readLines(path: string): Promise<string[]> {
  return splitLines(await readTextFile(path));
}

/**
 * Apply `transform` to every line of `path` and write the result back only if
 * it changed. Line order is preserved.
 *
 * @returns true when the file was rewritten
 */
export async function rewriteLines(path: string, transform: LineTransform): Promise<boolean> {
  const original = await readLines(path);
  const rewritten: string[] = [];

  for (const line of original) {
    const next = transform(line);
    if (next !== null) {
      rewritten.push(next);
    }
  }

  const unchanged =
    rewritten.length === original.length &&
    rewritten.every((line, index) => line === original[index]);

  if (unchanged) {
    logger.debug(`No line changes, leaving file untouched: ${path}`);
    return false;
  }

  await writeTextFile(path, joinLines(rewritten));
  return true;
}
