import type { QueryInput } from '../models';

/**
 * Line Normalizer - turns caller-supplied text into ordered base fragments
 *
 * Rules:
 * - `\r\n`, `\r` and `\n` all end a line
 * - each line is trimmed; blank lines are dropped
 * - order is kept and duplicates are not removed
 */
export class LineNormalizer {
  private static readonly LINE_BREAK_REGEX = /\r\n|\r|\n/;

  /**
   * Split one blob or several blobs into trimmed, non-empty fragments
   * @param input - Text blob, or blobs taken in the order supplied
   * @returns Base fragments in scan order
   */
  public normalize(input: QueryInput): string[] {
    const blobs = typeof input === 'string' ? [input] : input;
    const fragments: string[] = [];

    for (const blob of blobs) {
      if (blob === null || blob === undefined) {
        continue;
      }
      for (const line of this.splitLines(blob)) {
        const trimmed = line.trim();
        if (trimmed) {
          fragments.push(trimmed);
        }
      }
    }

    return fragments;
  }

  /**
   * Split a blob on any line terminator without trimming
   */
  public splitLines(blob: string): string[] {
    return blob.split(LineNormalizer.LINE_BREAK_REGEX);
  }
}
