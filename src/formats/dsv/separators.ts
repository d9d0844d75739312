/**
 * Row separator resolution
 *
 * A literal separator is used as given. `"auto"` reads ahead from the
 * source until a line ending turns up, then rewinds, so discovery never
 * consumes data.
 */

import type { TextSource } from "../../io/text-source";
import {
  AUTO_ROW_SEP,
  DEFAULT_ROW_SEP,
  LINE_ENDING_PATTERN,
  ROW_SEP_DISCOVERY_CHUNK,
} from "./constants";
import type { RowSeparator } from "./types";

/**
 * Find the first line ending in `sample`
 *
 * The earliest position wins even when it sits inside what will later be
 * parsed as a quoted field; line endings are assumed uniform.
 *
 * @returns the matched sequence, or `null` when the sample has none
 */
export function findLineEnding(sample: string): string | null {
  const match = LINE_ENDING_PATTERN.exec(sample);
  return match ? match[0] : null;
}

/**
 * Resolve the requested row separator against a source
 *
 * @param requested - Literal separator or `"auto"`
 * @param source - Source positioned where reading will start
 * @returns The literal separator to split records on
 *
 * @example
 * ```typescript
 * resolveRowSeparator("auto", new StringStream("a,b\r\nc,d\r\n")); // "\r\n"
 * ```
 */
export function resolveRowSeparator(requested: RowSeparator, source: TextSource): string {
  if (requested !== AUTO_ROW_SEP) {
    return requested;
  }

  const savedPosition = source.tell();
  try {
    while (!source.eof()) {
      let sample = source.read(ROW_SEP_DISCOVERY_CHUNK);
      // keep a "\r\n" pair from straddling two chunks
      if (sample.endsWith("\r") && !source.eof()) {
        sample += source.read(1);
      }

      const found = findLineEnding(sample);
      if (found !== null) {
        return found;
      }
    }
    return DEFAULT_ROW_SEP;
  } finally {
    source.seek(savedPosition);
  }
}
