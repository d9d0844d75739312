/**
 * DSV State Machine Module
 *
 * Splits a buffered record into fields with an explicit state machine and
 * assembles logical records from physical lines. Quoted fields may hold
 * separators and raw line breaks; unquoted fields may not hold quotes or
 * line breaks, and such input is rejected as soon as the line holding it
 * has been read.
 */

import { DSVParseError } from "../../errors";
import type { TextSource } from "../../io/text-source";
import { QUOTE } from "./constants";
import { CSVParseState, type FieldScan, type RawField } from "./types";

/**
 * Remove exactly one trailing row separator, if present
 */
export function stripRowSeparator(line: string, rowSep: string): string {
  return line.endsWith(rowSep) ? line.slice(0, line.length - rowSep.length) : line;
}

/**
 * Scan a buffered record into fields
 *
 * Empty unquoted fields come back as `null`; `""` comes back as an empty
 * string. A quoted field left open at the end of `text` makes the scan
 * incomplete, since more lines may close it.
 *
 * @param text - Record text with the row separator already stripped
 * @param colSep - Column separator
 * @param line - Record number used in error reports
 * @throws {DSVParseError} On a quote or line break inside an unquoted field,
 *   or on anything but a separator after a closing quote
 *
 * @example
 * ```typescript
 * scanFields('a,"b ""c""",', ",");
 * // { complete: true, fields: ["a", 'b "c"', null] }
 * scanFields('a,"open', ",");
 * // { complete: false }
 * ```
 */
export function scanFields(text: string, colSep: string, line?: number): FieldScan {
  const fields: RawField[] = [];
  let state = CSVParseState.FIELD_START;
  let quoted = "";
  let unquotedStart = 0;
  let i = 0;

  while (i < text.length) {
    switch (state) {
      case CSVParseState.FIELD_START:
        if (text.startsWith(colSep, i)) {
          fields.push(null);
          i += colSep.length;
        } else if (text[i] === QUOTE) {
          quoted = "";
          state = CSVParseState.QUOTED_FIELD;
          i++;
        } else {
          unquotedStart = i;
          state = CSVParseState.UNQUOTED_FIELD;
        }
        break;

      case CSVParseState.UNQUOTED_FIELD: {
        const char = text[i];
        if (text.startsWith(colSep, i)) {
          fields.push(text.slice(unquotedStart, i));
          state = CSVParseState.FIELD_START;
          i += colSep.length;
        } else if (char === QUOTE) {
          throw new DSVParseError("Illegal quoting in unquoted field", line, i + 1);
        } else if (char === "\r" || char === "\n") {
          throw new DSVParseError("Unquoted fields do not allow \\r or \\n", line, i + 1);
        } else {
          i++;
        }
        break;
      }

      case CSVParseState.QUOTED_FIELD: {
        const close = text.indexOf(QUOTE, i);
        if (close === -1) {
          return { complete: false };
        }
        quoted += text.slice(i, close);
        state = CSVParseState.QUOTE_IN_QUOTED;
        i = close + 1;
        break;
      }

      case CSVParseState.QUOTE_IN_QUOTED:
        if (text[i] === QUOTE) {
          // doubled quote
          quoted += QUOTE;
          state = CSVParseState.QUOTED_FIELD;
          i++;
        } else if (text.startsWith(colSep, i)) {
          fields.push(quoted);
          state = CSVParseState.FIELD_START;
          i += colSep.length;
        } else {
          throw new DSVParseError("Unexpected character after closing quote", line, i + 1);
        }
        break;
    }
  }

  switch (state) {
    case CSVParseState.FIELD_START:
      // nothing after the last separator
      fields.push(null);
      break;
    case CSVParseState.UNQUOTED_FIELD:
      fields.push(text.slice(unquotedStart));
      break;
    case CSVParseState.QUOTE_IN_QUOTED:
      fields.push(quoted);
      break;
    case CSVParseState.QUOTED_FIELD:
      return { complete: false };
  }

  return { complete: true, fields };
}

/**
 * Pulls logical records out of a text source
 *
 * Each call to {@link next} reads physical lines until the accumulated
 * buffer scans completely. The whole buffer is rescanned after every added
 * line because quoted fields may embed the row separator.
 */
export class RecordTokenizer {
  private recordCount = 0;

  constructor(
    private readonly source: TextSource,
    private readonly colSep: string,
    private readonly rowSep: string
  ) {}

  /**
   * Number of logical records returned so far, blank records included
   */
  get lineNumber(): number {
    return this.recordCount;
  }

  /**
   * Read one logical record
   * @returns the raw fields, `[]` for a blank line, or `null` at end of data
   * @throws {DSVParseError} On malformed input
   */
  next(): RawField[] | null {
    const line = this.recordCount + 1;
    let buffer = "";

    while (true) {
      const physical = this.source.gets(this.rowSep);
      if (physical === null) {
        return null;
      }
      buffer += physical;

      const working = stripRowSeparator(buffer, this.rowSep);
      if (working === "") {
        this.recordCount++;
        return [];
      }

      const scan = scanFields(working, this.colSep, line);
      if (scan.complete) {
        this.recordCount++;
        return scan.fields;
      }

      if (this.source.eof()) {
        throw new DSVParseError("Unclosed quoted field", line);
      }
    }
  }

  /**
   * Forget how many records were read, for use after rewinding the source
   */
  reset(): void {
    this.recordCount = 0;
  }
}
