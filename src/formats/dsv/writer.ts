/**
 * @module formats/dsv/writer
 * @description DSV (Delimiter-Separated Values) field serialization
 *
 * Renders records with the least quoting the tokenizer needs to read them
 * back unchanged:
 * - `null`/`undefined` → empty, unquoted (an absent field)
 * - empty text → `""` (a present but empty field)
 * - text holding a separator character, a quote, `\r` or `\n` → quoted,
 *   inner quotes doubled
 * - anything else → as is
 */

import { type } from "arktype";
import { ConfigurationError } from "../../errors";
import { AUTO_ROW_SEP, DEFAULT_DELIMITERS, DEFAULT_ROW_SEP, QUOTE } from "./constants";
import type { DSVWriterOptions } from "./types";
import { definedOptions, DSVWriterOptionsSchema } from "./validation";

// =============================================================================
// CLASSES - MAIN WRITER
// =============================================================================

/**
 * DSVWriter - renders fields and rows
 *
 * @example
 * ```typescript
 * const writer = new DSVWriter({ colSep: ",", rowSep: "\n" });
 * writer.formatRow(["a", null, "", 'say "hi"']); // 'a,,"","say ""hi"""\n'
 * ```
 */
export class DSVWriter {
  readonly colSep: string;
  readonly rowSep: string;
  private readonly quoteTriggers: ReadonlySet<string>;

  constructor(options: DSVWriterOptions = {}) {
    const validation = DSVWriterOptionsSchema(definedOptions(options));
    if (validation instanceof type.errors) {
      throw new ConfigurationError(`Invalid DSV writer options: ${validation.summary}`);
    }

    this.colSep = options.colSep ?? DEFAULT_DELIMITERS.csv;
    // a writer has nothing to discover from
    this.rowSep =
      options.rowSep === undefined || options.rowSep === AUTO_ROW_SEP
        ? DEFAULT_ROW_SEP
        : options.rowSep;
    this.quoteTriggers = new Set([...this.colSep, QUOTE, "\r", "\n"]);
  }

  /**
   * Format a single field with proper escaping
   */
  formatField(value: unknown): string {
    if (value === null || value === undefined) return "";

    const field = value instanceof Date ? value.toISOString() : String(value);
    if (!this.needsQuoting(field)) {
      return field;
    }
    return QUOTE + field.replaceAll(QUOTE, QUOTE + QUOTE) + QUOTE;
  }

  /**
   * Format a record as one line, row separator included
   */
  formatRow(fields: readonly unknown[]): string {
    return fields.map((field) => this.formatField(field)).join(this.colSep) + this.rowSep;
  }

  /**
   * Format many records
   */
  formatRecords(records: Iterable<readonly unknown[]>): string {
    let out = "";
    for (const record of records) {
      out += this.formatRow(record);
    }
    return out;
  }

  private needsQuoting(field: string): boolean {
    if (field === "") return true;
    for (const char of field) {
      if (this.quoteTriggers.has(char)) return true;
    }
    return false;
  }
}

// =============================================================================
// CLASSES - CONVENIENCE WRITERS
// =============================================================================

/**
 * CSVWriter - Convenience class for CSV output
 * Sets the column separator to comma
 */
export class CSVWriter extends DSVWriter {
  constructor(options: Omit<DSVWriterOptions, "colSep"> = {}) {
    super({ ...options, colSep: DEFAULT_DELIMITERS.csv });
  }
}

/**
 * TSVWriter - Convenience class for TSV output
 * Sets the column separator to tab
 */
export class TSVWriter extends DSVWriter {
  constructor(options: Omit<DSVWriterOptions, "colSep"> = {}) {
    super({ ...options, colSep: DEFAULT_DELIMITERS.tsv });
  }
}
