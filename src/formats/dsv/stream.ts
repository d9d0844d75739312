/**
 * @module formats/dsv/stream
 * @description Record-at-a-time reading and writing of delimited text
 *
 * DSVStream ties the pieces together: the row separator is resolved once
 * at construction, each read pulls one logical record from the tokenizer
 * and runs it through the data converters, and when headers are active the
 * fields are wrapped in a {@link Row}. Writes go through {@link DSVWriter}
 * to the same underlying source, which must then also be a {@link TextSink}.
 */

import { StreamError } from "../../errors";
import { isTextSink, StringStream, type TextSource } from "../../io/text-source";
import { AUTO_ROW_SEP, DEFAULT_DELIMITERS } from "./constants";
import { ConverterPipeline, Converters, HeaderConverters } from "./converters";
import { Row } from "./row";
import { RecordTokenizer } from "./state-machine";
import { resolveRowSeparator } from "./separators";
import type { ConverterSpec, DSVOptions, Field, HeaderOption, ParsedRecord } from "./types";
import { validateOptions } from "./validation";
import { DSVWriter } from "./writer";

// =============================================================================
// DEFAULTS
// =============================================================================

/**
 * Option values used for every key a caller leaves out
 */
export const DEFAULT_OPTIONS = {
  colSep: DEFAULT_DELIMITERS.csv,
  rowSep: AUTO_ROW_SEP,
  converters: [],
  headers: false,
  returnHeaders: false,
  headerConverters: [],
  skipBlanks: false,
} as const satisfies DSVOptions;

function defaultWarning(warning: string, lineNumber?: number): void {
  console.warn(`DSV Warning (line ${lineNumber}): ${warning}`);
}

type HeaderMode =
  | { readonly kind: "none" }
  | { readonly kind: "first_row" }
  | { readonly kind: "literal"; readonly names: readonly Field[] };

// =============================================================================
// CLASSES - MAIN STREAM
// =============================================================================

/**
 * DSVStream - reads and writes delimited records over a text source
 *
 * @example Reading with headers
 * ```typescript
 * const stream = new DSVStream("name,qty\nbolts,12\n", {
 *   headers: true,
 *   converters: "integer",
 * });
 * const row = stream.shift(); // Row: [["name", "bolts"], ["qty", 12]]
 * ```
 *
 * @example Writing
 * ```typescript
 * const out = new StringStream();
 * new DSVStream(out, { rowSep: "\n" }).append(["a", null, ""]);
 * out.toString(); // 'a,,""\n'
 * ```
 */
export class DSVStream implements Iterable<ParsedRecord> {
  readonly colSep: string;
  readonly rowSep: string;

  private readonly source: TextSource;
  private readonly tokenizer: RecordTokenizer;
  private readonly writer: DSVWriter;
  private readonly fieldPipeline = new ConverterPipeline(Converters);
  private readonly headerPipeline = new ConverterPipeline(HeaderConverters);
  private readonly headerMode: HeaderMode;
  private readonly returnHeaders: boolean;
  private readonly skipBlanks: boolean;
  private readonly onWarning: (warning: string, lineNumber?: number) => void;

  private currentHeaders: Field[] | null = null;
  private headerRowPending = false;

  /**
   * @param data - Text to read, or a source (and possibly sink) to use directly
   * @param options - Stream options, validated here
   * @throws {ConfigurationError} For unknown keys, bad values or unknown converter names
   */
  constructor(data: string | TextSource, options: DSVOptions = {}) {
    validateOptions(options);

    this.source = typeof data === "string" ? new StringStream(data) : data;
    this.colSep = options.colSep ?? DEFAULT_OPTIONS.colSep;
    this.rowSep = resolveRowSeparator(options.rowSep ?? DEFAULT_OPTIONS.rowSep, this.source);
    this.tokenizer = new RecordTokenizer(this.source, this.colSep, this.rowSep);
    this.writer = new DSVWriter({ colSep: this.colSep, rowSep: this.rowSep });

    this.fieldPipeline.add(options.converters ?? DEFAULT_OPTIONS.converters);
    this.headerPipeline.add(options.headerConverters ?? DEFAULT_OPTIONS.headerConverters);

    this.returnHeaders = options.returnHeaders ?? DEFAULT_OPTIONS.returnHeaders;
    this.skipBlanks = options.skipBlanks ?? DEFAULT_OPTIONS.skipBlanks;
    this.onWarning = options.onWarning ?? defaultWarning;
    this.headerMode = this.resolveHeaderMode(options.headers ?? DEFAULT_OPTIONS.headers);
    this.resetHeaders();
  }

  /**
   * Logical records read so far, blank and header records included
   */
  get lineNumber(): number {
    return this.tokenizer.lineNumber;
  }

  /**
   * Header names in use, or `null` when headers are off or no record has
   * been read yet
   */
  get headers(): Field[] | null {
    return this.currentHeaders === null ? null : [...this.currentHeaders];
  }

  /**
   * Read the next record
   * @returns A field list, a {@link Row} when headers are active, or `null`
   *   at end of data (again on every later call)
   * @throws {DSVParseError} On malformed input
   */
  shift(): ParsedRecord | null {
    if (this.headerMode.kind === "none") {
      return this.nextFields();
    }

    const headers = this.currentHeaders ?? this.resolveHeaders();
    if (headers === null) {
      return null;
    }
    if (this.headerRowPending) {
      this.headerRowPending = false;
      return new Row(headers, headers, true);
    }

    const fields = this.nextFields();
    if (fields === null) {
      return null;
    }
    if (fields.length > 0 && fields.length !== headers.length) {
      this.onWarning(
        `Expected ${headers.length} fields but found ${fields.length}`,
        this.lineNumber
      );
    }
    return new Row(headers, fields);
  }

  /**
   * Read every remaining record
   */
  readAll(): ParsedRecord[] {
    return [...this];
  }

  /**
   * Call `callback` with every remaining record
   */
  each(callback: (record: ParsedRecord) => void): this {
    for (const record of this) {
      callback(record);
    }
    return this;
  }

  *[Symbol.iterator](): Iterator<ParsedRecord> {
    let record = this.shift();
    while (record !== null) {
      yield record;
      record = this.shift();
    }
  }

  /**
   * Append data converters; they apply to records read from now on
   */
  convert(spec: ConverterSpec | readonly ConverterSpec[]): this {
    this.fieldPipeline.add(spec);
    return this;
  }

  /**
   * Append header converters; they apply to headers resolved from now on
   */
  headerConvert(spec: ConverterSpec | readonly ConverterSpec[]): this {
    this.headerPipeline.add(spec);
    return this;
  }

  /**
   * Serialize one record and write it to the underlying sink
   * @throws {StreamError} When the source cannot be written to
   */
  append(record: readonly unknown[] | Row): this {
    if (!isTextSink(this.source)) {
      throw new StreamError("Cannot append to a read-only source", "write");
    }
    const fields = record instanceof Row ? record.fields() : record;
    this.source.write(this.writer.formatRow(fields));
    return this;
  }

  /**
   * Move back to the start of the source; header detection runs again as
   * on a fresh stream
   */
  rewind(): this {
    this.source.seek(0);
    this.tokenizer.reset();
    this.resetHeaders();
    return this;
  }

  private nextFields(): Field[] | null {
    while (true) {
      const raw = this.tokenizer.next();
      if (raw === null) {
        return null;
      }
      if (raw.length === 0 && this.skipBlanks) {
        continue;
      }
      return this.fieldPipeline.apply(raw, this.tokenizer.lineNumber);
    }
  }

  private resolveHeaders(): Field[] | null {
    if (this.headerMode.kind === "literal") {
      this.currentHeaders = this.headerPipeline.apply(this.headerMode.names, this.lineNumber);
      return this.currentHeaders;
    }

    let raw = this.tokenizer.next();
    while (raw !== null && raw.length === 0 && this.skipBlanks) {
      raw = this.tokenizer.next();
    }
    if (raw === null) {
      return null;
    }
    this.currentHeaders = this.headerPipeline.apply(raw, this.tokenizer.lineNumber);
    return this.currentHeaders;
  }

  private resolveHeaderMode(option: HeaderOption): HeaderMode {
    if (option === false) {
      return { kind: "none" };
    }
    if (option === true || option === "first_row") {
      return { kind: "first_row" };
    }
    if (typeof option === "string") {
      const line = new RecordTokenizer(new StringStream(option), this.colSep, this.rowSep);
      return { kind: "literal", names: line.next() ?? [] };
    }
    return { kind: "literal", names: option };
  }

  private resetHeaders(): void {
    this.currentHeaders = null;
    this.headerRowPending = this.headerMode.kind !== "none" && this.returnHeaders;
  }
}

// =============================================================================
// CLASSES - CONVENIENCE STREAMS
// =============================================================================

/**
 * CSVStream - Convenience class for comma-separated data
 */
export class CSVStream extends DSVStream {
  constructor(data: string | TextSource, options: Omit<DSVOptions, "colSep"> = {}) {
    super(data, { ...options, colSep: DEFAULT_DELIMITERS.csv });
  }
}

/**
 * TSVStream - Convenience class for tab-separated data
 */
export class TSVStream extends DSVStream {
  constructor(data: string | TextSource, options: Omit<DSVOptions, "colSep"> = {}) {
    super(data, { ...options, colSep: DEFAULT_DELIMITERS.tsv });
  }
}
