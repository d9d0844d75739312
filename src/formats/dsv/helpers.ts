/**
 * @module formats/dsv/helpers
 * @description One-shot reading and writing built on DSVStream
 *
 * The string helpers are synchronous. The file helpers read a whole file
 * before parsing, or render every record before writing, so the parsing
 * core itself never waits on I/O.
 */

import { readToString } from "../../io/file-reader";
import { writeString } from "../../io/file-writer";
import { StringStream, type TextSink, type TextSource } from "../../io/text-source";
import type { FileReaderOptions } from "../../types";
import { Row } from "./row";
import { DSVStream } from "./stream";
import type { DSVFilterOptions, DSVOptions, DSVWriterOptions, ParsedRecord } from "./types";
import { DSVWriter } from "./writer";

/**
 * A record to be written: plain values or a Row, whose fields are written
 */
export type WritableRecord = readonly unknown[] | Row;

// =============================================================================
// STRING HELPERS
// =============================================================================

/**
 * Parse all records in `text`
 *
 * @example
 * ```typescript
 * parse("a,b\n1,\n"); // [["a", "b"], ["1", null]]
 * ```
 */
export function parse(text: string, options: DSVOptions = {}): ParsedRecord[] {
  return new DSVStream(text, options).readAll();
}

/**
 * Parse the first record in `line`
 * @returns The record, or `null` for empty input
 */
export function parseLine(line: string, options: DSVOptions = {}): ParsedRecord | null {
  return new DSVStream(line, options).shift();
}

/**
 * Build a string by appending records to a stream
 *
 * @param build - Receives a stream writing into the result
 * @param options - Stream options
 * @param initial - Text the result starts with; new records go after it
 *
 * @example
 * ```typescript
 * generate((out) => {
 *   out.append(["name", "qty"]);
 *   out.append(["bolts", 12]);
 * }, { rowSep: "\n" }); // "name,qty\nbolts,12\n"
 * ```
 */
export function generate(
  build: (stream: DSVStream) => void,
  options: DSVOptions = {},
  initial = ""
): string {
  const sink = new StringStream(initial);
  build(new DSVStream(sink, options));
  return sink.toString();
}

/**
 * Render one record as a line, row separator included
 */
export function generateLine(record: WritableRecord, options: DSVWriterOptions = {}): string {
  return new DSVWriter(options).formatRow(fieldsOf(record));
}

/**
 * Read every record from `input`, hand it to `callback`, then append it to
 * `output`
 *
 * Keys of `options.input` and `options.output` apply to one side only; all
 * other keys apply to both. When `callback` returns a record, that record is
 * written in place of the one read.
 *
 * @example Changing the separator
 * ```typescript
 * const out = new StringStream();
 * filter("a,b\n", out, { output: { colSep: "\t" } }, () => {});
 * out.toString(); // "a\tb\n"
 * ```
 */
export function filter(
  input: string | TextSource,
  output: TextSource & TextSink,
  options: DSVFilterOptions,
  callback: (record: ParsedRecord) => WritableRecord | void
): void {
  const { input: inputOptions = {}, output: outputOptions = {}, ...shared } = options;
  const reader = new DSVStream(input, { ...shared, ...inputOptions });
  const writer = new DSVStream(output, { ...shared, ...outputOptions });

  for (const record of reader) {
    const replacement = callback(record);
    writer.append(isWritableRecord(replacement) ? replacement : record);
  }
}

// =============================================================================
// FILE HELPERS
// =============================================================================

/**
 * Read and parse a whole file
 * @throws {FileError} If the file cannot be read
 * @throws {DSVParseError} On malformed input
 */
export async function readFile(
  path: string,
  options: DSVOptions = {},
  readerOptions: FileReaderOptions = {}
): Promise<ParsedRecord[]> {
  const text = await readToString(path, readerOptions);
  return parse(text, options);
}

/**
 * Call `callback` with each record of a file
 */
export async function foreach(
  path: string,
  callback: (record: ParsedRecord) => void,
  options: DSVOptions = {},
  readerOptions: FileReaderOptions = {}
): Promise<void> {
  const text = await readToString(path, readerOptions);
  new DSVStream(text, options).each(callback);
}

/**
 * Write records to a file, replacing its content
 * @returns Number of records written
 * @throws {FileError} If the file cannot be written
 */
export async function writeFile(
  path: string,
  records: Iterable<WritableRecord>,
  options: DSVWriterOptions = {}
): Promise<number> {
  const writer = new DSVWriter(options);
  let content = "";
  let count = 0;
  for (const record of records) {
    content += writer.formatRow(fieldsOf(record));
    count++;
  }
  await writeString(path, content);
  return count;
}

function isWritableRecord(value: unknown): value is WritableRecord {
  return value instanceof Row || Array.isArray(value);
}

function fieldsOf(record: WritableRecord): readonly unknown[] {
  return record instanceof Row ? record.fields() : record;
}
