/**
 * DSV Format Type Definitions
 *
 * All types and interfaces for the DSV (Delimiter-Separated Values) module.
 */

import type { Row } from "./row";

// =============================================================================
// FIELDS AND RECORDS
// =============================================================================

/**
 * A field as produced by the tokenizer: `null` for an empty unquoted field,
 * a string otherwise (an explicit `""` stays an empty string)
 */
export type RawField = string | null;

/**
 * A field after conversion; converters may return any value
 */
export type Field = unknown;

/**
 * One record handed back by a stream: a plain field list when headers are
 * off, a {@link Row} when they are on
 */
export type ParsedRecord = Field[] | Row;

/**
 * Position of a field in the data, passed to field-info converters
 */
export interface FieldInfo {
  /** Zero-based position of the field in its record */
  readonly index: number;
  /** 1-based count of logical records read so far */
  readonly line: number;
}

// =============================================================================
// CONVERTERS
// =============================================================================

/**
 * Converter that only looks at the field value
 */
export interface FieldConverter {
  readonly kind: "field";
  convert(field: RawField): Field;
}

/**
 * Converter that also receives the field's position
 */
export interface FieldInfoConverter {
  readonly kind: "field-info";
  convert(field: RawField, info: FieldInfo): Field;
}

export type Converter = FieldConverter | FieldInfoConverter;

/**
 * A registered converter name or a converter object
 */
export type ConverterSpec = string | Converter;

/**
 * Registry entry: a concrete converter, or a list of names resolved in order
 */
export type ConverterEntry = Converter | readonly string[];

// =============================================================================
// OPTIONS
// =============================================================================

/**
 * Literal row separator, or `"auto"` to discover it from the data
 */
export type RowSeparator = "auto" | (string & {});

/**
 * Header handling: off, first record, literal names, or one delimited line
 */
export type HeaderOption = boolean | "first_row" | readonly unknown[] | string;

/**
 * Options accepted by DSVStream
 */
export interface DSVOptions {
  colSep?: string;
  rowSep?: RowSeparator;
  converters?: ConverterSpec | readonly ConverterSpec[];
  headers?: HeaderOption;
  returnHeaders?: boolean;
  headerConverters?: ConverterSpec | readonly ConverterSpec[];
  skipBlanks?: boolean;
  onWarning?: (warning: string, lineNumber?: number) => void;
}

/**
 * Options for writers that never read, such as one-shot line generation
 */
export type DSVWriterOptions = Pick<DSVOptions, "colSep" | "rowSep">;

/**
 * Options for {@link filter}: shared keys apply to both sides, `input` and
 * `output` apply to one side only
 */
export interface DSVFilterOptions extends DSVOptions {
  input?: DSVOptions;
  output?: DSVOptions;
}

// =============================================================================
// TOKENIZER STATE
// =============================================================================

/**
 * Parser state for the field scanning state machine
 */
export enum CSVParseState {
  FIELD_START,
  UNQUOTED_FIELD,
  QUOTED_FIELD,
  QUOTE_IN_QUOTED,
}

/**
 * Outcome of scanning a buffered record: either every field was matched, or
 * a quoted field is still open at the end of the buffer
 */
export type FieldScan =
  | { readonly complete: true; readonly fields: RawField[] }
  | { readonly complete: false };
