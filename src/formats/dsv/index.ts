/**
 * @module formats/dsv
 * @description DSV (Delimiter-Separated Values) format support
 *
 * Record-at-a-time reading and writing of CSV, TSV and other delimited
 * text, with row separator discovery, named converters, and header-aware
 * rows.
 *
 * @example Reading with headers
 * ```typescript
 * import { DSVStream } from './formats/dsv';
 *
 * const stream = new DSVStream(text, { headers: true, converters: "numeric" });
 * for (const row of stream) {
 *   console.log(row);
 * }
 * ```
 *
 * @example Registering a converter
 * ```typescript
 * import { Converters, fieldConverter } from './formats/dsv';
 *
 * Converters.register("upcase", fieldConverter((f) => f?.toUpperCase() ?? f));
 * ```
 */

// =============================================================================
// RE-EXPORTS - TYPES
// =============================================================================

export type {
  Converter,
  ConverterEntry,
  ConverterSpec,
  DSVFilterOptions,
  DSVOptions,
  DSVWriterOptions,
  Field,
  FieldConverter,
  FieldInfo,
  FieldInfoConverter,
  FieldScan,
  HeaderOption,
  ParsedRecord,
  RawField,
  RowSeparator,
} from "./types";

export { CSVParseState } from "./types";

// =============================================================================
// RE-EXPORTS - MAIN CLASSES
// =============================================================================

export { CSVStream, DEFAULT_OPTIONS, DSVStream, TSVStream } from "./stream";

export { Row, type RowPair, type RowSelector } from "./row";

export { CSVWriter, DSVWriter, TSVWriter } from "./writer";

// =============================================================================
// RE-EXPORTS - HELPERS
// =============================================================================

export {
  filter,
  foreach,
  generate,
  generateLine,
  parse,
  parseLine,
  readFile,
  writeFile,
  type WritableRecord,
} from "./helpers";

// =============================================================================
// RE-EXPORTS - CONVERTERS
// =============================================================================

export {
  ConverterPipeline,
  ConverterRegistry,
  Converters,
  downcase,
  fieldConverter,
  fieldInfoConverter,
  HeaderConverters,
  isConverterObject,
  snakeCase,
  toDate,
  toDateTime,
  toFloat,
  toInteger,
} from "./converters";

// =============================================================================
// RE-EXPORTS - VALIDATION
// =============================================================================

export {
  DSVOptionsSchema,
  DSVWriterOptionsSchema,
  definedOptions,
  unknownOptionKeys,
  validateOptions,
} from "./validation";

// =============================================================================
// RE-EXPORTS - STATE MACHINE (Low-level record scanning)
// =============================================================================

export { RecordTokenizer, scanFields, stripRowSeparator } from "./state-machine";

export { findLineEnding, resolveRowSeparator } from "./separators";

// =============================================================================
// RE-EXPORTS - CONSTANTS
// =============================================================================

export {
  AUTO_ROW_SEP,
  DEFAULT_DELIMITERS,
  DEFAULT_ROW_SEP,
  QUOTE,
  ROW_SEP_DISCOVERY_CHUNK,
} from "./constants";
