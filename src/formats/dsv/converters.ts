/**
 * @module formats/dsv/converters
 * @description Named converter registries and the per-stream conversion pipeline
 *
 * Built-in converters never throw: a field they cannot convert comes back
 * unchanged. Custom converters are free to throw, and their errors reach
 * the caller untouched.
 */

import { ConfigurationError } from "../../errors";
import type {
  Converter,
  ConverterEntry,
  ConverterSpec,
  Field,
  FieldConverter,
  FieldInfo,
  FieldInfoConverter,
  RawField,
} from "./types";

// =============================================================================
// CONVERTER CONSTRUCTORS
// =============================================================================

/**
 * Wrap a function of the field alone as a converter
 */
export function fieldConverter(convert: (field: RawField) => Field): FieldConverter {
  return { kind: "field", convert };
}

/**
 * Wrap a function of the field and its position as a converter
 */
export function fieldInfoConverter(
  convert: (field: RawField, info: FieldInfo) => Field
): FieldInfoConverter {
  return { kind: "field-info", convert };
}

// =============================================================================
// BUILT-IN CONVERSIONS
// =============================================================================

const DECIMAL_INTEGER = /^[+-]?\d+(?:_\d+)*$/;
const PREFIXED_INTEGER = /^([+-]?)0(?:x[0-9a-f]+(?:_[0-9a-f]+)*|o[0-7]+(?:_[0-7]+)*|b[01]+(?:_[01]+)*)$/i;
const FLOAT = /^[+-]?(?:\d+(?:_\d+)*(?:\.\d+(?:_\d+)*)?|\.\d+)(?:e[+-]?\d+)?$/i;
const DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATE_TIME =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?)?$/i;

/**
 * Integer conversion: decimal (with `_` digit separators) or `0x`/`0o`/`0b`
 * literals; `bigint` beyond the safe-integer range
 */
export function toInteger(field: RawField): Field {
  if (field === null) return field;
  const text = field.trim();

  let digits: string;
  if (DECIMAL_INTEGER.test(text)) {
    digits = text.replace(/_/g, "");
  } else {
    const prefixed = PREFIXED_INTEGER.exec(text);
    if (!prefixed) return field;
    const sign = prefixed[1] ?? "";
    // BigInt takes 0x/0o/0b literals but no sign
    const magnitude = BigInt(text.slice(sign.length).replace(/_/g, ""));
    const value = sign === "-" ? -magnitude : magnitude;
    return value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)
      ? Number(value)
      : value;
  }

  const value = Number(digits);
  if (!Number.isSafeInteger(value)) return BigInt(digits);
  // "-0" is zero
  return value === 0 ? 0 : value;
}

/**
 * Float conversion: decimal or exponent notation
 */
export function toFloat(field: RawField): Field {
  if (field === null) return field;
  const text = field.trim();
  if (!FLOAT.test(text)) return field;

  const value = Number(text.replace(/_/g, ""));
  return Number.isFinite(value) ? value : field;
}

function utcDate(
  year: number,
  month: number,
  day: number,
  hour = 0,
  minute = 0,
  second = 0,
  millis = 0
): Date | null {
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  if (hour > 23 || minute > 59 || second > 59) return null;

  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second, millis));
  // reject dates the calendar rolled over, e.g. 2023-02-30
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() + 1 !== month ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date;
}

/**
 * Date conversion: `YYYY-MM-DD` to a `Date` at UTC midnight
 */
export function toDate(field: RawField): Field {
  if (field === null) return field;
  const match = DATE.exec(field.trim());
  if (!match) return field;

  const date = utcDate(Number(match[1]), Number(match[2]), Number(match[3]));
  return date ?? field;
}

function zoneOffsetMinutes(zone: string | undefined): number {
  if (zone === undefined || zone.toUpperCase() === "Z") return 0;
  const sign = zone.startsWith("-") ? -1 : 1;
  const digits = zone.slice(1).replace(":", "");
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2, 4)) : 0;
  return sign * (hours * 60 + minutes);
}

/**
 * Date-time conversion: ISO 8601 or SQL style timestamps to a `Date`;
 * timestamps without a zone are read as UTC
 */
export function toDateTime(field: RawField): Field {
  if (field === null) return field;
  const match = DATE_TIME.exec(field.trim());
  if (!match) return field;

  const [, year, month, day, hour, minute, second, fraction, zone] = match;
  const millis = fraction === undefined ? 0 : Number(fraction.padEnd(3, "0").slice(0, 3));
  const date = utcDate(
    Number(year),
    Number(month),
    Number(day),
    Number(hour ?? 0),
    Number(minute ?? 0),
    Number(second ?? 0),
    millis
  );
  if (date === null) return field;

  return new Date(date.getTime() - zoneOffsetMinutes(zone) * 60_000);
}

/**
 * Lower-case a header
 */
export function downcase(field: RawField): Field {
  return field === null ? field : field.toLowerCase();
}

/**
 * Normalize a header to a snake_case identifier: "Unit Price" → "unit_price"
 */
export function snakeCase(field: RawField): Field {
  if (field === null) return field;
  return field
    .trim()
    .toLowerCase()
    .replace(/\s+/g, "_")
    .replace(/[^\w]/g, "");
}

// =============================================================================
// REGISTRY
// =============================================================================

/**
 * Mutable name → converter table
 *
 * Entries are either concrete converters or ordered lists of other names,
 * which may themselves be lists. Registrations last for the life of the
 * process.
 *
 * @example
 * ```typescript
 * Converters.register("trim", fieldConverter((f) => f?.trim() ?? f));
 * Converters.register("clean_numbers", ["trim", "numeric"]);
 * ```
 */
export class ConverterRegistry {
  private readonly entries = new Map<string, ConverterEntry>();

  constructor(initial: Readonly<Record<string, ConverterEntry>> = {}) {
    for (const [name, entry] of Object.entries(initial)) {
      this.entries.set(name, entry);
    }
  }

  /**
   * Bind `name` to a converter or to a list of names, replacing any
   * earlier binding
   */
  register(name: string, entry: ConverterEntry): this {
    this.entries.set(name, entry);
    return this;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  names(): string[] {
    return [...this.entries.keys()];
  }

  /**
   * Expand a name into the concrete converters it stands for, in order
   * @throws {ConfigurationError} For unknown names and cyclic lists
   */
  resolve(name: string, seen: readonly string[] = []): Converter[] {
    const entry = this.entries.get(name);
    if (entry === undefined) {
      throw new ConfigurationError(
        `Unknown converter "${name}" (known: ${this.names().join(", ")})`,
        "converters"
      );
    }
    if (seen.includes(name)) {
      throw new ConfigurationError(
        `Converter "${name}" refers to itself through ${seen.join(" -> ")}`,
        "converters"
      );
    }

    if (isConverter(entry)) {
      return [entry];
    }
    return entry.flatMap((member) => this.resolve(member, [...seen, name]));
  }
}

function isConverter(entry: ConverterEntry): entry is Converter {
  return !Array.isArray(entry);
}

/**
 * Type guard for converter objects given in options
 */
export function isConverterObject(value: unknown): value is Converter {
  if (typeof value !== "object" || value === null) return false;
  if (!("kind" in value) || !("convert" in value)) return false;
  return (value.kind === "field" || value.kind === "field-info") && typeof value.convert === "function";
}

/**
 * Data-field converters available by name
 */
export const Converters = new ConverterRegistry({
  integer: fieldConverter(toInteger),
  float: fieldConverter(toFloat),
  numeric: ["integer", "float"],
  date: fieldConverter(toDate),
  date_time: fieldConverter(toDateTime),
  all: ["date_time", "numeric"],
});

/**
 * Header converters available by name
 */
export const HeaderConverters = new ConverterRegistry({
  downcase: fieldConverter(downcase),
  snake_case: fieldConverter(snakeCase),
});

// =============================================================================
// PIPELINE
// =============================================================================

/**
 * Ordered converters applied to every field of a record
 *
 * A field leaves the pipeline as soon as a converter turns it into
 * something other than a string.
 */
export class ConverterPipeline {
  private readonly converters: Converter[] = [];

  constructor(private readonly registry: ConverterRegistry) {}

  /**
   * Append converters by name or object; names are resolved immediately
   * @throws {ConfigurationError} For unknown names or non-converter values
   */
  add(specs: ConverterSpec | readonly ConverterSpec[]): this {
    const list: readonly unknown[] = Array.isArray(specs) ? specs : [specs];
    for (const spec of list) {
      if (typeof spec === "string") {
        this.converters.push(...this.registry.resolve(spec));
      } else if (isConverterObject(spec)) {
        this.converters.push(spec);
      } else {
        throw new ConfigurationError(
          "Converters must be registered names or objects built with fieldConverter() or fieldInfoConverter()",
          "converters"
        );
      }
    }
    return this;
  }

  get size(): number {
    return this.converters.length;
  }

  isEmpty(): boolean {
    return this.converters.length === 0;
  }

  /**
   * Convert every field of a record
   *
   * Values that are neither strings nor `null`, as found in literal header
   * lists, pass through untouched.
   *
   * @param fields - Fields from the tokenizer or a literal header list
   * @param line - Record number reported through FieldInfo
   */
  apply(fields: readonly Field[], line: number): Field[] {
    if (this.isEmpty()) return [...fields];
    return fields.map((field, index) => this.convertField(field, { index, line }));
  }

  private convertField(field: Field, info: FieldInfo): Field {
    if (typeof field !== "string" && field !== null) return field;

    let input: RawField = field;
    for (const converter of this.converters) {
      const output =
        converter.kind === "field" ? converter.convert(input) : converter.convert(input, info);
      if (typeof output !== "string") {
        return output;
      }
      input = output;
    }
    return input;
  }
}
