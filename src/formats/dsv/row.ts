/**
 * @module formats/dsv/row
 * @description Header-aware view of one record
 *
 * A Row pairs headers with fields by position. Header names need not be
 * unique: lookups take a minimum index so repeated names can be walked one
 * occurrence at a time. Positions past the shorter of the two lists pair
 * with `null`.
 */

import { DSVWriter } from "./writer";
import type { DSVWriterOptions } from "./types";

/**
 * One (header, field) pair; either side may be `null`
 */
export type RowPair<H, F> = readonly [header: H | null, field: F | null];

/**
 * Selector for {@link Row.fields}: a header, a position, or a header with
 * the minimum index to search from
 */
export type RowSelector<H> = H | number | readonly [header: H, minimumIndex: number];

export class Row<H = unknown, F = unknown> implements Iterable<RowPair<H, F>> {
  private readonly pairs: ReadonlyArray<RowPair<H, F>>;
  private readonly headerRow: boolean;

  /**
   * @param headers - Header names, duplicates allowed
   * @param fields - Field values
   * @param headerRow - Whether this row carries the headers themselves
   */
  constructor(headers: readonly (H | null)[], fields: readonly (F | null)[], headerRow = false) {
    const size = Math.max(headers.length, fields.length);
    const pairs: RowPair<H, F>[] = [];
    for (let i = 0; i < size; i++) {
      pairs.push([headers[i] ?? null, fields[i] ?? null]);
    }
    this.pairs = pairs;
    this.headerRow = headerRow;
  }

  /** True for the header row a stream returns under `returnHeaders` */
  isHeaderRow(): boolean {
    return this.headerRow;
  }

  /** True for rows built from data records */
  isFieldRow(): boolean {
    return !this.headerRow;
  }

  get size(): number {
    return this.pairs.length;
  }

  headers(): (H | null)[] {
    return this.pairs.map(([header]) => header);
  }

  /**
   * Look up a field by position, or by header name starting at
   * `minimumIndex`
   *
   * Integers are always positions; `minimumIndex` only applies to names.
   *
   * @example
   * ```typescript
   * const row = new Row(["A", "B", "A"], [1, 2, 3]);
   * row.field("A");    // 1
   * row.field("A", 1); // 3
   * row.field(1);      // 2
   * ```
   */
  field(headerOrIndex: H | number, minimumIndex = 0): F | null {
    if (typeof headerOrIndex === "number" && Number.isInteger(headerOrIndex)) {
      return this.pairs[headerOrIndex]?.[1] ?? null;
    }
    const index = this.index(headerOrIndex, minimumIndex);
    return index === null ? null : (this.pairs[index]?.[1] ?? null);
  }

  /**
   * All field values, or the values picked out by each selector in turn
   *
   * @example
   * ```typescript
   * row.fields();                 // every value
   * row.fields("B", 0, ["A", 1]); // by name, by position, by name from index 1
   * ```
   */
  fields(...selectors: RowSelector<H>[]): (F | null)[] {
    if (selectors.length === 0) {
      return this.pairs.map(([, field]) => field);
    }
    return selectors.map((selector) =>
      isMinimumIndexSelector(selector)
        ? this.field(selector[0], selector[1])
        : this.field(selector)
    );
  }

  /**
   * Position of the first `header` at or after `minimumIndex`
   */
  index(header: H | number, minimumIndex = 0): number | null {
    for (let i = Math.max(0, minimumIndex); i < this.pairs.length; i++) {
      if (this.pairs[i]?.[0] === header) {
        return i;
      }
    }
    return null;
  }

  hasHeader(name: H): boolean {
    return this.pairs.some(([header]) => header === name);
  }

  /**
   * Whether any field equals `value`; `null` matches absent fields
   */
  hasField(value: F | null): boolean {
    return this.pairs.some(([, field]) => field === value);
  }

  [Symbol.iterator](): Iterator<RowPair<H, F>> {
    return this.pairs[Symbol.iterator]();
  }

  forEach(callback: (header: H | null, field: F | null, index: number) => void): void {
    this.pairs.forEach(([header, field], index) => callback(header, field, index));
  }

  map<T>(callback: (pair: RowPair<H, F>, index: number) => T): T[] {
    return this.pairs.map(callback);
  }

  filter(predicate: (pair: RowPair<H, F>, index: number) => boolean): RowPair<H, F>[] {
    return this.pairs.filter(predicate);
  }

  reduce<T>(callback: (accumulator: T, pair: RowPair<H, F>, index: number) => T, initial: T): T {
    return this.pairs.reduce(callback, initial);
  }

  /**
   * Copy of the (header, field) pairs in order
   */
  toArray(): RowPair<H, F>[] {
    return [...this.pairs];
  }

  /**
   * Header → field map; a repeated header keeps its last field
   */
  toMap(): Map<H | null, F | null> {
    const map = new Map<H | null, F | null>();
    for (const [header, field] of this.pairs) {
      map.set(header, field);
    }
    return map;
  }

  /**
   * Render the fields as one delimited line
   */
  toCSV(options: DSVWriterOptions = {}): string {
    return new DSVWriter(options).formatRow(this.fields());
  }
}

function isMinimumIndexSelector<H>(
  selector: RowSelector<H>
): selector is readonly [header: H, minimumIndex: number] {
  return Array.isArray(selector) && selector.length === 2 && typeof selector[1] === "number";
}
