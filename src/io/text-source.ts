/**
 * Text source and sink abstractions consumed by the DSV core
 *
 * The tokenizer only ever needs to pull one physical line at a time, peek
 * ahead for separator discovery, and jump back to a remembered position.
 * Anything offering those operations can back a {@link DSVStream}.
 */

/**
 * Readable, seekable source of characters
 */
export interface TextSource {
  /**
   * Read up to and including the next occurrence of `separator`, or to the
   * end of the data when no separator follows
   * @returns the text read, or `null` when nothing is left
   */
  gets(separator: string): string | null;

  /** Read at most `length` characters; `""` at end of data */
  read(length: number): string;

  eof(): boolean;

  /** Current read position in characters */
  tell(): number;

  seek(position: number): void;
}

/**
 * Writable destination for rendered rows
 */
export interface TextSink {
  write(text: string): void;
}

/**
 * Type guard for sources that can also be written to
 */
export function isTextSink(value: TextSource | TextSink): value is TextSink {
  return "write" in value && typeof value.write === "function";
}

/**
 * In-memory text stream
 *
 * Reads advance a cursor through the buffered text; writes always append
 * to the end, so a stream can be filled and read back without seeking.
 *
 * @example
 * ```typescript
 * const stream = new StringStream("a,b\n1,2\n");
 * stream.gets("\n"); // "a,b\n"
 * stream.write("3,4\n");
 * stream.toString(); // "a,b\n1,2\n3,4\n"
 * ```
 */
export class StringStream implements TextSource, TextSink {
  private buffer: string;
  private position = 0;

  constructor(initial = "") {
    this.buffer = initial;
  }

  gets(separator: string): string | null {
    if (this.eof()) return null;

    const found = separator === "" ? -1 : this.buffer.indexOf(separator, this.position);
    const end = found === -1 ? this.buffer.length : found + separator.length;
    const line = this.buffer.slice(this.position, end);
    this.position = end;
    return line;
  }

  read(length: number): string {
    const chunk = this.buffer.slice(this.position, this.position + length);
    this.position += chunk.length;
    return chunk;
  }

  eof(): boolean {
    return this.position >= this.buffer.length;
  }

  tell(): number {
    return this.position;
  }

  seek(position: number): void {
    this.position = Math.max(0, Math.min(position, this.buffer.length));
  }

  write(text: string): void {
    this.buffer += text;
  }

  get length(): number {
    return this.buffer.length;
  }

  toString(): string {
    return this.buffer;
  }
}
