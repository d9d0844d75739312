/**
 * DSV Stream Tests
 *
 * Covers:
 * - Field grammar across column separators
 * - Row separator handling and discovery
 * - Option validation
 * - Converters, blank records, rewinding and writing
 * - One-shot helpers
 */

import { describe, expect, test } from "vitest";
import { ConfigurationError, DSVParseError, StreamError } from "../../src/errors";
import {
  CSVStream,
  DEFAULT_ROW_SEP,
  DSVStream,
  fieldInfoConverter,
  filter,
  generate,
  parse,
  parseLine,
  Row,
  TSVStream,
} from "../../src/formats/dsv";
import { StringStream, type TextSource } from "../../src/io/text-source";

const FIELD_CASES: Array<[string, Array<string | null>]> = [
  ["a,b", ["a", "b"]],
  ['a,"""b"""', ["a", '"b"']],
  ['a,"""b"', ["a", '"b']],
  ['a,"b"""', ["a", 'b"']],
  ['a,"\nb"""', ["a", '\nb"']],
  ['a,"""\nb"', ["a", '"\nb']],
  ['a,"""\nb\n"""', ["a", '"\nb\n"']],
  ['a,"""\nb\n""",\nc', ["a", '"\nb\n"', null]],
  ["a,,,", ["a", null, null, null]],
  [",", [null, null]],
  ['"",""', ["", ""]],
  ['""""', ['"']],
  ['"""",""', ['"', ""]],
  [',""', [null, ""]],
  [',"\r"', [null, "\r"]],
  ['"\r\n,"', ["\r\n,"]],
  ['"\r\n,",', ["\r\n,", null]],
];

describe("DSVStream", () => {
  describe("Field grammar", () => {
    for (const colSep of [",", ";", "\t"]) {
      test.each(FIELD_CASES)(`parses %j with colSep ${JSON.stringify(colSep)}`, (input, expected) => {
        const line = input.replaceAll(",", colSep);
        const fields = expected.map((field) => (field === null ? null : field.replaceAll(",", colSep)));

        expect(parseLine(line, { colSep })).toEqual(fields);
      });
    }

    test("commas are plain text under another separator", () => {
      expect(parseLine(",,,;", { colSep: ";" })).toEqual([",,,", null]);
    });

    test("absent and empty fields stay distinct", () => {
      expect(parseLine(",,,")).toEqual([null, null, null, null]);
      expect(parseLine('"",""')).toEqual(["", ""]);
    });
  });

  describe("Row separators", () => {
    test("a literal CRLF separator rejects bare line feeds in unquoted fields", () => {
      expect(() => parseLine("1,2,3\n,4,5\r\n", { rowSep: "\r\n" })).toThrow(DSVParseError);
    });

    test("a literal CRLF separator allows line feeds in quoted fields", () => {
      expect(parseLine('1,2,"3\n",4,5\r\n', { rowSep: "\r\n" })).toEqual(["1", "2", "3\n", "4", "5"]);
    });

    test.each(["\r\n", "\n", "\r"])("discovers %j", (lineEnd) => {
      expect(new DSVStream(`1,2,3${lineEnd}4,5${lineEnd}`).rowSep).toBe(lineEnd);
    });

    test("takes the earliest line ending", () => {
      expect(new DSVStream("\n\r\n\r").rowSep).toBe("\n");
    });

    test("falls back to the platform default without line endings", () => {
      expect(new DSVStream("").rowSep).toBe(DEFAULT_ROW_SEP);
    });

    test("discovery does not consume data", () => {
      expect(new DSVStream("a,b\r\nc,d\r\n").readAll()).toEqual([
        ["a", "b"],
        ["c", "d"],
      ]);
    });
  });

  describe("Options", () => {
    test("rejects unknown options", () => {
      const options = { colSep: ",", unknown: "error" };
      expect(() => new DSVStream("", options)).toThrow(ConfigurationError);
      expect(() => new DSVStream("", options)).toThrow("Unknown options: unknown");
    });

    test("rejects quotes in the column separator", () => {
      expect(() => new DSVStream("", { colSep: '"' })).toThrow(ConfigurationError);
    });

    test("rejects identical column and row separators", () => {
      expect(() => new DSVStream("", { colSep: "\n", rowSep: "\n" })).toThrow(ConfigurationError);
    });

    test("rejects unknown converter names", () => {
      expect(() => new DSVStream("", { converters: "money" })).toThrow(ConfigurationError);
      expect(() => new DSVStream("", { headerConverters: "shout" })).toThrow(ConfigurationError);
    });

    test("treats options set to undefined as left out", () => {
      const stream = new DSVStream("a,b\n", { headers: undefined, colSep: undefined });
      expect(stream.readAll()).toEqual([["a", "b"]]);
      expect(parse("a;b\n", { colSep: ";", rowSep: undefined, onWarning: undefined })).toEqual([
        ["a", "b"],
      ]);
    });

    test("accepts a pipe separator", () => {
      expect(parseLine("a|b", { colSep: "|" })).toEqual(["a", "b"]);
    });
  });

  describe("Reading", () => {
    test("reads every record then keeps returning null", () => {
      const stream = new DSVStream("a,b\n1,2\n");

      expect(stream.shift()).toEqual(["a", "b"]);
      expect(stream.shift()).toEqual(["1", "2"]);
      expect(stream.shift()).toBeNull();
      expect(stream.shift()).toBeNull();
      expect(stream.lineNumber).toBe(2);
    });

    test("a trailing blank line is one more record", () => {
      expect(parse("a\n\nb\n\n")).toEqual([["a"], [], ["b"], []]);
    });

    test("skipBlanks drops blank records", () => {
      expect(parse("a\n\nb\n\n", { skipBlanks: true })).toEqual([["a"], ["b"]]);
    });

    test("each visits every record", () => {
      const seen: unknown[] = [];
      const stream = new DSVStream("a\nb\n");

      expect(stream.each((record) => seen.push(record))).toBe(stream);
      expect(seen).toEqual([["a"], ["b"]]);
    });

    test("converters added later apply to later records", () => {
      const stream = new DSVStream("1,2\n3,4\n");

      expect(stream.shift()).toEqual(["1", "2"]);
      stream.convert("integer");
      expect(stream.shift()).toEqual([3, 4]);
    });

    test("field-info converters see the record number", () => {
      const records = parse("a,b\nc\n", {
        converters: fieldInfoConverter((_field, info) => `${info.line}.${info.index}`),
      });
      expect(records).toEqual([["1.0", "1.1"], ["2.0"]]);
    });

    test("malformed input fails fast through the stream", () => {
      const stream = new DSVStream(`ok\nvalid,fields,bad start"${"123456789\n".repeat(1024)}`);

      expect(stream.shift()).toEqual(["ok"]);
      expect(() => stream.shift()).toThrow("Illegal quoting in unquoted field (line 2, column 23)");
    });

    test("rewind starts over", () => {
      const stream = new DSVStream("a\nb\n");
      stream.readAll();

      expect(stream.rewind()).toBe(stream);
      expect(stream.lineNumber).toBe(0);
      expect(stream.shift()).toEqual(["a"]);
    });

    test("convenience streams fix the column separator", () => {
      expect(new TSVStream("a\tb,c\n").shift()).toEqual(["a", "b,c"]);
      expect(new CSVStream("a\tb,c\n").shift()).toEqual(["a\tb", "c"]);
    });
  });

  describe("Writing", () => {
    test("appends rendered records to the sink", () => {
      const out = new StringStream();
      new DSVStream(out, { rowSep: "\n" })
        .append(["a", null, ""])
        .append(new Row(["x"], ["y,z"]));

      expect(out.toString()).toBe('a,,""\n"y,z"\n');
    });

    test("records appended to a string stream can be read back", () => {
      const out = new StringStream();
      const stream = new DSVStream(out, { rowSep: "\n" });
      stream.append(["1", "2"]);

      expect(stream.shift()).toEqual(["1", "2"]);
    });

    test("rejects appends to a read-only source", () => {
      const readOnly: TextSource = {
        gets: () => null,
        read: () => "",
        eof: () => true,
        tell: () => 0,
        seek: () => undefined,
      };
      const stream = new DSVStream(readOnly);

      expect(() => stream.append(["a"])).toThrow(StreamError);
    });
  });
});

describe("Helpers", () => {
  test("parse returns all records", () => {
    expect(parse("a,b\n1,\n")).toEqual([
      ["a", "b"],
      ["1", null],
    ]);
  });

  test("parseLine returns null for empty input", () => {
    expect(parseLine("")).toBeNull();
  });

  test("generate collects appended records", () => {
    const text = generate(
      (out) => {
        out.append(["name", "qty"]);
        out.append(["bolts", 12]);
      },
      { rowSep: "\n" }
    );
    expect(text).toBe("name,qty\nbolts,12\n");
  });

  test("generate appends after initial text in its line ending", () => {
    const text = generate((out) => out.append(["c", "d"]), {}, "a,b\r\n");
    expect(text).toBe("a,b\r\nc,d\r\n");
  });

  test("filter passes each record through the callback to the output", () => {
    const out = new StringStream();
    filter("a,b\n1,2\n", out, { output: { colSep: "\t", rowSep: "\n" } }, (record) => {
      if (Array.isArray(record)) record.push("x");
    });

    expect(out.toString()).toBe("a\tb\tx\n1\t2\tx\n");
  });

  test("filter shares options between both sides", () => {
    const out = new StringStream();
    const rows: Row[] = [];
    filter(
      "n,q\nbolts,3\n",
      out,
      { headers: true, returnHeaders: true, output: { rowSep: "\n" } },
      (record) => {
        if (record instanceof Row) rows.push(record);
      }
    );

    expect(rows.map((row) => row.isHeaderRow())).toEqual([true, false]);
    expect(out.toString()).toBe("n,q\nbolts,3\n");
  });

  test("filter writes the record the callback returns", () => {
    const out = new StringStream();
    filter(
      "qty,price\n2,3\n",
      out,
      { headers: true, returnHeaders: true, converters: "integer", output: { rowSep: "\n" } },
      (row) => {
        if (!(row instanceof Row)) return;
        if (row.isHeaderRow()) return [...row.fields(), "total"];
        return [...row.fields(), Number(row.field("qty")) * Number(row.field("price"))];
      }
    );

    expect(out.toString()).toBe("qty,price,total\n2,3,6\n");
  });
});
