/**
 * DSV writer tests: minimal quoting and the round trip through the reader
 */

import { describe, expect, test } from "vitest";
import { ConfigurationError } from "../../src/errors";
import {
  CSVWriter,
  DEFAULT_ROW_SEP,
  DSVWriter,
  generateLine,
  parse,
  TSVWriter,
} from "../../src/formats/dsv";

describe("DSVWriter", () => {
  const writer = new DSVWriter({ rowSep: "\n" });

  test("renders absent fields empty and empty fields quoted", () => {
    expect(writer.formatRow(["a", null, "", 'say "hi"'])).toBe('a,,"","say ""hi"""\n');
  });

  test("quotes fields holding separators or line breaks", () => {
    expect(writer.formatField("x,y")).toBe('"x,y"');
    expect(writer.formatField("x\ry")).toBe('"x\ry"');
    expect(writer.formatField("x\ny")).toBe('"x\ny"');
    expect(writer.formatField(" padded ")).toBe(" padded ");
  });

  test("renders other values as text", () => {
    expect(writer.formatField(42)).toBe("42");
    expect(writer.formatField(10n)).toBe("10");
    expect(writer.formatField(true)).toBe("true");
    expect(writer.formatField(undefined)).toBe("");
    expect(writer.formatField(new Date(Date.UTC(2024, 0, 2)))).toBe("2024-01-02T00:00:00.000Z");
  });

  test("quotes on any character of a multi-character separator", () => {
    const wide = new DSVWriter({ colSep: "::", rowSep: "\n" });
    expect(wide.formatRow(["a:b", "c"])).toBe('"a:b"::c\n');
  });

  test("formats many records", () => {
    expect(writer.formatRecords([["a", "b"], [1, 2]])).toBe("a,b\n1,2\n");
  });

  test("uses the platform line ending unless told otherwise", () => {
    expect(new DSVWriter().rowSep).toBe(DEFAULT_ROW_SEP);
    expect(new DSVWriter({ rowSep: "auto" }).rowSep).toBe(DEFAULT_ROW_SEP);
  });

  test("convenience writers fix the column separator", () => {
    expect(new CSVWriter({ rowSep: "\n" }).formatRow(["a", "b"])).toBe("a,b\n");
    expect(new TSVWriter({ rowSep: "\n" }).formatRow(["a", "b\tc"])).toBe('a\t"b\tc"\n');
  });

  test("treats options set to undefined as left out", () => {
    expect(new DSVWriter({ colSep: undefined, rowSep: "\n" }).formatRow(["a", "b"])).toBe("a,b\n");
  });

  test("rejects invalid separators", () => {
    expect(() => new DSVWriter({ colSep: '"' })).toThrow(ConfigurationError);
    expect(() => new DSVWriter({ colSep: "" })).toThrow(ConfigurationError);
  });
});

describe("Round trip", () => {
  test.each([",", ";", "\t", "::"])("fields survive writing and reading with %j", (colSep) => {
    const fields = [
      "plain",
      "",
      null,
      "with,comma",
      "with;semicolon",
      'with "quote"',
      "multi\nline",
      "\r\n",
      "tab\there",
      "a:b",
    ];
    const line = generateLine(fields, { colSep, rowSep: "\n" });

    expect(parse(line, { colSep, rowSep: "\n" })).toEqual([fields]);
  });
});
