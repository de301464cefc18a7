import { describe, it, expect } from "vitest";
import {
  encodeDocument,
  decodeDocument,
  normalizeMultiline,
  toFieldEntries,
  isFields,
} from "./format.js";
import { DocumentParseError, FormatError } from "./errors.js";

describe("encodeDocument", () => {
  it("should keep the order of a field list", () => {
    const result = encodeDocument([
      ["title", "foo"],
      ["body", "foo\nbar"],
    ]);
    expect(result).toBe("title: foo\nbody: |-\n    foo\n    bar\n");
  });

  it("should sort plain object fields by name", () => {
    expect(encodeDocument({ foo: 1, bar: 2 })).toBe("bar: 2\nfoo: 1\n");
  });

  it("should keep the insertion order of a map", () => {
    const doc = new Map<string, unknown>([
      ["zeta", 1],
      ["alpha", 2],
    ]);
    expect(encodeDocument(doc)).toBe("zeta: 1\nalpha: 2\n");
  });

  it("should keep integer-like names where they were given", () => {
    const result = encodeDocument([
      ["b", 1],
      ["2", 2],
      ["1", 3],
    ]);
    expect(result).toBe("b: 1\n'2': 2\n'1': 3\n");
  });

  it("should encode a list of scalars as a sequence", () => {
    expect(encodeDocument([1, 2, 3])).toBe("- 1\n- 2\n- 3\n");
  });

  it("should encode an empty field list as an empty mapping", () => {
    expect(encodeDocument([])).toBe("{}\n");
    expect(encodeDocument({})).toBe("{}\n");
  });

  it("should keep the first position and the last value of repeated names", () => {
    const result = encodeDocument([
      ["a", 1],
      ["b", 2],
      ["a", 3],
    ]);
    expect(result).toBe("a: 3\nb: 2\n");
  });

  it("should write single-line strings unquoted", () => {
    expect(encodeDocument({ title: "Hello world" })).toBe("title: Hello world\n");
  });

  it("should quote strings that would read back as another type", () => {
    expect(encodeDocument([["flag", "true"], ["n", "123"]])).toBe("flag: 'true'\nn: '123'\n");
  });

  it("should trim multi-line strings before writing a literal block", () => {
    const result = encodeDocument({ body: "line one  \r\n\tindented\t\nlast" });
    expect(result).toBe("body: |-\n    line one\n        indented\n    last\n");
  });

  it("should keep a trailing newline with clip chomping", () => {
    expect(encodeDocument({ body: "a\nb\n" })).toBe("body: |\n    a\n    b\n");
  });

  it("should pass non-string values through with 4-space indentation", () => {
    const result = encodeDocument({ count: 3, tags: ["a", "b"], meta: { z: 1, a: 2 } });
    expect(result).toBe("count: 3\nmeta:\n    a: 2\n    z: 1\ntags:\n    - a\n    - b\n");
  });

  it("should leave out undefined fields", () => {
    expect(encodeDocument({ a: 1, b: undefined })).toBe("a: 1\n");
  });

  it("should be deterministic", () => {
    const doc = { b: "x\ny", a: [1, { d: 1, c: 2 }] };
    expect(encodeDocument(doc)).toBe(encodeDocument({ ...doc }));
  });

  it("should wrap unencodable values in FormatError", () => {
    const doc = { fn: () => 1 };
    expect(() => encodeDocument(doc, "pages/fn.yaml")).toThrow(FormatError);
    expect(() => encodeDocument(doc, "pages/fn.yaml")).toThrow(
      "Failed to format document: pages/fn.yaml"
    );
  });
});

describe("decodeDocument", () => {
  it("should decode a literal block", () => {
    const result = decodeDocument("title: foo\nbody: |-\n    foo\n    bar\n");
    expect(result).toEqual({ title: "foo", body: "foo\nbar" });
  });

  it("should decode sequences and scalars", () => {
    expect(decodeDocument("- 1\n- 2\n")).toEqual([1, 2]);
    expect(decodeDocument("just text\n")).toBe("just text");
  });

  it("should decode empty and null documents to null", () => {
    expect(decodeDocument("")).toBeNull();
    expect(decodeDocument("null\n")).toBeNull();
  });

  it("should throw DocumentParseError for malformed text", () => {
    expect(() => decodeDocument("key: [unclosed\n", "pages/bad.yaml")).toThrow(DocumentParseError);
    expect(() => decodeDocument("key: [unclosed\n", "pages/bad.yaml")).toThrow(
      "Failed to parse document: pages/bad.yaml"
    );
  });

  it("should reject duplicate keys", () => {
    expect(() => decodeDocument("a: 1\na: 2\n")).toThrow(DocumentParseError);
  });
});

describe("round trip", () => {
  it("should preserve values and order of a field list", () => {
    const fields: Array<[string, unknown]> = [
      ["title", "Welcome"],
      ["draft", false],
      ["weight", 2.5],
      ["tags", ["news", "home"]],
      ["author", "Jane"],
    ];

    const decoded = decodeDocument(encodeDocument(fields));

    expect(isFields(decoded)).toBe(true);
    expect(Object.entries(decoded ?? {})).toEqual(fields);
  });

  it("should decode plain objects in ascending field order", () => {
    const decoded = decodeDocument(encodeDocument({ zeta: 1, alpha: 2, mid: 3 }));

    expect(Object.keys(decoded ?? {})).toEqual(["alpha", "mid", "zeta"]);
  });

  it("should preserve strings that need quoting", () => {
    const doc = { a: "true", b: "", c: "- dash", d: "key: value", e: "#hash" };

    expect(decodeDocument(encodeDocument(doc))).toEqual(doc);
  });
});

describe("normalizeMultiline", () => {
  it("should drop carriage returns, expand tabs and trim line ends", () => {
    expect(normalizeMultiline("a \r\n\tb")).toBe("a\n    b");
  });

  it("should blank whitespace-only lines", () => {
    expect(normalizeMultiline("a\n   \nb")).toBe("a\n\nb");
  });
});

describe("toFieldEntries", () => {
  it("should treat a list of pairs as fields", () => {
    expect(toFieldEntries([["a", 1]])).toEqual([["a", 1]]);
  });

  it("should treat any other list as opaque", () => {
    expect(toFieldEntries([["a", 1], "b"])).toBeNull();
    expect(toFieldEntries([[1, 2]])).toBeNull();
    expect(toFieldEntries([["a", 1, 2]])).toBeNull();
  });

  it("should treat scalars as opaque", () => {
    expect(toFieldEntries("text")).toBeNull();
    expect(toFieldEntries(42)).toBeNull();
  });
});
