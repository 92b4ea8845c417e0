import { describe, expect, it } from "vitest";
import { sanitize } from "../src/recovery/sanitizer.js";

describe("sanitize", () => {
  it("escapes a raw newline inside a string literal", () => {
    expect(sanitize('{"a": "x\ny"}')).toBe('{"a": "x\\ny"}');
  });

  it("leaves structural whitespace outside strings alone", () => {
    const pretty = '{\n\t"a": 1,\r\n  "b": [true]\n}';
    expect(sanitize(pretty)).toBe(pretty);
  });

  it("drops carriage returns and escapes tabs inside strings", () => {
    expect(sanitize('"x\r\ny\tz"')).toBe('"x\\ny\\tz"');
  });

  it("does not treat an escaped quote as the end of the literal", () => {
    const input = '{"a": "say \\"hi\\"\nnow"}';
    expect(sanitize(input)).toBe('{"a": "say \\"hi\\"\\nnow"}');
    expect(JSON.parse(sanitize(input))).toEqual({ a: 'say "hi"\nnow' });
  });

  it("closes the literal after an escaped backslash", () => {
    const input = '{"path": "C:\\\\"\n}';
    expect(sanitize(input)).toBe(input);
    expect(JSON.parse(sanitize(input))).toEqual({ path: "C:\\" });
  });

  it("keeps existing escape sequences intact", () => {
    expect(sanitize('"already\\nescaped"')).toBe('"already\\nescaped"');
  });

  it("returns an empty string for empty input", () => {
    expect(sanitize("")).toBe("");
  });
});
