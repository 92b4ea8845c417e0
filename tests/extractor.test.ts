import { describe, expect, it } from "vitest";
import { extractCandidate, locateCandidate } from "../src/recovery/extractor.js";

describe("locateCandidate", () => {
  it("takes the interior of a json-tagged fenced block", () => {
    const raw = 'Here you go:\n```json\n{"a": 1}\n```\nAnything else?';
    expect(locateCandidate(raw)).toEqual({ candidate: '{"a": 1}', method: "fenced" });
  });

  it("drops any fence info string, not only json", () => {
    expect(locateCandidate('```jsonc\n{"a": 1}\n```')).toEqual({ candidate: '{"a": 1}', method: "fenced" });
    expect(locateCandidate("```javascript\n[1, 2]\n```")).toEqual({ candidate: "[1, 2]", method: "fenced" });
  });

  it("accepts an untagged fence", () => {
    expect(locateCandidate('```\n[1, 2]\n```')).toEqual({ candidate: "[1, 2]", method: "fenced" });
  });

  it("slices from the first brace to the last brace", () => {
    const raw = 'Sure! {"a": {"b": 2}} Hope that helps.';
    expect(locateCandidate(raw)).toEqual({ candidate: '{"a": {"b": 2}}', method: "bracketed" });
  });

  it("uses the array closer when a bracket comes first", () => {
    const raw = 'Result: [{"a": 1}] done';
    expect(locateCandidate(raw)).toEqual({ candidate: '[{"a": 1}]', method: "bracketed" });
  });

  it("keeps the remainder when no closer follows the opener", () => {
    expect(locateCandidate('oops {"a": "b"')).toEqual({ candidate: '{"a": "b"', method: "unterminated" });
  });

  it("returns the trimmed input when there are no markers", () => {
    expect(locateCandidate("  plain prose  ")).toEqual({ candidate: "plain prose", method: "none" });
  });

  // Known limitation: the closer is found by last index, so a stray brace in
  // trailing prose is swallowed into the candidate.
  it("includes trailing prose up to a stray closing brace", () => {
    const raw = 'Answer: {"a": 1} and then a stray } here';
    expect(locateCandidate(raw)).toEqual({
      candidate: '{"a": 1} and then a stray }',
      method: "bracketed"
    });
  });
});

describe("extractCandidate", () => {
  it("returns only the candidate text", () => {
    expect(extractCandidate('x {"k": "v"} y')).toBe('{"k": "v"}');
  });
});
