export type ExtractionMethod = "fenced" | "bracketed" | "unterminated" | "none";

export interface Extraction {
  candidate: string;
  method: ExtractionMethod;
}

// The info string after the opening fence (json, jsonc, javascript, ...) is not part of the payload.
const FENCED_BLOCK = /```[\w-]*\s*([\s\S]*?)\s*```/;

/**
 * Isolates the JSON-looking part of a model reply.
 *
 * The closing bracket is found with a last-index search, not depth matching:
 * prose after the payload that contains a stray `}` or `]` ends up inside the
 * candidate and the parse step then falls back to field recovery.
 */
export function locateCandidate(raw: string): Extraction {
  const fenced = FENCED_BLOCK.exec(raw);
  if (fenced) {
    return { candidate: fenced[1] ?? "", method: "fenced" };
  }

  const firstBrace = raw.indexOf("{");
  const firstBracket = raw.indexOf("[");
  const start =
    firstBracket !== -1 && (firstBrace === -1 || firstBracket < firstBrace)
      ? firstBracket
      : firstBrace;
  if (start === -1) {
    return { candidate: raw.trim(), method: "none" };
  }

  const rest = raw.slice(start);
  const closer = rest.startsWith("[") ? "]" : "}";
  const end = rest.lastIndexOf(closer);
  if (end === -1) {
    return { candidate: rest, method: "unterminated" };
  }
  return { candidate: rest.slice(0, end + 1), method: "bracketed" };
}

export function extractCandidate(raw: string): string {
  return locateCandidate(raw).candidate;
}
