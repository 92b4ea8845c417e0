/**
 * Repairs raw control characters inside JSON string literals so the payload
 * parses. Structural whitespace outside strings is left untouched.
 */
export function sanitize(candidate: string): string {
  let result = "";
  let insideStringLiteral = false;
  let escapePending = false;

  for (const char of candidate) {
    if (!insideStringLiteral) {
      if (char === '"') {
        insideStringLiteral = true;
      }
      result += char;
      continue;
    }

    if (escapePending) {
      escapePending = false;
      result += char;
      continue;
    }

    switch (char) {
      case '"':
        insideStringLiteral = false;
        result += char;
        break;
      case "\\":
        escapePending = true;
        result += char;
        break;
      case "\n":
        result += "\\n";
        break;
      case "\r":
        break;
      case "\t":
        result += "\\t";
        break;
      default:
        result += char;
    }
  }

  return result;
}
