import type { EnvelopeHints, PipelineIssue, RawAgentOutput, StructuredAnswer } from "../agents/types.js";
import { locateCandidate, type ExtractionMethod } from "./extractor.js";
import { asStructuredPayload, normalizeWithTrace, type NormalizationMode } from "./normalizer.js";
import { sanitize } from "./sanitizer.js";

export type ParseResult =
  | { status: "ok"; value: unknown }
  | { status: "failed"; error: string };

export interface RecoveryReport {
  answer: StructuredAnswer;
  extraction: ExtractionMethod | "native";
  parse: "ok" | "failed" | "skipped";
  normalization: NormalizationMode;
  /** How many times a JSON-encoded string had to be decoded before the payload showed up. */
  decodedLayers: number;
  issues: PipelineIssue[];
}

// Replies are sometimes a JSON string whose content is the payload; decode at most this deep.
const MAX_DECODE_LAYERS = 2;

export function parseCandidate(candidate: string): ParseResult {
  try {
    const value: unknown = JSON.parse(candidate);
    return { status: "ok", value };
  } catch (error) {
    return { status: "failed", error: error instanceof Error ? error.message : String(error) };
  }
}

function decodeStringLiteral(raw: string): string | undefined {
  const trimmed = raw.trim();
  if (trimmed.length < 2 || !trimmed.startsWith('"') || !trimmed.endsWith('"')) {
    return undefined;
  }
  const parsed = parseCandidate(trimmed);
  return parsed.status === "ok" && typeof parsed.value === "string" ? parsed.value : undefined;
}

export function recoverStructuredAnswer(
  raw: RawAgentOutput,
  envelope: EnvelopeHints = {}
): RecoveryReport {
  return recover(raw, envelope, 0);
}

function recover(raw: RawAgentOutput, envelope: EnvelopeHints, layers: number): RecoveryReport {
  if (typeof raw !== "string") {
    const normalized = normalizeWithTrace(raw, envelope);
    return {
      answer: normalized.answer,
      extraction: "native",
      parse: "skipped",
      normalization: normalized.mode,
      decodedLayers: layers,
      issues: []
    };
  }

  const decoded = layers < MAX_DECODE_LAYERS ? decodeStringLiteral(raw) : undefined;
  if (decoded !== undefined) {
    return recover(decoded, envelope, layers + 1);
  }

  const extraction = locateCandidate(raw);
  if (extraction.method === "none") {
    const normalized = normalizeWithTrace(raw, envelope);
    return {
      answer: normalized.answer,
      extraction: extraction.method,
      parse: "skipped",
      normalization: normalized.mode,
      decodedLayers: layers,
      issues: ["EXTRACTION_FAILED"]
    };
  }

  const parsed = parseCandidate(sanitize(extraction.candidate));
  if (parsed.status === "failed") {
    const normalized = normalizeWithTrace(raw, envelope);
    return {
      answer: normalized.answer,
      extraction: extraction.method,
      parse: "failed",
      normalization: normalized.mode,
      decodedLayers: layers,
      issues: ["PARSE_FAILED"]
    };
  }

  if (typeof parsed.value === "string" && layers < MAX_DECODE_LAYERS) {
    return recover(parsed.value, envelope, layers + 1);
  }

  // Valid JSON that is not an answer (e.g. a bracketed citation like "[1]") keeps the raw text.
  const payload = asStructuredPayload(parsed.value);
  const normalized = normalizeWithTrace(payload ?? raw, envelope);
  return {
    answer: normalized.answer,
    extraction: extraction.method,
    parse: "ok",
    normalization: normalized.mode,
    decodedLayers: layers,
    issues: []
  };
}
