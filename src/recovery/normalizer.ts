import { z } from "zod";
import type { EnvelopeHints, Source, StructuredAnswer } from "../agents/types.js";
import { sanitize } from "./sanitizer.js";

export type NormalizationMode =
  | "structured"
  | "field-recovery"
  | "plain-text"
  | "unstructured-object"
  | "empty";

export interface Normalized {
  answer: StructuredAnswer;
  mode: NormalizationMode;
}

export const PLACEHOLDER_SOURCE_URL = "#";

const lenientText = z.string().optional().catch(undefined);
const lenientArray = z.array(z.unknown()).optional().catch(undefined);
const lenientList = z.union([z.array(z.unknown()), z.string()]).optional().catch(undefined);

// Agents answer in snake_case (the prompt contract); already-normalized answers use camelCase.
const payloadSchema = z.object({
  answerMarkdown: lenientText,
  answer_markdown: lenientText,
  answer: lenientText,
  shortAnswer: lenientText,
  short_answer: lenientText,
  sources: lenientArray,
  citations: lenientArray,
  source_documents: lenientArray,
  followUpQuestions: lenientList,
  follow_up_questions: lenientList,
  userNotices: lenientList,
  user_notices: lenientList,
  relatedTopics: lenientList,
  related_topics: lenientList
});

const sourceRecordSchema = z.object({
  title: lenientText,
  document_name: lenientText,
  name: lenientText,
  documentRef: lenientText,
  document_ref: lenientText,
  document_id: lenientText,
  url: lenientText,
  breadcrumb: lenientText,
  breadcrumbs: lenientText,
  section_hint: lenientText
});

const STRUCTURED_KEYS = [
  "answerMarkdown",
  "answer_markdown",
  "shortAnswer",
  "short_answer",
  "sources",
  "answer",
  "citations"
] as const;

const MAX_UNWRAP_DEPTH = 4;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function unwrapArrays(value: unknown): unknown {
  let current = value;
  for (let depth = 0; depth < MAX_UNWRAP_DEPTH && Array.isArray(current); depth += 1) {
    current = current[0];
  }
  return current;
}

/** Returns the payload object when the value (or its first array element) looks like an answer. */
export function asStructuredPayload(value: unknown): Record<string, unknown> | undefined {
  const candidate = unwrapArrays(value);
  if (!isRecord(candidate)) {
    return undefined;
  }
  const structured = STRUCTURED_KEYS.some(
    (key) => candidate[key] !== undefined && candidate[key] !== null
  );
  return structured ? candidate : undefined;
}

function firstText(...values: Array<string | undefined>): string | undefined {
  return values.find((value) => value !== undefined && value.trim() !== "");
}

function toStringList(value: readonly unknown[] | string | undefined): string[] {
  if (value === undefined) {
    return [];
  }
  const items = typeof value === "string" ? [value] : value;
  return items.filter((item): item is string => typeof item === "string" && item.trim() !== "");
}

function toSource(entry: unknown): Source | undefined {
  if (typeof entry === "string") {
    if (entry.trim() === "") {
      return undefined;
    }
    return { title: entry, documentRef: entry, url: PLACEHOLDER_SOURCE_URL, breadcrumb: "" };
  }
  if (!isRecord(entry)) {
    return undefined;
  }

  const record = sourceRecordSchema.parse(entry);
  const reference = firstText(record.documentRef, record.document_ref, record.document_id);
  const title = firstText(record.title, record.document_name, record.name, reference, record.url);
  if (title === undefined) {
    return undefined;
  }
  return {
    title,
    documentRef: reference ?? firstText(record.document_name) ?? title,
    url: firstText(record.url) ?? PLACEHOLDER_SOURCE_URL,
    breadcrumb: firstText(record.breadcrumb, record.breadcrumbs, record.section_hint) ?? ""
  };
}

export function normalizeSources(entries: readonly unknown[]): Source[] {
  const seen = new Set<string>();
  const sources: Source[] = [];
  for (const entry of entries) {
    const source = toSource(entry);
    if (!source) {
      continue;
    }
    const key = `${source.documentRef}\u0000${source.title}`;
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    sources.push(source);
  }
  return sources;
}

function mergeSources(payloadSources: readonly unknown[], envelope: EnvelopeHints): Source[] {
  const fromPayload = normalizeSources(payloadSources);
  return fromPayload.length > 0 ? fromPayload : normalizeSources(envelope.sources ?? []);
}

function fromPayload(payload: Record<string, unknown>, envelope: EnvelopeHints): StructuredAnswer {
  const fields = payloadSchema.parse(payload);
  const shortAnswer = fields.shortAnswer ?? fields.short_answer;
  const answerMarkdown = fields.answerMarkdown ?? fields.answer_markdown ?? fields.answer ?? shortAnswer ?? "";

  return {
    answerMarkdown,
    ...(shortAnswer !== undefined ? { shortAnswer } : {}),
    sources: mergeSources(fields.sources ?? fields.citations ?? fields.source_documents ?? [], envelope),
    followUpQuestions: toStringList(fields.followUpQuestions ?? fields.follow_up_questions),
    userNotices: toStringList(fields.userNotices ?? fields.user_notices),
    relatedTopics: toStringList(fields.relatedTopics ?? fields.related_topics)
  };
}

const STRING_LITERAL = /"((?:[^"\\]|\\[\s\S])*)"/g;

function decodeStringBody(body: string): string {
  try {
    const decoded: unknown = JSON.parse(sanitize(`"${body}"`));
    return typeof decoded === "string" ? decoded : body;
  } catch {
    return body.replace(/\\(["\\/nrt])/g, (_match, escaped: string) => {
      switch (escaped) {
        case "n":
          return "\n";
        case "r":
          return "\r";
        case "t":
          return "\t";
        default:
          return escaped;
      }
    });
  }
}

function matchStringField(raw: string, keys: readonly string[]): string | undefined {
  for (const key of keys) {
    const match = new RegExp(`"${key}"\\s*:\\s*"((?:[^"\\\\]|\\\\[\\s\\S])*)"`).exec(raw);
    if (match) {
      return decodeStringBody(match[1] ?? "");
    }
  }
  return undefined;
}

function matchStringList(raw: string, keys: readonly string[]): string[] {
  for (const key of keys) {
    const match = new RegExp(`"${key}"\\s*:\\s*\\[([\\s\\S]*?)\\]`).exec(raw);
    if (match) {
      return Array.from((match[1] ?? "").matchAll(STRING_LITERAL), (item) => decodeStringBody(item[1] ?? ""))
        .filter((item) => item.trim() !== "");
    }
  }
  return [];
}

/**
 * Best-effort recovery for text that did not parse: pulls the answer body and
 * the simple string lists by pattern, otherwise the whole text is the body.
 */
function recoverFields(raw: string, envelope: EnvelopeHints): Normalized {
  const answerMarkdown = matchStringField(raw, ["answer_markdown", "answerMarkdown"]);
  const followUpQuestions = matchStringList(raw, ["follow_up_questions", "followUpQuestions"]);
  const userNotices = matchStringList(raw, ["user_notices", "userNotices"]);
  const relatedTopics = matchStringList(raw, ["related_topics", "relatedTopics"]);
  const recovered =
    answerMarkdown !== undefined ||
    followUpQuestions.length > 0 ||
    userNotices.length > 0 ||
    relatedTopics.length > 0;

  return {
    answer: {
      answerMarkdown: answerMarkdown ?? raw,
      sources: normalizeSources(envelope.sources ?? []),
      followUpQuestions,
      userNotices,
      relatedTopics
    },
    mode: recovered ? "field-recovery" : "plain-text"
  };
}

// BigInt fields, cycles and throwing toJSON hooks cannot be serialized.
function renderObject(value: Record<string, unknown>): string {
  try {
    return "```json\n" + JSON.stringify(value, null, 2) + "\n```";
  } catch {
    return "";
  }
}

function fromEnvelopeOnly(answerMarkdown: string, envelope: EnvelopeHints): StructuredAnswer {
  return {
    answerMarkdown,
    sources: normalizeSources(envelope.sources ?? []),
    followUpQuestions: [],
    userNotices: [],
    relatedTopics: []
  };
}

export function normalizeWithTrace(parsedOrRaw: unknown, envelope: EnvelopeHints = {}): Normalized {
  const payload = asStructuredPayload(parsedOrRaw);
  if (payload) {
    return { answer: fromPayload(payload, envelope), mode: "structured" };
  }

  const value = unwrapArrays(parsedOrRaw);
  if (typeof value === "string") {
    return recoverFields(value, envelope);
  }
  if (isRecord(value)) {
    return { answer: fromEnvelopeOnly(renderObject(value), envelope), mode: "unstructured-object" };
  }
  if (value === undefined || value === null) {
    return { answer: fromEnvelopeOnly("", envelope), mode: "empty" };
  }
  return { answer: fromEnvelopeOnly(String(value), envelope), mode: "plain-text" };
}

export function normalize(parsedOrRaw: unknown, envelopeHints: EnvelopeHints = {}): StructuredAnswer {
  return normalizeWithTrace(parsedOrRaw, envelopeHints).answer;
}
