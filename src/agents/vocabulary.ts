import { readFileSync } from "node:fs";
import { z } from "zod";
import type { SpecialistAgentId } from "./types.js";

const weightTable = z.record(z.string().min(1), z.number().positive());

const vocabularySchema = z.object({
  hr: weightTable,
  analytics: weightTable,
  documents: weightTable
});

export type VocabularyTable = z.infer<typeof vocabularySchema>;

export interface VocabularyEntry {
  phrase: string;
  /** Lower-cased tokens of the phrase; more than one means phrase matching. */
  tokens: string[];
  weight: number;
}

export type CompiledVocabulary = Record<SpecialistAgentId, VocabularyEntry[]>;

const DEFAULT_VOCABULARY_URL = new URL("../../data/vocabulary.json", import.meta.url);

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[a-z0-9]+/g) ?? [];
}

export function parseVocabulary(raw: unknown): VocabularyTable {
  return vocabularySchema.parse(raw);
}

export function compileVocabulary(table: VocabularyTable): CompiledVocabulary {
  const compile = (weights: Record<string, number>): VocabularyEntry[] =>
    Object.entries(weights)
      .map(([phrase, weight]) => ({ phrase, tokens: tokenize(phrase), weight }))
      .filter((entry) => entry.tokens.length > 0);

  return {
    hr: compile(table.hr),
    analytics: compile(table.analytics),
    documents: compile(table.documents)
  };
}

export function loadVocabulary(file: URL | string = DEFAULT_VOCABULARY_URL): CompiledVocabulary {
  const raw: unknown = JSON.parse(readFileSync(file, "utf8"));
  return compileVocabulary(parseVocabulary(raw));
}
