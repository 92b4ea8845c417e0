import type { Source, StructuredAnswer } from "./agents/types.js";
import { PLACEHOLDER_SOURCE_URL } from "./recovery/normalizer.js";

export interface AnswerCardOptions {
  /** Follow-up prompts are only offered on the latest answer of a conversation. */
  includeFollowUps?: boolean;
}

function formatSource(source: Source, idx: number): string {
  const parts = [`${idx + 1}. ${source.title}`];
  if (source.breadcrumb) {
    parts.push(` - ${source.breadcrumb}`);
  }
  if (source.url !== PLACEHOLDER_SOURCE_URL) {
    parts.push(` (${source.url})`);
  }
  return parts.join("");
}

export function renderAnswerCard(answer: StructuredAnswer, options: AnswerCardOptions = {}): string {
  const sections: string[] = [];

  if (answer.userNotices.length) {
    sections.push(answer.userNotices.map((notice) => `> **Note:** ${notice}`).join("\n"));
  }

  sections.push(answer.answerMarkdown.trim() || "_No answer was returned._");

  if (answer.sources.length) {
    const label = answer.sources.length === 1 ? "1 Source Cited" : `${answer.sources.length} Sources Cited`;
    sections.push(`**${label}**\n${answer.sources.map(formatSource).join("\n")}`);
  } else {
    sections.push("_No external sources cited for this answer._");
  }

  if ((options.includeFollowUps ?? true) && answer.followUpQuestions.length) {
    sections.push(`**You could also ask**\n${answer.followUpQuestions.map((q) => `- ${q}`).join("\n")}`);
  }

  if (answer.relatedTopics.length) {
    sections.push(`**Related topics:** ${answer.relatedTopics.join(", ")}`);
  }

  return sections.join("\n\n");
}
