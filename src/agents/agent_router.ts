import {
  SPECIALIST_AGENTS,
  type AgentId,
  type ConversationView,
  type Message,
  type RoutingDecision,
  type SpecialistAgentId
} from "./types.js";
import { loadVocabulary, tokenize, type CompiledVocabulary, type VocabularyEntry } from "./vocabulary.js";

export interface AgentRouterOptions {
  vocabulary?: CompiledVocabulary;
  /** A specialist must score strictly above this to be chosen. */
  confidenceThreshold?: number;
  continuityBonus?: number;
}

export const DEFAULT_CONFIDENCE_THRESHOLD = 0.25;
export const DEFAULT_CONTINUITY_BONUS = 1.5;

// Confidence saturates once a message hits this many of an agent's heaviest entries.
const SATURATION_ENTRIES = 3;

interface Candidate {
  agent: SpecialistAgentId;
  raw: number;
  adjusted: number;
  continuity: boolean;
}

export class AgentRouter {
  private readonly vocabulary: CompiledVocabulary;
  private readonly threshold: number;
  private readonly continuityBonus: number;
  private readonly maxAttainable: Record<SpecialistAgentId, number>;

  constructor(options: AgentRouterOptions = {}) {
    this.vocabulary = options.vocabulary ?? loadVocabulary();
    this.threshold = options.confidenceThreshold ?? DEFAULT_CONFIDENCE_THRESHOLD;
    this.continuityBonus = options.continuityBonus ?? DEFAULT_CONTINUITY_BONUS;
    this.maxAttainable = {
      hr: saturationScore(this.vocabulary.hr),
      analytics: saturationScore(this.vocabulary.analytics),
      documents: saturationScore(this.vocabulary.documents)
    };
  }

  route(message: Message, context: ConversationView): RoutingDecision {
    const tokens = tokenize(message.text);
    const tokenSet = new Set(tokens);
    const stream = ` ${tokens.join(" ")} `;
    const previous = context.turns.at(-1)?.agent;

    const candidates: Candidate[] = SPECIALIST_AGENTS.map((agent) => {
      const raw = scoreEntries(this.vocabulary[agent], tokenSet, stream);
      const continuity = previous === agent && raw > 0;
      return {
        agent,
        raw,
        adjusted: continuity ? raw + this.continuityBonus : raw,
        continuity
      };
    });

    // Stable sort keeps SPECIALIST_AGENTS order on equal scores.
    const ranked = [...candidates].sort((a, b) => b.adjusted - a.adjusted);
    const best = ranked[0];
    const scores: Record<AgentId, number> = {
      hr: 0,
      analytics: 0,
      documents: 0,
      general: 0
    };
    for (const candidate of candidates) {
      scores[candidate.agent] = candidate.adjusted;
    }

    const confidence = best ? this.normalize(best) : 0;
    if (!best || best.adjusted <= this.threshold) {
      return {
        agent: "general",
        confidence,
        scores,
        usedFallback: true,
        reasoning: best && best.adjusted > 0
          ? `Best candidate ${best.agent} scored ${best.adjusted.toFixed(2)}, not above threshold ${this.threshold}`
          : "No domain vocabulary matched",
        alternatives: ranked.filter((c) => c.adjusted > 0).map((c) => c.agent)
      };
    }

    const reasons = [`keyword match (score: ${best.raw.toFixed(2)})`];
    if (best.continuity) {
      reasons.push("follow-up to previous turn");
    }
    const runnerUp = ranked[1];
    if (runnerUp && runnerUp.adjusted === best.adjusted) {
      reasons.push(`tie with ${runnerUp.agent} broken by priority`);
    }

    return {
      agent: best.agent,
      confidence,
      scores,
      usedFallback: false,
      reasoning: `Selected ${best.agent} based on: ${reasons.join(", ")}`,
      alternatives: ranked.slice(1).filter((c) => c.adjusted > 0).map((c) => c.agent)
    };
  }

  private normalize(candidate: Candidate): number {
    const max = this.maxAttainable[candidate.agent];
    if (max <= 0) {
      return 0;
    }
    return Math.min(candidate.adjusted / max, 1);
  }
}

function scoreEntries(entries: readonly VocabularyEntry[], tokenSet: Set<string>, stream: string): number {
  let score = 0;
  for (const entry of entries) {
    const matched =
      entry.tokens.length === 1
        ? tokenSet.has(entry.tokens[0] ?? "")
        : stream.includes(` ${entry.tokens.join(" ")} `);
    if (matched) {
      score += entry.weight;
    }
  }
  return score;
}

function saturationScore(entries: readonly VocabularyEntry[]): number {
  return entries
    .map((entry) => entry.weight)
    .sort((a, b) => b - a)
    .slice(0, SATURATION_ENTRIES)
    .reduce((sum, weight) => sum + weight, 0);
}
