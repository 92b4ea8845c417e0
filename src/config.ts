import { z } from "zod";
import { DEFAULT_CONFIDENCE_THRESHOLD, DEFAULT_CONTINUITY_BONUS } from "./agents/agent_router.js";
import { DEFAULT_MAX_TURNS } from "./session/conversation_context.js";

// Pinecone's free plan caps index dimension at 1536.
const MAX_EMBEDDING_DIM = 1536;
const FALLBACK_EMBEDDING_DIM = 1024;

function numberVar(name: string, fallback: number) {
  return z
    .string()
    .optional()
    .transform((raw, ctx) => {
      if (raw === undefined || raw.trim() === "") {
        return fallback;
      }
      const parsed = Number(raw);
      if (Number.isNaN(parsed)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${name} must be a valid number.` });
        return z.NEVER;
      }
      return parsed;
    });
}

const optionalText = z
  .string()
  .optional()
  .transform((raw) => (raw && raw.trim() !== "" ? raw : undefined));

const envSchema = z.object({
  OPENROUTER_BASE_URL: z.string().url().default("https://openrouter.ai/api/v1"),
  OPENROUTER_API_KEY: z.string().default(""),
  OPENROUTER_MODEL: z.string().default("gpt-4o-mini"),
  OPENROUTER_EMBEDDING_MODEL: z.string().default("text-embedding-3-large"),
  OPENROUTER_EMBEDDING_DIM: numberVar("OPENROUTER_EMBEDDING_DIM", FALLBACK_EMBEDDING_DIM),
  PINECONE_API_KEY: optionalText,
  PINECONE_INDEX: optionalText,
  PINECONE_NAMESPACE: z.string().default("dept-documents"),
  AGENT_TIMEOUT_MS: numberVar("AGENT_TIMEOUT_MS", 30_000).pipe(z.number().int().positive()),
  AGENT_MAX_RETRIES: numberVar("AGENT_MAX_RETRIES", 3).pipe(z.number().int().min(0)),
  ROUTER_CONFIDENCE_THRESHOLD: numberVar("ROUTER_CONFIDENCE_THRESHOLD", DEFAULT_CONFIDENCE_THRESHOLD),
  ROUTER_CONTINUITY_BONUS: numberVar("ROUTER_CONTINUITY_BONUS", DEFAULT_CONTINUITY_BONUS).pipe(z.number().min(0)),
  CONTEXT_MAX_TURNS: numberVar("CONTEXT_MAX_TURNS", DEFAULT_MAX_TURNS).pipe(z.number().int().positive()),
  LANGFUSE_PUBLIC_KEY: optionalText,
  LANGFUSE_SECRET_KEY: optionalText
});

export interface AppConfig {
  openRouter: {
    baseUrl: string;
    apiKey: string;
    model: string;
    embeddingModel: string;
    embeddingDim: number;
  };
  pinecone?: {
    apiKey: string;
    index: string;
    namespace: string;
  };
  agentTimeoutMs: number;
  agentMaxRetries: number;
  router: {
    confidenceThreshold: number;
    continuityBonus: number;
  };
  contextMaxTurns: number;
  tracingEnabled: boolean;
  warnings: string[];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }
  const vars = parsed.data;
  const warnings: string[] = [];

  let embeddingDim = vars.OPENROUTER_EMBEDDING_DIM;
  if (embeddingDim > MAX_EMBEDDING_DIM) {
    warnings.push(
      `OPENROUTER_EMBEDDING_DIM exceeds Pinecone free plan max (${MAX_EMBEDDING_DIM}). Using ${FALLBACK_EMBEDDING_DIM}.`
    );
    embeddingDim = FALLBACK_EMBEDDING_DIM;
  }

  if (!vars.OPENROUTER_API_KEY) {
    warnings.push("OPENROUTER_API_KEY is not set. Agent calls will fail.");
  }

  const pinecone =
    vars.PINECONE_API_KEY && vars.PINECONE_INDEX
      ? { apiKey: vars.PINECONE_API_KEY, index: vars.PINECONE_INDEX, namespace: vars.PINECONE_NAMESPACE }
      : undefined;

  return {
    openRouter: {
      baseUrl: vars.OPENROUTER_BASE_URL,
      apiKey: vars.OPENROUTER_API_KEY,
      model: vars.OPENROUTER_MODEL,
      embeddingModel: vars.OPENROUTER_EMBEDDING_MODEL,
      embeddingDim
    },
    ...(pinecone ? { pinecone } : {}),
    agentTimeoutMs: vars.AGENT_TIMEOUT_MS,
    agentMaxRetries: vars.AGENT_MAX_RETRIES,
    router: {
      confidenceThreshold: vars.ROUTER_CONFIDENCE_THRESHOLD,
      continuityBonus: vars.ROUTER_CONTINUITY_BONUS
    },
    contextMaxTurns: vars.CONTEXT_MAX_TURNS,
    tracingEnabled: Boolean(vars.LANGFUSE_PUBLIC_KEY && vars.LANGFUSE_SECRET_KEY),
    warnings
  };
}
