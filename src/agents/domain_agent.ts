import type { RunnableConfig } from "@langchain/core/runnables";
import type { DocumentInterface } from "@langchain/core/documents";
import { ChatPromptTemplate } from "@langchain/core/prompts";
import type { BaseMessage } from "@langchain/core/messages";
import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { StructuredOutputParser } from "langchain/output_parsers";
import { z } from "zod";
import type { AgentId, AgentInvocation, ConversationView, Message } from "./types.js";

export interface RetrieverLike {
  invoke(input: string, config?: RunnableConfig): Promise<DocumentInterface[]>;
}

export interface DomainAgentOptions {
  agent: AgentId;
  name: string;
  styleGuide: string;
}

export interface DomainAgentInput {
  llm: BaseChatModel;
  retriever?: RetrieverLike;
  options: DomainAgentOptions;
}

// The answer-card contract the agents are prompted with. Replies are not
// parsed with this schema: they go through the recovery pipeline instead.
export const answerCardSchema = z.object({
  answer_markdown: z.string().describe("Full answer in GitHub-flavored Markdown. Use tables when comparing values."),
  short_answer: z.string().optional().describe("One-sentence answer, if one exists."),
  sources: z.array(
    z.object({
      title: z.string(),
      url: z.string().optional(),
      breadcrumbs: z.string().optional().describe("Where in the document this came from, e.g. Folder > Section.")
    })
  ),
  follow_up_questions: z.array(z.string()).describe("Up to three follow-up questions the user might click."),
  user_notices: z.array(z.string()).describe("Disclaimers or caveats, e.g. data freshness."),
  related_topics: z.array(z.string()).optional()
});

const answerCardParser = StructuredOutputParser.fromZodSchema(answerCardSchema);

const HISTORY_WINDOW = 6;

export class DomainChatAgent {
  private constructor(
    private readonly llm: BaseChatModel,
    private readonly retriever: RetrieverLike | undefined,
    private readonly options: DomainAgentOptions,
    private readonly prompt: ChatPromptTemplate
  ) {}

  static init({ llm, retriever, options }: DomainAgentInput): DomainChatAgent {
    const prompt = ChatPromptTemplate.fromMessages([
      [
        "system",
        `You are ${options.name}. Follow this style guide: ${options.styleGuide} ` +
          "Ground every reply in the provided context and say you do not know if the answer is missing. " +
          "Respond only with the JSON described by {format_instructions}"
      ],
      [
        "human",
        "Conversation so far:\n{history}\n\nQuestion: {question}\n\nContext:\n{context}"
      ]
    ]);

    return new DomainChatAgent(llm, retriever, options, prompt);
  }

  async invoke(
    message: Message,
    conversation: ConversationView,
    config?: RunnableConfig
  ): Promise<AgentInvocation> {
    const sourceDocs = this.retriever ? await this.retriever.invoke(message.text, config) : [];
    const messages = await this.prompt.formatMessages({
      context: this.formatContext(sourceDocs),
      question: message.text,
      history: this.formatHistory(conversation),
      format_instructions: answerCardParser.getFormatInstructions()
    });
    const llmResponse = await this.llm.invoke(messages, config);
    return {
      output: this.extractAnswer(llmResponse),
      envelope: {
        sources: sourceDocs.map((doc, idx) => {
          const source: unknown = doc.metadata?.source;
          return typeof source === "string" ? source : `chunk-${idx}`;
        })
      }
    };
  }

  private formatHistory(conversation: ConversationView): string {
    const recent = conversation.turns.slice(-HISTORY_WINDOW);
    if (!recent.length) {
      return "No prior turns.";
    }
    return recent
      .map((turn) => `USER (turn ${turn.message.turnIndex}, answered by ${turn.agent}): ${turn.message.text}`)
      .join("\n");
  }

  private formatContext(docs: DocumentInterface[]): string {
    if (!this.retriever) {
      return "No document context for this agent.";
    }
    if (!docs.length) {
      return "No matching documents.";
    }
    return docs
      .map((doc, idx) => {
        const sourceLabel: unknown = doc.metadata?.source;
        return `Source: ${typeof sourceLabel === "string" ? sourceLabel : `chunk-${idx}`}\n${doc.pageContent}`;
      })
      .join("\n\n---\n\n");
  }

  private extractAnswer(message: BaseMessage): string {
    const content = message.content;
    if (typeof content === "string") {
      return content;
    }
    if (Array.isArray(content)) {
      return content
        .map((chunk) => {
          if (typeof chunk === "string") {
            return chunk;
          }
          if ("text" in chunk && typeof chunk.text === "string") {
            return chunk.text;
          }
          return "";
        })
        .join("")
        .trim();
    }
    return "";
  }

  get agent(): AgentId {
    return this.options.agent;
  }

  get name(): string {
    return this.options.name;
  }
}
