import { log, errorMessage } from "../logging.js";
import type { ChatMessage } from "../types/research.js";
import type { TextGenerator } from "./llm-client.js";

const SYSTEM_CONTEXT = `You are a helpful company research assistant. Your role is to:
1. Help users research companies
2. Generate comprehensive account plans
3. Answer questions about the research process
4. Guide users through using the system

Be friendly, professional, and concise.`;

// Earlier turns kept in the prompt
const HISTORY_TURNS = 6;

const REQUEST_PHRASES = [
  "find information on",
  "find information about",
  "find information",
  "tell me about",
  "research on",
  "research",
  "search for",
  "search",
  "about",
  "on",
];

/**
 * Pull the company out of a request like "tell me about Acme Corp".
 * Only leading request phrases are removed, on word boundaries.
 */
export function extractCompanyName(query: string): string {
  let name = query.trim().replace(/[?.!]+$/, "").trim();
  let changed = true;
  while (changed) {
    changed = false;
    for (const phrase of REQUEST_PHRASES) {
      const pattern = new RegExp(`^${phrase.replace(/ /g, "\\s+")}\\b\\s*`, "i");
      if (pattern.test(name)) {
        name = name.replace(pattern, "");
        changed = true;
      }
    }
  }
  return name.trim();
}

export function buildChatPrompt(history: readonly ChatMessage[], message: string): string {
  const recent = history.slice(-HISTORY_TURNS)
    .map(turn => `${turn.role === "user" ? "User" : "Assistant"}: ${turn.content}`)
    .join("\n");

  return `${SYSTEM_CONTEXT}\n\n${recent ? `${recent}\n` : ""}User: ${message}\n\nAssistant:`;
}

export class ChatAgent {
  constructor(
    private readonly generator: TextGenerator,
    private readonly maxOutputTokens: number
  ) {}

  /**
   * Answer one message. The exchange is appended to `history`, failures
   * included, as the user saw them.
   */
  async reply(history: ChatMessage[], message: string): Promise<string> {
    let reply: string;
    try {
      reply = (await this.generator.generate(buildChatPrompt(history, message), this.maxOutputTokens)).trim();
    } catch (error) {
      reply = `I encountered an error: ${errorMessage(error)}\n\nPlease try again.`;
      log("Chat reply failed", "error", { message: errorMessage(error) });
    }

    history.push({ role: "user", content: message }, { role: "assistant", content: reply });
    return reply;
  }
}
