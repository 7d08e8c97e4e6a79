import Anthropic from "@anthropic-ai/sdk";
import OpenAI from "openai";
import Groq from "groq-sdk";
import { GoogleGenerativeAI } from "@google/generative-ai";
import { log } from "../logging.js";
import { PipelineError } from "../types/errors.js";
import type { ConcreteProvider, LLMConfig, LLMProvider } from "../utils/config-loader.js";

/**
 * The text-generation collaborator every pipeline stage talks to.
 * Implementations may throw; the stages turn that into failure values.
 */
export interface TextGenerator {
  generate(prompt: string, maxOutputTokens: number): Promise<string>;
}

export interface LLMClientOptions {
  provider?: LLMProvider;
  models?: Partial<Record<ConcreteProvider, string>>;
  env?: NodeJS.ProcessEnv;
}

const DEFAULT_MODELS: Record<ConcreteProvider, string> = {
  groq: "llama-3.3-70b-versatile",
  gemini: "gemini-2.5-flash",
  custom: "gpt-4",
  anthropic: "claude-sonnet-4-20250514",
  openai: "gpt-4-turbo-preview",
};

// Auto mode: Groq → Gemini → Custom → Anthropic → OpenAI
const AUTO_ORDER: readonly ConcreteProvider[] = ["groq", "gemini", "custom", "anthropic", "openai"];

function usableKey(value: string | undefined, placeholder: string): string | null {
  return value && value !== placeholder ? value : null;
}

export class LLMClient implements TextGenerator {
  private groqClient: Groq | null = null;
  private geminiClient: GoogleGenerativeAI | null = null;
  private customClient: OpenAI | null = null;
  private anthropicClient: Anthropic | null = null;
  private openaiClient: OpenAI | null = null;

  private readonly provider: LLMProvider;
  private readonly models: Record<ConcreteProvider, string>;

  constructor(options: LLMClientOptions = {}) {
    this.provider = options.provider ?? "auto";
    this.models = { ...DEFAULT_MODELS, ...options.models };
    this.initializeClients(options.env ?? process.env);
  }

  static fromConfig(config: LLMConfig, env: NodeJS.ProcessEnv = process.env): LLMClient {
    return new LLMClient({ provider: config.provider, models: config.models, env });
  }

  private initializeClients(env: NodeJS.ProcessEnv): void {
    const groqKey = usableKey(env.GROQ_API_KEY, "your-groq-api-key");
    if (groqKey) {
      this.groqClient = new Groq({ apiKey: groqKey });
      log("Groq client initialized (default provider)", "info");
    }

    const googleKey = usableKey(env.GOOGLE_API_KEY ?? env.GEMINI_API_KEY, "your-google-api-key");
    if (googleKey) {
      this.geminiClient = new GoogleGenerativeAI(googleKey);
      log("Gemini client initialized (fallback #1)", "info");
    }

    // OpenAI-compatible endpoint, e.g. a corporate gateway
    const customBaseUrl = env.OPENAI_BASE_URL;
    const openaiKey = usableKey(env.OPENAI_API_KEY, "your-openai-api-key");
    if (customBaseUrl && openaiKey) {
      this.customClient = new OpenAI({ apiKey: openaiKey, baseURL: customBaseUrl });
      log("Custom OpenAI-compatible client initialized (fallback #2)", "info", { baseURL: customBaseUrl });
    }

    const anthropicKey = usableKey(env.ANTHROPIC_API_KEY, "your-anthropic-api-key");
    if (anthropicKey) {
      this.anthropicClient = new Anthropic({ apiKey: anthropicKey });
      log("Anthropic client initialized (fallback #3)", "info");
    }

    // Plain OpenAI only when no custom base URL claims the key
    if (openaiKey && !customBaseUrl) {
      this.openaiClient = new OpenAI({ apiKey: openaiKey });
      log("OpenAI client initialized (fallback #4)", "info");
    }

    if (this.availableProviders().length === 0) {
      log("No LLM clients available - check API keys", "warning");
    }
  }

  availableProviders(): ConcreteProvider[] {
    return AUTO_ORDER.filter(provider => this.hasClient(provider));
  }

  private hasClient(provider: ConcreteProvider): boolean {
    switch (provider) {
      case "groq":
        return this.groqClient !== null;
      case "gemini":
        return this.geminiClient !== null;
      case "custom":
        return this.customClient !== null;
      case "anthropic":
        return this.anthropicClient !== null;
      case "openai":
        return this.openaiClient !== null;
    }
  }

  private resolveProvider(): ConcreteProvider {
    if (this.provider !== "auto") {
      if (!this.hasClient(this.provider)) {
        throw new PipelineError("PROVIDER_UNAVAILABLE", `${this.provider} client not available`);
      }
      return this.provider;
    }

    const [first] = this.availableProviders();
    if (!first) {
      throw new PipelineError("PROVIDER_UNAVAILABLE", "No available LLM provider");
    }
    return first;
  }

  async generate(prompt: string, maxOutputTokens: number): Promise<string> {
    const provider = this.resolveProvider();
    log(`Generating with ${provider}`, "debug", {
      promptLength: prompt.length,
      maxOutputTokens,
      model: this.models[provider],
    });

    try {
      switch (provider) {
        case "groq":
          return await this.generateWithGroq(prompt, maxOutputTokens);
        case "gemini":
          return await this.generateWithGemini(prompt, maxOutputTokens);
        case "custom":
          return await this.generateWithOpenAICompatible(this.customClient, "custom", prompt, maxOutputTokens);
        case "anthropic":
          return await this.generateWithAnthropic(prompt, maxOutputTokens);
        case "openai":
          return await this.generateWithOpenAICompatible(this.openaiClient, "openai", prompt, maxOutputTokens);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log(`${provider} generation failed`, "error", { message });
      throw new PipelineError("COLLABORATOR_FAILURE", `${provider} generation failed: ${message}`, {
        provider,
        model: this.models[provider],
      });
    }
  }

  private async generateWithGroq(prompt: string, maxOutputTokens: number): Promise<string> {
    if (!this.groqClient) {
      throw new PipelineError("PROVIDER_UNAVAILABLE", "Groq client not initialized");
    }

    const response = await this.groqClient.chat.completions.create({
      model: this.models.groq,
      max_tokens: maxOutputTokens,
      messages: [{ role: "user", content: prompt }],
      temperature: 0.7,
    });

    return response.choices[0]?.message?.content ?? "";
  }

  private async generateWithGemini(prompt: string, maxOutputTokens: number): Promise<string> {
    if (!this.geminiClient) {
      throw new PipelineError("PROVIDER_UNAVAILABLE", "Gemini client not initialized");
    }

    const model = this.geminiClient.getGenerativeModel({
      model: this.models.gemini,
      generationConfig: { maxOutputTokens },
    });
    const response = await model.generateContent(prompt);
    return response.response.text();
  }

  private async generateWithAnthropic(prompt: string, maxOutputTokens: number): Promise<string> {
    if (!this.anthropicClient) {
      throw new PipelineError("PROVIDER_UNAVAILABLE", "Anthropic client not initialized");
    }

    const response = await this.anthropicClient.messages.create({
      model: this.models.anthropic,
      max_tokens: maxOutputTokens,
      messages: [{ role: "user", content: prompt }],
    });

    return response.content
      .map(block => (block.type === "text" ? block.text : ""))
      .join("");
  }

  private async generateWithOpenAICompatible(
    client: OpenAI | null,
    provider: "custom" | "openai",
    prompt: string,
    maxOutputTokens: number
  ): Promise<string> {
    if (!client) {
      throw new PipelineError("PROVIDER_UNAVAILABLE", `${provider} client not initialized`);
    }

    const response = await client.chat.completions.create({
      model: this.models[provider],
      messages: [{ role: "user", content: prompt }],
      max_tokens: maxOutputTokens,
    });

    return response.choices[0]?.message?.content ?? "";
  }
}
