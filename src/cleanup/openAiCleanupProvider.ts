import OpenAI from "openai";
import type { ICleanupProvider } from "../types/contracts";
import { stripWrappingQuotes } from "./cleanupPrompt";

interface OpenAiCleanupProviderOptions {
  apiKey: string;
  baseUrl: string;
  model: string;
  prompt: string;
  timeoutMs: number;
}

export class OpenAiCleanupProvider implements ICleanupProvider {
  readonly name = "openai";
  private readonly client: OpenAI;

  constructor(private readonly options: OpenAiCleanupProviderOptions) {
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: normalizeChatBaseUrl(options.baseUrl),
      timeout: options.timeoutMs,
      maxRetries: 0
    });
  }

  async cleanup(text: string): Promise<string> {
    const completion = await this.client.chat.completions.create({
      model: this.options.model,
      temperature: 0,
      messages: [
        { role: "system", content: this.options.prompt },
        { role: "user", content: text }
      ]
    });

    return stripWrappingQuotes(completion.choices[0]?.message?.content ?? "");
  }
}

export function normalizeChatBaseUrl(apiUrl: string): string {
  // The SDK appends /chat/completions itself.
  return apiUrl.replace(/\/chat\/completions\/?$/, "").replace(/\/+$/, "");
}
