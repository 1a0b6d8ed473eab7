import { request, type Dispatcher } from "undici";
import type { ICleanupProvider } from "../types/contracts";
import { stripWrappingQuotes } from "./cleanupPrompt";

const ANTHROPIC_VERSION = "2023-06-01";

interface AnthropicCleanupProviderOptions {
  apiKey: string;
  baseUrl: string;
  model: string;
  prompt: string;
  timeoutMs: number;
  dispatcher?: Dispatcher;
}

interface MessagesResponse {
  content?: Array<{ type?: string; text?: string }>;
  error?: { message?: string };
}

export class AnthropicCleanupProvider implements ICleanupProvider {
  readonly name = "anthropic";

  constructor(private readonly options: AnthropicCleanupProviderOptions) {}

  async cleanup(text: string): Promise<string> {
    const res = await request(`${this.options.baseUrl}/v1/messages`, {
      method: "POST",
      headers: {
        "content-type": "application/json",
        "x-api-key": this.options.apiKey,
        "anthropic-version": ANTHROPIC_VERSION
      },
      body: JSON.stringify({
        model: this.options.model,
        max_tokens: 4096,
        system: this.options.prompt,
        messages: [{ role: "user", content: text }]
      }),
      headersTimeout: this.options.timeoutMs,
      bodyTimeout: this.options.timeoutMs,
      dispatcher: this.options.dispatcher
    });

    const payload = (await res.body.json()) as MessagesResponse;

    if (res.statusCode < 200 || res.statusCode >= 300) {
      const detail = payload.error?.message ?? "no error message";
      throw new Error(`Anthropic cleanup failed (${res.statusCode}): ${detail}`);
    }

    const block = payload.content?.find((item) => item.type === "text");
    return stripWrappingQuotes(block?.text ?? "");
  }
}
