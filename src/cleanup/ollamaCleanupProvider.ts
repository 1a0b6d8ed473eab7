import { request, type Dispatcher } from "undici";
import type { ICleanupProvider } from "../types/contracts";
import { stripWrappingQuotes } from "./cleanupPrompt";

interface OllamaCleanupProviderOptions {
  baseUrl: string;
  model: string;
  prompt: string;
  timeoutMs: number;
  dispatcher?: Dispatcher;
}

const FEW_SHOT: Array<{ role: string; content: string }> = [
  { role: "user", content: "um so I think we should uh meet on tuesday no wednesday" },
  { role: "assistant", content: "I think we should meet on Wednesday." },
  { role: "user", content: "can you send me the the report by end of day" },
  { role: "assistant", content: "Can you send me the report by end of day?" },
];

export class OllamaCleanupProvider implements ICleanupProvider {
  readonly name = "ollama";

  constructor(private readonly options: OllamaCleanupProviderOptions) {}

  async cleanup(text: string): Promise<string> {
    const inputWordCount = text.split(/\s+/).length;
    const maxTokens = Math.max(inputWordCount * 3, 50);

    const messages = [
      { role: "system", content: this.options.prompt },
      ...FEW_SHOT,
      { role: "user", content: text }
    ];

    const res = await request(`${this.options.baseUrl}/api/chat`, {
      method: "POST",
      headers: {
        "content-type": "application/json"
      },
      body: JSON.stringify({
        model: this.options.model,
        messages,
        stream: false,
        options: {
          num_predict: maxTokens,
          temperature: 0.1
        }
      }),
      headersTimeout: this.options.timeoutMs,
      bodyTimeout: this.options.timeoutMs,
      dispatcher: this.options.dispatcher
    });

    if (res.statusCode < 200 || res.statusCode >= 300) {
      await res.body.dump();
      throw new Error(`Ollama cleanup failed (${res.statusCode})`);
    }

    const payload = (await res.body.json()) as {
      message?: { content?: string };
    };
    const cleaned = stripWrappingQuotes(payload.message?.content ?? "");

    // Small local models sometimes answer the dictation instead of cleaning it.
    if (cleaned.length > text.length * 3) {
      return text;
    }

    return cleaned;
  }
}
