import { request, type Dispatcher } from "undici";
import { float32ToPcm16 } from "../audio/pcm";
import type { AudioBuffer, ISttProvider, RawTranscript } from "../types/contracts";

interface HttpSttProviderOptions {
  endpoint: string;
  timeoutMs: number;
  dispatcher?: Dispatcher;
}

/** Posts base64 PCM16 to a local transcription sidecar. */
export class HttpSttProvider implements ISttProvider {
  constructor(private readonly options: HttpSttProviderOptions) {}

  async transcribe(audio: AudioBuffer): Promise<RawTranscript> {
    if (audio.samples.length === 0) {
      return { text: "" };
    }

    const body = {
      audioBase64: float32ToPcm16(audio.samples).toString("base64"),
      sampleRateHz: audio.sampleRateHz,
      channels: audio.channels
    };

    const res = await request(this.options.endpoint, {
      method: "POST",
      headers: {
        "content-type": "application/json"
      },
      body: JSON.stringify(body),
      headersTimeout: this.options.timeoutMs,
      bodyTimeout: this.options.timeoutMs,
      dispatcher: this.options.dispatcher
    });

    if (res.statusCode < 200 || res.statusCode >= 300) {
      await res.body.dump();
      throw new Error(`HTTP STT failed (${res.statusCode})`);
    }

    const payload: unknown = await res.body.json();
    if (!payload || typeof payload !== "object") {
      return { text: "" };
    }
    const { text, confidence } = payload as { text?: unknown; confidence?: unknown };
    return {
      text: typeof text === "string" ? text : "",
      confidence: typeof confidence === "number" ? confidence : undefined
    };
  }
}
