import { Mutex } from "async-mutex";
import { CaptureError, describeError } from "../errors";
import type {
  AudioBuffer,
  AudioFormat,
  ICaptureSource,
  ICaptureStream
} from "../types/contracts";
import { concatChunks, downmixToMono } from "./pcm";

export type SessionState = "idle" | "armed";

interface RecordingSessionOptions {
  format: AudioFormat;
  /** Stream failures reported after the stream opened. */
  onCaptureError?: (error: CaptureError) => void;
}

export function emptyAudioBuffer(sampleRateHz: number): AudioBuffer {
  return { samples: new Float32Array(0), sampleRateHz, channels: 1 };
}

/**
 * One microphone recording at a time. The capture callback appends chunks;
 * start/stop reset, drain and tear down the stream under a single lock.
 */
export class RecordingSession {
  private state: SessionState = "idle";
  private chunks: Float32Array[] = [];
  private stream: ICaptureStream | undefined;
  // Chunks from a stream whose generation is no longer current are discarded.
  private generation = 0;
  private readonly lock = new Mutex();

  constructor(
    private readonly capture: ICaptureSource,
    private readonly options: RecordingSessionOptions
  ) {}

  get currentState(): SessionState {
    return this.state;
  }

  start(): Promise<void> {
    return this.lock.runExclusive(async () => {
      if (this.state !== "idle") {
        return;
      }

      this.chunks = [];
      const generation = ++this.generation;

      try {
        this.stream = await this.capture.openStream(
          this.options.format,
          (chunk) => this.append(generation, chunk),
          (error) => this.reportStreamError(generation, error)
        );
      } catch (error) {
        this.generation++;
        throw error instanceof CaptureError
          ? error
          : new CaptureError(`Microphone failed to start: ${describeError(error)}`, {
              cause: error
            });
      }

      this.state = "armed";
    });
  }

  stop(): Promise<AudioBuffer> {
    return this.lock.runExclusive(async () => {
      const { sampleRateHz, channels } = this.options.format;
      if (this.state !== "armed") {
        return emptyAudioBuffer(sampleRateHz);
      }

      this.state = "idle";
      const stream = this.stream;
      this.stream = undefined;

      try {
        // Chunks flushed while the stream closes still belong to this recording.
        await stream?.close();
      } catch (error) {
        this.options.onCaptureError?.(
          new CaptureError(`Microphone did not close cleanly: ${describeError(error)}`, {
            cause: error
          })
        );
      }

      this.generation++;
      const chunks = this.chunks;
      this.chunks = [];

      return {
        samples: downmixToMono(concatChunks(chunks), channels),
        sampleRateHz,
        channels: 1
      };
    });
  }

  private append(generation: number, chunk: Float32Array): void {
    if (generation !== this.generation) {
      return;
    }
    this.chunks.push(chunk);
  }

  private reportStreamError(generation: number, error: Error): void {
    if (generation !== this.generation) {
      return;
    }
    this.options.onCaptureError?.(
      error instanceof CaptureError
        ? error
        : new CaptureError(`Microphone stream failed: ${describeError(error)}`, { cause: error })
    );
  }
}
