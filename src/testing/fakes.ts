import type {
  AudioBuffer,
  AudioFormat,
  ICaptureSource,
  ICaptureStream,
  ICleanupProvider,
  IInputInjector,
  ISttProvider,
  RawTranscript
} from "../types/contracts";
import type { Logger } from "../logging/logger";

interface OpenStream {
  format: AudioFormat;
  onChunk: (chunk: Float32Array) => void;
  onError: (error: Error) => void;
  closed: boolean;
}

/** Capture source whose frames are pushed by the test. */
export class FakeCaptureSource implements ICaptureSource {
  readonly streams: OpenStream[] = [];
  openError: Error | undefined;
  /** Chunks delivered while a stream is closing, like a driver flushing its buffer. */
  flushOnClose: Float32Array[] = [];

  async openStream(
    format: AudioFormat,
    onChunk: (chunk: Float32Array) => void,
    onError: (error: Error) => void
  ): Promise<ICaptureStream> {
    if (this.openError) {
      throw this.openError;
    }
    const stream: OpenStream = { format, onChunk, onError, closed: false };
    this.streams.push(stream);
    return {
      close: async () => {
        for (const chunk of this.flushOnClose) {
          stream.onChunk(chunk);
        }
        stream.closed = true;
      }
    };
  }

  get current(): OpenStream | undefined {
    return this.streams.at(-1);
  }

  push(samples: number[]): void {
    const stream = this.current;
    if (!stream || stream.closed) {
      throw new Error("No open stream to push frames into.");
    }
    stream.onChunk(Float32Array.from(samples));
  }
}

export class FakeSttProvider implements ISttProvider {
  readonly calls: AudioBuffer[] = [];

  constructor(private readonly respond: (audio: AudioBuffer) => Promise<RawTranscript>) {}

  static returning(text: string): FakeSttProvider {
    return new FakeSttProvider(async () => ({ text }));
  }

  transcribe(audio: AudioBuffer): Promise<RawTranscript> {
    this.calls.push(audio);
    return this.respond(audio);
  }
}

export class FakeCleanupProvider implements ICleanupProvider {
  readonly name = "fake";
  readonly calls: string[] = [];

  constructor(private readonly respond: (text: string) => Promise<string>) {}

  cleanup(text: string): Promise<string> {
    this.calls.push(text);
    return this.respond(text);
  }
}

export class FakeInjector implements IInputInjector {
  readonly inserted: string[] = [];
  failWith: Error | undefined;

  constructor(private readonly delay?: () => Promise<void>) {}

  async insert(text: string): Promise<void> {
    if (this.delay) {
      await this.delay();
    }
    if (this.failWith) {
      throw this.failWith;
    }
    this.inserted.push(text);
  }
}

export class RecordingLogger implements Logger {
  readonly lines: string[] = [];

  info(message: string): void {
    this.lines.push(`info: ${message}`);
  }

  warn(message: string): void {
    this.lines.push(`warn: ${message}`);
  }

  error(message: string): void {
    this.lines.push(`error: ${message}`);
  }
}

export class Deferred<T = void> {
  readonly promise: Promise<T>;
  resolve: (value: T) => void = () => undefined;
  reject: (error: unknown) => void = () => undefined;

  constructor() {
    this.promise = new Promise<T>((resolve, reject) => {
      this.resolve = resolve;
      this.reject = reject;
    });
  }
}
