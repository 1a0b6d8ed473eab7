export interface AudioFormat {
  sampleRateHz: number;
  channels: number;
}

/** Mono float samples in [-1, 1]. A zero-length buffer means nothing was captured. */
export interface AudioBuffer {
  samples: Float32Array;
  sampleRateHz: number;
  channels: 1;
}

export interface RawTranscript {
  text: string;
  confidence?: number;
}

export interface ICaptureStream {
  close(): Promise<void>;
}

export interface ICaptureSource {
  /**
   * Opens the input device. `onChunk` receives interleaved float frames in
   * arrival order; `onError` reports failures after the stream is open.
   */
  openStream(
    format: AudioFormat,
    onChunk: (chunk: Float32Array) => void,
    onError: (error: Error) => void
  ): Promise<ICaptureStream>;
}

export interface ISttProvider {
  transcribe(audio: AudioBuffer): Promise<RawTranscript>;
}

export interface ICleanupProvider {
  readonly name: string;
  cleanup(text: string): Promise<string>;
}

export interface IInputInjector {
  insert(text: string): Promise<void>;
}
