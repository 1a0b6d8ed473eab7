import { TranscriptionError, describeError } from "../errors";
import type { Logger } from "../logging/logger";
import type { AudioBuffer, ISttProvider } from "../types/contracts";
import { LazyResource } from "../util/lazyResource";

export class TranscriptionStage {
  private readonly engine: LazyResource<ISttProvider>;

  constructor(
    createProvider: () => Promise<ISttProvider>,
    private readonly logger: Logger
  ) {
    this.engine = new LazyResource(createProvider);
  }

  warmUp(): void {
    this.engine.warmUp((error) =>
      this.logger.warn(`Speech engine warm-up failed: ${describeError(error)}`)
    );
  }

  /** Returns the trimmed transcript; an empty string means no speech. */
  async transcribe(audio: AudioBuffer): Promise<string> {
    if (audio.samples.length === 0) {
      return "";
    }

    let provider: ISttProvider;
    try {
      provider = await this.engine.get();
    } catch (error) {
      throw new TranscriptionError(`Speech engine failed to load: ${describeError(error)}`, {
        cause: error
      });
    }

    try {
      const raw = await provider.transcribe(audio);
      return raw.text.trim();
    } catch (error) {
      throw new TranscriptionError(`Transcription failed: ${describeError(error)}`, {
        cause: error
      });
    }
  }
}
