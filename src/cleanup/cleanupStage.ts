import { CleanupError, describeError } from "../errors";
import type { Logger } from "../logging/logger";
import type { ICleanupProvider } from "../types/contracts";
import { LazyResource } from "../util/lazyResource";

export interface CleanupOutcome {
  /** Cleaned text, or the raw text whenever cleanup did not succeed. */
  text: string;
  applied: boolean;
  failure?: CleanupError;
}

/**
 * Optional post-processing of the transcript. Never throws: every failure,
 * including missing credentials, degrades to the raw text.
 */
export class CleanupStage {
  private readonly client: LazyResource<ICleanupProvider> | undefined;

  constructor(
    createProvider: (() => Promise<ICleanupProvider>) | undefined,
    private readonly logger: Logger
  ) {
    this.client = createProvider ? new LazyResource(createProvider) : undefined;
  }

  get isEnabled(): boolean {
    return this.client !== undefined;
  }

  warmUp(): void {
    this.client?.warmUp((error) =>
      this.logger.warn(`Cleanup unavailable: ${describeError(error)}`)
    );
  }

  async cleanup(raw: string): Promise<CleanupOutcome> {
    if (!this.client || !raw.trim()) {
      return { text: raw, applied: false };
    }

    try {
      const provider = await this.client.get();
      const cleaned = (await provider.cleanup(raw)).trim();
      return { text: cleaned || raw, applied: cleaned.length > 0 };
    } catch (error) {
      const failure =
        error instanceof CleanupError
          ? error
          : new CleanupError(`Cleanup failed: ${describeError(error)}`, { cause: error });
      return { text: raw, applied: false, failure };
    }
  }
}
