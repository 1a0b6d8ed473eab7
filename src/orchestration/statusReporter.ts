import type { Logger } from "../logging/logger";
import type { DictationEvent } from "./dictationOrchestrator";

function seconds(ms: number): string {
  return `${(ms / 1000).toFixed(2)}s`;
}

/** Prints one status line per orchestrator event. */
export class StatusReporter {
  constructor(private readonly logger: Logger) {}

  readonly handle = (event: DictationEvent): void => {
    switch (event.type) {
      case "recording-started":
        this.logger.info("Recording...");
        break;
      case "no-audio":
        this.logger.warn("No audio captured.");
        break;
      case "captured":
        this.logger.info(`Captured ${event.durationSec.toFixed(1)}s of audio. Transcribing...`);
        break;
      case "no-speech":
        this.logger.info("(no speech detected)");
        break;
      case "transcribed":
        this.logger.info(`Raw (${seconds(event.elapsedMs)}): ${event.text}`);
        break;
      case "cleaned":
        if (event.changed) {
          this.logger.info(`Cleaned (${seconds(event.elapsedMs)}): ${event.text}`);
        }
        break;
      case "cleanup-skipped":
        this.logger.warn(`Cleanup skipped: ${event.error.message}`);
        break;
      case "inserted":
        break;
      case "run-completed":
        this.logger.info(`Done (${seconds(event.totalMs)} total). Text inserted.`);
        break;
      case "error":
        this.logger.error(`Error: ${event.error.message}`);
        break;
    }
  };
}
