import { describe, expect, it } from "vitest";
import { CleanupError, TranscriptionError } from "../errors";
import { RecordingLogger } from "../testing/fakes";
import { StatusReporter } from "./statusReporter";

describe("StatusReporter", () => {
  it("prints the lines of a successful run", () => {
    const logger = new RecordingLogger();
    const reporter = new StatusReporter(logger);

    reporter.handle({ type: "recording-started" });
    reporter.handle({ type: "captured", runId: 1, durationSec: 2 });
    reporter.handle({ type: "transcribed", runId: 1, text: "um hello world", elapsedMs: 420 });
    reporter.handle({ type: "cleaned", runId: 1, text: "Hello world.", changed: true, elapsedMs: 800 });
    reporter.handle({ type: "inserted", runId: 1, elapsedMs: 35 });
    reporter.handle({ type: "run-completed", runId: 1, totalMs: 1300 });

    expect(logger.lines).toEqual([
      "info: Recording...",
      "info: Captured 2.0s of audio. Transcribing...",
      "info: Raw (0.42s): um hello world",
      "info: Cleaned (0.80s): Hello world.",
      "info: Done (1.30s total). Text inserted."
    ]);
  });

  it("omits the cleaned line when cleanup changed nothing", () => {
    const logger = new RecordingLogger();

    new StatusReporter(logger).handle({
      type: "cleaned",
      runId: 1,
      text: "Hello.",
      changed: false,
      elapsedMs: 100
    });

    expect(logger.lines).toEqual([]);
  });

  it("reports skipped cleanup, missing audio and failures", () => {
    const logger = new RecordingLogger();
    const reporter = new StatusReporter(logger);

    reporter.handle({ type: "no-audio" });
    reporter.handle({ type: "no-speech", runId: 2 });
    reporter.handle({ type: "cleanup-skipped", runId: 3, error: new CleanupError("Cleanup failed: timeout") });
    reporter.handle({ type: "error", runId: 4, error: new TranscriptionError("Transcription failed: model crashed") });

    expect(logger.lines).toEqual([
      "warn: No audio captured.",
      "info: (no speech detected)",
      "warn: Cleanup skipped: Cleanup failed: timeout",
      "error: Error: Transcription failed: model crashed"
    ]);
  });
});
