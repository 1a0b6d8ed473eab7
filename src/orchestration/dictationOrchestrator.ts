import type { RecordingSession } from "../audio/recordingSession";
import type { CleanupStage } from "../cleanup/cleanupStage";
import {
  CaptureError,
  CleanupUnavailableError,
  HoldtalkError,
  InsertionError,
  TranscriptionError,
  wrapError,
  type CleanupError
} from "../errors";
import type { KeyEvent, ResolvedKey } from "../hotkey/hotkeySpec";
import { HotkeyTracker } from "../hotkey/hotkeyTracker";
import type { InsertionStage } from "../inject/insertionStage";
import type { TranscriptionStage } from "../stt/transcriptionStage";
import type { AudioBuffer } from "../types/contracts";

export type OrchestratorState = "idle" | "recording";

export type DictationEvent =
  | { type: "recording-started" }
  | { type: "no-audio" }
  | { type: "captured"; runId: number; durationSec: number }
  | { type: "no-speech"; runId: number }
  | { type: "transcribed"; runId: number; text: string; elapsedMs: number }
  | { type: "cleaned"; runId: number; text: string; changed: boolean; elapsedMs: number }
  | { type: "cleanup-skipped"; runId: number; error: CleanupError }
  | { type: "inserted"; runId: number; elapsedMs: number }
  | { type: "run-completed"; runId: number; totalMs: number }
  | { type: "error"; runId?: number; error: HoldtalkError };

interface Dependencies {
  hotkey: ResolvedKey;
  session: RecordingSession;
  transcription: TranscriptionStage;
  cleanup: CleanupStage;
  insertion: InsertionStage;
  onEvent: (event: DictationEvent) => void;
  now?: () => number;
}

/**
 * Push-to-talk state machine. Key handlers only flip state and start
 * promises; each finished recording runs transcription, cleanup and
 * insertion as its own detached task, so runs may overlap.
 */
export class DictationOrchestrator {
  private state: OrchestratorState = "idle";
  private readonly tracker: HotkeyTracker;
  private readonly inFlight = new Set<Promise<void>>();
  private readonly now: () => number;
  private attempt = 0;
  private starting: Promise<void> = Promise.resolve();
  private failedAttempt = 0;
  private lastRunId = 0;
  private warnedCleanupUnavailable = false;

  constructor(private readonly deps: Dependencies) {
    this.tracker = new HotkeyTracker(deps.hotkey, {
      press: () => this.beginRecording(),
      release: () => this.endRecording()
    });
    this.now = deps.now ?? (() => performance.now());
  }

  get currentState(): OrchestratorState {
    return this.state;
  }

  handleKeyDown(event: KeyEvent): void {
    this.tracker.onPress(event);
  }

  handleKeyUp(event: KeyEvent): void {
    this.tracker.onRelease(event);
  }

  /** Failures raised outside a run, such as the microphone dying mid-recording. */
  reportError(error: HoldtalkError): void {
    this.emit({ type: "error", error });
  }

  /** Resolves once every pending stop and run has finished. */
  async settle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight);
    }
  }

  private beginRecording(): void {
    if (this.state !== "idle") {
      return;
    }
    this.state = "recording";
    const attempt = ++this.attempt;
    this.emit({ type: "recording-started" });

    this.starting = this.deps.session.start().catch((error: unknown) => {
      this.failedAttempt = attempt;
      if (attempt === this.attempt && this.state === "recording") {
        this.state = "idle";
      }
      this.emit({ type: "error", error: wrapError(error, CaptureError, "Microphone failed to start") });
    });
    this.track(this.starting);
  }

  private endRecording(): void {
    if (this.state !== "recording") {
      return;
    }
    this.state = "idle";
    // Queued now so it pairs with this press's start, ahead of any later press.
    const stopping = this.deps.session.stop();
    this.track(this.finishRecording(this.attempt, this.starting, stopping));
  }

  private async finishRecording(
    attempt: number,
    started: Promise<void>,
    stopping: Promise<AudioBuffer>
  ): Promise<void> {
    const [audio] = await Promise.all([stopping, started]);

    if (audio.samples.length === 0) {
      // A failed start was already reported.
      if (this.failedAttempt !== attempt) {
        this.emit({ type: "no-audio" });
      }
      return;
    }

    const runId = ++this.lastRunId;
    this.emit({
      type: "captured",
      runId,
      durationSec: audio.samples.length / audio.sampleRateHz
    });
    this.track(this.run(runId, audio));
  }

  private async run(runId: number, audio: AudioBuffer): Promise<void> {
    const runStart = this.now();

    let raw: string;
    const t0 = this.now();
    try {
      raw = await this.deps.transcription.transcribe(audio);
    } catch (error) {
      this.emit({ type: "error", runId, error: wrapError(error, TranscriptionError, "Transcription failed") });
      return;
    }

    if (!raw) {
      this.emit({ type: "no-speech", runId });
      return;
    }
    this.emit({ type: "transcribed", runId, text: raw, elapsedMs: this.now() - t0 });

    let text = raw;
    if (this.deps.cleanup.isEnabled) {
      const t1 = this.now();
      const outcome = await this.deps.cleanup.cleanup(raw);
      text = outcome.text;

      if (outcome.failure) {
        this.reportCleanupFailure(runId, outcome.failure);
      } else if (outcome.applied) {
        this.emit({
          type: "cleaned",
          runId,
          text,
          changed: text !== raw,
          elapsedMs: this.now() - t1
        });
      }
    }

    const t2 = this.now();
    try {
      await this.deps.insertion.insert(text);
    } catch (error) {
      this.emit({ type: "error", runId, error: wrapError(error, InsertionError, "Insertion failed") });
      return;
    }

    this.emit({ type: "inserted", runId, elapsedMs: this.now() - t2 });
    this.emit({ type: "run-completed", runId, totalMs: this.now() - runStart });
  }

  private reportCleanupFailure(runId: number, error: CleanupError): void {
    // Missing credentials do not change between runs.
    if (error instanceof CleanupUnavailableError) {
      if (this.warnedCleanupUnavailable) {
        return;
      }
      this.warnedCleanupUnavailable = true;
    }
    this.emit({ type: "cleanup-skipped", runId, error });
  }

  private track(work: Promise<void>): void {
    const task: Promise<void> = work
      .catch((error: unknown) => {
        this.emit({ type: "error", error: wrapError(error, HoldtalkError, "Unexpected failure") });
      })
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }

  private emit(event: DictationEvent): void {
    this.deps.onEvent(event);
  }
}
