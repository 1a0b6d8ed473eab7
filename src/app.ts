import { RecorderCaptureSource } from "./audio/recorderCaptureSource";
import { RecordingSession } from "./audio/recordingSession";
import { cleanupProviderFactory } from "./cleanup/cleanupProviderFactory";
import { CleanupStage } from "./cleanup/cleanupStage";
import type { LoadedSettings } from "./config/loadSettings";
import { describeHotkey } from "./hotkey/hotkeySpec";
import { ClipboardPasteInjector } from "./inject/clipboardPasteInjector";
import { InsertionStage } from "./inject/insertionStage";
import { scopedLogger, type Logger } from "./logging/logger";
import { DictationOrchestrator } from "./orchestration/dictationOrchestrator";
import { StatusReporter } from "./orchestration/statusReporter";
import { createSttProvider } from "./stt/sttProviderFactory";
import { TranscriptionStage } from "./stt/transcriptionStage";
import type { ICaptureSource, ICleanupProvider, IInputInjector, ISttProvider } from "./types/contracts";

/** Collaborators that can be swapped out; everything else is built from settings. */
export interface AppCollaborators {
  capture?: ICaptureSource;
  injector?: IInputInjector;
  createStt?: () => Promise<ISttProvider>;
  createCleanup?: (() => Promise<ICleanupProvider>) | undefined;
}

export interface DictationApp {
  orchestrator: DictationOrchestrator;
  /** Starts engine initialization in the background and prints the ready line. */
  warmUp(): void;
}

export function createDictationApp(
  loaded: LoadedSettings,
  logger: Logger,
  collaborators: AppCollaborators = {}
): DictationApp {
  const { settings, hotkey } = loaded;

  const capture = collaborators.capture ?? new RecorderCaptureSource();
  const injector =
    collaborators.injector ??
    new ClipboardPasteInjector({
      trailingSpace: settings.insert.trailingSpace,
      logger: scopedLogger(logger, "insert")
    });
  const createStt = collaborators.createStt ?? (() => createSttProvider(settings, logger));
  const createCleanup =
    "createCleanup" in collaborators
      ? collaborators.createCleanup
      : cleanupProviderFactory(settings.cleanup);

  const transcription = new TranscriptionStage(createStt, logger);
  const cleanup = new CleanupStage(createCleanup, logger);
  const reporter = new StatusReporter(logger);

  const session = new RecordingSession(capture, {
    format: settings.audio,
    onCaptureError: (error) => orchestrator.reportError(error)
  });

  const orchestrator: DictationOrchestrator = new DictationOrchestrator({
    hotkey,
    session,
    transcription,
    cleanup,
    insertion: new InsertionStage(injector),
    onEvent: reporter.handle
  });

  return {
    orchestrator,
    warmUp() {
      transcription.warmUp();
      cleanup.warmUp();

      const cleanupNote = cleanup.isEnabled ? `cleanup: ${settings.cleanup.provider}` : "cleanup: off";
      logger.info(
        `Ready. Hold ${describeHotkey(hotkey)} to dictate (stt: ${settings.stt.provider}, ${cleanupNote}).`
      );
    }
  };
}
