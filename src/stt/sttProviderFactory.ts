import type { HoldtalkSettings } from "../config/settings";
import { scopedLogger, type Logger } from "../logging/logger";
import type { ISttProvider } from "../types/contracts";
import { HttpSttProvider } from "./httpSttProvider";
import { ModelManager } from "./modelManager";
import {
  WhisperCppSttProvider,
  findWhisperCppBinary,
  whisperInstallHint
} from "./whisperCppSttProvider";

/**
 * Builds the configured speech engine. For whisper.cpp this locates the
 * binary and downloads the model, which is why it runs lazily.
 */
export async function createSttProvider(
  settings: HoldtalkSettings,
  logger: Logger
): Promise<ISttProvider> {
  const { stt } = settings;
  const log = scopedLogger(logger, "stt");

  if (stt.provider === "http") {
    return new HttpSttProvider({
      endpoint: stt.httpEndpoint,
      timeoutMs: stt.timeoutMs
    });
  }

  const binaryPath = await findWhisperCppBinary(stt.whisperCppPath || undefined);
  if (!binaryPath) {
    throw new Error(`whisper-cpp not found. Install it: ${whisperInstallHint()}`);
  }

  let modelPath = stt.modelPath;
  if (!modelPath) {
    const models = new ModelManager({ storageDir: stt.modelDir, logger: log });
    modelPath = await models.ensureModel(stt.model);
  }

  log.info(`Using ${binaryPath} with model ${modelPath}`);

  return new WhisperCppSttProvider({
    binaryPath,
    modelPath,
    language: stt.language,
    timeoutMs: stt.timeoutMs
  });
}
