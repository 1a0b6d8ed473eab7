import { API_KEY_ENV, type CleanupSettings } from "../config/settings";
import { CleanupUnavailableError } from "../errors";
import type { ICleanupProvider } from "../types/contracts";
import { AnthropicCleanupProvider } from "./anthropicCleanupProvider";
import { OllamaCleanupProvider } from "./ollamaCleanupProvider";
import { OpenAiCleanupProvider } from "./openAiCleanupProvider";

/** Returns undefined when cleanup is switched off. */
export function cleanupProviderFactory(
  settings: CleanupSettings
): (() => Promise<ICleanupProvider>) | undefined {
  if (!settings.enabled) {
    return undefined;
  }
  return async () => createCleanupProvider(settings);
}

export function createCleanupProvider(settings: CleanupSettings): ICleanupProvider {
  const { provider, model, prompt, timeoutMs, baseUrl } = settings;

  if (provider === "ollama") {
    return new OllamaCleanupProvider({ baseUrl, model, prompt, timeoutMs });
  }

  const apiKey = settings.apiKey.trim();
  if (!apiKey) {
    throw new CleanupUnavailableError(
      `No API key for ${provider} cleanup (set cleanup.apiKey or ${API_KEY_ENV[provider]}).`
    );
  }

  if (provider === "openai") {
    return new OpenAiCleanupProvider({ apiKey, baseUrl, model, prompt, timeoutMs });
  }
  return new AnthropicCleanupProvider({ apiKey, baseUrl, model, prompt, timeoutMs });
}
