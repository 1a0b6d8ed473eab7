#!/usr/bin/env node
import { Command } from "commander";
import { createDictationApp } from "./app";
import { toSettingsOverrides, type CliOptions } from "./cliOptions";
import { loadSettings } from "./config/loadSettings";
import { ConfigError, describeError } from "./errors";
import { UiohookListener } from "./hotkey/uiohookListener";
import { createConsoleLogger } from "./logging/logger";

const logger = createConsoleLogger();

async function run(opts: CliOptions): Promise<void> {
  const loaded = await loadSettings({
    configPath: opts.config,
    overrides: toSettingsOverrides(opts)
  });
  if (loaded.configPath) {
    logger.info(`Using config ${loaded.configPath}`);
  }

  const app = createDictationApp(loaded, logger);
  const listener = new UiohookListener({
    onKeyDown: (event) => app.orchestrator.handleKeyDown(event),
    onKeyUp: (event) => app.orchestrator.handleKeyUp(event)
  });

  // In-flight runs are abandoned on exit.
  const shutdown = (): void => {
    listener.stop();
    logger.info("Stopped.");
    process.exit(0);
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  app.warmUp();
  listener.start();
}

const program = new Command()
  .name("holdtalk")
  .description("Hold a key, speak, release: the transcript is pasted where the cursor is.")
  .option("-c, --config <path>", "settings file (default: ./holdtalk.yaml)")
  .option("--model <name>", "whisper.cpp model, e.g. base.en or small.en")
  .option("--hotkey <key>", "push-to-talk key: ctrl, alt, shift, cmd, f1-f12 or a letter, digit or punctuation key")
  .option("--no-cleanup", "insert the raw transcript without cleanup")
  .option("--stt <provider>", "speech engine: whisper-cpp or http")
  .action(async () => {
    await run(program.opts<CliOptions>());
  });

program.parseAsync().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    logger.error(error.message);
  } else {
    logger.error(`Failed to start: ${describeError(error)}`);
  }
  process.exit(1);
});
