import { describe, expect, it } from "vitest";
import { createDictationApp } from "./app";
import { SettingsSource, readSettings } from "./config/settings";
import { resolveHotkey } from "./hotkey/hotkeySpec";
import { FakeCaptureSource, FakeInjector, FakeSttProvider, RecordingLogger } from "./testing/fakes";

function setup() {
  const settings = readSettings(new SettingsSource([{ hotkey: "f9", "cleanup.enabled": false }]));
  const capture = new FakeCaptureSource();
  const injector = new FakeInjector();
  const logger = new RecordingLogger();
  const app = createDictationApp({ settings, hotkey: resolveHotkey(settings.hotkey) }, logger, {
    capture,
    injector,
    createStt: async () => FakeSttProvider.returning("hello world"),
    createCleanup: undefined
  });
  return { app, capture, injector, logger };
}

const F9 = { kind: "named", key: "f9" } as const;

describe("createDictationApp", () => {
  it("prints the ready line on warm-up", () => {
    const { app, logger } = setup();

    app.warmUp();

    expect(logger.lines).toEqual([
      "info: Ready. Hold f9 to dictate (stt: whisper-cpp, cleanup: off)."
    ]);
  });

  it("reports a dictation run through the logger", async () => {
    const { app, capture, injector, logger } = setup();

    app.orchestrator.handleKeyDown(F9);
    await new Promise((resolve) => setImmediate(resolve));
    capture.push(new Array<number>(8000).fill(0.2));
    app.orchestrator.handleKeyUp(F9);
    await app.orchestrator.settle();

    expect(injector.inserted).toEqual(["hello world"]);
    expect(logger.lines.slice(0, 2)).toEqual([
      "info: Recording...",
      "info: Captured 0.5s of audio. Transcribing..."
    ]);
    expect(logger.lines[2]).toMatch(/^info: Raw \(\d+\.\d{2}s\): hello world$/);
    expect(logger.lines[3]).toMatch(/^info: Done \(\d+\.\d{2}s total\)\. Text inserted\.$/);
  });

  it("reports microphone failures while recording", async () => {
    const { app, capture, logger } = setup();

    app.orchestrator.handleKeyDown(F9);
    await new Promise((resolve) => setImmediate(resolve));
    capture.current?.onError(new Error("device unplugged"));

    expect(logger.lines).toEqual([
      "info: Recording...",
      "error: Error: Microphone stream failed: device unplugged"
    ]);
  });
});
