import { mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { AudioBuffer } from "../types/contracts";
import {
  WhisperCppSttProvider,
  stripNonSpeechMarkers,
  type WhisperCliRunner
} from "./whisperCppSttProvider";

const audio: AudioBuffer = {
  samples: Float32Array.from([0, 0.5, -0.5]),
  sampleRateHz: 16000,
  channels: 1
};

function argAfter(args: string[], flag: string): string {
  const index = args.indexOf(flag);
  return index >= 0 ? args[index + 1] : "";
}

describe("WhisperCppSttProvider", () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), "holdtalk-test-"));
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it("runs whisper-cli on a temp wav and returns the txt output", async () => {
    let wavHeader = "";
    let invokedArgs: string[] = [];
    const run: WhisperCliRunner = async (_binary, args) => {
      invokedArgs = args;
      const wav = await readFile(args[args.length - 1]);
      wavHeader = wav.toString("ascii", 0, 4);
      await writeFile(argAfter(args, "-of") + ".txt", " hello world\n");
    };
    const provider = new WhisperCppSttProvider({
      binaryPath: "whisper-cli",
      modelPath: "/models/ggml-base.en.bin",
      language: "en",
      timeoutMs: 1000,
      workDir,
      run
    });

    const result = await provider.transcribe(audio);

    expect(result).toEqual({ text: "hello world" });
    expect(wavHeader).toBe("RIFF");
    expect(argAfter(invokedArgs, "-m")).toBe("/models/ggml-base.en.bin");
    expect(argAfter(invokedArgs, "-l")).toBe("en");
    expect(invokedArgs).toContain("--output-txt");
    expect(await readdir(workDir)).toEqual([]);
  });

  it("returns empty text when whisper-cli writes no output", async () => {
    const provider = new WhisperCppSttProvider({
      binaryPath: "whisper-cli",
      modelPath: "model.bin",
      language: "en",
      timeoutMs: 1000,
      workDir,
      run: async () => undefined
    });

    await expect(provider.transcribe(audio)).resolves.toEqual({ text: "" });
  });

  it("removes temp files when whisper-cli fails", async () => {
    const provider = new WhisperCppSttProvider({
      binaryPath: "whisper-cli",
      modelPath: "model.bin",
      language: "en",
      timeoutMs: 1000,
      workDir,
      run: async () => {
        throw new Error("whisper-cli failed: invalid model");
      }
    });

    await expect(provider.transcribe(audio)).rejects.toThrow("whisper-cli failed: invalid model");
    expect(await readdir(workDir)).toEqual([]);
  });
});

describe("stripNonSpeechMarkers", () => {
  it("removes silence markers", () => {
    expect(stripNonSpeechMarkers("[BLANK_AUDIO]")).toBe("");
    expect(stripNonSpeechMarkers("hello (music) there")).toBe("hello there");
  });

  it("keeps ordinary bracketed text", () => {
    expect(stripNonSpeechMarkers("see [section two]")).toBe("see [section two]");
  });
});
