import { execFile } from "node:child_process";
import { randomBytes } from "node:crypto";
import { access, readFile, unlink, writeFile } from "node:fs/promises";
import { cpus, tmpdir } from "node:os";
import { join } from "node:path";
import { encodeWavPcm16, resampleLinear } from "../audio/pcm";
import type { AudioBuffer, ISttProvider, RawTranscript } from "../types/contracts";
import { whichBinary } from "../util/whichBinary";

const WHISPER_SAMPLE_RATE_HZ = 16000;

export type WhisperCliRunner = (
  binaryPath: string,
  args: string[],
  timeoutMs: number
) => Promise<void>;

interface WhisperCppOptions {
  binaryPath: string;
  modelPath: string;
  language: string;
  timeoutMs: number;
  workDir?: string;
  run?: WhisperCliRunner;
}

export class WhisperCppSttProvider implements ISttProvider {
  constructor(private readonly options: WhisperCppOptions) {}

  async transcribe(audio: AudioBuffer): Promise<RawTranscript> {
    if (audio.samples.length === 0) {
      return { text: "" };
    }

    const outputBase = join(
      this.options.workDir ?? tmpdir(),
      `holdtalk-${randomBytes(8).toString("hex")}`
    );
    const wavPath = outputBase + ".wav";
    const txtPath = outputBase + ".txt";

    const args = [
      "-m", this.options.modelPath,
      "-l", this.options.language,
      "--output-txt",
      "--no-timestamps",
      "--no-prints",
      "-of", outputBase,
      "-t", String(Math.min(cpus().length, 4)),
      wavPath,
    ];

    const samples = resampleLinear(audio.samples, audio.sampleRateHz, WHISPER_SAMPLE_RATE_HZ);
    await writeFile(wavPath, encodeWavPcm16(samples, WHISPER_SAMPLE_RATE_HZ));
    const run = this.options.run ?? runWhisperCli;

    try {
      await run(this.options.binaryPath, args, this.options.timeoutMs);

      let text = "";
      try {
        text = (await readFile(txtPath, "utf-8")).trim();
      } catch {
        // whisper-cli writes no txt file when it detects no speech
      }
      return { text: stripNonSpeechMarkers(text) };
    } finally {
      await removeQuietly(wavPath);
      await removeQuietly(txtPath);
    }
  }
}

/** whisper.cpp emits bracketed markers such as [BLANK_AUDIO] for silence. */
export function stripNonSpeechMarkers(text: string): string {
  return text
    .replace(/\[(BLANK_AUDIO|SILENCE|MUSIC|NO SPEECH)\]|\((silence|music|inaudible)\)/gi, " ")
    .replace(/\s+/g, " ")
    .trim();
}

function runWhisperCli(binaryPath: string, args: string[], timeoutMs: number): Promise<void> {
  return new Promise((resolve, reject) => {
    execFile(binaryPath, args, { timeout: timeoutMs }, (error, _stdout, stderr) => {
      if (error) {
        const msg = stderr?.slice(0, 300) || error.message;
        reject(new Error(`whisper-cli failed: ${msg}`));
        return;
      }
      resolve();
    });
  });
}

async function removeQuietly(path: string): Promise<void> {
  try {
    await unlink(path);
  } catch {
    // already gone
  }
}

export async function findWhisperCppBinary(
  settingPath?: string
): Promise<string | undefined> {
  if (settingPath) {
    if (await fileExists(settingPath)) {
      return settingPath;
    }
  }

  for (const name of getWhisperCliNames()) {
    if (await whichBinary(name)) {
      return name;
    }
  }

  return undefined;
}

export function whisperInstallHint(): string {
  switch (process.platform) {
    case "darwin":
      return "brew install whisper-cpp";
    case "linux":
      return "build whisper.cpp or download it from github.com/ggerganov/whisper.cpp/releases";
    default:
      return "download it from github.com/ggerganov/whisper.cpp/releases";
  }
}

function getWhisperCliNames(): string[] {
  if (process.platform === "win32") {
    return ["whisper-cli.exe", "whisper-cpp.exe", "whisper.exe"];
  }
  return ["whisper-cli", "whisper-cpp", "whisper"];
}

function fileExists(path: string): Promise<boolean> {
  return access(path)
    .then(() => true)
    .catch(() => false);
}
