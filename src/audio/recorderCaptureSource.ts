import { spawn } from "node:child_process";
import type { Readable } from "node:stream";
import { CaptureError } from "../errors";
import type { AudioFormat, ICaptureSource, ICaptureStream } from "../types/contracts";
import { whichBinary } from "../util/whichBinary";
import { pcm16ToFloat32 } from "./pcm";

export type RecorderBackend = "sox" | "arecord" | "ffmpeg";

export interface RecorderInfo {
  backend: RecorderBackend;
  binaryPath: string;
}

/** The parts of a ChildProcess the capture stream uses. */
export interface RecorderProcess {
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
  on(event: "error", listener: (err: Error) => void): unknown;
  on(event: "close", listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
}

interface RecorderCaptureSourceOptions {
  detect?: () => Promise<RecorderInfo | undefined>;
  spawnRecorder?: (binaryPath: string, args: string[]) => RecorderProcess;
  /** How long a recorder may take to exit after SIGTERM before it is killed. */
  killGraceMs?: number;
}

const DEFAULT_KILL_GRACE_MS = 2000;

/**
 * Microphone capture through a command-line recorder writing raw
 * signed 16-bit little-endian PCM to stdout.
 */
export class RecorderCaptureSource implements ICaptureSource {
  private detectedRecorder?: RecorderInfo;
  private detectionDone = false;

  constructor(private readonly options: RecorderCaptureSourceOptions = {}) {}

  async openStream(
    format: AudioFormat,
    onChunk: (chunk: Float32Array) => void,
    onError: (error: Error) => void
  ): Promise<ICaptureStream> {
    if (!this.detectionDone) {
      this.detectedRecorder = await (this.options.detect ?? detectRecorder)();
      this.detectionDone = true;
    }

    const recorder = this.detectedRecorder;
    if (!recorder) {
      throw new CaptureError(getInstallInstructions());
    }

    const spawnRecorder = this.options.spawnRecorder ?? spawnRecorderProcess;
    const proc = spawnRecorder(recorder.binaryPath, buildRecorderArgs(recorder.backend, format));
    return new RecorderStream(
      proc,
      recorder.backend,
      this.options.killGraceMs ?? DEFAULT_KILL_GRACE_MS,
      onChunk,
      onError
    );
  }
}

class RecorderStream implements ICaptureStream {
  private stopRequested = false;
  private exited = false;
  // A chunk boundary can split a 16-bit sample.
  private carry: Buffer = Buffer.alloc(0);
  private readonly closed: Promise<void>;

  constructor(
    private readonly proc: RecorderProcess,
    backend: RecorderBackend,
    private readonly killGraceMs: number,
    onChunk: (chunk: Float32Array) => void,
    onError: (error: Error) => void
  ) {
    let stderrData = "";

    proc.stdout?.on("data", (data: Buffer) => {
      const bytes = this.carry.length > 0 ? Buffer.concat([this.carry, data]) : data;
      const usable = bytes.length - (bytes.length % 2);
      this.carry = bytes.subarray(usable);
      if (usable > 0) {
        onChunk(pcm16ToFloat32(bytes.subarray(0, usable)));
      }
    });

    proc.stderr?.on("data", (chunk: Buffer) => {
      stderrData += chunk.toString();
    });

    this.closed = new Promise<void>((resolve) => {
      proc.on("error", (err) => {
        this.exited = true;
        onError(new CaptureError(`Recording failed to start: ${err.message}`, { cause: err }));
        resolve();
      });

      proc.on("close", (code) => {
        this.exited = true;
        if (!isExpectedExit(backend, this.stopRequested, code)) {
          const msg = stderrData.slice(0, 300).trim();
          onError(new CaptureError(`Recording exited with code ${code}: ${msg}`));
        }
        resolve();
      });
    });
  }

  /**
   * Stops the recorder and resolves once it has exited and flushed stdout.
   * A recorder still running after the grace period gets SIGKILL.
   */
  async close(): Promise<void> {
    if (this.exited) {
      return;
    }
    this.stopRequested = true;
    this.proc.kill("SIGTERM");

    const escalation = setTimeout(() => {
      if (!this.exited) {
        this.proc.kill("SIGKILL");
      }
    }, this.killGraceMs);
    try {
      await this.closed;
    } finally {
      clearTimeout(escalation);
    }
  }
}

function spawnRecorderProcess(binaryPath: string, args: string[]): RecorderProcess {
  return spawn(binaryPath, args, { stdio: ["ignore", "pipe", "pipe"] });
}

export interface RecorderPlatform {
  /** Tried in order; each backend's binary has the backend's name. */
  candidates: RecorderBackend[];
  /** ffmpeg's `-f` and `-i` for the default microphone. */
  ffmpegInput: [format: string, device: string];
  installHint: string;
}

const PLATFORMS: Partial<Record<NodeJS.Platform, RecorderPlatform>> = {
  darwin: {
    candidates: ["sox", "ffmpeg"],
    ffmpegInput: ["avfoundation", ":default"],
    installHint: "Install SoX: brew install sox"
  },
  linux: {
    candidates: ["arecord", "sox", "ffmpeg"],
    ffmpegInput: ["pulse", "default"],
    installHint: "Install arecord (alsa-utils) or SoX: sudo apt install alsa-utils"
  },
  win32: {
    candidates: ["ffmpeg", "sox"],
    ffmpegInput: ["dshow", "audio=default"],
    installHint: "Install FFmpeg: winget install ffmpeg"
  }
};

const OTHER_PLATFORM: RecorderPlatform = {
  candidates: ["sox", "ffmpeg"],
  ffmpegInput: ["pulse", "default"],
  installHint: "Install SoX or FFmpeg."
};

export function recorderPlatform(platform: NodeJS.Platform = process.platform): RecorderPlatform {
  return PLATFORMS[platform] ?? OTHER_PLATFORM;
}

// Exit codes a recorder uses when it stops on SIGTERM instead of dying by signal.
const INTERRUPT_EXIT_CODES: Record<RecorderBackend, number[]> = {
  sox: [],
  arecord: [1],
  ffmpeg: [255]
};

function isExpectedExit(backend: RecorderBackend, stopRequested: boolean, code: number | null): boolean {
  if (code === 0) return true;
  if (!stopRequested) return false;
  return code === null || INTERRUPT_EXIT_CODES[backend].includes(code);
}

export function buildRecorderArgs(
  backend: RecorderBackend,
  format: AudioFormat,
  platform: NodeJS.Platform = process.platform
): string[] {
  const rate = String(format.sampleRateHz);
  const channels = String(format.channels);
  switch (backend) {
    case "sox":
      return [
        "-q", "-d",
        "-t", "raw", "-r", rate, "-c", channels, "-b", "16", "-e", "signed-integer", "-L",
        "-"
      ];
    case "arecord":
      return ["-q", "-f", "S16_LE", "-r", rate, "-c", channels, "-t", "raw", "-"];
    case "ffmpeg": {
      const [inputFormat, device] = recorderPlatform(platform).ffmpegInput;
      return [
        "-loglevel", "error",
        "-f", inputFormat, "-i", device,
        "-ar", rate, "-ac", channels, "-f", "s16le", "-"
      ];
    }
  }
}

async function detectRecorder(): Promise<RecorderInfo | undefined> {
  for (const backend of recorderPlatform().candidates) {
    if (await whichBinary(backend)) {
      return { backend, binaryPath: backend };
    }
  }
  return undefined;
}

function getInstallInstructions(): string {
  return `No audio recorder found. ${recorderPlatform().installHint}`;
}
