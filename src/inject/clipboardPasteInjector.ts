import { spawn } from "node:child_process";
import type { Readable, Writable } from "node:stream";
import type { Logger } from "../logging/logger";
import type { IInputInjector } from "../types/contracts";

/** Runs a command to completion, optionally writing `input` to its stdin. */
export type CommandRunner = (command: string, args: string[], input?: string) => Promise<void>;

/** The parts of a ChildProcess the runner uses. */
export interface CommandProcess {
  readonly stdin: Writable | null;
  readonly stderr: Readable | null;
  on(event: "error", listener: (err: Error) => void): unknown;
  on(event: "close", listener: (code: number | null) => void): unknown;
}

export type SpawnCommand = (command: string, args: string[], pipeInput: boolean) => CommandProcess;

interface ClipboardPasteInjectorOptions {
  trailingSpace: boolean;
  logger: Logger;
  platform?: NodeJS.Platform;
  env?: NodeJS.ProcessEnv;
  run?: CommandRunner;
}

interface PasteCommands {
  copy: [string, string[]];
  paste?: [string, string[]];
}

/**
 * Copies the text to the system clipboard and sends the platform paste
 * keystroke to the focused window. Platforms without a paste tool get
 * clipboard-only insertion and a notice.
 */
export class ClipboardPasteInjector implements IInputInjector {
  private readonly run: CommandRunner;
  private readonly platform: NodeJS.Platform;
  private readonly env: NodeJS.ProcessEnv;

  constructor(private readonly options: ClipboardPasteInjectorOptions) {
    this.run = options.run ?? runCommand;
    this.platform = options.platform ?? process.platform;
    this.env = options.env ?? process.env;
  }

  async insert(text: string): Promise<void> {
    const textToInsert = this.options.trailingSpace ? text + " " : text;
    const commands = this.commandsForPlatform();

    const [copyCmd, copyArgs] = commands.copy;
    await this.run(copyCmd, copyArgs, textToInsert);

    if (!commands.paste) {
      this.options.logger.warn(
        `Text copied to clipboard (auto-paste not supported on ${this.platform}). Press Ctrl+V to paste.`
      );
      return;
    }

    const [pasteCmd, pasteArgs] = commands.paste;
    await this.run(pasteCmd, pasteArgs);
  }

  private commandsForPlatform(): PasteCommands {
    switch (this.platform) {
      case "darwin":
        return {
          copy: ["pbcopy", []],
          paste: [
            "osascript",
            ["-e", 'tell application "System Events" to keystroke "v" using command down']
          ]
        };
      case "linux":
        if (this.env.WAYLAND_DISPLAY) {
          return {
            copy: ["wl-copy", []],
            paste: ["wtype", ["-M", "ctrl", "-k", "v", "-m", "ctrl"]]
          };
        }
        return {
          copy: ["xclip", ["-selection", "clipboard"]],
          paste: ["xdotool", ["key", "--clearmodifiers", "ctrl+v"]]
        };
      case "win32":
        return { copy: ["clip", []] };
      default:
        return { copy: ["xclip", ["-selection", "clipboard"]] };
    }
  }
}

export function runCommand(
  command: string,
  args: string[],
  input?: string,
  spawnCommand: SpawnCommand = spawnProcess
): Promise<void> {
  return new Promise((resolve, reject) => {
    const proc = spawnCommand(command, args, input !== undefined);
    let stderrData = "";
    // A tool that exits before reading its input breaks the pipe.
    let inputError: Error | undefined;

    proc.on("error", (err) => {
      reject(new Error(`${command} failed to start: ${err.message}`));
    });

    proc.stderr?.on("data", (chunk: Buffer) => {
      stderrData += chunk.toString();
    });

    proc.stdin?.on("error", (err) => {
      inputError = err;
    });

    proc.on("close", (code) => {
      if (code !== 0) {
        const msg = stderrData.slice(0, 300).trim();
        reject(new Error(`${command} exited with code ${code}${msg ? `: ${msg}` : ""}`));
        return;
      }
      if (inputError) {
        reject(new Error(`${command} did not accept input: ${inputError.message}`));
        return;
      }
      resolve();
    });

    if (input !== undefined && proc.stdin) {
      proc.stdin.end(input, "utf8");
    }
  });
}

function spawnProcess(command: string, args: string[], pipeInput: boolean): CommandProcess {
  return spawn(command, args, { stdio: [pipeInput ? "pipe" : "ignore", "ignore", "pipe"] });
}
