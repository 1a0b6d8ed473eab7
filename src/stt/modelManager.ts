import { createWriteStream } from "node:fs";
import { access, mkdir, rename, unlink } from "node:fs/promises";
import { join } from "node:path";
import { pipeline } from "node:stream/promises";
import { request, type Dispatcher } from "undici";
import type { Logger } from "../logging/logger";

const MODEL_BASE_URL =
  "https://huggingface.co/ggerganov/whisper.cpp/resolve/main";

const MAX_REDIRECTS = 5;

const MODELS: Record<string, { filename: string; sizeMB: number }> = {
  "tiny.en": { filename: "ggml-tiny.en.bin", sizeMB: 75 },
  tiny: { filename: "ggml-tiny.bin", sizeMB: 75 },
  "base.en": { filename: "ggml-base.en.bin", sizeMB: 142 },
  base: { filename: "ggml-base.bin", sizeMB: 142 },
  "small.en": { filename: "ggml-small.en.bin", sizeMB: 466 },
  small: { filename: "ggml-small.bin", sizeMB: 466 },
  "medium.en": { filename: "ggml-medium.en.bin", sizeMB: 1500 },
  medium: { filename: "ggml-medium.bin", sizeMB: 1500 },
  "large-v3": { filename: "ggml-large-v3.bin", sizeMB: 3100 },
  "large-v3-turbo": { filename: "ggml-large-v3-turbo.bin", sizeMB: 1600 },
};

interface ModelManagerOptions {
  storageDir: string;
  logger: Logger;
  baseUrl?: string;
  dispatcher?: Dispatcher;
}

export class ModelManager {
  constructor(private readonly options: ModelManagerOptions) {}

  static knownModels(): string[] {
    return Object.keys(MODELS);
  }

  /** Returns the local path of the model, downloading it on first use. */
  async ensureModel(modelName: string): Promise<string> {
    const info = MODELS[modelName];
    if (!info) {
      throw new Error(
        `Unknown model "${modelName}". Available: ${ModelManager.knownModels().join(", ")}`
      );
    }

    const modelPath = join(this.options.storageDir, info.filename);

    if (await fileExists(modelPath)) {
      return modelPath;
    }

    await mkdir(this.options.storageDir, { recursive: true });

    const baseUrl = this.options.baseUrl ?? MODEL_BASE_URL;
    await this.download(`${baseUrl}/${info.filename}`, modelPath, info.filename, info.sizeMB);

    return modelPath;
  }

  private async download(
    url: string,
    destPath: string,
    filename: string,
    sizeMB: number
  ): Promise<void> {
    const { logger, dispatcher } = this.options;
    logger.info(`Downloading ${filename} (~${sizeMB}MB)...`);

    let target = url;
    let res = await request(target, { method: "GET", dispatcher });
    for (let hop = 0; isRedirect(res.statusCode) && hop < MAX_REDIRECTS; hop++) {
      const location = res.headers.location;
      await res.body.dump();
      if (typeof location !== "string") {
        throw new Error(`Download failed: redirect without location from ${target}`);
      }
      target = new URL(location, target).toString();
      res = await request(target, { method: "GET", dispatcher });
    }

    if (res.statusCode < 200 || res.statusCode >= 300) {
      await res.body.dump();
      throw new Error(`Download failed: HTTP ${res.statusCode}`);
    }

    const totalBytes = Number(res.headers["content-length"] ?? 0);
    let downloaded = 0;
    let lastReportedPct = 0;

    // Written under a temporary name so an interrupted download is not mistaken for a model.
    const partialPath = destPath + ".part";

    const reportProgress = async function* (source: AsyncIterable<Buffer>): AsyncGenerator<Buffer> {
      for await (const bytes of source) {
        downloaded += bytes.length;
        if (totalBytes > 0) {
          const pct = Math.floor((downloaded / totalBytes) * 100);
          if (pct >= lastReportedPct + 10) {
            lastReportedPct = pct - (pct % 10);
            logger.info(`${filename}: ${lastReportedPct}%`);
          }
        }
        yield bytes;
      }
    };

    try {
      await pipeline(res.body, reportProgress, createWriteStream(partialPath));
    } catch (error) {
      await unlink(partialPath).catch(() => undefined);
      throw error;
    }

    await rename(partialPath, destPath);
    logger.info(`Saved ${filename} to ${destPath}`);
  }
}

function isRedirect(statusCode: number): boolean {
  return statusCode >= 300 && statusCode < 400;
}

function fileExists(path: string): Promise<boolean> {
  return access(path)
    .then(() => true)
    .catch(() => false);
}
