export class HoldtalkError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Invalid or unreadable settings. Fatal at startup. */
export class ConfigError extends HoldtalkError {}

export class InvalidHotkeyError extends ConfigError {
  constructor(readonly spec: string) {
    super(
      `Unknown hotkey: ${JSON.stringify(spec)}. Use ctrl, alt, shift, cmd, f1-f12, a letter, a digit or a punctuation key.`
    );
  }
}

export class CaptureError extends HoldtalkError {}

export class TranscriptionError extends HoldtalkError {}

export class CleanupError extends HoldtalkError {}

/** Cleanup is enabled but cannot run (no credentials). The run keeps the raw text. */
export class CleanupUnavailableError extends CleanupError {}

export class InsertionError extends HoldtalkError {}

export function describeError(error: unknown): string {
  const statusCode = extractStatusCode(error);
  const body = sanitizeForLog(extractErrorBody(error)).slice(0, 300);
  if (statusCode !== undefined && !body.includes(String(statusCode))) {
    return `${body || "request failed"} (HTTP ${statusCode})`;
  }
  return body || "unknown error";
}

/** Wraps anything thrown at a stage boundary into the stage's error kind. */
export function wrapError<T extends HoldtalkError>(
  error: unknown,
  ErrorKind: new (message: string, options?: { cause?: unknown }) => T,
  prefix: string
): HoldtalkError {
  if (error instanceof HoldtalkError) {
    return error;
  }
  return new ErrorKind(`${prefix}: ${describeError(error)}`, { cause: error });
}

export function sanitizeForLog(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

function extractStatusCode(error: unknown): number | undefined {
  if (!error || typeof error !== "object") return undefined;

  const record = error as Record<string, unknown>;
  if (typeof record.status === "number") return record.status;
  if (typeof record.statusCode === "number") return record.statusCode;

  const resp = record.response;
  if (resp && typeof resp === "object") {
    const status = (resp as Record<string, unknown>).status;
    if (typeof status === "number") return status;
  }

  return undefined;
}

function extractErrorBody(error: unknown): string {
  if (!error || typeof error !== "object") return String(error);

  const record = error as Record<string, unknown>;
  if (typeof record.message === "string" && record.message.trim()) return record.message;

  for (const key of ["error", "data", "cause"]) {
    const v = record[key];
    if (!v) continue;
    try {
      const s = typeof v === "string" ? v : JSON.stringify(v);
      if (s && s !== "{}") return s;
    } catch {
      // unserializable detail, try the next key
    }
  }

  return String(error);
}
