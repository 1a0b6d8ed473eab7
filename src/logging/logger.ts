export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createConsoleLogger(tag = "holdtalk"): Logger {
  return {
    info: (message) => console.log(`[${tag}] ${message}`),
    warn: (message) => console.warn(`[${tag}] [warn] ${message}`),
    error: (message) => console.error(`[${tag}] [error] ${message}`)
  };
}

/** Prefixes every line with a component name, e.g. `[stt] Model loaded.` */
export function scopedLogger(logger: Logger, scope: string): Logger {
  return {
    info: (message) => logger.info(`[${scope}] ${message}`),
    warn: (message) => logger.warn(`[${scope}] ${message}`),
    error: (message) => logger.error(`[${scope}] ${message}`)
  };
}
