// src/errors.ts

/** A startup precondition failed; the process exits before the run loop. */
export class StartupError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StartupError";
  }
}

/** The media engine refused a command or failed to load a file. */
export class EngineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EngineError";
  }
}

export function errMsg(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
