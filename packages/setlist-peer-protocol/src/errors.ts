/**
 * Base class for every error raised by Setlist Peer. `code` is stable and
 * safe to branch on; the message is for humans.
 */
export class SetlistError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Catalog file missing, unreadable, malformed, or could not be written. */
export class PersistenceError extends SetlistError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("PERSISTENCE", message, options);
  }
}

/** Operator typed something the coordinator cannot act on. */
export class CommandInputError extends SetlistError {
  constructor(message: string) {
    super("COMMAND_INPUT", message);
  }
}

/** The node could not be brought up; the process should exit. */
export class StartupFatalError extends SetlistError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("STARTUP_FATAL", message, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
