export type OmnoteErrorKind =
  | "source-unavailable"
  | "source-malformed"
  | "state-corrupt"
  | "persistence-failure"
  | "watch-failure";

/**
 * Base for every failure this package reports. None of them is allowed to
 * end the process: callers log them and fall back to a safe default.
 */
export class OmnoteError extends Error {
  readonly kind: OmnoteErrorKind;

  constructor(kind: OmnoteErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = new.target.name;
  }
}

/** A theme source file is missing or unreadable. */
export class SourceUnavailableError extends OmnoteError {
  constructor(readonly path: string, options?: { cause?: unknown }) {
    super("source-unavailable", `source unavailable: ${path}`, options);
  }
}

/** A theme source could not be parsed, or yielded no usable colors. */
export class SourceMalformedError extends OmnoteError {
  constructor(readonly path: string, reason: string, options?: { cause?: unknown }) {
    super("source-malformed", `source malformed: ${path}: ${reason}`, options);
  }
}

export class StateCorruptError extends OmnoteError {
  constructor(readonly path: string, reason: string, options?: { cause?: unknown }) {
    super("state-corrupt", `state file corrupt: ${path}: ${reason}`, options);
  }
}

/** A state or autosave write failed (disk full, permissions, ...). */
export class PersistenceError extends OmnoteError {
  constructor(readonly path: string, options?: { cause?: unknown }) {
    super("persistence-failure", `write failed: ${path}: ${describeCause(options?.cause)}`, options);
  }
}

export class WatchError extends OmnoteError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("watch-failure", message, options);
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

export function errorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
}
