/**
 * Fatal errors surfaced to the caller of an audit run
 */

/**
 * An input export is missing, unreadable, or not valid JSON
 */
export class InputReadError extends Error {
  readonly path: string;

  constructor(path: string, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "InputReadError";
    this.path = path;
  }
}

/**
 * The output artifact could not be written
 */
export class OutputWriteError extends Error {
  readonly path: string;

  constructor(path: string, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "OutputWriteError";
    this.path = path;
  }
}

/** Extracts a printable message from anything thrown */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
