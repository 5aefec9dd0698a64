export class SteplogError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SteplogError";
  }
}

/** A complete frame whose length or payload checksum does not match. */
export class RecordChecksumError extends SteplogError {
  readonly path: string;
  readonly offset: number;
  readonly part: "length" | "payload";

  constructor(path: string, offset: number, part: "length" | "payload") {
    super(`corrupt record ${part} checksum in ${path} at offset ${offset}`);
    this.name = "RecordChecksumError";
    this.path = path;
    this.offset = offset;
    this.part = part;
  }
}

/** A frame that passed both checksums but could not be parsed by its format. */
export class RecordFormatError extends SteplogError {
  readonly path: string;
  readonly offset: number;

  constructor(path: string, offset: number, cause: unknown) {
    super(`malformed record in ${path} at offset ${offset}: ${errorMessage(cause)}`, { cause });
    this.name = "RecordFormatError";
    this.path = path;
    this.offset = offset;
  }
}

/** A bug in a decode capability or in the caller, never a data problem. */
export class InvariantViolationError extends SteplogError {
  constructor(message: string) {
    super(message);
    this.name = "InvariantViolationError";
  }
}

const TRANSIENT_IO_CODES = new Set(["ENOENT", "EBUSY", "EAGAIN", "EACCES", "EPERM", "EMFILE", "ENFILE"]);
const MISSING_PATH_CODES = new Set(["ENOENT", "ENOTDIR"]);

function ioErrorCode(error: unknown): string | null {
  if (!(error instanceof Error)) return null;
  const code = "code" in error ? error.code : undefined;
  return typeof code === "string" ? code : null;
}

export function isTransientIoError(error: unknown): boolean {
  const code = ioErrorCode(error);
  return code !== null && TRANSIENT_IO_CODES.has(code);
}

/** The path itself is gone, as opposed to being briefly unreadable. */
export function isMissingPathError(error: unknown): boolean {
  const code = ioErrorCode(error);
  return code !== null && MISSING_PATH_CODES.has(code);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
