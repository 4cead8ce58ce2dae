/**
 * Base class of every error raised by this library.
 */
export class SphereError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** The header block cannot be parsed. */
export class MalformedHeaderError extends SphereError {
  /** 1-based header line the problem was found on, when it is tied to one. */
  public readonly line?: number;

  constructor(message: string, line?: number) {
    super(line === undefined ? message : `${message} (header line ${line})`);
    this.line = line;
  }
}

/** The serialized header does not fit in the header block. */
export class HeaderOverflowError extends SphereError {
  constructor(
    public readonly requiredBytes: number,
    public readonly headerSize: number
  ) {
    super(`Serialized header needs ${requiredBytes} bytes but the header block holds ${headerSize}`);
  }
}

/** Fewer sample bytes are available than the operation needs. */
export class TruncatedDataError extends SphereError {
  constructor(
    public readonly expectedBytes: number,
    public readonly actualBytes: number,
    context = 'sample data'
  ) {
    super(`Truncated ${context}: expected ${expectedBytes} bytes, got ${actualBytes}`);
  }
}

/** Sample width outside 1, 2 or 4 bytes. */
export class UnsupportedWidthError extends SphereError {
  constructor(public readonly width: number) {
    super(`Unsupported sample width: ${width} bytes (expected 1, 2 or 4)`);
  }
}

/** A parameter value breaks one of the format's constraints. */
export class InvalidParameterError extends SphereError {}

/** The session is not open: never opened, already closed, or opened twice. */
export class SessionClosedError extends SphereError {}

/** The operation does not exist in the session's mode. */
export class ModeError extends SphereError {}

/** The byte stream already belongs to another open session. */
export class StreamInUseError extends SphereError {}
