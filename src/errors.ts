/** Base class for every error raised while parsing or building a DUID. */
export class DuidError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** The input string is not an even run of hex digits (colons aside). */
export class InvalidHexEncodingError extends DuidError {
  readonly input: string;

  constructor(input: string, reason: string) {
    super(`Invalid hex string '${input}': ${reason}`);
    this.input = input;
  }
}

/**
 * The byte layout does not form a valid DUID: empty, longer than the
 * protocol maximum, or too short for the declared type.
 */
export class MalformedDuidError extends DuidError {
  /** Byte length of the offending input, when there is one. */
  readonly length?: number;

  constructor(message: string, length?: number) {
    super(message);
    this.length = length;
  }
}
