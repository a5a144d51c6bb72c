/**
 * Errors raised while lexing or parsing a line of G-code.
 */
export class GCodeError extends Error {
  /** 1-based line of the program text, 0 when parsed outside a program */
  readonly sourceLine: number;

  constructor(message: string, sourceLine: number) {
    super(message);
    this.name = "GCodeError";
    this.sourceLine = sourceLine;
  }
}

/**
 * Malformed text: an unexpected character, a letter without a number, an
 * unterminated comment.
 */
export class GCodeSyntaxError extends GCodeError {
  readonly column: number;

  constructor(message: string, column: number, sourceLine = 0) {
    super(message, sourceLine);
    this.name = "GCodeSyntaxError";
    this.column = column;
  }

  /** Copy of this error attributed to a program line */
  atLine(sourceLine: number): GCodeSyntaxError {
    return new GCodeSyntaxError(this.message, this.column, sourceLine);
  }
}

/**
 * Well-formed text that GRBL cannot execute: unsupported words, conflicting
 * motion words, arcs with no valid geometry.
 */
export class GCodeDomainError extends GCodeError {
  constructor(message: string, sourceLine: number) {
    super(message, sourceLine);
    this.name = "GCodeDomainError";
  }
}
