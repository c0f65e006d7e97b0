/**
 * Error thrown when a package line has fewer tokens than its variant needs,
 * or when no package name can be recovered from it.
 */
export class MalformedLineError extends Error {
  /** Section the line came from, empty when unknown */
  readonly section: string;
  /** Index of the line within the section's lines, -1 when unknown */
  readonly lineNumber: number;
  readonly line: string;
  readonly reason: string;

  constructor(reason: string, line: string, section = "", lineNumber = -1) {
    const where = section
      ? ` (section ${section}, line ${lineNumber})`
      : lineNumber >= 0
        ? ` (line ${lineNumber})`
        : "";
    super(`malformed package line${where}: ${reason}: ${line}`);
    this.name = "MalformedLineError";
    this.reason = reason;
    this.line = line;
    this.section = section;
    this.lineNumber = lineNumber;
    Object.setPrototypeOf(this, MalformedLineError.prototype);
  }

  /**
   * Copy of this error located at a section and line index.
   */
  locate(section: string, lineNumber: number): MalformedLineError {
    return new MalformedLineError(this.reason, this.line, section, lineNumber);
  }
}
