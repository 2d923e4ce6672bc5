/**
 * Range of source text within one named file. Lines and columns are 1-based;
 * 0 means the coordinate is unknown.
 */
export class SourceLocation {
  readonly filename: string;
  firstLine: number;
  firstColumn: number;
  lastLine: number;
  lastColumn: number;

  constructor(
    filename: string,
    firstLine = 0,
    firstColumn = 0,
    lastLine = 0,
    lastColumn = 0
  ) {
    this.filename = filename;
    this.firstLine = firstLine;
    this.firstColumn = firstColumn;
    this.lastLine = lastLine;
    this.lastColumn = lastColumn;
    if (this.lastLine < this.firstLine) {
      this.lastLine = this.firstLine;
      this.lastColumn = this.firstColumn;
    }
    if (this.lastLine === this.firstLine && this.lastColumn < this.firstColumn) {
      this.lastColumn = this.firstColumn;
    }
  }

  /**
   * Location starting where `first` starts and ending where `last` ends.
   */
  static span(first: SourceLocation, last: SourceLocation): SourceLocation {
    const location = new SourceLocation(
      first.filename,
      first.firstLine,
      first.firstColumn,
      first.lastLine,
      first.lastColumn
    );
    location.expandToInclude(last.lastLine, last.lastColumn);
    return location;
  }

  /**
   * Grows the end of the range so that it covers the given position. The
   * start of the range is left alone.
   */
  expandToInclude(line: number, column = 1): void {
    if (line <= 0) {
      return;
    }
    if (this.firstLine === 0) {
      this.firstLine = line;
      this.firstColumn = column;
      this.lastLine = line;
      this.lastColumn = column;
      return;
    }
    if (line > this.lastLine) {
      this.lastLine = line;
      this.lastColumn = column;
    } else if (line === this.lastLine && column > this.lastColumn) {
      this.lastColumn = column;
    }
  }

  toString(): string {
    let text = this.filename;
    if (this.firstLine === 0) {
      return text;
    }
    text += `:${this.firstLine}`;
    if (this.firstColumn !== 0) {
      text += `:${this.firstColumn}`;
    }
    if (this.lastLine !== this.firstLine) {
      text += `..${this.lastLine}`;
      if (this.lastColumn !== 0) {
        text += `:${this.lastColumn}`;
      }
    } else if (this.lastColumn !== this.firstColumn) {
      text += `..${this.lastColumn}`;
    }
    return text;
  }
}
