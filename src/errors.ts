/**
 * Error classes raised by the formatter
 */

/**
 * The parser produced ERROR or MISSING nodes; the source is not valid Python
 */
export class PythonSyntaxError extends Error {
  line: number;
  column: number;
  errorCount: number;
  constructor(line: number, column: number, errorCount: number) {
    super(`Invalid Python syntax at line ${line}, column ${column} (${errorCount} error(s))`);
    this.line = line;
    this.column = column;
    this.errorCount = errorCount;
    this.name = 'PythonSyntaxError';
  }
}

/**
 * Comment tokens were not handed over in (line, column) order
 */
export class CommentOrderError extends Error {
  line: number;
  column: number;
  constructor(line: number, column: number) {
    super(`Comment at line ${line}, column ${column} is out of order`);
    this.line = line;
    this.column = column;
    this.name = 'CommentOrderError';
  }
}
