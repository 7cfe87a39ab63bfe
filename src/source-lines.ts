/**
 * SourceLines - 1-based line number → raw line text
 *
 * Build once per source. Used by the merger to look at the surface text of
 * clause headers (`else:`, `elif`, `finally:`).
 */

export class SourceLines {
  private readonly lines: string[];

  constructor(source: string) {
    this.lines = source.split(/\r?\n/);
  }

  get count(): number {
    return this.lines.length;
  }

  /**
   * Raw text of a line, or the empty string outside the source
   * @param line One-based line number
   */
  at(line: number): string {
    if (line < 1 || line > this.lines.length) {
      return '';
    }
    return this.lines[line - 1];
  }

  /**
   * Whether a line holds no code: blank or comment only
   */
  isTrivia(line: number): boolean {
    return /^\s*(#.*)?$/.test(this.at(line));
  }
}
