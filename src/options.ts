export interface FormatterOptions {
  /** Spaces per nesting level */
  indentSize: number;
  /** Log parser diagnostics to the console */
  debug: boolean;
}

export const DEFAULT_FORMATTER_OPTIONS: FormatterOptions = {
  indentSize: 4,
  debug: false,
};
