/**
 * Canonical Python formatter
 * Parses with tree-sitter, reattaches comments to the statement tree and
 * prints it back with fixed rules. Also usable as a Prettier plugin.
 */

import type {
  AstPath,
  Doc,
  Parser,
  Printer,
  Plugin,
  SupportLanguage,
} from "prettier";
import type { AnnotatedModule } from "./annotated.js";
import { merge } from "./merger.js";
import { DEFAULT_FORMATTER_OPTIONS } from "./options.js";
import type { FormatterOptions } from "./options.js";
import { parse } from "./parser.js";
import { printModule, printModuleDoc } from "./printer.js";

/**
 * Root node handed to Prettier: the annotated module plus the source length
 * for location queries
 */
export interface PythonDocument {
  kind: "Document";
  module: AnnotatedModule;
  length: number;
}

/**
 * Parse and merge comments, without printing
 */
export function annotate(source: string, debug: boolean = false): AnnotatedModule {
  const { tree, comments, lines } = parse(source, debug);
  return merge(tree, comments, lines);
}

/**
 * Reformat Python source text to its canonical form
 * @throws PythonSyntaxError when the source does not parse
 */
export function reformat(source: string, options: Partial<FormatterOptions> = {}): string {
  const resolved = { ...DEFAULT_FORMATTER_OPTIONS, ...options };
  return printModule(annotate(source, resolved.debug), resolved);
}

// Language definition
const languages: SupportLanguage[] = [
  {
    name: "Python",
    parsers: ["python"],
    extensions: [".py"],
    vscodeLanguageIds: ["python"],
  },
];

// Parser definition
const parsers: Record<string, Parser<PythonDocument>> = {
  python: {
    parse(text: string): PythonDocument {
      return { kind: "Document", module: annotate(text), length: text.length };
    },
    astFormat: "python-annotated",
    locStart(): number {
      return 0;
    },
    locEnd(node: PythonDocument): number {
      return node.length;
    },
  },
};

// Printer definition
const printers: Record<string, Printer<PythonDocument>> = {
  "python-annotated": {
    print(path: AstPath<PythonDocument>): Doc {
      return printModuleDoc(path.node.module);
    },
  },
};

const defaultOptions = {
  tabWidth: DEFAULT_FORMATTER_OPTIONS.indentSize,
};

// Export the plugin
const plugin: Plugin<PythonDocument> = {
  languages,
  parsers,
  printers,
  defaultOptions,
};

export default plugin;
export { languages, parsers, printers, defaultOptions };
export { merge } from "./merger.js";
export { parse } from "./parser.js";
export type { ParseResult } from "./parser.js";
export { printModule } from "./printer.js";
export { PythonSyntaxError, CommentOrderError } from "./errors.js";
export { DEFAULT_FORMATTER_OPTIONS } from "./options.js";
export type { FormatterOptions } from "./options.js";
export type * from "./ast.js";
export type * from "./annotated.js";
