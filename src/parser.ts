/**
 * Tree-sitter parser wrapper for Python
 * Uses native tree-sitter Node bindings and adapts the concrete syntax tree
 * into the closed syntax union of ./ast.ts, collecting comments separately
 */

import Parser from "tree-sitter";
import { createRequire } from "module";
import type {
  Alias,
  Argument,
  ComparisonOperator,
  Comment,
  Comprehension,
  DictItem,
  ExceptHandler,
  Expression,
  If,
  Module,
  Parameter,
  Parameters,
  Position,
  StringLiteral,
  StringSegment,
  SyntaxBlock,
  SyntaxStatement,
  WithItem,
  BinaryOperator,
  UnaryOperator,
} from "./ast.js";
import { PythonSyntaxError } from "./errors.js";
import { SourceLines } from "./source-lines.js";

// The grammar is a CommonJS module, so we need createRequire in ESM context
const require = createRequire(import.meta.url);
const PythonGrammar = require("tree-sitter-python");

const parser = new Parser();
parser.setLanguage(PythonGrammar);

/**
 * Concrete syntax node read off a TreeCursor. The cursor reports the type
 * and field of every node, extras such as comments included.
 */
interface SyntaxNode {
  type: string;
  isNamed: boolean;
  isMissing: boolean;
  fieldName?: string;
  startIndex: number;
  endIndex: number;
  line: number;
  column: number;
  text: string;
  children: SyntaxNode[];
}

/**
 * Parse result: the statement tree, the comment tokens in source order and
 * the raw source lines
 */
export interface ParseResult {
  /** null when the source holds no statements */
  tree: Module | null;
  comments: Comment[];
  lines: SourceLines;
}

const BINARY_OPERATORS: ReadonlySet<string> = new Set([
  "+", "-", "*", "@", "/", "//", "%", "**", "<<", ">>", "&", "|", "^",
]);

const UNARY_OPERATORS: ReadonlySet<string> = new Set(["+", "-", "~"]);

const COMPARISON_OPERATORS: ReadonlySet<string> = new Set([
  "<", "<=", "==", "!=", ">=", ">", "<>", "in", "not in", "is", "is not",
]);

function isBinaryOperator(op: string): op is BinaryOperator {
  return BINARY_OPERATORS.has(op);
}

function isUnaryOperator(op: string): op is UnaryOperator {
  return UNARY_OPERATORS.has(op);
}

function isComparisonOperator(op: string): op is ComparisonOperator {
  return COMPARISON_OPERATORS.has(op);
}

/**
 * Convert the tree under a cursor to our node structure
 */
function convertNode(cursor: Parser.TreeCursor, source: string): SyntaxNode {
  const node: SyntaxNode = {
    type: cursor.nodeType,
    isNamed: cursor.nodeIsNamed,
    isMissing: cursor.nodeIsMissing,
    fieldName: cursor.currentFieldName || undefined,
    startIndex: cursor.startIndex,
    endIndex: cursor.endIndex,
    line: cursor.startPosition.row + 1,
    column: cursor.startPosition.column,
    text: source.slice(cursor.startIndex, cursor.endIndex),
    children: [],
  };
  if (cursor.gotoFirstChild()) {
    do {
      node.children.push(convertNode(cursor, source));
    } while (cursor.gotoNextSibling());
    cursor.gotoParent();
  }
  return node;
}

/**
 * Count error and missing nodes, remembering the first one, and collect
 * comment tokens in document order
 */
function scan(root: SyntaxNode): { errorCount: number; firstError?: Position; comments: Comment[] } {
  let errorCount = 0;
  let firstError: Position | undefined;
  const comments: Comment[] = [];
  const visit = (node: SyntaxNode): void => {
    if (node.type === "ERROR" || node.isMissing) {
      errorCount++;
      firstError ??= position(node);
    } else if (node.type === "comment") {
      comments.push({ text: node.text, ...position(node) });
    }
    node.children.forEach(visit);
  };
  visit(root);
  return { errorCount, firstError, comments };
}

function position(node: SyntaxNode): Position {
  return { line: node.line, column: node.column };
}

/** Named children other than comments */
function named(node: SyntaxNode): SyntaxNode[] {
  return node.children.filter((child) => child.isNamed && child.type !== "comment");
}

/** First non-comment child carrying a field */
function fieldOf(node: SyntaxNode, fieldName: string): SyntaxNode | null {
  return node.children.find((child) => child.fieldName === fieldName && child.type !== "comment") ?? null;
}

/** Named, non-comment nodes carrying a field (commas can carry it too) */
function namedField(node: SyntaxNode, fieldName: string): SyntaxNode[] {
  return node.children.filter(
    (child) => child.fieldName === fieldName && child.isNamed && child.type !== "comment",
  );
}

function hasToken(node: SyntaxNode, token: string): boolean {
  return node.children.some((child) => child.type === token);
}

function unsupported(variant: string): Expression {
  return { kind: "Unsupported", variant };
}

/**
 * Converts tree-sitter nodes into syntax nodes. Holds the source text for
 * the pieces of string literals that are taken verbatim.
 */
class SyntaxConverter {
  constructor(private readonly source: string) {}

  statements(container: SyntaxNode | null): SyntaxBlock {
    return container ? named(container).map((child) => this.statement(child)) : [];
  }

  private statement(node: SyntaxNode): SyntaxStatement {
    const at = position(node);
    switch (node.type) {
      case "expression_statement":
        return this.expressionStatement(node, at);

      case "return_statement": {
        const [value] = named(node);
        return { kind: "Return", ...at, value: value ? this.expression(value) : undefined };
      }

      case "delete_statement": {
        const [target] = named(node);
        const targets = !target ? [] : target.type === "expression_list" ? named(target) : [target];
        return { kind: "Delete", ...at, targets: targets.map((t) => this.expression(t)) };
      }

      case "pass_statement":
        return { kind: "Pass", ...at };

      case "break_statement":
        return { kind: "Break", ...at };

      case "continue_statement":
        return { kind: "Continue", ...at };

      case "raise_statement": {
        const cause = fieldOf(node, "cause");
        const exc = named(node).find((child) => !cause || child.startIndex !== cause.startIndex);
        return {
          kind: "Raise",
          ...at,
          exc: exc ? this.expression(exc) : undefined,
          cause: cause ? this.expression(cause) : undefined,
        };
      }

      case "global_statement":
        return { kind: "Global", ...at, names: named(node).map((child) => child.text) };

      case "nonlocal_statement":
        return { kind: "Nonlocal", ...at, names: named(node).map((child) => child.text) };

      case "assert_statement": {
        const [test, msg] = named(node);
        return {
          kind: "Assert",
          ...at,
          test: test ? this.expression(test) : unsupported("assert_statement"),
          msg: msg ? this.expression(msg) : undefined,
        };
      }

      case "import_statement":
        return { kind: "Import", ...at, names: namedField(node, "name").map((n) => this.alias(n)) };

      case "import_from_statement":
      case "future_import_statement":
        return this.importFrom(node, at);

      case "if_statement":
        return this.ifStatement(node);

      case "for_statement": {
        const elseClause = fieldOf(node, "alternative");
        return {
          kind: "For",
          ...at,
          isAsync: hasToken(node, "async"),
          target: this.field(node, "left"),
          iter: this.field(node, "right"),
          body: this.statements(fieldOf(node, "body")),
          orelse: this.statements(elseClause && fieldOf(elseClause, "body")),
        };
      }

      case "while_statement": {
        const elseClause = fieldOf(node, "alternative");
        return {
          kind: "While",
          ...at,
          test: this.field(node, "condition"),
          body: this.statements(fieldOf(node, "body")),
          orelse: this.statements(elseClause && fieldOf(elseClause, "body")),
        };
      }

      case "try_statement":
        return this.tryStatement(node, at);

      case "with_statement": {
        const clause = named(node).find((child) => child.type === "with_clause");
        const items = clause ? named(clause).filter((child) => child.type === "with_item") : [];
        return {
          kind: "With",
          ...at,
          isAsync: hasToken(node, "async"),
          items: items.map((item) => this.withItem(item)),
          body: this.statements(fieldOf(node, "body")),
        };
      }

      case "function_definition":
        return {
          kind: "FunctionDef",
          ...at,
          isAsync: hasToken(node, "async"),
          name: fieldOf(node, "name")?.text ?? "",
          params: this.parameters(fieldOf(node, "parameters")),
          returns: this.optionalField(node, "return_type"),
          decorators: [],
          body: this.statements(fieldOf(node, "body")),
        };

      case "class_definition": {
        const superclasses = fieldOf(node, "superclasses");
        return {
          kind: "ClassDef",
          ...at,
          name: fieldOf(node, "name")?.text ?? "",
          bases: superclasses ? this.arguments(superclasses) : [],
          decorators: [],
          body: this.statements(fieldOf(node, "body")),
        };
      }

      case "decorated_definition":
        return this.decorated(node, at);

      default:
        return { kind: "Unsupported", ...at, variant: node.type };
    }
  }

  private expressionStatement(node: SyntaxNode, at: Position): SyntaxStatement {
    const children = named(node);
    const [only] = children;
    if (children.length !== 1) {
      return { kind: "Expr", ...at, value: { kind: "Tuple", elts: children.map((c) => this.expression(c)) } };
    }
    if (only.type === "assignment") {
      return this.assignment(only, at);
    }
    if (only.type === "augmented_assignment") {
      return {
        kind: "AugAssign",
        ...at,
        target: this.field(only, "left"),
        op: fieldOf(only, "operator")?.type ?? "=",
        value: this.field(only, "right"),
      };
    }
    return { kind: "Expr", ...at, value: this.expression(only) };
  }

  private assignment(node: SyntaxNode, at: Position): SyntaxStatement {
    const annotation = fieldOf(node, "type");
    if (annotation) {
      return {
        kind: "AnnAssign",
        ...at,
        target: this.field(node, "left"),
        annotation: this.expression(annotation),
        value: this.optionalField(node, "right"),
      };
    }

    // `a = b = 1` nests the second assignment as the right-hand side
    const targets: Expression[] = [];
    let current = node;
    let right = fieldOf(current, "right");
    targets.push(this.field(current, "left"));
    while (right && right.type === "assignment" && !fieldOf(right, "type")) {
      current = right;
      targets.push(this.field(current, "left"));
      right = fieldOf(current, "right");
    }
    return {
      kind: "Assign",
      ...at,
      targets,
      value: right ? this.expression(right) : unsupported("assignment"),
    };
  }

  private importFrom(node: SyntaxNode, at: Position): SyntaxStatement {
    const moduleName = fieldOf(node, "module_name");
    let module = node.type === "future_import_statement" ? "__future__" : "";
    let level = 0;
    if (moduleName && moduleName.type === "relative_import") {
      const prefix = named(moduleName).find((child) => child.type === "import_prefix");
      const dotted = named(moduleName).find((child) => child.type === "dotted_name");
      level = prefix ? prefix.text.replace(/\s/g, "").length : 0;
      module = dotted ? this.dotted(dotted) : "";
    } else if (moduleName) {
      module = this.dotted(moduleName);
    }
    const wildcard = named(node).some((child) => child.type === "wildcard_import");
    return {
      kind: "ImportFrom",
      ...at,
      module,
      level,
      names: wildcard ? "*" : namedField(node, "name").map((n) => this.alias(n)),
    };
  }

  private dotted(node: SyntaxNode): string {
    const parts = named(node);
    return parts.length > 0 ? parts.map((part) => part.text).join(".") : node.text;
  }

  private alias(node: SyntaxNode): Alias {
    if (node.type === "aliased_import") {
      const name = fieldOf(node, "name");
      return {
        name: name ? this.dotted(name) : "",
        asname: fieldOf(node, "alias")?.text,
      };
    }
    return { name: this.dotted(node) };
  }

  /**
   * `elif` clauses become an `If` nested as the whole else arm of the
   * clause before them
   */
  private ifStatement(node: SyntaxNode): If<SyntaxBlock> {
    const alternatives = namedField(node, "alternative");
    let orelse: SyntaxBlock = [];
    for (let i = alternatives.length - 1; i >= 0; i--) {
      const clause = alternatives[i];
      if (clause.type === "else_clause") {
        orelse = this.statements(fieldOf(clause, "body"));
      } else if (clause.type === "elif_clause") {
        orelse = [
          {
            kind: "If",
            ...position(clause),
            test: this.field(clause, "condition"),
            body: this.statements(fieldOf(clause, "consequence")),
            orelse,
          },
        ];
      }
    }
    return {
      kind: "If",
      ...position(node),
      test: this.field(node, "condition"),
      body: this.statements(fieldOf(node, "consequence")),
      orelse,
    };
  }

  private tryStatement(node: SyntaxNode, at: Position): SyntaxStatement {
    const clauses = named(node);
    if (clauses.some((clause) => clause.type === "except_group_clause")) {
      return { kind: "Unsupported", ...at, variant: "except_group_clause" };
    }
    const elseClause = clauses.find((clause) => clause.type === "else_clause");
    const finallyClause = clauses.find((clause) => clause.type === "finally_clause");
    return {
      kind: "Try",
      ...at,
      body: this.statements(fieldOf(node, "body")),
      handlers: clauses
        .filter((clause) => clause.type === "except_clause")
        .map((clause) => this.exceptHandler(clause)),
      orelse: this.statements(elseClause ? fieldOf(elseClause, "body") : null),
      finalbody: this.statements(
        finallyClause ? named(finallyClause).find((child) => child.type === "block") ?? null : null,
      ),
    };
  }

  private exceptHandler(node: SyntaxNode): ExceptHandler<SyntaxBlock> {
    const parts = named(node);
    const block = parts.find((part) => part.type === "block") ?? null;
    const [first, second] = parts.filter((part) => part.type !== "block");
    const handler: ExceptHandler<SyntaxBlock> = { ...position(node), body: this.statements(block) };
    if (first && first.type === "as_pattern") {
      const [type] = named(first);
      const alias = fieldOf(first, "alias");
      handler.type = type ? this.expression(type) : undefined;
      handler.name = alias?.text;
    } else if (first) {
      handler.type = this.expression(first);
      handler.name = second?.text;
    }
    return handler;
  }

  private withItem(node: SyntaxNode): WithItem {
    const value = fieldOf(node, "value") ?? named(node)[0];
    if (value && value.type === "as_pattern") {
      const [context] = named(value);
      const alias = fieldOf(value, "alias");
      return {
        context: context ? this.expression(context) : unsupported("with_item"),
        target: alias ? this.asTarget(alias) : undefined,
      };
    }
    const alias = fieldOf(node, "alias");
    return {
      context: value ? this.expression(value) : unsupported("with_item"),
      target: alias ? this.asTarget(alias) : undefined,
    };
  }

  /**
   * `as` targets arrive as the target expression renamed to
   * `as_pattern_target`
   */
  private asTarget(node: SyntaxNode): Expression {
    if (node.type !== "as_pattern_target") {
      return this.expression(node);
    }
    const children = named(node);
    if (children.length === 0) {
      return { kind: "Name", id: node.text };
    }
    if (children.length === 1) {
      return this.expression(children[0]);
    }
    const elts = children.map((child) => this.expression(child));
    if (node.text.startsWith("[")) {
      return { kind: "List", elts };
    }
    if (node.text.startsWith("(")) {
      return { kind: "Tuple", elts };
    }
    // a dotted or subscripted target, kept as written
    return { kind: "Name", id: node.text };
  }

  private decorated(node: SyntaxNode, at: Position): SyntaxStatement {
    const definition = fieldOf(node, "definition");
    if (!definition) {
      return { kind: "Unsupported", ...at, variant: node.type };
    }
    const decorators = named(node)
      .filter((child) => child.type === "decorator")
      .map((decorator) => {
        const [expression] = named(decorator);
        return expression ? this.expression(expression) : unsupported("decorator");
      });
    const statement = this.statement(definition);
    if (statement.kind === "FunctionDef" || statement.kind === "ClassDef") {
      return { ...statement, decorators, decoratorLine: at.line };
    }
    return statement;
  }

  private parameters(node: SyntaxNode | null): Parameters {
    const params: Parameters = { positional: [], positionalOnlyCount: 0, keywordOnly: [] };
    if (!node) {
      return params;
    }
    let keywordOnly = false;
    const add = (param: Parameter) => {
      (keywordOnly ? params.keywordOnly : params.positional).push(param);
    };
    const splatName = (splat: SyntaxNode) => named(splat)[0]?.text ?? splat.text.replace(/^\*+/, "");

    for (const child of named(node)) {
      switch (child.type) {
        case "identifier":
          add({ name: child.text });
          break;
        case "default_parameter":
          add({
            name: fieldOf(child, "name")?.text ?? "",
            default: this.optionalField(child, "value"),
          });
          break;
        case "typed_default_parameter":
          add({
            name: fieldOf(child, "name")?.text ?? "",
            annotation: this.optionalField(child, "type"),
            default: this.optionalField(child, "value"),
          });
          break;
        case "typed_parameter": {
          const [inner] = named(child);
          const annotation = this.optionalField(child, "type");
          if (inner && inner.type === "list_splat_pattern") {
            params.vararg = { name: splatName(inner), annotation };
            keywordOnly = true;
          } else if (inner && inner.type === "dictionary_splat_pattern") {
            params.kwarg = { name: splatName(inner), annotation };
          } else {
            add({ name: inner ? inner.text : "", annotation });
          }
          break;
        }
        case "list_splat_pattern":
          params.vararg = { name: splatName(child) };
          keywordOnly = true;
          break;
        case "dictionary_splat_pattern":
          params.kwarg = { name: splatName(child) };
          break;
        case "keyword_separator":
          keywordOnly = true;
          break;
        case "positional_separator":
          params.positionalOnlyCount = params.positional.length;
          break;
        default:
          add({ name: child.text });
      }
    }
    return params;
  }

  private arguments(node: SyntaxNode): Argument[] {
    return named(node).map((child): Argument => {
      if (child.type === "keyword_argument") {
        return {
          kind: "Keyword",
          name: fieldOf(child, "name")?.text ?? "",
          value: this.field(child, "value"),
        };
      }
      return this.expression(child);
    });
  }

  private field(node: SyntaxNode, fieldName: string): Expression {
    const child = fieldOf(node, fieldName);
    return child ? this.expression(child) : unsupported(`${node.type}.${fieldName}`);
  }

  private optionalField(node: SyntaxNode, fieldName: string): Expression | undefined {
    const child = fieldOf(node, fieldName);
    return child ? this.expression(child) : undefined;
  }

  private comprehension(node: SyntaxNode): Comprehension[] {
    const generators: Comprehension[] = [];
    for (const clause of named(node)) {
      if (clause.type === "for_in_clause") {
        const iterables = namedField(clause, "right").map((child) => this.expression(child));
        generators.push({
          target: this.field(clause, "left"),
          iter: iterables.length === 1 ? iterables[0] : { kind: "Tuple", elts: iterables },
          ifs: [],
          isAsync: hasToken(clause, "async"),
        });
      } else if (clause.type === "if_clause") {
        const [condition] = named(clause);
        const current = generators[generators.length - 1];
        if (current && condition) {
          current.ifs.push(this.expression(condition));
        }
      }
    }
    return generators;
  }

  private compare(node: SyntaxNode): Expression {
    const operands: Expression[] = [];
    const ops: ComparisonOperator[] = [];
    // `not in` and `is not` can arrive as two tokens, each aliased to the
    // whole operator, so an operator is the words between two operands
    let words: string[] = [];
    for (const child of node.children) {
      if (child.type === "comment") {
        continue;
      }
      if (!child.isNamed) {
        words.push(child.text);
        continue;
      }
      if (operands.length > 0) {
        const op = words.join(" ").replace(/\s+/g, " ");
        if (!isComparisonOperator(op)) {
          return unsupported(node.type);
        }
        ops.push(op);
      }
      words = [];
      operands.push(this.expression(child));
    }
    const [left, ...comparators] = operands;
    if (!left || comparators.length !== ops.length) {
      return unsupported(node.type);
    }
    return { kind: "Compare", left, ops, comparators };
  }

  private string(node: SyntaxNode): StringLiteral {
    const start = node.children.find((child) => child.type === "string_start");
    const end = node.children.find((child) => child.type === "string_end");
    const opening = /^([A-Za-z]*)("""|'''|"|')/.exec(start ? start.text : node.text);
    const prefix = opening ? opening[1] : "";
    const delimiter = opening ? opening[2] : '"';
    const quote = delimiter.startsWith("'") ? "'" : '"';

    const bodyStart = start ? start.endIndex : node.startIndex + prefix.length + delimiter.length;
    const bodyEnd = end ? end.startIndex : node.endIndex - delimiter.length;

    const segments: StringSegment[] = [];
    let cursor = bodyStart;
    for (const child of node.children) {
      if (child.type !== "interpolation") {
        continue;
      }
      if (child.startIndex > cursor) {
        segments.push({ kind: "Text", raw: this.source.slice(cursor, child.startIndex) });
      }
      segments.push(this.interpolation(child));
      cursor = child.endIndex;
    }
    if (bodyEnd > cursor) {
      segments.push({ kind: "Text", raw: this.source.slice(cursor, bodyEnd) });
    }

    return { kind: "String", prefix, triple: delimiter.length === 3, quote, segments };
  }

  private interpolation(node: SyntaxNode): StringSegment {
    const expression = fieldOf(node, "expression") ?? named(node)[0];
    const conversion = node.children.find((child) => child.type === "type_conversion");
    const formatSpec = node.children.find((child) => child.type === "format_specifier");
    const equals = node.children.find((child) => child.type === "=");
    const stop = conversion?.startIndex ?? formatSpec?.startIndex ?? node.endIndex - 1;
    return {
      kind: "Interpolation",
      expression: expression ? this.expression(expression) : unsupported("interpolation"),
      debugText: equals ? this.source.slice(node.startIndex + 1, stop) : undefined,
      conversion: conversion?.text,
      formatSpec: formatSpec?.text,
    };
  }

  expression(node: SyntaxNode): Expression {
    switch (node.type) {
      case "identifier":
      case "keyword_identifier":
        return { kind: "Name", id: node.text };

      case "integer":
      case "float":
        return { kind: "Number", text: node.text };

      case "true":
        return { kind: "Constant", value: "True" };
      case "false":
        return { kind: "Constant", value: "False" };
      case "none":
        return { kind: "Constant", value: "None" };

      case "ellipsis":
        return { kind: "Ellipsis" };

      case "string":
        return this.string(node);

      case "concatenated_string":
        return {
          kind: "ConcatenatedString",
          parts: named(node).filter((child) => child.type === "string").map((child) => this.string(child)),
        };

      case "binary_operator": {
        const op = fieldOf(node, "operator")?.type ?? "";
        return isBinaryOperator(op)
          ? { kind: "BinaryOp", left: this.field(node, "left"), op, right: this.field(node, "right") }
          : unsupported(`binary_operator ${op}`);
      }

      case "unary_operator": {
        const op = fieldOf(node, "operator")?.type ?? "";
        return isUnaryOperator(op)
          ? { kind: "UnaryOp", op, operand: this.field(node, "argument") }
          : unsupported(`unary_operator ${op}`);
      }

      case "not_operator":
        return { kind: "UnaryOp", op: "not", operand: this.field(node, "argument") };

      case "boolean_operator": {
        const op = fieldOf(node, "operator")?.type;
        return op === "and" || op === "or"
          ? { kind: "BoolOp", op, left: this.field(node, "left"), right: this.field(node, "right") }
          : unsupported(`boolean_operator ${op ?? ""}`);
      }

      case "comparison_operator":
        return this.compare(node);

      case "conditional_expression": {
        const [body, test, orelse] = named(node).map((child) => this.expression(child));
        return body && test && orelse
          ? { kind: "IfExp", body, test, orelse }
          : unsupported(node.type);
      }

      case "named_expression": {
        const name = fieldOf(node, "name");
        return {
          kind: "NamedExpr",
          target: { kind: "Name", id: name ? name.text : "" },
          value: this.field(node, "value"),
        };
      }

      case "lambda":
        return {
          kind: "Lambda",
          params: this.parameters(fieldOf(node, "parameters")),
          body: this.field(node, "body"),
        };

      case "await": {
        const [value] = named(node);
        return { kind: "Await", value: value ? this.expression(value) : unsupported(node.type) };
      }

      case "yield": {
        const [value] = named(node);
        return {
          kind: "Yield",
          value: value ? this.expression(value) : undefined,
          delegate: hasToken(node, "from"),
        };
      }

      case "call": {
        const args = fieldOf(node, "arguments");
        return {
          kind: "Call",
          func: this.field(node, "function"),
          args: !args ? [] : args.type === "generator_expression" ? [this.expression(args)] : this.arguments(args),
        };
      }

      case "attribute":
        return {
          kind: "Attribute",
          value: this.field(node, "object"),
          attr: fieldOf(node, "attribute")?.text ?? "",
        };

      case "subscript": {
        const indices = namedField(node, "subscript");
        const last = indices[indices.length - 1];
        const trailingComma = node.children.some(
          (child) => child.type === "," && last !== undefined && child.startIndex > last.startIndex,
        );
        return {
          kind: "Subscript",
          value: this.field(node, "value"),
          indices: indices.map((index) => this.expression(index)),
          trailingComma,
        };
      }

      case "slice": {
        const parts: (Expression | undefined)[] = [undefined, undefined, undefined];
        let slot = 0;
        for (const child of node.children) {
          if (child.type === ":") {
            slot++;
          } else if (child.isNamed && child.type !== "comment" && slot < parts.length) {
            parts[slot] = this.expression(child);
          }
        }
        const [lower, upper, step] = parts;
        return { kind: "Slice", lower, upper, step };
      }

      case "list":
      case "list_pattern":
        return { kind: "List", elts: named(node).map((child) => this.expression(child)) };

      case "set":
        return { kind: "Set", elts: named(node).map((child) => this.expression(child)) };

      case "tuple":
      case "tuple_pattern":
      case "expression_list":
      case "pattern_list":
        return { kind: "Tuple", elts: named(node).map((child) => this.expression(child)) };

      case "dictionary":
        return {
          kind: "Dict",
          items: named(node).map((child): DictItem =>
            child.type === "pair"
              ? { key: this.field(child, "key"), value: this.field(child, "value") }
              : { kind: "DoubleStarred", value: this.splatValue(child) },
          ),
        };

      case "list_comprehension":
        return { kind: "ListComp", elt: this.field(node, "body"), generators: this.comprehension(node) };

      case "set_comprehension":
        return { kind: "SetComp", elt: this.field(node, "body"), generators: this.comprehension(node) };

      case "generator_expression":
        return { kind: "GeneratorExp", elt: this.field(node, "body"), generators: this.comprehension(node) };

      case "dictionary_comprehension": {
        const pair = fieldOf(node, "body");
        return {
          kind: "DictComp",
          key: pair ? this.field(pair, "key") : unsupported(node.type),
          value: pair ? this.field(pair, "value") : unsupported(node.type),
          generators: this.comprehension(node),
        };
      }

      case "parenthesized_expression":
      case "type": {
        const [inner] = named(node);
        return inner ? this.expression(inner) : unsupported(node.type);
      }

      case "list_splat":
      case "list_splat_pattern":
        return { kind: "Starred", value: this.splatValue(node) };

      case "dictionary_splat":
      case "dictionary_splat_pattern":
        return { kind: "DoubleStarred", value: this.splatValue(node) };

      default:
        return unsupported(node.type);
    }
  }

  private splatValue(node: SyntaxNode): Expression {
    const [value] = named(node);
    return value ? this.expression(value) : unsupported(node.type);
  }
}

/**
 * Parse Python source code using native tree-sitter bindings
 * @param sourceCode The Python source code to parse
 * @param debug Log the tree-sitter tree to the console
 * @returns The statement tree, comments and source lines
 * @throws PythonSyntaxError when the tree holds ERROR or MISSING nodes
 */
export function parse(sourceCode: string, debug: boolean = false): ParseResult {
  const tree = parser.parse(sourceCode);

  if (debug) {
    console.log("[DEBUG] Tree root type:", tree.rootNode.type);
    console.log(
      "[DEBUG] S-expression:",
      tree.rootNode.toString().substring(0, 500),
    );
  }

  const root = convertNode(tree.walk(), sourceCode);
  const { errorCount, firstError, comments } = scan(root);
  if (errorCount > 0) {
    const at = firstError ?? { line: 1, column: 0 };
    throw new PythonSyntaxError(at.line, at.column, errorCount);
  }

  const body = new SyntaxConverter(sourceCode).statements(root);

  if (debug) {
    console.log("[DEBUG] Statements:", body.length, "Comments:", comments.length);
  }

  return {
    tree: body.length > 0 ? { kind: "Module", body } : null,
    comments,
    lines: new SourceLines(sourceCode),
  };
}
