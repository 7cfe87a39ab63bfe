import type {
  Assign,
  Comment,
  Expression,
  ExprStatement,
  If,
  Module,
  Pass,
  SyntaxBlock,
  SyntaxStatement,
} from '../src/ast.js';
import { canonicalNumber } from '../src/literals.js';
import { SourceLines } from '../src/source-lines.js';

export function name(id: string): Expression {
  return { kind: 'Name', id };
}

export function num(text: string): Expression {
  return { kind: 'Number', text };
}

export function call(func: string): Expression {
  return { kind: 'Call', func: name(func), args: [] };
}

export function assign(line: number, column: number, target: string, value: Expression): Assign {
  return { kind: 'Assign', line, column, targets: [name(target)], value };
}

export function pass(line: number, column: number): Pass {
  return { kind: 'Pass', line, column };
}

export function expr(line: number, column: number, value: Expression): ExprStatement {
  return { kind: 'Expr', line, column, value };
}

export function ifStatement(
  line: number,
  column: number,
  test: Expression,
  body: SyntaxBlock,
  orelse: SyntaxBlock = [],
): If<SyntaxBlock> {
  return { kind: 'If', line, column, test, body, orelse };
}

export function module(...body: SyntaxStatement[]): Module {
  return { kind: 'Module', body };
}

/**
 * Comment token located where `text` appears on the given line of `source`
 */
export function commentAt(source: string, line: number, text: string): Comment {
  const column = new SourceLines(source).at(line).indexOf(text);
  if (column < 0) {
    throw new Error(`"${text}" not found on line ${line}`);
  }
  return { text, line, column };
}

export function lines(...rows: string[]): string {
  return rows.join('\n');
}

/**
 * Serialize a tree for structural comparison: positions dropped, numbers in
 * canonical spelling, string bodies without quote escapes and delimiters
 */
export function structure(tree: Module | null): string {
  return JSON.stringify(tree, (key: string, value: unknown): unknown => {
    if (key === 'line' || key === 'column' || key === 'quote' || key === 'decoratorLine') {
      return undefined;
    }
    if (key === 'raw' && typeof value === 'string') {
      return value.replace(/\\(["'])/g, '$1');
    }
    if (
      typeof value === 'object' &&
      value !== null &&
      'kind' in value &&
      value.kind === 'Number' &&
      'text' in value &&
      typeof value.text === 'string'
    ) {
      return { kind: 'Number', text: canonicalNumber(value.text) };
    }
    return value;
  });
}
