/**
 * Comment merger
 *
 * Folds the separately collected comment tokens back into the syntax tree.
 * A single depth-first pass consumes the comments in order through a
 * per-call cursor; every nested statement sequence gets its own accumulator,
 * which is interleaved into a fresh Block on the way out.
 */

import type {
  Comment,
  Module,
  SyntaxBlock,
  SyntaxStatement,
  If,
  Try,
  ExceptHandler,
} from './ast.js';
import type {
  AnnotatedExceptHandler,
  AnnotatedModule,
  Block,
  BlockEntry,
  ConditionalWithComments,
  NonBranchingStatement,
  StandaloneComment,
} from './annotated.js';
import { entryLine } from './annotated.js';
import { CommentOrderError } from './errors.js';
import type { SourceLines } from './source-lines.js';

/** A line holding only an `else:` clause followed by a comment */
const ELSE_COMMENT_LINE = /^\s*else\s*:\s*#/;
const ELSE_HEADER = /^\s*else\s*:/;
const FINALLY_HEADER = /^\s*finally\s*:/;
const ELIF_HEADER = /^\s*elif\b/;

/**
 * Where a Block stops: the first line that belongs to the enclosing scope,
 * and whether that line is another clause of the same construct
 */
interface BlockScope {
  end: number;
  followedByClause: boolean;
}

/**
 * Comment cursor for one merge call
 */
class MergeContext {
  private cursor = 0;

  constructor(
    private readonly comments: readonly Comment[],
    readonly lines: SourceLines,
  ) {}

  peek(): Comment | undefined {
    return this.comments[this.cursor];
  }

  /**
   * Consume the next comment if it sits on the given line
   */
  takeOnLine(line: number): Comment | undefined {
    const next = this.peek();
    if (next && next.line === line) {
      this.cursor++;
      return next;
    }
    return undefined;
  }

  /**
   * Consume every comment that starts before the given line
   */
  takeBefore(line: number): Comment[] {
    return this.takeWhile((comment) => comment.line < line);
  }

  /**
   * Consume comments before `end` that are indented at least to `column`
   */
  takeIndented(end: number, column: number): Comment[] {
    return this.takeWhile((comment) => comment.line < end && comment.column >= column);
  }

  takeRemaining(): Comment[] {
    return this.takeWhile(() => true);
  }

  private takeWhile(predicate: (comment: Comment) => boolean): Comment[] {
    const taken: Comment[] = [];
    let next = this.peek();
    while (next && predicate(next)) {
      taken.push(next);
      this.cursor++;
      next = this.peek();
    }
    return taken;
  }
}

function standalone(comment: Comment): StandaloneComment {
  return { kind: 'StandaloneComment', comment };
}

function assertOrdered(comments: readonly Comment[]): void {
  for (let i = 1; i < comments.length; i++) {
    const prev = comments[i - 1];
    const curr = comments[i];
    if (curr.line < prev.line || (curr.line === prev.line && curr.column < prev.column)) {
      throw new CommentOrderError(curr.line, curr.column);
    }
  }
}

/**
 * Line of the header introducing a clause (`else:`, `finally:`), found by
 * walking back over blank and comment-only lines from the first statement of
 * the clause's body
 */
export function clauseHeaderLine(
  lines: SourceLines,
  firstBodyLine: number,
  header: RegExp,
): number | undefined {
  if (header.test(lines.at(firstBodyLine))) {
    return firstBodyLine;
  }
  for (let line = firstBodyLine - 1; line >= 1; line--) {
    if (header.test(lines.at(line))) {
      return line;
    }
    if (!lines.isTrivia(line)) {
      return undefined;
    }
  }
  return undefined;
}

/**
 * Interleave pending comments into a statement list by line
 */
export function mergeBodyComments(
  entries: readonly BlockEntry[],
  pending: readonly Comment[],
): Block {
  const result: BlockEntry[] = [];
  let next = 0;
  for (const entry of entries) {
    const line = entryLine(entry);
    while (next < pending.length && pending[next].line < line) {
      result.push(standalone(pending[next]));
      next++;
    }
    result.push(entry);
  }
  for (; next < pending.length; next++) {
    result.push(standalone(pending[next]));
  }
  return result;
}

function scopeUntil(line: number | undefined, end: number): BlockScope {
  return line === undefined
    ? { end, followedByClause: false }
    : { end: line, followedByClause: true };
}

/**
 * First source line of a statement: its first decorator when it has any
 */
function startLine(statement: SyntaxStatement): number {
  if (statement.kind === 'FunctionDef' || statement.kind === 'ClassDef') {
    return statement.decoratorLine ?? statement.line;
  }
  return statement.line;
}

function armHeaderLine(ctx: MergeContext, arm: SyntaxBlock, header: RegExp): number | undefined {
  const [first] = arm;
  if (!first) {
    return undefined;
  }
  return clauseHeaderLine(ctx.lines, startLine(first), header) ?? startLine(first);
}

function mergeBlock(statements: SyntaxBlock, ctx: MergeContext, scope: BlockScope): Block {
  const pending: Comment[] = [];
  const entries: BlockEntry[] = [];

  statements.forEach((statement, index) => {
    // Comments among decorators stay in this block, ahead of the definition
    pending.push(...ctx.takeBefore(statement.line));
    const following = statements[index + 1];
    entries.push(mergeStatement(statement, ctx, following ? startLine(following) : scope.end));
  });

  const last = statements[statements.length - 1];
  if (scope.followedByClause) {
    // Everything up to the next clause header stays with this body
    pending.push(...ctx.takeBefore(scope.end));
  } else if (last) {
    pending.push(...ctx.takeIndented(scope.end, last.column));
  }

  return mergeBodyComments(entries, pending);
}

function mergeStatement(statement: SyntaxStatement, ctx: MergeContext, end: number): BlockEntry {
  if (statement.kind === 'If') {
    return mergeIf(statement, ctx, end);
  }
  const comment = ctx.takeOnLine(statement.line);
  const node = mergeChildren(statement, ctx, end);
  return comment ? { kind: 'Trailing', node, comment } : { kind: 'Bare', node };
}

function mergeIf(node: If<SyntaxBlock>, ctx: MergeContext, end: number): ConditionalWithComments {
  const headComment = ctx.takeOnLine(node.line);
  const [first] = node.orelse;

  if (!first) {
    const body = mergeBlock(node.body, ctx, { end, followedByClause: false });
    return { kind: 'ConditionalWithComments', node: { ...node, body, orelse: [] }, headComment };
  }

  if (first.kind === 'If' && node.orelse.length === 1 && ELIF_HEADER.test(ctx.lines.at(first.line))) {
    const body = mergeBlock(node.body, ctx, scopeUntil(first.line, end));
    const orelse = mergeBlock(node.orelse, ctx, { end, followedByClause: false });
    return { kind: 'ConditionalWithComments', node: { ...node, body, orelse }, headComment };
  }

  const elseLine = clauseHeaderLine(ctx.lines, startLine(first), ELSE_HEADER) ?? startLine(first);
  const body = mergeBlock(node.body, ctx, scopeUntil(elseLine, end));

  let elseComment: Comment | undefined;
  const candidate = ctx.peek();
  if (candidate && candidate.line === elseLine && ELSE_COMMENT_LINE.test(ctx.lines.at(candidate.line))) {
    elseComment = ctx.takeOnLine(candidate.line);
  }

  const orelse = mergeBlock(node.orelse, ctx, { end, followedByClause: false });
  return {
    kind: 'ConditionalWithComments',
    node: { ...node, body, orelse },
    headComment,
    elseComment,
  };
}

function mergeTry(
  node: Try<SyntaxBlock>,
  ctx: MergeContext,
  end: number,
): Try<Block, AnnotatedExceptHandler> {
  const elseLine = armHeaderLine(ctx, node.orelse, ELSE_HEADER);
  const finallyLine = armHeaderLine(ctx, node.finalbody, FINALLY_HEADER);
  const afterHandlers = elseLine ?? finallyLine;

  const body = mergeBlock(node.body, ctx, scopeUntil(node.handlers[0]?.line ?? afterHandlers, end));
  const handlers = node.handlers.map((handler: ExceptHandler<SyntaxBlock>, index): AnnotatedExceptHandler => {
    const headComment = ctx.takeOnLine(handler.line);
    const nextClause = node.handlers[index + 1]?.line ?? afterHandlers;
    return { ...handler, headComment, body: mergeBlock(handler.body, ctx, scopeUntil(nextClause, end)) };
  });
  const orelse = mergeBlock(node.orelse, ctx, scopeUntil(finallyLine, end));
  const finalbody = mergeBlock(node.finalbody, ctx, { end, followedByClause: false });

  return { ...node, body, handlers, orelse, finalbody };
}

function mergeChildren(
  statement: Exclude<SyntaxStatement, If<SyntaxBlock>>,
  ctx: MergeContext,
  end: number,
): NonBranchingStatement {
  switch (statement.kind) {
    case 'Expr':
    case 'Assign':
    case 'AnnAssign':
    case 'AugAssign':
    case 'Return':
    case 'Delete':
    case 'Pass':
    case 'Break':
    case 'Continue':
    case 'Raise':
    case 'Global':
    case 'Nonlocal':
    case 'Assert':
    case 'Import':
    case 'ImportFrom':
    case 'Unsupported':
      return statement;

    case 'For':
    case 'While': {
      const elseLine = armHeaderLine(ctx, statement.orelse, ELSE_HEADER);
      const body = mergeBlock(statement.body, ctx, scopeUntil(elseLine, end));
      const orelse = mergeBlock(statement.orelse, ctx, { end, followedByClause: false });
      return { ...statement, body, orelse };
    }

    case 'Try':
      return mergeTry(statement, ctx, end);

    case 'With':
    case 'FunctionDef':
    case 'ClassDef':
      return { ...statement, body: mergeBlock(statement.body, ctx, { end, followedByClause: false }) };
  }
}

/**
 * Attach comments to a parsed module
 * @param tree Parsed module, or null when the source holds no statements
 * @param comments Comment tokens in (line, column) order
 * @param lines Raw source lines, consulted for clause headers
 */
export function merge(
  tree: Module | null,
  comments: readonly Comment[],
  lines: SourceLines,
): AnnotatedModule {
  assertOrdered(comments);
  const ctx = new MergeContext(comments, lines);
  const body = tree ? mergeBlock(tree.body, ctx, { end: Infinity, followedByClause: false }) : [];
  const rest = ctx.takeRemaining().map(standalone);
  return { kind: 'Module', body: [...body, ...rest] };
}
