/**
 * Annotated tree: syntax nodes with their comments attached
 */

import type { Comment, ExceptHandler, If, Statement } from './ast.js';

export interface AnnotatedExceptHandler extends ExceptHandler<Block> {
  /** Comment on the `except ...:` header line */
  headComment?: Comment;
}

export type AnnotatedStatement = Statement<Block, AnnotatedExceptHandler>;

export type AnnotatedIf = If<Block>;

/** Every statement kind except the branching one, which has its own wrapper */
export type NonBranchingStatement = Exclude<AnnotatedStatement, AnnotatedIf>;

export interface Bare {
  kind: 'Bare';
  node: NonBranchingStatement;
}

export interface Trailing {
  kind: 'Trailing';
  node: NonBranchingStatement;
  comment: Comment;
}

export interface ConditionalWithComments {
  kind: 'ConditionalWithComments';
  node: AnnotatedIf;
  /** Comment on the `if`/`elif` header line */
  headComment?: Comment;
  /** Comment on the terminal `else:` line */
  elseComment?: Comment;
}

export interface StandaloneComment {
  kind: 'StandaloneComment';
  comment: Comment;
}

export type BlockEntry = Bare | Trailing | ConditionalWithComments | StandaloneComment;

/**
 * Statements interleaved with the comments that stand on their own lines
 */
export interface Block extends ReadonlyArray<BlockEntry> {}

export interface AnnotatedModule {
  kind: 'Module';
  body: Block;
}

/**
 * Source line of the statement an entry wraps, or of the comment itself
 */
export function entryLine(entry: BlockEntry): number {
  return entry.kind === 'StandaloneComment' ? entry.comment.line : entry.node.line;
}
