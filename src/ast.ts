/**
 * Syntax tree for Python source code
 *
 * A closed set of statement and expression variants, discriminated by `kind`.
 * Compound statements are generic over the container of their nested
 * statements so the same shapes describe the parsed tree and the annotated
 * tree produced by the comment merger.
 */

/**
 * Source position assigned by the parser (line is 1-based, column 0-based)
 */
export interface Position {
  line: number;
  column: number;
}

/**
 * A comment token, including its leading '#'
 */
export interface Comment extends Position {
  text: string;
}

// ===========================================
// Expressions
// ===========================================

export interface Name {
  kind: 'Name';
  id: string;
}

/** Numeric literal, kept in its source spelling */
export interface NumberLiteral {
  kind: 'Number';
  text: string;
}

export type StringSegment =
  | { kind: 'Text'; raw: string }
  | {
      kind: 'Interpolation';
      expression: Expression;
      /** Source text of a self-documenting `{expr=}` field, which is output verbatim */
      debugText?: string;
      conversion?: string;
      formatSpec?: string;
    };

export interface StringLiteral {
  kind: 'String';
  /** Prefix letters as written, e.g. `b`, `rb`, `f` */
  prefix: string;
  triple: boolean;
  /** Delimiter character used in the source */
  quote: '"' | "'";
  segments: StringSegment[];
}

export interface ConcatenatedString {
  kind: 'ConcatenatedString';
  parts: StringLiteral[];
}

export interface Constant {
  kind: 'Constant';
  value: 'True' | 'False' | 'None';
}

export interface Ellipsis {
  kind: 'Ellipsis';
}

export type BinaryOperator =
  | '+'
  | '-'
  | '*'
  | '@'
  | '/'
  | '//'
  | '%'
  | '**'
  | '<<'
  | '>>'
  | '&'
  | '|'
  | '^';

export interface BinaryOp {
  kind: 'BinaryOp';
  left: Expression;
  op: BinaryOperator;
  right: Expression;
}

export type UnaryOperator = '+' | '-' | '~' | 'not';

export interface UnaryOp {
  kind: 'UnaryOp';
  op: UnaryOperator;
  operand: Expression;
}

export interface BoolOp {
  kind: 'BoolOp';
  op: 'and' | 'or';
  left: Expression;
  right: Expression;
}

export type ComparisonOperator =
  | '<'
  | '<='
  | '=='
  | '!='
  | '>='
  | '>'
  | '<>'
  | 'in'
  | 'not in'
  | 'is'
  | 'is not';

export interface Compare {
  kind: 'Compare';
  left: Expression;
  ops: ComparisonOperator[];
  comparators: Expression[];
}

export interface IfExp {
  kind: 'IfExp';
  body: Expression;
  test: Expression;
  orelse: Expression;
}

export interface NamedExpr {
  kind: 'NamedExpr';
  target: Name;
  value: Expression;
}

export interface Lambda {
  kind: 'Lambda';
  params: Parameters;
  body: Expression;
}

export interface Await {
  kind: 'Await';
  value: Expression;
}

export interface Yield {
  kind: 'Yield';
  value?: Expression;
  /** `yield from` */
  delegate: boolean;
}

export type Argument =
  | Expression
  | { kind: 'Keyword'; name: string; value: Expression };

export interface Call {
  kind: 'Call';
  func: Expression;
  args: Argument[];
}

export interface Attribute {
  kind: 'Attribute';
  value: Expression;
  attr: string;
}

export interface Slice {
  kind: 'Slice';
  lower?: Expression;
  upper?: Expression;
  step?: Expression;
}

export interface Subscript {
  kind: 'Subscript';
  value: Expression;
  indices: Expression[];
  /** `a[1,]` indexes with a one-element tuple */
  trailingComma: boolean;
}

export interface Starred {
  kind: 'Starred';
  value: Expression;
}

export interface DoubleStarred {
  kind: 'DoubleStarred';
  value: Expression;
}

export interface List {
  kind: 'List';
  elts: Expression[];
}

export interface Tuple {
  kind: 'Tuple';
  elts: Expression[];
}

export interface SetDisplay {
  kind: 'Set';
  elts: Expression[];
}

export type DictItem = { key: Expression; value: Expression } | DoubleStarred;

export interface Dict {
  kind: 'Dict';
  items: DictItem[];
}

export interface Comprehension {
  target: Expression;
  iter: Expression;
  ifs: Expression[];
  isAsync: boolean;
}

export interface ListComp {
  kind: 'ListComp';
  elt: Expression;
  generators: Comprehension[];
}

export interface SetComp {
  kind: 'SetComp';
  elt: Expression;
  generators: Comprehension[];
}

export interface GeneratorExp {
  kind: 'GeneratorExp';
  elt: Expression;
  generators: Comprehension[];
}

export interface DictComp {
  kind: 'DictComp';
  key: Expression;
  value: Expression;
  generators: Comprehension[];
}

/** A grammar construct the adapter does not model */
export interface UnsupportedExpression {
  kind: 'Unsupported';
  variant: string;
}

export type Expression =
  | Name
  | NumberLiteral
  | StringLiteral
  | ConcatenatedString
  | Constant
  | Ellipsis
  | BinaryOp
  | UnaryOp
  | BoolOp
  | Compare
  | IfExp
  | NamedExpr
  | Lambda
  | Await
  | Yield
  | Call
  | Attribute
  | Subscript
  | Slice
  | Starred
  | DoubleStarred
  | List
  | Tuple
  | SetDisplay
  | Dict
  | ListComp
  | SetComp
  | GeneratorExp
  | DictComp
  | UnsupportedExpression;

// ===========================================
// Parameters
// ===========================================

export interface Parameter {
  name: string;
  annotation?: Expression;
  default?: Expression;
}

export interface Parameters {
  /** Positional parameters, positional-only ones first */
  positional: Parameter[];
  /** How many of `positional` precede a `/` marker */
  positionalOnlyCount: number;
  vararg?: Parameter;
  keywordOnly: Parameter[];
  kwarg?: Parameter;
}

// ===========================================
// Statements
// ===========================================

export interface ExprStatement extends Position {
  kind: 'Expr';
  value: Expression;
}

export interface Assign extends Position {
  kind: 'Assign';
  targets: Expression[];
  value: Expression;
}

export interface AnnAssign extends Position {
  kind: 'AnnAssign';
  target: Expression;
  annotation: Expression;
  value?: Expression;
}

export interface AugAssign extends Position {
  kind: 'AugAssign';
  target: Expression;
  /** Operator including the '=' sign, e.g. `+=` */
  op: string;
  value: Expression;
}

export interface Return extends Position {
  kind: 'Return';
  value?: Expression;
}

export interface Delete extends Position {
  kind: 'Delete';
  targets: Expression[];
}

export interface Pass extends Position {
  kind: 'Pass';
}

export interface Break extends Position {
  kind: 'Break';
}

export interface Continue extends Position {
  kind: 'Continue';
}

export interface Raise extends Position {
  kind: 'Raise';
  exc?: Expression;
  cause?: Expression;
}

export interface Global extends Position {
  kind: 'Global';
  names: string[];
}

export interface Nonlocal extends Position {
  kind: 'Nonlocal';
  names: string[];
}

export interface Assert extends Position {
  kind: 'Assert';
  test: Expression;
  msg?: Expression;
}

export interface Alias {
  name: string;
  asname?: string;
}

export interface Import extends Position {
  kind: 'Import';
  names: Alias[];
}

export interface ImportFrom extends Position {
  kind: 'ImportFrom';
  /** Dotted module path without the leading dots (may be empty) */
  module: string;
  level: number;
  /** `'*'` for a wildcard import */
  names: Alias[] | '*';
}

export interface If<B> extends Position {
  kind: 'If';
  test: Expression;
  body: B;
  orelse: B;
}

export interface For<B> extends Position {
  kind: 'For';
  isAsync: boolean;
  target: Expression;
  iter: Expression;
  body: B;
  orelse: B;
}

export interface While<B> extends Position {
  kind: 'While';
  test: Expression;
  body: B;
  orelse: B;
}

export interface ExceptHandler<B> extends Position {
  type?: Expression;
  name?: string;
  body: B;
}

export interface Try<B, H = ExceptHandler<B>> extends Position {
  kind: 'Try';
  body: B;
  handlers: H[];
  orelse: B;
  finalbody: B;
}

export interface WithItem {
  context: Expression;
  target?: Expression;
}

export interface With<B> extends Position {
  kind: 'With';
  isAsync: boolean;
  items: WithItem[];
  body: B;
}

export interface FunctionDef<B> extends Position {
  kind: 'FunctionDef';
  isAsync: boolean;
  name: string;
  params: Parameters;
  returns?: Expression;
  decorators: Expression[];
  /** line of the first decorator; the position is the `def` line */
  decoratorLine?: number;
  body: B;
}

export interface ClassDef<B> extends Position {
  kind: 'ClassDef';
  name: string;
  bases: Argument[];
  decorators: Expression[];
  decoratorLine?: number;
  body: B;
}

export interface UnsupportedStatement extends Position {
  kind: 'Unsupported';
  variant: string;
}

export type SimpleStatement =
  | ExprStatement
  | Assign
  | AnnAssign
  | AugAssign
  | Return
  | Delete
  | Pass
  | Break
  | Continue
  | Raise
  | Global
  | Nonlocal
  | Assert
  | Import
  | ImportFrom
  | UnsupportedStatement;

/**
 * Any statement whose nested statement sequences have type `B`
 * (handlers of a `try` have type `H`)
 */
export type Statement<B, H = ExceptHandler<B>> =
  | SimpleStatement
  | If<B>
  | For<B>
  | While<B>
  | Try<B, H>
  | With<B>
  | FunctionDef<B>
  | ClassDef<B>;

/**
 * Statement sequence of the parsed tree
 */
export interface SyntaxBlock extends ReadonlyArray<SyntaxStatement> {}

export type SyntaxStatement = Statement<SyntaxBlock>;

export interface Module {
  kind: 'Module';
  body: SyntaxBlock;
}
