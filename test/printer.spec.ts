import { describe, it, expect } from 'vitest';
import type { Expression, Parameters, StringLiteral } from '../src/ast.js';
import type { AnnotatedModule } from '../src/annotated.js';
import { ExpressionPrinter, PREC, unsupportedPlaceholder } from '../src/expression-printer.js';
import { printModule } from '../src/printer.js';
import { assign, name, num, pass } from './helpers.js';

const printer = new ExpressionPrinter('"');

function binary(left: Expression, op: '+' | '-' | '*' | '**', right: Expression): Expression {
  return { kind: 'BinaryOp', left, op, right };
}

function text(quote: '"' | "'", raw: string, prefix = ''): StringLiteral {
  return { kind: 'String', prefix, triple: false, quote, segments: [{ kind: 'Text', raw }] };
}

describe('Expression printer', () => {
  describe('parentheses', () => {
    it('should parenthesize a looser operand', () => {
      expect(printer.print(binary(binary(name('a'), '+', name('b')), '*', name('c')))).toBe('(a + b) * c');
    });

    it('should drop parentheses the grouping does not need', () => {
      expect(printer.print(binary(binary(name('a'), '*', name('b')), '+', name('c')))).toBe('a * b + c');
      expect(printer.print(binary(binary(name('a'), '-', name('b')), '-', name('c')))).toBe('a - b - c');
    });

    it('should keep right-nested operands of a left-associative operator', () => {
      expect(printer.print(binary(name('a'), '-', binary(name('b'), '-', name('c'))))).toBe('a - (b - c)');
    });

    it('should treat power as right-associative', () => {
      expect(printer.print(binary(name('a'), '**', binary(name('b'), '**', name('c'))))).toBe('a ** b ** c');
      expect(printer.print(binary(binary(name('a'), '**', name('b')), '**', name('c')))).toBe('(a ** b) ** c');
    });

    it('should parenthesize a unary operand on the left of power', () => {
      const negated: Expression = { kind: 'UnaryOp', op: '-', operand: name('a') };
      expect(printer.print(binary(negated, '**', num('2')))).toBe('(-a) ** 2');
      expect(printer.print({ kind: 'UnaryOp', op: '-', operand: binary(name('a'), '**', num('2')) })).toBe('-a ** 2');
    });

    it('should group boolean operators by precedence', () => {
      const or: Expression = { kind: 'BoolOp', op: 'or', left: name('a'), right: name('b') };
      expect(printer.print({ kind: 'BoolOp', op: 'and', left: or, right: name('c') })).toBe('(a or b) and c');
      expect(printer.print({ kind: 'UnaryOp', op: 'not', operand: or })).toBe('not (a or b)');
    });

    it('should parenthesize a yield used as an argument', () => {
      const call: Expression = {
        kind: 'Call',
        func: name('f'),
        args: [{ kind: 'Yield', value: name('x'), delegate: false }],
      };
      expect(printer.print(call)).toBe('f((yield x))');
    });

    it('should honour an explicit minimum precedence', () => {
      const named: Expression = { kind: 'NamedExpr', target: { kind: 'Name', id: 'n' }, value: num('1') };
      expect(printer.print(named)).toBe('(n := 1)');
      expect(printer.print(named, PREC.NAMED)).toBe('n := 1');
    });
  });

  describe('comparisons', () => {
    it('should print two-word operators', () => {
      expect(printer.print({ kind: 'Compare', left: name('a'), ops: ['not in'], comparators: [name('b')] })).toBe(
        'a not in b',
      );
      expect(printer.print({ kind: 'Compare', left: name('a'), ops: ['is not'], comparators: [name('b')] })).toBe(
        'a is not b',
      );
    });

    it('should print a chain with one operator between each pair', () => {
      const chain: Expression = {
        kind: 'Compare',
        left: name('a'),
        ops: ['<', 'is not'],
        comparators: [name('b'), name('c')],
      };
      expect(printer.print(chain)).toBe('a < b is not c');
    });
  });

  describe('displays', () => {
    it('should always parenthesize tuples', () => {
      expect(printer.print({ kind: 'Tuple', elts: [num('1')] })).toBe('(1,)');
      expect(printer.print({ kind: 'Tuple', elts: [] })).toBe('()');
      expect(printer.print({ kind: 'Tuple', elts: [num('1'), num('2')] })).toBe('(1, 2)');
    });

    it('should print dictionaries with unpacking', () => {
      const dict: Expression = {
        kind: 'Dict',
        items: [
          { key: text("'", 'k'), value: num('1') },
          { kind: 'DoubleStarred', value: name('rest') },
        ],
      };
      expect(printer.print(dict)).toBe('{"k": 1, **rest}');
    });

    it('should print comprehensions and a sole generator argument without extra parentheses', () => {
      const generator: Expression = {
        kind: 'GeneratorExp',
        elt: binary(name('x'), '*', num('2')),
        generators: [{ target: name('x'), iter: name('xs'), ifs: [name('x')], isAsync: false }],
      };
      expect(printer.print({ kind: 'Call', func: name('sum'), args: [generator] })).toBe('sum(x * 2 for x in xs if x)');
      expect(printer.print(generator)).toBe('(x * 2 for x in xs if x)');
    });

    it('should wrap an integer before an attribute access', () => {
      expect(printer.print({ kind: 'Attribute', value: num('1'), attr: 'real' })).toBe('(1).real');
    });

    it('should print slices', () => {
      const subscript: Expression = {
        kind: 'Subscript',
        value: name('xs'),
        indices: [{ kind: 'Slice', step: num('2') }],
        trailingComma: false,
      };
      expect(printer.print(subscript)).toBe('xs[::2]');
    });
  });

  describe('parameters', () => {
    it('should place markers for positional-only and keyword-only parameters', () => {
      const params: Parameters = {
        positional: [{ name: 'a' }, { name: 'b', default: num('1') }],
        positionalOnlyCount: 1,
        vararg: { name: 'args' },
        keywordOnly: [{ name: 'k' }],
        kwarg: { name: 'kw' },
      };
      expect(printer.parameters(params)).toBe('a, /, b=1, *args, k, **kw');
    });

    it('should print a bare star before keyword-only parameters without a vararg', () => {
      const params: Parameters = {
        positional: [],
        positionalOnlyCount: 0,
        keywordOnly: [{ name: 'flag', annotation: name('bool'), default: { kind: 'Constant', value: 'False' } }],
      };
      expect(printer.parameters(params)).toBe('*, flag: bool = False');
    });
  });

  describe('strings', () => {
    it('should switch to double quotes', () => {
      expect(printer.print(text("'", 'single quotes'))).toBe('"single quotes"');
      expect(printer.print(text("'", "it\\'s"))).toBe('"it\'s"');
    });

    it('should keep the quote of a raw string that contains a double quote', () => {
      expect(printer.print(text("'", 'a"b', 'r'))).toBe('r\'a"b\'');
    });

    it('should use the other quote inside interpolations', () => {
      const fstring: StringLiteral = {
        kind: 'String',
        prefix: 'f',
        triple: false,
        quote: "'",
        segments: [
          { kind: 'Text', raw: 'v=' },
          {
            kind: 'Interpolation',
            expression: {
              kind: 'Subscript',
              value: name('d'),
              indices: [text('"', 'k')],
              trailingComma: false,
            },
          },
        ],
      };
      expect(printer.print(fstring)).toBe('f"v={d[\'k\']}"');
    });

    it('should print a self-documenting field verbatim', () => {
      const fstring: StringLiteral = {
        kind: 'String',
        prefix: 'f',
        triple: false,
        quote: '"',
        segments: [{ kind: 'Interpolation', expression: name('x'), debugText: 'x = ', conversion: '!r' }],
      };
      expect(printer.print(fstring)).toBe('f"{x = !r}"');
    });
  });

  it('should render unsupported constructs as a placeholder', () => {
    expect(unsupportedPlaceholder({ kind: 'Unsupported', variant: 'match_statement' })).toBe(
      '<<unsupported: match_statement>>',
    );
    expect(printer.print({ kind: 'Unsupported', variant: 'print_statement' })).toBe('<<unsupported: print_statement>>');
  });
});

describe('Statement printer', () => {
  const decorated: AnnotatedModule = {
    kind: 'Module',
    body: [
      {
        kind: 'Trailing',
        comment: { text: '#entry point', line: 2, column: 20 },
        node: {
          kind: 'FunctionDef',
          line: 2,
          column: 0,
          isAsync: true,
          name: 'main',
          params: { positional: [{ name: 'argv' }], positionalOnlyCount: 0, keywordOnly: [] },
          returns: name('int'),
          decorators: [name('cached')],
          body: [
            { kind: 'StandaloneComment', comment: { text: '# body', line: 3, column: 4 } },
            { kind: 'Bare', node: pass(4, 4) },
          ],
        },
      },
      { kind: 'Bare', node: { kind: 'Unsupported', line: 6, column: 0, variant: 'match_statement' } },
    ],
  };

  it('should print decorators, header comments and nested blocks', () => {
    expect(printModule(decorated)).toBe(
      '@cached\nasync def main(argv) -> int:  # entry point\n    # body\n    pass\n<<unsupported: match_statement>>\n',
    );
  });

  it('should indent by the configured width', () => {
    expect(printModule(decorated, { indentSize: 2 })).toBe(
      '@cached\nasync def main(argv) -> int:  # entry point\n  # body\n  pass\n<<unsupported: match_statement>>\n',
    );
  });

  it('should print an empty module as the empty string', () => {
    expect(printModule({ kind: 'Module', body: [] })).toBe('');
  });

  it('should print chained assignment targets and imports', () => {
    const module: AnnotatedModule = {
      kind: 'Module',
      body: [
        { kind: 'Bare', node: { ...assign(1, 0, 'a', num('1')), targets: [name('a'), name('b')] } },
        {
          kind: 'Bare',
          node: { kind: 'ImportFrom', line: 2, column: 0, module: 'pkg', level: 2, names: [{ name: 'x', asname: 'y' }] },
        },
        { kind: 'Bare', node: { kind: 'ImportFrom', line: 3, column: 0, module: '', level: 1, names: '*' } },
      ],
    };
    expect(printModule(module)).toBe('a = b = 1\nfrom ..pkg import x as y\nfrom . import *\n');
  });
});
