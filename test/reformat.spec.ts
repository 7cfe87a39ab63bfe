import { describe, it, expect } from 'vitest';
import { reformat } from '../src/index.js';
import { parse } from '../src/parser.js';
import { normalizeComment } from '../src/literals.js';
import { PythonSyntaxError } from '../src/errors.js';
import { lines, structure } from './helpers.js';

const program = lines(
  '#!/usr/bin/env python',
  'import os.path, sys',
  'from ..pkg.mod import *',
  'from . import a as b',
  '',
  '@dataclass',
  'class Point(Base, metaclass=Meta):',
  '    x: int = 0  #   the x',
  '',
  '    def scale(self, k=2, *rest, flag, **kw) -> "Point":',
  '        # scale both',
  "        return Point(self.x*k, y = k ** -1)",
  '',
  'def walk(xs):',
  '    total = count = 0',
  '    for i, x in enumerate(xs):  # loop',
  '        if x not in seen and x is not None:',
  '            total += x',
  '        elif x:',
  '            continue',
  '        else:  # nothing',
  '            break',
  '    else:',
  '        pass',
  '    while total > 10:',
  '        total -= 1',
  '    try:',
  '        risky()',
  '    except (KeyError, ValueError) as err:  # known',
  '        raise RuntimeError(err) from err',
  '    finally:',
  '        # always',
  '        done = [y * 2 for y in xs if y]',
  "    return {'total': total, **extra}, lambda a, b=1: a if b else -a",
  '',
  "greeting = f'hello {name!r}'",
  'with open(path) as handle, lock:',
  '    data = handle.read()[1:]',
  '# trailing',
);

/**
 * Reformatting again changes nothing, keeps every comment and keeps the
 * syntax tree
 */
function expectStable(source: string): void {
  const once = reformat(source);
  expect(reformat(once)).toBe(once);
  expect(parse(once).comments.map((comment) => comment.text)).toEqual(
    parse(source).comments.map((comment) => normalizeComment(comment.text)),
  );
  expect(structure(parse(once).tree)).toBe(structure(parse(source).tree));
}

describe('reformat', () => {
  describe('literal normalization', () => {
    it('should switch to double quotes', () => {
      expect(reformat("'single quotes'")).toBe('"single quotes"\n');
    });

    it('should normalize float spelling', () => {
      expect(reformat('42E+84\n')).toBe('4.2e+85\n');
    });

    it('should print a one-element tuple with its comma', () => {
      expect(reformat('(  1, )\n')).toBe('(1,)\n');
    });

    it('should drop redundant parentheses', () => {
      expect(reformat('(1)\n')).toBe('1\n');
      expect(reformat('x = ((a + b)) * c\n')).toBe('x = (a + b) * c\n');
    });

    it('should normalize comment spacing', () => {
      expect(reformat('#a bad comment\n')).toBe('# a bad comment\n');
      expect(reformat('x = 1 #note\n')).toBe('x = 1  # note\n');
    });

    it('should print f-strings with double quotes', () => {
      expect(reformat("f'{a}'\n")).toBe('f"{a}"\n');
    });
  });

  describe('statements', () => {
    it('should print an empty source as the empty string', () => {
      expect(reformat('')).toBe('');
    });

    it('should split semicolon-separated statements', () => {
      expect(reformat('x=1;y=2\n')).toBe('x = 1\ny = 2\n');
    });

    it('should keep chained assignment targets', () => {
      expect(reformat('a = b = 1\n')).toBe('a = b = 1\n');
    });

    it('should print the canonical form of a function', () => {
      expect(reformat('def f(a,b=1,*args,c,**kw):\n  return a\n')).toBe(
        'def f(a, b=1, *args, c, **kw):\n    return a\n',
      );
    });

    it('should place branch comments on their owners', () => {
      const source = lines('if True:  # c2', '    x = 1  # c4', 'else: # c6', '    x = 4  # c8', '');
      expect(reformat(source)).toBe('if True:  # c2\n    x = 1  # c4\nelse:  # c6\n    x = 4  # c8\n');
    });

    it('should keep each header comment of an elif chain on its own clause', () => {
      const source = lines(
        'if a:  # h1',
        '    x = 1',
        'elif b:  # h2',
        '    x = 2',
        'elif c:  # h3',
        '    x = 3',
        'else:  # h4',
        '    x = 4',
        '',
      );
      expect(reformat(source)).toBe(source);
    });

    it('should turn an if that is the whole else arm into elif', () => {
      const source = lines('if x:', '    pass', 'else:', '    if y:', '        pass', '');
      expect(reformat(source)).toBe('if x:\n    pass\nelif y:\n    pass\n');
    });

    it('should honour the indent size option', () => {
      expect(reformat('if x:\n    pass\n', { indentSize: 2 })).toBe('if x:\n  pass\n');
    });
  });

  describe('compound comparisons', () => {
    it('should keep two-word operators', () => {
      expect(reformat('a not in b\n')).toBe('a not in b\n');
      expect(reformat('a is not b\n')).toBe('a is not b\n');
      expect(reformat('x = a  not   in b\n')).toBe('x = a not in b\n');
    });

    it('should keep one operator between each pair of a chain', () => {
      expect(reformat('a < b is not c\n')).toBe('a < b is not c\n');
      const [statement] = parse('a < b is not c\n').tree?.body ?? [];
      expect(statement).toMatchObject({ kind: 'Expr', value: { kind: 'Compare', ops: ['<', 'is not'] } });
    });

    it('should be stable', () => {
      expectStable('if x not in seen and x is not None:\n    y = a <= b is not c not in d\n');
    });
  });

  describe('one-line suites', () => {
    it('should move the comment after a one-line if to its header', () => {
      expect(reformat('if a: pass  # c\n')).toBe('if a:  # c\n    pass\n');
    });

    it('should move the comment after a one-line loop or function to its header', () => {
      expect(reformat('for x in y: pass  # c\n')).toBe('for x in y:  # c\n    pass\n');
      expect(reformat('def f(): return 1  # c\n')).toBe('def f():  # c\n    return 1\n');
    });

    it('should keep the comment after a one-line else on its statement', () => {
      expect(reformat('if a:\n    x = 1\nelse: pass  # c\n')).toBe('if a:\n    x = 1\nelse:\n    pass  # c\n');
    });

    it('should be stable', () => {
      expectStable(lines('if a: pass  # c', 'while b: b -= 1  # loop', 'else: pass  # done', 'with f: g()  # w', ''));
    });
  });

  describe('comments inside brackets', () => {
    it('should move a comment out of a multi-line display', () => {
      expect(reformat('x = [\n    1,  # one\n    2,\n]\n')).toBe('x = [1, 2]\n# one\n');
    });

    it('should keep the comment before the next statement', () => {
      expect(reformat('x = f(\n    a,  # one\n)\ny = 2\n')).toBe('x = f(a)\n# one\ny = 2\n');
    });

    it('should be stable', () => {
      expectStable(lines('total = sum(  # open', '    [a,  # first', '     b],', ')', 'done = {', '    # key', "    'k': 1,", '}', ''));
    });
  });

  describe('decorators', () => {
    it('should print a decorator-line comment above the decorators', () => {
      expect(reformat('@dec  # d\ndef f():\n    pass\n')).toBe('# d\n@dec\ndef f():\n    pass\n');
    });

    it('should keep a comment inside a multi-line decorator out of the previous method', () => {
      const source = lines(
        'class A:',
        '    def g(self):',
        '        pass',
        '    @dec(',
        '        a,  # c',
        '    )',
        '    def f(self): pass',
        '',
      );
      expect(reformat(source)).toBe(
        'class A:\n    def g(self):\n        pass\n    # c\n    @dec(a)\n    def f(self):\n        pass\n',
      );
    });

    it('should be stable', () => {
      expectStable(lines('@first  # one', '@second(', '    x,  # two', ')', 'class C:', '    pass', ''));
    });
  });

  describe('invariants', () => {
    it('should be idempotent', () => {
      const once = reformat(program);
      expect(reformat(once)).toBe(once);
    });

    it('should keep every comment', () => {
      const before = parse(program).comments.map((comment) => normalizeComment(comment.text));
      const after = parse(reformat(program)).comments.map((comment) => comment.text);
      expect(after).toEqual(before);
    });

    it('should preserve the syntax tree', () => {
      expect(structure(parse(reformat(program)).tree)).toBe(structure(parse(program).tree));
    });
  });

  describe('errors', () => {
    it('should reject invalid syntax', () => {
      expect(() => reformat('def (:\n')).toThrow(PythonSyntaxError);
    });

    it('should report where the first error is', () => {
      try {
        reformat('x = 1\ny = (\n');
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(PythonSyntaxError);
        if (error instanceof PythonSyntaxError) {
          expect(error.errorCount).toBeGreaterThan(0);
          expect(error.line).toBeGreaterThanOrEqual(2);
        }
      }
    });
  });
});
