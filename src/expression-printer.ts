/**
 * Expression rendering
 *
 * Parentheses are not part of the syntax tree; they are re-derived here from
 * operator precedence, so `(a + b) * c` keeps its grouping and `(1)` loses it.
 */

import type {
  Argument,
  BinaryOperator,
  Comprehension,
  Expression,
  Parameter,
  Parameters,
  StringLiteral,
  StringSegment,
} from './ast.js'
import { canonicalNumber, chooseQuote, otherQuote, requote } from './literals.js'
import type { Quote } from './literals.js'

/**
 * Binding strength, loosest first
 */
export const PREC = {
  NAMED: 0,
  LAMBDA: 1,
  TEST: 2,
  OR: 3,
  AND: 4,
  NOT: 5,
  COMPARE: 6,
  BIT_OR: 7,
  BIT_XOR: 8,
  BIT_AND: 9,
  SHIFT: 10,
  ARITH: 11,
  TERM: 12,
  FACTOR: 13,
  POWER: 14,
  AWAIT: 15,
  ATOM: 16,
} as const

const BINARY_PRECEDENCE: Record<BinaryOperator, number> = {
  '|': PREC.BIT_OR,
  '^': PREC.BIT_XOR,
  '&': PREC.BIT_AND,
  '<<': PREC.SHIFT,
  '>>': PREC.SHIFT,
  '+': PREC.ARITH,
  '-': PREC.ARITH,
  '*': PREC.TERM,
  '@': PREC.TERM,
  '/': PREC.TERM,
  '//': PREC.TERM,
  '%': PREC.TERM,
  '**': PREC.POWER,
}

export function precedenceOf(node: Expression): number {
  switch (node.kind) {
    case 'NamedExpr':
    case 'Yield':
      return PREC.NAMED
    case 'Lambda':
      return PREC.LAMBDA
    case 'IfExp':
      return PREC.TEST
    case 'BoolOp':
      return node.op === 'or' ? PREC.OR : PREC.AND
    case 'UnaryOp':
      return node.op === 'not' ? PREC.NOT : PREC.FACTOR
    case 'Compare':
      return PREC.COMPARE
    case 'BinaryOp':
      return BINARY_PRECEDENCE[node.op]
    case 'Await':
      return PREC.AWAIT
    default:
      return PREC.ATOM
  }
}

/**
 * Placeholder for a construct the printer has no rule for
 */
export function unsupportedPlaceholder(node: { readonly kind: string; readonly variant?: string }): string {
  return `<<unsupported: ${node.variant ?? node.kind}>>`
}

export class ExpressionPrinter {
  /**
   * @param quote Delimiter for string literals; nested template
   * expressions use the other one
   */
  constructor(private readonly quote: Quote = '"') {}

  /**
   * Render an expression, parenthesized when it binds looser than `min`
   */
  print(node: Expression, min: number = PREC.LAMBDA): string {
    const text = this.render(node)
    return precedenceOf(node) < min ? `(${text})` : text
  }

  /**
   * Right-hand side of an assignment or an expression statement, where a
   * bare `yield` is allowed
   */
  value(node: Expression): string {
    return node.kind === 'Yield' ? this.render(node) : this.print(node)
  }

  list(nodes: readonly Expression[], min: number = PREC.LAMBDA): string {
    return nodes.map((node) => this.print(node, min)).join(', ')
  }

  callArguments(args: readonly Argument[]): string {
    const [only] = args
    if (args.length === 1 && only.kind === 'GeneratorExp') {
      return this.comprehension(only.elt, only.generators)
    }
    return args
      .map((arg) => (arg.kind === 'Keyword' ? `${arg.name}=${this.print(arg.value)}` : this.print(arg)))
      .join(', ')
  }

  parameters(params: Parameters): string {
    const parts: string[] = []
    const positionalOnly = new Set(params.positional.slice(0, params.positionalOnlyCount))
    const ordered = [
      ...params.positional.filter((param) => !param.default),
      ...params.positional.filter((param) => param.default),
    ]
    let remainingPositionalOnly = positionalOnly.size
    for (const param of ordered) {
      parts.push(this.parameter(param))
      if (positionalOnly.has(param) && --remainingPositionalOnly === 0) {
        parts.push('/')
      }
    }
    if (params.vararg) {
      parts.push(`*${this.parameter(params.vararg)}`)
    } else if (params.keywordOnly.length > 0) {
      parts.push('*')
    }
    for (const param of params.keywordOnly) {
      parts.push(this.parameter(param))
    }
    if (params.kwarg) {
      parts.push(`**${this.parameter(params.kwarg)}`)
    }
    return parts.join(', ')
  }

  private parameter(param: Parameter): string {
    let text = param.name
    if (param.annotation) {
      text += `: ${this.print(param.annotation)}`
    }
    if (param.default) {
      text += param.annotation ? ` = ${this.print(param.default)}` : `=${this.print(param.default)}`
    }
    return text
  }

  private comprehension(elt: string | Expression, generators: readonly Comprehension[]): string {
    let text = typeof elt === 'string' ? elt : this.print(elt, PREC.TEST)
    for (const generator of generators) {
      const keyword = generator.isAsync ? 'async for' : 'for'
      text += ` ${keyword} ${this.print(generator.target, PREC.BIT_OR)} in ${this.print(generator.iter, PREC.OR)}`
      for (const condition of generator.ifs) {
        text += ` if ${this.print(condition, PREC.OR)}`
      }
    }
    return text
  }

  private string(node: StringLiteral): string {
    const quote = chooseQuote(node, this.quote)
    const isRaw = /r/i.test(node.prefix)
    const delimiter = node.triple ? quote.repeat(3) : quote
    const body = node.segments
      .map((segment) => this.segment(segment, node.quote, quote, isRaw))
      .join('')
    return `${node.prefix}${delimiter}${body}${delimiter}`
  }

  private segment(segment: StringSegment, from: Quote, to: Quote, isRaw: boolean): string {
    if (segment.kind === 'Text') {
      return requote(segment.raw, from, to, isRaw)
    }
    let inner = segment.debugText ?? new ExpressionPrinter(otherQuote(to)).print(segment.expression, PREC.TEST)
    if (inner.startsWith('{')) {
      inner = ` ${inner}`
    }
    return `{${inner}${segment.conversion ?? ''}${segment.formatSpec ?? ''}}`
  }

  private render(node: Expression): string {
    switch (node.kind) {
      case 'Name':
        return node.id

      case 'Number':
        return canonicalNumber(node.text)

      case 'String':
        return this.string(node)

      case 'ConcatenatedString':
        return node.parts.map((part) => this.string(part)).join(' ')

      case 'Constant':
        return node.value

      case 'Ellipsis':
        return '...'

      case 'BinaryOp': {
        const prec = BINARY_PRECEDENCE[node.op]
        // `**` is right-associative and binds tighter than a unary operator on its left
        const [leftMin, rightMin] = node.op === '**' ? [PREC.AWAIT, PREC.FACTOR] : [prec, prec + 1]
        return `${this.print(node.left, leftMin)} ${node.op} ${this.print(node.right, rightMin)}`
      }

      case 'UnaryOp':
        return node.op === 'not'
          ? `not ${this.print(node.operand, PREC.NOT)}`
          : `${node.op}${this.print(node.operand, PREC.FACTOR)}`

      case 'BoolOp': {
        const prec = precedenceOf(node)
        return `${this.print(node.left, prec)} ${node.op} ${this.print(node.right, prec + 1)}`
      }

      case 'Compare': {
        let text = this.print(node.left, PREC.COMPARE + 1)
        node.ops.forEach((op, index) => {
          text += ` ${op} ${this.print(node.comparators[index], PREC.COMPARE + 1)}`
        })
        return text
      }

      case 'IfExp':
        return `${this.print(node.body, PREC.OR)} if ${this.print(node.test, PREC.OR)} else ${this.print(node.orelse, PREC.TEST)}`

      case 'NamedExpr':
        return `${node.target.id} := ${this.print(node.value)}`

      case 'Lambda': {
        const params = this.parameters(node.params)
        return `lambda${params ? ` ${params}` : ''}: ${this.print(node.body)}`
      }

      case 'Await':
        return `await ${this.print(node.value, PREC.ATOM)}`

      case 'Yield': {
        const keyword = node.delegate ? 'yield from' : 'yield'
        return node.value ? `${keyword} ${this.print(node.value)}` : keyword
      }

      case 'Call':
        return `${this.print(node.func, PREC.ATOM)}(${this.callArguments(node.args)})`

      case 'Attribute': {
        let value = this.print(node.value, PREC.ATOM)
        // `1.real` would lex as a float
        if (/^\d+$/.test(value)) {
          value = `(${value})`
        }
        return `${value}.${node.attr}`
      }

      case 'Subscript': {
        const comma = node.trailingComma && node.indices.length === 1 ? ',' : ''
        return `${this.print(node.value, PREC.ATOM)}[${this.list(node.indices)}${comma}]`
      }

      case 'Slice': {
        const lower = node.lower ? this.print(node.lower) : ''
        const upper = node.upper ? this.print(node.upper) : ''
        const step = node.step ? `:${this.print(node.step)}` : ''
        return `${lower}:${upper}${step}`
      }

      case 'Starred':
        return `*${this.print(node.value, PREC.BIT_OR)}`

      case 'DoubleStarred':
        return `**${this.print(node.value, PREC.BIT_OR)}`

      case 'List':
        return `[${this.list(node.elts)}]`

      case 'Tuple':
        if (node.elts.length === 1) {
          return `(${this.print(node.elts[0])},)`
        }
        return `(${this.list(node.elts)})`

      case 'Set':
        return `{${this.list(node.elts)}}`

      case 'Dict': {
        const items = node.items.map((item) =>
          'kind' in item ? this.print(item) : `${this.print(item.key)}: ${this.print(item.value)}`,
        )
        return `{${items.join(', ')}}`
      }

      case 'ListComp':
        return `[${this.comprehension(node.elt, node.generators)}]`

      case 'SetComp':
        return `{${this.comprehension(node.elt, node.generators)}}`

      case 'GeneratorExp':
        return `(${this.comprehension(node.elt, node.generators)})`

      case 'DictComp': {
        const pair = `${this.print(node.key)}: ${this.print(node.value)}`
        return `{${this.comprehension(pair, node.generators)}}`
      }

      case 'Unsupported':
        return unsupportedPlaceholder(node)

      default:
        return unsupportedPlaceholder(node)
    }
  }
}
