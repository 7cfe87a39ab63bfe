/**
 * Canonical printer for the annotated Python tree
 * Builds a prettier Doc: every statement on its own line, nested Blocks
 * indented one level, comments re-emitted where the merger placed them
 */

import type { Doc } from 'prettier'
import { doc } from 'prettier'
import type { Alias, Comment, WithItem } from './ast.js'
import type {
  AnnotatedExceptHandler,
  AnnotatedModule,
  Block,
  BlockEntry,
  ConditionalWithComments,
  NonBranchingStatement,
} from './annotated.js'
import { ExpressionPrinter, PREC, unsupportedPlaceholder } from './expression-printer.js'
import { normalizeComment } from './literals.js'
import { DEFAULT_FORMATTER_OPTIONS } from './options.js'
import type { FormatterOptions } from './options.js'

const { builders } = doc
const { hardline, indent, join } = builders

const expressions = new ExpressionPrinter('"')

function trailingComment(comment: Comment | undefined): Doc {
  return comment ? ['  ', normalizeComment(comment.text)] : ''
}

/**
 * `header:` with an optional comment, followed by the indented body
 */
function suite(header: string, comment: Comment | undefined, body: Block): Doc {
  return [header, ':', trailingComment(comment), indent([hardline, printBlock(body)])]
}

function printAlias(alias: Alias): string {
  return alias.asname ? `${alias.name} as ${alias.asname}` : alias.name
}

function printWithItem(item: WithItem): string {
  const context = expressions.print(item.context)
  return item.target ? `${context} as ${expressions.print(item.target, PREC.BIT_OR)}` : context
}

function printHandler(handler: AnnotatedExceptHandler): Doc {
  let header = 'except'
  if (handler.type) {
    header += ` ${expressions.print(handler.type)}`
    if (handler.name) {
      header += ` as ${handler.name}`
    }
  }
  return suite(header, handler.headComment, handler.body)
}

function printDecorated(decorators: readonly Doc[], definition: Doc): Doc {
  return [...decorators.flatMap((decorator) => [decorator, hardline]), definition]
}

/**
 * `if`/`elif` chain. A nested conditional that is the whole else arm prints
 * as `elif`, unless the `else:` line carries a comment of its own.
 */
function printConditional(entry: ConditionalWithComments, keyword: 'if' | 'elif'): Doc {
  const { node, headComment, elseComment } = entry
  const parts: Doc[] = [suite(`${keyword} ${expressions.print(node.test)}`, headComment, node.body)]
  const [only] = node.orelse
  if (node.orelse.length === 1 && only.kind === 'ConditionalWithComments' && !elseComment) {
    parts.push(hardline, printConditional(only, 'elif'))
  } else if (node.orelse.length > 0) {
    parts.push(hardline, suite('else', elseComment, node.orelse))
  }
  return parts
}

function printElse(orelse: Block): Doc {
  return orelse.length > 0 ? [hardline, suite('else', undefined, orelse)] : ''
}

/**
 * Print a statement; `comment` goes after a simple statement or after the
 * header line of a compound one
 */
export function printStatement(node: NonBranchingStatement, comment?: Comment): Doc {
  const simple = (text: string): Doc => [text, trailingComment(comment)]

  switch (node.kind) {
    case 'Expr':
      return simple(expressions.value(node.value))

    case 'Assign': {
      const targets = node.targets.map((target) => expressions.print(target))
      return simple(`${targets.join(' = ')} = ${expressions.value(node.value)}`)
    }

    case 'AnnAssign': {
      const declaration = `${expressions.print(node.target)}: ${expressions.print(node.annotation)}`
      return simple(node.value ? `${declaration} = ${expressions.value(node.value)}` : declaration)
    }

    case 'AugAssign':
      return simple(`${expressions.print(node.target)} ${node.op} ${expressions.value(node.value)}`)

    case 'Return':
      return simple(node.value ? `return ${expressions.print(node.value)}` : 'return')

    case 'Delete':
      return simple(`del ${expressions.list(node.targets)}`)

    case 'Pass':
      return simple('pass')

    case 'Break':
      return simple('break')

    case 'Continue':
      return simple('continue')

    case 'Raise': {
      let text = 'raise'
      if (node.exc) {
        text += ` ${expressions.print(node.exc)}`
      }
      if (node.cause) {
        text += ` from ${expressions.print(node.cause)}`
      }
      return simple(text)
    }

    case 'Global':
      return simple(`global ${node.names.join(', ')}`)

    case 'Nonlocal':
      return simple(`nonlocal ${node.names.join(', ')}`)

    case 'Assert':
      return simple(
        node.msg
          ? `assert ${expressions.print(node.test)}, ${expressions.print(node.msg)}`
          : `assert ${expressions.print(node.test)}`,
      )

    case 'Import':
      return simple(`import ${node.names.map(printAlias).join(', ')}`)

    case 'ImportFrom': {
      const names = node.names === '*' ? '*' : node.names.map(printAlias).join(', ')
      return simple(`from ${'.'.repeat(node.level)}${node.module} import ${names}`)
    }

    case 'For': {
      const keyword = node.isAsync ? 'async for' : 'for'
      const header = `${keyword} ${expressions.print(node.target, PREC.BIT_OR)} in ${expressions.print(node.iter)}`
      return [suite(header, comment, node.body), printElse(node.orelse)]
    }

    case 'While':
      return [suite(`while ${expressions.print(node.test)}`, comment, node.body), printElse(node.orelse)]

    case 'Try': {
      const parts: Doc[] = [suite('try', comment, node.body)]
      for (const handler of node.handlers) {
        parts.push(hardline, printHandler(handler))
      }
      parts.push(printElse(node.orelse))
      if (node.finalbody.length > 0) {
        parts.push(hardline, suite('finally', undefined, node.finalbody))
      }
      return parts
    }

    case 'With': {
      const keyword = node.isAsync ? 'async with' : 'with'
      return suite(`${keyword} ${node.items.map(printWithItem).join(', ')}`, comment, node.body)
    }

    case 'FunctionDef': {
      const keyword = node.isAsync ? 'async def' : 'def'
      let header = `${keyword} ${node.name}(${expressions.parameters(node.params)})`
      if (node.returns) {
        header += ` -> ${expressions.print(node.returns)}`
      }
      const decorators = node.decorators.map((decorator) => `@${expressions.print(decorator)}`)
      return printDecorated(decorators, suite(header, comment, node.body))
    }

    case 'ClassDef': {
      const bases = node.bases.length > 0 ? `(${expressions.callArguments(node.bases)})` : ''
      const decorators = node.decorators.map((decorator) => `@${expressions.print(decorator)}`)
      return printDecorated(decorators, suite(`class ${node.name}${bases}`, comment, node.body))
    }

    case 'Unsupported':
      return simple(unsupportedPlaceholder(node))

    default:
      return simple(unsupportedPlaceholder(node))
  }
}

function printEntry(entry: BlockEntry): Doc {
  switch (entry.kind) {
    case 'StandaloneComment':
      return normalizeComment(entry.comment.text)
    case 'Bare':
      return printStatement(entry.node)
    case 'Trailing':
      return printStatement(entry.node, entry.comment)
    case 'ConditionalWithComments':
      return printConditional(entry, 'if')
  }
}

export function printBlock(block: Block): Doc {
  return join(hardline, block.map(printEntry))
}

export function printModuleDoc(module: AnnotatedModule): Doc {
  return module.body.length > 0 ? [printBlock(module.body), hardline] : ''
}

/**
 * Render an annotated module to canonical text
 */
export function printModule(
  module: AnnotatedModule,
  options: Partial<FormatterOptions> = {},
): string {
  const { indentSize } = { ...DEFAULT_FORMATTER_OPTIONS, ...options }
  const { formatted } = doc.printer.printDocToString(printModuleDoc(module), {
    printWidth: 80,
    tabWidth: indentSize,
    useTabs: false,
  })
  return formatted
}
