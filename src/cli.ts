/**
 * Python Formatter CLI
 * Formats Python source files into their canonical, comment-preserving form
 *
 * Usage: python-format <file.py> [options]
 */

import * as fs from 'fs'
import * as path from 'path'
import { reformat } from './index.js'
import { PythonSyntaxError } from './errors.js'
import { DEFAULT_FORMATTER_OPTIONS } from './options.js'

export interface CliOptions {
  input?: string
  output?: string
  write?: boolean
  check?: boolean
  quiet?: boolean
  debug?: boolean
  help?: boolean
  indentSize?: number
}

export function showHelp(): void {
  console.log('Usage: python-format <file.py> [options]')
  console.log('')
  console.log('Arguments:')
  console.log('  <file.py>            Path to a Python file to format')
  console.log('')
  console.log('Options:')
  console.log('  --write, -w          Write formatted output back to input file')
  console.log('  --output, -o <file>  Write formatted output to specified file')
  console.log('  --check, -c          Check if file is formatted (exit 1 if not)')
  console.log(`  --indent, -i <n>     Spaces per nesting level (default ${DEFAULT_FORMATTER_OPTIONS.indentSize})`)
  console.log('  --quiet, -q          Suppress output except errors')
  console.log('  --debug              Log the parse tree')
  console.log('  --help, -h           Show this help message')
  console.log('')
  console.log('Examples:')
  console.log('  python-format app.py              # Preview formatted output')
  console.log('  python-format app.py --write      # Format and overwrite')
  console.log('  python-format app.py -o out.py    # Format and save to new file')
  console.log('  python-format app.py --check      # Check if formatted')
}

function optionValue(args: string[], index: number, flag: string): string {
  const value = args[index]
  if (value === undefined || value.startsWith('-')) {
    throw new Error(`Missing value for ${flag}`)
  }
  return value
}

export function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = {}

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    switch (arg) {
      case '--help':
      case '-h':
        options.help = true
        break
      case '--write':
      case '-w':
        options.write = true
        break
      case '--check':
      case '-c':
        options.check = true
        break
      case '--quiet':
      case '-q':
        options.quiet = true
        break
      case '--debug':
        options.debug = true
        break
      case '--output':
      case '-o':
        options.output = optionValue(args, ++i, arg)
        break
      case '--indent':
      case '-i': {
        const value = optionValue(args, ++i, arg)
        const size = Number(value)
        if (!Number.isInteger(size) || size < 1) {
          throw new Error(`Invalid indent size: ${value}`)
        }
        options.indentSize = size
        break
      }
      default:
        if (arg.startsWith('-')) {
          throw new Error(`Unknown option: ${arg}`)
        }
        if (options.input) {
          throw new Error(`Unexpected argument: ${arg}`)
        }
        options.input = arg
    }
  }

  return options
}

/**
 * Format one file as the options say
 * @returns the process exit code
 */
export function formatFile(input: string, options: CliOptions = {}): number {
  const quiet = options.quiet ?? false
  const sourceFile = path.resolve(input)
  const displayName = path.relative(process.cwd(), sourceFile)

  if (!fs.existsSync(sourceFile)) {
    console.error(`Error: File not found: ${sourceFile}`)
    return 1
  }

  if (!sourceFile.endsWith('.py') && !quiet) {
    console.warn(`Warning: File does not have .py extension: ${sourceFile}`)
  }

  const sourceCode = fs.readFileSync(sourceFile, 'utf8')

  if (!quiet) {
    console.log('Input:', displayName)
    console.log('Size:', sourceCode.length, 'bytes,', sourceCode.split('\n').length, 'lines')
  }

  let formatted: string
  try {
    formatted = reformat(sourceCode, {
      indentSize: options.indentSize ?? DEFAULT_FORMATTER_OPTIONS.indentSize,
      debug: options.debug ?? false,
    })
  } catch (error) {
    if (error instanceof PythonSyntaxError) {
      console.error(`${displayName}:${error.line}:${error.column}: ${error.message}`)
      return 1
    }
    throw error
  }

  const isUnchanged = formatted === sourceCode

  if (options.check) {
    if (!quiet) {
      console.log(isUnchanged ? '✓ File is formatted correctly' : '✗ File is not formatted')
    }
    return isUnchanged ? 0 : 1
  }

  if (options.write || options.output) {
    const targetFile = options.output ? path.resolve(options.output) : sourceFile
    fs.writeFileSync(targetFile, formatted, 'utf8')
    if (!quiet) {
      console.log('Output:', path.relative(process.cwd(), targetFile))
      console.log('Size:', formatted.length, 'bytes,', formatted.split('\n').length, 'lines')
      console.log(isUnchanged ? '✓ No changes' : '✓ Formatted')
    }
    return 0
  }

  if (!quiet) {
    console.log('')
    console.log('--- Formatted Output ---')
    console.log('')
  }
  process.stdout.write(formatted)
  return 0
}

/**
 * Run the CLI on raw arguments
 * @returns the process exit code
 */
export function main(args: string[]): number {
  if (args.length === 0) {
    showHelp()
    return 1
  }

  let options: CliOptions
  try {
    options = parseArgs(args)
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : String(error))
    console.error('Run with --help for usage information')
    return 1
  }

  if (options.help) {
    showHelp()
    return 0
  }

  if (!options.input) {
    console.error('Error: No input file specified')
    console.error('Run with --help for usage information')
    return 1
  }

  try {
    return formatFile(options.input, options)
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : String(error))
    if (!options.quiet && error instanceof Error && error.stack) {
      console.error('')
      console.error(error.stack)
    }
    return 1
  }
}
