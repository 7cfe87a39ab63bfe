/**
 * Lexical normalization of literals: numbers and quoted strings
 */

import type { StringLiteral } from './ast.js'

export type Quote = '"' | "'"

const INTEGER = /^(0[xX][0-9a-fA-F]+|0[oO][0-7]+|0[bB][01]+|\d+)$/

/**
 * Render a numeric literal through the runtime's number-to-text conversion.
 * Floats always keep a '.' or an exponent so they stay floats; literals the
 * runtime cannot represent (e.g. `1e999`) keep their spelling.
 */
export function canonicalNumber(text: string): string {
  const digits = text.replace(/_/g, '')

  if (/[jJ]$/.test(digits)) {
    const value = Number(digits.slice(0, -1))
    return Number.isFinite(value) ? `${String(value)}j` : text
  }

  if (INTEGER.test(digits)) {
    return BigInt(digits).toString()
  }

  const value = Number(digits)
  if (!Number.isFinite(value)) {
    return text
  }
  const rendered = String(value)
  return /[.e]/.test(rendered) ? rendered : `${rendered}.0`
}

export function otherQuote(quote: Quote): Quote {
  return quote === '"' ? "'" : '"'
}

/**
 * Move a literal's raw body from one delimiter to another: escapes of the
 * old delimiter are dropped, bare occurrences of the new one are escaped.
 */
export function requote(raw: string, from: Quote, to: Quote, isRaw: boolean): string {
  if (from === to) {
    return raw
  }
  let out = ''
  for (let i = 0; i < raw.length; i++) {
    const ch = raw[i]
    if (ch === '\\' && i + 1 < raw.length) {
      const next = raw[i + 1]
      out += !isRaw && next === from ? next : ch + next
      i++
      continue
    }
    out += ch === to ? `\\${to}` : ch
  }
  return out
}

/**
 * Pick the delimiter for a string literal. Raw strings cannot escape a
 * quote, so one that contains the preferred delimiter keeps its own.
 */
export function chooseQuote(node: StringLiteral, preferred: Quote): Quote {
  if (node.quote === preferred || !/r/i.test(node.prefix)) {
    return preferred
  }
  const clashes = node.segments.some((segment) => segment.kind === 'Text' && segment.raw.includes(preferred))
  return clashes ? node.quote : preferred
}

/**
 * Normalize a comment to `# text`
 */
export function normalizeComment(text: string): string {
  const body = text.slice(text.indexOf('#') + 1).trim()
  return body ? `# ${body}` : '#'
}
