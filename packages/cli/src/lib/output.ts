import { formatMagnitude } from '@bytewise/core'
import { Console, type Effect } from 'effect'
import pc from 'picocolors'

// ============================================
// Types
// ============================================

export type OutputFormat = 'json' | 'table'

/** Column definition for display schemas */
export type Column<T> = {
  key: keyof T
  label: string
  width?: number
  format?: (value: unknown, row: T) => string
  color?: (value: unknown, row: T) => (s: string) => string
}

/** Display schema defines how to render a row type */
export type DisplaySchema<T> = {
  columns: Column<T>[]
}

// ============================================
// Built-in Formatters
// ============================================

export const formatters = {
  /** Format a byte count, e.g. "1536 B" */
  bytes: (v: unknown): string => {
    if (typeof v !== 'number') return '-'
    return `${formatMagnitude(v)} B`
  },

  /** Format a boolean as yes/no */
  flag: (v: unknown): string => (v === true ? 'yes' : 'no'),

  /** Truncate string to max length */
  truncate:
    (maxLen: number) =>
    (v: unknown): string => {
      if (v === null || v === undefined) return '-'
      const str = String(v)
      if (str.length <= maxLen) return str
      return `${str.slice(0, maxLen - 1)}...`
    },

  /** Identity formatter - just convert to string */
  string: (v: unknown): string => {
    if (v === null || v === undefined) return '-'
    return String(v)
  },
}

// ============================================
// Rendering Functions
// ============================================

/** Strip ANSI codes to get actual string length */
// biome-ignore lint/suspicious/noControlCharactersInRegex: ANSI escape codes use control chars
export const stripAnsi = (str: string): string => str.replace(/\x1b\[[0-9;]*m/g, '')

/** Pad string accounting for ANSI codes */
const padEnd = (str: string, width: number): string => {
  const visibleLength = stripAnsi(str).length
  const padding = Math.max(0, width - visibleLength)
  return str + ' '.repeat(padding)
}

/** Render rows as a styled table */
export const renderTable = <T>(data: readonly T[], schema: DisplaySchema<T>): string => {
  if (data.length === 0) {
    return pc.dim('No results.')
  }

  const header = schema.columns.map((c) => pc.bold(padEnd(c.label, c.width ?? 15))).join('  ')

  // Separator spans the visible header
  const separatorWidth = stripAnsi(header).length
  const separator = pc.dim('─'.repeat(separatorWidth))

  const rows = data.map((row) =>
    schema.columns
      .map((c) => {
        const raw = row[c.key]
        const formatted = c.format ? c.format(raw, row) : formatters.string(raw)
        const colorFn = c.color?.(raw, row) ?? ((s: string) => s)
        return padEnd(colorFn(formatted), c.width ?? 15)
      })
      .join('  ')
      .trimEnd(),
  )

  return [header, separator, ...rows].join('\n')
}

// ============================================
// Main Output Function
// ============================================

/**
 * Output a row in the specified format.
 *
 * @param format - 'table' for human-readable, 'json' for scripts
 */
export const output = <T>(row: T, format: OutputFormat, schema: DisplaySchema<T>): Effect.Effect<void> =>
  format === 'json' ? Console.log(JSON.stringify(row, null, 2)) : Console.log(renderTable([row], schema))

// ============================================
// Message Helpers
// ============================================

/** Error message with X */
export const error = (msg: string): Effect.Effect<void> => Console.error(`${pc.red('✗')} ${msg}`)
