/**
 * Output rendering for revealed secrets
 *
 * | mode   | format          | output                              |
 * |--------|-----------------|-------------------------------------|
 * | single | none            | raw value, no newline               |
 * | single | json/yaml/table | the secret as one item              |
 * | single | item-table      | UnsupportedFormatError              |
 * | all    | none            | NAME="sanitized" lines              |
 * | all    | any             | the secrets as a list               |
 */

import { Table, renderToString } from 'tuiuiu.js'
import { stringify as stringifyYaml } from 'yaml'
import type { ItemFormat, ListFormat, RevealResult, Secret } from '../types.js'
import { InvalidFormatError, UnsupportedFormatError } from './errors.js'

export const LIST_FORMATS: readonly ListFormat[] = ['json', 'yaml', 'table', 'item-table']

export interface RenderOptions {
  /** Render tables with borders (TTY) instead of tab-separated text */
  tty?: boolean
}

interface TableColumn {
  key: string
  header: string
}

export function parseListFormat(value: string): ListFormat {
  const format = LIST_FORMATS.find(f => f === value)
  if (!format) {
    throw new InvalidFormatError(value, LIST_FORMATS)
  }
  return format
}

/**
 * Narrow a list format to one usable for a single item
 *
 * @throws UnsupportedFormatError for item-table
 */
export function toItemFormat(format: ListFormat): ItemFormat {
  switch (format) {
    case 'json':
    case 'yaml':
    case 'table':
      return format
    case 'item-table':
      throw new UnsupportedFormatError(
        "The 'item-table' format is not available for single values.",
        format
      )
  }
}

// ============================================================================
// Shell-safe values
// ============================================================================

const ESCAPES = new Map<string, string>([
  ['\\', '\\\\'],
  ['"', '\\"'],
  ['$', '\\$'],
  ['`', '\\`'],
  ['\n', '\\n'],
  ['\r', '\\r'],
  ['\t', '\\t']
])

/**
 * Escape a value for use inside NAME="..."
 *
 * The result never contains a raw control character or an unescaped quote.
 */
export function sanitizeValue(value: string): string {
  let sanitized = ''
  for (const ch of value) {
    const escaped = ESCAPES.get(ch)
    if (escaped !== undefined) {
      sanitized += escaped
      continue
    }
    const code = ch.codePointAt(0) ?? 0
    if (code < 0x20 || code === 0x7f) {
      sanitized += `\\x${code.toString(16).padStart(2, '0')}`
    } else {
      sanitized += ch
    }
  }
  return sanitized
}

/**
 * One NAME="value" line per secret
 */
export function renderEnvLines(secrets: Secret[]): string {
  return secrets.map(secret => `${secret.name}="${sanitizeValue(secret.value)}"\n`).join('')
}

// ============================================================================
// Structured formats
// ============================================================================

const CELL_ESCAPES = new Map<string, string>([
  ['\\', '\\\\'],
  ['\t', '\\t'],
  ['\n', '\\n'],
  ['\r', '\\r']
])

/**
 * Keep a cell on one line and in one column of tab-separated output
 */
function escapeCell(value: string): string {
  return value.replace(/[\\\t\n\r]/g, ch => CELL_ESCAPES.get(ch) ?? ch)
}

function renderTable(
  columns: TableColumn[],
  rows: Array<Record<string, string>>,
  options: { tty: boolean; showHeader: boolean }
): string {
  if (!options.tty) {
    // Simple tab-separated output for pipes
    const lines = rows.map(row => columns.map(c => escapeCell(row[c.key] ?? '')).join('\t'))
    if (options.showHeader) {
      lines.unshift(columns.map(c => c.header).join('\t'))
    }
    return lines.join('\n')
  }

  const table = Table({
    columns: columns.map(c => ({ key: c.key, header: c.header, align: 'left' as const })),
    data: rows,
    borderStyle: 'round',
    showHeader: options.showHeader
  })
  return renderToString(table)
}

function renderItemTable(secret: Secret, tty: boolean): string {
  return renderTable(
    [
      { key: 'field', header: 'Field' },
      { key: 'value', header: 'Value' }
    ],
    [
      { field: 'Name', value: secret.name },
      { field: 'Value', value: secret.value }
    ],
    { tty, showHeader: false }
  )
}

function toPlain(secret: Secret): Secret {
  return { name: secret.name, value: secret.value }
}

export function renderItem(secret: Secret, format: ItemFormat, options: RenderOptions = {}): string {
  const tty = options.tty ?? false
  switch (format) {
    case 'json':
      return JSON.stringify(toPlain(secret), null, 2)
    case 'yaml':
      return stringifyYaml(toPlain(secret)).trimEnd()
    case 'table':
      return renderItemTable(secret, tty)
  }
}

export function renderList(secrets: Secret[], format: ListFormat, options: RenderOptions = {}): string {
  const tty = options.tty ?? false
  switch (format) {
    case 'json':
      return JSON.stringify(secrets.map(toPlain), null, 2)
    case 'yaml':
      return stringifyYaml(secrets.map(toPlain)).trimEnd()
    case 'table':
      return renderTable(
        [
          { key: 'name', header: 'Name' },
          { key: 'value', header: 'Value' }
        ],
        secrets.map(secret => ({ name: secret.name, value: secret.value })),
        { tty, showHeader: true }
      )
    case 'item-table':
      return secrets.map(secret => renderItemTable(secret, tty)).join('\n\n')
  }
}

/**
 * Text to write to stdout for a reveal result
 *
 * @param format - undefined selects the plain rendering
 */
export function renderReveal(
  result: RevealResult,
  format: ListFormat | undefined,
  options: RenderOptions = {}
): string {
  switch (result.kind) {
    case 'single':
      if (format === undefined) {
        return result.secret.value
      }
      return renderItem(result.secret, toItemFormat(format), options) + '\n'
    case 'all':
      if (format === undefined) {
        return renderEnvLines(result.secrets)
      }
      return renderList(result.secrets, format, options) + '\n'
  }
}
