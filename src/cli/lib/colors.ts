/**
 * edgectl CLI - Colors Utility
 *
 * Terminal colors using tuiuiu.js text-utils + ANSI 256 for the teal palette.
 * Supports NO_COLOR / FORCE_COLOR.
 */

import { colorize, style } from 'tuiuiu.js'
import type { Formatter } from 'cli-args-parser'

// Check if colors should be enabled
const isColorEnabled = (): boolean => {
  // Respect NO_COLOR standard
  if (process.env.NO_COLOR !== undefined) return false
  // Respect FORCE_COLOR
  if (process.env.FORCE_COLOR !== undefined) return true
  return process.stderr.isTTY ?? false
}

const enabled = isColorEnabled()

// Wrappers that respect NO_COLOR
const color = (text: string, col: string): string => {
  if (!enabled) return text
  return colorize(text, col)
}

const bold = (text: string): string => {
  if (!enabled) return text
  return style(text, 'bold')
}

const dim = (text: string): string => {
  if (!enabled) return text
  return style(text, 'dim')
}

/**
 * Teal palette (ANSI 256)
 * - 37:  Teal       — primary, commands
 * - 43:  Aqua       — highlights, keys
 * - 109: Slate      — options, descriptions
 * - 245: Gray       — muted text
 */
const ansi = {
  teal: (s: string) => enabled ? `\x1b[38;5;37m${s}\x1b[39m` : s,
  aqua: (s: string) => enabled ? `\x1b[38;5;43m${s}\x1b[39m` : s,
  slate: (s: string) => enabled ? `\x1b[38;5;109m${s}\x1b[39m` : s,
  gray: (s: string) => enabled ? `\x1b[38;5;245m${s}\x1b[39m` : s
}

/**
 * Help/version formatter for cli-args-parser
 */
export const edgectlFormatter: Formatter = {
  'section-header': s => bold(s),
  'program-name': s => bold(ansi.teal(s)),
  'version': s => ansi.aqua(s),
  'description': s => s,
  'command-name': s => ansi.teal(s),
  'command-alias': s => ansi.gray(s),
  'command-description': s => s,
  'option-flag': s => ansi.aqua(s),
  'option-type': s => ansi.slate(s),
  'option-default': s => dim(s),
  'option-description': s => s,
  'positional-name': s => ansi.slate(s),
  'error-header': s => bold(color(s, 'red')),
  'error-message': s => color(s, 'red'),
  'error-option': s => ansi.teal(s)
}

// Semantic colors
export const c = {
  command: (text: string) => bold(ansi.teal(text)),
  app: (text: string) => bold(ansi.teal(text)),
  error: (text: string) => color(text, 'red'),
  muted: (text: string) => dim(text)
}

export const symbols = {
  error: enabled ? color('✗', 'red') : '[ERROR]'
}

// Print utilities (all on stderr: stdout is reserved for secret output)
export const print = {
  error: (msg: string) => console.error(`${symbols.error} ${c.error(msg)}`)
}
