/**
 * Mapping from cli-args-parser results to CLIArgs and the command context
 */

import type { CommandParseResult } from 'cli-args-parser'
import type { CLIArgs } from '../types.js'
import * as ui from './ui.js'

function readString(bag: Record<string, unknown>, key: string): string | undefined {
  const value = bag[key]
  return typeof value === 'string' ? value : undefined
}

function readBoolean(bag: Record<string, unknown>, key: string): boolean | undefined {
  const value = bag[key]
  return typeof value === 'boolean' ? value : undefined
}

/**
 * Convert cli-args-parser result to CLIArgs format
 */
export function toCliArgs(result: Pick<CommandParseResult, 'command' | 'options' | 'positional'>): CLIArgs {
  const opts: Record<string, unknown> = { ...result.options }
  const pos: Record<string, unknown> = { ...result.positional }

  // Build the _ array: command + positional args
  const args: string[] = [...result.command]
  for (const value of Object.values(pos)) {
    if (value !== undefined && value !== null) {
      args.push(String(value))
    }
  }

  return {
    _: args,
    // Global options
    registry: readString(opts, 'registry'),
    token: readString(opts, 'token'),
    verbose: readBoolean(opts, 'verbose'),
    quiet: readBoolean(opts, 'quiet'),
    help: readBoolean(opts, 'help'),
    version: readBoolean(opts, 'version'),
    // reveal options
    'app-dir': readString(opts, 'app-dir'),
    all: readBoolean(opts, 'all'),
    'non-interactive': readBoolean(opts, 'non-interactive'),
    format: readString(opts, 'format'),
    json: readBoolean(opts, 'json')
  }
}

/**
 * Build context from parsed args
 */
export function buildContext(args: CLIArgs, stdinIsTTY: boolean = process.stdin.isTTY ?? false) {
  const verbose = args.verbose ?? false
  const quiet = args.quiet ?? false
  // Prompting is off by default when stdin is not a terminal
  const nonInteractive = args['non-interactive'] ?? !stdinIsTTY

  // Set global quiet mode for UI
  ui.setQuiet(quiet)

  return {
    args,
    verbose,
    quiet,
    nonInteractive
  }
}
