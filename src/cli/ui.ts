/**
 * CLI UI utilities - TTY-aware output
 *
 * - stdout carries data only (secret values, rendered formats)
 * - status, hints and diagnostics go to stderr
 */

import { getSpinnerConfig } from 'tuiuiu.js'

// Detect if running in interactive terminal
export const isTTY = process.stdout.isTTY ?? false
export const isStderrTTY = process.stderr.isTTY ?? false

let quietMode = false

/**
 * Suppress non-essential stderr messages (errors and warnings still shown)
 */
export function setQuiet(quiet: boolean): void {
  quietMode = quiet
}

export function isQuiet(): boolean {
  return quietMode
}

/**
 * Output data to stdout (for pipes)
 * This and outputRaw are the only functions that write to stdout
 */
export function output(data: string): void {
  process.stdout.write(data + '\n')
}

/**
 * Output raw data without newline
 */
export function outputRaw(data: string): void {
  process.stdout.write(data)
}

/**
 * Log message to stderr (doesn't interfere with pipes)
 */
export function log(message: string): void {
  if (isTTY && !quietMode) {
    console.error(message)
  }
}

/**
 * Log verbose message
 */
export function verbose(message: string, enabled: boolean): void {
  if (enabled && !quietMode) {
    console.error(`[edgectl] ${message}`)
  }
}

interface Spinner {
  start: () => void
  stop: () => void
}

/**
 * Spinner on stderr, using tuiuiu.js frames.
 * Silent when stderr is not a terminal or quiet mode is on.
 */
export function createSpinner(text: string): Spinner {
  if (!isStderrTTY || quietMode) {
    return { start: () => {}, stop: () => {} }
  }

  const config = getSpinnerConfig('dots')
  let frameIndex = 0
  let interval: ReturnType<typeof setInterval> | null = null

  const render = () => {
    const frame = config.frames[frameIndex % config.frames.length]
    process.stderr.write(`\r\x1b[K${frame} ${text}`)
    frameIndex++
  }

  return {
    start: () => {
      render()
      interval = setInterval(render, config.interval)
    },
    stop: () => {
      if (interval) clearInterval(interval)
      interval = null
      process.stderr.write('\r\x1b[K')
    }
  }
}

/**
 * Wrap an async operation with a spinner
 */
export async function withSpinner<T>(text: string, operation: () => Promise<T>): Promise<T> {
  const spinner = createSpinner(text)
  spinner.start()

  try {
    return await operation()
  } finally {
    spinner.stop()
  }
}
