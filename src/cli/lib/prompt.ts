/**
 * Line prompt on stdin, asked on stderr so stdout stays clean
 */

import * as readline from 'node:readline'
import type { Prompt } from '../../types.js'
import { InputError } from '../../lib/errors.js'

export interface PromptOptions {
  input?: NodeJS.ReadableStream
  output?: NodeJS.WritableStream
}

/**
 * Build a prompt that asks until it gets a non-empty answer.
 * Rejects with InputError if the input stream ends first.
 */
export function createPrompt(options: PromptOptions = {}): Prompt {
  const input = options.input ?? process.stdin
  const output = options.output ?? process.stderr

  return (message: string) => new Promise<string>((resolve, reject) => {
    const rl = readline.createInterface({ input, output })
    let answered = false

    const ask = () => {
      rl.question(`${message}: `, (answer) => {
        const value = answer.trim()
        if (!value) {
          ask()
          return
        }
        answered = true
        rl.close()
        resolve(value)
      })
    }

    rl.on('close', () => {
      if (!answered) {
        reject(new InputError(`No answer to "${message}": input closed`))
      }
    })

    ask()
  })
}
