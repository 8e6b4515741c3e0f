/**
 * edgectl CLI - App Secrets Command Group
 */

import { c, print } from '../../../lib/colors.js'
import * as ui from '../../../ui.js'
import type { RevealContext } from './reveal.js'

export type SecretsContext = RevealContext

/**
 * Router for app secrets subcommands (`_` starts at 'secrets')
 */
export async function runSecretsGroup(context: SecretsContext): Promise<void> {
  const { args } = context
  const subcommand = args._[1]

  switch (subcommand) {
    case 'reveal': {
      const { runReveal } = await import('./reveal.js')
      // Shift args to match expected format (secrets reveal NAME -> reveal NAME)
      await runReveal({ ...context, args: { ...args, _: args._.slice(1) } })
      break
    }

    default:
      print.error(subcommand ? `Unknown secrets subcommand: ${subcommand}` : 'Secrets subcommand required')
      ui.log(`Available: ${c.command('reveal')}`)
      process.exit(1)
  }
}
