/**
 * edgectl CLI - App Command Group
 */

import { c, print } from '../../lib/colors.js'
import * as ui from '../../ui.js'
import type { SecretsContext } from './secrets/index.js'

export type AppContext = SecretsContext

/**
 * Router for app subcommands (`_` starts at 'app')
 */
export async function runAppGroup(context: AppContext): Promise<void> {
  const { args } = context
  const subcommand = args._[1]

  switch (subcommand) {
    case 'secrets':
    case 'secret': {
      const { runSecretsGroup } = await import('./secrets/index.js')
      await runSecretsGroup({ ...context, args: { ...args, _: args._.slice(1) } })
      break
    }

    default:
      print.error(subcommand ? `Unknown app subcommand: ${subcommand}` : 'App subcommand required')
      ui.log(`Available: ${c.command('secrets')}`)
      process.exit(1)
  }
}
