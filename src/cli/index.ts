#!/usr/bin/env node
/**
 * edgectl CLI
 *
 * Command line client for the edge deployment platform
 */

import { createCLI, type CLISchema } from 'cli-args-parser'
import { VERSION } from '../version.js'
import { LIST_FORMATS } from '../lib/render.js'
import { isEdgectlError, formatErrorForCli, errorMessage } from '../lib/errors.js'
import { c, print, edgectlFormatter } from './lib/colors.js'
import * as ui from './ui.js'
import { runAppGroup } from './commands/app/index.js'
import { toCliArgs, buildContext } from './args.js'

/**
 * CLI Schema definition
 */
const cliSchema: CLISchema = {
  name: 'edgectl',
  version: VERSION,
  description: 'Command line client for the edge deployment platform',
  autoShort: false,
  strict: true,
  formatter: edgectlFormatter,
  help: {
    includeGlobalOptionsInCommands: true
  },

  // Global options available to all commands
  options: {
    help: {
      short: 'h',
      type: 'boolean',
      default: false,
      description: 'Show help'
    },
    version: {
      type: 'boolean',
      default: false,
      description: 'Show version'
    },
    registry: {
      type: 'string',
      description: 'Platform API URL (default: EDGECTL_REGISTRY, user config, or https://api.edgectl.dev)'
    },
    token: {
      type: 'string',
      description: 'API token (default: EDGECTL_TOKEN or user config)'
    },
    verbose: {
      short: 'v',
      type: 'boolean',
      default: false,
      description: 'Enable verbose output'
    },
    quiet: {
      short: 'q',
      type: 'boolean',
      default: false,
      description: 'Suppress non-essential output (errors still shown)'
    }
  },

  commands: {
    app: {
      description: 'Manage deployed apps',
      commands: {
        secrets: {
          description: 'Manage the secrets of an app',
          aliases: ['secret'],
          commands: {
            reveal: {
              description: 'Reveal the value of an existing secret of an app',
              positional: [
                { name: 'name', required: false, description: 'Name of the secret to reveal' },
                { name: 'app_id', required: false, description: 'App id, name, owner/name or URL' }
              ],
              options: {
                'app-dir': {
                  type: 'string',
                  description: 'Directory containing the app.yaml of the app (conflicts with app_id)'
                },
                all: {
                  type: 'boolean',
                  description: 'Reveal all the secrets of the app (conflicts with name)'
                },
                'non-interactive': {
                  type: 'boolean',
                  description: 'Do not prompt for input (default: on when stdin is not a terminal)'
                },
                format: {
                  type: 'string',
                  description: `Output format: ${LIST_FORMATS.join(', ')}`
                },
                json: {
                  type: 'boolean',
                  description: 'Shorthand for --format json'
                }
              }
            }
          }
        }
      }
    }
  }
}

// Create CLI instance
const cli = createCLI(cliSchema)

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const result = cli.parse(process.argv.slice(2))
  const args = toCliArgs(result)

  // Handle help first (before error check, so `reveal --help` works)
  if (args.help || result.command.length === 0) {
    ui.output(cli.help(result.command))
    return
  }

  if (args.version) {
    ui.output(`edgectl v${VERSION}`)
    return
  }

  // Handle errors from parser (after help/version checks)
  if (result.errors.length > 0) {
    for (const error of result.errors) {
      print.error(String(error))
    }
    process.exit(1)
  }

  const context = buildContext(args)
  const command = args._[0]

  try {
    switch (command) {
      case 'app':
        await runAppGroup(context)
        break

      default:
        print.error(`Unknown command: ${c.command(command)}`)
        ui.log(`Run "${c.command('edgectl --help')}" for usage information`)
        process.exit(1)
    }
  } catch (err) {
    if (isEdgectlError(err)) {
      print.error(err.message)
      if (err.suggestion) {
        ui.log(`  ${c.muted('Suggestion:')} ${err.suggestion}`)
      }
      if (context.verbose && err.context) {
        ui.verbose(`Context: ${JSON.stringify(err.context)}`, true)
      }
    } else if (context.verbose && err instanceof Error && err.stack) {
      print.error(err.stack)
    } else {
      print.error(errorMessage(err))
    }
    process.exit(1)
  }
}

// Run
main().catch(err => {
  print.error(isEdgectlError(err) ? formatErrorForCli(err) : `Fatal error: ${errorMessage(err)}`)
  process.exit(1)
})
