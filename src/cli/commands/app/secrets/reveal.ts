/**
 * edgectl CLI - app secrets reveal
 *
 * Print the value of one secret of an app, or of all of them with --all.
 *
 *   edgectl app secrets reveal DB_PASSWORD my-app
 *   edgectl app secrets reveal --all --app-dir ./my-app
 *   edgectl app secrets reveal --all --format yaml
 */

import type { CLIArgs, ListFormat, PlatformApi, Prompt, RevealMode } from '../../../../types.js'
import { resolveAppId, resolveSecretName } from '../../../../lib/app-resolver.js'
import { fetchSecrets } from '../../../../lib/secrets.js'
import { parseListFormat, renderReveal, toItemFormat } from '../../../../lib/render.js'
import { ConflictingArgumentsError, errorMessage } from '../../../../lib/errors.js'
import { createClientFromConfig } from '../../../lib/create-client.js'
import { createPrompt } from '../../../lib/prompt.js'
import { c } from '../../../lib/colors.js'
import * as ui from '../../../ui.js'

export interface RevealContext {
  /** `_` is ['reveal', name?, app_id?] */
  args: CLIArgs
  verbose: boolean
  nonInteractive: boolean
  /** Injected collaborators; built from args and the terminal when absent */
  client?: PlatformApi
  prompt?: Prompt
  cwd?: () => string
}

export interface RevealRequest {
  secretName?: string
  appId?: string
  appDir?: string
  all: boolean
  format?: ListFormat
}

function resolveFormat(args: CLIArgs): ListFormat | undefined {
  const format = args.format !== undefined ? parseListFormat(args.format) : undefined
  if (args.json) {
    if (format !== undefined && format !== 'json') {
      throw new ConflictingArgumentsError('--json', '--format')
    }
    return 'json'
  }
  return format
}

/**
 * Validate arguments before any resolution or network work
 */
export function parseRevealArgs(args: CLIArgs): RevealRequest {
  const secretName: string | undefined = args._[1]
  const appId: string | undefined = args._[2]
  const appDir = args['app-dir']
  const all = args.all ?? false

  if (all && secretName !== undefined) {
    throw new ConflictingArgumentsError('name', '--all')
  }
  if (appId !== undefined && appDir !== undefined) {
    throw new ConflictingArgumentsError('app_id', '--app-dir')
  }

  const format = resolveFormat(args)
  if (!all && format !== undefined) {
    // Fails fast for item-table
    toItemFormat(format)
  }

  return { secretName, appId, appDir, all, format }
}

/**
 * Run the reveal command
 */
export async function runReveal(context: RevealContext): Promise<void> {
  const { args, verbose, nonInteractive } = context
  const request = parseRevealArgs(args)

  const client = context.client ?? await createClientFromConfig({ args, verbose })
  const prompt = context.prompt ?? createPrompt()

  const appId = await resolveAppId({
    client,
    appId: request.appId,
    appDir: request.appDir,
    nonInteractive,
    prompt,
    cwd: context.cwd,
    onConfigError: (err, dir) => {
      ui.verbose(`Ignoring project config in ${dir}: ${errorMessage(err)}`, verbose)
    }
  })
  ui.verbose(`Revealing secrets of app ${c.app(appId)}`, verbose)

  const mode: RevealMode = request.all
    ? { kind: 'all' }
    : { kind: 'single', name: await resolveSecretName({ name: request.secretName, nonInteractive, prompt }) }

  const result = await ui.withSpinner('Fetching secrets...', () => fetchSecrets(client, appId, mode))

  ui.outputRaw(renderReveal(result, request.format, { tty: ui.isTTY }))
}
