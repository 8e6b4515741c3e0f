/**
 * Resolution of the app and secret a command applies to
 *
 * App priority:
 * 1. Explicit identifier (resolved remotely)
 * 2. app_id cached in <dir>/app.yaml (dir = --app-dir or cwd, not validated remotely)
 * 3. Interactive prompt (resolved remotely), unless non-interactive
 */

import type { PlatformApi, Prompt } from '../types.js'
import { parseAppIdent, resolveAppIdent } from './app-ident.js'
import { readAppIdFromConfig } from './config-loader.js'
import { IoError, MissingInputError, errorMessage } from './errors.js'

export interface ResolveAppIdOptions {
  client: PlatformApi
  /** Explicit app reference (id, name, owner/name or URL) */
  appId?: string
  /** Directory holding the project config */
  appDir?: string
  nonInteractive: boolean
  prompt: Prompt
  /** Working directory lookup, process.cwd by default */
  cwd?: () => string
  /** Called when the project config exists but cannot be used */
  onConfigError?: (error: unknown, dir: string) => void
}

export async function resolveAppId(options: ResolveAppIdOptions): Promise<string> {
  const { client, appId, appDir, nonInteractive, prompt, cwd = process.cwd, onConfigError } = options

  if (appId !== undefined) {
    const app = await resolveAppIdent(client, parseAppIdent(appId))
    return app.id
  }

  let dir: string
  if (appDir !== undefined) {
    dir = appDir
  } else {
    try {
      dir = cwd()
    } catch (err) {
      throw new IoError(`Could not determine the current directory: ${errorMessage(err)}`, err)
    }
  }

  try {
    const cachedId = await readAppIdFromConfig(dir)
    if (cachedId) {
      return cachedId
    }
  } catch (err) {
    // An unusable config counts as "no cached id"
    onConfigError?.(err, dir)
  }

  if (nonInteractive) {
    throw new MissingInputError(
      'app id',
      'Pass the app id as an argument, or use --app-dir to point at a directory with an app.yaml'
    )
  }

  const answer = await prompt('Enter the name of the app')
  const app = await resolveAppIdent(client, parseAppIdent(answer))
  return app.id
}

export interface ResolveSecretNameOptions {
  name?: string
  nonInteractive: boolean
  prompt: Prompt
}

/**
 * Secret name for single-secret mode. An explicit name is returned as-is.
 */
export async function resolveSecretName(options: ResolveSecretNameOptions): Promise<string> {
  const { name, nonInteractive, prompt } = options

  if (name !== undefined) {
    return name
  }

  if (nonInteractive) {
    throw new MissingInputError(
      'secret name',
      'Pass the secret name as an argument, or use --all to reveal every secret'
    )
  }

  return prompt('Enter the name of the secret')
}
