/**
 * Shared helper for creating the platform client from flags, env and user config
 */

import type { CLIArgs } from '../../types.js'
import { PlatformClient } from '../../client.js'
import { getUserConfigDir, loadUserConfig, resolveApiSettings } from '../../lib/config-loader.js'
import { VERSION } from '../../version.js'
import * as ui from '../ui.js'

export interface CreateClientOptions {
  args: CLIArgs
  verbose?: boolean
  env?: NodeJS.ProcessEnv
  /** User config directory, ~/.edgectl by default */
  configDir?: string
}

/**
 * Create a PlatformClient
 *
 * Registry/token priority: --registry/--token > EDGECTL_REGISTRY/EDGECTL_TOKEN
 * > ~/.edgectl/config.yaml > default registry
 */
export async function createClientFromConfig(options: CreateClientOptions): Promise<PlatformClient> {
  const { args, verbose = false, env = process.env } = options
  const configDir = options.configDir ?? getUserConfigDir(env)

  const userConfig = await loadUserConfig(configDir, env)
  const settings = resolveApiSettings({ registry: args.registry, token: args.token }, userConfig, env)

  ui.verbose(`Using registry ${settings.registry}`, verbose)
  if (!settings.token) {
    ui.verbose('No API token configured; requests are anonymous', verbose)
  }

  return new PlatformClient({
    registry: settings.registry,
    token: settings.token,
    userAgent: `edgectl/${VERSION}`
  })
}
