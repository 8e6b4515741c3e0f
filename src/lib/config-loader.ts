/**
 * edgectl Config Loader
 *
 * Two files are read:
 * - <project>/app.yaml        project config, caches the app id
 * - ~/.edgectl/config.yaml    user config, API registry and token
 */

import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { parse as parseYaml } from 'yaml'
import type { ApiSettings, ProjectConfig, UserConfig } from '../types.js'
import { InvalidConfigError, IoError, errorMessage } from './errors.js'

export const PROJECT_CONFIG_FILE = 'app.yaml'
const USER_CONFIG_DIR = '.edgectl'
const USER_CONFIG_FILE = 'config.yaml'

export const DEFAULT_REGISTRY = 'https://api.edgectl.dev'

/**
 * Expand environment variables in a string
 * Supports: ${VAR}, ${VAR:-default}, $VAR
 */
export function expandEnvVars(str: string, env: NodeJS.ProcessEnv = process.env): string {
  // Handle ${VAR:-default} syntax
  str = str.replace(/\$\{([^}:]+):-([^}]*)\}/g, (_, varName: string, defaultValue: string) => {
    return env[varName] || defaultValue
  })

  // Handle ${VAR} syntax
  str = str.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
    return env[varName] || ''
  })

  // Handle $VAR syntax (word boundary)
  str = str.replace(/\$([A-Z_][A-Z0-9_]*)/gi, (_, varName: string) => {
    return env[varName] || ''
  })

  return str
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function optionalString(
  doc: Record<string, unknown>,
  field: string,
  filePath: string
): string | undefined {
  const value = doc[field]
  if (value === undefined || value === null) return undefined
  if (typeof value !== 'string') {
    throw new InvalidConfigError(`"${field}" must be a string`, filePath)
  }
  return value
}

/**
 * Read and parse a YAML file into a mapping.
 * Returns null when the file does not exist.
 */
async function readYamlMapping(filePath: string): Promise<Record<string, unknown> | null> {
  let content: string
  try {
    content = await fs.promises.readFile(filePath, 'utf-8')
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') {
      return null
    }
    throw new IoError(`Failed to read ${filePath}: ${errorMessage(err)}`, err)
  }

  let doc: unknown
  try {
    doc = parseYaml(content)
  } catch (err) {
    throw new InvalidConfigError(errorMessage(err), filePath, err)
  }

  // Empty file
  if (doc === null || doc === undefined) return {}

  if (!isRecord(doc)) {
    throw new InvalidConfigError('expected a mapping at the top level', filePath)
  }
  return doc
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err
}

// ============================================================================
// Project config
// ============================================================================

export function getProjectConfigPath(dir: string): string {
  return path.join(dir, PROJECT_CONFIG_FILE)
}

/**
 * Load <dir>/app.yaml, or null when the directory has none
 */
export async function loadProjectConfig(dir: string): Promise<ProjectConfig | null> {
  const filePath = getProjectConfigPath(dir)
  const doc = await readYamlMapping(filePath)
  if (!doc) return null

  return {
    app_id: optionalString(doc, 'app_id', filePath),
    name: optionalString(doc, 'name', filePath),
    owner: optionalString(doc, 'owner', filePath)
  }
}

/**
 * App id cached in the project config of `dir`, if any
 */
export async function readAppIdFromConfig(dir: string): Promise<string | null> {
  const config = await loadProjectConfig(dir)
  const appId = config?.app_id?.trim()
  return appId ? appId : null
}

// ============================================================================
// User config
// ============================================================================

/**
 * Directory of the user config (EDGECTL_CONFIG_DIR overrides ~/.edgectl)
 */
export function getUserConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.EDGECTL_CONFIG_DIR || path.join(os.homedir(), USER_CONFIG_DIR)
}

/**
 * Load the user config. A missing file yields an empty config.
 */
export async function loadUserConfig(
  configDir: string = getUserConfigDir(),
  env: NodeJS.ProcessEnv = process.env
): Promise<UserConfig> {
  const filePath = path.join(configDir, USER_CONFIG_FILE)
  const doc = await readYamlMapping(filePath)
  if (!doc) return {}

  const registry = optionalString(doc, 'registry', filePath)
  const token = optionalString(doc, 'token', filePath)

  return {
    registry: registry !== undefined ? expandEnvVars(registry, env) : undefined,
    token: token !== undefined ? expandEnvVars(token, env) : undefined
  }
}

/**
 * Resolve registry and token
 *
 * Priority:
 * 1. CLI flags (--registry, --token)
 * 2. Environment (EDGECTL_REGISTRY, EDGECTL_TOKEN)
 * 3. User config
 * 4. Default registry (token stays unset)
 */
export function resolveApiSettings(
  flags: { registry?: string; token?: string },
  userConfig: UserConfig,
  env: NodeJS.ProcessEnv = process.env
): ApiSettings {
  const registry = flags.registry || env.EDGECTL_REGISTRY || userConfig.registry || DEFAULT_REGISTRY
  const token = flags.token || env.EDGECTL_TOKEN || userConfig.token || undefined

  return { registry, token }
}
