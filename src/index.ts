/**
 * edgectl - edge deployment platform client
 *
 * Main library exports for programmatic usage
 */

// Client
export { PlatformClient, createClient, parseApp, parseSecretRef, parseSecretPage } from './client.js'

// Types
export type {
  App,
  AppIdent,
  ApiSettings,
  ItemFormat,
  ListFormat,
  PageInfo,
  PlatformApi,
  PlatformClientOptions,
  ProjectConfig,
  Prompt,
  RevealMode,
  RevealResult,
  Secret,
  SecretPage,
  SecretRef,
  UserConfig
} from './types.js'

// Config utilities
export {
  DEFAULT_REGISTRY,
  PROJECT_CONFIG_FILE,
  expandEnvVars,
  getProjectConfigPath,
  getUserConfigDir,
  loadProjectConfig,
  loadUserConfig,
  readAppIdFromConfig,
  resolveApiSettings
} from './lib/config-loader.js'

// Resolution
export { parseAppIdent, resolveAppIdent, describeAppIdent } from './lib/app-ident.js'
export { resolveAppId, resolveSecretName } from './lib/app-resolver.js'
export type { ResolveAppIdOptions, ResolveSecretNameOptions } from './lib/app-resolver.js'

// Secrets
export { fetchSecrets, getSecretValueByName, listSecretRefs, revealSecrets } from './lib/secrets.js'

// Rendering
export {
  LIST_FORMATS,
  parseListFormat,
  toItemFormat,
  sanitizeValue,
  renderEnvLines,
  renderItem,
  renderList,
  renderReveal
} from './lib/render.js'
export type { RenderOptions } from './lib/render.js'

// Errors
export * from './lib/errors.js'
