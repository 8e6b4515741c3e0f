/**
 * edgectl - Type Definitions
 */

// ============================================================================
// Platform Types
// ============================================================================

/**
 * A deployed app as returned by the platform API
 */
export interface App {
  id: string
  name: string
  owner: string
  url?: string
}

/**
 * A user-supplied reference to an app, before resolution
 *
 * - id:         canonical id (`app_...` or `da_...`)
 * - namespaced: `owner/name`
 * - url:        the app's public URL
 * - name:       bare name, looked up under the authenticated user
 */
export type AppIdent =
  | { kind: 'id'; id: string }
  | { kind: 'namespaced'; owner: string; name: string }
  | { kind: 'url'; url: string }
  | { kind: 'name'; name: string }

// ============================================================================
// Secret Types
// ============================================================================

export interface Secret {
  name: string
  value: string
}

/** Listing entry: identifies a secret without its value */
export interface SecretRef {
  id: string
  name: string
}

export interface PageInfo {
  endCursor: string | null
  hasNextPage: boolean
}

export interface SecretPage {
  items: SecretRef[]
  pageInfo: PageInfo
}

export type RevealMode =
  | { kind: 'single'; name: string }
  | { kind: 'all' }

export type RevealResult =
  | { kind: 'single'; secret: Secret }
  | { kind: 'all'; secrets: Secret[] }

// ============================================================================
// Output Formats
// ============================================================================

export type ListFormat = 'json' | 'yaml' | 'table' | 'item-table'

/** Formats that can render a single item */
export type ItemFormat = Exclude<ListFormat, 'item-table'>

// ============================================================================
// API Client Types
// ============================================================================

/**
 * Read-only view of the platform API used by the reveal workflow.
 * Lookups resolve to null when the platform answers 404.
 */
export interface PlatformApi {
  getAppById(id: string): Promise<App | null>
  getAppByNamespace(owner: string, name: string): Promise<App | null>
  getAppByName(name: string): Promise<App | null>
  getAppByUrl(url: string): Promise<App | null>
  listAppSecrets(appId: string, after?: string): Promise<SecretPage>
  getAppSecretByName(appId: string, name: string): Promise<SecretRef | null>
  getSecretValue(secretId: string): Promise<string | null>
}

export interface PlatformClientOptions {
  /** Base URL of the platform API */
  registry: string
  /** Bearer token */
  token?: string
  userAgent?: string
  /** Override for tests */
  fetch?: typeof fetch
}

/** Asks the user for a line of text */
export type Prompt = (message: string) => Promise<string>

// ============================================================================
// Config Types
// ============================================================================

/**
 * ~/.edgectl/config.yaml
 */
export interface UserConfig {
  registry?: string
  token?: string
}

/**
 * <project>/app.yaml (only the fields this CLI reads)
 */
export interface ProjectConfig {
  app_id?: string
  name?: string
  owner?: string
}

export interface ApiSettings {
  registry: string
  token?: string
}

// ============================================================================
// CLI Types
// ============================================================================

export interface CLIArgs {
  /** Command path followed by positional values */
  _: string[]
  // Global flags
  registry?: string
  token?: string
  verbose?: boolean
  quiet?: boolean
  help?: boolean
  version?: boolean
  // reveal flags
  'app-dir'?: string
  all?: boolean
  'non-interactive'?: boolean
  format?: string
  json?: boolean
}
