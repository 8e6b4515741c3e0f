/**
 * edgectl Client - platform HTTP API
 *
 * JSON over HTTPS with a bearer token. Lookups that the platform answers
 * with 404 resolve to null; every other failure is an ApiError.
 */

import type {
  App,
  PlatformApi,
  PlatformClientOptions,
  SecretPage,
  SecretRef
} from './types.js'
import { ApiError, errorMessage } from './lib/errors.js'

type JsonResult =
  | { found: true; body: unknown }
  | { found: false }

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function malformed(what: string): ApiError {
  return new ApiError(`Malformed ${what} in API response`)
}

function requireString(doc: Record<string, unknown>, field: string, what: string): string {
  const value = doc[field]
  if (typeof value !== 'string') {
    throw malformed(what)
  }
  return value
}

export function parseApp(body: unknown): App {
  if (!isRecord(body)) throw malformed('app')
  const url = body.url
  return {
    id: requireString(body, 'id', 'app'),
    name: requireString(body, 'name', 'app'),
    owner: requireString(body, 'owner', 'app'),
    url: typeof url === 'string' ? url : undefined
  }
}

export function parseSecretRef(body: unknown): SecretRef {
  if (!isRecord(body)) throw malformed('secret')
  return {
    id: requireString(body, 'id', 'secret'),
    name: requireString(body, 'name', 'secret')
  }
}

export function parseSecretPage(body: unknown): SecretPage {
  if (!isRecord(body) || !Array.isArray(body.items) || !isRecord(body.pageInfo)) {
    throw malformed('secret listing')
  }
  const { endCursor, hasNextPage } = body.pageInfo
  if (typeof hasNextPage !== 'boolean') {
    throw malformed('secret listing')
  }
  return {
    items: body.items.map(parseSecretRef),
    pageInfo: {
      endCursor: typeof endCursor === 'string' ? endCursor : null,
      hasNextPage
    }
  }
}

function parseSecretValue(body: unknown): string {
  if (!isRecord(body)) throw malformed('secret value')
  return requireString(body, 'value', 'secret value')
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch {
    return undefined
  }
}

/**
 * Extract a server error message from a failed response
 */
async function readErrorMessage(response: Response): Promise<string> {
  const text = await response.text().catch(() => '')
  if (!text) return response.statusText || `HTTP ${response.status}`

  const body = tryParseJson(text)
  if (isRecord(body)) {
    if (typeof body.error === 'string') return body.error
    if (typeof body.message === 'string') return body.message
  }
  return text
}

export class PlatformClient implements PlatformApi {
  private readonly registry: string
  private readonly token?: string
  private readonly userAgent: string
  private readonly fetchImpl: typeof fetch

  constructor(options: PlatformClientOptions) {
    this.registry = options.registry.replace(/\/+$/, '')
    this.token = options.token
    this.userAgent = options.userAgent ?? 'edgectl'
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init))
  }

  /**
   * GET a JSON document
   */
  private async getJson(pathname: string, query: Record<string, string | undefined> = {}): Promise<JsonResult> {
    const url = new URL(this.registry + pathname)
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) {
        url.searchParams.set(key, value)
      }
    }

    const headers: Record<string, string> = {
      accept: 'application/json',
      'user-agent': this.userAgent
    }
    if (this.token) {
      headers.authorization = `Bearer ${this.token}`
    }

    let response: Response
    try {
      response = await this.fetchImpl(url, { method: 'GET', headers })
    } catch (err) {
      throw new ApiError(`Request to ${url.origin} failed: ${errorMessage(err)}`, { cause: err })
    }

    if (response.status === 404) {
      return { found: false }
    }

    if (!response.ok) {
      const message = await readErrorMessage(response)
      throw new ApiError(`API request failed (${response.status}): ${message}`, {
        status: response.status,
        context: { path: pathname }
      })
    }

    try {
      return { found: true, body: await response.json() }
    } catch (err) {
      throw new ApiError(`Invalid JSON from ${pathname}`, { cause: err, status: response.status })
    }
  }

  private async getOrNull<T>(
    pathname: string,
    parse: (body: unknown) => T,
    query?: Record<string, string | undefined>
  ): Promise<T | null> {
    const result = await this.getJson(pathname, query)
    return result.found ? parse(result.body) : null
  }

  async getAppById(id: string): Promise<App | null> {
    return this.getOrNull(`/v1/apps/${encodeURIComponent(id)}`, parseApp)
  }

  async getAppByNamespace(owner: string, name: string): Promise<App | null> {
    return this.getOrNull(
      `/v1/apps/by-name/${encodeURIComponent(owner)}/${encodeURIComponent(name)}`,
      parseApp
    )
  }

  async getAppByName(name: string): Promise<App | null> {
    return this.getOrNull(`/v1/apps/by-name/${encodeURIComponent(name)}`, parseApp)
  }

  async getAppByUrl(url: string): Promise<App | null> {
    return this.getOrNull('/v1/apps/by-url', parseApp, { url })
  }

  async listAppSecrets(appId: string, after?: string): Promise<SecretPage> {
    const pathname = `/v1/apps/${encodeURIComponent(appId)}/secrets`
    const page = await this.getOrNull(pathname, parseSecretPage, { after })
    if (!page) {
      throw new ApiError(`App ${appId} not found while listing secrets`, { status: 404 })
    }
    return page
  }

  async getAppSecretByName(appId: string, name: string): Promise<SecretRef | null> {
    return this.getOrNull(
      `/v1/apps/${encodeURIComponent(appId)}/secrets/by-name/${encodeURIComponent(name)}`,
      parseSecretRef
    )
  }

  async getSecretValue(secretId: string): Promise<string | null> {
    return this.getOrNull(`/v1/secrets/${encodeURIComponent(secretId)}/value`, parseSecretValue)
  }
}

/**
 * Convenience factory
 */
export function createClient(options: PlatformClientOptions): PlatformClient {
  return new PlatformClient(options)
}
