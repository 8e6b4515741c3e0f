/**
 * In-memory PlatformApi for tests
 */

import type { App, PlatformApi, SecretPage, SecretRef } from '../../src/types.js'

interface FakeSecret {
  id: string
  name: string
  value: string
}

export interface FakePlatformOptions {
  apps?: App[]
  /** Secrets per app id, in listing order */
  secrets?: Record<string, Array<{ name: string; value: string }>>
  /** Listing page size */
  pageSize?: number
  /** Authenticated user, owner of apps looked up by bare name */
  user?: string
}

export class FakePlatform implements PlatformApi {
  readonly calls: string[] = []
  private readonly apps: App[]
  private readonly secrets = new Map<string, FakeSecret[]>()
  private readonly pageSize: number
  private readonly user: string

  constructor(options: FakePlatformOptions = {}) {
    this.apps = options.apps ?? []
    this.pageSize = options.pageSize ?? 100
    this.user = options.user ?? 'alice'
    let next = 1
    for (const [appId, entries] of Object.entries(options.secrets ?? {})) {
      this.secrets.set(appId, entries.map(entry => ({ id: `sec_${next++}`, ...entry })))
    }
  }

  async getAppById(id: string): Promise<App | null> {
    this.calls.push(`getAppById:${id}`)
    return this.apps.find(app => app.id === id) ?? null
  }

  async getAppByNamespace(owner: string, name: string): Promise<App | null> {
    this.calls.push(`getAppByNamespace:${owner}/${name}`)
    return this.apps.find(app => app.owner === owner && app.name === name) ?? null
  }

  async getAppByName(name: string): Promise<App | null> {
    this.calls.push(`getAppByName:${name}`)
    return this.apps.find(app => app.owner === this.user && app.name === name) ?? null
  }

  async getAppByUrl(url: string): Promise<App | null> {
    this.calls.push(`getAppByUrl:${url}`)
    return this.apps.find(app => app.url === url) ?? null
  }

  async listAppSecrets(appId: string, after?: string): Promise<SecretPage> {
    this.calls.push(`listAppSecrets:${appId}:${after ?? ''}`)
    const all = this.secrets.get(appId) ?? []
    const start = after ? Number(after) : 0
    const slice = all.slice(start, start + this.pageSize)
    const end = start + slice.length
    return {
      items: slice.map(({ id, name }) => ({ id, name })),
      pageInfo: {
        endCursor: slice.length > 0 ? String(end) : null,
        hasNextPage: end < all.length
      }
    }
  }

  async getAppSecretByName(appId: string, name: string): Promise<SecretRef | null> {
    this.calls.push(`getAppSecretByName:${appId}:${name}`)
    const secret = (this.secrets.get(appId) ?? []).find(s => s.name === name)
    return secret ? { id: secret.id, name: secret.name } : null
  }

  async getSecretValue(secretId: string): Promise<string | null> {
    this.calls.push(`getSecretValue:${secretId}`)
    for (const entries of this.secrets.values()) {
      const secret = entries.find(s => s.id === secretId)
      if (secret) return secret.value
    }
    return null
  }
}
