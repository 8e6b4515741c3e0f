/**
 * App references
 *
 * Parses what the user typed (positional argument or prompt answer) into an
 * AppIdent and resolves it against the platform.
 */

import type { App, AppIdent, PlatformApi } from '../types.js'
import { InvalidAppIdentError, ResolutionError } from './errors.js'

const APP_ID_PATTERN = /^(app|da)_[A-Za-z0-9]+$/

export function parseAppIdent(input: string): AppIdent {
  const value = input.trim()
  if (!value) {
    throw new InvalidAppIdentError(input)
  }

  if (APP_ID_PATTERN.test(value)) {
    return { kind: 'id', id: value }
  }

  if (value.startsWith('http://') || value.startsWith('https://')) {
    return { kind: 'url', url: value }
  }

  if (value.includes('/')) {
    const parts = value.split('/')
    if (parts.length !== 2 || !parts[0] || !parts[1]) {
      throw new InvalidAppIdentError(input)
    }
    return { kind: 'namespaced', owner: parts[0], name: parts[1] }
  }

  return { kind: 'name', name: value }
}

export function describeAppIdent(ident: AppIdent): string {
  switch (ident.kind) {
    case 'id':
      return `with id "${ident.id}"`
    case 'namespaced':
      return `"${ident.owner}/${ident.name}"`
    case 'url':
      return `at ${ident.url}`
    case 'name':
      return `named "${ident.name}"`
  }
}

function lookupApp(client: PlatformApi, ident: AppIdent): Promise<App | null> {
  switch (ident.kind) {
    case 'id':
      return client.getAppById(ident.id)
    case 'namespaced':
      return client.getAppByNamespace(ident.owner, ident.name)
    case 'url':
      return client.getAppByUrl(ident.url)
    case 'name':
      return client.getAppByName(ident.name)
  }
}

/**
 * Look the app up on the platform
 *
 * @throws ResolutionError when nothing matches
 */
export async function resolveAppIdent(client: PlatformApi, ident: AppIdent): Promise<App> {
  const app = await lookupApp(client, ident)
  if (!app) {
    throw new ResolutionError(describeAppIdent(ident))
  }
  return app
}
