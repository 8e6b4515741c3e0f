/**
 * Secret retrieval
 *
 * Requests are issued one at a time; listing order is kept as delivered.
 */

import type { PlatformApi, RevealMode, RevealResult, Secret, SecretRef } from '../types.js'
import { ApiError, SecretNotFoundError } from './errors.js'

/**
 * Value of the secret `name` of an app
 *
 * @throws SecretNotFoundError when the app has no such secret
 */
export async function getSecretValueByName(
  client: PlatformApi,
  appId: string,
  name: string
): Promise<string> {
  const ref = await client.getAppSecretByName(appId, name)
  if (!ref) {
    throw new SecretNotFoundError(name, appId)
  }
  return getSecretValue(client, appId, ref)
}

async function getSecretValue(client: PlatformApi, appId: string, ref: SecretRef): Promise<string> {
  const value = await client.getSecretValue(ref.id)
  if (value === null) {
    throw new SecretNotFoundError(ref.name, appId)
  }
  return value
}

/**
 * Every secret of the app, walking all listing pages
 */
export async function listSecretRefs(client: PlatformApi, appId: string): Promise<SecretRef[]> {
  const refs: SecretRef[] = []
  let after: string | undefined

  for (;;) {
    const page = await client.listAppSecrets(appId, after)
    refs.push(...page.items)

    if (!page.pageInfo.hasNextPage || !page.pageInfo.endCursor) {
      break
    }
    if (page.pageInfo.endCursor === after) {
      throw new ApiError(`Secret listing for app ${appId} did not advance past cursor ${after}`)
    }
    after = page.pageInfo.endCursor
  }

  return refs
}

/**
 * Names and values of every secret of the app
 */
export async function revealSecrets(client: PlatformApi, appId: string): Promise<Secret[]> {
  const refs = await listSecretRefs(client, appId)
  const secrets: Secret[] = []

  for (const ref of refs) {
    secrets.push({ name: ref.name, value: await getSecretValue(client, appId, ref) })
  }

  return secrets
}

export async function fetchSecrets(
  client: PlatformApi,
  appId: string,
  mode: RevealMode
): Promise<RevealResult> {
  switch (mode.kind) {
    case 'single': {
      const value = await getSecretValueByName(client, appId, mode.name)
      return { kind: 'single', secret: { name: mode.name, value } }
    }
    case 'all':
      return { kind: 'all', secrets: await revealSecrets(client, appId) }
  }
}
