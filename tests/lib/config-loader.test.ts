/**
 * Tests for config-loader.ts
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'
import {
  DEFAULT_REGISTRY,
  expandEnvVars,
  getProjectConfigPath,
  getUserConfigDir,
  loadProjectConfig,
  loadUserConfig,
  readAppIdFromConfig,
  resolveApiSettings
} from '../../src/lib/config-loader.js'
import { InvalidConfigError } from '../../src/lib/errors.js'

describe('expandEnvVars', () => {
  const env = { HOME_REGISTRY: 'https://registry.test', TOKEN: 'test-secret' }

  it('should expand ${VAR}', () => {
    expect(expandEnvVars('${HOME_REGISTRY}/v1', env)).toBe('https://registry.test/v1')
  })

  it('should expand $VAR', () => {
    expect(expandEnvVars('$TOKEN', env)).toBe('test-secret')
  })

  it('should use the default when the variable is unset', () => {
    expect(expandEnvVars('${MISSING:-fallback}', env)).toBe('fallback')
    expect(expandEnvVars('${TOKEN:-fallback}', env)).toBe('test-secret')
  })

  it('should replace unknown variables with an empty string', () => {
    expect(expandEnvVars('a${MISSING}b', env)).toBe('ab')
  })
})

describe('project config', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'edgectl-config-test-'))
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  it('should point at app.yaml', () => {
    expect(getProjectConfigPath(tempDir)).toBe(path.join(tempDir, 'app.yaml'))
  })

  it('should return null when there is no app.yaml', async () => {
    expect(await loadProjectConfig(tempDir)).toBeNull()
    expect(await readAppIdFromConfig(tempDir)).toBeNull()
  })

  it('should load the known fields', async () => {
    fs.writeFileSync(path.join(tempDir, 'app.yaml'), 'name: shop\nowner: acme\napp_id: app_123\n')

    expect(await loadProjectConfig(tempDir)).toEqual({ app_id: 'app_123', name: 'shop', owner: 'acme' })
    expect(await readAppIdFromConfig(tempDir)).toBe('app_123')
  })

  it('should treat an empty file as no cached id', async () => {
    fs.writeFileSync(path.join(tempDir, 'app.yaml'), '')

    expect(await loadProjectConfig(tempDir)).toEqual({ app_id: undefined, name: undefined, owner: undefined })
    expect(await readAppIdFromConfig(tempDir)).toBeNull()
  })

  it('should treat a blank app_id as no cached id', async () => {
    fs.writeFileSync(path.join(tempDir, 'app.yaml'), 'app_id: "  "\n')
    expect(await readAppIdFromConfig(tempDir)).toBeNull()
  })

  it('should reject a non-mapping document', async () => {
    fs.writeFileSync(path.join(tempDir, 'app.yaml'), '- app_123\n')
    await expect(loadProjectConfig(tempDir)).rejects.toThrow(InvalidConfigError)
  })

  it('should reject a non-string app_id', async () => {
    fs.writeFileSync(path.join(tempDir, 'app.yaml'), 'app_id: 42\n')
    await expect(loadProjectConfig(tempDir)).rejects.toThrow('"app_id" must be a string')
  })
})

describe('user config', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'edgectl-user-config-test-'))
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  it('should honour EDGECTL_CONFIG_DIR', () => {
    expect(getUserConfigDir({ EDGECTL_CONFIG_DIR: tempDir })).toBe(tempDir)
  })

  it('should default to ~/.edgectl', () => {
    expect(getUserConfigDir({})).toBe(path.join(os.homedir(), '.edgectl'))
  })

  it('should return an empty config when the file is missing', async () => {
    expect(await loadUserConfig(tempDir, {})).toEqual({})
  })

  it('should expand env vars in registry and token', async () => {
    fs.writeFileSync(
      path.join(tempDir, 'config.yaml'),
      'registry: https://registry.test\ntoken: ${EDGECTL_TEST_TOKEN}\n'
    )

    expect(await loadUserConfig(tempDir, { EDGECTL_TEST_TOKEN: 'test-secret' })).toEqual({
      registry: 'https://registry.test',
      token: 'test-secret'
    })
  })
})

describe('resolveApiSettings', () => {
  const userConfig = { registry: 'https://from-config.test', token: 'config-token' }
  const env = { EDGECTL_REGISTRY: 'https://from-env.test', EDGECTL_TOKEN: 'env-token' }

  it('should prefer flags', () => {
    expect(resolveApiSettings({ registry: 'https://from-flag.test', token: 'flag-token' }, userConfig, env))
      .toEqual({ registry: 'https://from-flag.test', token: 'flag-token' })
  })

  it('should fall back to the environment', () => {
    expect(resolveApiSettings({}, userConfig, env))
      .toEqual({ registry: 'https://from-env.test', token: 'env-token' })
  })

  it('should fall back to the user config', () => {
    expect(resolveApiSettings({}, userConfig, {}))
      .toEqual({ registry: 'https://from-config.test', token: 'config-token' })
  })

  it('should use the default registry and no token', () => {
    expect(resolveApiSettings({}, {}, {})).toEqual({ registry: DEFAULT_REGISTRY, token: undefined })
  })
})
