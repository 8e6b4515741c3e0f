/**
 * Tests for edgectl Error Hierarchy
 */

import { describe, it, expect } from 'vitest'
import {
  // Base classes
  EdgectlError,
  ConfigError,
  ValidationError,
  OperationError,
  // Specific errors
  InvalidConfigError,
  ApiError,
  ResolutionError,
  MissingInputError,
  ConflictingArgumentsError,
  InvalidFormatError,
  UnsupportedFormatError,
  InvalidAppIdentError,
  InputError,
  SecretNotFoundError,
  IoError,
  // Type guards
  isEdgectlError,
  // Helpers
  formatErrorForCli,
  errorMessage
} from '../../src/lib/errors.js'

describe('Error Hierarchy', () => {
  describe('EdgectlError', () => {
    it('should carry code, suggestion and context', () => {
      const error = new EdgectlError('Something broke', 'BROKEN', {
        suggestion: 'Try again',
        context: { attempt: 1 }
      })

      expect(error).toBeInstanceOf(Error)
      expect(error.name).toBe('EdgectlError')
      expect(error.code).toBe('BROKEN')
      expect(error.suggestion).toBe('Try again')
      expect(error.context).toEqual({ attempt: 1 })
    })

    it('should format CLI output with the suggestion', () => {
      const error = new EdgectlError('Something broke', 'BROKEN', { suggestion: 'Try again' })
      expect(error.toCliOutput()).toBe('Error: Something broke\n  Suggestion: Try again')
    })

    it('should format CLI output without a suggestion', () => {
      expect(new EdgectlError('Something broke', 'BROKEN').toCliOutput()).toBe('Error: Something broke')
    })

    it('should serialize to JSON', () => {
      const json = new EdgectlError('Something broke', 'BROKEN', { context: { a: 1 } }).toJSON()
      expect(json.name).toBe('EdgectlError')
      expect(json.code).toBe('BROKEN')
      expect(json.message).toBe('Something broke')
      expect(json.context).toEqual({ a: 1 })
    })

    it('should keep the cause', () => {
      const cause = new Error('root')
      expect(new EdgectlError('outer', 'X', { cause }).cause).toBe(cause)
    })
  })

  describe('InvalidConfigError', () => {
    it('should name the file', () => {
      const error = new InvalidConfigError('expected a mapping at the top level', '/work/app.yaml')

      expect(error).toBeInstanceOf(ConfigError)
      expect(error.code).toBe('INVALID_CONFIG')
      expect(error.message).toBe('Invalid config in /work/app.yaml: expected a mapping at the top level')
      expect(error.context).toEqual({ configPath: '/work/app.yaml' })
    })

    it('should work without a path', () => {
      expect(new InvalidConfigError('bad').message).toBe('Invalid config: bad')
    })
  })

  describe('ApiError', () => {
    it('should record the status in context', () => {
      const error = new ApiError('API request failed (500): boom', { status: 500, context: { path: '/v1/apps/x' } })

      expect(error.code).toBe('API_ERROR')
      expect(error.status).toBe(500)
      expect(error.context).toEqual({ path: '/v1/apps/x', status: 500 })
      expect(error.suggestion).toBeUndefined()
    })

    it('should suggest checking the token on auth failures', () => {
      expect(new ApiError('denied', { status: 401 }).suggestion).toBe('Check your token (--token or EDGECTL_TOKEN)')
      expect(new ApiError('denied', { status: 403 }).suggestion).toBe('Check your token (--token or EDGECTL_TOKEN)')
    })
  })

  describe('ResolutionError', () => {
    it('should describe the reference', () => {
      const error = new ResolutionError('named "shop"')
      expect(error.message).toBe('Could not find app named "shop"')
      expect(error.code).toBe('APP_NOT_FOUND')
    })
  })

  describe('validation errors', () => {
    it('MissingInputError', () => {
      const error = new MissingInputError('secret name')
      expect(error).toBeInstanceOf(ValidationError)
      expect(error.message).toBe('No secret name given')
      expect(error.code).toBe('MISSING_INPUT')
      expect(error.suggestion).toBe('Supply the secret name explicitly')
    })

    it('ConflictingArgumentsError', () => {
      const error = new ConflictingArgumentsError('name', '--all')
      expect(error.message).toBe("The argument 'name' cannot be used with '--all'")
      expect(error.code).toBe('CONFLICTING_ARGUMENTS')
    })

    it('InvalidFormatError', () => {
      const error = new InvalidFormatError('xml', ['json', 'yaml'])
      expect(error.message).toBe('Invalid format: "xml"')
      expect(error.suggestion).toBe('Valid formats: json, yaml')
    })

    it('UnsupportedFormatError', () => {
      const error = new UnsupportedFormatError('not here', 'item-table')
      expect(error.code).toBe('UNSUPPORTED_FORMAT')
      expect(error.context).toEqual({ format: 'item-table' })
    })

    it('InvalidAppIdentError', () => {
      expect(new InvalidAppIdentError('a/b/c').message).toBe('Invalid app reference: "a/b/c"')
    })
  })

  describe('operation errors', () => {
    it('SecretNotFoundError', () => {
      const error = new SecretNotFoundError('DB_PASSWORD', 'app_123')
      expect(error).toBeInstanceOf(OperationError)
      expect(error.message).toBe('Secret "DB_PASSWORD" not found for app app_123')
      expect(error.code).toBe('SECRET_NOT_FOUND')
    })

    it('IoError', () => {
      const cause = new Error('EACCES')
      const error = new IoError('Failed to read x', cause)
      expect(error.code).toBe('IO_ERROR')
      expect(error.cause).toBe(cause)
    })

    it('InputError', () => {
      expect(new InputError('input closed').code).toBe('INPUT_FAILED')
    })
  })

  describe('type guards', () => {
    it('should identify error families', () => {
      expect(isEdgectlError(new IoError('x'))).toBe(true)
      expect(isEdgectlError(new Error('x'))).toBe(false)
      expect(isEdgectlError(new ResolutionError('x'))).toBe(true)
    })
  })

  describe('helpers', () => {
    it('formatErrorForCli should handle any thrown value', () => {
      expect(formatErrorForCli(new MissingInputError('app id', 'Pass it'))).toBe('Error: No app id given\n  Suggestion: Pass it')
      expect(formatErrorForCli(new Error('plain'))).toBe('Error: plain')
      expect(formatErrorForCli('text')).toBe('Error: text')
    })

    it('errorMessage should stringify non-errors', () => {
      expect(errorMessage(new Error('boom'))).toBe('boom')
      expect(errorMessage('boom')).toBe('boom')
    })
  })
})
