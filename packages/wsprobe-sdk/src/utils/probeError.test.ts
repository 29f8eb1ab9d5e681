import { describe, it, expect } from 'vitest'
import { ProbeError, formatProbeError, succeed, fail, toError, errorMessage } from './probeError'

describe('ProbeError', () => {
  it('should default the message to the sentence-cased code', () => {
    const error = new ProbeError('invalid-state')
    expect(error.message).toBe('Invalid state')
    expect(error.code).toBe('invalid-state')
    expect(error.name).toBe('ProbeError')
    expect(error).toBeInstanceOf(Error)
  })

  it('should keep a custom message', () => {
    expect(new ProbeError('already-active', 'Connection is already open').message).toBe('Connection is already open')
  })
})

describe('formatProbeError', () => {
  it('should return only the category when there is no detail', () => {
    expect(formatProbeError(new ProbeError('transport-error'))).toBe('Transport error')
  })

  it('should prefix the detail with the category', () => {
    expect(formatProbeError(new ProbeError('invalid-state', 'Cannot send while idle'))).toBe(
      'Invalid state: Cannot send while idle'
    )
  })
})

describe('CommandResult helpers', () => {
  it('should build a success', () => {
    expect(succeed('sent')).toEqual({ ok: true, value: 'sent' })
  })

  it('should build a failure carrying a ProbeError', () => {
    const result = fail('invalid-name', 'The variable name must not be empty')
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ProbeError)
      expect(result.error.code).toBe('invalid-name')
    }
  })
})

describe('toError / errorMessage', () => {
  it('should pass errors through', () => {
    const error = new Error('boom')
    expect(toError(error)).toBe(error)
  })

  it('should wrap strings and other values', () => {
    expect(errorMessage('plain')).toBe('plain')
    expect(errorMessage(42)).toBe('42')
    expect(errorMessage(undefined)).toBe('undefined')
  })
})
