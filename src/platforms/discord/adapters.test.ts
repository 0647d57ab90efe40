import { describe, it, expect } from 'vitest'
import { DiscordjsErrorCodes } from 'discord.js'
import { sequenceFromSnowflake } from './adapters'
import { toBackendError } from './auth'
import { FatalAuthError, TransientBackendError } from '@/helpers/errors'

describe('sequenceFromSnowflake', () => {
  it('keeps the low 22 bits', () => {
    expect(sequenceFromSnowflake('175928847299117063')).toBe(131079)
  })

  it('falls back to zero for ids that are not snowflakes', () => {
    expect(sequenceFromSnowflake('dm-alice-m1')).toBe(0)
  })
})

describe('toBackendError', () => {
  it('treats a rejected token as fatal', () => {
    const error = Object.assign(new Error('An invalid token was provided.'), {
      code: DiscordjsErrorCodes.TokenInvalid,
    })

    const classified = toBackendError(error, 'log in')
    expect(classified).toBeInstanceOf(FatalAuthError)
    expect(classified.message).toBe('Discord rejected the bot token while trying to log in')
  })

  it('treats anything else as transient', () => {
    const cause = new Error('socket hang up')
    const classified = toBackendError(cause, 'load messages')

    expect(classified).toBeInstanceOf(TransientBackendError)
    expect(classified.message).toBe('Could not load messages: socket hang up')
  })

  it('passes classified errors through', () => {
    const fatal = new FatalAuthError('gone')
    expect(toBackendError(fatal, 'connect')).toBe(fatal)
  })
})
