import { describe, it, expect } from 'vitest'
import { createPlatformClient, isPlatformType } from './factory'
import { DemoPlatformClient } from './demo/client'

describe('isPlatformType', () => {
  it('knows the supported platforms', () => {
    expect(isPlatformType('discord')).toBe(true)
    expect(isPlatformType('demo')).toBe(true)
    expect(isPlatformType('slack')).toBe(false)
  })
})

describe('createPlatformClient', () => {
  it('creates the demo backend', () => {
    const client = createPlatformClient('demo', { discordToken: '', demoIntervalMs: 0 })

    expect(client).toBeInstanceOf(DemoPlatformClient)
    expect(client.type).toBe('demo')
    expect(client.isConnected).toBe(false)
  })
})
