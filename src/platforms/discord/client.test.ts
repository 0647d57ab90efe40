import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { Events } from 'discord.js'
import type { Client } from 'discord.js'
import { DiscordPlatformClient } from './client'
import { createDiscordClient } from './auth'
import type { ConnectionState } from '../types'

describe('DiscordPlatformClient', () => {
  let discord: Client
  let platform: DiscordPlatformClient

  beforeEach(() => {
    discord = createDiscordClient()
    platform = new DiscordPlatformClient('test-token', () => 0, discord)
  })

  afterEach(async () => {
    await discord.destroy()
  })

  it('listens for channels and threads created after the sync', () => {
    expect(discord.listenerCount(Events.ChannelCreate)).toBe(1)
    expect(discord.listenerCount(Events.ThreadCreate)).toBe(1)
  })

  it('maps shard events to connection state', () => {
    const states: ConnectionState[] = []
    platform.onConnectionStateChange((state) => states.push(state))

    discord.emit(Events.ShardReconnecting, 0)
    discord.emit(Events.ShardResume, 0, 3)
    discord.emit(Events.Invalidated)

    expect(states).toEqual(['connecting', 'connected', 'unauthorized'])
    expect(platform.isConnected).toBe(false)
  })
})
