import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { DemoPlatformClient } from './client'
import type { ConnectionState } from '../types'
import { FatalAuthError, TransientBackendError } from '@/helpers/errors'

const NOW = 1_700_000_000_000
const MINUTE = 60_000

describe('DemoPlatformClient', () => {
  let client: DemoPlatformClient
  let events: unknown[]

  beforeEach(() => {
    client = new DemoPlatformClient({ now: () => NOW })
    events = []
    client.onEvent((event) => events.push(event))
  })

  describe('connection', () => {
    it('reports connecting then connected', async () => {
      const states: ConnectionState[] = []
      client.onConnectionStateChange((state) => states.push(state))

      await client.connect()

      expect(states).toEqual(['connecting', 'connected'])
      expect(client.isConnected).toBe(true)
      expect(client.getCurrentUser()).toEqual({ id: 'u-me', username: 'you' })
    })

    it('refuses requests while offline', async () => {
      await expect(client.fetchConversations()).rejects.toBeInstanceOf(TransientBackendError)
      expect(client.getCurrentUser()).toBeNull()
    })
  })

  describe('with the bundled seed', () => {
    beforeEach(async () => {
      await client.connect()
    })

    it('lists conversations most recent first', async () => {
      const conversations = await client.fetchConversations()

      expect(conversations.map((c) => c.id)).toEqual([
        'dm-alice',
        'grp-hiking',
        'ch-general',
        'dm-bob',
        'ch-random',
        'grp-book-club',
      ])
      expect(conversations[0]).toEqual({
        id: 'dm-alice',
        name: 'Alice',
        kind: 'direct',
        folder: 'main',
        unreadCount: 2,
        lastActivity: NOW - 11 * MINUTE,
        pinned: true,
        preview: 'Ping me when it does',
        updatedAt: NOW - 11 * MINUTE,
      })
      expect(conversations[5]).not.toHaveProperty('preview')
    })

    it('only returns conversations changed after the cursor', async () => {
      expect(await client.fetchConversations(NOW - 11 * MINUTE)).toEqual([])

      await client.markRead('dm-alice')
      const changed = await client.fetchConversations(NOW - 11 * MINUTE)
      expect(changed.map((c) => c.id)).toEqual(['dm-alice'])
      expect(changed[0].unreadCount).toBe(0)
    })

    it('pages messages backwards', async () => {
      const newest = await client.fetchMessages('dm-alice', undefined, 2)
      expect(newest.map((m) => m.id)).toEqual(['dm-alice-m3', 'dm-alice-m4'])
      expect(newest.map((m) => m.sequence)).toEqual([2, 3])

      const older = await client.fetchMessages('dm-alice', 'dm-alice-m3', 2)
      expect(older.map((m) => m.id)).toEqual(['dm-alice-m1', 'dm-alice-m2'])
      expect(older[1]).toMatchObject({ isOwn: true, sender: 'you', timestamp: NOW - 94 * MINUTE })

      expect(await client.fetchMessages('dm-alice', 'dm-alice-m1', 2)).toEqual([])
    })

    it('pushes a received message and the new unread count', () => {
      const message = client.receiveMessage({ conversationId: 'dm-bob', body: 'ping' })

      expect(message).toMatchObject({ conversationId: 'dm-bob', sender: 'Demo', isOwn: false, timestamp: NOW })
      expect(events).toEqual([
        { type: 'messageReceived', message },
        { type: 'readStateChanged', conversationId: 'dm-bob', unreadCount: 1 },
      ])
    })

    it('does not count own messages as unread', () => {
      client.receiveMessage({ conversationId: 'dm-bob', body: 'mine', senderId: 'u-me', sender: 'you' })

      expect(events).toHaveLength(1)
      expect(events[0]).toMatchObject({ type: 'messageReceived', message: { isOwn: true } })
    })

    it('sends a message as the current user', async () => {
      const sent = await client.sendMessage('dm-bob', 'Sounds good')

      expect(sent).toMatchObject({
        conversationId: 'dm-bob',
        sender: 'you',
        senderId: 'u-me',
        body: 'Sounds good',
        timestamp: NOW,
        sequence: 1,
        isOwn: true,
      })
      expect(events).toEqual([{ type: 'messageReceived', message: sent }])
      expect(await client.fetchMessages('dm-bob', undefined, 1)).toEqual([sent])
    })

    it('bumps the edit version on edit', () => {
      const edited = client.editMessage('dm-bob', 'dm-bob-m10', 'Lunch today?')

      expect(edited).toMatchObject({ body: 'Lunch today?', edited: true, editVersion: 1 })
      expect(events).toEqual([{ type: 'messageEdited', message: edited }])
    })

    it('archives and reports the folder change', async () => {
      await client.setArchived('dm-bob', true)
      await client.setArchived('dm-bob', true)

      expect(events).toEqual([{ type: 'folderChanged', conversationId: 'dm-bob', folder: 'archived' }])
    })

    it('fails the requested number of requests', async () => {
      client.failNextRequests(1)

      await expect(client.fetchConversations()).rejects.toBeInstanceOf(TransientBackendError)
      await expect(client.fetchConversations()).resolves.toHaveLength(6)
    })

    it('stays silent while disconnected', () => {
      client.simulateDisconnect()
      client.receiveMessage({ conversationId: 'dm-bob', body: 'offline' })
      expect(events).toEqual([])
    })

    it('rejects everything once the session is revoked', async () => {
      const states: ConnectionState[] = []
      client.onConnectionStateChange((state) => states.push(state))

      client.revokeSession()

      expect(states).toEqual(['unauthorized'])
      await expect(client.fetchMessages('dm-bob', undefined, 10)).rejects.toBeInstanceOf(FatalAuthError)
      await expect(client.connect()).rejects.toBeInstanceOf(FatalAuthError)
    })
  })

  describe('script', () => {
    beforeEach(() => {
      vi.useFakeTimers()
    })

    afterEach(() => {
      vi.useRealTimers()
    })

    it('plays scripted messages on an interval', async () => {
      const scripted = new DemoPlatformClient({ now: () => NOW, intervalMs: 1000 })
      const received: unknown[] = []
      scripted.onEvent((event) => received.push(event))
      await scripted.connect()

      vi.advanceTimersByTime(1000)
      expect(received[0]).toMatchObject({
        type: 'messageReceived',
        message: { conversationId: 'dm-alice', sender: 'Alice', body: 'Still around?' },
      })

      await scripted.disconnect()
      vi.advanceTimersByTime(5000)
      expect(received).toHaveLength(2)
    })
  })

  it('rejects an invalid seed', () => {
    expect(
      () =>
        new DemoPlatformClient({
          seed: {
            self: { id: 'u-me', username: 'me' },
            conversations: [
              {
                id: 'c1',
                name: 'Alice',
                kind: 'direct',
                folder: 'main',
                messages: [{ senderId: 'u-a', sender: 'A', body: 'hi', minutesAgo: -1 }],
              },
            ],
          },
        })
    ).toThrow()
  })
})
