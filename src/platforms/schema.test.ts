import { describe, it, expect } from 'vitest'
import { parseBackendEvent, parseConversationSnapshot, type MessageSnapshot } from './schema'
import { MalformedEvent } from '@/helpers/errors'

const message: MessageSnapshot = {
  id: 'm1',
  conversationId: 'c1',
  sender: 'Alice',
  senderId: 'u-alice',
  body: 'hi',
  timestamp: 1000,
  sequence: 0,
  edited: false,
  editVersion: 0,
  isOwn: false,
}

describe('parseBackendEvent', () => {
  it('accepts a well-formed event', () => {
    expect(parseBackendEvent({ type: 'messageReceived', message })).toEqual({ type: 'messageReceived', message })
  })

  it('strips unknown fields', () => {
    expect(parseBackendEvent({ type: 'conversationRemoved', conversationId: 'c1', extra: true })).toEqual({
      type: 'conversationRemoved',
      conversationId: 'c1',
    })
  })

  it('returns a MalformedEvent naming the bad field', () => {
    const raw = { type: 'readStateChanged', conversationId: 'c1', unreadCount: 1.5 }
    const result = parseBackendEvent(raw)

    expect(result).toBeInstanceOf(MalformedEvent)
    if (result instanceof MalformedEvent) {
      expect(result.raw).toBe(raw)
      expect(result.message).toMatch(/^unreadCount: /)
    }
  })

  it('rejects unknown event types and non-objects', () => {
    expect(parseBackendEvent({ type: 'typing', conversationId: 'c1' })).toBeInstanceOf(MalformedEvent)
    expect(parseBackendEvent(null)).toBeInstanceOf(MalformedEvent)
  })
})

describe('parseConversationSnapshot', () => {
  it('requires a known folder', () => {
    const result = parseConversationSnapshot({
      id: 'c1',
      name: 'Alice',
      kind: 'direct',
      folder: 'spam',
      unreadCount: 0,
      lastActivity: 0,
      pinned: false,
      updatedAt: 0,
    })
    expect(result).toBeInstanceOf(MalformedEvent)
  })
})
