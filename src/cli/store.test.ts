import { describe, it, expect, beforeEach, vi } from 'vitest'
import { ConversationStore, type MessageInput, type StoreChange } from './store'

const ids = (items: ReadonlyArray<{ id: string }>) => items.map((item) => item.id)

function permutations<T>(items: T[]): T[][] {
  if (items.length <= 1) return [items]
  return items.flatMap((item, i) =>
    permutations([...items.slice(0, i), ...items.slice(i + 1)]).map((rest) => [item, ...rest])
  )
}

describe('ConversationStore', () => {
  let store: ConversationStore

  beforeEach(() => {
    store = new ConversationStore()
  })

  describe('basic scenario', () => {
    it('lists a new conversation and sorts its messages by timestamp', () => {
      store.upsertConversation({ id: 'c1', name: 'Alice', folder: 'main' })
      expect(ids(store.listConversations('main'))).toEqual(['c1'])

      store.upsertMessage('c1', { id: 'm1', timestamp: 100 })
      store.upsertMessage('c1', { id: 'm2', timestamp: 50 })

      expect(ids(store.getConversation('c1')?.messages ?? [])).toEqual(['m2', 'm1'])
    })

    it('moves a conversation between folders', () => {
      store.upsertConversation({ id: 'c1', name: 'Alice', folder: 'main' })
      store.setFolder('c1', 'archived')

      expect(store.listConversations('main')).toEqual([])
      expect(ids(store.listConversations('archived'))).toEqual(['c1'])
    })
  })

  describe('upsertMessage', () => {
    const messages: MessageInput[] = [
      { id: 'a', timestamp: 10, sequence: 1 },
      { id: 'b', timestamp: 10, sequence: 0 },
      { id: 'c', timestamp: 5, sequence: 0 },
      { id: 'd', timestamp: 20, sequence: 0 },
      { id: 'e', timestamp: 5, sequence: 2 },
    ]

    it('orders by timestamp then sequence whatever the insertion order', () => {
      for (const order of permutations(messages)) {
        const fresh = new ConversationStore()
        for (const message of order) fresh.upsertMessage('c1', message)
        expect(ids(fresh.getConversation('c1')?.messages ?? [])).toEqual(['c', 'e', 'b', 'a', 'd'])
      }
    })

    it('applies the same edit only once', () => {
      store.upsertConversation({ id: 'c1', name: 'Alice' })
      store.upsertMessage('c1', { id: 'm1', timestamp: 100, body: 'hi' })
      const edit: MessageInput = { id: 'm1', timestamp: 100, body: 'hello', editVersion: 1 }

      expect(store.upsertMessage('c1', edit)).toBe('updated')
      const once = store.getConversation('c1')
      expect(store.upsertMessage('c1', edit)).toBe('unchanged')

      expect(store.getConversation('c1')).toBe(once)
      expect(once?.messages[0]).toMatchObject({ body: 'hello', edited: true, editVersion: 1 })
    })

    it('keeps the position of an edited message', () => {
      store.upsertMessage('c1', { id: 'm1', timestamp: 100 })
      store.upsertMessage('c1', { id: 'm2', timestamp: 200 })
      store.upsertMessage('c1', { id: 'm1', timestamp: 999, body: 'moved?', editVersion: 2 })

      const conversation = store.getConversation('c1')
      expect(ids(conversation?.messages ?? [])).toEqual(['m1', 'm2'])
      expect(conversation?.messages[0].timestamp).toBe(100)
    })

    it('ignores an older edit version', () => {
      store.upsertMessage('c1', { id: 'm1', timestamp: 100, body: 'v3', editVersion: 3 })
      expect(store.upsertMessage('c1', { id: 'm1', timestamp: 100, body: 'v2', editVersion: 2 })).toBe('unchanged')
      expect(store.getConversation('c1')?.messages[0].body).toBe('v3')
    })

    it('raises last activity and the preview', () => {
      store.upsertConversation({ id: 'c1', name: 'Alice', lastActivity: 50 })
      store.upsertMessage('c1', { id: 'm1', timestamp: 100, body: 'first line\nsecond line' })

      const conversation = store.getConversation('c1')
      expect(conversation?.lastActivity).toBe(100)
      expect(conversation?.lastMessagePreview).toBe('first line')
    })

    it('drops the oldest messages beyond the window', () => {
      const small = new ConversationStore({ messageWindow: 3 })
      small.upsertConversation({ id: 'c1', name: 'Alice' })
      for (const timestamp of [1, 2, 3, 4]) {
        small.upsertMessage('c1', { id: `m${timestamp}`, timestamp })
      }

      expect(ids(small.getConversation('c1')?.messages ?? [])).toEqual(['m2', 'm3', 'm4'])
      expect(small.getConversation('c1')?.hasMoreBefore).toBe(true)
      expect(small.upsertMessage('c1', { id: 'm0', timestamp: 0 })).toBe('unchanged')
    })
  })

  describe('placeholders', () => {
    it('creates a placeholder for an unknown conversation', () => {
      store.upsertMessage('c9', { id: 'm1', timestamp: 10 })

      expect(store.getConversation('c9')).toMatchObject({
        id: 'c9',
        name: 'c9',
        kind: 'direct',
        folder: 'main',
        placeholder: true,
      })
    })

    it('fills in a placeholder when the conversation arrives', () => {
      store.setUnread('c9', 4)
      store.upsertConversation({ id: 'c9', name: 'Team', kind: 'group' })

      expect(store.getConversation('c9')).toMatchObject({ name: 'Team', kind: 'group', unreadCount: 4, placeholder: false })
    })
  })

  describe('ordering', () => {
    it('puts pinned conversations first by name, then the most recent', () => {
      store.upsertConversation({ id: 'x', name: 'Xavier', lastActivity: 300 })
      store.upsertConversation({ id: 'z', name: 'Zoe', lastActivity: 500 })
      store.upsertConversation({ id: 'p2', name: 'Zed', pinned: true })
      store.upsertConversation({ id: 'y', name: 'Yan', lastActivity: 500 })
      store.upsertConversation({ id: 'p1', name: 'Amy', pinned: true, lastActivity: 1 })

      expect(ids(store.listConversations('main'))).toEqual(['p1', 'p2', 'y', 'z', 'x'])
    })
  })

  describe('notifications', () => {
    it('notifies once per mutation and not for no-ops', () => {
      const listener = vi.fn<(change: StoreChange) => void>()
      store.subscribe(listener)

      store.upsertConversation({ id: 'c1', name: 'Alice' })
      store.upsertConversation({ id: 'c1', name: 'Alice' })
      store.setUnread('c1', 0)

      expect(listener).toHaveBeenCalledTimes(1)
      expect(listener).toHaveBeenCalledWith({ type: 'conversationUpserted', conversationId: 'c1' })
    })

    it('keeps notifying after a listener throws', () => {
      const second = vi.fn()
      store.subscribe(() => {
        throw new Error('boom')
      })
      store.subscribe(second)

      store.setFolder('c1', 'archived')

      expect(second).toHaveBeenCalledWith({ type: 'folderChanged', conversationId: 'c1', folder: 'archived' })
    })

    it('stops notifying after unsubscribe', () => {
      const listener = vi.fn()
      const unsubscribe = store.subscribe(listener)
      unsubscribe()

      store.upsertConversation({ id: 'c1', name: 'Alice' })
      expect(listener).not.toHaveBeenCalled()
    })
  })

  describe('other mutations', () => {
    it('clamps unread counts to non-negative integers', () => {
      store.setUnread('c1', -3)
      expect(store.getConversation('c1')?.unreadCount).toBe(0)
      store.setUnread('c1', 2.7)
      expect(store.getConversation('c1')?.unreadCount).toBe(2)
    })

    it('recomputes the preview when the newest message is removed', () => {
      store.upsertMessage('c1', { id: 'm1', timestamp: 1, body: 'older' })
      store.upsertMessage('c1', { id: 'm2', timestamp: 2, body: 'newer' })

      expect(store.removeMessage('c1', 'm2')).toBe(true)
      expect(store.getConversation('c1')?.lastMessagePreview).toBe('older')
      expect(store.removeMessage('c1', 'm2')).toBe(false)
    })

    it('removes conversations', () => {
      store.upsertConversation({ id: 'c1', name: 'Alice' })
      const version = store.version

      expect(store.removeConversation('c1')).toBe(true)
      expect(store.has('c1')).toBe(false)
      expect(store.version).toBe(version + 1)
    })

    it('marks the window loaded', () => {
      store.upsertConversation({ id: 'c1', name: 'Alice' })
      store.setWindowState('c1', { hasMoreBefore: false })

      expect(store.getConversation('c1')).toMatchObject({ windowLoaded: true, hasMoreBefore: false })
    })

    it('hands out frozen snapshots', () => {
      store.upsertMessage('c1', { id: 'm1', timestamp: 1 })
      const conversation = store.getConversation('c1')

      expect(Object.isFrozen(conversation)).toBe(true)
      expect(Object.isFrozen(conversation?.messages)).toBe(true)
    })
  })
})
