/**
 * In-memory conversation store.
 * The single owner of conversation and message state for the session. Every
 * mutation is synchronous, replaces the touched conversation with a new frozen
 * object, and notifies subscribers before returning.
 */

import type { ConversationKind, Folder } from '@/platforms/types'
import { createLogger } from '@/helpers/logger'
import { errorMessage } from '@/helpers/errors'

const log = createLogger('store')

// ==================== Types ====================

export interface Message {
  readonly id: string
  readonly sender: string
  readonly senderId: string
  readonly body: string
  readonly timestamp: number
  readonly sequence: number
  readonly edited: boolean
  readonly editVersion: number
  readonly isOwn: boolean
}

export interface Conversation {
  readonly id: string
  readonly name: string
  readonly kind: ConversationKind
  readonly folder: Folder
  readonly unreadCount: number
  readonly lastActivity: number
  readonly pinned: boolean
  readonly lastMessagePreview: string | null
  /** Created by a message, read-state or folder update before the conversation itself was seen */
  readonly placeholder: boolean
  readonly windowLoaded: boolean
  readonly hasMoreBefore: boolean
  readonly messages: readonly Message[]
}

export interface ConversationInput {
  id: string
  name?: string
  kind?: ConversationKind
  folder?: Folder
  unreadCount?: number
  lastActivity?: number
  pinned?: boolean
  preview?: string
}

export type MessageInput = Pick<Message, 'id' | 'timestamp'> & Partial<Omit<Message, 'id' | 'timestamp'>>

export type StoreChange =
  | { type: 'conversationUpserted'; conversationId: string }
  | { type: 'conversationRemoved'; conversationId: string }
  | { type: 'messageUpserted'; conversationId: string; messageId: string }
  | { type: 'messageRemoved'; conversationId: string; messageId: string }
  | { type: 'unreadChanged'; conversationId: string; unreadCount: number }
  | { type: 'folderChanged'; conversationId: string; folder: Folder }
  | { type: 'windowChanged'; conversationId: string }

export type StoreListener = (change: StoreChange) => void

export type UpsertResult = 'inserted' | 'updated' | 'unchanged'

/**
 * Read side of the store, as seen by the projector and the search index.
 */
export interface StoreView {
  getConversation(id: string): Conversation | undefined
  listConversations(folder: Folder): Conversation[]
}

export interface ConversationStoreOptions {
  /** Maximum messages kept per conversation; the oldest are dropped first */
  messageWindow?: number
}

// ==================== Constants ====================

const DEFAULT_MESSAGE_WINDOW = 200

// ==================== Helpers ====================

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

/**
 * Default conversation order: pinned first by name, then most recent
 * activity. Equal keys fall back to the conversation ID.
 */
export function compareConversations(a: Conversation, b: Conversation): number {
  if (a.pinned !== b.pinned) return a.pinned ? -1 : 1
  if (a.pinned) {
    const byName = a.name.localeCompare(b.name)
    return byName !== 0 ? byName : compareIds(a.id, b.id)
  }
  if (a.lastActivity !== b.lastActivity) return b.lastActivity - a.lastActivity
  return compareIds(a.id, b.id)
}

/**
 * Chronological message order: timestamp, then backend sequence.
 */
export function compareMessages(a: Message, b: Message): number {
  if (a.timestamp !== b.timestamp) return a.timestamp - b.timestamp
  return a.sequence - b.sequence
}

// First index whose message sorts strictly after the given one
function insertionIndex(messages: readonly Message[], message: Message): number {
  let low = 0
  let high = messages.length
  while (low < high) {
    const mid = (low + high) >>> 1
    if (compareMessages(messages[mid], message) <= 0) {
      low = mid + 1
    } else {
      high = mid
    }
  }
  return low
}

function clampUnread(count: number): number {
  return Number.isFinite(count) && count > 0 ? Math.floor(count) : 0
}

function previewOf(message: Message | undefined): string | null {
  return message ? message.body.split('\n')[0] : null
}

function toMessage(input: MessageInput): Message {
  return Object.freeze({
    id: input.id,
    sender: input.sender ?? '',
    senderId: input.senderId ?? '',
    body: input.body ?? '',
    timestamp: input.timestamp,
    sequence: input.sequence ?? 0,
    edited: input.edited ?? false,
    editVersion: input.editVersion ?? 0,
    isOwn: input.isOwn ?? false,
  })
}

function createPlaceholder(id: string): Conversation {
  return {
    id,
    name: id,
    kind: 'direct',
    folder: 'main',
    unreadCount: 0,
    lastActivity: 0,
    pinned: false,
    lastMessagePreview: null,
    placeholder: true,
    windowLoaded: false,
    hasMoreBefore: true,
    messages: [],
  }
}

function sameConversation(a: Conversation, b: Conversation): boolean {
  return (
    a.name === b.name &&
    a.kind === b.kind &&
    a.folder === b.folder &&
    a.unreadCount === b.unreadCount &&
    a.lastActivity === b.lastActivity &&
    a.pinned === b.pinned &&
    a.lastMessagePreview === b.lastMessagePreview &&
    a.placeholder === b.placeholder
  )
}

// ==================== Store ====================

export class ConversationStore implements StoreView {
  private readonly conversations = new Map<string, Conversation>()
  private readonly listeners = new Set<StoreListener>()
  private readonly messageWindow: number
  private _version = 0

  constructor(options: ConversationStoreOptions = {}) {
    this.messageWindow = Math.max(1, Math.floor(options.messageWindow ?? DEFAULT_MESSAGE_WINDOW))
  }

  /** Incremented on every mutation */
  get version(): number {
    return this._version
  }

  get size(): number {
    return this.conversations.size
  }

  has(id: string): boolean {
    return this.conversations.has(id)
  }

  getConversation(id: string): Conversation | undefined {
    return this.conversations.get(id)
  }

  listConversations(folder: Folder): Conversation[] {
    const result: Conversation[] = []
    for (const conversation of this.conversations.values()) {
      if (conversation.folder === folder) result.push(conversation)
    }
    return result.sort(compareConversations)
  }

  subscribe(listener: StoreListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  // ==================== Mutations ====================

  upsertConversation(data: ConversationInput): Conversation {
    const existing = this.conversations.get(data.id)
    const base = existing ?? createPlaceholder(data.id)
    const next: Conversation = {
      ...base,
      name: data.name ?? base.name,
      kind: data.kind ?? base.kind,
      folder: data.folder ?? base.folder,
      unreadCount: data.unreadCount !== undefined ? clampUnread(data.unreadCount) : base.unreadCount,
      lastActivity: Math.max(base.lastActivity, data.lastActivity ?? 0),
      pinned: data.pinned ?? base.pinned,
      // A loaded window knows the newest message better than a snapshot does
      lastMessagePreview:
        base.messages.length > 0 ? base.lastMessagePreview : (data.preview ?? base.lastMessagePreview),
      placeholder: false,
    }
    if (existing && sameConversation(existing, next)) return existing
    this.commit(next, { type: 'conversationUpserted', conversationId: data.id })
    return next
  }

  /**
   * Insert a new message at its chronological position, or replace an
   * existing one in place when the edit version moved forward.
   */
  upsertMessage(conversationId: string, input: MessageInput): UpsertResult {
    const conversation = this.conversations.get(conversationId) ?? createPlaceholder(conversationId)
    const incoming = toMessage(input)
    const existingIndex = conversation.messages.findIndex((m) => m.id === incoming.id)

    let messages: Message[]
    let result: UpsertResult
    if (existingIndex >= 0) {
      const current = conversation.messages[existingIndex]
      if (incoming.editVersion <= current.editVersion) return 'unchanged'
      messages = conversation.messages.slice()
      // Position is fixed at insertion time
      messages[existingIndex] = Object.freeze({
        ...incoming,
        timestamp: current.timestamp,
        sequence: current.sequence,
        edited: true,
      })
      result = 'updated'
    } else {
      const index = insertionIndex(conversation.messages, incoming)
      messages = [...conversation.messages.slice(0, index), incoming, ...conversation.messages.slice(index)]
      result = 'inserted'
    }

    let hasMoreBefore = conversation.hasMoreBefore
    if (messages.length > this.messageWindow) {
      messages = messages.slice(messages.length - this.messageWindow)
      hasMoreBefore = true
      if (!messages.some((m) => m.id === incoming.id) && this.conversations.has(conversationId)) {
        // Older than everything the window keeps
        return 'unchanged'
      }
    }

    const newest = messages[messages.length - 1]
    const next: Conversation = {
      ...conversation,
      messages: Object.freeze(messages),
      hasMoreBefore,
      lastActivity: Math.max(conversation.lastActivity, newest.timestamp),
      lastMessagePreview: previewOf(newest),
    }
    this.commit(next, { type: 'messageUpserted', conversationId, messageId: incoming.id })
    return result
  }

  removeMessage(conversationId: string, messageId: string): boolean {
    const conversation = this.conversations.get(conversationId)
    if (!conversation) return false
    const messages = conversation.messages.filter((m) => m.id !== messageId)
    if (messages.length === conversation.messages.length) return false

    const next: Conversation = {
      ...conversation,
      messages: Object.freeze(messages),
      lastMessagePreview: messages.length > 0 ? previewOf(messages[messages.length - 1]) : null,
    }
    this.commit(next, { type: 'messageRemoved', conversationId, messageId })
    return true
  }

  setUnread(conversationId: string, count: number): void {
    const conversation = this.conversations.get(conversationId)
    const unreadCount = clampUnread(count)
    if (conversation && conversation.unreadCount === unreadCount) return
    const base = conversation ?? createPlaceholder(conversationId)
    this.commit({ ...base, unreadCount }, { type: 'unreadChanged', conversationId, unreadCount })
  }

  setFolder(conversationId: string, folder: Folder): void {
    const conversation = this.conversations.get(conversationId)
    if (conversation && conversation.folder === folder) return
    const base = conversation ?? createPlaceholder(conversationId)
    this.commit({ ...base, folder }, { type: 'folderChanged', conversationId, folder })
  }

  /**
   * Record that a message window fetch has been applied.
   */
  setWindowState(conversationId: string, state: { hasMoreBefore: boolean }): void {
    const conversation = this.conversations.get(conversationId)
    if (conversation && conversation.windowLoaded && conversation.hasMoreBefore === state.hasMoreBefore) return
    const base = conversation ?? createPlaceholder(conversationId)
    this.commit(
      { ...base, windowLoaded: true, hasMoreBefore: state.hasMoreBefore },
      { type: 'windowChanged', conversationId }
    )
  }

  removeConversation(conversationId: string): boolean {
    if (!this.conversations.delete(conversationId)) return false
    this._version++
    this.notify({ type: 'conversationRemoved', conversationId })
    return true
  }

  // ==================== Internals ====================

  private commit(next: Conversation, change: StoreChange): void {
    this.conversations.set(next.id, Object.freeze(next))
    this._version++
    this.notify(change)
  }

  private notify(change: StoreChange): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(change)
      } catch (error) {
        log.error(`Store listener failed on ${change.type}: ${errorMessage(error)}`)
      }
    }
  }
}
