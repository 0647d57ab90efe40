/**
 * Offline demo backend.
 * Keeps conversations in memory, seeded from seed.json, and pushes events the
 * same way a network backend would. Used for trying the client without
 * credentials and as the in-process backend in tests.
 */

import * as fs from 'fs'
import { fileURLToPath } from 'url'
import { z } from 'zod'
import type {
  BackendEvent,
  ConnectionState,
  ConversationSnapshot,
  Folder,
  IPlatformClient,
  MessageSnapshot,
  Unsubscribe,
} from '../types'
import { ConversationKind, Folder as FolderSchema } from '../schema'
import { FatalAuthError, TransientBackendError } from '@/helpers/errors'
import { createLogger } from '@/helpers/logger'

const log = createLogger('demo')

// ==================== Seed ====================

const SeedMessage = z.object({
  senderId: z.string(),
  sender: z.string(),
  body: z.string(),
  minutesAgo: z.number().nonnegative(),
})

const SeedConversation = z.object({
  id: z.string().min(1),
  name: z.string(),
  kind: ConversationKind,
  folder: FolderSchema,
  pinned: z.boolean().default(false),
  unreadCount: z.number().int().nonnegative().default(0),
  messages: z.array(SeedMessage).default([]),
})

const ScriptLine = z.object({
  conversationId: z.string().min(1),
  senderId: z.string(),
  sender: z.string(),
  body: z.string(),
})

export const DemoSeed = z.object({
  self: z.object({ id: z.string(), username: z.string() }),
  conversations: z.array(SeedConversation),
  script: z.array(ScriptLine).default([]),
})
export type DemoSeed = z.infer<typeof DemoSeed>
export type DemoSeedInput = z.input<typeof DemoSeed>

const DEFAULT_SEED_PATH = fileURLToPath(new URL('./seed.json', import.meta.url))

/**
 * Read and validate a seed file
 */
export function loadSeed(filePath: string = DEFAULT_SEED_PATH): DemoSeed {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'))
  const result = DemoSeed.safeParse(raw)
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
    throw new Error(`Invalid demo seed ${filePath}: ${issues}`)
  }
  return result.data
}

// ==================== Client ====================

interface DemoConversation {
  id: string
  name: string
  kind: ConversationKind
  folder: Folder
  pinned: boolean
  unreadCount: number
  updatedAt: number
  nextSequence: number
  messages: MessageSnapshot[]
}

export interface DemoPlatformOptions {
  seed?: DemoSeedInput
  now?: () => number
  /** Interval of scripted incoming messages after connect; 0 disables */
  intervalMs?: number
  /** Simulated request latency */
  latencyMs?: number
}

export interface IncomingMessage {
  conversationId: string
  body: string
  sender?: string
  senderId?: string
}

export class DemoPlatformClient implements IPlatformClient {
  readonly type = 'demo' as const

  private readonly conversations = new Map<string, DemoConversation>()
  private readonly self: { id: string; username: string }
  private readonly script: DemoSeed['script']
  private readonly now: () => number
  private readonly intervalMs: number
  private readonly latencyMs: number

  private connectionState: ConnectionState = 'disconnected'
  private readonly eventListeners = new Set<(event: unknown) => void>()
  private readonly connectionListeners = new Set<(state: ConnectionState) => void>()
  private timer: ReturnType<typeof setInterval> | null = null
  private scriptIndex = 0
  private failuresLeft = 0
  private revoked = false
  private nextMessageNumber = 1

  constructor(options: DemoPlatformOptions = {}) {
    const seed = DemoSeed.parse(options.seed ?? loadSeed())
    this.now = options.now ?? Date.now
    this.intervalMs = options.intervalMs ?? 0
    this.latencyMs = options.latencyMs ?? 0
    this.self = seed.self
    this.script = seed.script

    const start = this.now()
    for (const entry of seed.conversations) {
      const conversation: DemoConversation = {
        id: entry.id,
        name: entry.name,
        kind: entry.kind,
        folder: entry.folder,
        pinned: entry.pinned,
        unreadCount: entry.unreadCount,
        updatedAt: 0,
        nextSequence: 0,
        messages: [],
      }
      for (const message of entry.messages) {
        conversation.messages.push(
          this.createMessage(conversation, {
            conversationId: entry.id,
            body: message.body,
            sender: message.sender,
            senderId: message.senderId,
            timestamp: start - message.minutesAgo * 60_000,
          })
        )
      }
      conversation.messages.sort((a, b) => a.timestamp - b.timestamp || a.sequence - b.sequence)
      conversation.updatedAt = lastActivityOf(conversation)
      this.conversations.set(entry.id, conversation)
    }
  }

  get isConnected(): boolean {
    return this.connectionState === 'connected'
  }

  // ==================== Connection ====================

  async connect(): Promise<void> {
    if (this.revoked) throw new FatalAuthError('Demo session was revoked')
    if (this.connectionState === 'connected') return
    this.setConnectionState('connecting')
    await this.pause()
    this.setConnectionState('connected')
    if (this.intervalMs > 0 && this.script.length > 0) {
      this.timer = setInterval(() => this.playScript(), this.intervalMs)
    }
    log.info(`Connected with ${this.conversations.size} conversation(s)`)
  }

  async disconnect(): Promise<void> {
    this.stopScript()
    this.setConnectionState('disconnected')
  }

  // ==================== Requests ====================

  async fetchConversations(cursor?: number): Promise<ConversationSnapshot[]> {
    await this.beginRequest()
    return Array.from(this.conversations.values())
      .filter((conversation) => cursor === undefined || conversation.updatedAt > cursor)
      .map((conversation) => toSnapshot(conversation))
      .sort((a, b) => b.lastActivity - a.lastActivity)
  }

  async fetchMessages(conversationId: string, beforeId: string | undefined, limit: number): Promise<MessageSnapshot[]> {
    await this.beginRequest()
    const conversation = this.conversations.get(conversationId)
    if (!conversation) throw new TransientBackendError(`Unknown conversation ${conversationId}`)

    let end = conversation.messages.length
    if (beforeId !== undefined) {
      const index = conversation.messages.findIndex((message) => message.id === beforeId)
      end = index >= 0 ? index : 0
    }
    return conversation.messages.slice(Math.max(0, end - limit), end)
  }

  async markRead(conversationId: string): Promise<void> {
    await this.beginRequest()
    const conversation = this.require(conversationId)
    if (conversation.unreadCount === 0) return
    conversation.unreadCount = 0
    conversation.updatedAt = this.now()
    this.emit({ type: 'readStateChanged', conversationId, unreadCount: 0 })
  }

  async setArchived(conversationId: string, archived: boolean): Promise<void> {
    await this.beginRequest()
    const conversation = this.require(conversationId)
    const folder: Folder = archived ? 'archived' : 'main'
    if (conversation.folder === folder) return
    conversation.folder = folder
    conversation.updatedAt = this.now()
    this.emit({ type: 'folderChanged', conversationId, folder })
  }

  async sendMessage(conversationId: string, body: string): Promise<MessageSnapshot> {
    await this.beginRequest()
    const conversation = this.conversations.get(conversationId)
    if (!conversation) throw new TransientBackendError(`Unknown conversation ${conversationId}`)
    const message = this.createMessage(conversation, {
      conversationId,
      body,
      sender: this.self.username,
      senderId: this.self.id,
      timestamp: this.now(),
    })
    conversation.messages.push(message)
    conversation.updatedAt = this.now()
    this.emit({ type: 'messageReceived', message })
    return message
  }

  getCurrentUser(): { id: string; username: string } | null {
    return this.isConnected ? { ...this.self } : null
  }

  onEvent(listener: (event: unknown) => void): Unsubscribe {
    this.eventListeners.add(listener)
    return () => {
      this.eventListeners.delete(listener)
    }
  }

  onConnectionStateChange(listener: (state: ConnectionState) => void): Unsubscribe {
    this.connectionListeners.add(listener)
    return () => {
      this.connectionListeners.delete(listener)
    }
  }

  // ==================== Simulation ====================

  /**
   * Deliver a new message as if someone sent it. Stored even while offline;
   * the event is only pushed while connected.
   */
  receiveMessage(incoming: IncomingMessage): MessageSnapshot {
    const conversation = this.require(incoming.conversationId)
    const senderId = incoming.senderId ?? 'u-demo'
    const message = this.createMessage(conversation, {
      ...incoming,
      senderId,
      sender: incoming.sender ?? 'Demo',
      timestamp: this.now(),
    })
    conversation.messages.push(message)
    conversation.updatedAt = this.now()
    this.emit({ type: 'messageReceived', message })
    if (!message.isOwn) {
      conversation.unreadCount++
      this.emit({ type: 'readStateChanged', conversationId: conversation.id, unreadCount: conversation.unreadCount })
    }
    return message
  }

  editMessage(conversationId: string, messageId: string, body: string): MessageSnapshot {
    const conversation = this.require(conversationId)
    const index = conversation.messages.findIndex((message) => message.id === messageId)
    if (index < 0) throw new Error(`Unknown message ${messageId}`)
    const current = conversation.messages[index]
    const edited: MessageSnapshot = { ...current, body, edited: true, editVersion: current.editVersion + 1 }
    conversation.messages[index] = edited
    conversation.updatedAt = this.now()
    this.emit({ type: 'messageEdited', message: edited })
    return edited
  }

  deleteMessage(conversationId: string, messageId: string): void {
    const conversation = this.require(conversationId)
    conversation.messages = conversation.messages.filter((message) => message.id !== messageId)
    conversation.updatedAt = this.now()
    this.emit({ type: 'messageDeleted', conversationId, messageId })
  }

  renameConversation(conversationId: string, name: string): void {
    const conversation = this.require(conversationId)
    conversation.name = name
    conversation.updatedAt = this.now()
    this.emit({ type: 'conversationUpdated', conversation: toSnapshot(conversation) })
  }

  /** Push an arbitrary payload, valid or not, to every event listener */
  pushRaw(payload: unknown): void {
    for (const listener of [...this.eventListeners]) {
      listener(payload)
    }
  }

  simulateDisconnect(): void {
    this.setConnectionState('disconnected')
  }

  simulateReconnect(): void {
    this.setConnectionState('connected')
  }

  /** The next count requests fail with a transient error */
  failNextRequests(count: number): void {
    this.failuresLeft = Math.max(0, Math.floor(count))
  }

  /** Invalidate the session: every later request fails with FatalAuthError */
  revokeSession(): void {
    this.revoked = true
    this.stopScript()
    this.setConnectionState('unauthorized')
  }

  // ==================== Internals ====================

  private createMessage(
    conversation: DemoConversation,
    fields: IncomingMessage & { sender: string; senderId: string; timestamp: number }
  ): MessageSnapshot {
    return {
      id: `${conversation.id}-m${this.nextMessageNumber++}`,
      conversationId: conversation.id,
      sender: fields.sender,
      senderId: fields.senderId,
      body: fields.body,
      timestamp: fields.timestamp,
      sequence: conversation.nextSequence++,
      edited: false,
      editVersion: 0,
      isOwn: fields.senderId === this.self.id,
    }
  }

  private playScript(): void {
    const line = this.script[this.scriptIndex % this.script.length]
    this.scriptIndex++
    if (!line || !this.conversations.has(line.conversationId)) return
    this.receiveMessage(line)
  }

  private stopScript(): void {
    if (this.timer === null) return
    clearInterval(this.timer)
    this.timer = null
  }

  private async beginRequest(): Promise<void> {
    await this.pause()
    if (this.revoked) throw new FatalAuthError('Demo session was revoked')
    if (this.connectionState !== 'connected') throw new TransientBackendError('Demo backend is offline')
    if (this.failuresLeft > 0) {
      this.failuresLeft--
      throw new TransientBackendError('Simulated network failure')
    }
  }

  private pause(): Promise<void> {
    if (this.latencyMs <= 0) return Promise.resolve()
    return new Promise((resolve) => setTimeout(resolve, this.latencyMs))
  }

  private require(conversationId: string): DemoConversation {
    const conversation = this.conversations.get(conversationId)
    if (!conversation) throw new Error(`Unknown conversation ${conversationId}`)
    return conversation
  }

  private emit(event: BackendEvent): void {
    if (!this.isConnected) return
    this.pushRaw(event)
  }

  private setConnectionState(state: ConnectionState): void {
    if (this.connectionState === state) return
    this.connectionState = state
    for (const listener of [...this.connectionListeners]) {
      listener(state)
    }
  }
}

function lastActivityOf(conversation: DemoConversation): number {
  return conversation.messages[conversation.messages.length - 1]?.timestamp ?? 0
}

function toSnapshot(conversation: DemoConversation): ConversationSnapshot {
  const newest = conversation.messages[conversation.messages.length - 1]
  return {
    id: conversation.id,
    name: conversation.name,
    kind: conversation.kind,
    folder: conversation.folder,
    unreadCount: conversation.unreadCount,
    lastActivity: lastActivityOf(conversation),
    pinned: conversation.pinned,
    ...(newest ? { preview: newest.body } : {}),
    updatedAt: conversation.updatedAt,
  }
}
