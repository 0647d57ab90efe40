/**
 * Discord platform client implementation
 */

import { Client, DMChannel, Events, NewsChannel, TextChannel } from 'discord.js'
import type { Message, MessageManager, PartialMessage } from 'discord.js'
import type {
  ConnectionState,
  ConversationSnapshot,
  IPlatformClient,
  MessageSnapshot,
  Unsubscribe,
} from '../types'
import type { BackendEvent } from '../schema'
import { createLogger } from '@/helpers/logger'
import { errorMessage } from '@/helpers/errors'
import {
  type ConversationChannel,
  type LocalConversationState,
  adaptDiscordChannel,
  adaptDiscordMessage,
  isConversationChannel,
} from './adapters'
import { createDiscordClient, connectDiscord, disconnectDiscord, toBackendError } from './auth'

const log = createLogger('discord')

export class DiscordPlatformClient implements IPlatformClient {
  readonly type = 'discord' as const
  private _isConnected = false

  // Bots cannot mark channels read or archive them, so both live here
  private readonly local = new Map<string, LocalConversationState>()

  private readonly eventListeners = new Set<(event: unknown) => void>()
  private readonly connectionListeners = new Set<(state: ConnectionState) => void>()

  constructor(
    private readonly token: string,
    private readonly now: () => number = Date.now,
    private readonly client: Client = createDiscordClient()
  ) {
    this.setupEventListeners()
  }

  get isConnected(): boolean {
    return this._isConnected
  }

  // ==================== Event Wiring ====================

  private setupEventListeners(): void {
    this.client.on(Events.MessageCreate, (message) => {
      if (!isConversationChannel(message.channel)) return
      const snapshot = adaptDiscordMessage(message, this.selfId())
      this.emit({ type: 'messageReceived', message: snapshot })
      if (!snapshot.isOwn) {
        const state = this.touch(message.channelId)
        state.unreadCount++
        this.emit({ type: 'readStateChanged', conversationId: message.channelId, unreadCount: state.unreadCount })
      }
    })

    this.client.on(Events.MessageUpdate, (_oldMessage, newMessage) => {
      this.resolveMessage(newMessage)
        .then((message) => {
          if (!isConversationChannel(message.channel)) return
          this.emit({ type: 'messageEdited', message: adaptDiscordMessage(message, this.selfId()) })
        })
        .catch((error: unknown) => {
          log.warn(`Could not fetch edited message ${newMessage.id}: ${errorMessage(error)}`)
        })
    })

    this.client.on(Events.MessageDelete, (message) => {
      this.emit({ type: 'messageDeleted', conversationId: message.channelId, messageId: message.id })
    })

    this.client.on(Events.ChannelUpdate, (_oldChannel, channel) => {
      if (isConversationChannel(channel)) this.emitConversation(channel)
    })

    this.client.on(Events.ChannelCreate, (channel) => {
      if (isConversationChannel(channel) && channel.viewable) this.emitConversation(channel)
    })

    this.client.on(Events.ThreadCreate, (thread) => {
      this.emitConversation(thread)
    })

    this.client.on(Events.ChannelDelete, (channel) => {
      this.local.delete(channel.id)
      this.emit({ type: 'conversationRemoved', conversationId: channel.id })
    })

    this.client.on(Events.ThreadDelete, (thread) => {
      this.local.delete(thread.id)
      this.emit({ type: 'conversationRemoved', conversationId: thread.id })
    })

    this.client.on(Events.ShardDisconnect, () => this.setConnectionState('disconnected'))
    this.client.on(Events.ShardReconnecting, () => this.setConnectionState('connecting'))
    this.client.on(Events.ShardResume, () => this.setConnectionState('connected'))
    this.client.on(Events.ShardReady, () => {
      if (this._isConnected) this.setConnectionState('connected')
    })
    this.client.on(Events.Invalidated, () => this.setConnectionState('unauthorized'))
  }

  private async resolveMessage(message: Message | PartialMessage): Promise<Message> {
    if (!message.partial) return message
    return message.fetch()
  }

  private emitConversation(channel: ConversationChannel): void {
    this.emit({ type: 'conversationUpdated', conversation: adaptDiscordChannel(channel, this.stateOf(channel.id)) })
  }

  // ==================== Connection ====================

  async connect(): Promise<void> {
    this.setConnectionState('connecting')
    try {
      await connectDiscord(this.client, this.token)
    } catch (error) {
      this.setConnectionState('disconnected')
      throw error
    }
    this._isConnected = true
    this.setConnectionState('connected')
  }

  async disconnect(): Promise<void> {
    this._isConnected = false
    await disconnectDiscord(this.client)
    this.setConnectionState('disconnected')
  }

  // ==================== Fetching ====================

  async fetchConversations(cursor?: number): Promise<ConversationSnapshot[]> {
    const channels: ConversationChannel[] = []
    try {
      for (const guild of this.client.guilds.cache.values()) {
        const guildChannels = await guild.channels.fetch()
        for (const channel of guildChannels.values()) {
          if ((channel instanceof TextChannel || channel instanceof NewsChannel) && channel.viewable) {
            channels.push(channel)
          }
        }

        const active = await guild.channels.fetchActiveThreads()
        for (const thread of active.threads.values()) {
          if (thread.viewable) channels.push(thread)
        }
      }
    } catch (error) {
      throw toBackendError(error, 'list channels')
    }

    for (const channel of this.client.channels.cache.values()) {
      if (channel instanceof DMChannel) channels.push(channel)
    }

    return channels
      .map((channel) => adaptDiscordChannel(channel, this.stateOf(channel.id)))
      .filter((snapshot) => cursor === undefined || snapshot.updatedAt > cursor)
      .sort((a, b) => b.lastActivity - a.lastActivity)
  }

  async fetchMessages(conversationId: string, beforeId: string | undefined, limit: number): Promise<MessageSnapshot[]> {
    const channel = await this.fetchChannel(conversationId)
    try {
      const manager: MessageManager = channel.messages
      const messages = await manager.fetch(beforeId ? { limit, before: beforeId } : { limit })
      const selfId = this.selfId()
      // Discord returns newest first
      return Array.from(messages.values())
        .reverse()
        .map((message) => adaptDiscordMessage(message, selfId))
    } catch (error) {
      throw toBackendError(error, `fetch messages of ${conversationId}`)
    }
  }

  // ==================== Sending ====================

  async sendMessage(conversationId: string, body: string): Promise<MessageSnapshot> {
    const channel = await this.fetchChannel(conversationId)
    try {
      const message: Message = await channel.send({ content: body })
      return adaptDiscordMessage(message, this.selfId())
    } catch (error) {
      throw toBackendError(error, `send a message to ${conversationId}`)
    }
  }

  private async fetchChannel(conversationId: string): Promise<ConversationChannel> {
    let channel: unknown
    try {
      channel = await this.client.channels.fetch(conversationId)
    } catch (error) {
      throw toBackendError(error, `open channel ${conversationId}`)
    }
    if (!isConversationChannel(channel)) {
      throw toBackendError(new Error('Channel not found or not text-based'), `open channel ${conversationId}`)
    }
    return channel
  }

  // ==================== Local State ====================

  async markRead(conversationId: string): Promise<void> {
    const state = this.touch(conversationId)
    if (state.unreadCount === 0) return
    state.unreadCount = 0
    this.emit({ type: 'readStateChanged', conversationId, unreadCount: 0 })
  }

  async setArchived(conversationId: string, archived: boolean): Promise<void> {
    const state = this.touch(conversationId)
    if (state.archived === archived) return
    state.archived = archived
    this.emit({ type: 'folderChanged', conversationId, folder: archived ? 'archived' : 'main' })
  }

  private stateOf(conversationId: string): LocalConversationState {
    return this.local.get(conversationId) ?? { unreadCount: 0, archived: false, updatedAt: 0 }
  }

  // Marks the conversation changed so the next delta fetch includes it
  private touch(conversationId: string): LocalConversationState {
    const state = this.local.get(conversationId) ?? { unreadCount: 0, archived: false, updatedAt: 0 }
    state.updatedAt = this.now()
    this.local.set(conversationId, state)
    return state
  }

  // ==================== Listeners ====================

  getCurrentUser(): { id: string; username: string } | null {
    if (!this.client.user) {
      return null
    }

    return {
      id: this.client.user.id,
      username: this.client.user.username,
    }
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

  private selfId(): string | null {
    return this.client.user?.id ?? null
  }

  private emit(event: BackendEvent): void {
    for (const listener of [...this.eventListeners]) {
      listener(event)
    }
  }

  private setConnectionState(state: ConnectionState): void {
    log.debug(`Connection state: ${state}`)
    for (const listener of [...this.connectionListeners]) {
      listener(state)
    }
  }
}
