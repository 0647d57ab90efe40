/**
 * Platform abstraction types for the messaging backend.
 * The client core talks to Discord, the offline demo backend, and future
 * platforms through this interface only.
 */

export type {
  Folder,
  ConversationKind,
  ConversationSnapshot,
  MessageSnapshot,
  BackendEvent,
  BackendEventType,
} from './schema'

import type { ConversationSnapshot, MessageSnapshot } from './schema'

// ==================== Platform Types ====================

export type PlatformType = 'discord' | 'demo'

export type ConnectionState = 'connecting' | 'connected' | 'disconnected' | 'unauthorized'

export type Unsubscribe = () => void

// ==================== Platform Client Interface ====================

/**
 * Core platform client interface
 * All platform implementations must implement this interface
 */
export interface IPlatformClient {
  readonly type: PlatformType
  readonly isConnected: boolean

  /**
   * Connect to the platform (authenticate and establish connection)
   * @throws FatalAuthError when the credentials are rejected
   */
  connect(): Promise<void>

  disconnect(): Promise<void>

  /**
   * Get conversations, most recently active first.
   * @param cursor - Only return conversations whose updatedAt is greater
   */
  fetchConversations(cursor?: number): Promise<ConversationSnapshot[]>

  /**
   * Get messages of a conversation, oldest first.
   * @param beforeId - Fetch messages older than this message
   */
  fetchMessages(conversationId: string, beforeId: string | undefined, limit: number): Promise<MessageSnapshot[]>

  markRead(conversationId: string): Promise<void>

  setArchived(conversationId: string, archived: boolean): Promise<void>

  /**
   * Send a plain text message as the current user.
   * @returns The message as stored by the backend
   */
  sendMessage(conversationId: string, body: string): Promise<MessageSnapshot>

  getCurrentUser(): { id: string; username: string } | null

  /**
   * Listen for push events. Payloads are unvalidated until parsed with
   * parseBackendEvent.
   */
  onEvent(listener: (event: unknown) => void): Unsubscribe

  onConnectionStateChange(listener: (state: ConnectionState) => void): Unsubscribe
}
