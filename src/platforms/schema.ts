/**
 * Wire shapes exchanged with a messaging backend.
 * Everything that arrives on the push stream is validated here before the
 * reconciler lets it near the conversation store.
 */

import { z } from 'zod'
import { MalformedEvent } from '@/helpers/errors'

// ==================== Snapshots ====================

export const Folder = z.enum(['main', 'archived'])
export type Folder = z.infer<typeof Folder>

export const ConversationKind = z.enum(['direct', 'group', 'channel'])
export type ConversationKind = z.infer<typeof ConversationKind>

export const ConversationSnapshot = z.object({
  id: z.string().min(1),
  name: z.string(),
  kind: ConversationKind,
  folder: Folder,
  unreadCount: z.number().int().nonnegative(),
  lastActivity: z.number().nonnegative(), // epoch ms
  pinned: z.boolean(),
  preview: z.string().optional(), // Body of the newest message, if the backend knows it
  updatedAt: z.number().nonnegative(), // epoch ms, used as the reconciliation cursor
})
export type ConversationSnapshot = z.infer<typeof ConversationSnapshot>

export const MessageSnapshot = z.object({
  id: z.string().min(1),
  conversationId: z.string().min(1),
  sender: z.string(),
  senderId: z.string(),
  body: z.string(),
  timestamp: z.number().nonnegative(), // epoch ms
  sequence: z.number().int().nonnegative(),
  edited: z.boolean(),
  editVersion: z.number().nonnegative(),
  isOwn: z.boolean(),
})
export type MessageSnapshot = z.infer<typeof MessageSnapshot>

// ==================== Push Events ====================

export const BackendEvent = z.discriminatedUnion('type', [
  z.object({ type: z.literal('messageReceived'), message: MessageSnapshot }),
  z.object({ type: z.literal('messageEdited'), message: MessageSnapshot }),
  z.object({
    type: z.literal('messageDeleted'),
    conversationId: z.string().min(1),
    messageId: z.string().min(1),
  }),
  z.object({ type: z.literal('conversationUpdated'), conversation: ConversationSnapshot }),
  z.object({ type: z.literal('conversationRemoved'), conversationId: z.string().min(1) }),
  z.object({
    type: z.literal('readStateChanged'),
    conversationId: z.string().min(1),
    unreadCount: z.number().int().nonnegative(),
  }),
  z.object({
    type: z.literal('folderChanged'),
    conversationId: z.string().min(1),
    folder: Folder,
  }),
])
export type BackendEvent = z.infer<typeof BackendEvent>
export type BackendEventType = BackendEvent['type']

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')
}

/**
 * Validate a raw push event. Returns the MalformedEvent instead of throwing so
 * the reconciler can drop it and keep draining.
 */
export function parseBackendEvent(raw: unknown): BackendEvent | MalformedEvent {
  const result = BackendEvent.safeParse(raw)
  if (!result.success) {
    return new MalformedEvent(describeIssues(result.error), raw)
  }
  return result.data
}

/**
 * Fetch results go through the same checks as push events.
 */
export function parseConversationSnapshot(raw: unknown): ConversationSnapshot | MalformedEvent {
  const result = ConversationSnapshot.safeParse(raw)
  return result.success ? result.data : new MalformedEvent(describeIssues(result.error), raw)
}

export function parseMessageSnapshot(raw: unknown): MessageSnapshot | MalformedEvent {
  const result = MessageSnapshot.safeParse(raw)
  return result.success ? result.data : new MalformedEvent(describeIssues(result.error), raw)
}
