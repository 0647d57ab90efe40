/**
 * Discord type adapters - convert Discord.js types to backend snapshots
 */

import { DMChannel, Message, NewsChannel, SnowflakeUtil, TextChannel, ThreadChannel } from 'discord.js'
import type { ConversationSnapshot, MessageSnapshot } from '../types'

export type ConversationChannel = TextChannel | NewsChannel | ThreadChannel | DMChannel

/**
 * State Discord does not keep for bots: read position and folder.
 */
export interface LocalConversationState {
  unreadCount: number
  archived: boolean
  /** Last local change, epoch ms */
  updatedAt: number
}

export function isConversationChannel(channel: unknown): channel is ConversationChannel {
  return (
    channel instanceof TextChannel ||
    channel instanceof NewsChannel ||
    channel instanceof ThreadChannel ||
    channel instanceof DMChannel
  )
}

/**
 * Low 22 bits of a snowflake: worker, process and increment. Orders messages
 * created in the same millisecond.
 */
export function sequenceFromSnowflake(id: string): number {
  try {
    return Number(BigInt(id) & 0x3fffffn)
  } catch {
    // Not a snowflake; every message then shares sequence 0
    return 0
  }
}

function timestampOf(id: string | null, fallback: number | null): number {
  if (id) {
    try {
      return SnowflakeUtil.timestampFrom(id)
    } catch {
      return fallback ?? 0
    }
  }
  return fallback ?? 0
}

// ==================== Conversation Adapters ====================

export function conversationName(channel: ConversationChannel): string {
  if (channel instanceof DMChannel) {
    return channel.recipient?.displayName ?? 'Direct message'
  }
  return `${channel.guild.name} / #${channel.name}`
}

/**
 * Convert Discord.js channel to a conversation snapshot
 */
export function adaptDiscordChannel(channel: ConversationChannel, state: LocalConversationState): ConversationSnapshot {
  const lastActivity = timestampOf(channel.lastMessageId, channel.createdTimestamp)
  const preview = channel.lastMessage?.content

  return {
    id: channel.id,
    name: conversationName(channel),
    kind: channel instanceof DMChannel ? 'direct' : 'channel',
    folder: state.archived ? 'archived' : 'main',
    unreadCount: state.unreadCount,
    lastActivity,
    pinned: false,
    ...(preview ? { preview } : {}),
    updatedAt: Math.max(lastActivity, state.updatedAt),
  }
}

// ==================== Message Adapters ====================

/**
 * Replace Discord mention format (<@userid> or <@!userid>) with readable @username
 */
export function formatMentions(content: string, message: Message): string {
  return content.replace(/<@!?(\d+)>/g, (match: string, userId: string) => {
    const user = message.mentions.users.get(userId)
    if (user) {
      return `@${user.displayName}`
    }
    const member = message.guild?.members.cache.get(userId)
    if (member) {
      return `@${member.displayName}`
    }
    return match
  })
}

/**
 * Message text as shown in the terminal: mentions resolved, attachments and
 * embeds summarised on their own lines.
 */
export function messageBody(message: Message): string {
  const lines: string[] = []
  if (message.content) lines.push(formatMentions(message.content, message))
  for (const attachment of message.attachments.values()) {
    lines.push(`[attachment: ${attachment.name}]`)
  }
  if (lines.length === 0) {
    for (const embed of message.embeds) {
      lines.push(`[embed: ${embed.title ?? embed.description ?? 'untitled'}]`)
    }
  }
  if (message.stickers.size > 0 && lines.length === 0) {
    lines.push(`[sticker: ${message.stickers.map((sticker) => sticker.name).join(', ')}]`)
  }
  return lines.join('\n')
}

/**
 * Convert Discord.js message to a message snapshot
 */
export function adaptDiscordMessage(message: Message, selfId: string | null): MessageSnapshot {
  return {
    id: message.id,
    conversationId: message.channelId,
    sender: message.member?.displayName ?? message.author.displayName,
    senderId: message.author.id,
    body: messageBody(message),
    timestamp: message.createdTimestamp,
    sequence: sequenceFromSnowflake(message.id),
    edited: message.editedTimestamp !== null,
    editVersion: message.editedTimestamp ?? 0,
    isOwn: selfId !== null && message.author.id === selfId,
  }
}
