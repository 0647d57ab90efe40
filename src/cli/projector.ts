/**
 * View projection: store state + search result + navigation state in,
 * ready-to-draw RenderModel out. Pure; the same inputs always give an equal
 * model, so the UI can skip redraws that would change nothing.
 */

import type { Folder } from '@/platforms/types'
import type { Conversation, Message, StoreView } from './store'
import type { FocusOwner, NavigationState } from './dispatcher'
import type { ReconcilerStatus } from './reconciler'
import { ELLIPSIS, normalizeText, type TextMetrics } from './text-metrics'

// ==================== Types ====================

export interface Layout {
  listWidth: number
  panelWidth: number
  panelHeight: number
}

export interface ConversationRow {
  id: string
  avatar: string
  title: string
  preview: string
  unreadBadge: string
  pinned: boolean
  archived: boolean
  selected: boolean
}

export interface PanelLine {
  key: string
  kind: 'meta' | 'body' | 'notice'
  text: string
  own: boolean
}

export interface MessagePanel {
  conversationId: string
  title: string
  lines: PanelLine[]
  loading: boolean
  hasMoreBefore: boolean
  scroll: number
  maxScroll: number
  /** Compose line with the end of the draft; null when not composing */
  compose: string | null
}

export interface RenderHeader {
  folder: Folder
  label: string
  count: number
  /** Unread total of the folder not on screen */
  otherFolderUnread: number
  query: string
  focus: FocusOwner
}

export interface RenderModel {
  header: RenderHeader
  rows: ConversationRow[]
  selectedIndex: number
  selectedId: string | null
  panel: MessagePanel | null
  status: string
}

export interface ProjectionInput {
  store: StoreView
  searchResult: readonly string[]
  nav: NavigationState
  layout: Layout
  status: ReconcilerStatus
  loading: ReadonlySet<string>
  metrics: TextMetrics
}

// ==================== Constants ====================

export const AVATAR_WIDTH = 4
export const PIN_MARKER = '📌 '
export const ARCHIVED_TAG = ' [archived]'
export const NO_MESSAGES = 'No messages'
export const EMPTY_MESSAGE = '(empty message)'
export const COMPOSE_PROMPT = '> '

const FOLDER_LABELS: Record<Folder, string> = {
  main: 'Chats',
  archived: 'Archive',
}

// Rendered widths of body lines, keyed by the immutable message object
const bodyWidthCache = new WeakMap<Message, number[]>()

// ==================== Helpers ====================

/**
 * Index of the selected row, falling back to the first row when the selected
 * conversation is gone or nothing is selected yet.
 */
export function resolveSelection(ids: readonly string[], selectedId: string | null): number {
  if (selectedId !== null) {
    const index = ids.indexOf(selectedId)
    if (index >= 0) return index
  }
  return ids.length > 0 ? 0 : -1
}

export function formatTime(timestamp: number): string {
  return new Date(timestamp).toISOString().slice(11, 16)
}

function unreadBadge(count: number): string {
  if (count <= 0) return ''
  return count > 99 ? '99+' : String(count)
}

function avatarOf(name: string, metrics: TextMetrics): string {
  const first = metrics.segment(name).find((grapheme) => grapheme.trim() !== '')
  return first ? first.toUpperCase() : '?'
}

function otherFolder(folder: Folder): Folder {
  return folder === 'main' ? 'archived' : 'main'
}

export function statusText(status: ReconcilerStatus): string {
  if (status.notice) return status.notice
  switch (status.state) {
    case 'idle':
      return 'Starting'
    case 'syncing':
      return 'Syncing conversations'
    case 'live':
      return ''
    case 'degraded':
      return 'Offline: showing cached conversations'
    case 'frozen':
      return 'Session ended: read-only'
  }
}

function visibleIds(store: StoreView, searchResult: readonly string[], nav: NavigationState): string[] {
  const source = nav.query.trim() ? searchResult : store.listConversations(nav.folder).map((c) => c.id)
  return source.filter((id) => store.getConversation(id)?.folder === nav.folder)
}

function buildRow(conversation: Conversation, selected: boolean, layout: Layout, metrics: TextMetrics): ConversationRow {
  const contentWidth = Math.max(1, layout.listWidth - AVATAR_WIDTH)
  const name = normalizeText(conversation.name).split('\n')[0]
  const badge = unreadBadge(conversation.unreadCount)
  const archived = conversation.folder === 'archived'
  const titleWidth = Math.max(0, contentWidth - (badge ? metrics.width(badge) + 1 : 0))
  const rawTitle = `${conversation.pinned ? PIN_MARKER : ''}${name}${archived ? ARCHIVED_TAG : ''}`
  const rawPreview = conversation.lastMessagePreview
    ? normalizeText(conversation.lastMessagePreview).split('\n')[0]
    : NO_MESSAGES

  return {
    id: conversation.id,
    avatar: avatarOf(name, metrics),
    title: metrics.truncate(rawTitle, titleWidth),
    preview: metrics.truncate(rawPreview || NO_MESSAGES, contentWidth),
    unreadBadge: badge,
    pinned: conversation.pinned,
    archived,
    selected,
  }
}

function bodyLines(message: Message, width: number, metrics: TextMetrics): string[] {
  const lines = message.body ? normalizeText(message.body).split('\n') : [EMPTY_MESSAGE]
  let widths = bodyWidthCache.get(message)
  if (!widths || widths.length !== lines.length) {
    widths = lines.map((line) => metrics.width(line))
    bodyWidthCache.set(message, widths)
  }
  const measured = widths
  return lines.map((line, i) => (measured[i] <= width ? line : metrics.truncate(line, width)))
}

// Keeps the end of the draft in view, where the typing happens
function composeLine(draft: string, width: number, metrics: TextMetrics): string {
  const full = `${COMPOSE_PROMPT}${draft}`
  if (metrics.width(full) <= width) return full

  const head = `${COMPOSE_PROMPT}${ELLIPSIS}`
  let used = metrics.width(head)
  let kept = ''
  const graphemes = metrics.segment(draft)
  for (let i = graphemes.length - 1; i >= 0; i--) {
    const next = metrics.width(graphemes[i])
    if (used + next > width) break
    kept = graphemes[i] + kept
    used += next
  }
  return head + kept
}

function buildPanel(
  conversation: Conversation,
  nav: NavigationState,
  layout: Layout,
  loading: boolean,
  metrics: TextMetrics
): MessagePanel {
  const width = Math.max(1, layout.panelWidth)
  const composing = nav.draft !== null
  // The compose line takes the last row
  const height = Math.max(1, layout.panelHeight - (composing ? 1 : 0))
  const lines: PanelLine[] = []

  if (conversation.windowLoaded && conversation.hasMoreBefore && conversation.messages.length > 0) {
    lines.push({ key: 'older', kind: 'notice', text: metrics.truncate('↑ older messages', width), own: false })
  }

  if (conversation.messages.length === 0) {
    const notice = loading || !conversation.windowLoaded ? 'Loading messages…' : 'No messages yet'
    lines.push({ key: 'empty', kind: 'notice', text: metrics.truncate(notice, width), own: false })
  }

  for (const message of conversation.messages) {
    const sender = normalizeText(message.sender).split('\n')[0] || 'Unknown'
    const meta = `${sender}${message.isOwn ? ' (you)' : ''} · ${formatTime(message.timestamp)}${message.edited ? ' (edited)' : ''}`
    lines.push({ key: `${message.id}:meta`, kind: 'meta', text: metrics.truncate(meta, width), own: message.isOwn })
    bodyLines(message, width, metrics).forEach((text, i) => {
      lines.push({ key: `${message.id}:${i}`, kind: 'body', text, own: message.isOwn })
    })
  }

  const maxScroll = Math.max(0, lines.length - height)
  const scroll = Math.min(Math.max(0, nav.panelScroll), maxScroll)
  const end = lines.length - scroll
  const start = Math.max(0, end - height)

  return {
    conversationId: conversation.id,
    title: metrics.truncate(normalizeText(conversation.name).split('\n')[0], width),
    lines: lines.slice(start, end),
    loading,
    hasMoreBefore: conversation.hasMoreBefore,
    scroll,
    maxScroll,
    compose: nav.draft !== null ? composeLine(nav.draft, width, metrics) : null,
  }
}

// ==================== Projection ====================

export function project(input: ProjectionInput): RenderModel {
  const { store, searchResult, nav, layout, status, loading, metrics } = input

  const ids = visibleIds(store, searchResult, nav)
  const selectedIndex = resolveSelection(ids, nav.selectedId)
  const rows: ConversationRow[] = []
  ids.forEach((id, index) => {
    const conversation = store.getConversation(id)
    if (conversation) rows.push(buildRow(conversation, index === selectedIndex, layout, metrics))
  })

  const open = nav.openId !== null ? store.getConversation(nav.openId) : undefined
  const otherFolderUnread = store
    .listConversations(otherFolder(nav.folder))
    .reduce((sum, conversation) => sum + conversation.unreadCount, 0)

  return {
    header: {
      folder: nav.folder,
      label: FOLDER_LABELS[nav.folder],
      count: rows.length,
      otherFolderUnread,
      query: nav.query,
      focus: nav.focus,
    },
    rows,
    selectedIndex,
    selectedId: selectedIndex >= 0 ? ids[selectedIndex] : null,
    panel: open ? buildPanel(open, nav, layout, loading.has(open.id), metrics) : null,
    status: statusText(status),
  }
}
