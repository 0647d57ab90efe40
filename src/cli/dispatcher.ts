/**
 * Keyboard actions and focus state machine.
 * Key handling is synchronous: focus and navigation change immediately,
 * backend requests are started and left to the reconciler.
 */

import type { Folder } from '@/platforms/types'
import { createLogger } from '@/helpers/logger'
import { StaleReference, errorMessage } from '@/helpers/errors'
import type { ConversationStore } from './store'
import type { SearchIndex } from './search'
import type { FetchOutcome } from './reconciler'
import { resolveSelection } from './projector'
import { defaultMeasurer } from './text-metrics'

const log = createLogger('dispatch')

// ==================== Types ====================

export type FocusOwner = 'search' | 'list' | 'panel'

export interface NavigationState {
  focus: FocusOwner
  folder: Folder
  query: string
  selectedId: string | null
  /** Conversation shown in the message panel */
  openId: string | null
  /** Lines scrolled up from the bottom of the panel */
  panelScroll: number
  /** Message being composed in the panel; null when not composing */
  draft: string | null
}

export const initialNavigationState: NavigationState = Object.freeze({
  focus: 'list',
  folder: 'main',
  query: '',
  selectedId: null,
  openId: null,
  panelScroll: 0,
  draft: null,
})

const NAVIGATION_KEYS: ReadonlyArray<keyof NavigationState> = [
  'focus',
  'folder',
  'query',
  'selectedId',
  'openId',
  'panelScroll',
  'draft',
]

export type KeyEvent =
  | { name: 'tab' | 'enter' | 'escape' | 'up' | 'down' | 'backspace' | 'interrupt' }
  | { name: 'char'; char: string }

/**
 * Backend-facing operations the dispatcher starts. Implemented by the
 * reconciler, which owns retries and stale-response handling.
 */
export interface ConversationActions {
  loadWindow(conversationId: string): Promise<FetchOutcome>
  loadOlder(conversationId: string): Promise<FetchOutcome>
  setActiveConversation(conversationId: string | null): void
  markRead(conversationId: string): Promise<boolean>
  setArchived(conversationId: string, archived: boolean): Promise<boolean>
  sendMessage(conversationId: string, body: string): Promise<boolean>
  refresh(): Promise<void>
  isFrozen(): boolean
}

export interface ActionDispatcherOptions {
  store: ConversationStore
  search: SearchIndex
  actions: ConversationActions
  /** Called once when the user asks to quit */
  onExit: () => void
}

type NavigationListener = (state: NavigationState) => void

// ==================== Dispatcher ====================

export class ActionDispatcher {
  private state: NavigationState = initialNavigationState
  private readonly listeners = new Set<NavigationListener>()
  private panelMaxScroll = 0
  private exited = false

  constructor(private readonly options: ActionDispatcherOptions) {}

  getState(): NavigationState {
    return this.state
  }

  subscribe(listener: NavigationListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  /** Conversation IDs currently listed, in display order */
  visibleIds(): string[] {
    return this.options.search.query(this.state.query, this.state.folder)
  }

  /**
   * Tell the dispatcher how far the rendered panel can scroll, so it can
   * clamp its offset and notice when the top is reached.
   */
  syncPanel(maxScroll: number): void {
    this.panelMaxScroll = Math.max(0, maxScroll)
    if (this.state.panelScroll > this.panelMaxScroll) {
      this.update({ panelScroll: this.panelMaxScroll })
    }
  }

  handleKey(key: KeyEvent): void {
    if (this.exited) return

    if (key.name === 'interrupt' || (key.name === 'char' && key.char === 'Q')) {
      this.exit()
      return
    }

    switch (this.state.focus) {
      case 'search':
        this.handleSearchKey(key)
        return
      case 'list':
        this.handleListKey(key)
        return
      case 'panel':
        this.handlePanelKey(key)
        return
    }
  }

  // ==================== Focus handlers ====================

  private handleSearchKey(key: KeyEvent): void {
    switch (key.name) {
      case 'tab':
      case 'enter':
        this.update({ focus: 'list' })
        return
      case 'escape':
        this.update({ query: '' })
        return
      case 'backspace':
        this.update({ query: dropLastGrapheme(this.state.query) })
        return
      case 'char': {
        const typed = printable(key.char)
        if (typed) this.update({ query: this.state.query + typed })
        return
      }
      default:
        return
    }
  }

  private handleListKey(key: KeyEvent): void {
    if (key.name === 'char') {
      switch (key.char) {
        case 'q':
          this.exit()
          return
        case '/':
          this.update({ focus: 'search' })
          return
        case '[':
        case ']':
          this.toggleFolder()
          return
        case 'k':
          this.moveSelection(-1)
          return
        case 'j':
          this.moveSelection(1)
          return
        case 'a':
          this.toggleArchive()
          return
        case 'R':
          this.track('refresh', this.options.actions.refresh())
          return
        default:
          return
      }
    }

    switch (key.name) {
      case 'tab':
        this.update({ focus: 'search' })
        return
      case 'up':
        this.moveSelection(-1)
        return
      case 'down':
        this.moveSelection(1)
        return
      case 'enter': {
        const selectedId = this.effectiveSelection()
        if (selectedId !== null) this.openConversation(selectedId)
        return
      }
      default:
        return
    }
  }

  private handlePanelKey(key: KeyEvent): void {
    if (this.state.draft !== null) {
      this.handleComposeKey(key, this.state.draft)
      return
    }

    if (key.name === 'char') {
      switch (key.char) {
        case 'q':
          this.exit()
          return
        case '/':
          this.update({ focus: 'search' })
          return
        case 'i':
          this.startCompose()
          return
        case 'k':
          this.scrollPanel(1)
          return
        case 'j':
          this.scrollPanel(-1)
          return
        default:
          return
      }
    }

    switch (key.name) {
      case 'tab':
      case 'escape':
        this.update({ focus: 'list' })
        return
      case 'enter':
        this.startCompose()
        return
      case 'up':
        this.scrollPanel(1)
        return
      case 'down':
        this.scrollPanel(-1)
        return
      default:
        return
    }
  }

  // Printable keys other than Q are text here, lowercase q included
  private handleComposeKey(key: KeyEvent, draft: string): void {
    switch (key.name) {
      case 'escape':
        this.update({ draft: null })
        return
      case 'tab':
        this.update({ focus: 'list' })
        return
      case 'enter':
        this.sendDraft(draft)
        return
      case 'backspace':
        this.update({ draft: dropLastGrapheme(draft) })
        return
      case 'up':
        this.scrollPanel(1)
        return
      case 'down':
        this.scrollPanel(-1)
        return
      case 'char': {
        const typed = printable(key.char)
        if (typed) this.update({ draft: draft + typed })
        return
      }
      default:
        return
    }
  }

  // ==================== Actions ====================

  /**
   * Show a conversation in the panel, mark it read, and fetch its message
   * window if it was never loaded.
   */
  openConversation(conversationId: string): void {
    const { store, actions } = this.options
    const conversation = store.getConversation(conversationId)
    if (!conversation) {
      log.warn(new StaleReference(conversationId).message)
      return
    }

    const draft = conversationId === this.state.openId ? this.state.draft : null
    this.update({ focus: 'panel', selectedId: conversationId, openId: conversationId, panelScroll: 0, draft })
    if (actions.isFrozen()) return

    store.setUnread(conversationId, 0)
    actions.setActiveConversation(conversationId)
    this.track(`mark ${conversationId} read`, actions.markRead(conversationId))
    if (!conversation.windowLoaded) {
      this.track(`load ${conversationId}`, actions.loadWindow(conversationId))
    }
  }

  private effectiveSelection(): string | null {
    const ids = this.visibleIds()
    const index = resolveSelection(ids, this.state.selectedId)
    return index >= 0 ? ids[index] : null
  }

  private moveSelection(delta: number): void {
    const ids = this.visibleIds()
    if (ids.length === 0) return
    const current = resolveSelection(ids, this.state.selectedId)
    const next = Math.max(0, Math.min(ids.length - 1, current + delta))
    this.update({ selectedId: ids[next] })
  }

  private toggleFolder(): void {
    const folder: Folder = this.state.folder === 'main' ? 'archived' : 'main'
    const first = this.options.search.query(this.state.query, folder)[0] ?? null
    this.update({ folder, selectedId: first })
  }

  private toggleArchive(): void {
    const { store, actions } = this.options
    if (actions.isFrozen()) return
    const id = this.effectiveSelection()
    if (id === null) return
    const conversation = store.getConversation(id)
    if (!conversation) return

    const previous = conversation.folder
    const target: Folder = previous === 'archived' ? 'main' : 'archived'
    store.setFolder(id, target)

    const request = actions.setArchived(id, target === 'archived').then((ok) => {
      if (!ok && store.getConversation(id)?.folder === target) {
        log.warn(`Reverting folder of ${id} after a failed request`)
        store.setFolder(id, previous)
      }
      return ok
    })
    this.track(`archive ${id}`, request)
  }

  private scrollPanel(delta: number): void {
    const { panelScroll, openId } = this.state
    if (delta > 0 && panelScroll >= this.panelMaxScroll) {
      this.loadOlderAtTop(openId)
      return
    }
    const next = Math.max(0, Math.min(this.panelMaxScroll, panelScroll + delta))
    if (next !== panelScroll) this.update({ panelScroll: next })
  }

  private loadOlderAtTop(openId: string | null): void {
    const { store, actions } = this.options
    if (openId === null || actions.isFrozen()) return
    const conversation = store.getConversation(openId)
    if (!conversation || !conversation.windowLoaded || !conversation.hasMoreBefore) return
    this.track(`load older ${openId}`, actions.loadOlder(openId))
  }

  private startCompose(): void {
    if (this.state.openId === null || this.options.actions.isFrozen()) return
    this.update({ draft: '' })
  }

  /**
   * Send the draft to the open conversation. The draft comes back when the
   * request fails, unless a new one was started meanwhile.
   */
  private sendDraft(draft: string): void {
    const { openId } = this.state
    const body = draft.trim()
    if (openId === null || !body) return
    if (this.options.actions.isFrozen()) {
      this.update({ draft: null })
      return
    }
    this.update({ draft: null, panelScroll: 0 })

    const request = this.options.actions.sendMessage(openId, body).then((ok) => {
      if (!ok && this.state.openId === openId && this.state.draft === null) {
        log.warn(`Restoring the draft for ${openId} after a failed send`)
        this.update({ draft })
      }
      return ok
    })
    this.track(`send to ${openId}`, request)
  }

  private exit(): void {
    if (this.exited) return
    this.exited = true
    this.options.onExit()
  }

  // ==================== Internals ====================

  private track(label: string, request: Promise<unknown>): void {
    request.catch((error: unknown) => {
      log.error(`${label} failed: ${errorMessage(error)}`)
    })
  }

  private update(patch: Partial<NavigationState>): void {
    const next = { ...this.state, ...patch }
    const changed = NAVIGATION_KEYS.some((key) => next[key] !== this.state[key])
    if (!changed) return
    this.state = Object.freeze(next)
    for (const listener of [...this.listeners]) {
      listener(this.state)
    }
  }
}

function dropLastGrapheme(text: string): string {
  return defaultMeasurer.segment(text).slice(0, -1).join('')
}

function printable(text: string): string {
  return text.replace(/\p{Cc}/gu, '')
}
