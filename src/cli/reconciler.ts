/**
 * Update reconciler.
 * Turns the backend's push stream and fetch results into store mutations.
 * Owns connection status, retries, buffering while offline, and the
 * supersede rule for message window fetches.
 */

import type {
  BackendEvent,
  ConnectionState,
  ConversationSnapshot,
  IPlatformClient,
  MessageSnapshot,
  Unsubscribe,
} from '@/platforms/types'
import { parseBackendEvent, parseConversationSnapshot, parseMessageSnapshot } from '@/platforms/schema'
import { FatalAuthError, MalformedEvent, errorMessage } from '@/helpers/errors'
import { createLogger } from '@/helpers/logger'
import type { ConversationStore, MessageInput } from './store'
import type { ConversationActions } from './dispatcher'

const log = createLogger('reconciler')

// ==================== Types ====================

export type ReconcilerState = 'idle' | 'syncing' | 'live' | 'degraded' | 'frozen'

export interface ReconcilerStatus {
  state: ReconcilerState
  /** Transient indicator, such as a retry in progress */
  notice: string | null
}

/**
 * Result of an on-demand message fetch.
 * stale: a newer fetch or a conversation switch superseded it, nothing applied.
 * skipped: not issued (frozen, stopped, or nothing to fetch).
 */
export type FetchOutcome = 'applied' | 'stale' | 'skipped' | 'failed'

export interface RetryOptions {
  baseDelayMs: number
  maxDelayMs: number
  maxAttempts: number
}

export interface UpdateReconcilerOptions {
  client: IPlatformClient
  store: ConversationStore
  conversationLimit?: number
  messageLimit?: number
  retry?: Partial<RetryOptions>
  sleep?: (ms: number) => Promise<void>
  random?: () => number
  onFatal?: (error: FatalAuthError) => void
}

type StatusListener = (status: ReconcilerStatus) => void

type RequestResult<T> = { ok: true; value: T } | { ok: false }

// ==================== Constants ====================

const DEFAULT_RETRY: RetryOptions = {
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  maxAttempts: 5,
}

const DEFAULT_CONVERSATION_LIMIT = 100
const DEFAULT_MESSAGE_LIMIT = 50
const MAX_BUFFERED_EVENTS = 5000
// Events naming unknown conversations within this window share one lookup
const PLACEHOLDER_DEBOUNCE_MS = 250
// Keeps the resync backoff exponent finite
const MAX_RESYNC_EXPONENT = 16

// ==================== Helpers ====================

/**
 * Exponential backoff with ±10% jitter, capped at maxDelayMs.
 */
export function backoffDelay(
  attempt: number,
  options: Pick<RetryOptions, 'baseDelayMs' | 'maxDelayMs'>,
  random: () => number = Math.random
): number {
  const delay = options.baseDelayMs * Math.pow(2, attempt)
  const jitter = delay * 0.1 * (random() * 2 - 1)
  return Math.min(delay + jitter, options.maxDelayMs)
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

function toMessageInput(snapshot: MessageSnapshot): MessageInput {
  return {
    id: snapshot.id,
    sender: snapshot.sender,
    senderId: snapshot.senderId,
    body: snapshot.body,
    timestamp: snapshot.timestamp,
    sequence: snapshot.sequence,
    edited: snapshot.edited,
    editVersion: snapshot.editVersion,
    isOwn: snapshot.isOwn,
  }
}

// ==================== Reconciler ====================

export class UpdateReconciler implements ConversationActions {
  private readonly client: IPlatformClient
  private readonly store: ConversationStore
  private readonly conversationLimit: number
  private readonly messageLimit: number
  private readonly retry: RetryOptions
  private readonly sleep: (ms: number) => Promise<void>
  private readonly random: () => number
  private readonly onFatal: ((error: FatalAuthError) => void) | undefined

  private status: ReconcilerStatus = Object.freeze({ state: 'idle', notice: null })
  private readonly statusListeners = new Set<StatusListener>()
  private readonly subscriptions: Unsubscribe[] = []

  private readonly queue: BackendEvent[] = []
  private buffer: BackendEvent[] = []
  private draining = false
  private stopped = false

  private connected = false
  // Bumped on every connection loss; a sync that sees it change is void
  private connectionEpoch = 0
  private inFlightSync: Promise<void> | null = null
  private resyncWanted = false
  private failedSyncs = 0
  private placeholderLookupPending = false

  private cursor: number | undefined
  private activeConversationId: string | null = null
  private messageToken = 0
  private readonly loading = new Map<string, number>()

  constructor(options: UpdateReconcilerOptions) {
    this.client = options.client
    this.store = options.store
    this.conversationLimit = options.conversationLimit ?? DEFAULT_CONVERSATION_LIMIT
    this.messageLimit = options.messageLimit ?? DEFAULT_MESSAGE_LIMIT
    this.retry = { ...DEFAULT_RETRY, ...options.retry }
    this.sleep = options.sleep ?? defaultSleep
    this.random = options.random ?? Math.random
    this.onFatal = options.onFatal
  }

  // ==================== Lifecycle ====================

  /**
   * Subscribe to the backend and run the initial sync. Resolves once the
   * sync has been applied or has failed; events that arrive meanwhile are
   * buffered and replayed afterwards.
   */
  async start(): Promise<void> {
    if (this.status.state !== 'idle' || this.stopped) return
    this.connected = this.client.isConnected
    this.subscriptions.push(
      this.client.onEvent((raw) => this.receive(raw)),
      this.client.onConnectionStateChange((state) => this.handleConnectionState(state))
    )
    this.setState('syncing')
    await this.runSync()
  }

  stop(): void {
    if (this.stopped) return
    this.stopped = true
    for (const unsubscribe of this.subscriptions.splice(0)) {
      unsubscribe()
    }
    this.queue.length = 0
    this.buffer = []
    this.messageToken++
    this.loading.clear()
    this.statusListeners.clear()
  }

  /**
   * Fetch the conversations changed since the last sync and replay anything
   * buffered meanwhile.
   */
  async refresh(): Promise<void> {
    if (this.stopped || this.isFrozen()) return
    if (this.inFlightSync) return this.inFlightSync
    await this.runSync()
  }

  // ==================== Status ====================

  getStatus(): ReconcilerStatus {
    return this.status
  }

  isFrozen(): boolean {
    return this.status.state === 'frozen'
  }

  /** Conversations with a message fetch in flight */
  getLoading(): ReadonlySet<string> {
    return new Set(this.loading.keys())
  }

  /**
   * Called on every status change and whenever a message fetch starts or ends.
   */
  subscribeStatus(listener: StatusListener): () => void {
    this.statusListeners.add(listener)
    return () => {
      this.statusListeners.delete(listener)
    }
  }

  // ==================== On-demand requests ====================

  setActiveConversation(conversationId: string | null): void {
    if (this.activeConversationId === conversationId) return
    this.activeConversationId = conversationId
    // Whatever was in flight belongs to the previous conversation
    this.messageToken++
  }

  /**
   * Fetch the newest page of a conversation and make it the active one.
   */
  async loadWindow(conversationId: string): Promise<FetchOutcome> {
    if (this.stopped || this.isFrozen()) return 'skipped'
    this.setActiveConversation(conversationId)
    return this.fetchPage(conversationId, undefined)
  }

  /**
   * Fetch the page before the oldest loaded message.
   */
  async loadOlder(conversationId: string): Promise<FetchOutcome> {
    if (this.stopped || this.isFrozen()) return 'skipped'
    const conversation = this.store.getConversation(conversationId)
    if (!conversation || !conversation.windowLoaded || !conversation.hasMoreBefore) return 'skipped'
    const oldest = conversation.messages[0]
    if (!oldest) return 'skipped'
    this.setActiveConversation(conversationId)
    return this.fetchPage(conversationId, oldest.id)
  }

  async markRead(conversationId: string): Promise<boolean> {
    if (this.stopped || this.isFrozen()) return false
    const result = await this.request('mark as read', () => this.client.markRead(conversationId))
    return result.ok
  }

  async setArchived(conversationId: string, archived: boolean): Promise<boolean> {
    if (this.stopped || this.isFrozen()) return false
    const label = archived ? 'archive conversation' : 'unarchive conversation'
    const result = await this.request(label, () => this.client.setArchived(conversationId, archived))
    return result.ok
  }

  /**
   * Send a message and apply the backend's copy of it. The push event for the
   * same message is then a no-op.
   */
  async sendMessage(conversationId: string, body: string): Promise<boolean> {
    if (this.stopped || this.isFrozen()) return false
    const result = await this.request('send message', () => this.client.sendMessage(conversationId, body))
    if (!result.ok) return false
    if (this.stopped || this.isFrozen() || !this.store.has(conversationId)) return true
    for (const message of this.validateMessages([result.value], conversationId)) {
      this.store.upsertMessage(conversationId, toMessageInput(message))
    }
    return true
  }

  // ==================== Sync ====================

  // At most one sync runs at a time; a reconnect during a sync runs it again
  private runSync(): Promise<void> {
    if (this.inFlightSync) {
      this.resyncWanted = true
      return this.inFlightSync
    }
    this.inFlightSync = this.syncUntilSettled()
    return this.inFlightSync
  }

  private async syncUntilSettled(): Promise<void> {
    try {
      do {
        this.resyncWanted = false
        await this.sync()
      } while (this.resyncWanted && !this.stopped && !this.isFrozen())
    } finally {
      this.inFlightSync = null
    }
  }

  private async sync(): Promise<void> {
    const epoch = this.connectionEpoch
    const cursor = this.cursor
    this.setState('syncing')
    const result = await this.request('load conversations', () => this.client.fetchConversations(cursor))
    if (this.stopped || this.isFrozen()) return
    if (this.lostConnectionSince(epoch)) return

    if (!result.ok) {
      // Still connected: keep applying live events and try again later
      this.goLive('Could not load conversations')
      this.scheduleResync()
      return
    }

    const snapshots = this.validateSnapshots(result.value)
    const limited = cursor === undefined ? snapshots.slice(0, this.conversationLimit) : snapshots
    for (const snapshot of limited) {
      this.applySnapshot(snapshot)
    }
    log.info(`Synced ${limited.length} conversation(s)${cursor !== undefined ? ` since ${cursor}` : ''}`)

    if (cursor !== undefined) {
      const reload = limited
        .map((snapshot) => snapshot.id)
        .filter((id) => this.store.getConversation(id)?.windowLoaded === true)
      for (const id of reload) {
        await this.refetchLatest(id)
        if (this.stopped || this.isFrozen() || this.lostConnectionSince(epoch)) return
      }
    }

    this.failedSyncs = 0
    this.goLive(null)
  }

  private lostConnectionSince(epoch: number): boolean {
    if (this.connectionEpoch === epoch && this.connected) return false
    log.warn('Connection lost during sync, waiting for reconnect')
    this.setState('degraded')
    return true
  }

  private goLive(notice: string | null): void {
    const buffered = this.buffer
    this.buffer = []
    if (buffered.length > 0) log.debug(`Replaying ${buffered.length} buffered event(s)`)
    this.setStatus('live', notice)
    this.queue.push(...buffered)
    this.drain()
  }

  private scheduleResync(): void {
    const delay = backoffDelay(Math.min(this.failedSyncs, MAX_RESYNC_EXPONENT), this.retry, this.random)
    this.failedSyncs++
    log.warn(`Retrying the conversation sync in ${Math.round(delay)}ms`)
    this.sleep(delay)
      .then(() => {
        if (this.stopped || this.isFrozen() || !this.connected) return
        return this.runSync()
      })
      .catch((error: unknown) => {
        log.error(`Scheduled sync failed: ${errorMessage(error)}`)
      })
  }

  // Messages that changed while offline; not subject to the supersede rule
  private async refetchLatest(conversationId: string): Promise<void> {
    const result = await this.request('reload messages', () =>
      this.client.fetchMessages(conversationId, undefined, this.messageLimit)
    )
    if (!result.ok || this.stopped || this.isFrozen() || !this.store.has(conversationId)) return
    for (const message of this.validateMessages(result.value, conversationId)) {
      this.store.upsertMessage(conversationId, toMessageInput(message))
    }
  }

  private async fetchPage(conversationId: string, beforeId: string | undefined): Promise<FetchOutcome> {
    const token = ++this.messageToken
    this.loading.set(conversationId, token)
    this.emitStatus()

    const result = await this.request('load messages', () =>
      this.client.fetchMessages(conversationId, beforeId, this.messageLimit)
    )

    if (this.loading.get(conversationId) === token) {
      this.loading.delete(conversationId)
      this.emitStatus()
    }
    if (this.stopped || this.isFrozen()) return 'skipped'
    if (token !== this.messageToken || this.activeConversationId !== conversationId) {
      log.debug(`Discarding superseded message fetch for ${conversationId}`)
      return 'stale'
    }
    if (!result.ok) return 'failed'
    if (!this.store.has(conversationId)) return 'stale'

    const messages = this.validateMessages(result.value, conversationId)
    for (const message of messages) {
      this.store.upsertMessage(conversationId, toMessageInput(message))
    }
    this.store.setWindowState(conversationId, { hasMoreBefore: result.value.length >= this.messageLimit })
    return 'applied'
  }

  // ==================== Events ====================

  private receive(raw: unknown): void {
    if (this.stopped || this.isFrozen()) return
    const event = parseBackendEvent(raw)
    if (event instanceof MalformedEvent) {
      log.warn(`Dropping malformed event: ${event.message}`)
      return
    }

    if (this.status.state !== 'live') {
      if (this.buffer.length >= MAX_BUFFERED_EVENTS) {
        const dropped = this.buffer.shift()
        log.warn(`Event buffer full, dropping ${dropped?.type ?? 'event'}`)
      }
      this.buffer.push(event)
      return
    }

    this.queue.push(event)
    this.drain()
  }

  // Applied one at a time; a mutation listener that causes another event
  // only appends to the queue
  private drain(): void {
    if (this.draining) return
    this.draining = true
    try {
      let event = this.queue.shift()
      while (event) {
        if (this.stopped || this.isFrozen()) break
        this.apply(event)
        event = this.queue.shift()
      }
    } finally {
      this.draining = false
    }
  }

  private apply(event: BackendEvent): void {
    switch (event.type) {
      case 'messageReceived':
      case 'messageEdited':
        this.store.upsertMessage(event.message.conversationId, toMessageInput(event.message))
        this.checkPlaceholder(event.message.conversationId)
        return
      case 'messageDeleted':
        this.store.removeMessage(event.conversationId, event.messageId)
        return
      case 'conversationUpdated':
        this.applySnapshot(event.conversation)
        return
      case 'conversationRemoved':
        this.store.removeConversation(event.conversationId)
        return
      case 'readStateChanged':
        if (event.conversationId === this.activeConversationId && event.unreadCount > 0) {
          this.keepRead(event.conversationId)
          return
        }
        this.store.setUnread(event.conversationId, event.unreadCount)
        this.checkPlaceholder(event.conversationId)
        return
      case 'folderChanged':
        this.store.setFolder(event.conversationId, event.folder)
        this.checkPlaceholder(event.conversationId)
        return
    }
  }

  // The conversation open in the panel is being read as messages arrive
  private keepRead(conversationId: string): void {
    this.store.setUnread(conversationId, 0)
    this.checkPlaceholder(conversationId)
    this.markRead(conversationId).catch((error: unknown) => {
      log.error(`mark ${conversationId} read failed: ${errorMessage(error)}`)
    })
  }

  private checkPlaceholder(conversationId: string): void {
    if (this.placeholderLookupPending || !this.store.getConversation(conversationId)?.placeholder) return
    this.placeholderLookupPending = true
    this.sleep(PLACEHOLDER_DEBOUNCE_MS)
      .then(() => this.resolvePlaceholders())
      .catch((error: unknown) => {
        log.error(`Placeholder lookup failed: ${errorMessage(error)}`)
      })
  }

  /**
   * Fetch conversations changed since the cursor so that placeholders created
   * by events get their real name and kind.
   */
  private async resolvePlaceholders(): Promise<void> {
    this.placeholderLookupPending = false
    if (this.stopped || this.isFrozen()) return
    const cursor = this.cursor
    const result = await this.request('look up conversations', () => this.client.fetchConversations(cursor))
    if (!result.ok || this.stopped || this.isFrozen()) return
    for (const snapshot of this.validateSnapshots(result.value)) {
      this.applySnapshot(snapshot)
    }
  }

  private applySnapshot(snapshot: ConversationSnapshot): void {
    this.store.upsertConversation({
      id: snapshot.id,
      name: snapshot.name,
      kind: snapshot.kind,
      folder: snapshot.folder,
      unreadCount: snapshot.unreadCount,
      lastActivity: snapshot.lastActivity,
      pinned: snapshot.pinned,
      preview: snapshot.preview,
    })
    this.cursor = Math.max(this.cursor ?? 0, snapshot.updatedAt)
  }

  private handleConnectionState(state: ConnectionState): void {
    if (this.stopped || this.isFrozen()) return
    switch (state) {
      case 'unauthorized':
        this.freeze(new FatalAuthError('The session is no longer authorized'))
        return
      case 'disconnected':
      case 'connecting':
        if (!this.connected) return
        this.connected = false
        this.connectionEpoch++
        if (this.status.state === 'live' || this.status.state === 'syncing') {
          log.warn('Connection lost, buffering events')
          this.setState('degraded')
        }
        return
      case 'connected':
        if (this.connected) return
        this.connected = true
        if (this.status.state === 'degraded' || this.inFlightSync) {
          log.info('Connection restored, reconciling')
          this.runSync().catch((error: unknown) => {
            log.error(`Reconciliation failed: ${errorMessage(error)}`)
          })
        }
        return
    }
  }

  // ==================== Validation ====================

  private validateSnapshots(raw: readonly unknown[]): ConversationSnapshot[] {
    const valid: ConversationSnapshot[] = []
    for (const item of raw) {
      const parsed = parseConversationSnapshot(item)
      if (parsed instanceof MalformedEvent) {
        log.warn(`Dropping malformed conversation: ${parsed.message}`)
      } else {
        valid.push(parsed)
      }
    }
    return valid
  }

  private validateMessages(raw: readonly unknown[], conversationId: string): MessageSnapshot[] {
    const valid: MessageSnapshot[] = []
    for (const item of raw) {
      const parsed = parseMessageSnapshot(item)
      if (parsed instanceof MalformedEvent) {
        log.warn(`Dropping malformed message: ${parsed.message}`)
      } else if (parsed.conversationId !== conversationId) {
        log.warn(`Dropping message ${parsed.id} fetched for ${conversationId} but addressed to ${parsed.conversationId}`)
      } else {
        valid.push(parsed)
      }
    }
    return valid
  }

  // ==================== Requests ====================

  /**
   * Run a backend call with retries. Transient and unclassified failures are
   * retried with backoff; FatalAuthError freezes the reconciler at once.
   */
  private async request<T>(label: string, call: () => Promise<T>): Promise<RequestResult<T>> {
    const { maxAttempts } = this.retry
    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      if (this.stopped || this.isFrozen()) return { ok: false }
      try {
        const value = await call()
        this.setNotice(null)
        return { ok: true, value }
      } catch (error) {
        if (error instanceof FatalAuthError) {
          this.freeze(error)
          return { ok: false }
        }
        log.warn(`${label} failed (attempt ${attempt + 1}/${maxAttempts}): ${errorMessage(error)}`)
        if (attempt + 1 >= maxAttempts) break
        this.setNotice(`Connection problem, retrying ${label} (${attempt + 2}/${maxAttempts})`)
        await this.sleep(backoffDelay(attempt, this.retry, this.random))
      }
    }
    log.error(`${label} gave up after ${maxAttempts} attempt(s)`)
    if (!this.stopped && !this.isFrozen()) this.setNotice(`Could not ${label}`)
    return { ok: false }
  }

  private freeze(error: FatalAuthError): void {
    if (this.isFrozen()) return
    log.error(`Freezing: ${error.message}`)
    this.queue.length = 0
    this.buffer = []
    this.messageToken++
    this.loading.clear()
    this.setState('frozen')
    this.onFatal?.(error)
  }

  // ==================== Internals ====================

  private setState(state: ReconcilerState): void {
    this.setStatus(state, null)
  }

  private setStatus(state: ReconcilerState, notice: string | null): void {
    if (this.status.state === state && this.status.notice === notice) return
    this.status = Object.freeze({ state, notice })
    this.emitStatus()
  }

  private setNotice(notice: string | null): void {
    if (this.status.notice === notice) return
    this.status = Object.freeze({ state: this.status.state, notice })
    this.emitStatus()
  }

  private emitStatus(): void {
    for (const listener of [...this.statusListeners]) {
      try {
        listener(this.status)
      } catch (error) {
        log.error(`Status listener failed: ${errorMessage(error)}`)
      }
    }
  }
}
