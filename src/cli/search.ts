/**
 * Conversation name search.
 * Results are derived from the store on demand; a store change only marks the
 * cached result dirty, the next query recomputes it.
 */

import type { Folder } from '@/platforms/types'
import type { ConversationStore } from './store'

export function normalizeQuery(text: string): string {
  return text.normalize('NFKC').toLowerCase().trim()
}

export class SearchIndex {
  private cacheKey: string | null = null
  private cached: string[] = []
  private readonly unsubscribe: () => void

  constructor(private readonly store: ConversationStore) {
    this.unsubscribe = store.subscribe(() => {
      this.cacheKey = null
    })
  }

  /**
   * Conversation IDs of a folder matching text, prefix matches first.
   * An empty query returns the folder's default order unchanged.
   */
  query(text: string, folder: Folder): string[] {
    const needle = normalizeQuery(text)
    const key = `${folder}\u0000${needle}`
    if (this.cacheKey === key) return [...this.cached]

    const conversations = this.store.listConversations(folder)
    let result: string[]
    if (!needle) {
      result = conversations.map((c) => c.id)
    } else {
      const prefix: string[] = []
      const substring: string[] = []
      for (const conversation of conversations) {
        const name = normalizeQuery(conversation.name)
        if (name.startsWith(needle)) {
          prefix.push(conversation.id)
        } else if (name.includes(needle)) {
          substring.push(conversation.id)
        }
      }
      result = [...prefix, ...substring]
    }

    this.cacheKey = key
    this.cached = result
    return [...result]
  }

  dispose(): void {
    this.unsubscribe()
    this.cacheKey = null
  }
}
