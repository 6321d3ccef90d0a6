import { randomUUID } from "node:crypto"
import { RankingLayout, type RankingModel } from "./layout"

interface SessionRecord {
  layout: RankingLayout
  lastSeen: number
}

export interface SessionStoreOptions {
  /** Sessions idle longer than this are dropped */
  ttlMs: number
  now?: () => number
  createId?: () => string
}

/**
 * In-memory layouts, one per client session. Each layout is owned by its
 * session; the model behind them is shared.
 */
export class SessionStore {
  private readonly sessions = new Map<string, SessionRecord>()
  private readonly now: () => number
  private readonly createId: () => string

  constructor(
    private readonly model: RankingModel,
    private readonly options: SessionStoreOptions,
  ) {
    this.now = options.now ?? Date.now
    this.createId = options.createId ?? randomUUID
  }

  /**
   * The layout for `sessionId`, creating a fresh session when the id is
   * missing, unknown or expired.
   */
  acquire(sessionId: string | undefined): { sessionId: string; layout: RankingLayout; created: boolean } {
    this.evictExpired()
    const now = this.now()

    if (sessionId !== undefined) {
      const existing = this.sessions.get(sessionId)
      if (existing) {
        existing.lastSeen = now
        return { sessionId, layout: existing.layout, created: false }
      }
    }

    const id = this.createId()
    const layout = new RankingLayout(this.model)
    this.sessions.set(id, { layout, lastSeen: now })
    return { sessionId: id, layout, created: true }
  }

  get size(): number {
    return this.sessions.size
  }

  evictExpired(): number {
    const cutoff = this.now() - this.options.ttlMs
    let evicted = 0
    for (const [id, record] of this.sessions) {
      if (record.lastSeen < cutoff) {
        this.sessions.delete(id)
        evicted++
      }
    }
    if (evicted > 0) {
      console.log(`[Ranking] Evicted ${evicted} idle session(s), ${this.sessions.size} active`)
    }
    return evicted
  }
}
