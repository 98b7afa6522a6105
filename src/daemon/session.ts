import crypto from 'crypto'
import type { AutomationDriver, DriverFactory } from '../browser/driver'
import { SessionConflictError, SessionNotFoundError } from './errors'

export interface SessionInfo {
  id: string
  headless: boolean
  createdAt: string
}

export interface Session extends SessionInfo {
  driver: AutomationDriver
}

export function generateSessionId(): string {
  return 'instance_' + crypto.randomBytes(6).toString('hex')
}

/**
 * Owns every live automation session.
 *
 * An id is reserved synchronously before the browser launch is awaited, so
 * two concurrent creates for the same id cannot both launch: the second is
 * rejected with SessionConflictError. close() drops the entry before the
 * driver shuts down, so a concurrent close or dispatch sees "not found".
 */
export class SessionRegistry {
  private sessions = new Map<string, Session>()
  private pending = new Set<string>()

  constructor(private readonly factory: DriverFactory) {}

  async create(opts: { id?: string; headless: boolean }): Promise<SessionInfo> {
    const id = opts.id ?? generateSessionId()
    if (this.sessions.has(id) || this.pending.has(id)) throw new SessionConflictError(id)

    this.pending.add(id)
    let driver: AutomationDriver
    try {
      driver = await this.factory.launch({ headless: opts.headless })
    } finally {
      this.pending.delete(id)
    }

    const session: Session = { id, headless: opts.headless, createdAt: new Date().toISOString(), driver }
    this.sessions.set(id, session)
    return toInfo(session)
  }

  get(id: string): Session | undefined {
    return this.sessions.get(id)
  }

  getOrThrow(id: string): Session {
    const s = this.sessions.get(id)
    if (!s) throw new SessionNotFoundError(id)
    return s
  }

  has(id: string): boolean {
    return this.sessions.has(id)
  }

  list(): SessionInfo[] {
    return Array.from(this.sessions.values()).map(toInfo)
  }

  count(): number {
    return this.sessions.size
  }

  async close(id: string): Promise<void> {
    const s = this.sessions.get(id)
    if (!s) throw new SessionNotFoundError(id)
    this.sessions.delete(id)
    await s.driver.close()
  }

  /** Close every driver and return the errors of those that failed to close. */
  async shutdownAll(): Promise<Error[]> {
    const all = Array.from(this.sessions.values())
    this.sessions.clear()
    const settled = await Promise.allSettled(all.map((s) => s.driver.close()))
    return settled
      .filter((r): r is PromiseRejectedResult => r.status === 'rejected')
      .map((r) => (r.reason instanceof Error ? r.reason : new Error(String(r.reason))))
  }
}

function toInfo({ id, headless, createdAt }: Session): SessionInfo {
  return { id, headless, createdAt }
}
