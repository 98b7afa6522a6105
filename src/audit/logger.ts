import crypto from 'crypto'
import fs from 'fs'
import path from 'path'

export interface AuditEntry {
  ts?: string
  v?: number
  instance_id?: string
  action_id?: string
  type: 'session' | 'action' | 'test'
  action: string
  status: 'ok' | 'error'
  params?: Record<string, unknown>
  result?: Record<string, unknown>
  error?: string | null
}

export type AuditErrorHandler = (err: Error) => void

export function actionId(): string {
  return 'act_' + crypto.randomBytes(6).toString('hex')
}

function today(): string {
  return new Date().toISOString().slice(0, 10)
}

/**
 * Append-only JSONL trail under `<logsDir>/YYYY-MM-DD.jsonl`, one file per
 * UTC day.
 *
 * Open and write failures go to `onError` and drop the current stream; the
 * next write reopens the file (recreating `logsDir` if it was removed).
 */
export class AuditLogger {
  onError: AuditErrorHandler = (err) => {
    console.error(`[rpahub] audit log: ${err.message}`)
  }

  private day = ''
  private stream: fs.WriteStream | null = null

  constructor(private readonly logsDir: string) {
    fs.mkdirSync(logsDir, { recursive: true })
  }

  fileFor(day: string): string {
    return path.join(this.logsDir, `${day}.jsonl`)
  }

  write(entry: AuditEntry): void {
    const now = new Date()
    const stream = this.streamFor(now.toISOString().slice(0, 10))
    if (!stream) return
    const record: AuditEntry = { ts: now.toISOString(), v: 1, ...entry }
    stream.write(JSON.stringify(record) + '\n')
  }

  private streamFor(day: string): fs.WriteStream | null {
    if (this.stream && this.day === day) return this.stream
    this.stream?.end()
    this.stream = null

    try {
      fs.mkdirSync(this.logsDir, { recursive: true })
    } catch (err) {
      this.onError(err instanceof Error ? err : new Error(String(err)))
      return null
    }

    const stream = fs.createWriteStream(this.fileFor(day), { flags: 'a' })
    stream.on('error', (err) => {
      if (this.stream === stream) {
        this.stream = null
        this.day = ''
      }
      this.onError(err)
    })
    this.stream = stream
    this.day = day
    return stream
  }

  /** Last `lines` entries of today's file, optionally for one instance. */
  tail(lines: number, instanceId?: string): AuditEntry[] {
    const file = this.fileFor(today())
    if (!fs.existsSync(file)) return []

    const entries: AuditEntry[] = []
    for (const line of fs.readFileSync(file, 'utf8').split('\n')) {
      if (!line) continue
      let entry: AuditEntry
      try {
        entry = JSON.parse(line) as AuditEntry
      } catch {
        continue // torn line from an interrupted write
      }
      if (!instanceId || entry.instance_id === instanceId) entries.push(entry)
    }
    return entries.slice(-lines)
  }

  /** Flush and close the open file, if any. */
  close(): Promise<void> {
    const stream = this.stream
    this.stream = null
    this.day = ''
    if (!stream || stream.destroyed) return Promise.resolve()
    return new Promise((resolve, reject) => {
      stream.once('error', reject)
      stream.end(() => resolve())
    })
  }
}
