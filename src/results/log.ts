export type ResultStatus = 'success' | 'error'

export interface ResultRecord {
  name: string
  status: ResultStatus
  description: string
  timestamp: string
  instance_id?: string
  duration_ms?: number
  details?: Record<string, unknown>
}

export interface ResultStats {
  total_results: number
  successful_results: number
  success_rate: number
}

/** Process-lifetime, append-only log of dispatched operations and test cases. */
export class ResultLog {
  private records: ResultRecord[] = []

  append(record: Omit<ResultRecord, 'timestamp'> & { timestamp?: string }): ResultRecord {
    const entry: ResultRecord = { ...record, timestamp: record.timestamp ?? new Date().toISOString() }
    this.records.push(entry)
    return entry
  }

  list(): ResultRecord[] {
    return this.records.slice()
  }

  count(): number {
    return this.records.length
  }

  stats(): ResultStats {
    const total = this.records.length
    const successful = this.records.filter((r) => r.status === 'success').length
    const rate = total > 0 ? Math.round((successful / total) * 10000) / 100 : 0
    return { total_results: total, successful_results: successful, success_rate: rate }
  }
}
