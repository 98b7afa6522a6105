import { Command } from 'commander'
import fs from 'fs'
import { apiGet, apiGetRaw, fail } from '../client'
import type { ApiReply } from '../client'
import type { AuditEntry } from '../../audit/logger'
import type { ResultRecord, ResultStats } from '../../results/log'

function filenameFrom(disposition: string | undefined, fallback: string): string {
  const match = disposition?.match(/filename="([^"]+)"/)
  return match ? match[1] : fallback
}

export function resultCommands(program: Command): void {
  const results = program.command('results').description('Inspect and export the result log')

  results
    .command('list')
    .description('Print every recorded result')
    .option('--json', 'Print raw JSON')
    .action(async (opts: { json?: boolean }) => {
      const res = await apiGet<{ results: ResultRecord[]; total: number }>('/api/results')
      if (res.error) fail(res)
      if (opts.json) {
        console.log(JSON.stringify(res.results, null, 2))
        return
      }
      if (res.total === 0) {
        console.log('No results recorded.')
        return
      }
      for (const r of res.results) {
        const mark = r.status === 'success' ? '✓' : '✗'
        console.log(`${mark} ${r.timestamp}  ${r.name.padEnd(22)} ${r.description}`)
      }
    })

  results
    .command('stats')
    .description('Success rate and counters')
    .action(async () => {
      const res = await apiGet<ResultStats & { active_instances: number; is_running: boolean }>('/api/stats')
      if (res.error) fail(res)
      console.log(`Total:      ${res.total_results}`)
      console.log(`Successful: ${res.successful_results}`)
      console.log(`Rate:       ${res.success_rate}%`)
    })

  results
    .command('export <format>')
    .description('Download the result log as json|csv|html')
    .option('-o, --out <file>', 'Output file (defaults to the name chosen by the daemon)')
    .action(async (format: string, opts: { out?: string }) => {
      const raw = await apiGetRaw(`/api/results/export/${encodeURIComponent(format)}`)
      if (raw.statusCode !== 200) {
        const reply: ApiReply = JSON.parse(raw.body)
        fail(reply)
      }
      const contentDisposition = raw.headers['content-disposition']
      const out = opts.out ?? filenameFrom(contentDisposition, `results.${format}`)
      fs.writeFileSync(out, raw.body)
      console.log(`✓ Exported results to ${out}`)
    })

  program
    .command('audit')
    .description("Tail today's audit log")
    .option('-i, --instance <id>', 'Only entries for this instance')
    .option('-n, --lines <n>', 'Number of entries', '50')
    .action(async (opts: { instance?: string; lines: string }) => {
      const params = new URLSearchParams({ lines: opts.lines })
      if (opts.instance) params.set('instance_id', opts.instance)
      const res = await apiGet<{ entries: AuditEntry[] }>(`/api/audit?${params.toString()}`)
      if (res.error) fail(res)
      for (const e of res.entries) {
        const who = e.instance_id ? ` [${e.instance_id}]` : ''
        console.log(`${e.ts}${who} ${e.type}:${e.action} ${e.status}${e.error ? ` (${e.error})` : ''}`)
      }
    })
}
