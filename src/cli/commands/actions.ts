import { Command } from 'commander'
import { apiPost, collectPairs, fail, pairsToRecord } from '../client'

interface VisitReply {
  message: string
  url: string
  title: string
}

interface FillReply {
  message: string
  filled: string[]
  missing: string[]
}

interface ExtractReply {
  data: Record<string, string>
  missing: string[]
}

interface ScreenshotReply {
  filename: string
  path: string
}

interface TableReply {
  message: string
  headers: string[]
  rows: Array<Record<string, string>>
}

export function actionCommands(program: Command): void {
  program
    .command('navigate <instance-id> <url>')
    .description('Navigate an instance to URL')
    .action(async (instanceId: string, url: string) => {
      const res = await apiPost<VisitReply>('/api/navigate', { instance_id: instanceId, url })
      if (res.error) fail(res)
      console.log(res.message)
      console.log(`Title: ${res.title}`)
    })

  program
    .command('search <instance-id> <query...>')
    .description('Run a search on a search engine')
    .option('-e, --engine <name>', 'Search engine: google|bing|duckduckgo', 'google')
    .action(async (instanceId: string, query: string[], opts: { engine: string }) => {
      const res = await apiPost<VisitReply>('/api/search', {
        instance_id: instanceId,
        search_engine: opts.engine,
        query: query.join(' '),
      })
      if (res.error) fail(res)
      console.log(res.message)
      console.log(`URL: ${res.url}`)
    })

  program
    .command('fill <instance-id> <form-url>')
    .description('Open a form and fill fields by their name attribute')
    .option('-f, --field <name=value>', 'Form field (repeatable)', collectPairs, [])
    .option('--submit <selector>', 'Click this element after filling')
    .action(async (instanceId: string, formUrl: string, opts: { field: string[]; submit?: string }) => {
      const res = await apiPost<FillReply>('/api/form/fill', {
        instance_id: instanceId,
        form_url: formUrl,
        form_data: pairsToRecord(opts.field, '--field'),
        ...(opts.submit ? { submit_selector: opts.submit } : {}),
      })
      if (res.error) fail(res)
      console.log(res.message)
      if (res.missing.length) console.log(`  Not found: ${res.missing.join(', ')}`)
    })

  program
    .command('extract <instance-id>')
    .description('Extract text from the current page')
    .option('-s, --selector <key=css>', 'Named CSS selector (repeatable)', collectPairs, [])
    .action(async (instanceId: string, opts: { selector: string[] }) => {
      const res = await apiPost<ExtractReply>('/api/extract', {
        instance_id: instanceId,
        selectors: pairsToRecord(opts.selector, '--selector'),
      })
      if (res.error) fail(res)
      console.log(JSON.stringify(res.data, null, 2))
      if (res.missing.length) console.error(`No match for: ${res.missing.join(', ')}`)
    })

  program
    .command('screenshot <instance-id>')
    .description('Save a full-page screenshot on the daemon host')
    .option('--filename <name>', 'File name inside the screenshots directory')
    .action(async (instanceId: string, opts: { filename?: string }) => {
      const res = await apiPost<ScreenshotReply>('/api/screenshot', {
        instance_id: instanceId,
        ...(opts.filename ? { filename: opts.filename } : {}),
      })
      if (res.error) fail(res)
      console.log(`✓ Screenshot saved to ${res.path}`)
    })

  program
    .command('scrape-table <instance-id>')
    .description('Parse a table on the current page')
    .option('--selector <css>', 'Table selector', 'table')
    .action(async (instanceId: string, opts: { selector: string }) => {
      const res = await apiPost<TableReply>('/api/scrape/table', {
        instance_id: instanceId,
        table_selector: opts.selector,
      })
      if (res.error) fail(res)
      console.log(res.message)
      console.log(JSON.stringify(res.rows, null, 2))
    })
}
