import fs from 'fs/promises'
import path from 'path'
import type { AutomationDriver } from '../browser/driver'
import { ActionDiagnosticsError } from '../browser/actions'
import { actionId } from '../audit/logger'
import type { AuditLogger } from '../audit/logger'
import { DriverError, errorMessage } from '../daemon/errors'
import type { SessionRegistry } from '../daemon/session'
import { compactTimestamp } from '../results/export'
import type { ResultLog, ResultRecord } from '../results/log'
import { parseTable } from '../scrape/table'
import type { CommandMap, CommandName, PayloadMap } from './commands'

export interface DispatchEnv {
  screenshotsDir: string
  now: () => Date
}

interface Handled<P> {
  payload: P
  description: string
  details: Record<string, unknown>
}

interface ActionDefinition<C, P> {
  /** Name given to the result record. */
  resultName: string
  /** Request parameters as recorded in the audit log and on failure records. */
  params(command: C): Record<string, unknown>
  run(driver: AutomationDriver, command: C, env: DispatchEnv): Promise<Handled<P>>
}

type ActionTable = { [K in CommandName]: ActionDefinition<CommandMap[K], PayloadMap[K]> }

function withPngExtension(name: string): string {
  return /\.png$/i.test(name) ? name : `${name}.png`
}

const ACTIONS: ActionTable = {
  navigate: {
    resultName: 'navigation',
    params: (c) => ({ url: c.url }),
    async run(driver, c) {
      const visit = await driver.navigate(c.url)
      return {
        payload: visit,
        description: `Navigated to ${visit.url}`,
        details: { url: c.url, final_url: visit.url, title: visit.title },
      }
    },
  },

  search: {
    resultName: 'search',
    params: (c) => ({ search_engine: c.search_engine, query: c.query }),
    async run(driver, c) {
      const visit = await driver.search(c.search_engine, c.query)
      return {
        payload: visit,
        description: `Searched ${c.search_engine} for "${c.query}"`,
        details: { engine: c.search_engine, query: c.query, url: visit.url, title: visit.title },
      }
    },
  },

  'fill-form': {
    resultName: 'form_fill',
    // values may be credentials; only field names are kept
    params: (c) => ({ form_url: c.form_url, fields: Object.keys(c.form_data), submit_selector: c.submit_selector }),
    async run(driver, c) {
      const outcome = await driver.fillForm(c.form_url, c.form_data, c.submit_selector)
      const total = outcome.filled.length + outcome.missing.length
      return {
        payload: outcome,
        description:
          `Filled ${outcome.filled.length} of ${total} fields on ${c.form_url}` + (outcome.submitted ? ' and submitted' : ''),
        details: { url: c.form_url, filled: outcome.filled, missing: outcome.missing, submitted: outcome.submitted },
      }
    },
  },

  extract: {
    resultName: 'data_extraction',
    params: (c) => ({ selectors: c.selectors }),
    async run(driver, c) {
      const outcome = await driver.extract(c.selectors)
      const total = Object.keys(c.selectors).length
      return {
        payload: outcome,
        description: `Extracted ${Object.keys(outcome.data).length} of ${total} fields`,
        details: { selectors: c.selectors, data: outcome.data, missing: outcome.missing },
      }
    },
  },

  screenshot: {
    resultName: 'screenshot',
    params: (c) => ({ filename: c.filename }),
    async run(driver, c, env) {
      const filename = withPngExtension(c.filename ?? `screenshot_${compactTimestamp(env.now())}`)
      await fs.mkdir(env.screenshotsDir, { recursive: true })
      const saved = await driver.screenshot(path.join(env.screenshotsDir, filename))
      return {
        payload: { filename, path: saved },
        description: `Saved screenshot ${filename}`,
        details: { filename, path: saved },
      }
    },
  },

  'scrape-table': {
    resultName: 'table_scrape',
    params: (c) => ({ table_selector: c.table_selector }),
    async run(driver, c) {
      const html = await driver.content()
      const table = parseTable(html, c.table_selector)
      if (!table) throw new Error(`No element matches table selector '${c.table_selector}'`)
      return {
        payload: table,
        description: `Scraped ${table.rows.length} rows from ${c.table_selector}`,
        details: { table_selector: c.table_selector, headers: table.headers, row_count: table.rows.length },
      }
    },
  },
}

export interface DispatchResult<P> {
  payload: P
  record: ResultRecord
}

/**
 * Maps each command to exactly one driver operation on an existing session.
 *
 * Unknown instance ids throw SessionNotFoundError before anything is
 * recorded. Driver failures are recorded as an `error` result and rethrown
 * as DriverError; successes are recorded as `success`.
 */
export class Dispatcher {
  constructor(
    private readonly registry: SessionRegistry,
    private readonly results: ResultLog,
    private readonly env: DispatchEnv,
    private readonly audit?: AuditLogger,
  ) {}

  async dispatch<K extends CommandName>(action: K, command: CommandMap[K]): Promise<DispatchResult<PayloadMap[K]>> {
    const instanceId = command.instance_id
    const session = this.registry.getOrThrow(instanceId)
    const def: ActionTable[K] = ACTIONS[action]
    const params = def.params(command)
    const id = actionId()
    const t0 = Date.now()

    let handled: Handled<PayloadMap[K]>
    try {
      handled = await def.run(session.driver, command, this.env)
    } catch (err) {
      const message = errorMessage(err)
      const details: Record<string, unknown> = { ...params }
      if (err instanceof ActionDiagnosticsError) {
        const { url, title, elapsedMs } = err.diagnostics
        details.diagnostics = { url, title, elapsed_ms: elapsedMs }
      }
      this.results.append({
        name: def.resultName,
        status: 'error',
        description: `${action} failed: ${message}`,
        instance_id: instanceId,
        duration_ms: Date.now() - t0,
        details,
      })
      this.audit?.write({ instance_id: instanceId, action_id: id, type: 'action', action, status: 'error', params, error: message })
      throw new DriverError(action, message, { cause: err })
    }

    const duration_ms = Date.now() - t0
    const record = this.results.append({
      name: def.resultName,
      status: 'success',
      description: handled.description,
      instance_id: instanceId,
      duration_ms,
      details: handled.details,
    })
    this.audit?.write({
      instance_id: instanceId,
      action_id: id,
      type: 'action',
      action,
      status: 'ok',
      params,
      result: { duration_ms, description: handled.description },
    })
    return { payload: handled.payload, record }
  }
}
