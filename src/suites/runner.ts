import path from 'path'
import type { AutomationDriver, DriverFactory } from '../browser/driver'
import type { AuditLogger } from '../audit/logger'
import { errorMessage } from '../daemon/errors'
import { compactTimestamp } from '../results/export'
import type { ResultLog } from '../results/log'
import { DEFAULT_SUITES } from './catalog'
import type { SuiteCatalog, SuiteName, TestCase } from './types'

export interface TestRunnerOptions {
  screenshotsDir: string
  suites?: SuiteCatalog
  audit?: AuditLogger
  now?: () => Date
}

interface ActiveRun {
  suite: SuiteName
  controller: AbortController
  done: Promise<void>
}

/**
 * Runs one suite at a time on a dedicated headless driver, in the
 * background. Each completed case appends one result record. stop() aborts
 * the run: the current case finishes, or bails at its next abort check and
 * is left out of the result log, and no further cases start.
 */
export class TestRunner {
  private active: ActiveRun | null = null
  private readonly suites: SuiteCatalog
  private readonly now: () => Date

  constructor(
    private readonly factory: DriverFactory,
    private readonly results: ResultLog,
    private readonly opts: TestRunnerOptions,
  ) {
    this.suites = opts.suites ?? DEFAULT_SUITES
    this.now = opts.now ?? (() => new Date())
  }

  get isRunning(): boolean {
    return this.active !== null
  }

  get currentSuite(): SuiteName | null {
    return this.active?.suite ?? null
  }

  /** Start `suite` in the background. Returns false if a run is already in progress. */
  start(suite: SuiteName): boolean {
    if (this.active) return false
    const controller = new AbortController()
    const done = this.execute(suite, this.suites[suite], controller.signal)
      .catch((err) => {
        this.results.append({
          name: 'test_suite',
          status: 'error',
          description: `Suite ${suite} aborted: ${errorMessage(err)}`,
          details: { suite },
        })
      })
      .finally(() => {
        this.active = null
      })
    this.active = { suite, controller, done }
    this.opts.audit?.write({ type: 'test', action: 'suite_start', status: 'ok', params: { suite } })
    return true
  }

  /** Request the active run to stop. Returns whether a run was active. */
  stop(): boolean {
    if (!this.active) return false
    this.active.controller.abort()
    return true
  }

  /** Settles once no run is active. */
  async idle(): Promise<void> {
    await this.active?.done
  }

  private async execute(suite: SuiteName, cases: readonly TestCase[], signal: AbortSignal): Promise<void> {
    let driver: AutomationDriver
    try {
      driver = await this.factory.launch({ headless: true })
    } catch (err) {
      this.results.append({
        name: 'test_suite',
        status: 'error',
        description: `Suite ${suite} could not start: ${errorMessage(err)}`,
        details: { suite },
      })
      this.opts.audit?.write({ type: 'test', action: 'suite_start', status: 'error', params: { suite }, error: errorMessage(err) })
      return
    }

    try {
      for (const tc of cases) {
        if (signal.aborted) break
        await this.runCase(suite, tc, driver, signal)
      }
    } finally {
      try {
        await driver.close()
      } catch (err) {
        this.opts.audit?.write({ type: 'test', action: 'driver_close', status: 'error', params: { suite }, error: errorMessage(err) })
      }
    }

    this.opts.audit?.write({
      type: 'test',
      action: signal.aborted ? 'suite_stopped' : 'suite_complete',
      status: 'ok',
      params: { suite },
    })
  }

  private async runCase(suite: SuiteName, tc: TestCase, driver: AutomationDriver, signal: AbortSignal): Promise<void> {
    const screenshotPath = (label: string) =>
      path.join(this.opts.screenshotsDir, `${label}_${compactTimestamp(this.now())}.png`)
    const t0 = Date.now()
    try {
      await tc.run({ driver, signal, screenshotPath })
    } catch (err) {
      if (signal.aborted && err === signal.reason) {
        // interrupted by stop(): neither a pass nor a failure
        this.opts.audit?.write({ type: 'test', action: tc.name, status: 'ok', params: { suite }, result: { stopped: true } })
        return
      }
      const duration_ms = Date.now() - t0
      const details: Record<string, unknown> = { suite }
      try {
        details.screenshot = await driver.screenshot(screenshotPath(tc.name))
      } catch (shotErr) {
        details.screenshot_error = errorMessage(shotErr)
      }
      this.results.append({
        name: tc.name,
        status: 'error',
        description: errorMessage(err),
        duration_ms,
        details,
      })
      this.opts.audit?.write({ type: 'test', action: tc.name, status: 'error', params: { suite }, error: errorMessage(err) })
      return
    }

    const duration_ms = Date.now() - t0
    this.results.append({
      name: tc.name,
      status: 'success',
      description: `${tc.name} passed`,
      duration_ms,
      details: { suite },
    })
    this.opts.audit?.write({ type: 'test', action: tc.name, status: 'ok', params: { suite }, result: { duration_ms } })
  }
}
