import { errors } from 'playwright-core'
import type { Locator, Page } from 'playwright-core'
import { searchUrl } from './driver'
import type { ExtractOutcome, FormFillOutcome, PageVisit, SearchEngine } from './driver'

type WaitUntil = 'load' | 'networkidle' | 'commit' | 'domcontentloaded'

// ---------------------------------------------------------------------------
// Structured diagnostics for action failures
// ---------------------------------------------------------------------------

export interface ActionDiagnostics {
  error: string
  url: string
  title: string
  elapsedMs: number
  stack?: string
}

export class ActionDiagnosticsError extends Error {
  readonly diagnostics: ActionDiagnostics
  constructor(diagnostics: ActionDiagnostics) {
    super(diagnostics.error)
    this.name = 'ActionDiagnosticsError'
    this.diagnostics = diagnostics
  }
}

async function collectDiagnostics(page: Page, t0: number, err: unknown): Promise<ActionDiagnostics> {
  const e = err instanceof Error ? err : new Error(String(err))
  const elapsedMs = Date.now() - t0
  // page may already be closed
  const title = await page.title().catch(() => '')
  return { error: e.message, url: page.url(), title, elapsedMs, stack: e.stack }
}

/** Run `fn`, wrapping any failure in an ActionDiagnosticsError. */
async function withDiagnostics<T>(page: Page, fn: (t0: number) => Promise<T>): Promise<T> {
  const t0 = Date.now()
  try {
    return await fn(t0)
  } catch (err) {
    if (err instanceof ActionDiagnosticsError) throw err
    throw new ActionDiagnosticsError(await collectDiagnostics(page, t0, err))
  }
}

/** Escape a value for use inside a double-quoted CSS attribute selector. */
export function cssAttr(value: string): string {
  return value.replace(/["\\]/g, '\\$&')
}

/**
 * Wait up to `timeout` ms for `target` to be attached to the DOM. A timeout
 * means the element is absent; any other failure propagates.
 */
export async function waitForPresence(target: Pick<Locator, 'waitFor'>, timeout: number): Promise<boolean> {
  try {
    await target.waitFor({ state: 'attached', timeout })
    return true
  } catch (err) {
    if (err instanceof errors.TimeoutError) return false
    throw err
  }
}

const FALSY_VALUES = ['', '0', 'false', 'no', 'off']

export async function navigate(page: Page, url: string, waitUntil: WaitUntil = 'load'): Promise<PageVisit> {
  return withDiagnostics(page, async (t0) => {
    await page.goto(url, { waitUntil })
    const duration_ms = Date.now() - t0
    return { url: page.url(), title: await page.title(), duration_ms }
  })
}

export async function search(page: Page, engine: SearchEngine, query: string): Promise<PageVisit> {
  return navigate(page, searchUrl(engine, query), 'domcontentloaded')
}

async function fillField(page: Page, name: string, value: string, waitMs: number): Promise<boolean> {
  const byName = `[name="${cssAttr(name)}"]`
  const first = page.locator(byName).first()
  if (!(await waitForPresence(first, waitMs))) return false

  const type = ((await first.getAttribute('type')) ?? '').toLowerCase()
  if (type === 'radio') {
    const option = page.locator(`${byName}[value="${cssAttr(value)}"]`)
    if ((await option.count()) === 0) return false
    await option.first().check()
    return true
  }
  if (type === 'checkbox') {
    if (FALSY_VALUES.includes(value.trim().toLowerCase())) await first.uncheck()
    else await first.check()
    return true
  }
  if ((await page.locator(`select${byName}`).count()) > 0) {
    await first.selectOption(value)
    return true
  }
  await first.fill(value)
  return true
}

/**
 * Open the form page and fill every field by its `name` attribute.
 * Fields with no matching element are reported, not treated as failures.
 */
export async function fillForm(
  page: Page,
  formUrl: string,
  fields: Record<string, string>,
  submitSelector: string | undefined,
  waitMs: number,
): Promise<FormFillOutcome> {
  return withDiagnostics(page, async () => {
    await page.goto(formUrl, { waitUntil: 'load' })
    const filled: string[] = []
    const missing: string[] = []
    for (const [name, value] of Object.entries(fields)) {
      if (await fillField(page, name, value, waitMs)) filled.push(name)
      else missing.push(name)
    }
    let submitted = false
    if (submitSelector) {
      await page.locator(submitSelector).first().click()
      await page.waitForLoadState('load')
      submitted = true
    }
    return { url: page.url(), filled, missing, submitted }
  })
}

export async function extract(page: Page, selectors: Record<string, string>, waitMs: number): Promise<ExtractOutcome> {
  return withDiagnostics(page, async () => {
    const data: Record<string, string> = {}
    const missing: string[] = []
    for (const [key, selector] of Object.entries(selectors)) {
      const loc = page.locator(selector).first()
      if (!(await waitForPresence(loc, waitMs))) {
        missing.push(key)
        continue
      }
      data[key] = (await loc.innerText()).trim()
    }
    return { data, missing }
  })
}

export async function screenshot(page: Page, filePath: string): Promise<string> {
  return withDiagnostics(page, async () => {
    await page.screenshot({ path: filePath, type: 'png', fullPage: true })
    return filePath
  })
}

export async function click(page: Page, selector: string): Promise<void> {
  return withDiagnostics(page, async () => {
    const loc = page.locator(selector).first()
    await loc.waitFor({ state: 'visible' })
    await loc.click()
    await page.waitForLoadState('load')
  })
}

export async function reload(page: Page): Promise<PageVisit> {
  return withDiagnostics(page, async (t0) => {
    await page.reload({ waitUntil: 'load' })
    return { url: page.url(), title: await page.title(), duration_ms: Date.now() - t0 }
  })
}

export async function isVisible(page: Page, selector: string): Promise<boolean> {
  return withDiagnostics(page, () => page.locator(selector).first().isVisible())
}

export async function count(page: Page, selector: string): Promise<number> {
  return withDiagnostics(page, () => page.locator(selector).count())
}
