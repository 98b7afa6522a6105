import fs from 'fs/promises'
import type {
  AutomationDriver,
  DriverFactory,
  ExtractOutcome,
  FormFillOutcome,
  LaunchOptions,
  PageVisit,
  SearchEngine,
} from '../../src/browser/driver'
import { searchUrl } from '../../src/browser/driver'

export interface FakeDriverOptions {
  /** Page HTML returned by content(). */
  html?: string
  /** Text returned per selector by extract(); absent selectors are reported missing. */
  texts?: Record<string, string>
  /** Field names present on the fake form. */
  formFields?: string[]
  /** Methods that reject with this message instead of running. */
  failOn?: Partial<Record<keyof AutomationDriver, string>>
  /** Title returned for every page. */
  title?: string
}

/** In-process AutomationDriver that records calls and never opens a browser. */
export class FakeDriver implements AutomationDriver {
  readonly calls: string[] = []
  closed = false
  viewport: [number, number] = [1920, 1080]
  private currentUrl = 'about:blank'

  constructor(
    readonly headless: boolean,
    private readonly opts: FakeDriverOptions = {},
  ) {}

  private enter(method: keyof AutomationDriver, arg = ''): void {
    this.calls.push(arg ? `${method}:${arg}` : method)
    const failure = this.opts.failOn?.[method]
    if (failure) throw new Error(failure)
  }

  private visit(url: string): PageVisit {
    this.currentUrl = url
    return { url, title: this.opts.title ?? 'Fake Page', duration_ms: 5 }
  }

  async navigate(url: string): Promise<PageVisit> {
    this.enter('navigate', url)
    return this.visit(url)
  }

  async search(engine: SearchEngine, query: string): Promise<PageVisit> {
    this.enter('search', `${engine}:${query}`)
    return this.visit(searchUrl(engine, query))
  }

  async fillForm(formUrl: string, fields: Record<string, string>, submitSelector?: string): Promise<FormFillOutcome> {
    this.enter('fillForm', formUrl)
    this.currentUrl = formUrl
    const present = new Set(this.opts.formFields ?? Object.keys(fields))
    const names = Object.keys(fields)
    return {
      url: formUrl,
      filled: names.filter((n) => present.has(n)),
      missing: names.filter((n) => !present.has(n)),
      submitted: submitSelector !== undefined,
    }
  }

  async extract(selectors: Record<string, string>): Promise<ExtractOutcome> {
    this.enter('extract')
    const texts = this.opts.texts ?? {}
    const data: Record<string, string> = {}
    const missing: string[] = []
    for (const [key, css] of Object.entries(selectors)) {
      if (css in texts) data[key] = texts[css]
      else missing.push(key)
    }
    return { data, missing }
  }

  async screenshot(filePath: string): Promise<string> {
    this.enter('screenshot', filePath)
    await fs.writeFile(filePath, 'png')
    return filePath
  }

  async content(): Promise<string> {
    this.enter('content')
    return this.opts.html ?? '<html><body></body></html>'
  }

  async click(selector: string): Promise<void> {
    this.enter('click', selector)
  }

  async reload(): Promise<PageVisit> {
    this.enter('reload')
    return this.visit(this.currentUrl)
  }

  async setViewport(width: number, height: number): Promise<void> {
    this.enter('setViewport', `${width}x${height}`)
    this.viewport = [width, height]
  }

  async isVisible(selector: string): Promise<boolean> {
    this.enter('isVisible', selector)
    return true
  }

  async count(selector: string): Promise<number> {
    this.enter('count', selector)
    return 1
  }

  async title(): Promise<string> {
    this.enter('title')
    return this.opts.title ?? 'Fake Page'
  }

  url(): string {
    return this.currentUrl
  }

  async close(): Promise<void> {
    this.enter('close')
    this.closed = true
  }
}

/** DriverFactory that hands out FakeDrivers and counts launches. */
export class FakeDriverFactory implements DriverFactory {
  readonly launched: FakeDriver[] = []
  /** When set, launch() rejects with this message. */
  failWith: string | null = null
  /** Resolves pending launches only once released, when set. */
  private gate: Promise<void> | null = null
  private release: (() => void) | null = null

  constructor(private readonly opts: FakeDriverOptions = {}) {}

  get launches(): number {
    return this.launched.length
  }

  /** Hold every launch until releaseLaunches() is called. */
  holdLaunches(): void {
    this.gate = new Promise((resolve) => {
      this.release = resolve
    })
  }

  releaseLaunches(): void {
    this.release?.()
    this.gate = null
    this.release = null
  }

  async launch(opts: LaunchOptions): Promise<FakeDriver> {
    if (this.gate) await this.gate
    if (this.failWith) throw new Error(this.failWith)
    const driver = new FakeDriver(opts.headless, this.opts)
    this.launched.push(driver)
    return driver
  }
}
