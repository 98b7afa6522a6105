import { chromium } from 'playwright-core'
import type { Browser, Page } from 'playwright-core'
import type { DaemonConfig } from '../daemon/config'
import * as Actions from './actions'
import type {
  AutomationDriver,
  DriverFactory,
  ExtractOutcome,
  FormFillOutcome,
  LaunchOptions,
  PageVisit,
  SearchEngine,
} from './driver'

const LAUNCH_ARGS = [
  '--no-sandbox',
  '--disable-setuid-sandbox',
  '--disable-dev-shm-usage',
  '--disable-accelerated-2d-canvas',
  '--no-first-run',
  '--no-zygote',
]

const DEFAULT_VIEWPORT = { width: 1920, height: 1080 }

/** One Chromium process with a single page, driven through Playwright. */
export class PlaywrightDriver implements AutomationDriver {
  private closed = false

  constructor(
    private readonly browser: Browser,
    private readonly page: Page,
    readonly headless: boolean,
    private readonly elementWaitMs: number,
  ) {}

  navigate(url: string): Promise<PageVisit> {
    return Actions.navigate(this.page, url)
  }

  search(engine: SearchEngine, query: string): Promise<PageVisit> {
    return Actions.search(this.page, engine, query)
  }

  fillForm(formUrl: string, fields: Record<string, string>, submitSelector?: string): Promise<FormFillOutcome> {
    return Actions.fillForm(this.page, formUrl, fields, submitSelector, this.elementWaitMs)
  }

  extract(selectors: Record<string, string>): Promise<ExtractOutcome> {
    return Actions.extract(this.page, selectors, this.elementWaitMs)
  }

  screenshot(filePath: string): Promise<string> {
    return Actions.screenshot(this.page, filePath)
  }

  content(): Promise<string> {
    return this.page.content()
  }

  click(selector: string): Promise<void> {
    return Actions.click(this.page, selector)
  }

  reload(): Promise<PageVisit> {
    return Actions.reload(this.page)
  }

  setViewport(width: number, height: number): Promise<void> {
    return this.page.setViewportSize({ width, height })
  }

  isVisible(selector: string): Promise<boolean> {
    return Actions.isVisible(this.page, selector)
  }

  count(selector: string): Promise<number> {
    return Actions.count(this.page, selector)
  }

  title(): Promise<string> {
    return this.page.title()
  }

  url(): string {
    return this.page.url()
  }

  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true
    await this.browser.close()
  }
}

/**
 * Launches Playwright-driven Chromium instances for the registry and the
 * test runner. playwright-core ships no browser: point the config at an
 * installed Chrome/Edge channel or executable.
 */
export class BrowserManager implements DriverFactory {
  constructor(private readonly config: DaemonConfig) {}

  async launch(opts: LaunchOptions): Promise<AutomationDriver> {
    const browser = await chromium.launch({
      headless: opts.headless,
      channel: this.config.browserChannel,
      executablePath: this.config.executablePath,
      args: LAUNCH_ARGS,
    })
    try {
      const context = await browser.newContext({ viewport: DEFAULT_VIEWPORT })
      const page = await context.newPage()
      page.setDefaultTimeout(this.config.timeoutMs)
      page.setDefaultNavigationTimeout(this.config.timeoutMs)
      return new PlaywrightDriver(browser, page, opts.headless, this.config.elementWaitMs)
    } catch (err) {
      await browser.close()
      throw err
    }
  }
}
