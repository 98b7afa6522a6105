/**
 * The browser surface the registry, dispatcher and test runner depend on.
 * `PlaywrightDriver` (manager.ts) is the production implementation.
 */

export const SEARCH_ENGINES = ['google', 'bing', 'duckduckgo'] as const
export type SearchEngine = (typeof SEARCH_ENGINES)[number]

export interface PageVisit {
  url: string
  title: string
  duration_ms: number
}

export interface FormFillOutcome {
  url: string
  filled: string[]
  missing: string[]
  submitted: boolean
}

export interface ExtractOutcome {
  data: Record<string, string>
  missing: string[]
}

export interface AutomationDriver {
  readonly headless: boolean
  navigate(url: string): Promise<PageVisit>
  search(engine: SearchEngine, query: string): Promise<PageVisit>
  /** Open `formUrl`, fill fields located by their `name` attribute, optionally click submit. */
  fillForm(formUrl: string, fields: Record<string, string>, submitSelector?: string): Promise<FormFillOutcome>
  extract(selectors: Record<string, string>): Promise<ExtractOutcome>
  /** Write a PNG of the current page to `filePath` and return the path. */
  screenshot(filePath: string): Promise<string>
  content(): Promise<string>
  click(selector: string): Promise<void>
  reload(): Promise<PageVisit>
  setViewport(width: number, height: number): Promise<void>
  isVisible(selector: string): Promise<boolean>
  count(selector: string): Promise<number>
  title(): Promise<string>
  url(): string
  close(): Promise<void>
}

export interface LaunchOptions {
  headless: boolean
}

export interface DriverFactory {
  launch(opts: LaunchOptions): Promise<AutomationDriver>
}

export function searchUrl(engine: SearchEngine, query: string): string {
  const q = encodeURIComponent(query)
  switch (engine) {
    case 'google':
      return `https://www.google.com/search?q=${q}`
    case 'bing':
      return `https://www.bing.com/search?q=${q}`
    case 'duckduckgo':
      return `https://duckduckgo.com/?q=${q}`
  }
}
