import { check } from './types'
import type { SuiteCatalog, TestCase } from './types'

const DOCS_SITE = 'https://www.python.org'
const HTTPBIN_FORM = 'https://httpbin.org/forms/post'
const HTTPBIN_ENDPOINTS = ['https://httpbin.org/get', 'https://httpbin.org/json', 'https://httpbin.org/xml']

const PAGE_LOAD_BUDGET_MS = 5000
const ENDPOINT_BUDGET_MS = 2000

const VIEWPORTS: ReadonlyArray<[number, number]> = [
  [1920, 1080], // desktop
  [1366, 768], // laptop
  [768, 1024], // tablet
  [375, 667], // mobile
]

// ---------------------------------------------------------------------------
// Functional
// ---------------------------------------------------------------------------

const searchCase: TestCase = {
  name: 'test_search',
  async run({ driver }) {
    await driver.search('google', 'Playwright browser automation')
    check((await driver.count('h3')) > 0, 'No search results found')
  },
}

const formSubmissionCase: TestCase = {
  name: 'test_form_submission',
  async run({ driver }) {
    const outcome = await driver.fillForm(
      HTTPBIN_FORM,
      {
        custname: 'Test User',
        custtel: '555-0100',
        custemail: 'test@example.com',
        size: 'large',
        topping: 'bacon',
        delivery: '20:00',
        comments: 'Automated test submission',
      },
      'form button',
    )
    check(outcome.missing.length === 0, `Form fields not found: ${outcome.missing.join(', ')}`)
    check(driver.url().includes('httpbin.org'), 'Form submission left httpbin.org')
  },
}

const navigationCase: TestCase = {
  name: 'test_navigation',
  async run({ driver }) {
    await driver.navigate(DOCS_SITE)
    await driver.click('#downloads > a')
    check((await driver.title()).includes('Download'), 'Navigation to Downloads failed')
    await driver.click('#documentation > a')
    check((await driver.title()).includes('Documentation'), 'Navigation to Documentation failed')
  },
}

// ---------------------------------------------------------------------------
// UI and performance
// ---------------------------------------------------------------------------

const responsiveCase: TestCase = {
  name: 'test_responsive_design',
  async run({ driver, signal, screenshotPath }) {
    await driver.navigate(DOCS_SITE)
    for (const [width, height] of VIEWPORTS) {
      signal.throwIfAborted()
      await driver.setViewport(width, height)
      check((await driver.count('body')) > 0, `Page not rendering at ${width}x${height}`)
      await driver.screenshot(screenshotPath(`responsive_${width}x${height}`))
    }
  },
}

const visibilityCase: TestCase = {
  name: 'test_element_visibility',
  async run({ driver }) {
    await driver.navigate(DOCS_SITE)
    for (const selector of ['header', 'nav', '#downloads > a', '#documentation > a']) {
      check(await driver.isVisible(selector), `Element ${selector} is not visible`)
    }
  },
}

const pageLoadCase: TestCase = {
  name: 'test_page_load_time',
  async run({ driver }) {
    const visit = await driver.navigate(DOCS_SITE)
    check(
      visit.duration_ms < PAGE_LOAD_BUDGET_MS,
      `Page load time ${visit.duration_ms}ms exceeds ${PAGE_LOAD_BUDGET_MS}ms`,
    )
  },
}

const endpointCase: TestCase = {
  name: 'test_endpoint_response_time',
  async run({ driver, signal }) {
    for (const endpoint of HTTPBIN_ENDPOINTS) {
      signal.throwIfAborted()
      const visit = await driver.navigate(endpoint)
      check(
        visit.duration_ms < ENDPOINT_BUDGET_MS,
        `${endpoint} took ${visit.duration_ms}ms (budget ${ENDPOINT_BUDGET_MS}ms)`,
      )
    }
  },
}

const reloadCase: TestCase = {
  name: 'test_repeated_reloads',
  async run({ driver, signal }) {
    await driver.navigate(DOCS_SITE)
    for (let i = 1; i <= 5; i++) {
      signal.throwIfAborted()
      await driver.reload()
      check((await driver.count('body')) > 0, `Page failed to load on reload ${i}`)
    }
  },
}

const basic = [searchCase, formSubmissionCase, navigationCase]
const advanced = [responsiveCase, visibilityCase, pageLoadCase, endpointCase, reloadCase]

export const DEFAULT_SUITES: SuiteCatalog = {
  basic,
  advanced,
  all: [...basic, ...advanced],
}
