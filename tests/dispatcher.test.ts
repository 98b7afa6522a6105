import test from 'node:test'
import assert from 'node:assert/strict'
import fs from 'fs'
import os from 'os'
import path from 'path'
import { commandSchemas } from '../src/dispatch/commands'
import { Dispatcher } from '../src/dispatch/dispatcher'
import { DriverError, SessionNotFoundError, ValidationError } from '../src/daemon/errors'
import { SessionRegistry } from '../src/daemon/session'
import { parseBody } from '../src/daemon/validate'
import { ResultLog } from '../src/results/log'
import { FakeDriverFactory } from './helpers/fakeDriver'
import type { FakeDriverOptions } from './helpers/fakeDriver'

const FIXED_NOW = new Date('2024-03-05T07:08:09Z')

async function setup(opts: FakeDriverOptions = {}) {
  const factory = new FakeDriverFactory(opts)
  const registry = new SessionRegistry(factory)
  const results = new ResultLog()
  const screenshotsDir = fs.mkdtempSync(path.join(os.tmpdir(), 'rpahub-shots-'))
  const dispatcher = new Dispatcher(registry, results, { screenshotsDir, now: () => FIXED_NOW })
  await registry.create({ id: 'inst1', headless: true })
  return { factory, registry, results, dispatcher, screenshotsDir }
}

test('navigate records a success result named navigation', async () => {
  const { dispatcher, results, factory } = await setup({ title: 'Example Domain' })
  const { payload, record } = await dispatcher.dispatch('navigate', { instance_id: 'inst1', url: 'https://example.com' })

  assert.equal(payload.url, 'https://example.com')
  assert.equal(payload.title, 'Example Domain')
  assert.equal(record.name, 'navigation')
  assert.equal(record.status, 'success')
  assert.equal(record.description, 'Navigated to https://example.com')
  assert.equal(record.instance_id, 'inst1')
  assert.deepEqual(results.list(), [record])
  assert.deepEqual(factory.launched[0].calls, ['navigate:https://example.com'])
})

test('search defaults to google and builds the engine URL', async () => {
  const { dispatcher, factory } = await setup()
  const command = parseBody(commandSchemas.search, { instance_id: 'inst1', query: 'rpa hub' })
  assert.equal(command.search_engine, 'google')

  const { payload, record } = await dispatcher.dispatch('search', command)
  assert.equal(payload.url, 'https://www.google.com/search?q=rpa%20hub')
  assert.equal(record.name, 'search')
  assert.equal(record.description, 'Searched google for "rpa hub"')
  assert.deepEqual(factory.launched[0].calls, ['search:google:rpa hub'])
})

test('search on bing and duckduckgo', async () => {
  const { dispatcher } = await setup()
  const bing = await dispatcher.dispatch('search', { instance_id: 'inst1', search_engine: 'bing', query: 'a&b' })
  assert.equal(bing.payload.url, 'https://www.bing.com/search?q=a%26b')
  const ddg = await dispatcher.dispatch('search', { instance_id: 'inst1', search_engine: 'duckduckgo', query: 'x' })
  assert.equal(ddg.payload.url, 'https://duckduckgo.com/?q=x')
})

test('unknown search engine fails validation', () => {
  assert.throws(
    () => parseBody(commandSchemas.search, { instance_id: 'inst1', search_engine: 'altavista', query: 'x' }),
    (err: unknown) => err instanceof ValidationError && err.field === 'search_engine',
  )
})

test('fill-form reports missing fields and keeps values out of the record', async () => {
  const { dispatcher } = await setup({ formFields: ['custname', 'custemail'] })
  const command = parseBody(commandSchemas['fill-form'], {
    instance_id: 'inst1',
    form_url: 'https://forms.example.com/post',
    form_data: { custname: 'Test User', custemail: 'user@example.com', password: 'test-secret' },
    submit_selector: 'button[type=submit]',
  })
  const { payload, record } = await dispatcher.dispatch('fill-form', command)

  assert.deepEqual(payload.filled, ['custname', 'custemail'])
  assert.deepEqual(payload.missing, ['password'])
  assert.equal(payload.submitted, true)
  assert.equal(record.name, 'form_fill')
  assert.equal(record.description, 'Filled 2 of 3 fields on https://forms.example.com/post and submitted')
  assert.equal(JSON.stringify(record).includes('test-secret'), false)
})

test('fill-form coerces numbers and booleans to strings', () => {
  const command = parseBody(commandSchemas['fill-form'], {
    instance_id: 'inst1',
    form_url: 'https://forms.example.com/post',
    form_data: { qty: 3, agree: true },
  })
  assert.deepEqual(command.form_data, { qty: '3', agree: 'true' })
})

test('extract returns matched text and lists missing keys', async () => {
  const { dispatcher } = await setup({ texts: { h1: 'Welcome', '.price': '$10' } })
  const { payload, record } = await dispatcher.dispatch('extract', {
    instance_id: 'inst1',
    selectors: { heading: 'h1', price: '.price', author: '.author' },
  })
  assert.deepEqual(payload.data, { heading: 'Welcome', price: '$10' })
  assert.deepEqual(payload.missing, ['author'])
  assert.equal(record.name, 'data_extraction')
  assert.equal(record.description, 'Extracted 2 of 3 fields')
})

test('screenshot without a filename uses a timestamped png name', async () => {
  const { dispatcher, screenshotsDir } = await setup()
  const { payload, record } = await dispatcher.dispatch('screenshot', { instance_id: 'inst1' })
  assert.equal(payload.filename, 'screenshot_20240305_070809.png')
  assert.equal(payload.path, path.join(screenshotsDir, 'screenshot_20240305_070809.png'))
  assert.equal(fs.existsSync(payload.path), true)
  assert.equal(record.description, 'Saved screenshot screenshot_20240305_070809.png')
})

test('screenshot appends .png only when missing', async () => {
  const { dispatcher } = await setup()
  const a = await dispatcher.dispatch('screenshot', { instance_id: 'inst1', filename: 'home' })
  assert.equal(a.payload.filename, 'home.png')
  const b = await dispatcher.dispatch('screenshot', { instance_id: 'inst1', filename: 'home.PNG' })
  assert.equal(b.payload.filename, 'home.PNG')
})

test('screenshot filename with a directory part is rejected', () => {
  assert.throws(
    () => parseBody(commandSchemas.screenshot, { instance_id: 'inst1', filename: '../escape.png' }),
    /filename: must be a plain file name/,
  )
})

test('scrape-table parses the page content', async () => {
  const html = '<table id="t"><tr><th>Name</th><th>Age</th></tr><tr><td>Ann</td><td>31</td></tr></table>'
  const { dispatcher } = await setup({ html })
  const { payload, record } = await dispatcher.dispatch('scrape-table', { instance_id: 'inst1', table_selector: '#t' })
  assert.deepEqual(payload.headers, ['Name', 'Age'])
  assert.deepEqual(payload.rows, [{ Name: 'Ann', Age: '31' }])
  assert.equal(record.name, 'table_scrape')
  assert.equal(record.description, 'Scraped 1 rows from #t')
})

test('scrape-table with no match is recorded as an error', async () => {
  const { dispatcher, results } = await setup()
  await assert.rejects(
    dispatcher.dispatch('scrape-table', { instance_id: 'inst1', table_selector: '#none' }),
    (err: unknown) => err instanceof DriverError && err.message === "No element matches table selector '#none'",
  )
  const [record] = results.list()
  assert.equal(record.status, 'error')
  assert.equal(record.name, 'table_scrape')
  assert.equal(record.description, "scrape-table failed: No element matches table selector '#none'")
})

test('driver failure is recorded and rethrown as DriverError', async () => {
  const { dispatcher, results } = await setup({ failOn: { navigate: 'net::ERR_NAME_NOT_RESOLVED' } })
  await assert.rejects(
    dispatcher.dispatch('navigate', { instance_id: 'inst1', url: 'https://unreachable.example' }),
    (err: unknown) => err instanceof DriverError && err.action === 'navigate' && err.statusCode === 500,
  )
  assert.equal(results.count(), 1)
  const [record] = results.list()
  assert.equal(record.name, 'navigation')
  assert.equal(record.status, 'error')
  assert.equal(record.description, 'navigate failed: net::ERR_NAME_NOT_RESOLVED')
  assert.deepEqual(record.details, { url: 'https://unreachable.example' })
})

test('unknown instance is not found, records nothing and launches nothing', async () => {
  const { dispatcher, results, factory } = await setup()
  await assert.rejects(
    dispatcher.dispatch('navigate', { instance_id: 'ghost', url: 'https://example.com' }),
    SessionNotFoundError,
  )
  assert.equal(results.count(), 0)
  assert.equal(factory.launches, 1)
})

test('N dispatches with M validation failures leave N - M records', async () => {
  const { dispatcher, results } = await setup()
  const bodies: unknown[] = [
    { instance_id: 'inst1', url: 'https://a.example' },
    { instance_id: 'inst1', url: 'ftp://b.example' },
    { instance_id: 'inst1', url: 'https://c.example' },
    { instance_id: 'inst1' },
    { instance_id: 'inst1', url: 'https://d.example' },
  ]
  let rejected = 0
  for (const body of bodies) {
    try {
      await dispatcher.dispatch('navigate', parseBody(commandSchemas.navigate, body))
    } catch (err) {
      assert.ok(err instanceof ValidationError)
      rejected++
    }
  }
  assert.equal(rejected, 2)
  assert.equal(results.count(), bodies.length - rejected)
})

test('N dispatches of which M name unknown instances leave N - M records', async () => {
  const { dispatcher, results } = await setup()
  const targets = ['inst1', 'ghost', 'inst1', 'missing_2', 'inst1', 'ghost']
  let notFound = 0
  for (const [i, instance_id] of targets.entries()) {
    try {
      await dispatcher.dispatch('navigate', { instance_id, url: `https://site${i}.example` })
    } catch (err) {
      assert.ok(err instanceof SessionNotFoundError)
      notFound++
    }
  }
  assert.equal(notFound, 3)
  assert.equal(results.count(), targets.length - notFound)
  assert.deepEqual(
    results.list().map((r) => r.details?.url),
    ['https://site0.example', 'https://site2.example', 'https://site4.example'],
  )
})
