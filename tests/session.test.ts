import test from 'node:test'
import assert from 'node:assert/strict'
import { SessionConflictError, SessionNotFoundError } from '../src/daemon/errors'
import { SessionRegistry, generateSessionId } from '../src/daemon/session'
import { FakeDriverFactory } from './helpers/fakeDriver'

test('generateSessionId has the instance_ prefix and 12 hex chars', () => {
  assert.match(generateSessionId(), /^instance_[0-9a-f]{12}$/)
  assert.notEqual(generateSessionId(), generateSessionId())
})

test('create then get returns the session with its driver', async () => {
  const factory = new FakeDriverFactory()
  const registry = new SessionRegistry(factory)
  const info = await registry.create({ id: 'alpha', headless: false })

  assert.equal(info.id, 'alpha')
  assert.equal(info.headless, false)
  const session = registry.get('alpha')
  assert.ok(session)
  assert.equal(session.driver, factory.launched[0])
  assert.equal(session.driver.headless, false)
  assert.equal(registry.count(), 1)
  assert.deepEqual(registry.list(), [info])
})

test('create without an id generates one', async () => {
  const registry = new SessionRegistry(new FakeDriverFactory())
  const info = await registry.create({ headless: true })
  assert.match(info.id, /^instance_[0-9a-f]{12}$/)
  assert.equal(registry.has(info.id), true)
})

test('duplicate id is rejected and the original session stays', async () => {
  const factory = new FakeDriverFactory()
  const registry = new SessionRegistry(factory)
  await registry.create({ id: 'dup', headless: true })

  await assert.rejects(registry.create({ id: 'dup', headless: false }), SessionConflictError)
  assert.equal(factory.launches, 1)
  assert.equal(registry.get('dup')?.headless, true)
})

test('concurrent creates for one id launch a single browser', async () => {
  const factory = new FakeDriverFactory()
  factory.holdLaunches()
  const registry = new SessionRegistry(factory)

  const first = registry.create({ id: 'race', headless: true })
  const second = registry.create({ id: 'race', headless: true })
  await assert.rejects(second, SessionConflictError)
  factory.releaseLaunches()
  await first

  assert.equal(factory.launches, 1)
  assert.equal(registry.count(), 1)
})

test('failed launch leaves no entry and frees the id', async () => {
  const factory = new FakeDriverFactory()
  factory.failWith = 'no browser'
  const registry = new SessionRegistry(factory)

  await assert.rejects(registry.create({ id: 'broken', headless: true }), /no browser/)
  assert.equal(registry.has('broken'), false)

  factory.failWith = null
  const info = await registry.create({ id: 'broken', headless: true })
  assert.equal(info.id, 'broken')
})

test('unknown id is not found and launches nothing', async () => {
  const factory = new FakeDriverFactory()
  const registry = new SessionRegistry(factory)
  assert.equal(registry.get('ghost'), undefined)
  assert.throws(() => registry.getOrThrow('ghost'), SessionNotFoundError)
  await assert.rejects(registry.close('ghost'), /Automation instance not found: ghost/)
  assert.equal(factory.launches, 0)
})

test('close removes the entry and closes the driver', async () => {
  const factory = new FakeDriverFactory()
  const registry = new SessionRegistry(factory)
  await registry.create({ id: 'tmp', headless: true })

  await registry.close('tmp')
  assert.equal(registry.has('tmp'), false)
  assert.equal(factory.launched[0].closed, true)
  await assert.rejects(registry.close('tmp'), SessionNotFoundError)
})

test('shutdownAll closes every driver and reports failures', async () => {
  const factory = new FakeDriverFactory({ failOn: {} })
  const registry = new SessionRegistry(factory)
  await registry.create({ id: 'a', headless: true })
  await registry.create({ id: 'b', headless: true })

  const failures = await registry.shutdownAll()
  assert.deepEqual(failures, [])
  assert.equal(registry.count(), 0)
  assert.equal(factory.launched.every((d) => d.closed), true)

  const failing = new FakeDriverFactory({ failOn: { close: 'stuck' } })
  const other = new SessionRegistry(failing)
  await other.create({ id: 'c', headless: true })
  const errs = await other.shutdownAll()
  assert.equal(errs.length, 1)
  assert.equal(errs[0].message, 'stuck')
  assert.equal(other.count(), 0)
})
