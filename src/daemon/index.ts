#!/usr/bin/env node
/**
 * rpa-hub daemon entrypoint
 * Launched by: rpahub start  OR  node dist/src/daemon/index.js
 */

// Node 20 LTS minimum, checked before any imports that may fail on old runtimes
const [nodeMajor] = process.versions.node.split('.').map(Number)
if (nodeMajor < 20) {
  process.stderr.write(
    `[rpahub] ERROR: Node.js ${process.versions.node} is not supported.\n` +
    `  Requires Node 20 LTS or higher. Install via: nvm install 20\n`,
  )
  process.exit(1)
}

import fs from 'fs'
import { buildServer } from './server'
import { SessionRegistry } from './session'
import { BrowserManager } from '../browser/manager'
import { AuditLogger } from '../audit/logger'
import { Dispatcher } from '../dispatch/dispatcher'
import { ResultLog } from '../results/log'
import { TestRunner } from '../suites/runner'
import { resolveConfig, pidFile, logsDir, screenshotsDir, resultsDir } from './config'

async function main() {
  const config = resolveConfig()

  for (const dir of [screenshotsDir(config), resultsDir(config), logsDir(config)]) {
    fs.mkdirSync(dir, { recursive: true })
  }

  // PID file: prevent double-start
  const pid = pidFile(config)
  if (fs.existsSync(pid)) {
    const existingPid = fs.readFileSync(pid, 'utf8').trim()
    let alive = false
    try {
      process.kill(Number(existingPid), 0)
      alive = true
    } catch {
      alive = false // stale pid file
    }
    if (alive) {
      console.error(`rpahub daemon already running (PID ${existingPid}). Use 'rpahub stop' first.`)
      process.exit(1)
    }
    fs.unlinkSync(pid)
  }
  fs.writeFileSync(pid, String(process.pid))

  const factory = new BrowserManager(config)
  const audit = new AuditLogger(logsDir(config))
  const registry = new SessionRegistry(factory)
  const results = new ResultLog()
  const dispatcher = new Dispatcher(registry, results, { screenshotsDir: screenshotsDir(config), now: () => new Date() }, audit)
  const runner = new TestRunner(factory, results, { screenshotsDir: screenshotsDir(config), audit })

  const server = buildServer({ config, registry, dispatcher, results, runner, audit })
  audit.onError = (err) => server.log.warn({ err }, 'audit log write failed')

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    server.log.info(`Received ${signal}, shutting down…`)
    runner.stop()
    await runner.idle()
    const failures = await registry.shutdownAll()
    for (const err of failures) server.log.warn({ err }, 'browser did not close cleanly')
    await server.close()
    await audit.close()
    fs.rmSync(pid, { force: true })
    process.exit(0)
  }
  const onSignal = (signal: string) => {
    shutdown(signal).catch((err) => {
      server.log.error(err)
      fs.rmSync(pid, { force: true })
      process.exit(1)
    })
  }
  process.on('SIGINT', () => onSignal('SIGINT'))
  process.on('SIGTERM', () => onSignal('SIGTERM'))

  try {
    await server.listen({ port: config.port, host: config.host })
    server.log.info(`rpa-hub daemon listening on http://${config.host}:${config.port}`)
  } catch (err) {
    server.log.error(err)
    fs.rmSync(pid, { force: true })
    process.exit(1)
  }
}

main().catch((err) => {
  console.error(`[rpahub] ${err instanceof Error ? err.message : String(err)}`)
  process.exit(1)
})
