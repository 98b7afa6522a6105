import { spawn } from 'child_process'
import http from 'http'
import path from 'path'
import { setTimeout as sleep } from 'timers/promises'

interface StartOptions {
  port: string
  dataDir: string
  logLevel: string
  headed?: boolean
}

const READY_TIMEOUT_MS = 5000
const POLL_INTERVAL_MS = 300

/** True when something answers 200 on /health at `port`. */
function healthy(port: number): Promise<boolean> {
  return new Promise((resolve) => {
    const req = http.get({ host: '127.0.0.1', port, path: '/health', timeout: 500 }, (res) => {
      res.resume()
      resolve(res.statusCode === 200)
    })
    req.on('timeout', () => req.destroy())
    req.on('error', () => resolve(false))
  })
}

async function waitHealthy(port: number, deadline: number): Promise<boolean> {
  while (Date.now() < deadline) {
    if (await healthy(port)) return true
    await sleep(POLL_INTERVAL_MS)
  }
  return false
}

export async function startDaemon(opts: StartOptions): Promise<void> {
  const port = parseInt(opts.port, 10)
  if (await healthy(port)) {
    console.log(`rpahub daemon already running on port ${port}`)
    return
  }

  const child = spawn(process.execPath, [path.join(__dirname, '../../daemon/index.js')], {
    detached: true,
    stdio: 'inherit',
    env: {
      ...process.env,
      RPAHUB_PORT: String(port),
      RPAHUB_DATA_DIR: opts.dataDir,
      RPAHUB_LOG_LEVEL: opts.logLevel,
      ...(opts.headed ? { RPAHUB_HEADLESS: 'false' } : {}),
    },
  })
  child.unref()
  console.log(`Starting rpahub daemon (PID ${child.pid}) on port ${port}…`)

  if (!(await waitHealthy(port, Date.now() + READY_TIMEOUT_MS))) {
    console.error(`✗ Daemon not answering /health after ${READY_TIMEOUT_MS / 1000}s; see its output above.`)
    process.exit(1)
  }
  console.log(`✓ rpahub daemon ready: http://127.0.0.1:${port}`)
}
