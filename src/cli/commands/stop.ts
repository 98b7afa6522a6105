import fs from 'fs'
import path from 'path'

interface StopOptions {
  dataDir: string
}

function isNoSuchProcess(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ESRCH'
}

export async function stopDaemon(opts: StopOptions): Promise<void> {
  const pidPath = path.join(opts.dataDir, 'daemon.pid')

  if (!fs.existsSync(pidPath)) {
    console.log('No daemon PID file found; daemon is not running.')
    return
  }

  const pid = parseInt(fs.readFileSync(pidPath, 'utf8').trim())
  if (isNaN(pid)) {
    console.error('Invalid PID file. Removing.')
    fs.unlinkSync(pidPath)
    return
  }

  try {
    process.kill(pid, 'SIGTERM')
  } catch (err) {
    if (isNoSuchProcess(err)) {
      console.log('Daemon process not found (already stopped). Cleaning up PID file.')
      fs.rmSync(pidPath, { force: true })
      return
    }
    throw err
  }
  console.log(`✓ Sent SIGTERM to daemon (PID ${pid})`)

  // The daemon removes its PID file on clean exit
  let waited = 0
  while (fs.existsSync(pidPath) && waited < 5000) {
    await new Promise((r) => setTimeout(r, 200))
    waited += 200
  }
  if (!fs.existsSync(pidPath)) {
    console.log('✓ Daemon stopped.')
    return
  }

  console.warn('Daemon did not exit cleanly within 5s. Sending SIGKILL…')
  try {
    process.kill(pid, 'SIGKILL')
  } catch (err) {
    if (!isNoSuchProcess(err)) throw err
  }
  fs.rmSync(pidPath, { force: true })
}
