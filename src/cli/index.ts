#!/usr/bin/env node
import os from 'os'
import path from 'path'
import { Command } from 'commander'
import { startDaemon } from './commands/start'
import { stopDaemon } from './commands/stop'
import { showStatus } from './commands/status'
import { instanceCommands } from './commands/instance'
import { actionCommands } from './commands/actions'
import { testCommands } from './commands/tests'
import { resultCommands } from './commands/results'

const defaultDataDir = process.env.RPAHUB_DATA_DIR ?? path.join(os.homedir(), '.rpahub')

const program = new Command()

program
  .name('rpahub')
  .description('rpahub: browser automation hub (sessions, commands, test suites, result export)')
  .version('0.1.0')

program
  .command('start')
  .description('Start the rpahub daemon')
  .option('-p, --port <port>', 'Port to listen on', process.env.RPAHUB_PORT ?? '5000')
  .option('-d, --data-dir <dir>', 'Data directory', defaultDataDir)
  .option('-l, --log-level <level>', 'Log level (trace|debug|info|warn|error)', 'info')
  .option('--headed', 'Default new instances to headed mode')
  .action(startDaemon)

program
  .command('stop')
  .description('Stop the running rpahub daemon')
  .option('-d, --data-dir <dir>', 'Data directory', defaultDataDir)
  .action(stopDaemon)

program
  .command('status')
  .description('Show daemon status')
  .action(showStatus)

instanceCommands(program)
actionCommands(program)
testCommands(program)
resultCommands(program)

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error('Error:', err instanceof Error ? err.message : String(err))
  process.exit(1)
})
