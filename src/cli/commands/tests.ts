import { Command } from 'commander'
import { apiPost, fail } from '../client'

export function testCommands(program: Command): void {
  const tests = program.command('tests').description('Run the built-in browser test suites')

  tests
    .command('run [suite]')
    .description('Start a suite in the background: basic|advanced|all')
    .action(async (suite?: string) => {
      const res = await apiPost<{ message: string }>('/api/tests/run', suite ? { test_suite: suite } : {})
      if (res.error) fail(res)
      console.log(res.message)
      console.log(`Poll progress with: rpahub status`)
    })

  tests
    .command('stop')
    .description('Stop the running suite after its current case')
    .action(async () => {
      const res = await apiPost<{ message: string }>('/api/tests/stop', {})
      if (res.error) fail(res)
      console.log(res.message)
    })
}
