import { Command } from 'commander'
import { apiPost, apiGet, apiDelete, fail } from '../client'

interface CreateReply {
  instance_id: string
  headless: boolean
  created_at: string
}

interface InstancesReply {
  instances: Array<{ instance_id: string; headless: boolean; created_at: string }>
}

export function instanceCommands(program: Command): void {
  const inst = program.command('instance').description('Manage automation instances')

  inst
    .command('new')
    .description('Launch a browser and register it as an automation instance')
    .option('--id <instance-id>', 'Instance id (generated when omitted)')
    .option('--headed', 'Launch in headed (visible) mode')
    .option('--headless', 'Launch in headless mode')
    .action(async (opts: { id?: string; headed?: boolean; headless?: boolean }) => {
      const body: Record<string, unknown> = {}
      if (opts.id) body.instance_id = opts.id
      if (opts.headed) body.headless = false
      else if (opts.headless) body.headless = true

      const res = await apiPost<CreateReply>('/api/automation/create', body)
      if (res.error) fail(res)
      console.log(`Created instance: ${res.instance_id}`)
      console.log(`  Headless: ${res.headless}`)
      console.log(`  Created:  ${res.created_at}`)
    })

  inst
    .command('list')
    .description('List live automation instances')
    .action(async () => {
      const res = await apiGet<InstancesReply>('/api/automation/instances')
      if (res.error) fail(res)
      if (res.instances.length === 0) {
        console.log('No active instances.')
        return
      }
      for (const s of res.instances) {
        console.log(`  ${s.instance_id}  headless=${s.headless}  created=${s.created_at}`)
      }
    })

  inst
    .command('rm <instance-id>')
    .description('Close the browser and remove the instance')
    .action(async (instanceId: string) => {
      const res = await apiDelete<object>(`/api/automation/close/${encodeURIComponent(instanceId)}`)
      if (res.error) fail(res)
      console.log(`Instance ${instanceId} closed.`)
    })
}
