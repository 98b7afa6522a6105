import { apiGet, fail } from '../client'
import type { ApiReply } from '../client'

interface StatusReply {
  is_running: boolean
  test_suite: string | null
  active_instances: number
  total_results: number
  timestamp: string
}

interface InstancesReply {
  instances: Array<{ instance_id: string; headless: boolean; created_at: string }>
}

export async function showStatus(): Promise<void> {
  let status: StatusReply & ApiReply
  try {
    status = await apiGet<StatusReply>('/api/status')
  } catch {
    console.log('rpahub daemon is NOT running')
    return
  }
  if (status.error) fail(status)
  const { instances } = await apiGet<InstancesReply>('/api/automation/instances')

  console.log('rpahub daemon RUNNING')
  console.log(`  Instances: ${status.active_instances}`)
  for (const s of instances ?? []) {
    console.log(`    [${s.instance_id}] headless=${s.headless} created=${s.created_at}`)
  }
  console.log(`  Results:   ${status.total_results}`)
  console.log(`  Tests:     ${status.is_running ? `running (${status.test_suite})` : 'idle'}`)
}
