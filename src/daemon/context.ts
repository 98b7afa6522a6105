import type { AuditLogger } from '../audit/logger'
import type { Dispatcher } from '../dispatch/dispatcher'
import type { ResultLog } from '../results/log'
import type { TestRunner } from '../suites/runner'
import type { DaemonConfig } from './config'
import type { SessionRegistry } from './session'

/** Process-owned state handed to the server and every route registrar. */
export interface HubContext {
  config: DaemonConfig
  registry: SessionRegistry
  dispatcher: Dispatcher
  results: ResultLog
  runner: TestRunner
  audit?: AuditLogger
}
