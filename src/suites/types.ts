import type { AutomationDriver } from '../browser/driver'

export const SUITE_NAMES = ['basic', 'advanced', 'all'] as const
export type SuiteName = (typeof SUITE_NAMES)[number]

export interface CaseContext {
  driver: AutomationDriver
  signal: AbortSignal
  /** Absolute path for an evidence screenshot labelled `label`. */
  screenshotPath(label: string): string
}

export interface TestCase {
  name: string
  run(ctx: CaseContext): Promise<void>
}

export type SuiteCatalog = Record<SuiteName, readonly TestCase[]>

export class CaseAssertionError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'CaseAssertionError'
  }
}

export function check(condition: boolean, message: string): void {
  if (!condition) throw new CaseAssertionError(message)
}
