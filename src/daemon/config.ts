import os from 'os'
import path from 'path'
import { z } from 'zod'

export interface DaemonConfig {
  port: number
  host: string
  dataDir: string
  logLevel: string
  apiToken?: string
  /** Headless flag used when a create request does not name one. */
  defaultHeadless: boolean
  /** Default Playwright action and navigation timeout. */
  timeoutMs: number
  /** How long form fill and extract wait for each element before reporting it missing. */
  elementWaitMs: number
  /**
   * Browser channel handed to Playwright ('chrome' | 'msedge' | 'chromium').
   * Set via RPAHUB_BROWSER_CHANNEL. Mutually exclusive with executablePath.
   */
  browserChannel?: string
  /** Absolute path to a Chromium-based browser executable. */
  executablePath?: string
}

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

const configSchema = z
  .object({
    port: z.number().int().min(1).max(65535),
    host: z.string().min(1),
    dataDir: z.string().min(1),
    logLevel: z.enum(LOG_LEVELS),
    apiToken: z.string().min(1).optional(),
    defaultHeadless: z.boolean(),
    timeoutMs: z.number().int().positive(),
    elementWaitMs: z.number().int().positive(),
    browserChannel: z.enum(['chromium', 'chrome', 'msedge']).optional(),
    executablePath: z.string().min(1).optional(),
  })
  .refine((c) => !(c.browserChannel && c.executablePath), {
    message: 'browserChannel and executablePath are mutually exclusive',
    path: ['browserChannel'],
  })

function envFlag(raw: string | undefined): boolean | undefined {
  if (raw === undefined || raw === '') return undefined
  return !['0', 'false', 'no', 'off'].includes(raw.trim().toLowerCase())
}

function envNumber(raw: string | undefined): number | undefined {
  if (raw === undefined || raw === '') return undefined
  return Number(raw)
}

function emptyToUndefined(raw: string | undefined): string | undefined {
  return raw === '' ? undefined : raw
}

/**
 * Merge overrides, RPAHUB_* environment variables and defaults, then
 * validate. Throws with every offending key listed when the result is invalid.
 */
export function resolveConfig(
  overrides: Partial<DaemonConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): DaemonConfig {
  const candidate = {
    port: overrides.port ?? envNumber(env.RPAHUB_PORT) ?? 5000,
    host: overrides.host ?? emptyToUndefined(env.RPAHUB_HOST) ?? '127.0.0.1',
    dataDir: overrides.dataDir ?? emptyToUndefined(env.RPAHUB_DATA_DIR) ?? path.join(os.homedir(), '.rpahub'),
    logLevel: overrides.logLevel ?? emptyToUndefined(env.RPAHUB_LOG_LEVEL) ?? 'info',
    apiToken: overrides.apiToken ?? emptyToUndefined(env.RPAHUB_API_TOKEN),
    defaultHeadless: overrides.defaultHeadless ?? envFlag(env.RPAHUB_HEADLESS) ?? true,
    timeoutMs: overrides.timeoutMs ?? envNumber(env.RPAHUB_TIMEOUT_MS) ?? 30000,
    elementWaitMs: overrides.elementWaitMs ?? envNumber(env.RPAHUB_ELEMENT_WAIT_MS) ?? 10000,
    browserChannel: overrides.browserChannel ?? emptyToUndefined(env.RPAHUB_BROWSER_CHANNEL),
    executablePath: overrides.executablePath ?? emptyToUndefined(env.RPAHUB_EXECUTABLE_PATH),
  }

  const parsed = configSchema.safeParse(candidate)
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join('.') || 'config'}: ${i.message}`)
    throw new Error(`Invalid rpa-hub configuration: ${problems.join('; ')}`)
  }
  return parsed.data
}

export function screenshotsDir(config: DaemonConfig): string {
  return path.join(config.dataDir, 'screenshots')
}

export function resultsDir(config: DaemonConfig): string {
  return path.join(config.dataDir, 'results')
}

export function logsDir(config: DaemonConfig): string {
  return path.join(config.dataDir, 'logs')
}

export function pidFile(config: DaemonConfig): string {
  return path.join(config.dataDir, 'daemon.pid')
}
