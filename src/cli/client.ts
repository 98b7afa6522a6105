/**
 * Shared HTTP client for CLI commands.
 * Reads RPAHUB_PORT env var (default 5000) and optional RPAHUB_API_TOKEN.
 */
import http from 'http'

/** Fields every error body from the daemon carries. */
export interface ApiReply {
  success?: boolean
  error?: string
  message?: string
  field?: string
}

export interface RawResponse {
  statusCode: number
  headers: http.IncomingHttpHeaders
  body: string
}

export function cliPort(): number {
  return parseInt(process.env.RPAHUB_PORT ?? '5000')
}

export function cliApiBase(): string {
  return `http://127.0.0.1:${cliPort()}`
}

function buildHeaders(withBody: boolean): Record<string, string> {
  // content-type on a bodiless request makes Fastify reject it with 400
  const headers: Record<string, string> = withBody ? { 'content-type': 'application/json' } : {}
  const token = process.env.RPAHUB_API_TOKEN
  if (token) headers['x-api-token'] = token
  return headers
}

function send(method: string, path: string, body?: object): Promise<RawResponse> {
  return new Promise((resolve, reject) => {
    const req = http.request(
      cliApiBase() + path,
      { method, headers: buildHeaders(body !== undefined) },
      (res) => {
        let data = ''
        res.setEncoding('utf8')
        res.on('data', (c: string) => (data += c))
        res.on('end', () => resolve({ statusCode: res.statusCode ?? 0, headers: res.headers, body: data }))
      },
    )
    req.on('error', reject)
    if (body !== undefined) req.write(JSON.stringify(body))
    req.end()
  })
}

function parseReply<T>(raw: RawResponse): T & ApiReply {
  try {
    return JSON.parse(raw.body)
  } catch {
    throw new Error(`Unexpected response (HTTP ${raw.statusCode}): ${raw.body.slice(0, 200)}`)
  }
}

export async function apiPost<T>(path: string, body: object): Promise<T & ApiReply> {
  return parseReply<T>(await send('POST', path, body))
}

export async function apiGet<T>(path: string): Promise<T & ApiReply> {
  return parseReply<T>(await send('GET', path))
}

export async function apiDelete<T>(path: string): Promise<T & ApiReply> {
  return parseReply<T>(await send('DELETE', path))
}

/** GET without JSON decoding, for file downloads. */
export function apiGetRaw(path: string): Promise<RawResponse> {
  return send('GET', path)
}

/** Print the daemon's error body and exit non-zero. */
export function fail(res: ApiReply): never {
  const detail = res.field ? ` (field: ${res.field})` : ''
  console.error(`Error: ${res.message ?? res.error ?? 'unknown error'}${detail}`)
  process.exit(1)
}

/** Commander collector for repeatable `--opt key=value` flags. */
export function collectPairs(val: string, prev: string[]): string[] {
  return prev.concat([val])
}

export function pairsToRecord(pairs: string[], flag: string): Record<string, string> {
  const out: Record<string, string> = {}
  for (const pair of pairs) {
    const eq = pair.indexOf('=')
    if (eq <= 0) {
      console.error(`Error: ${flag} expects key=value, got '${pair}'`)
      process.exit(1)
    }
    out[pair.slice(0, eq)] = pair.slice(eq + 1)
  }
  return out
}
