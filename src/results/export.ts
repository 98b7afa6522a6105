import fs from 'fs/promises'
import path from 'path'
import type { ResultRecord } from './log'

export const EXPORT_FORMATS = ['json', 'csv', 'html'] as const
export type ExportFormat = (typeof EXPORT_FORMATS)[number]

export function isExportFormat(value: string): value is ExportFormat {
  return (EXPORT_FORMATS as readonly string[]).includes(value)
}

export interface RenderedExport {
  format: ExportFormat
  filename: string
  contentType: string
  body: string
}

const CONTENT_TYPES: Record<ExportFormat, string> = {
  json: 'application/json; charset=utf-8',
  csv: 'text/csv; charset=utf-8',
  html: 'text/html; charset=utf-8',
}

/** UTC `YYYYMMDD_HHMMSS`, used in generated file names. */
export function compactTimestamp(d: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0')
  return (
    `${d.getUTCFullYear()}${pad(d.getUTCMonth() + 1)}${pad(d.getUTCDate())}` +
    `_${pad(d.getUTCHours())}${pad(d.getUTCMinutes())}${pad(d.getUTCSeconds())}`
  )
}

export function toJson(records: ResultRecord[]): string {
  return JSON.stringify(records, null, 2)
}

function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value
}

export const CSV_HEADER = ['Name', 'Status', 'Timestamp', 'Description', 'Details']

export function toCsv(records: ResultRecord[]): string {
  const rows = [CSV_HEADER]
  for (const r of records) {
    rows.push([r.name, r.status, r.timestamp, r.description, JSON.stringify(r.details ?? {})])
  }
  return rows.map((row) => row.map(csvField).join(',')).join('\r\n') + '\r\n'
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;')
}

export function toHtml(records: ResultRecord[], generatedAt: Date): string {
  const successful = records.filter((r) => r.status === 'success').length
  const rows = records
    .map(
      (r) =>
        `      <tr>\n` +
        `        <td>${escapeHtml(r.name)}</td>\n` +
        `        <td class="${r.status}">${r.status}</td>\n` +
        `        <td>${escapeHtml(r.timestamp)}</td>\n` +
        `        <td>${escapeHtml(r.description)}</td>\n` +
        `        <td><pre>${escapeHtml(JSON.stringify(r.details ?? {}, null, 2))}</pre></td>\n` +
        `      </tr>`,
    )
    .join('\n')

  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <title>Automation Results</title>
  <style>
    body { font-family: Arial, sans-serif; margin: 20px; }
    table { border-collapse: collapse; width: 100%; }
    th, td { border: 1px solid #ddd; padding: 8px; text-align: left; vertical-align: top; }
    th { background-color: #f2f2f2; }
    .success { color: green; }
    .error { color: red; }
  </style>
</head>
<body>
  <h1>Automation Results</h1>
  <p>Generated: ${generatedAt.toISOString()}</p>
  <p>Total Results: ${records.length}</p>
  <p>Successful: ${successful}</p>
  <table>
    <thead>
      <tr><th>Name</th><th>Status</th><th>Timestamp</th><th>Description</th><th>Details</th></tr>
    </thead>
    <tbody>
${rows}
    </tbody>
  </table>
</body>
</html>
`
}

export function renderExport(format: ExportFormat, records: ResultRecord[], now: Date = new Date()): RenderedExport {
  let body: string
  switch (format) {
    case 'json':
      body = toJson(records)
      break
    case 'csv':
      body = toCsv(records)
      break
    case 'html':
      body = toHtml(records, now)
      break
  }
  return {
    format,
    filename: `results_${compactTimestamp(now)}.${format}`,
    contentType: CONTENT_TYPES[format],
    body,
  }
}

/** Persist a rendered export under `dir`; returns the absolute file path. */
export async function writeExport(dir: string, rendered: RenderedExport): Promise<string> {
  await fs.mkdir(dir, { recursive: true })
  const file = path.resolve(dir, rendered.filename)
  await fs.writeFile(file, rendered.body, 'utf8')
  return file
}
