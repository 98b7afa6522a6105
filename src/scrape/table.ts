import * as cheerio from 'cheerio'

export interface TableData {
  headers: string[]
  rows: Array<Record<string, string>>
}

function cellText(text: string): string {
  return text.replace(/\s+/g, ' ').trim()
}

/** Repeated header names get `_2`, `_3`, ... so no column overwrites another. */
function uniqueHeaders(names: string[]): string[] {
  const seen = new Map<string, number>()
  return names.map((name) => {
    if (!name) return name
    const n = (seen.get(name) ?? 0) + 1
    seen.set(name, n)
    return n === 1 ? name : `${name}_${n}`
  })
}

/**
 * Parse the first element matching `selector` as a table (or the first
 * table inside it, when it is a wrapper). Header names come
 * from the first row containing `<th>` cells; data cells beyond the header
 * width (or under an empty header) are keyed `column_<n>` (1-based). Rows of
 * tables nested inside cells are not part of the outer table. Returns null
 * when no table is found.
 */
export function parseTable(html: string, selector = 'table'): TableData | null {
  const $ = cheerio.load(html)
  const match = $(selector).first()
  if (match.length === 0) return null
  const table = match.is('table') ? match : match.find('table').first()
  if (table.length === 0) return null

  let headers: string[] = []
  const rows: Array<Record<string, string>> = []

  const ownRows = table.find('tr').filter((_, tr) => $(tr).closest('table').is(table))
  ownRows.each((_, tr) => {
    const row = $(tr)
    const th = row.children('th')
    const td = row.children('td')
    if (headers.length === 0 && th.length > 0 && td.length === 0) {
      headers = uniqueHeaders(th.map((__, cell) => cellText($(cell).text())).get())
      return
    }
    if (td.length === 0) return

    const record: Record<string, string> = {}
    row.children('th, td').each((i, cell) => {
      const key = headers[i] || `column_${i + 1}`
      record[key] = cellText($(cell).text())
    })
    rows.push(record)
  })

  return { headers, rows }
}
