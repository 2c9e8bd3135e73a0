export type TOutputFormat = 'json' | 'table'

type TRecord = Record<string, unknown>

const MAX_COLUMN_WIDTH = 60

function isRecord(value: unknown): value is TRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isPage(value: unknown): value is TRecord & { data: unknown[] } {
  return isRecord(value) && Array.isArray(value.data)
}

/** Keeps only the named fields of an object, of each array element, or of each page item. */
export function pickFields(data: unknown, fields: string[]): unknown {
  if (!fields.length) return data

  const pick = (item: unknown): unknown => {
    if (!isRecord(item)) return item
    const result: TRecord = {}
    for (const field of fields) {
      if (field in item) result[field] = item[field]
    }
    return result
  }

  if (Array.isArray(data)) return data.map(pick)
  if (isPage(data)) return { ...data, data: data.data.map(pick) }
  return pick(data)
}

export function formatOutput(data: unknown, format: TOutputFormat): string {
  if (data instanceof Uint8Array) return new TextDecoder().decode(data)
  if (data === undefined) return ''
  if (typeof data === 'string') return data
  if (format === 'table') return formatTable(data)
  return JSON.stringify(data, null, 2)
}

function formatCell(value: unknown): string {
  if (value === null || value === undefined) return ''
  if (typeof value === 'object') return JSON.stringify(value)
  return String(value)
}

function formatTable(data: unknown): string {
  let items: unknown[]
  let meta = ''

  if (isPage(data)) {
    items = data.data
    if (typeof data.totalCount === 'number') {
      meta = `(${items.length} of ${data.totalCount} results, page ${formatCell(data.page ?? 0)})`
    }
  } else if (Array.isArray(data)) {
    items = data
  } else if (isRecord(data)) {
    items = [data]
  } else {
    return String(data)
  }

  if (!items.length) return '(no results)'

  const rows: TRecord[] = items.map((item) => (isRecord(item) ? item : { value: item }))
  const keys = [...new Set(rows.flatMap((row) => Object.keys(row)))]
  const widths = keys.map((key) =>
    Math.min(
      MAX_COLUMN_WIDTH,
      Math.max(key.length, ...rows.map((row) => formatCell(row[key]).length)),
    ),
  )

  const line = (cells: string[]): string =>
    cells
      .map((cell, index) => {
        const width = widths[index] ?? cell.length
        return cell.length > width ? `${cell.slice(0, width - 1)}…` : cell.padEnd(width)
      })
      .join('  ')
      .trimEnd()

  const parts = [
    line(keys),
    widths.map((width) => '─'.repeat(width)).join('──'),
    ...rows.map((row) => line(keys.map((key) => formatCell(row[key])))),
  ]
  if (meta) parts.push('', meta)
  return parts.join('\n')
}
