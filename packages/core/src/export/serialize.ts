import type { CalendarEvent } from '../types.js'
import { withSeconds } from '../utils/datetime.js'

export type ExportFormat = 'json' | 'csv'

export function isExportFormat(value: string): value is ExportFormat {
  return value === 'json' || value === 'csv'
}

/** One exported row; field names are part of the download format */
export interface ExportRow {
  id: number
  name: string
  date: string
  time: string
  details: string
  tg_user_id: number
}

const CSV_COLUMNS: readonly (keyof ExportRow)[] = ['id', 'name', 'date', 'time', 'details', 'tg_user_id']
const CSV_DELIMITER = ';'
/** Spreadsheet apps need the BOM to pick UTF-8 */
const UTF8_BOM = '\uFEFF'

export function toExportRows(events: readonly CalendarEvent[]): ExportRow[] {
  return events.map((event) => ({
    id: event.id,
    name: event.title,
    date: event.date,
    time: withSeconds(event.time),
    details: event.details,
    tg_user_id: event.owner,
  }))
}

function csvCell(value: string | number): string {
  const text = String(value)
  if (/[";\r\n]/.test(text)) {
    return `"${text.replaceAll('"', '""')}"`
  }
  return text
}

export function toCsv(rows: readonly ExportRow[]): string {
  const lines = [CSV_COLUMNS.join(CSV_DELIMITER)]
  for (const row of rows) {
    lines.push(CSV_COLUMNS.map((column) => csvCell(row[column])).join(CSV_DELIMITER))
  }
  return UTF8_BOM + lines.join('\r\n') + '\r\n'
}

export function toJsonExport(owner: number, rows: readonly ExportRow[]): { owner: number; events: ExportRow[] } {
  return { owner, events: [...rows] }
}
