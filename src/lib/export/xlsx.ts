import * as XLSX from 'xlsx'
import type { PivotTable } from '@/lib/panels/types'

export type SheetCell = string | number | null

/** Header row (`Year`, then one column per country) followed by one row per year. */
export function pivotToSheetRows(table: PivotTable): SheetCell[][] {
  const header: SheetCell[] = ['Year', ...table.columns]
  const body = table.rows.map((row) => [row.year, ...table.columns.map((column) => row.values[column] ?? null)])
  return [header, ...body]
}

// Excel caps sheet names at 31 characters and rejects : \ / ? * [ ]
export function toSheetName(title: string): string {
  const cleaned = title.replace(/[:\\/?*[\]]/g, ' ').trim()
  return (cleaned || 'Data').slice(0, 31)
}

export function pivotToWorkbook(table: PivotTable, title: string): XLSX.WorkBook {
  const workbook = XLSX.utils.book_new()
  const sheet = XLSX.utils.aoa_to_sheet(pivotToSheetRows(table))
  XLSX.utils.book_append_sheet(workbook, sheet, toSheetName(title))
  return workbook
}

export function exportFileName(title: string, startYear: number, endYear: number): string {
  const slug = title
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
  return `${slug || 'panel'}-${startYear}-${endYear}.xlsx`
}

/** Browser-only: triggers a download of the table as an .xlsx file. */
export function downloadPivotTable(table: PivotTable, title: string): void {
  const first = table.rows[0]?.year ?? 0
  const last = table.rows.at(-1)?.year ?? first
  XLSX.writeFile(pivotToWorkbook(table, title), exportFileName(title, first, last))
}
