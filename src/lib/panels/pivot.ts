import type { PanelRow, PivotTable, TradeBalanceRow, TradeFlow } from './types'

/**
 * Pivot panel rows into a year x country grid. Years ascend, countries keep
 * the order in which they first appear, and missing cells are null.
 */
export function pivotRows(rows: readonly PanelRow[]): PivotTable {
  const columns: string[] = []
  const byYear = new Map<number, Record<string, number | null>>()

  for (const row of rows) {
    if (!columns.includes(row.country)) columns.push(row.country)
    const values = byYear.get(row.year) ?? {}
    values[row.country] = row.value
    byYear.set(row.year, values)
  }

  const years = [...byYear.keys()].sort((a, b) => a - b)
  return {
    columns,
    rows: years.map((year) => {
      const values = byYear.get(year) ?? {}
      return {
        year,
        values: Object.fromEntries(columns.map((column) => [column, values[column] ?? null])),
      }
    }),
  }
}

export type TradeBalanceDatum = { country: string } & Partial<Record<TradeFlow, number>>

/** One record per country with an `Exports` and `Imports` value, for grouped bars. */
export function toTradeBalanceChartData(rows: readonly TradeBalanceRow[]): TradeBalanceDatum[] {
  const byCountry = new Map<string, TradeBalanceDatum>()
  for (const row of rows) {
    const datum = byCountry.get(row.country) ?? { country: row.country }
    datum[row.kind] = row.value
    byCountry.set(row.country, datum)
  }
  return [...byCountry.values()]
}
