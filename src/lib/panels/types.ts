import type { ChartKind, IndicatorKey } from '@/lib/catalog/indicators'
import type { TRADE_BALANCE_KEY } from '@/lib/catalog/layout'
import type { Notice } from '@/lib/api-clients/types'

export interface YearRange {
  startYear: number
  endYear: number
}

export interface PanelRow {
  year: number
  value: number
  country: string
}

export interface PivotRow {
  year: number
  values: Record<string, number | null>
}

/** Year x country grid. */
export interface PivotTable {
  columns: string[]
  rows: PivotRow[]
}

export interface IndicatorPanel {
  type: 'indicator'
  key: IndicatorKey
  heading: string
  title: string
  unit: string
  chartKind: ChartKind
  axis: { x: string; y: string }
  rows: PanelRow[]
  table: PivotTable | null
  notices: Notice[]
  empty: boolean
}

export type TradeFlow = 'Exports' | 'Imports'

export interface TradeBalanceRow {
  country: string
  kind: TradeFlow
  value: number
}

export interface TradeBalancePanel {
  type: 'trade-balance'
  key: typeof TRADE_BALANCE_KEY
  heading: string
  title: string
  year: number
  unit: string
  rows: TradeBalanceRow[]
  notices: Notice[]
  empty: boolean
}

export type Panel = IndicatorPanel | TradeBalancePanel
