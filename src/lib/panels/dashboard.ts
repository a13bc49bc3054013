import { imfAPI } from '@/lib/api-clients/imf'
import type { SeriesFetcher } from '@/lib/api-clients/types'
import { resolveCountries } from '@/lib/catalog/countries'
import { INDICATORS } from '@/lib/catalog/indicators'
import { DASHBOARD_LAYOUT, TRADE_BALANCE_HEADING, type PanelSlot } from '@/lib/catalog/layout'
import type { Selection } from '@/lib/selection'
import { getErrorMessage } from '@/lib/utils/errors'
import { buildIndicatorPanel } from './indicator-panel'
import { buildTradeBalancePanel } from './trade-balance'
import type { Panel } from './types'

/**
 * Build the panel for one layout slot. The trade balance panel looks only
 * at the last year of the selected range.
 */
export async function buildPanel(slot: PanelSlot, selection: Selection, fetcher: SeriesFetcher = imfAPI): Promise<Panel> {
  const countries = resolveCountries(selection.countries)
  if (slot.kind === 'trade-balance') {
    return buildTradeBalancePanel(countries, selection.endYear, fetcher)
  }
  const range = { startYear: selection.startYear, endYear: selection.endYear }
  return buildIndicatorPanel(slot.key, INDICATORS[slot.key], countries, range, fetcher)
}

function failedPanel(slot: PanelSlot, selection: Selection, error: unknown): Panel {
  const notices = [{ kind: 'error' as const, message: `Failed to build panel: ${getErrorMessage(error)}` }]
  if (slot.kind === 'trade-balance') {
    return {
      type: 'trade-balance',
      key: slot.key,
      heading: TRADE_BALANCE_HEADING,
      title: `Trade Balance (${selection.endYear})`,
      year: selection.endYear,
      unit: INDICATORS.exports.unit,
      rows: [],
      notices,
      empty: true,
    }
  }
  const indicator = INDICATORS[slot.key]
  return {
    type: 'indicator',
    key: slot.key,
    heading: indicator.heading,
    title: indicator.title,
    unit: indicator.unit,
    chartKind: indicator.chartKind,
    axis: { x: 'Year', y: indicator.unit },
    rows: [],
    table: null,
    notices,
    empty: true,
  }
}

/**
 * Build every panel in layout order, one after another. A panel that throws
 * is replaced by an empty panel carrying the error, so the rest still render.
 */
export async function buildDashboard(selection: Selection, fetcher: SeriesFetcher = imfAPI): Promise<Panel[]> {
  const panels: Panel[] = []
  for (const slot of DASHBOARD_LAYOUT) {
    try {
      panels.push(await buildPanel(slot, selection, fetcher))
    } catch (error) {
      console.error(`[dashboard] panel ${slot.key} failed:`, error)
      panels.push(failedPanel(slot, selection, error))
    }
  }
  return panels
}
