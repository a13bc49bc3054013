import { imfAPI } from '@/lib/api-clients/imf'
import type { Notice, SeriesFetcher } from '@/lib/api-clients/types'
import type { Country } from '@/lib/catalog/countries'
import { INDICATORS } from '@/lib/catalog/indicators'
import { TRADE_BALANCE_HEADING, TRADE_BALANCE_KEY } from '@/lib/catalog/layout'
import { noDataNotice } from './indicator-panel'
import type { TradeBalancePanel, TradeBalanceRow } from './types'

/**
 * Compare exports and imports for a single year. A country is shown only
 * when both flows have a value for that year.
 */
export async function buildTradeBalancePanel(
  countries: readonly Readonly<Country>[],
  year: number,
  fetcher: SeriesFetcher = imfAPI
): Promise<TradeBalancePanel> {
  const notices: Notice[] = []
  const onNotice = (notice: Notice) => notices.push(notice)
  const rows: TradeBalanceRow[] = []

  for (const country of countries) {
    const exportsSeries = await fetcher.getSeries(country.apiCode, INDICATORS.exports.apiCode, year, year, { onNotice })
    const importsSeries = await fetcher.getSeries(country.apiCode, INDICATORS.imports.apiCode, year, year, { onNotice })
    const exported = exportsSeries[0]
    const imported = importsSeries[0]
    if (!exported || !imported) continue

    rows.push(
      { country: country.displayName, kind: 'Exports', value: exported.value },
      { country: country.displayName, kind: 'Imports', value: imported.value }
    )
  }

  const title = `Trade Balance (${year})`
  const empty = rows.length === 0
  if (empty) notices.push(noDataNotice(title))

  return {
    type: 'trade-balance',
    key: TRADE_BALANCE_KEY,
    heading: TRADE_BALANCE_HEADING,
    title,
    year,
    unit: INDICATORS.exports.unit,
    rows,
    notices,
    empty,
  }
}
