import { imfAPI } from '@/lib/api-clients/imf'
import type { Notice, SeriesFetcher } from '@/lib/api-clients/types'
import type { Country } from '@/lib/catalog/countries'
import type { Indicator, IndicatorKey } from '@/lib/catalog/indicators'
import { pivotRows } from './pivot'
import type { IndicatorPanel, PanelRow, YearRange } from './types'

export function noDataNotice(title: string): Notice {
  return { kind: 'warning', message: `No data available for ${title}` }
}

/**
 * Fetch an indicator for each country in turn and merge the results into one
 * panel. Countries without data are left out; a panel with no rows at all
 * carries a warning instead of a table.
 */
export async function buildIndicatorPanel(
  key: IndicatorKey,
  indicator: Readonly<Indicator>,
  countries: readonly Readonly<Country>[],
  range: YearRange,
  fetcher: SeriesFetcher = imfAPI
): Promise<IndicatorPanel> {
  const notices: Notice[] = []
  const rows: PanelRow[] = []

  for (const country of countries) {
    const series = await fetcher.getSeries(country.apiCode, indicator.apiCode, range.startYear, range.endYear, {
      onNotice: (notice) => notices.push(notice),
    })
    if (series.length === 0) continue
    for (const point of series) {
      rows.push({ year: point.year, value: point.value, country: country.displayName })
    }
  }

  const empty = rows.length === 0
  if (empty) notices.push(noDataNotice(indicator.title))

  return {
    type: 'indicator',
    key,
    heading: indicator.heading,
    title: indicator.title,
    unit: indicator.unit,
    chartKind: indicator.chartKind,
    axis: { x: 'Year', y: indicator.unit },
    rows,
    table: empty ? null : pivotRows(rows),
    notices,
    empty,
  }
}
