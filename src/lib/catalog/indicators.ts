export type ChartKind = 'line' | 'bar'

export interface Indicator {
  name: string
  apiCode: string
  unit: string
  chartKind: ChartKind
  /** Section heading on the dashboard. */
  heading: string
  /** Chart title. */
  title: string
}

export const INDICATOR_KEYS = [
  'gdp',
  'gdpPerCapita',
  'inflation',
  'exports',
  'imports',
  'currentAccount',
  'reserves',
  'interestRate',
  'publicDebt',
  'fiscalDeficit',
  'publicSpending',
  'unemployment',
  'fdi',
] as const

export type IndicatorKey = (typeof INDICATOR_KEYS)[number]

function indicator(entry: Indicator): Readonly<Indicator> {
  return Object.freeze(entry)
}

export const INDICATORS: Readonly<Record<IndicatorKey, Readonly<Indicator>>> = Object.freeze({
  gdp: indicator({ name: 'gdp', apiCode: 'NGDP_R', unit: 'USD', chartKind: 'bar', heading: 'Gross Domestic Product (GDP)', title: 'GDP Evolution' }),
  gdpPerCapita: indicator({ name: 'gdpPerCapita', apiCode: 'NGDPDPC', unit: 'USD', chartKind: 'bar', heading: 'GDP per Capita', title: 'GDP per Capita' }),
  inflation: indicator({ name: 'inflation', apiCode: 'PCPI', unit: '%', chartKind: 'line', heading: 'Annual Inflation', title: 'Inflation Rate' }),
  exports: indicator({ name: 'exports', apiCode: 'TXG_FOB_USD', unit: 'USD', chartKind: 'bar', heading: 'Exports', title: 'Exports' }),
  imports: indicator({ name: 'imports', apiCode: 'TMG_CIF_USD', unit: 'USD', chartKind: 'bar', heading: 'Imports', title: 'Imports' }),
  currentAccount: indicator({ name: 'currentAccount', apiCode: 'BCA', unit: '% GDP', chartKind: 'line', heading: 'Current Account (% GDP)', title: 'Current Account' }),
  reserves: indicator({ name: 'reserves', apiCode: 'RAXG', unit: 'USD', chartKind: 'bar', heading: 'International Reserves', title: 'International Reserves' }),
  interestRate: indicator({ name: 'interestRate', apiCode: 'FPOLM_PA', unit: '%', chartKind: 'line', heading: 'Monetary Policy Interest Rates', title: 'Interest Rates' }),
  publicDebt: indicator({ name: 'publicDebt', apiCode: 'GGXWDG', unit: '% GDP', chartKind: 'bar', heading: 'Public Debt (% GDP)', title: 'Public Debt' }),
  fiscalDeficit: indicator({ name: 'fiscalDeficit', apiCode: 'GGXONLB', unit: '% GDP', chartKind: 'bar', heading: 'Fiscal Deficit (% GDP)', title: 'Fiscal Deficit' }),
  publicSpending: indicator({ name: 'publicSpending', apiCode: 'GGX', unit: '% GDP', chartKind: 'bar', heading: 'Public Spending (% GDP)', title: 'Public Spending' }),
  unemployment: indicator({ name: 'unemployment', apiCode: 'LUR', unit: '%', chartKind: 'bar', heading: 'Unemployment Rate (%)', title: 'Unemployment Rate' }),
  fdi: indicator({ name: 'fdi', apiCode: 'FDI', unit: 'USD', chartKind: 'bar', heading: 'Foreign Direct Investment (USD)', title: 'Foreign Direct Investment' }),
})
