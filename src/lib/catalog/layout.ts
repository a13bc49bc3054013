import type { IndicatorKey } from './indicators'

export const TRADE_BALANCE_KEY = 'trade-balance'
export const TRADE_BALANCE_HEADING = 'Trade Balance (Latest Year)'

export type PanelKey = IndicatorKey | typeof TRADE_BALANCE_KEY

export type PanelSlot =
  | { kind: 'indicator'; key: IndicatorKey }
  | { kind: 'trade-balance'; key: typeof TRADE_BALANCE_KEY }

// Exports and imports only appear inside the trade balance comparison.
export const DASHBOARD_LAYOUT: readonly PanelSlot[] = [
  { kind: 'indicator', key: 'gdp' },
  { kind: 'indicator', key: 'gdpPerCapita' },
  { kind: 'indicator', key: 'inflation' },
  { kind: 'trade-balance', key: TRADE_BALANCE_KEY },
  { kind: 'indicator', key: 'currentAccount' },
  { kind: 'indicator', key: 'reserves' },
  { kind: 'indicator', key: 'interestRate' },
  { kind: 'indicator', key: 'publicDebt' },
  { kind: 'indicator', key: 'fiscalDeficit' },
  { kind: 'indicator', key: 'publicSpending' },
  { kind: 'indicator', key: 'unemployment' },
  { kind: 'indicator', key: 'fdi' },
]

export function findPanelSlot(key: string): PanelSlot | null {
  return DASHBOARD_LAYOUT.find((slot) => slot.key === key) ?? null
}
