import { NextResponse } from 'next/server'
import { COUNTRIES, COUNTRY_CODES } from '@/lib/catalog/countries'
import { INDICATORS, INDICATOR_KEYS } from '@/lib/catalog/indicators'
import { DASHBOARD_LAYOUT } from '@/lib/catalog/layout'
import { CONFIG } from '@/lib/config'
import { defaultSelection, maxSelectableYear } from '@/lib/selection'

export const runtime = 'nodejs'

export async function GET() {
  return NextResponse.json({
    data: {
      countries: COUNTRY_CODES.map((code) => COUNTRIES[code]),
      indicators: INDICATOR_KEYS.map((key) => INDICATORS[key]),
      layout: DASHBOARD_LAYOUT,
      selection: {
        minYear: CONFIG.selection.minYear,
        maxYear: maxSelectableYear(),
        defaults: defaultSelection(),
      },
    },
  })
}
