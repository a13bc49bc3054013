import { describe, expect, it } from 'vitest'
import { clampYear, defaultSelection, parseSelection, toSearchParams } from '@/lib/selection'

const now = new Date(2026, 5, 1)

describe('parseSelection', () => {
  it('falls back to the dashboard defaults', () => {
    expect(parseSelection(new URLSearchParams(), now)).toEqual({
      success: true,
      selection: { countries: ['MEX', 'USA', 'BRA'], startYear: 2010, endYear: 2023 },
    })
  })

  it('normalises and de-duplicates country codes', () => {
    const result = parseSelection(new URLSearchParams('countries=usa, chl,USA&start=2015&end=2020'), now)
    expect(result).toEqual({
      success: true,
      selection: { countries: ['USA', 'CHL'], startYear: 2015, endYear: 2020 },
    })
  })

  it('accepts an empty country list', () => {
    const result = parseSelection(new URLSearchParams('countries='), now)
    expect(result.success && result.selection.countries).toEqual([])
  })

  it('rejects unknown countries', () => {
    const result = parseSelection(new URLSearchParams('countries=USA,XXX'), now)
    expect(result.success).toBe(false)
  })

  it('rejects years outside 1990 through the current year', () => {
    expect(parseSelection(new URLSearchParams('start=1989'), now).success).toBe(false)
    expect(parseSelection(new URLSearchParams('end=2027'), now).success).toBe(false)
    expect(parseSelection(new URLSearchParams('start=1990&end=2026'), now).success).toBe(true)
  })

  it('rejects a start year after the end year', () => {
    expect(parseSelection(new URLSearchParams('start=2020&end=2019'), now)).toEqual({
      success: false,
      issues: ['start: start year must not be after end year'],
    })
  })
})

describe('selection helpers', () => {
  it('clamps the default end year to the current year', () => {
    expect(defaultSelection(new Date(2020, 0, 1))).toEqual({ countries: ['MEX', 'USA', 'BRA'], startYear: 2010, endYear: 2020 })
  })

  it('clamps typed years to the selectable bounds', () => {
    expect(clampYear(1950, now)).toBe(1990)
    expect(clampYear(2031, now)).toBe(2026)
    expect(clampYear(2015.7, now)).toBe(2015)
    expect(clampYear(Number.NaN, now)).toBe(1990)
  })

  it('serialises to the query string the API reads back', () => {
    const selection = { countries: ['MEX' as const, 'USA' as const], startYear: 2012, endYear: 2018 }
    expect(parseSelection(toSearchParams(selection), now)).toEqual({ success: true, selection })
  })
})
