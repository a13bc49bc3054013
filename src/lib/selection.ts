import { z } from 'zod'
import { CONFIG } from '@/lib/config'
import { COUNTRY_CODES, type CountryCode } from '@/lib/catalog/countries'

export interface Selection {
  countries: CountryCode[]
  startYear: number
  endYear: number
}

export type SelectionParseResult = { success: true; selection: Selection } | { success: false; issues: string[] }

export function maxSelectableYear(now: Date = new Date()): number {
  return now.getFullYear()
}

export function defaultSelection(now: Date = new Date()): Selection {
  const maxYear = maxSelectableYear(now)
  return {
    countries: [...CONFIG.selection.defaultCountries],
    startYear: Math.min(CONFIG.selection.defaultStartYear, maxYear),
    endYear: Math.min(CONFIG.selection.defaultEndYear, maxYear),
  }
}

function buildSelectionSchema(now: Date) {
  const defaults = defaultSelection(now)
  const year = z.coerce.number().int().min(CONFIG.selection.minYear).max(maxSelectableYear(now))

  return z
    .object({
      countries: z
        .string()
        .optional()
        .transform((raw) =>
          raw === undefined
            ? defaults.countries
            : raw
                .split(',')
                .map((code) => code.trim().toUpperCase())
                .filter(Boolean)
        )
        .pipe(z.array(z.enum(COUNTRY_CODES)))
        .transform((codes) => [...new Set(codes)]),
      start: year.default(defaults.startYear),
      end: year.default(defaults.endYear),
    })
    .refine((value) => value.start <= value.end, {
      message: 'start year must not be after end year',
      path: ['start'],
    })
}

/**
 * Read `countries`, `start` and `end` from a query string, applying the
 * dashboard defaults for anything missing.
 */
export function parseSelection(params: URLSearchParams, now: Date = new Date()): SelectionParseResult {
  const parsed = buildSelectionSchema(now).safeParse({
    countries: params.get('countries') ?? undefined,
    start: params.get('start') ?? undefined,
    end: params.get('end') ?? undefined,
  })
  if (!parsed.success) {
    return {
      success: false,
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || 'query'}: ${issue.message}`),
    }
  }
  const { countries, start, end } = parsed.data
  return { success: true, selection: { countries, startYear: start, endYear: end } }
}

export function toSearchParams(selection: Selection): URLSearchParams {
  return new URLSearchParams({
    countries: selection.countries.join(','),
    start: String(selection.startYear),
    end: String(selection.endYear),
  })
}

/** Clamp a year typed into the sidebar to the selectable bounds. */
export function clampYear(year: number, now: Date = new Date()): number {
  if (!Number.isFinite(year)) return CONFIG.selection.minYear
  return Math.min(maxSelectableYear(now), Math.max(CONFIG.selection.minYear, Math.trunc(year)))
}
