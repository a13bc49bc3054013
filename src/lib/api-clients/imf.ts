import { CONFIG } from '@/lib/config'
import { TTLCache, CACHE_KEYS, CACHE_TTL } from '@/lib/cache/memory'
import { fetchTextWithTimeout, sleep, type FetchLike, type TextResponse } from '@/lib/utils/http'
import {
  APIError,
  SchemaMismatchError,
  TransportError,
  classifyFetchError,
  getErrorMessage,
} from '@/lib/utils/errors'
import {
  IMFIndicatorSchema,
  IMFResponseSchema,
  IMFSeriesSchema,
  type FetchSeriesOptions,
  type IMFSeries,
  type ObservationPoint,
  type SeriesFetcher,
  type SeriesResult,
} from './types'

const YEAR_KEY = /^\d{1,4}$/
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i

/**
 * Coerce an upstream value to a finite number, or null when it cannot be read as one.
 */
export function coerceObservationValue(raw: unknown): number | null {
  if (typeof raw === 'number') return Number.isFinite(raw) ? raw : null
  if (typeof raw !== 'string') return null
  const trimmed = raw.trim()
  if (!DECIMAL.test(trimmed)) return null
  const value = Number(trimmed)
  return Number.isFinite(value) ? value : null
}

/**
 * Reshape a `{ "<year>": value }` mapping into observations ordered by year.
 * Points outside the requested range or without a numeric value are dropped.
 */
export function normalizeSeries(series: IMFSeries, startYear: number, endYear: number): SeriesResult {
  const byYear = new Map<number, number>()
  for (const [key, raw] of Object.entries(series)) {
    const trimmed = key.trim()
    if (!YEAR_KEY.test(trimmed)) continue
    const year = Number(trimmed)
    if (year < startYear || year > endYear || byYear.has(year)) continue
    const value = coerceObservationValue(raw)
    if (value === null) continue
    byYear.set(year, value)
  }

  const points: ObservationPoint[] = [...byYear.entries()]
    .sort(([a], [b]) => a - b)
    .map(([year, value]) => Object.freeze({ year, value }))
  return Object.freeze(points)
}

export interface IMFClientOptions {
  baseUrl?: string
  timeoutMs?: number
  requestDelayMs?: number
  cache?: TTLCache<SeriesResult>
  fetch?: FetchLike
}

export class IMFDataMapperClient implements SeriesFetcher {
  private readonly baseUrl: string
  private readonly timeoutMs: number
  private readonly requestDelayMs: number
  private readonly fetchImpl: FetchLike | undefined
  readonly cache: TTLCache<SeriesResult>

  constructor(options: IMFClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? CONFIG.api.imf.baseUrl).replace(/\/+$/, '')
    this.timeoutMs = options.timeoutMs ?? CONFIG.api.imf.timeoutMs
    this.requestDelayMs = options.requestDelayMs ?? CONFIG.api.imf.requestDelayMs
    this.fetchImpl = options.fetch
    this.cache = options.cache ?? new TTLCache<SeriesResult>({ ttlSeconds: CACHE_TTL.SERIES })
  }

  buildSeriesUrl(countryApiCode: string, indicatorApiCode: string, startYear: number, endYear: number): string {
    const url = new URL(`${this.baseUrl}/${encodeURIComponent(indicatorApiCode)}/${encodeURIComponent(countryApiCode)}`)
    url.searchParams.set('periods', `${startYear}-${endYear}`)
    return url.toString()
  }

  private async fetchSeriesRaw(
    countryApiCode: string,
    indicatorApiCode: string,
    startYear: number,
    endYear: number
  ): Promise<SeriesResult> {
    const url = this.buildSeriesUrl(countryApiCode, indicatorApiCode, startYear, endYear)
    const provider = CONFIG.api.imf.provider

    let res: TextResponse
    try {
      res = await fetchTextWithTimeout(url, this.timeoutMs, { headers: { accept: 'application/json' } }, this.fetchImpl)
    } catch (error) {
      throw new TransportError(`IMF request failed: ${getErrorMessage(error)}`, provider, error)
    }

    if (!res.ok) {
      const msg = `IMF API returned HTTP ${res.status}${res.body ? `: ${res.body.slice(0, 200)}` : ''}`
      throw new APIError(msg, res.status, provider)
    }

    let json: unknown
    try {
      json = JSON.parse(res.body)
    } catch (error) {
      throw new SchemaMismatchError(`IMF response is not valid JSON: ${getErrorMessage(error)}`)
    }

    const parsed = IMFResponseSchema.safeParse(json)
    if (!parsed.success) {
      throw new SchemaMismatchError('Invalid IMF response: ' + JSON.stringify(parsed.error.issues), ['values'])
    }

    // Only the requested path is checked; other indicators and countries in the payload are ignored.
    const byCountry = IMFIndicatorSchema.safeParse(parsed.data.values[indicatorApiCode])
    const series = byCountry.success ? IMFSeriesSchema.safeParse(byCountry.data[countryApiCode]) : null
    if (!series || !series.success) {
      throw new SchemaMismatchError(`IMF response has no series at values.${indicatorApiCode}.${countryApiCode}`, [
        'values',
        indicatorApiCode,
        countryApiCode,
      ])
    }

    return normalizeSeries(series.data, startYear, endYear)
  }

  /**
   * Fetch one country's series for an indicator and year range.
   *
   * Never rejects: transport, status and schema failures are logged, reported
   * through `onNotice`, and resolve to an empty series. Successful results are
   * cached for an hour; each uncached fetch is followed by a short pause.
   */
  async getSeries(
    countryApiCode: string,
    indicatorApiCode: string,
    startYear: number,
    endYear: number,
    options: FetchSeriesOptions = {}
  ): Promise<SeriesResult> {
    if (!Number.isInteger(startYear) || !Number.isInteger(endYear) || startYear > endYear) {
      console.warn(`[imf] skipping ${indicatorApiCode}/${countryApiCode}: empty year range ${startYear}-${endYear}`)
      return []
    }

    const cacheKey = CACHE_KEYS.IMF_SERIES(countryApiCode, indicatorApiCode, startYear, endYear)
    try {
      return await this.cache.getOrLoad(cacheKey, async () => {
        const series = await this.fetchSeriesRaw(countryApiCode, indicatorApiCode, startYear, endYear)
        await sleep(this.requestDelayMs)
        return series
      })
    } catch (error) {
      const message = `Failed to fetch ${indicatorApiCode} for ${countryApiCode}: ${getErrorMessage(error)}`
      console.error(`[imf] ${classifyFetchError(error)} failure:`, message)
      options.onNotice?.({ kind: 'error', message })
      return []
    }
  }
}

export const imfAPI = new IMFDataMapperClient()
