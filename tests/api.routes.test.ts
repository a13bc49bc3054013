import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { GET as getPanel } from '@/app/api/panels/[panel]/route'
import { GET as getDashboard } from '@/app/api/dashboard/route'
import { GET as getCatalog } from '@/app/api/catalog/route'
import { GET as getHealth } from '@/app/api/health/route'
import { imfAPI } from '@/lib/api-clients/imf'
import { imfPayload, jsonResponse } from './helpers/imf'

// Upstream stand-in: Mexico is down, every other country answers 2020-2021.
const upstream = vi.fn(async (input: string | URL | Request) => {
  const url = new URL(typeof input === 'string' ? input : input instanceof URL ? input.href : input.url)
  const [indicator = '', country = ''] = url.pathname.split('/').slice(-2)
  if (country === 'MX') return jsonResponse({ error: 'unavailable' }, 500)
  return jsonResponse(imfPayload(indicator, country, { '2020': '10', '2021': 12.5 }))
})

describe('API routes', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
    vi.stubGlobal('fetch', upstream)
    upstream.mockClear()
    imfAPI.cache.clear()
  })

  afterEach(() => {
    vi.unstubAllGlobals()
    vi.restoreAllMocks()
  })

  it('returns an indicator panel that skips the failing country', async () => {
    const res = await getPanel(new Request('http://localhost/api/panels/gdp?countries=MEX,USA&start=2020&end=2021'), {
      params: { panel: 'gdp' },
    })
    expect(res.status).toBe(200)
    const body = await res.json()
    expect(body.data.rows).toEqual([
      { year: 2020, value: 10, country: 'United States' },
      { year: 2021, value: 12.5, country: 'United States' },
    ])
    expect(body.data.notices).toEqual([
      { kind: 'error', message: 'Failed to fetch NGDP_R for MX: IMF API returned HTTP 500: {"error":"unavailable"}' },
    ])
    expect(upstream).toHaveBeenCalledTimes(2)
  })

  it('serves a repeated panel request from the cache', async () => {
    const request = () => new Request('http://localhost/api/panels/inflation?countries=USA&start=2020&end=2021')
    await getPanel(request(), { params: { panel: 'inflation' } })
    await getPanel(request(), { params: { panel: 'inflation' } })
    expect(upstream).toHaveBeenCalledTimes(1)
  })

  it('returns the trade balance panel for the end year', async () => {
    const res = await getPanel(new Request('http://localhost/api/panels/trade-balance?countries=USA&start=2015&end=2021'), {
      params: { panel: 'trade-balance' },
    })
    const body = await res.json()
    expect(body.data.title).toBe('Trade Balance (2021)')
    expect(body.data.rows).toEqual([
      { country: 'United States', kind: 'Exports', value: 12.5 },
      { country: 'United States', kind: 'Imports', value: 12.5 },
    ])
  })

  it('rejects unknown panels and invalid selections', async () => {
    const missing = await getPanel(new Request('http://localhost/api/panels/nope'), { params: { panel: 'nope' } })
    expect(missing.status).toBe(404)

    const invalid = await getPanel(new Request('http://localhost/api/panels/gdp?start=1980'), { params: { panel: 'gdp' } })
    expect(invalid.status).toBe(400)
    const body = await invalid.json()
    expect(body.error).toBe('Invalid selection')
    expect(upstream).not.toHaveBeenCalled()
  })

  it('builds the whole dashboard', async () => {
    const res = await getDashboard(new Request('http://localhost/api/dashboard?countries=USA&start=2021&end=2021'))
    const body = await res.json()
    expect(body.data.panels).toHaveLength(12)
    expect(body.data.selection).toEqual({ countries: ['USA'], startYear: 2021, endYear: 2021 })
  })

  it('lists the catalog', async () => {
    const body = await (await getCatalog()).json()
    expect(body.data.countries).toHaveLength(12)
    expect(body.data.indicators).toHaveLength(13)
    expect(body.data.countries[0]).toEqual({ code: 'USA', displayName: 'United States', apiCode: 'US' })
  })

  it('reports cache occupancy in the health check', async () => {
    await getPanel(new Request('http://localhost/api/panels/fdi?countries=USA&start=2020&end=2021'), { params: { panel: 'fdi' } })
    const body = await (await getHealth()).json()
    expect(body.status).toBe('healthy')
    expect(body.services.cache).toEqual({ entries: 1, inFlight: 0 })
  })
})
