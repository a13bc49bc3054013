import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { IMFDataMapperClient } from '@/lib/api-clients/imf'
import { sleep } from '@/lib/utils/http'
import { imfPayload, stubFetch } from './helpers/imf'

vi.mock('@/lib/utils/http', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@/lib/utils/http')>()
  return { ...actual, sleep: vi.fn(async (_ms: number) => {}) }
})

describe('politeness delay', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
    vi.mocked(sleep).mockClear()
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('pauses after a network fetch but not on a cache hit', async () => {
    const fetchImpl = stubFetch(imfPayload('GGX', 'FR', { '2021': 55.4 }))
    const client = new IMFDataMapperClient({ baseUrl: 'https://imf.test/api/v1', requestDelayMs: 500, fetch: fetchImpl })

    await client.getSeries('FR', 'GGX', 2021, 2021)
    expect(sleep).toHaveBeenCalledTimes(1)
    expect(sleep).toHaveBeenCalledWith(500)

    await client.getSeries('FR', 'GGX', 2021, 2021)
    expect(sleep).toHaveBeenCalledTimes(1)
  })

  it('does not pause after a failed fetch', async () => {
    const fetchImpl = stubFetch({ error: 'down' }, 502)
    const client = new IMFDataMapperClient({ baseUrl: 'https://imf.test/api/v1', requestDelayMs: 500, fetch: fetchImpl })

    await client.getSeries('FR', 'GGX', 2021, 2021)
    expect(sleep).not.toHaveBeenCalled()
  })
})
