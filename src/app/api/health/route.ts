import { NextResponse } from 'next/server'
import { imfAPI } from '@/lib/api-clients/imf'
import { CONFIG } from '@/lib/config'

export const runtime = 'nodejs'
export const dynamic = 'force-dynamic'

export async function GET() {
  return NextResponse.json({
    status: 'healthy',
    timestamp: new Date().toISOString(),
    services: {
      cache: { entries: imfAPI.cache.size, inFlight: imfAPI.cache.pending },
      imf: { baseUrl: CONFIG.api.imf.baseUrl },
    },
    uptime: process.uptime(),
  })
}
