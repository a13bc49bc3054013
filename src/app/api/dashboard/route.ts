import { NextResponse } from 'next/server'
import { buildDashboard } from '@/lib/panels/dashboard'
import { parseSelection } from '@/lib/selection'

export const runtime = 'nodejs'
export const dynamic = 'force-dynamic'

export async function GET(request: Request) {
  const { searchParams } = new URL(request.url)
  const parsed = parseSelection(searchParams)
  if (!parsed.success) {
    return NextResponse.json({ error: 'Invalid selection', issues: parsed.issues }, { status: 400 })
  }

  const panels = await buildDashboard(parsed.selection)
  return NextResponse.json({ data: { selection: parsed.selection, panels }, lastUpdated: new Date().toISOString() })
}
