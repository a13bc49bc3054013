'use client'

import { useState } from 'react'
import { DashboardFooter } from '@/components/dashboard/DashboardFooter'
import { PanelCard } from '@/components/dashboard/PanelCard'
import { RefreshButton } from '@/components/dashboard/RefreshButton'
import { SelectionSidebar } from '@/components/dashboard/SelectionSidebar'
import { DASHBOARD_LAYOUT } from '@/lib/catalog/layout'
import { CONFIG } from '@/lib/config'
import { defaultSelection, type Selection } from '@/lib/selection'

export default function DashboardPage() {
  const [selection, setSelection] = useState<Selection>(() => defaultSelection())

  return (
    <main className="mx-auto max-w-screen-2xl p-6">
      <header className="mb-6 flex items-center justify-between">
        <h1 className="text-2xl font-bold">🌍 {CONFIG.app.title}</h1>
        <RefreshButton />
      </header>
      <div className="grid gap-6 lg:grid-cols-[18rem_1fr]">
        <SelectionSidebar selection={selection} onChange={setSelection} />
        <div className="space-y-6">
          {DASHBOARD_LAYOUT.map((slot, i) => (
            <PanelCard key={slot.key} index={i + 1} slot={slot} selection={selection} />
          ))}
        </div>
      </div>
      <DashboardFooter />
    </main>
  )
}
