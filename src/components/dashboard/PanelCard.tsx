'use client'

import { ChartContainer } from '@/components/charts/ChartContainer'
import { ComparisonChart } from '@/components/charts/ComparisonChart'
import { TradeBalanceChart } from '@/components/charts/TradeBalanceChart'
import { ErrorMessage, NoticeList } from '@/components/ui/error-message'
import { usePanel } from '@/hooks/use-panels'
import { INDICATORS } from '@/lib/catalog/indicators'
import { TRADE_BALANCE_HEADING, type PanelSlot } from '@/lib/catalog/layout'
import type { Panel } from '@/lib/panels/types'
import type { Selection } from '@/lib/selection'
import { formatRelativeTime } from '@/lib/utils/format'
import { PivotTableDisclosure } from './PivotTableDisclosure'

interface PanelCardProps {
  index: number
  slot: PanelSlot
  selection: Selection
}

export function slotHeading(slot: PanelSlot): string {
  return slot.kind === 'trade-balance' ? TRADE_BALANCE_HEADING : INDICATORS[slot.key].heading
}

export function PanelBody({ panel }: { panel: Panel }) {
  if (panel.empty) return <NoticeList notices={panel.notices} />

  // per-country failures stay visible next to the countries that did load
  const errors = panel.notices.filter((notice) => notice.kind === 'error')

  if (panel.type === 'trade-balance') {
    return (
      <>
        <NoticeList notices={errors} />
        <ChartContainer title={panel.title}>
          <TradeBalanceChart rows={panel.rows} unit={panel.unit} />
        </ChartContainer>
      </>
    )
  }

  return (
    <>
      <NoticeList notices={errors} />
      <ChartContainer title={`${panel.title} (${panel.unit})`}>
        {panel.table && <ComparisonChart table={panel.table} chartKind={panel.chartKind} unit={panel.unit} xLabel={panel.axis.x} />}
      </ChartContainer>
      {panel.table && <PivotTableDisclosure table={panel.table} title={panel.title} unit={panel.unit} />}
    </>
  )
}

export function PanelCard({ index, slot, selection }: PanelCardProps) {
  const { data, error, isLoading, refetch } = usePanel(slot.key, selection)

  return (
    <section className="bg-white dark:bg-gray-800 rounded-lg shadow-md p-6 hover:shadow-lg transition-shadow">
      <header className="mb-4 flex items-baseline justify-between gap-4">
        <h2 className="text-lg font-semibold text-gray-900 dark:text-white">
          {index}. {slotHeading(slot)}
        </h2>
        {data && <span className="text-xs text-gray-500 dark:text-gray-400">Updated {formatRelativeTime(data.lastUpdated)}</span>}
      </header>
      {isLoading && <div className="h-64 animate-pulse rounded-md bg-gray-100 dark:bg-gray-700" />}
      {error && <ErrorMessage title="Failed to load data" message={error.message} onRetry={() => void refetch()} />}
      {data && <PanelBody panel={data.panel} />}
    </section>
  )
}
