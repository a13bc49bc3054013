import type { LegendProps } from 'recharts'

type LegendEntry = NonNullable<LegendProps['payload']>[number]

interface TitledLegendProps {
  title: string
  /** Filled in by recharts when passed as `<Legend content={...} />`. */
  payload?: LegendEntry[]
}

export function TitledLegend({ title, payload = [] }: TitledLegendProps) {
  return (
    <div className="flex flex-wrap items-center justify-center gap-3 text-xs text-gray-700 dark:text-gray-300 pb-2">
      <span className="font-semibold">{title}</span>
      <ul className="flex flex-wrap gap-3" aria-label={title}>
        {payload.map((entry) => (
          <li key={String(entry.value)} className="flex items-center gap-1">
            <span className="inline-block w-3 h-3 rounded-sm" style={{ backgroundColor: entry.color }} />
            {String(entry.value)}
          </li>
        ))}
      </ul>
    </div>
  )
}
