import { useMemo } from 'react'
import { ResponsiveContainer, LineChart, BarChart, Line, Bar, XAxis, YAxis, CartesianGrid, Tooltip, Legend } from 'recharts'
import type { ChartKind } from '@/lib/catalog/indicators'
import type { PivotTable } from '@/lib/panels/types'
import { formatValue } from '@/lib/utils/format'
import { seriesColor } from './palette'
import { TitledLegend } from './TitledLegend'

interface ComparisonChartProps {
  table: PivotTable
  chartKind: ChartKind
  unit: string
  xLabel?: string
  legendTitle?: string
}

type ChartDatum = { year: number } & Record<string, number | null>

export function ComparisonChart({ table, chartKind, unit, xLabel = 'Year', legendTitle = 'Country' }: ComparisonChartProps) {
  const data = useMemo<ChartDatum[]>(() => table.rows.map((row) => ({ ...row.values, year: row.year })), [table])

  if (data.length === 0) {
    return <div className="text-sm text-gray-500 dark:text-gray-400 p-4 text-center">No data available</div>
  }

  const xAxis = (
    <XAxis
      dataKey="year"
      stroke="#666"
      fontSize={12}
      label={{ value: xLabel, position: 'insideBottom', offset: -4, fontSize: 12 }}
    />
  )
  const yAxis = (
    <YAxis
      stroke="#666"
      fontSize={12}
      width={72}
      tickFormatter={(v: number) => formatValue(v, unit)}
      label={{ value: unit, angle: -90, position: 'insideLeft', fontSize: 12 }}
    />
  )
  // shared tooltip: every country for the hovered year
  const tooltip = (
    <Tooltip
      shared
      formatter={(value: number, name: string) => [formatValue(Number(value), unit), name]}
      labelFormatter={(label) => `${xLabel} ${label}`}
      contentStyle={{ backgroundColor: '#fff', border: '1px solid #ccc', borderRadius: '4px' }}
    />
  )

  return (
    <ResponsiveContainer width="100%" height={320}>
      {chartKind === 'line' ? (
        <LineChart data={data} margin={{ left: 8, right: 8, top: 8, bottom: 16 }}>
          <CartesianGrid strokeDasharray="3 3" stroke="#e0e0e0" />
          {xAxis}
          {yAxis}
          {tooltip}
          <Legend verticalAlign="top" content={<TitledLegend title={legendTitle} />} />
          {table.columns.map((country, i) => (
            <Line
              key={country}
              type="monotone"
              dataKey={country}
              name={country}
              stroke={seriesColor(i)}
              strokeWidth={2}
              dot={{ r: 3 }}
              connectNulls
            />
          ))}
        </LineChart>
      ) : (
        <BarChart data={data} margin={{ left: 8, right: 8, top: 8, bottom: 16 }}>
          <CartesianGrid strokeDasharray="3 3" stroke="#e0e0e0" />
          {xAxis}
          {yAxis}
          {tooltip}
          <Legend verticalAlign="top" content={<TitledLegend title={legendTitle} />} />
          {table.columns.map((country, i) => (
            <Bar key={country} dataKey={country} name={country} fill={seriesColor(i)} />
          ))}
        </BarChart>
      )}
    </ResponsiveContainer>
  )
}
