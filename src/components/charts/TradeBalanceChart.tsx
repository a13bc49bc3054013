import { useMemo } from 'react'
import { ResponsiveContainer, BarChart, Bar, XAxis, YAxis, CartesianGrid, Tooltip, Legend } from 'recharts'
import { toTradeBalanceChartData } from '@/lib/panels/pivot'
import type { TradeBalanceRow, TradeFlow } from '@/lib/panels/types'
import { formatValue } from '@/lib/utils/format'

interface TradeBalanceChartProps {
  rows: TradeBalanceRow[]
  unit: string
}

const FLOWS: Array<{ key: TradeFlow; color: string }> = [
  { key: 'Exports', color: '#16a34a' },
  { key: 'Imports', color: '#dc2626' },
]

export function TradeBalanceChart({ rows, unit }: TradeBalanceChartProps) {
  const data = useMemo(() => toTradeBalanceChartData(rows), [rows])

  if (data.length === 0) {
    return <div className="text-sm text-gray-500 dark:text-gray-400 p-4 text-center">No data available</div>
  }

  return (
    <ResponsiveContainer width="100%" height={300}>
      <BarChart data={data} margin={{ left: 8, right: 8, top: 8, bottom: 8 }}>
        <CartesianGrid strokeDasharray="3 3" stroke="#e0e0e0" />
        <XAxis dataKey="country" stroke="#666" fontSize={12} />
        <YAxis stroke="#666" fontSize={12} width={72} tickFormatter={(v: number) => formatValue(v, unit)} />
        <Tooltip
          formatter={(value: number, name: string) => [formatValue(Number(value), unit), name]}
          contentStyle={{ backgroundColor: '#fff', border: '1px solid #ccc', borderRadius: '4px' }}
        />
        <Legend verticalAlign="top" />
        {FLOWS.map((flow) => (
          <Bar key={flow.key} dataKey={flow.key} name={flow.key} fill={flow.color} />
        ))}
      </BarChart>
    </ResponsiveContainer>
  )
}
