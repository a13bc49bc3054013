'use client'

import type { PivotTable } from '@/lib/panels/types'
import { downloadPivotTable } from '@/lib/export/xlsx'
import { formatNumber } from '@/lib/utils/format'

interface PivotTableDisclosureProps {
  table: PivotTable
  title: string
  unit: string
  defaultOpen?: boolean
}

export function PivotTableDisclosure({ table, title, unit, defaultOpen = false }: PivotTableDisclosureProps) {
  return (
    <details className="mt-4 group" open={defaultOpen}>
      <summary className="cursor-pointer text-sm font-medium text-blue-600 dark:text-blue-400">View tabular data</summary>
      <div className="mt-2 overflow-x-auto">
        <table className="min-w-full text-sm">
          <caption className="text-left text-xs text-gray-500 dark:text-gray-400 mb-1">
            {title} ({unit})
          </caption>
          <thead>
            <tr className="border-b border-gray-200 dark:border-gray-700">
              <th scope="col" className="px-2 py-1 text-left">
                Year
              </th>
              {table.columns.map((column) => (
                <th key={column} scope="col" className="px-2 py-1 text-right">
                  {column}
                </th>
              ))}
            </tr>
          </thead>
          <tbody>
            {table.rows.map((row) => (
              <tr key={row.year} className="border-b border-gray-100 dark:border-gray-800">
                <th scope="row" className="px-2 py-1 text-left font-normal">
                  {row.year}
                </th>
                {table.columns.map((column) => {
                  const value = row.values[column]
                  return (
                    <td key={column} className="px-2 py-1 text-right tabular-nums">
                      {value == null ? '—' : formatNumber(value)}
                    </td>
                  )
                })}
              </tr>
            ))}
          </tbody>
        </table>
        <button
          type="button"
          onClick={() => downloadPivotTable(table, title)}
          className="mt-2 text-sm text-blue-600 dark:text-blue-400 hover:underline"
        >
          Download XLSX
        </button>
      </div>
    </details>
  )
}
