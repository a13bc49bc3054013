import type { ReactNode } from 'react'

interface ChartContainerProps {
  title?: string
  children: ReactNode
}

export function ChartContainer({ title, children }: ChartContainerProps) {
  return (
    <figure className="chart-container">
      {title && <figcaption className="text-sm font-medium text-gray-700 dark:text-gray-300 mb-2">{title}</figcaption>}
      <div className="bg-white dark:bg-gray-800 rounded-md p-2">{children}</div>
    </figure>
  )
}
