// @vitest-environment jsdom
import { afterEach, describe, expect, it, vi } from 'vitest'
import { cleanup, fireEvent, render, screen, within } from '@testing-library/react'
import { DashboardFooter } from '@/components/dashboard/DashboardFooter'
import { PanelBody, slotHeading } from '@/components/dashboard/PanelCard'
import { PivotTableDisclosure } from '@/components/dashboard/PivotTableDisclosure'
import { SelectionSidebar, toggleCountry, updateYears } from '@/components/dashboard/SelectionSidebar'
import { TitledLegend } from '@/components/charts/TitledLegend'
import { NoticeList } from '@/components/ui/error-message'
import { downloadPivotTable } from '@/lib/export/xlsx'
import type { IndicatorPanel, PivotTable } from '@/lib/panels/types'
import type { Selection } from '@/lib/selection'

vi.mock('@/components/charts/ComparisonChart', async () => {
  const { createElement } = await import('react')
  return {
    ComparisonChart: ({ chartKind }: { chartKind: string }) => createElement('div', { 'data-testid': 'comparison-chart' }, chartKind),
  }
})

vi.mock('@/lib/export/xlsx', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@/lib/export/xlsx')>()
  return { ...actual, downloadPivotTable: vi.fn() }
})

const table: PivotTable = {
  columns: ['Mexico', 'Brazil'],
  rows: [
    { year: 2020, values: { Mexico: 1234.5, Brazil: null } },
    { year: 2021, values: { Mexico: 2, Brazil: 4 } },
  ],
}

const selection: Selection = { countries: ['MEX'], startYear: 2010, endYear: 2023 }

afterEach(() => {
  cleanup()
  vi.mocked(downloadPivotTable).mockClear()
})

describe('PivotTableDisclosure', () => {
  it('renders one row per year and one column per country', () => {
    render(<PivotTableDisclosure table={table} title="Public Debt" unit="% GDP" defaultOpen />)
    const rows = screen.getAllByRole('row')
    expect(rows).toHaveLength(3)
    const [header, first] = rows
    if (!header || !first) throw new Error('table rows missing')
    expect(within(header).getAllByRole('columnheader').map((cell) => cell.textContent)).toEqual(['Year', 'Mexico', 'Brazil'])
    expect(within(first).getAllByRole('cell').map((cell) => cell.textContent)).toEqual(['1,234.5', '—'])
  })

  it('exports the table on request', () => {
    render(<PivotTableDisclosure table={table} title="Public Debt" unit="% GDP" defaultOpen />)
    fireEvent.click(screen.getByRole('button', { name: 'Download XLSX' }))
    expect(downloadPivotTable).toHaveBeenCalledWith(table, 'Public Debt')
  })
})

describe('SelectionSidebar', () => {
  it('toggles countries', () => {
    const onChange = vi.fn()
    render(<SelectionSidebar selection={selection} onChange={onChange} />)
    fireEvent.click(screen.getByLabelText('United States'))
    expect(onChange).toHaveBeenCalledWith({ ...selection, countries: ['MEX', 'USA'] })
  })

  it('keeps the start year before the end year', () => {
    expect(updateYears(selection, 'start', 2023)).toEqual({ ...selection, startYear: 2023, endYear: 2023 })
    expect(updateYears(selection, 'end', 2005)).toEqual({ ...selection, startYear: 2005, endYear: 2005 })
    expect(toggleCountry(selection, 'MEX').countries).toEqual([])
  })
})

describe('PanelBody', () => {
  const base: IndicatorPanel = {
    type: 'indicator',
    key: 'publicDebt',
    heading: 'Public Debt (% GDP)',
    title: 'Public Debt',
    unit: '% GDP',
    chartKind: 'bar',
    axis: { x: 'Year', y: '% GDP' },
    rows: [],
    table: null,
    notices: [{ kind: 'warning', message: 'No data available for Public Debt' }],
    empty: true,
  }

  it('shows the warning instead of a chart when empty', () => {
    render(<PanelBody panel={base} />)
    expect(screen.getByRole('status').textContent).toBe('No data available for Public Debt')
    expect(screen.queryByTestId('comparison-chart')).toBeNull()
  })

  it('renders the chart and keeps per-country errors visible', () => {
    const panel: IndicatorPanel = {
      ...base,
      rows: [{ year: 2020, value: 1234.5, country: 'Mexico' }],
      table,
      notices: [{ kind: 'error', message: 'Failed to fetch GGXWDG for BR: IMF API returned HTTP 500' }],
      empty: false,
    }
    render(<PanelBody panel={panel} />)
    expect(screen.getByTestId('comparison-chart').textContent).toBe('bar')
    expect(screen.getByRole('alert').textContent).toBe('Failed to fetch GGXWDG for BR: IMF API returned HTTP 500')
    // chart caption and table caption
    expect(screen.getAllByText('Public Debt (% GDP)')).toHaveLength(2)
  })
})

describe('dashboard chrome', () => {
  it('uses the section heading for each slot', () => {
    expect(slotHeading({ kind: 'indicator', key: 'gdp' })).toBe('Gross Domestic Product (GDP)')
    expect(slotHeading({ kind: 'trade-balance', key: 'trade-balance' })).toBe('Trade Balance (Latest Year)')
  })

  it('prints the data source and update date', () => {
    render(<DashboardFooter now={new Date(2024, 4, 9)} />)
    expect(screen.getByRole('link', { name: 'International Monetary Fund (IMF)' }).getAttribute('href')).toBe('https://www.imf.org')
    expect(screen.getByText('2024-05-09', { exact: false })).toBeTruthy()
  })

  it('renders nothing without notices', () => {
    const { container } = render(<NoticeList notices={[]} />)
    expect(container.innerHTML).toBe('')
  })
})

describe('TitledLegend', () => {
  it('renders the title and one entry per series', () => {
    render(
      <TitledLegend
        title="Country"
        payload={[
          { value: 'Mexico', color: '#2563eb' },
          { value: 'Brazil', color: '#f59e0b' },
        ]}
      />
    )
    expect(screen.getByText('Country')).toBeDefined()
    const entries = within(screen.getByRole('list', { name: 'Country' })).getAllByRole('listitem')
    expect(entries.map((entry) => entry.textContent)).toEqual(['Mexico', 'Brazil'])
  })
})
