'use client'

import { COUNTRIES, COUNTRY_CODES, type CountryCode } from '@/lib/catalog/countries'
import { CONFIG } from '@/lib/config'
import { clampYear, maxSelectableYear, type Selection } from '@/lib/selection'

interface SelectionSidebarProps {
  selection: Selection
  onChange: (selection: Selection) => void
}

export function toggleCountry(selection: Selection, code: CountryCode): Selection {
  const selected = selection.countries.includes(code)
  return {
    ...selection,
    countries: selected ? selection.countries.filter((c) => c !== code) : [...selection.countries, code],
  }
}

/** Keeps start <= end by moving the other bound when they cross. */
export function updateYears(selection: Selection, bound: 'start' | 'end', year: number): Selection {
  const value = clampYear(year)
  if (bound === 'start') {
    return { ...selection, startYear: value, endYear: Math.max(value, selection.endYear) }
  }
  return { ...selection, endYear: value, startYear: Math.min(value, selection.startYear) }
}

export function SelectionSidebar({ selection, onChange }: SelectionSidebarProps) {
  const maxYear = maxSelectableYear()

  return (
    <aside className="bg-white dark:bg-gray-800 rounded-lg shadow-md p-6 space-y-6">
      <h2 className="text-lg font-semibold">Settings</h2>
      <fieldset>
        <legend className="text-sm font-medium mb-2">Select countries:</legend>
        <div className="space-y-1">
          {COUNTRY_CODES.map((code) => (
            <label key={code} className="flex items-center gap-2 text-sm">
              <input
                type="checkbox"
                checked={selection.countries.includes(code)}
                onChange={() => onChange(toggleCountry(selection, code))}
              />
              {COUNTRIES[code].displayName}
            </label>
          ))}
        </div>
      </fieldset>
      <fieldset>
        <legend className="text-sm font-medium mb-2">Year range:</legend>
        <div className="flex items-center gap-2 text-sm">
          <label className="flex flex-col">
            From
            <input
              type="number"
              min={CONFIG.selection.minYear}
              max={maxYear}
              value={selection.startYear}
              onChange={(e) => onChange(updateYears(selection, 'start', e.target.valueAsNumber))}
              className="w-24 rounded border border-gray-300 dark:border-gray-600 px-2 py-1 bg-transparent"
            />
          </label>
          <label className="flex flex-col">
            To
            <input
              type="number"
              min={CONFIG.selection.minYear}
              max={maxYear}
              value={selection.endYear}
              onChange={(e) => onChange(updateYears(selection, 'end', e.target.valueAsNumber))}
              className="w-24 rounded border border-gray-300 dark:border-gray-600 px-2 py-1 bg-transparent"
            />
          </label>
        </div>
      </fieldset>
    </aside>
  )
}
