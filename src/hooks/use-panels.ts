'use client'

import { useQuery, UseQueryResult } from '@tanstack/react-query'
import type { PanelKey } from '@/lib/catalog/layout'
import type { Panel } from '@/lib/panels/types'
import { toSearchParams, type Selection } from '@/lib/selection'

interface APIResponse<T> {
  data: T
  lastUpdated: string
}

export interface PanelPayload {
  panel: Panel
  lastUpdated: string
}

export async function fetchPanel(key: PanelKey, selection: Selection): Promise<PanelPayload> {
  const response = await fetch(`/api/panels/${key}?${toSearchParams(selection).toString()}`, { cache: 'no-store' })
  if (!response.ok) throw new Error(`Failed to fetch ${key} panel (HTTP ${response.status})`)
  const json: APIResponse<Panel> = await response.json()
  return { panel: json.data, lastUpdated: json.lastUpdated }
}

export function panelQueryKey(key: PanelKey, selection: Selection) {
  return ['panel', key, selection.countries.join(','), selection.startYear, selection.endYear] as const
}

export function usePanel(key: PanelKey, selection: Selection): UseQueryResult<PanelPayload> {
  return useQuery({
    queryKey: panelQueryKey(key, selection),
    queryFn: () => fetchPanel(key, selection),
    staleTime: 60 * 60 * 1000,
    retry: false,
  })
}
