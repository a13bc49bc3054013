'use client'

import { useQueryClient } from '@tanstack/react-query'
import { useState } from 'react'

export function RefreshButton() {
  const queryClient = useQueryClient()
  const [isRefreshing, setIsRefreshing] = useState(false)

  // Server-side series stay cached for their TTL; this only re-requests the panels.
  const handleRefresh = async () => {
    setIsRefreshing(true)
    try {
      await queryClient.invalidateQueries({ queryKey: ['panel'] })
    } finally {
      setIsRefreshing(false)
    }
  }

  return (
    <button
      onClick={() => void handleRefresh()}
      disabled={isRefreshing}
      className="px-4 py-2 bg-blue-600 text-white rounded-md hover:bg-blue-700 disabled:opacity-50 disabled:cursor-not-allowed transition-colors"
    >
      {isRefreshing ? 'Refreshing...' : 'Refresh Data'}
    </button>
  )
}
