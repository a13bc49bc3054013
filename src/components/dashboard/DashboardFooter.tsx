import { format } from 'date-fns'
import { CONFIG } from '@/lib/config'

export function DashboardFooter({ now = new Date() }: { now?: Date }) {
  return (
    <footer className="mt-8 border-t border-gray-200 dark:border-gray-700 pt-4">
      <div className="rounded-md bg-blue-50 dark:bg-blue-900/20 p-4 text-sm text-blue-900 dark:text-blue-200 space-y-1">
        <p>
          <strong>Data source:</strong>{' '}
          <a href={CONFIG.api.imf.siteUrl} className="underline" target="_blank" rel="noreferrer">
            International Monetary Fund (IMF)
          </a>
        </p>
        <p>
          <strong>Last updated:</strong> {format(now, 'yyyy-MM-dd')}
        </p>
        <p>
          <strong>Note:</strong> {CONFIG.footer.dataLagNote}
        </p>
      </div>
    </footer>
  )
}
