import type { Notice, NoticeKind } from '@/lib/api-clients/types'

interface ErrorMessageProps {
  title?: string
  message: string
  kind?: NoticeKind
  onRetry?: () => void
}

const STYLES: Record<NoticeKind, { box: string; title: string; text: string }> = {
  error: {
    box: 'bg-red-50 dark:bg-red-900/20 border-red-200 dark:border-red-800',
    title: 'text-red-800 dark:text-red-400',
    text: 'text-red-700 dark:text-red-300',
  },
  warning: {
    box: 'bg-yellow-50 dark:bg-yellow-900/20 border-yellow-200 dark:border-yellow-800',
    title: 'text-yellow-800 dark:text-yellow-400',
    text: 'text-yellow-700 dark:text-yellow-300',
  },
}

export function ErrorMessage({ title, message, kind = 'error', onRetry }: ErrorMessageProps) {
  const style = STYLES[kind]
  return (
    <div role={kind === 'error' ? 'alert' : 'status'} className={`border rounded-md p-4 ${style.box}`}>
      {title && <h4 className={`text-sm font-semibold mb-1 ${style.title}`}>{title}</h4>}
      <p className={`text-sm ${style.text}`}>{message}</p>
      {onRetry && (
        <button onClick={onRetry} className="mt-2 text-sm text-red-600 dark:text-red-400 hover:underline">
          Try again
        </button>
      )}
    </div>
  )
}

export function NoticeList({ notices }: { notices: Notice[] }) {
  if (!notices.length) return null
  return (
    <div className="space-y-2">
      {notices.map((notice, i) => (
        <ErrorMessage key={i} kind={notice.kind} message={notice.message} />
      ))}
    </div>
  )
}
