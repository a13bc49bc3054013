import { getErrorMessage } from './errors'

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>

export interface TextResponse {
  ok: boolean
  status: number
  body: string
}

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve()
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Issue a request and read its body as text, aborting after `timeoutMs`.
 * The deadline covers the body as well as the headers.
 */
export async function fetchTextWithTimeout(
  url: string,
  timeoutMs: number,
  init: RequestInit = {},
  fetchImpl: FetchLike = (input, requestInit) => fetch(input, requestInit)
): Promise<TextResponse> {
  const controller = new AbortController()
  const timeoutMessage = `Request timed out after ${timeoutMs}ms`

  const request = (async (): Promise<TextResponse> => {
    const res = await fetchImpl(url, { ...init, signal: controller.signal })
    const body = await res.text()
    return { ok: res.ok, status: res.status, body }
  })()

  let timer: ReturnType<typeof setTimeout> | undefined
  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      controller.abort()
      request.catch((error: unknown) => console.warn(`[http] ${url} settled after timeout:`, getErrorMessage(error)))
      reject(new Error(timeoutMessage))
    }, timeoutMs)
  })

  try {
    return await Promise.race([request, deadline])
  } catch (error) {
    if (controller.signal.aborted) throw new Error(timeoutMessage)
    throw error
  } finally {
    clearTimeout(timer)
  }
}
