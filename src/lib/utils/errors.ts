/**
 * Custom error classes for upstream fetch failures
 */
export class APIError extends Error {
  constructor(message: string, public statusCode: number, public provider: string) {
    super(message)
    this.name = 'APIError'
  }
}

export class TransportError extends Error {
  constructor(message: string, public provider: string, public originalError?: unknown) {
    super(message)
    this.name = 'TransportError'
  }
}

export class SchemaMismatchError extends Error {
  constructor(message: string, public path: string[] = []) {
    super(message)
    this.name = 'SchemaMismatchError'
  }
}

export type FetchFailureKind = 'transport' | 'status' | 'schema'

/**
 * Map an error raised while fetching a series onto the failure taxonomy.
 * Anything not recognised is treated as a transport problem.
 */
export function classifyFetchError(error: unknown): FetchFailureKind {
  if (error instanceof APIError) return 'status'
  if (error instanceof SchemaMismatchError) return 'schema'
  return 'transport'
}

/**
 * Extract user-friendly error message from error object
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  if (typeof error === 'string') return error
  return 'An unknown error occurred'
}
