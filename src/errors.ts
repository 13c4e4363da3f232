export function formatError(error: unknown): string {
  if (error instanceof Error) return error.message
  return error ? String(error) : 'Unknown error'
}

/** A request to the episode API failed: transport error, non-2xx status, or a body that is not JSON. */
export class FetchError extends Error {
  readonly url: string
  readonly status: number | null

  constructor(
    message: string,
    { url, status = null, cause }: { url: string; status?: number | null; cause?: unknown }
  ) {
    super(message, cause === undefined ? undefined : { cause })
    this.name = 'FetchError'
    this.url = url
    this.status = status
  }
}

export class WriteError extends Error {
  readonly path: string

  constructor(message: string, { path, cause }: { path: string; cause?: unknown }) {
    super(message, cause === undefined ? undefined : { cause })
    this.name = 'WriteError'
    this.path = path
  }
}
