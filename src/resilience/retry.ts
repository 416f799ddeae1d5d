export type RetryOptions = {
  retries: number
  backoffMs: number
  onRetry?: (error: unknown, attempt: number) => void
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms))

/**
 * Runs `fn`, retrying up to `retries` more times with linear backoff
 * (`backoffMs * attempt`). Only use for idempotent operations.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  let attempt = 0
  for (;;) {
    try {
      return await fn()
    } catch (error) {
      if (attempt >= options.retries) {
        throw error
      }
      attempt += 1
      options.onRetry?.(error, attempt)
      if (options.backoffMs > 0) {
        await sleep(options.backoffMs * attempt)
      }
    }
  }
}
