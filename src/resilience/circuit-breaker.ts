export type CircuitState = 'closed' | 'open' | 'half-open'

export type CircuitBreakerOptions = {
  failureThreshold: number
  openDurationMs: number
  halfOpenSuccesses: number
  now?: () => number
  onTransition?: (from: CircuitState, to: CircuitState) => void
}

export class CircuitOpenError extends Error {
  constructor(message = 'Circuit breaker is open') {
    super(message)
    this.name = 'CircuitOpenError'
  }
}

/**
 * Fails fast after `failureThreshold` consecutive failures. After
 * `openDurationMs` one trial call at a time is let through; `halfOpenSuccesses`
 * successes in a row close the circuit, any failure reopens it.
 */
export class CircuitBreaker {
  private state: CircuitState = 'closed'
  private streak = 0
  private openedAt = 0
  private readonly now: () => number

  constructor(private readonly options: CircuitBreakerOptions) {
    this.now = options.now ?? Date.now
  }

  getState(): CircuitState {
    if (this.state === 'open' && this.now() - this.openedAt >= this.options.openDurationMs) {
      this.moveTo('half-open')
    }
    return this.state
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.getState() === 'open') {
      throw new CircuitOpenError()
    }
    let result: T
    try {
      result = await fn()
    } catch (error) {
      this.recordFailure()
      throw error
    }
    this.recordSuccess()
    return result
  }

  private recordSuccess(): void {
    if (this.state !== 'half-open') {
      this.streak = 0
      return
    }
    this.streak += 1
    if (this.streak >= this.options.halfOpenSuccesses) {
      this.moveTo('closed')
    }
  }

  private recordFailure(): void {
    if (this.state === 'half-open') {
      this.moveTo('open')
      return
    }
    this.streak += 1
    if (this.streak >= this.options.failureThreshold) {
      this.moveTo('open')
    }
  }

  private moveTo(next: CircuitState): void {
    const previous = this.state
    this.state = next
    this.streak = 0
    if (next === 'open') {
      this.openedAt = this.now()
    }
    if (previous !== next) {
      this.options.onTransition?.(previous, next)
    }
  }
}
