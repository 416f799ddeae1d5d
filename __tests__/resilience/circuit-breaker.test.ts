import { CircuitBreaker, CircuitOpenError } from '../../src/resilience/circuit-breaker'

describe('CircuitBreaker', () => {
  let clock: number
  let breaker: CircuitBreaker

  const fail = () => breaker.execute(() => Promise.reject(new Error('redis down')))
  const succeed = () => breaker.execute(() => Promise.resolve('PONG'))

  beforeEach(() => {
    clock = 0
    breaker = new CircuitBreaker({
      failureThreshold: 2,
      openDurationMs: 1000,
      halfOpenSuccesses: 2,
      now: () => clock,
    })
  })

  it('should open after the failure threshold', async () => {
    await expect(fail()).rejects.toThrow('redis down')
    expect(breaker.getState()).toBe('closed')
    await expect(fail()).rejects.toThrow('redis down')

    expect(breaker.getState()).toBe('open')
    await expect(succeed()).rejects.toBeInstanceOf(CircuitOpenError)
  })

  it('should reset the failure count after a success', async () => {
    await expect(fail()).rejects.toThrow('redis down')
    await expect(succeed()).resolves.toBe('PONG')
    await expect(fail()).rejects.toThrow('redis down')

    expect(breaker.getState()).toBe('closed')
  })

  it('should half-open after the open duration and close after enough successes', async () => {
    await expect(fail()).rejects.toThrow('redis down')
    await expect(fail()).rejects.toThrow('redis down')

    clock = 999
    expect(breaker.getState()).toBe('open')
    clock = 1000
    expect(breaker.getState()).toBe('half-open')

    await succeed()
    expect(breaker.getState()).toBe('half-open')
    await succeed()
    expect(breaker.getState()).toBe('closed')
  })

  it('should reopen on a failure while half-open', async () => {
    await expect(fail()).rejects.toThrow('redis down')
    await expect(fail()).rejects.toThrow('redis down')
    clock = 1500

    await expect(fail()).rejects.toThrow('redis down')

    expect(breaker.getState()).toBe('open')
    clock = 2499
    expect(breaker.getState()).toBe('open')
  })

  it('should report each state transition once', async () => {
    const transitions: string[] = []
    breaker = new CircuitBreaker({
      failureThreshold: 1,
      openDurationMs: 100,
      halfOpenSuccesses: 1,
      now: () => clock,
      onTransition: (from, to) => transitions.push(`${from}->${to}`),
    })

    await expect(fail()).rejects.toThrow('redis down')
    clock = 100
    await succeed()

    expect(transitions).toEqual(['closed->open', 'open->half-open', 'half-open->closed'])
  })
})
