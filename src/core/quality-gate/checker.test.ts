import { describe, it, expect } from 'vitest'
import { QualityGateChecker, type QualityGateSignal, type QualityGateStatusQuery } from './checker.js'
import { nullLogger } from '../../utils/logger.js'

const never: QualityGateSignal = { wait: () => new Promise<string>(() => {}) }

function signalOf(status: string): QualityGateSignal {
  return { wait: async () => status }
}

function failingSignal(message: string): QualityGateSignal {
  return {
    wait: async () => {
      throw new Error(message)
    }
  }
}

function queryOf(body: string): QualityGateStatusQuery & { calls: number } {
  const query = {
    calls: 0,
    fetchStatus: async () => {
      query.calls++
      return body
    }
  }
  return query
}

const failingQuery: QualityGateStatusQuery = {
  fetchStatus: async () => {
    throw new Error('connection refused')
  }
}

function checker(primary: QualityGateSignal, fallback: QualityGateStatusQuery, enabled = true) {
  return new QualityGateChecker({
    enabled,
    primary,
    fallback,
    timeoutMs: 30,
    fallbackTimeoutMs: 30,
    logger: nullLogger
  })
}

describe('QualityGateChecker', () => {
  it('returns NOT_RUN when disabled', async () => {
    const fallback = queryOf('{}')
    const result = await checker(signalOf('OK'), fallback, false).check()

    expect(result).toEqual({ status: 'NOT_RUN', source: 'primary' })
    expect(fallback.calls).toBe(0)
  })

  it('reports OK from the primary channel', async () => {
    const fallback = queryOf('{}')
    const result = await checker(signalOf('OK'), fallback).check()

    expect(result).toEqual({ status: 'OK', source: 'primary' })
    expect(fallback.calls).toBe(0)
  })

  it('maps any other primary status to FAILED', async () => {
    expect(await checker(signalOf('ERROR'), queryOf('{}')).check()).toEqual({
      status: 'FAILED',
      source: 'primary'
    })
    expect(await checker(signalOf('WARN'), queryOf('{}')).check()).toEqual({
      status: 'FAILED',
      source: 'primary'
    })
  })

  it('falls back to the status query after a primary timeout', async () => {
    const started = Date.now()
    const result = await checker(never, queryOf('{"projectStatus":{"status":"OK"}}')).check()

    expect(result).toEqual({ status: 'OK', source: 'fallback-api' })
    expect(Date.now() - started).toBeLessThan(2000)
  })

  it('falls back after a primary error', async () => {
    const result = await checker(
      failingSignal('report-task.txt missing'),
      queryOf('{"projectStatus":{"status":"ERROR"}}')
    ).check()

    expect(result).toEqual({ status: 'FAILED', source: 'fallback-api' })
  })

  it('returns TIMEOUT when both channels fail after a timeout', async () => {
    const result = await checker(never, failingQuery).check()
    expect(result).toEqual({ status: 'TIMEOUT', source: 'fallback-api' })
  })

  it('returns ERROR when both channels fail after a primary error', async () => {
    const result = await checker(failingSignal('boom'), failingQuery).check()
    expect(result).toEqual({ status: 'ERROR', source: 'fallback-api' })
  })

  it('bounds a fallback query that never answers', async () => {
    const hanging: QualityGateStatusQuery = { fetchStatus: () => new Promise<string>(() => {}) }
    const result = await checker(failingSignal('boom'), hanging).check()

    expect(result).toEqual({ status: 'ERROR', source: 'fallback-api' })
  })

  it('aborts the primary wait on timeout', async () => {
    let aborted = false
    const primary: QualityGateSignal = {
      wait: signal =>
        new Promise<string>(() => {
          signal.addEventListener('abort', () => {
            aborted = true
          })
        })
    }

    await checker(primary, queryOf('{"projectStatus":{"status":"OK"}}')).check()
    expect(aborted).toBe(true)
  })
})
