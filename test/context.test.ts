// context.test.ts
import { describe, it, expect, vi } from 'vitest'
import {
  createCorrelationContext,
  runInTaskContext,
  useCorrelation,
  useTaskContext,
  withLoggingContext,
  type LoggingContext,
} from '../src/context'
import { CancellationToken } from '../src/cancellation'
import type { Logger } from '../src/logger'
import { deferred, flush } from './helpers/deferred'

const createLogger = () => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}) satisfies Logger

const recordingContext = (calls: string[]): LoggingContext => ({
  acquire: () => calls.push('acquire'),
  release: () => calls.push('release'),
})

describe('withLoggingContext', () => {
  it('should just run the body without a context', async () => {
    await expect(withLoggingContext(undefined, createLogger(), () => 42)).resolves.toBe(42)
  })

  it('should acquire before and release after the body', async () => {
    const calls: string[] = []

    const value = await withLoggingContext(recordingContext(calls), createLogger(), async () => {
      calls.push('body')
      await flush()
      return 'done'
    })

    expect(value).toBe('done')
    expect(calls).toEqual(['acquire', 'body', 'release'])
  })

  it('should release when the body throws and keep its error', async () => {
    const calls: string[] = []
    const failure = new Error('body failed')

    await expect(
      withLoggingContext(recordingContext(calls), createLogger(), () => {
        throw failure
      }),
    ).rejects.toBe(failure)
    expect(calls).toEqual(['acquire', 'release'])
  })

  it('should log a release failure without replacing the result', async () => {
    const logger = createLogger()
    const releaseError = new Error('cannot release')
    const context: LoggingContext = {
      acquire: () => {},
      release: () => {
        throw releaseError
      },
    }

    await expect(withLoggingContext(context, logger, () => 'value')).resolves.toBe('value')
    expect(logger.error).toHaveBeenCalledWith(
      '[LoggingContext] Exception closing logging context',
      releaseError,
    )
  })

  it('should neither run the body nor release when acquire fails', async () => {
    const body = vi.fn()
    const release = vi.fn()
    const acquireError = new Error('cannot acquire')
    const context: LoggingContext = {
      acquire: () => {
        throw acquireError
      },
      release,
    }

    await expect(withLoggingContext(context, createLogger(), body)).rejects.toBe(acquireError)
    expect(body).not.toHaveBeenCalled()
    expect(release).not.toHaveBeenCalled()
  })
})

describe('createCorrelationContext', () => {
  it('should publish its values only while acquired', () => {
    const context = createCorrelationContext({ requestId: 'req-1' })

    expect(useCorrelation()).toBeUndefined()
    context.acquire()
    expect(useCorrelation()).toEqual({ requestId: 'req-1' })
    context.release()
    expect(useCorrelation()).toBeUndefined()
  })

  it('should count nested acquires', () => {
    const context = createCorrelationContext({ requestId: 'req-2' })

    context.acquire()
    context.acquire()
    expect(context.depth).toBe(2)

    context.release()
    expect(context.depth).toBe(1)
    expect(useCorrelation()).toBe(context.values)

    context.release()
    expect(context.depth).toBe(0)
    expect(useCorrelation()).toBeUndefined()
  })

  it('should ignore a release without a matching acquire', () => {
    const context = createCorrelationContext({ requestId: 'req-3' })

    context.release()

    expect(context.depth).toBe(0)
  })

  it('should keep the values of concurrent scopes apart', async () => {
    const one = createCorrelationContext({ requestId: 'one' })
    const two = createCorrelationContext({ requestId: 'two' })
    const gate = deferred<void>()

    const first = withLoggingContext(one, createLogger(), async () => {
      await gate.promise
      return useCorrelation()
    })
    const second = await withLoggingContext(two, createLogger(), () => useCorrelation())
    gate.resolve()

    expect(second).toEqual({ requestId: 'two' })
    await expect(first).resolves.toEqual({ requestId: 'one' })
    expect(useCorrelation()).toBeUndefined()
  })

  it('should not leak values to the caller of the bracket', async () => {
    const context = createCorrelationContext({ requestId: 'inner' })
    const gate = deferred<void>()

    const running = withLoggingContext(context, createLogger(), () => gate.promise)

    expect(useCorrelation()).toBeUndefined()
    gate.resolve()
    await running
    expect(useCorrelation()).toBeUndefined()
  })

  it('should freeze a copy of the values', () => {
    const values = { requestId: 'req-4' }
    const context = createCorrelationContext(values)
    values.requestId = 'changed'

    expect(context.values).toEqual({ requestId: 'req-4' })
    expect(Object.isFrozen(context.values)).toBe(true)
  })
})

describe('task context', () => {
  it('should be undefined outside of a stage', () => {
    expect(useTaskContext()).toBeUndefined()
  })

  it('should follow the body across awaits', async () => {
    const token = new CancellationToken()

    const seen = await runInTaskContext(
      { taskId: 'group-x/task-1', taskName: 'lookup', stage: 'work', token },
      async () => {
        await flush()
        return useTaskContext()
      },
    )

    expect(seen).toMatchObject({ taskId: 'group-x/task-1', taskName: 'lookup', stage: 'work' })
    expect(seen?.token).toBe(token)
    expect(useTaskContext()).toBeUndefined()
  })
})
