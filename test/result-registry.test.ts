// result-registry.test.ts
import { describe, it, expect } from 'vitest'
import { ResultRegistry } from '../src/result-registry'
import { done, hasValue, isOutcome, notDone, toOutcome } from '../src/outcome'
import { StructuralError } from '../src/errors'

const task = (id: string, name: string) => ({ id, name })

describe('outcomes', () => {
  it('should build successful and unsuccessful outcomes', () => {
    expect(done('apple')).toEqual({ succeeded: true, value: 'apple' })
    expect(notDone()).toStrictEqual({ succeeded: false })
    expect(notDone('pear')).toEqual({ succeeded: false, value: 'pear' })
  })

  it('should tell whether an outcome carries a value', () => {
    expect(hasValue(done(0))).toBe(true)
    expect(hasValue(notDone())).toBe(false)
    expect(hasValue({ succeeded: true, value: null })).toBe(false)
  })

  it('should recognise outcome-shaped values', () => {
    expect(isOutcome({ succeeded: true })).toBe(true)
    expect(isOutcome({})).toBe(true)
    expect(isOutcome({ succeeded: 'yes' })).toBe(false)
    expect(isOutcome(null)).toBe(false)
    expect(isOutcome('done')).toBe(false)
  })

  it('should normalise a missing flag and an undefined value', () => {
    expect(toOutcome<string>({ succeeded: false, value: undefined })).toStrictEqual({
      succeeded: false,
    })
    expect(toOutcome(JSON.parse('{"value":"kiwi"}'))).toStrictEqual({
      succeeded: false,
      value: 'kiwi',
    })
  })
})

describe('ResultRegistry', () => {
  it('should record an outcome once per task', () => {
    const registry = new ResultRegistry<string>()

    expect(registry.record(task('g/task-1', 'alpha'), done('first'))).toBe(true)
    expect(registry.record(task('g/task-1', 'alpha'), done('second'))).toBe(false)

    expect(registry.size).toBe(1)
    expect(registry.get('g/task-1')).toEqual(done('first'))
    expect(registry.has('g/task-1')).toBe(true)
    expect(registry.has('g/task-2')).toBe(false)
  })

  it('should start empty', () => {
    const registry = new ResultRegistry<string>()

    expect(registry.isEmpty()).toBe(true)
    expect(registry.getTasks()).toEqual([])
    expect(registry.getResults().size).toBe(0)
  })

  it('should keep tasks that share a name apart', () => {
    const registry = new ResultRegistry<string>()
    registry.record(task('g/task-1', 'mirror'), notDone('eu'))
    registry.record(task('g/task-2', 'mirror'), done('us'))
    registry.record(task('g/task-3', 'backup'), notDone())

    expect(registry.getByName('mirror')).toEqual(notDone('eu'))
    expect(registry.getAllByName('mirror')).toEqual([notDone('eu'), done('us')])
    expect(registry.getByName('missing')).toBeUndefined()
    expect(registry.getTasks()).toEqual(['mirror', 'mirror', 'backup'])
    expect([...registry.getResults()]).toEqual([
      ['mirror', done('us')],
      ['backup', notDone()],
    ])
  })

  it('should iterate entries in recording order', () => {
    const registry = new ResultRegistry<number>()
    registry.record(task('g/task-2', 'two'), done(2))
    registry.record(task('g/task-1', 'one'), notDone())

    expect([...registry].map((entry) => entry.taskId)).toEqual(['g/task-2', 'g/task-1'])
  })

  describe('single result', () => {
    it('should return the only successful outcome', () => {
      const registry = new ResultRegistry<string>()
      registry.record(task('g/task-1', 'miss'), notDone('no'))
      registry.record(task('g/task-2', 'hit'), done('yes'))

      expect(registry.hasMoreThanOneResult()).toBe(false)
      expect(registry.getSingleResult()).toEqual(done('yes'))
      expect(registry.getSingleResultSafe().isOk()).toBe(true)
    })

    it('should report NO_RESULT when nothing succeeded', () => {
      const registry = new ResultRegistry<string>()
      registry.record(task('g/task-1', 'miss'), notDone())

      const result = registry.getSingleResultSafe()

      expect(result._unsafeUnwrapErr()).toMatchObject({
        code: 'NO_RESULT',
        message: 'No results found!',
      })
      expect(() => registry.getSingleResult()).toThrow(StructuralError)
    })

    it('should report AMBIGUOUS_RESULT when several succeeded', () => {
      const registry = new ResultRegistry<string>()
      registry.record(task('g/task-1', 'left'), done('l'))
      registry.record(task('g/task-2', 'right'), done('r'))

      expect(registry.hasMoreThanOneResult()).toBe(true)
      expect(() => registry.getSingleResult()).toThrow(
        'More than one result found (left, right), you will need to pick out what you need.',
      )
      expect(registry.getSingleResultSafe()._unsafeUnwrapErr().code).toBe('AMBIGUOUS_RESULT')
    })
  })

  describe('snapshot', () => {
    it('should put the given ids first and the rest after', () => {
      const registry = new ResultRegistry<number>()
      registry.record(task('g/task-3', 'c'), done(3))
      registry.record(task('g/task-1', 'a'), notDone())
      registry.record(task('g/task-2', 'b'), notDone())

      const copy = registry.snapshot(['g/task-1', 'g/task-2', 'g/task-9'])

      expect(copy.getTasks()).toEqual(['a', 'b', 'c'])
    })

    it('should be detached from later records', () => {
      const registry = new ResultRegistry<number>()
      registry.record(task('g/task-1', 'a'), notDone())

      const copy = registry.snapshot()
      registry.record(task('g/task-2', 'b'), done(2))

      expect(copy.size).toBe(1)
      expect(registry.size).toBe(2)
    })
  })
})
