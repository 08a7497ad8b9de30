import { describe, it, expect } from 'vitest'
import { KeyedLock } from '../keyed-lock.js'

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined
  const promise = new Promise<void>((r) => {
    resolve = r
  })
  return { promise, resolve }
}

describe('KeyedLock', () => {
  it('runs holders of one key in submission order', async () => {
    const lock = new KeyedLock()
    const order: string[] = []
    const gate = deferred()

    const first = lock.runExclusive('scene:scene-1', async () => {
      await gate.promise
      order.push('first')
    })
    const second = lock.runExclusive('scene:scene-1', () => {
      order.push('second')
    })

    gate.resolve()
    await Promise.all([first, second])
    expect(order).toEqual(['first', 'second'])
  })

  it('does not make different keys wait on each other', async () => {
    const lock = new KeyedLock()
    const gate = deferred()

    const blocked = lock.runExclusive('a', () => gate.promise)
    const result = await lock.runExclusive('b', () => 'free')

    expect(result).toBe('free')
    gate.resolve()
    await blocked
  })

  it('releases after a throw and forgets idle keys', async () => {
    const lock = new KeyedLock()

    await expect(
      lock.runExclusive('k', () => {
        throw new Error('apply failed')
      }),
    ).rejects.toThrow('apply failed')

    expect(lock.isHeld('k')).toBe(false)
    await expect(lock.runExclusive('k', () => 42)).resolves.toBe(42)
  })
})
