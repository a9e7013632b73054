import { describe, it, expect, beforeEach } from 'vitest'
import { InMemoryLockManager } from '../../src/storage'

const tick = () => new Promise(resolve => setTimeout(resolve, 5))

describe('InMemoryLockManager', () => {
  let lockManager: InMemoryLockManager

  beforeEach(() => {
    lockManager = new InMemoryLockManager()
  })

  it('should acquire a free key immediately', async () => {
    const lock = await lockManager.acquire('roster')

    expect(lock.key).toBe('roster')
    expect(lock.token).toEqual(expect.any(String))
    expect(lockManager.isLocked('roster')).toBe(true)

    await lockManager.release(lock)
    expect(lockManager.isLocked('roster')).toBe(false)
  })

  it('should make a second caller wait until release', async () => {
    const first = await lockManager.acquire('roster')

    let acquired = false
    const pending = lockManager.acquire('roster').then(lock => {
      acquired = true
      return lock
    })

    await tick()
    expect(acquired).toBe(false)

    await lockManager.release(first)
    const second = await pending

    expect(acquired).toBe(true)
    expect(second.token).not.toBe(first.token)
    expect(lockManager.isLocked('roster')).toBe(true)
  })

  it('should hand the lock to waiters in arrival order', async () => {
    const order: string[] = []
    const holder = await lockManager.acquire('roster')

    const waiters = ['a', 'b', 'c'].map(name =>
      lockManager.withLock('roster', () => {
        order.push(name)
      })
    )

    await lockManager.release(holder)
    await Promise.all(waiters)

    expect(order).toEqual(['a', 'b', 'c'])
    expect(lockManager.isLocked('roster')).toBe(false)
  })

  it('should ignore a release with a stale token', async () => {
    const first = await lockManager.acquire('roster')
    const pending = lockManager.acquire('roster')

    await lockManager.release(first)
    const second = await pending

    await lockManager.release(first)
    expect(lockManager.isLocked('roster')).toBe(true)

    await lockManager.release(second)
    expect(lockManager.isLocked('roster')).toBe(false)
  })

  it('should not block on a different key', async () => {
    await lockManager.acquire('a')
    const other = await lockManager.acquire('b')

    expect(other.key).toBe('b')
  })

  it('should return the value produced under withLock', async () => {
    const value = await lockManager.withLock('roster', async () => 42)

    expect(value).toBe(42)
    expect(lockManager.isLocked('roster')).toBe(false)
  })

  it('should release the lock when the guarded function throws', async () => {
    await expect(
      lockManager.withLock('roster', () => {
        throw new Error('boom')
      })
    ).rejects.toThrow('boom')

    expect(lockManager.isLocked('roster')).toBe(false)
  })

  it('should release the lock when the guarded promise rejects', async () => {
    await expect(
      lockManager.withLock('roster', async () => {
        await tick()
        throw new Error('late boom')
      })
    ).rejects.toThrow('late boom')

    expect(lockManager.isLocked('roster')).toBe(false)
  })
})
