import { v4 as uuidv4 } from 'uuid'
import type { Lock, LockManager } from './lock-manager'

interface KeyState {
  holder: Lock
  waiters: Array<(lock: Lock) => void>
}

/**
 * InMemoryLockManager - Process-local locks with FIFO hand-off
 */
export class InMemoryLockManager implements LockManager {
  private locks = new Map<string, KeyState>()

  async acquire(key: string): Promise<Lock> {
    const existing = this.locks.get(key)

    if (!existing) {
      const lock = this.createLock(key)
      this.locks.set(key, { holder: lock, waiters: [] })
      return lock
    }

    return new Promise<Lock>(resolve => {
      existing.waiters.push(resolve)
    })
  }

  async release(lock: Lock): Promise<void> {
    const state = this.locks.get(lock.key)

    // Only release if token matches
    if (state?.holder.token !== lock.token) {
      return
    }

    const next = state.waiters.shift()
    if (!next) {
      this.locks.delete(lock.key)
      return
    }

    // Ownership passes directly to the next waiter
    state.holder = this.createLock(lock.key)
    next(state.holder)
  }

  async withLock<T>(key: string, fn: () => T | Promise<T>): Promise<T> {
    const lock = await this.acquire(key)
    try {
      return await fn()
    } finally {
      await this.release(lock)
    }
  }

  // Helper for testing
  isLocked(key: string): boolean {
    return this.locks.has(key)
  }

  private createLock(key: string): Lock {
    return {
      key,
      token: uuidv4(),
      acquiredAt: Date.now(),
    }
  }
}
