/**
 * Lock - Handle for a held lock
 */
export interface Lock {
  key: string
  token: string
  acquiredAt: number
}

/**
 * LockManager - Mutual exclusion over named keys
 */
export interface LockManager {
  /**
   * Acquire a lock, waiting until the key is free
   */
  acquire(key: string): Promise<Lock>

  /**
   * Release a lock (ignored if the token no longer holds the key)
   */
  release(lock: Lock): Promise<void>

  /**
   * Run `fn` while holding the lock; released on every exit path
   */
  withLock<T>(key: string, fn: () => T | Promise<T>): Promise<T>
}
