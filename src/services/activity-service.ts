/**
 * Activity Service - Owns the directory for the lifetime of the process
 */

import type { Config } from '../config'
import { ActivityDirectory } from '../directory/activity-directory'
import type { ActivitySeed } from '../directory/types'
import { loadActivitySeed } from '../seed/loader'
import { InMemoryLockManager } from '../storage/in-memory-lock-manager'
import { logger } from '../utils/logger'

export class ActivityService {
  private activityDirectory: ActivityDirectory | null = null

  /**
   * @param seed - Use this seed instead of reading `config.seed.file`
   */
  constructor(private config: Config, private seed?: ActivitySeed) {}

  async initialize() {
    logger.info('Initializing activity directory...')

    const seed = this.seed ?? loadActivitySeed(this.config.seed.file)
    this.activityDirectory = new ActivityDirectory(seed, {
      lockManager: new InMemoryLockManager(),
      enforceCapacity: this.config.capacity.enforce
    })

    logger.info('Activity directory ready', {
      activities: this.activityDirectory.size,
      source: this.seed ? 'inline' : this.config.seed.file,
      enforceCapacity: this.config.capacity.enforce
    })
  }

  get directory(): ActivityDirectory {
    if (!this.activityDirectory) {
      throw new Error('ActivityService used before initialize()')
    }
    return this.activityDirectory
  }

  async shutdown() {
    logger.info('Shutting down activity service...')
    this.activityDirectory = null
  }
}
