/**
 * YAML seed loader
 */

import { readFileSync, existsSync } from 'fs'
import { resolve } from 'path'
import * as yaml from 'js-yaml'
import type { ActivitySeed } from '../directory/types'
import { parseActivitySeed, parseActivitySeedSafe } from './schema'

/**
 * Load and validate the activity seed from a YAML file
 * @throws Error if the file doesn't exist or validation fails
 */
export function loadActivitySeed(filePath: string): ActivitySeed {
  const absolutePath = resolve(filePath)

  if (!existsSync(absolutePath)) {
    throw new Error(`Seed file not found: ${absolutePath}`)
  }

  try {
    const fileContent = readFileSync(absolutePath, 'utf-8')
    return parseActivitySeed(yaml.load(fileContent))
  } catch (error) {
    if (error instanceof Error) {
      throw new Error(`Failed to load seed from ${filePath}: ${error.message}`)
    }
    throw error
  }
}

/**
 * Load the seed with detailed error reporting
 */
export function loadActivitySeedSafe(
  filePath: string
): { success: true; data: ActivitySeed } | { success: false; errors: string[] } {
  const absolutePath = resolve(filePath)

  if (!existsSync(absolutePath)) {
    return {
      success: false,
      errors: [`Seed file not found: ${absolutePath}`],
    }
  }

  try {
    const fileContent = readFileSync(absolutePath, 'utf-8')
    return parseActivitySeedSafe(yaml.load(fileContent))
  } catch (error) {
    if (error instanceof Error) {
      return {
        success: false,
        errors: [`Failed to parse YAML: ${error.message}`],
      }
    }
    throw error
  }
}
