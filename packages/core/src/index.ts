/**
 * @seedsketch/core - shared value types
 */

export * from './types'
export * from './vector'
