/**
 * @seedsketch/window - live display contract and a terminal implementation
 */

export * from './types'
export * from './preview'
export * from './terminal'
