/**
 * @seedsketch/render - deterministic render pipeline
 */

export * from './seed'
export * from './random'
export * from './video'
export * from './context'
export * from './options'
export * from './output'
export * from './idle'
export * from './pipeline'
export * from './interactive'
