/**
 * @seedsketch/transform - affine transform algebra
 */

export * from './types'
export * from './matrix'
export * from './affine'
