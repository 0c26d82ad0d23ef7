/**
 * @seedsketch/draw - raster surfaces and drawing
 */

export * from './types'
export * from './primitives'
export * from './surface'
export * from './paint'
