/**
 * @seedsketch/cli - run sketches from the command line
 */

export * from './args'
export * from './run'
export { arcsSketch } from './sketches/arcs'
