/**
 * @seedsketch/codecs - raster output encoders
 */

export { encodePng, crc32 } from './png/encoder'
export { adler32, deflate, deflateRaw } from './png/deflate'
export { ColorType, FilterType, IDAT_CHUNK_SIZE, PNG_SIGNATURE } from './png/types'
export type { PngEncodeOptions } from './png/types'
