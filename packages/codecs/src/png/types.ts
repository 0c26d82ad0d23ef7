/**
 * PNG color types
 */
export const ColorType = {
	RGB: 2,
	RGBA: 6,
} as const

export type ColorType = (typeof ColorType)[keyof typeof ColorType]

/**
 * PNG filter types
 */
export const FilterType = {
	None: 0,
	Sub: 1,
	Up: 2,
	Average: 3,
	Paeth: 4,
} as const

export type FilterType = (typeof FilterType)[keyof typeof FilterType]

/**
 * PNG signature bytes
 */
export const PNG_SIGNATURE = new Uint8Array([137, 80, 78, 71, 13, 10, 26, 10])

/** Largest IDAT payload written before starting a new chunk */
export const IDAT_CHUNK_SIZE = 1 << 16

export interface PngEncodeOptions {
	/** Output channels; `rgb` drops alpha (default: rgba) */
	colorType?: 'rgba' | 'rgb'
	/** `tEXt` entries, written in insertion order before the image data */
	text?: Readonly<Record<string, string>>
}
