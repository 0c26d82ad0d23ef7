import type { ImageData } from '@seedsketch/core'
import { deflate } from './deflate'
import { ColorType, FilterType, IDAT_CHUNK_SIZE, PNG_SIGNATURE, type PngEncodeOptions } from './types'

const crcTable = new Uint32Array(256)
for (let n = 0; n < 256; n++) {
	let c = n
	for (let k = 0; k < 8; k++) {
		c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1
	}
	crcTable[n] = c >>> 0
}

export function crc32(data: Uint8Array, start = 0, length = data.length - start): number {
	let crc = 0xffffffff
	for (let i = start; i < start + length; i++) {
		crc = crcTable[(crc ^ data[i]!) & 0xff]! ^ (crc >>> 8)
	}
	return (crc ^ 0xffffffff) >>> 0
}

function writeU32BE(data: Uint8Array, offset: number, value: number): void {
	data[offset] = (value >>> 24) & 0xff
	data[offset + 1] = (value >>> 16) & 0xff
	data[offset + 2] = (value >>> 8) & 0xff
	data[offset + 3] = value & 0xff
}

/**
 * Length, type, data and CRC (over type + data)
 */
function createChunk(type: string, data: Uint8Array): Uint8Array {
	const chunk = new Uint8Array(12 + data.length)
	writeU32BE(chunk, 0, data.length)
	for (let i = 0; i < 4; i++) {
		chunk[4 + i] = type.charCodeAt(i)
	}
	chunk.set(data, 8)
	writeU32BE(chunk, 8 + data.length, crc32(chunk, 4, data.length + 4))
	return chunk
}

function createIHDR(width: number, height: number, colorType: ColorType): Uint8Array {
	const data = new Uint8Array(13)
	writeU32BE(data, 0, width)
	writeU32BE(data, 4, height)
	data[8] = 8 // Bit depth
	data[9] = colorType
	// Compression, filter and interlace methods stay 0
	return createChunk('IHDR', data)
}

function latin1(value: string, what: string): Uint8Array {
	const bytes = new Uint8Array(value.length)
	for (let i = 0; i < value.length; i++) {
		const code = value.charCodeAt(i)
		if (code > 0xff) {
			throw new RangeError(`${what} must be Latin-1: ${JSON.stringify(value)}`)
		}
		bytes[i] = code
	}
	return bytes
}

function createTEXt(keyword: string, text: string): Uint8Array {
	if (keyword.length < 1 || keyword.length > 79 || keyword.includes('\0')) {
		throw new RangeError(`Invalid PNG text keyword: ${JSON.stringify(keyword)}`)
	}
	const key = latin1(keyword, 'PNG text keyword')
	const value = latin1(text, 'PNG text')
	const data = new Uint8Array(key.length + 1 + value.length)
	data.set(key, 0)
	data.set(value, key.length + 1)
	return createChunk('tEXt', data)
}

function paethPredictor(a: number, b: number, c: number): number {
	const p = a + b - c
	const pa = Math.abs(p - a)
	const pb = Math.abs(p - b)
	const pc = Math.abs(p - c)
	if (pa <= pb && pa <= pc) return a
	if (pb <= pc) return b
	return c
}

/**
 * Filter one scanline; the result starts with the filter byte
 */
function filterScanline(
	current: Uint8Array,
	previous: Uint8Array | null,
	bpp: number,
	filterType: FilterType
): Uint8Array {
	const filtered = new Uint8Array(current.length + 1)
	filtered[0] = filterType

	for (let i = 0; i < current.length; i++) {
		const a = i >= bpp ? current[i - bpp]! : 0
		const b = previous ? previous[i]! : 0
		const c = i >= bpp && previous ? previous[i - bpp]! : 0
		let predicted: number
		switch (filterType) {
			case FilterType.None:
				predicted = 0
				break
			case FilterType.Sub:
				predicted = a
				break
			case FilterType.Up:
				predicted = b
				break
			case FilterType.Average:
				predicted = Math.floor((a + b) / 2)
				break
			case FilterType.Paeth:
				predicted = paethPredictor(a, b, c)
				break
		}
		filtered[i + 1] = (current[i]! - predicted) & 0xff
	}

	return filtered
}

/**
 * Sum of the filtered bytes read as signed values
 */
function sumAbsolute(filtered: Uint8Array): number {
	let sum = 0
	for (let i = 1; i < filtered.length; i++) {
		const v = filtered[i]!
		sum += v < 128 ? v : 256 - v
	}
	return sum
}

const FILTERS: readonly FilterType[] = [
	FilterType.None,
	FilterType.Sub,
	FilterType.Up,
	FilterType.Average,
	FilterType.Paeth,
]

/**
 * Pick the filter with the smallest signed sum; ties keep the earlier filter
 */
function selectFilter(current: Uint8Array, previous: Uint8Array | null, bpp: number): Uint8Array {
	let best: Uint8Array | null = null
	let bestSum = Number.POSITIVE_INFINITY

	for (const filterType of FILTERS) {
		const filtered = filterScanline(current, previous, bpp, filterType)
		const sum = sumAbsolute(filtered)
		if (sum < bestSum) {
			bestSum = sum
			best = filtered
		}
	}

	return best ?? filterScanline(current, previous, bpp, FilterType.None)
}

/**
 * Scanlines in the output channel layout
 */
function scanlines(image: ImageData, bpp: number): Uint8Array[] {
	const { width, height, data } = image
	const rows: Uint8Array[] = []

	for (let y = 0; y < height; y++) {
		const row = new Uint8Array(width * bpp)
		for (let x = 0; x < width; x++) {
			const src = (y * width + x) * 4
			const dst = x * bpp
			row[dst] = data[src]!
			row[dst + 1] = data[src + 1]!
			row[dst + 2] = data[src + 2]!
			if (bpp === 4) row[dst + 3] = data[src + 3]!
		}
		rows.push(row)
	}

	return rows
}

function createIDAT(image: ImageData, bpp: number): Uint8Array[] {
	const rows = scanlines(image, bpp)
	const filteredData = new Uint8Array((image.width * bpp + 1) * image.height)
	let previous: Uint8Array | null = null
	let offset = 0

	for (const row of rows) {
		const filtered = selectFilter(row, previous, bpp)
		filteredData.set(filtered, offset)
		offset += filtered.length
		previous = row
	}

	const compressed = deflate(filteredData)
	const chunks: Uint8Array[] = []
	for (let start = 0; start < compressed.length; start += IDAT_CHUNK_SIZE) {
		chunks.push(createChunk('IDAT', compressed.subarray(start, start + IDAT_CHUNK_SIZE)))
	}
	return chunks
}

/**
 * Encode ImageData to PNG
 */
export function encodePng(image: ImageData, options: PngEncodeOptions = {}): Uint8Array {
	const { width, height, data } = image
	if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
		throw new RangeError(`Cannot encode a ${width}x${height} image`)
	}
	if (data.length !== width * height * 4) {
		throw new RangeError(`Expected ${width * height * 4} bytes of RGBA data, got ${data.length}`)
	}

	const rgb = options.colorType === 'rgb'
	const bpp = rgb ? 3 : 4

	const chunks: Uint8Array[] = [createIHDR(width, height, rgb ? ColorType.RGB : ColorType.RGBA)]
	for (const [keyword, text] of Object.entries(options.text ?? {})) {
		chunks.push(createTEXt(keyword, text))
	}
	chunks.push(...createIDAT(image, bpp))
	chunks.push(createChunk('IEND', new Uint8Array(0)))

	const output = new Uint8Array(PNG_SIGNATURE.length + chunks.reduce((sum, c) => sum + c.length, 0))
	output.set(PNG_SIGNATURE, 0)
	let offset = PNG_SIGNATURE.length
	for (const chunk of chunks) {
		output.set(chunk, offset)
		offset += chunk.length
	}

	return output
}
