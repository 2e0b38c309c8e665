import type { ImageData, PackedImage } from './types'

/**
 * Pack four 8-bit channels into 0xRRGGBBAA
 */
export function packRgba(r: number, g: number, b: number, a: number): number {
	return ((r << 24) | (g << 16) | (b << 8) | a) >>> 0
}

export function unpackRgba(pixel: number): [number, number, number, number] {
	return [(pixel >>> 24) & 0xff, (pixel >>> 16) & 0xff, (pixel >>> 8) & 0xff, pixel & 0xff]
}

/**
 * Convert packed pixels to the RGBA byte layout
 */
export function toImageData(image: PackedImage): ImageData {
	const { width, height, pixels } = image
	const data = new Uint8Array(pixels.length * 4)

	for (let i = 0; i < pixels.length; i++) {
		const pixel = pixels[i] ?? 0
		const idx = i * 4
		data[idx] = (pixel >>> 24) & 0xff
		data[idx + 1] = (pixel >>> 16) & 0xff
		data[idx + 2] = (pixel >>> 8) & 0xff
		data[idx + 3] = pixel & 0xff
	}

	return { width, height, data }
}

/**
 * Format a packed pixel as 0xRRGGBBAA
 */
export function formatPixel(pixel: number): string {
	return `0x${(pixel >>> 0).toString(16).toUpperCase().padStart(8, '0')}`
}
