import type { ImageFormat } from './types'

const NETPBM_FORMATS: Record<number, ImageFormat> = {
	0x31: 'pbm', // P1
	0x32: 'pgm', // P2
	0x33: 'ppm', // P3
	0x34: 'pbm', // P4
	0x35: 'pgm', // P5
	0x36: 'ppm', // P6
	0x37: 'pam', // P7
}

const MIME_TYPES: Record<ImageFormat, string> = {
	pbm: 'image/x-portable-bitmap',
	pgm: 'image/x-portable-graymap',
	ppm: 'image/x-portable-pixmap',
	pam: 'image/x-portable-arbitrarymap',
}

/**
 * Detect format from binary data
 */
export function detectFormat(data: Uint8Array): ImageFormat | null {
	if (data.length < 2 || data[0] !== 0x50) return null // 'P'
	const type = data[1]
	if (type === undefined) return null
	return NETPBM_FORMATS[type] ?? null
}

/**
 * Get file extension for format
 */
export function getExtension(format: ImageFormat): string {
	return format
}

/**
 * Get MIME type for format
 */
export function getMimeType(format: ImageFormat): string {
	return MIME_TYPES[format]
}
