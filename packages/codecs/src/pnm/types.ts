/**
 * PNM (Portable Any Map) format types and constants
 * Includes PBM (Bitmap), PGM (Graymap), PPM (Pixmap) and PAM (Arbitrary Map)
 */

import type { ImageFormat, PackedImage } from '@pixmap/core'

// Format types
export enum PnmFormat {
	PBM_ASCII = 'P1', // Portable Bitmap ASCII
	PGM_ASCII = 'P2', // Portable Graymap ASCII
	PPM_ASCII = 'P3', // Portable Pixmap ASCII
	PBM_BINARY = 'P4', // Portable Bitmap Binary
	PGM_BINARY = 'P5', // Portable Graymap Binary
	PPM_BINARY = 'P6', // Portable Pixmap Binary
	PAM = 'P7', // Portable Arbitrary Map
}

/** Largest maxval a Netpbm file may declare */
export const PNM_MAX_VALUE = 65535

/** Largest sample value stored in a single byte */
export const PNM_BYTE_MAX_VALUE = 255

/** PBM polarity: a set bit is black, a clear bit is white */
export const PBM_BLACK = 0x000000ff
export const PBM_WHITE = 0xffffffff

/**
 * Dimension guard applied before the pixel buffer is allocated
 */
export const IMAGE_LIMITS = {
	/** Maximum total pixel count (256 megapixels) */
	MAX_PIXELS: 268435456,
} as const

/**
 * PNM header structure
 */
export interface PnmHeader {
	readonly format: PnmFormat
	readonly width: number
	readonly height: number
	readonly maxVal: number // 1 for PBM, 1-65535 otherwise
	readonly depth: number // channels per pixel
	readonly tupleType?: string // PAM only, as declared
}

/**
 * Decoded PNM image
 */
export interface PnmImage extends PackedImage {
	readonly header: PnmHeader
}

/**
 * Parse the magic digit (the byte after 'P') into a format
 */
export function formatFromMagic(digit: number): PnmFormat | null {
	switch (digit) {
		case 0x31:
			return PnmFormat.PBM_ASCII
		case 0x32:
			return PnmFormat.PGM_ASCII
		case 0x33:
			return PnmFormat.PPM_ASCII
		case 0x34:
			return PnmFormat.PBM_BINARY
		case 0x35:
			return PnmFormat.PGM_BINARY
		case 0x36:
			return PnmFormat.PPM_BINARY
		case 0x37:
			return PnmFormat.PAM
		default:
			return null
	}
}

/**
 * Format family, as used for MIME types and file extensions
 */
export function getImageFormat(format: PnmFormat): ImageFormat {
	switch (format) {
		case PnmFormat.PBM_ASCII:
		case PnmFormat.PBM_BINARY:
			return 'pbm'
		case PnmFormat.PGM_ASCII:
		case PnmFormat.PGM_BINARY:
			return 'pgm'
		case PnmFormat.PPM_ASCII:
		case PnmFormat.PPM_BINARY:
			return 'ppm'
		case PnmFormat.PAM:
			return 'pam'
	}
}

/**
 * Check if format is a bitmap (no maxval field)
 */
export function isBitmapFormat(format: PnmFormat): boolean {
	return format === PnmFormat.PBM_ASCII || format === PnmFormat.PBM_BINARY
}

/**
 * Get channels for a classic format; PAM declares its own depth
 */
export function getChannels(format: PnmFormat): number {
	switch (format) {
		case PnmFormat.PPM_ASCII:
		case PnmFormat.PPM_BINARY:
			return 3
		default:
			return 1
	}
}

/**
 * Human readable format name
 */
export function getFormatName(format: PnmFormat): string {
	switch (format) {
		case PnmFormat.PBM_ASCII:
			return 'PBM (ASCII)'
		case PnmFormat.PGM_ASCII:
			return 'PGM (ASCII)'
		case PnmFormat.PPM_ASCII:
			return 'PPM (ASCII)'
		case PnmFormat.PBM_BINARY:
			return 'PBM (raw)'
		case PnmFormat.PGM_BINARY:
			return 'PGM (raw)'
		case PnmFormat.PPM_BINARY:
			return 'PPM (raw)'
		case PnmFormat.PAM:
			return 'PAM'
	}
}
