import { DecodeError } from '@pixmap/core'
import type { TokenReader } from './tokenizer'
import {
	IMAGE_LIMITS,
	PNM_MAX_VALUE,
	type PnmFormat,
	type PnmHeader,
	getChannels,
	isBitmapFormat,
} from './types'

export function checkWidth(width: number, offset: number): void {
	if (width < 1) {
		throw new DecodeError('InvalidDimension', `width must be at least 1, got ${width}`, offset)
	}
}

export function checkHeight(height: number, offset: number): void {
	if (height < 1) {
		throw new DecodeError('InvalidDimension', `height must be at least 1, got ${height}`, offset)
	}
}

export function checkMaxVal(maxVal: number, offset: number): void {
	if (maxVal < 1 || maxVal > PNM_MAX_VALUE) {
		throw new DecodeError(
			'InvalidRange',
			`maxval must be between 1-${PNM_MAX_VALUE}, got ${maxVal}`,
			offset
		)
	}
}

/**
 * Reject images whose pixel buffer would exceed IMAGE_LIMITS.MAX_PIXELS
 */
export function checkPixelCount(width: number, height: number, offset: number): void {
	if (width * height > IMAGE_LIMITS.MAX_PIXELS) {
		throw new DecodeError(
			'InvalidDimension',
			`image of ${width} x ${height} pixels exceeds the limit of ${IMAGE_LIMITS.MAX_PIXELS} pixels`,
			offset
		)
	}
}

/**
 * Parse the positional header of P1-P6: width, height and (except PBM) maxval.
 * Each field is validated as soon as it has been read.
 */
export function readPnmHeader(reader: TokenReader, format: PnmFormat): PnmHeader {
	const width = reader.readUnsignedInt()
	checkWidth(width, reader.offset)

	const height = reader.readUnsignedInt()
	checkHeight(height, reader.offset)
	checkPixelCount(width, height, reader.offset)

	// PBM doesn't have maxVal
	let maxVal = 1
	if (!isBitmapFormat(format)) {
		maxVal = reader.readUnsignedInt()
		checkMaxVal(maxVal, reader.offset)
	}

	return { format, width, height, maxVal, depth: getChannels(format) }
}
