import { DecodeError, packRgba } from '@pixmap/core'
import type { TokenReader } from './tokenizer'
import { PNM_BYTE_MAX_VALUE } from './types'

/**
 * Reads one sample and returns it rescaled to 0-255
 */
export type SampleReader = (reader: TokenReader, maxVal: number) => number

/**
 * Rescale a sample from 0..maxVal to 0..255 (truncating)
 */
export function scaleSample(sample: number, maxVal: number): number {
	return Math.floor((sample * 255) / maxVal)
}

function checkSample(sample: number, maxVal: number, offset: number): void {
	if (sample > maxVal) {
		throw new DecodeError(
			'RangeExceeded',
			`pixel value ${sample} greater than maxval ${maxVal} encountered`,
			offset
		)
	}
}

/**
 * Binary sample: one byte when maxVal <= 255, otherwise two bytes big-endian
 */
export const readRawSample: SampleReader = (reader, maxVal) => {
	const start = reader.offset
	let sample = reader.readByte()
	if (maxVal > PNM_BYTE_MAX_VALUE) {
		sample = (sample << 8) | reader.readByte()
	}

	checkSample(sample, maxVal, start)
	return scaleSample(sample, maxVal)
}

/**
 * ASCII sample: one decimal token
 */
export const readAsciiSample: SampleReader = (reader, maxVal) => {
	const sample = reader.readUnsignedInt()
	checkSample(sample, maxVal, reader.offset)
	return scaleSample(sample, maxVal)
}

/**
 * Fill `pixels` with gray (optionally gray + alpha) samples
 */
export function decodeGrayscale(
	reader: TokenReader,
	pixels: Uint32Array,
	maxVal: number,
	readSample: SampleReader,
	withAlpha: boolean
): void {
	for (let i = 0; i < pixels.length; i++) {
		const gray = readSample(reader, maxVal)
		const alpha = withAlpha ? readSample(reader, maxVal) : 0xff
		pixels[i] = packRgba(gray, gray, gray, alpha)
	}
}

/**
 * Fill `pixels` with RGB (optionally RGBA) samples
 */
export function decodeColor(
	reader: TokenReader,
	pixels: Uint32Array,
	maxVal: number,
	readSample: SampleReader,
	withAlpha: boolean
): void {
	for (let i = 0; i < pixels.length; i++) {
		const r = readSample(reader, maxVal)
		const g = readSample(reader, maxVal)
		const b = readSample(reader, maxVal)
		const a = withAlpha ? readSample(reader, maxVal) : 0xff
		pixels[i] = packRgba(r, g, b, a)
	}
}
