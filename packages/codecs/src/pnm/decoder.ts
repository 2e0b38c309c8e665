import { DecodeError } from '@pixmap/core'
import { decodePamPixels } from '../pam/decoder'
import { readPamHeader } from '../pam/header'
import { readPnmHeader } from './header'
import { decodeColor, decodeGrayscale, readAsciiSample, readRawSample } from './samples'
import { TokenReader } from './tokenizer'
import {
	PBM_BLACK,
	PBM_WHITE,
	PnmFormat,
	type PnmHeader,
	type PnmImage,
	formatFromMagic,
} from './types'

/**
 * One on-disk encoding: how its header is read and how its pixels are filled
 */
interface VariantDecoder {
	readHeader(reader: TokenReader): PnmHeader
	decodePixels(reader: TokenReader, header: PnmHeader, pixels: Uint32Array): void
}

/**
 * P1: one '0' or '1' per pixel, separators optional.
 * Any other byte outside whitespace and comments is rejected.
 */
function decodePbmAscii(reader: TokenReader, _header: PnmHeader, pixels: Uint32Array): void {
	for (let i = 0; i < pixels.length; i++) {
		reader.skipToToken()
		const offset = reader.offset
		const byte = reader.readByte()

		if (byte === 0x31) {
			pixels[i] = PBM_BLACK
		} else if (byte === 0x30) {
			pixels[i] = PBM_WHITE
		} else {
			throw new DecodeError(
				'MalformedInteger',
				`invalid character '${String.fromCharCode(byte)}' encountered in bitmap data`,
				offset
			)
		}
	}
}

/**
 * P4: packed bits, MSB first. Packing runs continuously across rows.
 */
function decodePbmBinary(reader: TokenReader, _header: PnmHeader, pixels: Uint32Array): void {
	let currentByte = 0

	for (let i = 0; i < pixels.length; i++) {
		const bitPos = i % 8
		if (bitPos === 0) {
			currentByte = reader.readByte()
		}
		pixels[i] = (currentByte >> (7 - bitPos)) & 1 ? PBM_BLACK : PBM_WHITE
	}
}

const readPositionalHeader =
	(format: PnmFormat) =>
	(reader: TokenReader): PnmHeader =>
		readPnmHeader(reader, format)

const VARIANT_DECODERS: Record<PnmFormat, VariantDecoder> = {
	[PnmFormat.PBM_ASCII]: {
		readHeader: readPositionalHeader(PnmFormat.PBM_ASCII),
		decodePixels: decodePbmAscii,
	},
	[PnmFormat.PGM_ASCII]: {
		readHeader: readPositionalHeader(PnmFormat.PGM_ASCII),
		decodePixels: (reader, { maxVal }, pixels) =>
			decodeGrayscale(reader, pixels, maxVal, readAsciiSample, false),
	},
	[PnmFormat.PPM_ASCII]: {
		readHeader: readPositionalHeader(PnmFormat.PPM_ASCII),
		decodePixels: (reader, { maxVal }, pixels) =>
			decodeColor(reader, pixels, maxVal, readAsciiSample, false),
	},
	[PnmFormat.PBM_BINARY]: {
		readHeader: readPositionalHeader(PnmFormat.PBM_BINARY),
		decodePixels: decodePbmBinary,
	},
	[PnmFormat.PGM_BINARY]: {
		readHeader: readPositionalHeader(PnmFormat.PGM_BINARY),
		decodePixels: (reader, { maxVal }, pixels) =>
			decodeGrayscale(reader, pixels, maxVal, readRawSample, false),
	},
	[PnmFormat.PPM_BINARY]: {
		readHeader: readPositionalHeader(PnmFormat.PPM_BINARY),
		decodePixels: (reader, { maxVal }, pixels) =>
			decodeColor(reader, pixels, maxVal, readRawSample, false),
	},
	[PnmFormat.PAM]: {
		readHeader: readPamHeader,
		decodePixels: decodePamPixels,
	},
}

/**
 * Read the two magic bytes: 'P' followed by '1'-'7'
 */
function readMagic(data: Uint8Array): PnmFormat {
	const digit = data[1]
	const format = data[0] === 0x50 && digit !== undefined ? formatFromMagic(digit) : null
	if (!format) {
		const seen = String.fromCharCode(...data.subarray(0, 2))
		throw new DecodeError(
			'InvalidMagic',
			`not a valid pnm file; invalid magic number ${JSON.stringify(seen)}, expected P1-P7`,
			0
		)
	}
	return format
}

function readHeader(data: Uint8Array): { reader: TokenReader; header: PnmHeader } {
	const format = readMagic(data)
	const reader = new TokenReader(data, 2)
	const header = VARIANT_DECODERS[format].readHeader(reader)
	return { reader, header }
}

/**
 * Parse the magic number and header without decoding pixels
 */
export function peekPnmHeader(data: Uint8Array): PnmHeader {
	return readHeader(data).header
}

/**
 * Decode PNM (PBM/PGM/PPM/PAM) to packed RGBA pixels
 */
export function decodePnm(data: Uint8Array): PnmImage {
	const { reader, header } = readHeader(data)
	const { width, height } = header

	const pixels = new Uint32Array(width * height)
	VARIANT_DECODERS[header.format].decodePixels(reader, header, pixels)

	return { width, height, pixels, header }
}
