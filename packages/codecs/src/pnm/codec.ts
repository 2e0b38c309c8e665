import { readFileSync } from 'node:fs'
import {
	DecodeError,
	type DecodeResult,
	type ImageDecoder,
	detectFormat,
	isDecodeError,
} from '@pixmap/core'
import { decodePnm } from './decoder'
import type { PnmImage } from './types'

/**
 * PNM (Portable Any Map) codec - decodes P1 through P7
 */
export class PnmCodec implements ImageDecoder<PnmImage> {
	readonly name = 'PNM'
	readonly mimeTypes = [
		'image/x-portable-bitmap',
		'image/x-portable-graymap',
		'image/x-portable-pixmap',
		'image/x-portable-arbitrarymap',
		'image/x-portable-anymap',
	]
	readonly extensions = ['.pbm', '.pgm', '.ppm', '.pam', '.pnm']

	canDecode(data: Uint8Array): boolean {
		// Magic: "P1" - "P7"
		return detectFormat(data) !== null
	}

	decode(data: Uint8Array): PnmImage {
		return decodePnm(data)
	}
}

/**
 * Decode PNM data, reporting failure as a value instead of throwing
 */
export function readPnm(data: Uint8Array): DecodeResult<PnmImage> {
	try {
		return { ok: true, image: decodePnm(data) }
	} catch (err) {
		if (isDecodeError(err)) return { ok: false, error: err }
		throw err
	}
}

/**
 * Open, read and decode a PNM file. The file is closed on every path.
 */
export function loadPnm(path: string): DecodeResult<PnmImage> {
	let data: Uint8Array
	try {
		data = new Uint8Array(readFileSync(path))
	} catch (err) {
		const reason = err instanceof Error ? err.message : String(err)
		return {
			ok: false,
			error: new DecodeError('IoOpenFailure', `error opening file '${path}': ${reason}`),
		}
	}
	return readPnm(data)
}
