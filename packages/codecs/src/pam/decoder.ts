/**
 * PAM (Portable Arbitrary Map) pixel decoder
 * Raw samples only; channel layout follows DEPTH
 */

import { decodeColor, decodeGrayscale, readRawSample } from '../pnm/samples'
import type { TokenReader } from '../pnm/tokenizer'
import type { PnmHeader } from '../pnm/types'

export function decodePamPixels(reader: TokenReader, header: PnmHeader, pixels: Uint32Array): void {
	const { maxVal, depth } = header

	switch (depth) {
		case 1:
			decodeGrayscale(reader, pixels, maxVal, readRawSample, false)
			break
		case 2:
			decodeGrayscale(reader, pixels, maxVal, readRawSample, true)
			break
		case 3:
			decodeColor(reader, pixels, maxVal, readRawSample, false)
			break
		default:
			decodeColor(reader, pixels, maxVal, readRawSample, true)
			break
	}
}
