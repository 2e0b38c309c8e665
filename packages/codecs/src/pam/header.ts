/**
 * PAM keyword header
 *
 * ```
 * P7
 * WIDTH 2
 * HEIGHT 2
 * DEPTH 4
 * MAXVAL 255
 * TUPLTYPE RGB_ALPHA
 * ENDHDR
 * ```
 *
 * Keywords may come in any order and repeat (the last one wins). Keywords
 * other than the ones below are skipped together with their value token.
 */

import { DecodeError } from '@pixmap/core'
import { checkHeight, checkMaxVal, checkPixelCount, checkWidth } from '../pnm/header'
import type { TokenReader } from '../pnm/tokenizer'
import { PnmFormat, type PnmHeader } from '../pnm/types'
import { PAM_MAX_DEPTH, PAM_MIN_DEPTH } from './types'

export function readPamHeader(reader: TokenReader): PnmHeader {
	let width = 0
	let height = 0
	let depth = 0
	let maxVal = 0
	let tupleType: string | undefined

	for (;;) {
		reader.skipToToken()
		if (reader.atEnd) {
			throw new DecodeError(
				'UnexpectedEof',
				'unexpected end-of-file reached before ENDHDR',
				reader.offset
			)
		}

		if (reader.matchLiteral('DEPTH')) {
			depth = reader.readUnsignedInt()
		} else if (reader.matchLiteral('MAXVAL')) {
			maxVal = reader.readUnsignedInt()
		} else if (reader.matchLiteral('HEIGHT')) {
			height = reader.readUnsignedInt()
		} else if (reader.matchLiteral('WIDTH')) {
			width = reader.readUnsignedInt()
		} else if (reader.matchLiteral('ENDHDR')) {
			break
		} else if (reader.matchLiteral('TUPLTYPE')) {
			tupleType = reader.readToken()
		} else {
			reader.skipToken()
			reader.skipToToken()
			reader.skipToken()
		}
	}

	const offset = reader.offset
	if (depth < PAM_MIN_DEPTH || depth > PAM_MAX_DEPTH) {
		throw new DecodeError(
			'InvalidRange',
			`depth must be between ${PAM_MIN_DEPTH}-${PAM_MAX_DEPTH}, got ${depth}`,
			offset
		)
	}
	checkMaxVal(maxVal, offset)
	checkWidth(width, offset)
	checkHeight(height, offset)
	checkPixelCount(width, height, offset)

	const header: PnmHeader = { format: PnmFormat.PAM, width, height, maxVal, depth }
	return tupleType === undefined ? header : { ...header, tupleType }
}
