/**
 * PAM (Portable Arbitrary Map) format types
 * Extension of PNM with a keyword header and 1-4 channels
 */

export type PAMTupleType =
	| 'BLACKANDWHITE'
	| 'GRAYSCALE'
	| 'RGB'
	| 'BLACKANDWHITE_ALPHA'
	| 'GRAYSCALE_ALPHA'
	| 'RGB_ALPHA'

/** Channels per pixel a PAM file may declare */
export const PAM_MIN_DEPTH = 1
export const PAM_MAX_DEPTH = 4

/**
 * Tuple type matching how a given depth is mapped onto RGBA
 */
export function getTupleType(depth: number): PAMTupleType | null {
	switch (depth) {
		case 1:
			return 'GRAYSCALE'
		case 2:
			return 'GRAYSCALE_ALPHA'
		case 3:
			return 'RGB'
		case 4:
			return 'RGB_ALPHA'
		default:
			return null
	}
}
