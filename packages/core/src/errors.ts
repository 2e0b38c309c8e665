/**
 * Failure categories shared by all decoders
 */
export type DecodeErrorCode =
	| 'IoOpenFailure' // input could not be opened or read
	| 'InvalidMagic'
	| 'UnexpectedEof' // data ended mid-token or mid-pixel
	| 'MalformedInteger'
	| 'InvalidDimension' // width/height < 1 or over the pixel limit
	| 'InvalidRange' // maxval or depth out of bounds
	| 'RangeExceeded' // sample greater than maxval

export class DecodeError extends Error {
	readonly code: DecodeErrorCode
	/** Byte offset in the input where the failure was detected, when known */
	readonly offset: number | undefined

	constructor(code: DecodeErrorCode, message: string, offset?: number) {
		super(message)
		this.name = 'DecodeError'
		this.code = code
		this.offset = offset
	}
}

export function isDecodeError(value: unknown): value is DecodeError {
	return value instanceof DecodeError
}
