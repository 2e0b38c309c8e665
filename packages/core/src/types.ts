import type { DecodeError } from './errors'

/**
 * Raw image data in RGBA format
 * Each pixel is 4 bytes: R, G, B, A (0-255)
 */
export interface ImageData {
	readonly width: number
	readonly height: number
	readonly data: Uint8Array // RGBA, length = width * height * 4
}

/**
 * Image with one 32-bit word per pixel, packed as 0xRRGGBBAA
 */
export interface PackedImage {
	readonly width: number
	readonly height: number
	readonly pixels: Uint32Array // length = width * height
}

/**
 * Supported image formats
 */
export type ImageFormat = 'pbm' | 'pgm' | 'ppm' | 'pam'

/**
 * Outcome of a non-throwing decode
 */
export type DecodeResult<T> =
	| { readonly ok: true; readonly image: T }
	| { readonly ok: false; readonly error: DecodeError }

/**
 * Decode-only codec
 */
export interface ImageDecoder<T extends PackedImage = PackedImage> {
	readonly name: string
	readonly mimeTypes: readonly string[]
	readonly extensions: readonly string[]
	canDecode(data: Uint8Array): boolean
	decode(data: Uint8Array): T
}
