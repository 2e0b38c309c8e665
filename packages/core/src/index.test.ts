import { describe, expect, test } from 'vitest'
import {
	DecodeError,
	detectFormat,
	formatPixel,
	getMimeType,
	isDecodeError,
	packRgba,
	toImageData,
	unpackRgba,
} from './index'

const ascii = (text: string) => new TextEncoder().encode(text)

describe('core', () => {
	describe('detectFormat', () => {
		test('maps every magic digit to its family', () => {
			expect(detectFormat(ascii('P1'))).toBe('pbm')
			expect(detectFormat(ascii('P4'))).toBe('pbm')
			expect(detectFormat(ascii('P2'))).toBe('pgm')
			expect(detectFormat(ascii('P5'))).toBe('pgm')
			expect(detectFormat(ascii('P3'))).toBe('ppm')
			expect(detectFormat(ascii('P6'))).toBe('ppm')
			expect(detectFormat(ascii('P7'))).toBe('pam')
		})

		test('rejects unknown magic', () => {
			expect(detectFormat(ascii('P9'))).toBeNull()
			expect(detectFormat(ascii('Q1'))).toBeNull()
			expect(detectFormat(ascii('P'))).toBeNull()
			expect(detectFormat(new Uint8Array(0))).toBeNull()
		})

		test('reports MIME types', () => {
			expect(getMimeType('pam')).toBe('image/x-portable-arbitrarymap')
			expect(getMimeType('pbm')).toBe('image/x-portable-bitmap')
		})
	})

	describe('pixels', () => {
		test('packs channels with red in the high byte', () => {
			expect(packRgba(0x12, 0x34, 0x56, 0x78)).toBe(0x12345678)
			expect(packRgba(255, 255, 255, 255)).toBe(0xffffffff)
		})

		test('unpacks channels', () => {
			expect(unpackRgba(0x808080ff)).toEqual([128, 128, 128, 255])
		})

		test('converts to RGBA bytes', () => {
			const image = toImageData({
				width: 2,
				height: 1,
				pixels: new Uint32Array([0xff000080, 0x000000ff]),
			})
			expect(image.width).toBe(2)
			expect(image.height).toBe(1)
			expect(Array.from(image.data)).toEqual([255, 0, 0, 128, 0, 0, 0, 255])
		})

		test('formats pixels as padded hex', () => {
			expect(formatPixel(0x000000ff)).toBe('0x000000FF')
			expect(formatPixel(0xffffffff)).toBe('0xFFFFFFFF')
		})
	})

	describe('DecodeError', () => {
		test('carries code and offset', () => {
			const error = new DecodeError('InvalidMagic', 'bad magic', 1)
			expect(error).toBeInstanceOf(Error)
			expect(error.name).toBe('DecodeError')
			expect(error.code).toBe('InvalidMagic')
			expect(error.offset).toBe(1)
			expect(isDecodeError(error)).toBe(true)
			expect(isDecodeError(new Error('other'))).toBe(false)
		})
	})
})
