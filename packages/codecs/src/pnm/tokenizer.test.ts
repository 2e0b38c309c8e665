import { DecodeError } from '@pixmap/core'
import { describe, expect, it } from 'vitest'
import { TokenReader, isWhitespace } from './tokenizer'

const reader = (text: string) => new TokenReader(new TextEncoder().encode(text))

function captureError(fn: () => unknown): DecodeError {
	try {
		fn()
	} catch (err) {
		if (err instanceof DecodeError) return err
		throw err
	}
	throw new Error('expected a DecodeError')
}

describe('TokenReader', () => {
	describe('isWhitespace', () => {
		it('should accept the isspace set', () => {
			for (const ch of [' ', '\t', '\n', '\v', '\f', '\r']) {
				expect(isWhitespace(ch.charCodeAt(0))).toBe(true)
			}
			expect(isWhitespace('#'.charCodeAt(0))).toBe(false)
			expect(isWhitespace('0'.charCodeAt(0))).toBe(false)
		})
	})

	describe('skipToToken', () => {
		it('should skip whitespace and comments', () => {
			const r = reader('  # c\n\t42')
			r.skipToToken()
			expect(r.offset).toBe(7)
		})

		it('should stop at end of data', () => {
			const r = reader('  # trailing comment')
			r.skipToToken()
			expect(r.atEnd).toBe(true)
		})
	})

	describe('isTokenTerminator', () => {
		it('should consume one byte', () => {
			const r = reader('a b')
			expect(r.isTokenTerminator()).toBe(false)
			expect(r.offset).toBe(1)
			expect(r.isTokenTerminator()).toBe(true)
			expect(r.offset).toBe(2)
		})

		it('should treat a comment as a terminator and consume it', () => {
			const r = reader('#x\nY')
			expect(r.isTokenTerminator()).toBe(true)
			expect(r.offset).toBe(3)
		})

		it('should treat end of data as a terminator', () => {
			const r = reader('')
			expect(r.isTokenTerminator()).toBe(true)
			expect(r.offset).toBe(0)
		})
	})

	describe('matchLiteral', () => {
		it('should consume a matching word and its terminator', () => {
			const r = reader('WIDTH 3')
			expect(r.matchLiteral('WIDTH')).toBe(true)
			expect(r.offset).toBe(6)
		})

		it('should accept a comment or end of data as terminator', () => {
			const commented = reader('WIDTH#c\n3')
			expect(commented.matchLiteral('WIDTH')).toBe(true)
			expect(commented.offset).toBe(8)

			const last = reader('ENDHDR')
			expect(last.matchLiteral('ENDHDR')).toBe(true)
			expect(last.offset).toBe(6)
		})

		it('should restore the cursor on mismatch', () => {
			const longer = reader('WIDTHS 3')
			expect(longer.matchLiteral('WIDTH')).toBe(false)
			expect(longer.offset).toBe(0)

			const shorter = reader('WID')
			expect(shorter.matchLiteral('WIDTH')).toBe(false)
			expect(shorter.offset).toBe(0)

			const other = reader('HEIGHT 2')
			expect(other.matchLiteral('WIDTH')).toBe(false)
			expect(other.offset).toBe(0)
		})
	})

	describe('skipToken / readToken', () => {
		it('should skip one token', () => {
			const r = reader('FOO BAR')
			r.skipToken()
			expect(r.offset).toBe(4)
		})

		it('should read a token as text', () => {
			const r = reader('  RGB_ALPHA\nENDHDR')
			expect(r.readToken()).toBe('RGB_ALPHA')
			expect(r.offset).toBe(12)
		})
	})

	describe('readUnsignedInt', () => {
		it('should read consecutive integers', () => {
			const r = reader('  12 34')
			expect(r.readUnsignedInt()).toBe(12)
			expect(r.offset).toBe(5)
			expect(r.readUnsignedInt()).toBe(34)
			expect(r.atEnd).toBe(true)
		})

		it('should consume a comment that directly follows the integer', () => {
			const r = reader('7#note\n8')
			expect(r.readUnsignedInt()).toBe(7)
			expect(r.offset).toBe(7)
			expect(r.readUnsignedInt()).toBe(8)
		})

		it('should consume exactly one terminating whitespace byte', () => {
			const r = reader('255\n\n')
			expect(r.readUnsignedInt()).toBe(255)
			expect(r.offset).toBe(4)
		})

		it('should reject non-digit characters', () => {
			const error = captureError(() => reader('12a').readUnsignedInt())
			expect(error.code).toBe('MalformedInteger')
			expect(error.offset).toBe(2)
		})

		it('should reject values above 4294967295', () => {
			expect(reader('4294967295').readUnsignedInt()).toBe(4294967295)
			expect(captureError(() => reader('4294967296').readUnsignedInt()).code).toBe(
				'MalformedInteger'
			)
		})

		it('should fail at end of data', () => {
			expect(captureError(() => reader('').readUnsignedInt()).code).toBe('UnexpectedEof')
			expect(captureError(() => reader('  # only a comment\n').readUnsignedInt()).code).toBe(
				'UnexpectedEof'
			)
		})
	})

	describe('readByte', () => {
		it('should read raw bytes and fail at end of data', () => {
			const r = new TokenReader(new Uint8Array([0x00, 0xff]))
			expect(r.readByte()).toBe(0)
			expect(r.readByte()).toBe(255)
			const error = captureError(() => r.readByte())
			expect(error.code).toBe('UnexpectedEof')
			expect(error.offset).toBe(2)
		})
	})
})
