import { DecodeError } from '@pixmap/core'

const HASH = 0x23 // '#'
const NEWLINE = 0x0a
const DIGIT_0 = 0x30
const DIGIT_9 = 0x39

/** Largest integer accepted in a header or ASCII sample token */
export const MAX_TOKEN_VALUE = 0xffffffff

/**
 * Whitespace as classified by C isspace: space, \t, \n, \v, \f, \r
 */
export function isWhitespace(byte: number): boolean {
	return byte === 0x20 || (byte >= 0x09 && byte <= 0x0d)
}

/**
 * Cursor over the header and pixel bytes of a Netpbm file
 *
 * Header tokens are separated by whitespace and `#` comments. A comment runs
 * to the end of its line and may follow a token without intervening
 * whitespace, in which case it also terminates the token.
 */
export class TokenReader {
	private readonly data: Uint8Array
	private pos: number

	constructor(data: Uint8Array, start = 0) {
		this.data = data
		this.pos = start
	}

	get offset(): number {
		return this.pos
	}

	get atEnd(): boolean {
		return this.pos >= this.data.length
	}

	/**
	 * Advance past whitespace and comments to the first byte of the next token
	 */
	skipToToken(): void {
		while (this.pos < this.data.length) {
			const byte = this.data[this.pos]
			if (byte === HASH) {
				this.pos++
				this.skipComment()
			} else if (byte !== undefined && isWhitespace(byte)) {
				this.pos++
			} else {
				return
			}
		}
	}

	/**
	 * Consume one byte and report whether it ends a token.
	 * A `#` is consumed along with the rest of its comment line.
	 */
	isTokenTerminator(): boolean {
		const byte = this.data[this.pos]
		if (byte === undefined) return true
		this.pos++
		if (byte === HASH) {
			this.skipComment()
			return true
		}
		return isWhitespace(byte)
	}

	/**
	 * Consume `word` and its terminator, or leave the cursor untouched
	 */
	matchLiteral(word: string): boolean {
		const bookmark = this.pos

		for (let i = 0; i < word.length; i++) {
			if (this.data[this.pos] !== word.charCodeAt(i)) {
				this.pos = bookmark
				return false
			}
			this.pos++
		}

		if (this.isTokenTerminator()) return true

		this.pos = bookmark
		return false
	}

	/**
	 * Consume the current token and its terminator
	 */
	skipToken(): void {
		while (!this.isTokenTerminator()) {
			// advance
		}
	}

	/**
	 * Read the next token as ASCII text, consuming its terminator
	 */
	readToken(): string {
		this.skipToToken()

		let token = ''
		while (this.pos < this.data.length) {
			const byte = this.data[this.pos]
			if (byte === undefined || byte === HASH || isWhitespace(byte)) break
			token += String.fromCharCode(byte)
			this.pos++
		}

		this.isTokenTerminator()
		return token
	}

	/**
	 * Read the next whitespace-delimited decimal integer
	 */
	readUnsignedInt(): number {
		this.skipToToken()

		if (this.atEnd) {
			throw new DecodeError(
				'UnexpectedEof',
				'unexpected end-of-file reached while reading integer',
				this.pos
			)
		}

		let value = 0

		while (this.pos < this.data.length) {
			const byte = this.data[this.pos]
			if (byte === undefined) break
			this.pos++

			if (byte === HASH) {
				this.skipComment()
				break
			}
			if (isWhitespace(byte)) break

			if (byte < DIGIT_0 || byte > DIGIT_9) {
				throw new DecodeError(
					'MalformedInteger',
					`invalid character '${String.fromCharCode(byte)}' encountered in integer`,
					this.pos - 1
				)
			}

			value = value * 10 + (byte - DIGIT_0)
			if (value > MAX_TOKEN_VALUE) {
				throw new DecodeError(
					'MalformedInteger',
					`integer exceeds ${MAX_TOKEN_VALUE}`,
					this.pos - 1
				)
			}
		}

		return value
	}

	/**
	 * Read one raw byte of pixel data
	 */
	readByte(): number {
		const byte = this.data[this.pos]
		if (byte === undefined) {
			throw new DecodeError(
				'UnexpectedEof',
				'unexpected end-of-file reached while reading pixel data',
				this.pos
			)
		}
		this.pos++
		return byte
	}

	private skipComment(): void {
		while (this.pos < this.data.length) {
			if (this.data[this.pos++] === NEWLINE) return
		}
	}
}
