import {AxmlError} from './errors'

/**
 * Sequential little-endian reader over an immutable byte buffer.
 * Every read is bounds-checked and throws TruncatedBuffer instead of
 * letting DataView raise a RangeError.
 */
export class ByteCursor {
	readonly bytes: Uint8Array
	private readonly dv: DataView
	private pos = 0

	constructor(bytes: Uint8Array) {
		this.bytes = bytes
		this.dv = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
	}

	get position(): number {
		return this.pos
	}

	get length(): number {
		return this.bytes.length
	}

	get remaining(): number {
		return this.bytes.length - this.pos
	}

	private require(count: number): void {
		if (count < 0 || this.pos + count > this.bytes.length) {
			throw new AxmlError('TruncatedBuffer', `cannot read ${count} byte(s)`, {
				offset: this.pos,
				expected: `${count} byte(s)`,
				found: `${this.remaining} byte(s)`
			})
		}
	}

	readU8(): number {
		this.require(1)
		const v = this.dv.getUint8(this.pos)
		this.pos += 1
		return v
	}

	readU16(): number {
		this.require(2)
		const v = this.dv.getUint16(this.pos, true)
		this.pos += 2
		return v
	}

	readU32(): number {
		this.require(4)
		const v = this.dv.getUint32(this.pos, true)
		this.pos += 4
		return v
	}

	readI32(): number {
		this.require(4)
		const v = this.dv.getInt32(this.pos, true)
		this.pos += 4
		return v
	}

	/** Zero-copy view of the next `len` bytes. */
	slice(len: number): Uint8Array {
		this.require(len)
		const view = this.bytes.subarray(this.pos, this.pos + len)
		this.pos += len
		return view
	}

	skip(len: number): void {
		this.require(len)
		this.pos += len
	}

	seekTo(offset: number): void {
		if (offset < 0 || offset > this.bytes.length) {
			throw new AxmlError('TruncatedBuffer', `cannot seek to ${offset}`, {
				offset: this.pos,
				expected: `offset <= ${this.bytes.length}`,
				found: offset
			})
		}
		this.pos = offset
	}
}
