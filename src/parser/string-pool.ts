import type {ByteCursor} from './byte-cursor'
import {chunkEnd, requireHeaderSize} from './chunk'
import {CHUNK_TYPE, NO_INDEX, STRING_POOL_FLAG} from './constants'
import {AxmlError} from './errors'
import type {AxmlErrorContext} from './errors'
import type {ChunkHeader} from './types'

// header(8) + stringCount, styleCount, flags, stringsStart, stylesStart
const STRING_POOL_HEADER_SIZE = 28

/**
 * The document's global string table. Entries are addressed by position;
 * style spans are skipped and not retained.
 */
export class StringPool {
	// Cached decoders, shared across all pools
	static utf8 = new TextDecoder('utf-8')
	static utf16 = new TextDecoder('utf-16le')

	static readonly EMPTY = new StringPool([], false, 0)

	private readonly strings: readonly string[]
	readonly isUtf8: boolean
	readonly styleCount: number

	constructor(strings: readonly string[], isUtf8: boolean, styleCount: number) {
		this.strings = strings
		this.isUtf8 = isUtf8
		this.styleCount = styleCount
	}

	get size(): number {
		return this.strings.length
	}

	/** `context` locates the referring field in error reports. */
	get(index: number, context: AxmlErrorContext = {}): string {
		const s = Number.isInteger(index) && index >= 0 ? this.strings[index] : undefined
		if (s === undefined) {
			throw new AxmlError('StringIndexOutOfRange', `no string at index ${index}`, {
				...context,
				expected: `< ${this.strings.length}`,
				found: `${index}`
			})
		}
		return s
	}

	/** Like get(), but the NO_INDEX sentinel yields null. */
	getOptional(index: number, context: AxmlErrorContext = {}): string | null {
		return index === NO_INDEX ? null : this.get(index, context)
	}

	toArray(): string[] {
		return [...this.strings]
	}

	/**
	 * Decode a string pool chunk whose common header has already been read.
	 * Leaves the cursor at the end of the chunk.
	 */
	static read(cursor: ByteCursor, header: ChunkHeader): StringPool {
		requireHeaderSize(header, STRING_POOL_HEADER_SIZE)
		const stringCount = cursor.readU32()
		const styleCount = cursor.readU32()
		const flags = cursor.readU32()
		const stringsStart = cursor.readU32()
		cursor.readU32() // stylesStart; spans are not decoded

		const end = chunkEnd(header)
		cursor.seekTo(header.offset + header.headerSize)

		if (header.headerSize + (stringCount + styleCount) * 4 > header.size) {
			throw new AxmlError('MalformedStringLength', 'offset table exceeds chunk', {
				chunkType: CHUNK_TYPE.STRING_POOL,
				offset: header.offset,
				expected: `<= ${header.size} byte(s)`,
				found: `${header.headerSize + (stringCount + styleCount) * 4} byte(s)`
			})
		}

		const offsets: number[] = []
		for (let i = 0; i < stringCount; i++) {
			offsets.push(cursor.readU32())
		}
		for (let i = 0; i < styleCount; i++) {
			cursor.readU32()
		}

		const isUtf8 = (flags & STRING_POOL_FLAG.UTF8) !== 0
		const reader = new EntryReader(cursor.bytes, end)
		const base = header.offset + stringsStart
		const strings: string[] = []
		for (const offset of offsets) {
			reader.pos = base + offset
			strings.push(isUtf8 ? reader.readUtf8() : reader.readUtf16())
		}

		cursor.seekTo(end)
		return new StringPool(strings, isUtf8, styleCount)
	}
}

/**
 * Reads one length-prefixed entry, bounded by the chunk end rather than
 * the buffer, so overruns surface as MalformedStringLength.
 */
class EntryReader {
	pos = 0
	private readonly bytes: Uint8Array
	private readonly end: number

	constructor(bytes: Uint8Array, end: number) {
		this.bytes = bytes
		this.end = end
	}

	private need(count: number, what: string): void {
		if (this.pos + count > this.end) {
			throw new AxmlError('MalformedStringLength', `${what} runs past the string pool`, {
				chunkType: CHUNK_TYPE.STRING_POOL,
				offset: this.pos,
				expected: `${count} byte(s)`,
				found: `${Math.max(0, this.end - this.pos)} byte(s)`
			})
		}
	}

	private u8(): number {
		this.need(1, 'length prefix')
		return this.bytes[this.pos++] ?? 0
	}

	private u16(): number {
		this.need(2, 'length prefix')
		const v = (this.bytes[this.pos] ?? 0) | ((this.bytes[this.pos + 1] ?? 0) << 8)
		this.pos += 2
		return v
	}

	// 1 or 2 bytes; high bit of the first byte selects the long form
	private lengthUtf8(): number {
		let len = this.u8()
		if (len & 0x80) len = ((len & 0x7f) << 8) | this.u8()
		return len
	}

	// 1 or 2 code units; high bit of the first unit selects the long form
	private lengthUtf16(): number {
		let len = this.u16()
		if (len & 0x8000) len = ((len & 0x7fff) * 0x1_00_00) + this.u16()
		return len
	}

	readUtf8(): string {
		this.lengthUtf8() // length in UTF-16 units, unused
		const byteLength = this.lengthUtf8()
		this.need(byteLength, 'string data')
		const s = StringPool.utf8.decode(this.bytes.subarray(this.pos, this.pos + byteLength))
		this.pos += byteLength
		return s
	}

	readUtf16(): string {
		const units = this.lengthUtf16()
		this.need(units * 2, 'string data')
		const s = StringPool.utf16.decode(this.bytes.subarray(this.pos, this.pos + units * 2))
		this.pos += units * 2
		return s
	}
}
