import {describe, expect, it} from 'vitest'
import {ByteWriter, captureError, chunk, encodeStringPool} from '../test-utils'
import {ByteCursor} from './byte-cursor'
import {readChunkHeader} from './chunk'
import {CHUNK_TYPE, NO_INDEX} from './constants'
import {StringPool} from './string-pool'

function readPool(bytes: number[]): {pool: StringPool; cursor: ByteCursor} {
	const cursor = new ByteCursor(Uint8Array.from(bytes))
	const header = readChunkHeader(cursor)
	return {pool: StringPool.read(cursor, header), cursor}
}

describe('StringPool', () => {
	it('decodes UTF-16 entries in index order', () => {
		const bytes = encodeStringPool(['manifest', 'package', ''], false)

		const {pool, cursor} = readPool(bytes)

		expect(pool.size).toBe(3)
		expect(pool.isUtf8).toBe(false)
		expect(pool.toArray()).toEqual(['manifest', 'package', ''])
		expect(cursor.position).toBe(bytes.length)
	})

	it('decodes UTF-8 entries when the UTF-8 flag is set', () => {
		const {pool} = readPool(encodeStringPool(['héllo', '日本語', 'plain'], true))

		expect(pool.isUtf8).toBe(true)
		expect(pool.toArray()).toEqual(['héllo', '日本語', 'plain'])
	})

	it('pairs UTF-16 surrogates into one code point', () => {
		const {pool} = readPool(encodeStringPool(['a😀b'], false))

		expect(pool.get(0)).toBe('a😀b')
		expect(pool.get(0).codePointAt(1)).toBe(0x1f600)
	})

	it('replaces a lone UTF-16 surrogate', () => {
		const {pool} = readPool(encodeStringPool(['a\ud800b'], false))

		expect(pool.get(0)).toBe('a\ufffdb')
	})

	it('handles the two-byte UTF-8 length form', () => {
		const long = 'x'.repeat(200)

		const {pool} = readPool(encodeStringPool([long, 'tail'], true))

		expect(pool.get(0)).toBe(long)
		expect(pool.get(1)).toBe('tail')
	})

	it('handles the two-unit UTF-16 length form', () => {
		const long = 'y'.repeat(0x8001)

		const {pool} = readPool(encodeStringPool([long], false))

		expect(pool.get(0).length).toBe(0x8001)
	})

	it('accepts an empty pool', () => {
		const {pool} = readPool(encodeStringPool([], false))
		expect(pool.size).toBe(0)
	})

	it('skips style offsets and span data', () => {
		const header = new ByteWriter().u32(1).u32(1).u32(0).u32(36).u32(44)
		const body = new ByteWriter()
			.u32(0) // string offset
			.u32(0) // style offset
			.u16(2).u16(0x68).u16(0x69).u16(0) // "hi"
			.u32(0xffffffff).u32(0xffffffff) // span list end
		const bytes = chunk(CHUNK_TYPE.STRING_POOL, 28, header.bytes, body.bytes)

		const {pool, cursor} = readPool(bytes)

		expect(pool.toArray()).toEqual(['hi'])
		expect(pool.styleCount).toBe(1)
		expect(cursor.position).toBe(52)
	})

	it('rejects a declared length that runs past the chunk', () => {
		const bytes = encodeStringPool(['abc'], false)
		// First entry's length prefix sits right after the header and offset table
		const w = new ByteWriter()
		w.raw(bytes)
		w.bytes[32] = 0x00
		w.bytes[33] = 0x01

		const err = captureError(() => readPool(w.bytes))

		expect(err).toMatchObject({code: 'MalformedStringLength', chunkType: CHUNK_TYPE.STRING_POOL})
	})

	it('rejects a UTF-8 byte length that runs past the chunk', () => {
		const w = new ByteWriter()
		w.raw(encodeStringPool(['abc'], true))
		// Byte length follows the one-byte character count
		w.bytes[33] = 0x7f

		const err = captureError(() => readPool(w.bytes))

		expect(err).toMatchObject({code: 'MalformedStringLength', chunkType: CHUNK_TYPE.STRING_POOL})
	})

	it('rejects an entry offset outside the chunk', () => {
		const w = new ByteWriter()
		w.raw(encodeStringPool(['abc'], false))
		w.patchU32(28, 0x1000)

		expect(captureError(() => readPool(w.bytes))).toMatchObject({code: 'MalformedStringLength'})
	})

	it('rejects a header smaller than the string pool header', () => {
		const bytes = chunk(CHUNK_TYPE.STRING_POOL, 16, new ByteWriter().u32(0).u32(0).bytes)

		expect(captureError(() => readPool(bytes))).toMatchObject({code: 'InvalidChunkType'})
	})

	describe('lookup', () => {
		const pool = new StringPool(['zero', 'one'], false, 0)

		it('returns the entry at an index', () => {
			expect(pool.get(1)).toBe('one')
		})

		it('fails for the index equal to the pool size', () => {
			expect(captureError(() => pool.get(2))).toMatchObject({
				code: 'StringIndexOutOfRange',
				found: '2'
			})
		})

		it('fails for negative indices', () => {
			expect(captureError(() => pool.get(-1))).toMatchObject({code: 'StringIndexOutOfRange'})
		})

		it('maps the sentinel to null in getOptional', () => {
			expect(pool.getOptional(NO_INDEX)).toBeNull()
			expect(pool.getOptional(0)).toBe('zero')
		})
	})
})
