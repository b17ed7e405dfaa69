import type {ByteCursor} from './byte-cursor'
import {CHUNK_HEADER_SIZE} from './constants'
import {AxmlError} from './errors'
import type {ChunkHeader} from './types'

/**
 * Read the 8-byte header at the cursor and check it against the buffer.
 * The cursor is left just past the common header fields.
 */
export function readChunkHeader(cursor: ByteCursor): ChunkHeader {
	const offset = cursor.position
	const type = cursor.readU16()
	const headerSize = cursor.readU16()
	const size = cursor.readU32()

	if (headerSize < CHUNK_HEADER_SIZE) {
		throw new AxmlError('InvalidChunkType', 'header size below minimum', {
			chunkType: type,
			offset,
			expected: `>= ${CHUNK_HEADER_SIZE}`,
			found: headerSize
		})
	}
	if (size < headerSize) {
		throw new AxmlError('InvalidChunkType', 'chunk size smaller than its header', {
			chunkType: type,
			offset,
			expected: `>= ${headerSize}`,
			found: size
		})
	}
	if (offset + size > cursor.length) {
		throw new AxmlError('TruncatedBuffer', 'chunk extends past the end of the buffer', {
			chunkType: type,
			offset,
			expected: `${size} byte(s)`,
			found: `${cursor.length - offset} byte(s)`
		})
	}

	return {type, headerSize, size, offset}
}

/** Fail unless the header is at least `minimum` bytes long. */
export function requireHeaderSize(header: ChunkHeader, minimum: number): void {
	if (header.headerSize < minimum) {
		throw new AxmlError('InvalidChunkType', 'header too small for chunk type', {
			chunkType: header.type,
			offset: header.offset,
			expected: `>= ${minimum}`,
			found: header.headerSize
		})
	}
}

export function chunkEnd(header: ChunkHeader): number {
	return header.offset + header.size
}
