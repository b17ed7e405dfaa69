import type {ByteCursor} from './byte-cursor'
import {chunkEnd} from './chunk'
import {AxmlError} from './errors'
import type {ChunkHeader} from './types'

/**
 * Resource ids of attribute names, aligned with string pool indices:
 * ids[i] belongs to the attribute whose name is string i.
 */
export class ResourceMap {
	static readonly EMPTY = new ResourceMap([])

	readonly ids: readonly number[]

	constructor(ids: readonly number[]) {
		this.ids = ids
	}

	get size(): number {
		return this.ids.length
	}

	get(nameIndex: number): number | null {
		if (nameIndex < 0 || nameIndex >= this.ids.length) return null
		return this.ids[nameIndex] ?? null
	}

	static read(cursor: ByteCursor, header: ChunkHeader): ResourceMap {
		const bodySize = header.size - header.headerSize
		if (bodySize % 4 !== 0) {
			throw new AxmlError('InvalidChunkType', 'resource map body is not a whole number of ids', {
				chunkType: header.type,
				offset: header.offset,
				expected: 'multiple of 4',
				found: bodySize
			})
		}
		cursor.seekTo(header.offset + header.headerSize)
		const ids: number[] = []
		for (let i = 0; i < bodySize / 4; i++) {
			ids.push(cursor.readU32())
		}
		cursor.seekTo(chunkEnd(header))
		return new ResourceMap(ids)
	}
}
