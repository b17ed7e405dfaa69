import {CHUNK_TYPE_NAMES} from './constants'
import {hex16, hex32, hexDump} from './helpers'
import type {ChunkHeader} from './types'

export function chunkTypeName(type: number): string {
	return CHUNK_TYPE_NAMES[type] ?? 'Unknown'
}

/**
 * Diagnostic block for one chunk, in XML comment form so a trace can be
 * interleaved with decoded output. Pass the source bytes to include a dump
 * of the raw header.
 */
export function formatChunkHeaderComment(
	index: number,
	h: ChunkHeader,
	bytes?: Uint8Array
): string {
	const lines: string[] = []
	lines.push(`<!-- ═══ Chunk ${index} ═══`)
	lines.push(`  type:          ${hex16(h.type)} (${chunkTypeName(h.type)})`)
	lines.push(`  fileOffset:    ${hex32(h.offset)}`)
	lines.push(`  headerSize:    ${h.headerSize}`)
	lines.push(`  size:          ${h.size}`)
	if (bytes) {
		const end = Math.min(bytes.length, h.offset + h.headerSize)
		lines.push(`  header:        ${hexDump(bytes.subarray(h.offset, end))}`)
	}
	lines.push('-->')
	return lines.join('\n')
}
