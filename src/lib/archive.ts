import {
	configure,
	type FileEntry,
	Uint8ArrayReader,
	Uint8ArrayWriter,
	ZipReader
} from '@zip.js/zip.js'
import {ANDROID_MANIFEST_ENTRY} from '../parser/constants'

// Inflate on the calling thread with the bundled codecs
configure({useWebWorkers: false, useCompressionStream: false})

export type ArchiveErrorCode = 'InvalidArchive' | 'ManifestNotFound'

export class ArchiveError extends Error {
	readonly code: ArchiveErrorCode

	constructor(code: ArchiveErrorCode, message: string, options?: {cause?: unknown}) {
		super(`${code}: ${message}`, options)
		this.name = 'ArchiveError'
		this.code = code
	}
}

export interface ArchiveEntry {
	compressedSize: number
	name: string
	size: number
}

async function readFileEntries(reader: ZipReader<Uint8Array>): Promise<FileEntry[]> {
	try {
		const entries = await reader.getEntries()
		return entries.filter(
			(e): e is FileEntry => !e.directory && Boolean(e.filename)
		)
	} catch (e) {
		throw new ArchiveError(
			'InvalidArchive',
			`cannot read archive: ${e instanceof Error ? e.message : String(e)}`,
			{cause: e}
		)
	}
}

export async function listEntries(archive: Uint8Array): Promise<ArchiveEntry[]> {
	const reader = new ZipReader(new Uint8ArrayReader(archive))
	try {
		const entries = await readFileEntries(reader)
		return entries.map(entry => ({
			name: entry.filename,
			size: entry.uncompressedSize,
			compressedSize: entry.compressedSize || 0
		}))
	} finally {
		await reader.close()
	}
}

/**
 * Return the uncompressed bytes of one archive entry, by default the
 * application manifest.
 */
export async function extractEntry(
	archive: Uint8Array,
	entryName: string = ANDROID_MANIFEST_ENTRY
): Promise<Uint8Array> {
	const reader = new ZipReader(new Uint8ArrayReader(archive))
	try {
		const entries = await readFileEntries(reader)
		const entry = entries.find(e => e.filename === entryName)
		if (!entry) {
			throw new ArchiveError(
				'ManifestNotFound',
				`no ${entryName} in archive. Files in archive: ${
					entries.map(e => e.filename).join(', ') || '(none)'
				}`
			)
		}
		return await entry.getData(new Uint8ArrayWriter())
	} finally {
		await reader.close()
	}
}
