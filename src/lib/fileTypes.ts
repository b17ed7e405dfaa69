export type FileType = 'apk' | 'axml' | 'unknown'

const ARCHIVE_EXTENSIONS = ['.apk', '.zip', '.jar', '.aar']

/**
 * Classify an input by its leading bytes, falling back to the file name
 * when the bytes are missing or inconclusive.
 */
export function detectFileType(fileName: string, bytes?: Uint8Array): FileType {
	if (bytes && bytes.length >= 4) {
		// "PK\x03\x04" local file header
		if (bytes[0] === 0x50 && bytes[1] === 0x4b && bytes[2] === 0x03 && bytes[3] === 0x04) {
			return 'apk'
		}
		// RES_XML_TYPE chunk, little-endian
		if (bytes[0] === 0x03 && bytes[1] === 0x00) return 'axml'
	}
	const lower = fileName.toLowerCase()
	if (ARCHIVE_EXTENSIONS.some(ext => lower.endsWith(ext))) return 'apk'
	if (lower.endsWith('.xml')) return 'axml'
	return 'unknown'
}
