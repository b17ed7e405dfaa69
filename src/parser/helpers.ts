import {HEX} from './constants'

export function hex16(v: number): string {
	return `0x${v.toString(16).padStart(4, '0')}`
}

export function hex32(v: number): string {
	return `0x${(v >>> 0).toString(16).padStart(8, '0')}`
}

/** Eight lowercase hex digits, no prefix. */
export function hexWord(v: number): string {
	const u = v >>> 0
	return (
		HEX[u >>> 24]! + HEX[(u >>> 16) & 0xff]! + HEX[(u >>> 8) & 0xff]! + HEX[u & 0xff]!
	)
}

export function hexDump(bytes: Uint8Array): string {
	const parts: string[] = []
	for (let i = 0; i < bytes.length; i++) {
		parts.push(HEX[bytes[i]!]!)
	}
	return parts.join(' ')
}

export function xmlEscape(str: string): string {
	if (str.indexOf('&') === -1 && str.indexOf('<') === -1 &&
		str.indexOf('>') === -1 && str.indexOf('"') === -1) return str
	return str
		.replaceAll('&', '&amp;')
		.replaceAll('<', '&lt;')
		.replaceAll('>', '&gt;')
		.replaceAll('"', '&quot;')
}

export function xmlEscapeText(str: string): string {
	if (str.indexOf('&') === -1 && str.indexOf('<') === -1 &&
		str.indexOf('>') === -1) return str
	return str
		.replaceAll('&', '&amp;')
		.replaceAll('<', '&lt;')
		.replaceAll('>', '&gt;')
}

