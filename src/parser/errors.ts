import {CHUNK_TYPE_NAMES} from './constants'
import {hex16, hex32} from './helpers'

const ERROR_CODES = {
	TruncatedBuffer: 'read past the end of the buffer',
	InvalidChunkType: 'invalid chunk',
	StringIndexOutOfRange: 'string index out of range',
	MalformedStringLength: 'malformed string length',
	UnbalancedNamespace: 'unbalanced namespace',
	UnbalancedElement: 'unbalanced element',
	UnsupportedTypedValue: 'unsupported typed value'
} as const

export type AxmlErrorCode = keyof typeof ERROR_CODES

export interface AxmlErrorContext {
	readonly chunkType?: number
	readonly expected?: string | number
	readonly found?: string | number
	readonly offset?: number
}

function describe(value: string | number): string {
	return typeof value === 'number' ? hex32(value) : value
}

/**
 * Decode failure. The message reads
 * `CODE: description, detail (chunk Name 0x0102 at 0x00000024, expected X, found Y)`.
 */
export class AxmlError extends Error {
	readonly code: AxmlErrorCode
	readonly chunkType?: number
	readonly expected?: string | number
	readonly found?: string | number
	readonly offset?: number

	constructor(code: AxmlErrorCode, detail: string, context: AxmlErrorContext = {}) {
		const where: string[] = []
		if (context.chunkType !== undefined) {
			const name = CHUNK_TYPE_NAMES[context.chunkType] ?? 'Unknown'
			where.push(`chunk ${name} ${hex16(context.chunkType)}`)
		}
		if (context.offset !== undefined) where.push(`at ${hex32(context.offset)}`)
		let suffix = where.join(' ')
		if (context.expected !== undefined) {
			suffix += `${suffix ? ', ' : ''}expected ${describe(context.expected)}`
		}
		if (context.found !== undefined) {
			suffix += `${suffix ? ', ' : ''}found ${describe(context.found)}`
		}
		super(
			`${code}: ${ERROR_CODES[code]}, ${detail}${suffix ? ` (${suffix})` : ''}`
		)
		this.name = 'AxmlError'
		this.code = code
		this.chunkType = context.chunkType
		this.expected = context.expected
		this.found = context.found
		this.offset = context.offset
	}
}

export function isAxmlError(err: unknown, code?: AxmlErrorCode): err is AxmlError {
	return err instanceof AxmlError && (code === undefined || err.code === code)
}
