import {Uint8ArrayReader, Uint8ArrayWriter, ZipWriter} from '@zip.js/zip.js'
import {CHUNK_TYPE, NO_INDEX, STRING_POOL_FLAG, VALUE_TYPE} from './parser/constants'

/** Little-endian byte sink for hand-assembled test inputs. */
export class ByteWriter {
	readonly bytes: number[] = []

	get length(): number {
		return this.bytes.length
	}

	u8(v: number): this {
		this.bytes.push(v & 0xff)
		return this
	}

	u16(v: number): this {
		return this.u8(v).u8(v >>> 8)
	}

	u32(v: number): this {
		return this.u16(v & 0xffff).u16(v >>> 16)
	}

	raw(data: ArrayLike<number>): this {
		for (let i = 0; i < data.length; i++) this.u8(data[i]!)
		return this
	}

	pad4(): this {
		while (this.bytes.length % 4 !== 0) this.u8(0)
		return this
	}

	/** Overwrite a u32 already written at `offset`. */
	patchU32(offset: number, v: number): void {
		this.bytes[offset] = v & 0xff
		this.bytes[offset + 1] = (v >>> 8) & 0xff
		this.bytes[offset + 2] = (v >>> 16) & 0xff
		this.bytes[offset + 3] = (v >>> 24) & 0xff
	}

	toUint8Array(): Uint8Array {
		return Uint8Array.from(this.bytes)
	}
}

export function chunk(type: number, headerSize: number, header: number[], body: number[] = []): number[] {
	const w = new ByteWriter()
	w.u16(type).u16(headerSize).u32(headerSize + body.length)
	w.raw(header)
	w.raw(body)
	return w.bytes
}

export interface AttrSpec {
	data?: number
	name: string
	ns?: string
	raw?: string
	type?: number
}

function lengthUtf8(len: number, w: ByteWriter): void {
	if (len < 0x80) w.u8(len)
	else w.u8((len >> 8) | 0x80).u8(len & 0xff)
}

function lengthUtf16(len: number, w: ByteWriter): void {
	if (len < 0x8000) w.u16(len)
	else w.u16((len >>> 16) | 0x8000).u16(len & 0xffff)
}

export function encodeStringPool(strings: readonly string[], utf8: boolean): number[] {
	const data = new ByteWriter()
	const offsets: number[] = []
	const encoder = new TextEncoder()
	for (const s of strings) {
		offsets.push(data.length)
		if (utf8) {
			const bytes = encoder.encode(s)
			lengthUtf8(s.length, data)
			lengthUtf8(bytes.length, data)
			data.raw(bytes).u8(0)
		} else {
			lengthUtf16(s.length, data)
			for (let i = 0; i < s.length; i++) data.u16(s.charCodeAt(i))
			data.u16(0)
		}
	}
	data.pad4()

	const header = new ByteWriter()
	header
		.u32(strings.length)
		.u32(0)
		.u32(utf8 ? STRING_POOL_FLAG.UTF8 : 0)
		.u32(28 + strings.length * 4)
		.u32(0)
	const body = new ByteWriter()
	for (const off of offsets) body.u32(off)
	body.raw(data.bytes)
	return chunk(CHUNK_TYPE.STRING_POOL, 28, header.bytes, body.bytes)
}

/**
 * Assembles a binary XML document chunk by chunk. Strings are interned on
 * first use, so pre-register attribute names with `strings()` when a
 * resource map must line up with them.
 */
export class AxmlBuilder {
	private readonly pool: string[] = []
	private readonly chunks: number[][] = []
	private utf8 = false
	private resourceIds: number[] | null = null
	private line = 1

	index(s: string): number {
		const i = this.pool.indexOf(s)
		if (i !== -1) return i
		this.pool.push(s)
		return this.pool.length - 1
	}

	strings(...values: string[]): this {
		for (const v of values) this.index(v)
		return this
	}

	useUtf8(): this {
		this.utf8 = true
		return this
	}

	resourceMap(ids: number[]): this {
		this.resourceIds = ids
		return this
	}

	private node(type: number, body: number[]): this {
		const header = new ByteWriter().u32(this.line++).u32(NO_INDEX)
		this.chunks.push(chunk(type, 16, header.bytes, body))
		return this
	}

	private optionalIndex(s: string | null | undefined): number {
		return s === null || s === undefined ? NO_INDEX : this.index(s)
	}

	startNamespace(prefix: string | null, uri: string): this {
		const body = new ByteWriter().u32(this.optionalIndex(prefix)).u32(this.index(uri))
		return this.node(CHUNK_TYPE.XML_START_NAMESPACE, body.bytes)
	}

	endNamespace(prefix: string | null, uri: string): this {
		const body = new ByteWriter().u32(this.optionalIndex(prefix)).u32(this.index(uri))
		return this.node(CHUNK_TYPE.XML_END_NAMESPACE, body.bytes)
	}

	startElement(name: string, attrs: AttrSpec[] = [], ns?: string): this {
		const body = new ByteWriter()
		body
			.u32(this.optionalIndex(ns))
			.u32(this.index(name))
			.u16(20)
			.u16(20)
			.u16(attrs.length)
			.u16(0)
			.u16(0)
			.u16(0)
		for (const attr of attrs) {
			const rawIndex = attr.raw === undefined ? NO_INDEX : this.index(attr.raw)
			body.u32(this.optionalIndex(attr.ns)).u32(this.index(attr.name)).u32(rawIndex)
			body
				.u16(8)
				.u8(0)
				.u8(attr.raw === undefined ? (attr.type ?? VALUE_TYPE.NULL) : VALUE_TYPE.STRING)
				.u32(attr.raw === undefined ? (attr.data ?? 0) : rawIndex)
		}
		return this.node(CHUNK_TYPE.XML_START_ELEMENT, body.bytes)
	}

	endElement(name: string, ns?: string): this {
		const body = new ByteWriter().u32(this.optionalIndex(ns)).u32(this.index(name))
		return this.node(CHUNK_TYPE.XML_END_ELEMENT, body.bytes)
	}

	cdata(text: string): this {
		const index = this.index(text)
		const body = new ByteWriter().u32(index).u16(8).u8(0).u8(VALUE_TYPE.STRING).u32(index)
		return this.node(CHUNK_TYPE.XML_CDATA, body.bytes)
	}

	/** Append an arbitrary chunk with an 8-byte header. */
	rawChunk(type: number, body: number[] = []): this {
		this.chunks.push(chunk(type, 8, [], body))
		return this
	}

	/** Chunks after the string pool and resource map, as built so far. */
	get nodeChunks(): number[][] {
		return this.chunks
	}

	build(nodeChunks: number[][] = this.chunks): Uint8Array {
		const body: number[] = [...encodeStringPool(this.pool, this.utf8)]
		if (this.resourceIds !== null) {
			const ids = new ByteWriter()
			for (const id of this.resourceIds) ids.u32(id)
			body.push(...chunk(CHUNK_TYPE.XML_RESOURCE_MAP, 8, [], ids.bytes))
		}
		for (const c of nodeChunks) body.push(...c)
		return Uint8Array.from(chunk(CHUNK_TYPE.XML, 8, [], body))
	}
}

export const ANDROID_NS = 'http://schemas.android.com/apk/res/android'

/** `<manifest package="com.example"/>` with no namespaces. */
export function minimalManifest(): Uint8Array {
	return new AxmlBuilder()
		.startElement('manifest', [{name: 'package', raw: 'com.example'}])
		.endElement('manifest')
		.build()
}

export async function buildArchive(entries: Record<string, Uint8Array>): Promise<Uint8Array> {
	const writer = new ZipWriter(new Uint8ArrayWriter())
	for (const [name, data] of Object.entries(entries)) {
		await writer.add(name, new Uint8ArrayReader(data), {level: 0})
	}
	return writer.close()
}

export function captureError(fn: () => unknown): unknown {
	try {
		fn()
	} catch (e) {
		return e
	}
	return undefined
}
