import {ByteCursor} from './byte-cursor'
import {chunkEnd, readChunkHeader, requireHeaderSize} from './chunk'
import {
	ATTRIBUTE_RECORD_SIZE,
	CHUNK_TYPE,
	NO_INDEX,
	NODE_HEADER_SIZE,
	TYPED_VALUE_SIZE
} from './constants'
import {AxmlError} from './errors'
import {ResourceMap} from './resource-map'
import {StringPool} from './string-pool'
import {readTypedValue, resolveTypedValue} from './typed-value'
import type {
	ChunkHeader,
	DecodeOptions,
	XmlAttribute,
	XmlDocument,
	XmlElement,
	XmlNamespace
} from './types'

// prefixIndex, uriIndex
const NAMESPACE_BODY_SIZE = 8
// ns, name, attributeStart/Size/Count, id/class/style indices
const START_ELEMENT_BODY_SIZE = 20
const END_ELEMENT_BODY_SIZE = 8
const CDATA_BODY_SIZE = 4 + TYPED_VALUE_SIZE

/**
 * Decodes binary XML into an XmlDocument. The instance keeps only its
 * options; every decode() runs on fresh state, so one decoder can serve
 * any number of inputs.
 */
export class AxmlDecoder {
	readonly options: DecodeOptions

	constructor(options: DecodeOptions = {}) {
		this.options = options
	}

	decode(bytes: Uint8Array): XmlDocument {
		return new DecodePass(new ByteCursor(bytes), this.options).run()
	}
}

export function decodeAxml(bytes: Uint8Array, options?: DecodeOptions): XmlDocument {
	return new AxmlDecoder(options).decode(bytes)
}

interface NodeInfo {
	readonly header: ChunkHeader
	readonly lineNumber: number
	readonly bodyStart: number
}

class DecodePass {
	private readonly cursor: ByteCursor
	private readonly options: DecodeOptions
	private pool: StringPool | null = null
	private resourceMap = ResourceMap.EMPTY
	// Explicit stacks: nesting depth never touches the call stack
	private readonly namespaces: XmlNamespace[] = []
	private readonly elements: XmlElement[] = []
	// Namespaces started since the last start element
	private pending: XmlNamespace[] = []
	private root: XmlElement | null = null
	// Declarations written on the open elements, outermost first
	private readonly declared: XmlNamespace[] = []
	private readonly declaredCounts: number[] = []

	constructor(cursor: ByteCursor, options: DecodeOptions) {
		this.cursor = cursor
		this.options = options
	}

	run(): XmlDocument {
		const {cursor} = this
		const doc = readChunkHeader(cursor)
		this.options.onChunk?.(doc)
		if (doc.type !== CHUNK_TYPE.XML) {
			throw new AxmlError('InvalidChunkType', 'not a binary XML document', {
				chunkType: doc.type,
				offset: doc.offset,
				expected: CHUNK_TYPE.XML,
				found: doc.type
			})
		}

		const end = chunkEnd(doc)
		cursor.seekTo(doc.offset + doc.headerSize)

		while (cursor.position < end) {
			const header = this.nextChunk(end)
			this.options.onChunk?.(header)

			switch (header.type) {
				case CHUNK_TYPE.STRING_POOL:
					if (this.pool !== null) {
						throw new AxmlError('InvalidChunkType', 'second string pool', {
							chunkType: header.type,
							offset: header.offset
						})
					}
					this.pool = StringPool.read(cursor, header)
					break
				case CHUNK_TYPE.XML_RESOURCE_MAP:
					this.resourceMap = ResourceMap.read(cursor, header)
					break
				case CHUNK_TYPE.XML_START_NAMESPACE:
					this.startNamespace(this.readNode(header, NAMESPACE_BODY_SIZE))
					break
				case CHUNK_TYPE.XML_END_NAMESPACE:
					this.endNamespace(this.readNode(header, NAMESPACE_BODY_SIZE))
					break
				case CHUNK_TYPE.XML_START_ELEMENT:
					this.startElement(this.readNode(header, START_ELEMENT_BODY_SIZE))
					break
				case CHUNK_TYPE.XML_END_ELEMENT:
					this.endElement(this.readNode(header, END_ELEMENT_BODY_SIZE))
					break
				case CHUNK_TYPE.XML_CDATA:
					this.characterData(this.readNode(header, CDATA_BODY_SIZE))
					break
				default:
					// Unknown chunk types are skipped by their declared size
					break
			}

			cursor.seekTo(chunkEnd(header))
		}

		return this.finish(doc)
	}

	private nextChunk(documentEnd: number): ChunkHeader {
		const {cursor} = this
		const offset = cursor.position
		if (documentEnd - offset < 8) {
			throw new AxmlError('TruncatedBuffer', 'partial chunk header at end of document', {
				offset,
				expected: '8 byte(s)',
				found: `${documentEnd - offset} byte(s)`
			})
		}
		const header = readChunkHeader(cursor)
		if (chunkEnd(header) > documentEnd) {
			throw new AxmlError('TruncatedBuffer', 'chunk extends past the end of the document', {
				chunkType: header.type,
				offset,
				expected: `<= ${documentEnd - offset} byte(s)`,
				found: `${header.size} byte(s)`
			})
		}
		return header
	}

	private requirePool(header: ChunkHeader): StringPool {
		if (this.pool === null) {
			throw new AxmlError('InvalidChunkType', 'node chunk before the string pool', {
				chunkType: header.type,
				offset: header.offset
			})
		}
		return this.pool
	}

	private readNode(header: ChunkHeader, bodySize: number): NodeInfo {
		requireHeaderSize(header, NODE_HEADER_SIZE)
		if (header.size - header.headerSize < bodySize) {
			throw new AxmlError('InvalidChunkType', 'chunk body too short', {
				chunkType: header.type,
				offset: header.offset,
				expected: `>= ${bodySize} byte(s)`,
				found: `${header.size - header.headerSize} byte(s)`
			})
		}
		const lineNumber = this.cursor.readU32()
		this.cursor.readI32() // comment
		const bodyStart = header.offset + header.headerSize
		this.cursor.seekTo(bodyStart)
		return {header, lineNumber, bodyStart}
	}

	// Best-effort name for error messages; never throws
	private nameAt(index: number): string {
		if (this.pool === null || index < 0 || index >= this.pool.size) return `#${index}`
		return this.pool.get(index)
	}

	/**
	 * Pick the prefix that writes `namespaceIndex` correctly at the current
	 * element: the innermost declaration on an open element (or on the element
	 * itself) whose prefix is not rebound further in. Attributes cannot use
	 * the default namespace. A namespace that is in scope but declared on no
	 * open element is declared again on `declaring`, under a free prefix.
	 */
	private resolveNamespace(
		namespaceIndex: number,
		header: ChunkHeader,
		offset: number,
		declaring: XmlNamespace[],
		attribute: boolean
	): {uri: string | null; prefix: string | null} {
		if (namespaceIndex === NO_INDEX) return {uri: null, prefix: null}
		const context = {chunkType: header.type, offset}
		const uri = this.requirePool(header).get(namespaceIndex, context)
		if (!this.namespaces.some(ns => ns.uri === uri)) {
			throw new AxmlError('UnbalancedNamespace', 'namespace is not in scope', {
				...context,
				found: uri
			})
		}

		const usable = (ns: XmlNamespace): boolean =>
			ns.uri === uri && !(attribute && ns.prefix === '')
		const visible = [...this.declared, ...declaring]
		for (let i = visible.length - 1; i >= 0; i--) {
			const ns = visible[i]
			if (ns === undefined || !usable(ns)) continue
			const rebound = visible.slice(i + 1).some(later => later.prefix === ns.prefix)
			if (!rebound) return {uri, prefix: ns.prefix}
		}

		for (let i = this.namespaces.length - 1; i >= 0; i--) {
			const ns = this.namespaces[i]
			if (ns === undefined) continue
			// Only a prefix still unbound here, so no name already written changes meaning
			if (usable(ns) && !visible.some(v => v.prefix === ns.prefix)) {
				declaring.push(ns)
				return {uri, prefix: ns.prefix}
			}
		}
		throw new AxmlError('UnbalancedNamespace', 'no prefix for namespace at this element', {
			...context,
			expected: attribute ? 'a non-default prefix' : 'a prefix',
			found: uri
		})
	}

	private startNamespace({header, lineNumber, bodyStart}: NodeInfo): void {
		const pool = this.requirePool(header)
		const prefixIndex = this.cursor.readI32()
		const uriIndex = this.cursor.readI32()
		const ns: XmlNamespace = {
			prefix: pool.getOptional(prefixIndex, {chunkType: header.type, offset: bodyStart}) ?? '',
			uri: pool.get(uriIndex, {chunkType: header.type, offset: bodyStart + 4}),
			prefixIndex,
			uriIndex,
			lineNumber
		}
		this.namespaces.push(ns)
		this.pending.push(ns)
	}

	private endNamespace({header}: NodeInfo): void {
		this.requirePool(header)
		const prefixIndex = this.cursor.readI32()
		const uriIndex = this.cursor.readI32()
		const top = this.namespaces.at(-1)
		if (!top || top.prefixIndex !== prefixIndex || top.uriIndex !== uriIndex) {
			throw new AxmlError('UnbalancedNamespace', 'end namespace does not match the open namespace', {
				chunkType: header.type,
				offset: header.offset,
				expected: top ? `xmlns:${top.prefix}="${top.uri}"` : 'no open namespace',
				found: `xmlns:${this.nameAt(prefixIndex)}="${this.nameAt(uriIndex)}"`
			})
		}
		this.namespaces.pop()
		// A scope that closed before any element opened is declared nowhere
		if (this.pending.at(-1) === top) this.pending.pop()
	}

	private startElement({header, lineNumber, bodyStart}: NodeInfo): void {
		const {cursor} = this
		const pool = this.requirePool(header)
		const namespaceIndex = cursor.readI32()
		const nameIndex = cursor.readI32()
		const attributeStart = cursor.readU16()
		const attributeSize = cursor.readU16()
		const attributeCount = cursor.readU16()
		cursor.readU16() // idIndex
		cursor.readU16() // classIndex
		cursor.readU16() // styleIndex

		const attrBase = bodyStart + attributeStart
		if (attributeCount > 0) {
			if (attributeSize < ATTRIBUTE_RECORD_SIZE) {
				throw new AxmlError('InvalidChunkType', 'attribute record too small', {
					chunkType: header.type,
					offset: header.offset,
					expected: `>= ${ATTRIBUTE_RECORD_SIZE}`,
					found: attributeSize
				})
			}
			const attrEnd = attrBase + (attributeCount - 1) * attributeSize + ATTRIBUTE_RECORD_SIZE
			if (attrEnd > chunkEnd(header)) {
				throw new AxmlError('InvalidChunkType', 'attributes extend past the chunk', {
					chunkType: header.type,
					offset: header.offset,
					expected: `<= ${header.size} byte(s)`,
					found: `${attrEnd - header.offset} byte(s)`
				})
			}
		}

		const namespaces = this.pending
		this.pending = []
		const {uri, prefix} = this.resolveNamespace(
			namespaceIndex,
			header,
			bodyStart,
			namespaces,
			false
		)

		const attributes: XmlAttribute[] = []
		for (let i = 0; i < attributeCount; i++) {
			const recordOffset = attrBase + i * attributeSize
			cursor.seekTo(recordOffset)
			const attrNamespaceIndex = cursor.readI32()
			const attrNameIndex = cursor.readI32()
			const rawValueIndex = cursor.readI32()
			const typedValue = readTypedValue(cursor)
			const attrNs = this.resolveNamespace(
				attrNamespaceIndex,
				header,
				recordOffset,
				namespaces,
				true
			)
			const at = (field: number) => ({chunkType: header.type, offset: recordOffset + field})
			attributes.push({
				namespaceIndex: attrNamespaceIndex,
				nameIndex: attrNameIndex,
				rawValueIndex,
				typedValue,
				namespaceUri: attrNs.uri,
				prefix: attrNs.prefix,
				name: pool.get(attrNameIndex, at(4)),
				value:
					rawValueIndex !== NO_INDEX
						? pool.get(rawValueIndex, at(8))
						: resolveTypedValue(typedValue, pool, at(12)),
				resourceId: this.resourceMap.get(attrNameIndex)
			})
		}

		const element: XmlElement = {
			kind: 'element',
			namespaceIndex,
			nameIndex,
			namespaceUri: uri,
			prefix,
			name: pool.get(nameIndex, {chunkType: header.type, offset: bodyStart + 4}),
			attributes,
			children: [],
			namespaces,
			lineNumber
		}

		const parent = this.elements.at(-1)
		if (parent) {
			parent.children.push(element)
		} else if (this.root === null) {
			this.root = element
		} else {
			throw new AxmlError('UnbalancedElement', 'second root element', {
				chunkType: header.type,
				offset: header.offset,
				expected: 'end of document',
				found: `<${element.name}>`
			})
		}
		this.elements.push(element)
		this.declared.push(...namespaces)
		this.declaredCounts.push(namespaces.length)
	}

	private endElement({header}: NodeInfo): void {
		this.requirePool(header)
		const namespaceIndex = this.cursor.readI32()
		const nameIndex = this.cursor.readI32()
		const top = this.elements.at(-1)
		if (!top || top.nameIndex !== nameIndex || top.namespaceIndex !== namespaceIndex) {
			throw new AxmlError('UnbalancedElement', 'end element does not match the open element', {
				chunkType: header.type,
				offset: header.offset,
				expected: top ? `</${top.name}>` : 'no open element',
				found: `</${this.nameAt(nameIndex)}>`
			})
		}
		this.elements.pop()
		this.declared.length -= this.declaredCounts.pop() ?? 0
	}

	private characterData({header, lineNumber, bodyStart}: NodeInfo): void {
		const pool = this.requirePool(header)
		const dataIndex = this.cursor.readI32()
		const typedValue = readTypedValue(this.cursor)
		const top = this.elements.at(-1)
		if (!top) {
			throw new AxmlError('UnbalancedElement', 'character data outside the root element', {
				chunkType: header.type,
				offset: header.offset
			})
		}
		const value =
			dataIndex !== NO_INDEX
				? pool.get(dataIndex, {chunkType: header.type, offset: bodyStart})
				: resolveTypedValue(typedValue, pool, {chunkType: header.type, offset: bodyStart + 4})
		top.children.push({kind: 'text', value, lineNumber})
	}

	private finish(doc: ChunkHeader): XmlDocument {
		const open = this.elements.at(-1)
		if (open) {
			throw new AxmlError('UnbalancedElement', 'element left open at end of document', {
				offset: chunkEnd(doc),
				expected: `</${open.name}>`,
				found: 'end of document'
			})
		}
		const openNs = this.namespaces.at(-1)
		if (openNs) {
			throw new AxmlError('UnbalancedNamespace', 'namespace left open at end of document', {
				offset: chunkEnd(doc),
				expected: `end of xmlns:${openNs.prefix}="${openNs.uri}"`,
				found: 'end of document'
			})
		}
		if (this.pool === null) {
			throw new AxmlError('InvalidChunkType', 'document has no string pool', {
				offset: doc.offset,
				chunkType: doc.type
			})
		}
		if (this.root === null) {
			throw new AxmlError('UnbalancedElement', 'document has no root element', {
				offset: doc.offset,
				chunkType: doc.type
			})
		}
		return {root: this.root, stringPool: this.pool, resourceMap: this.resourceMap}
	}
}
