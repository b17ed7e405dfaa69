import type {ResourceMap} from './resource-map'
import type {StringPool} from './string-pool'

export interface ChunkHeader {
	readonly headerSize: number
	readonly offset: number
	readonly size: number
	readonly type: number
}

export interface TypedValue {
	readonly data: number
	readonly res0: number
	readonly size: number
	readonly type: number
}

export interface XmlNamespace {
	readonly lineNumber: number
	readonly prefix: string
	readonly prefixIndex: number
	readonly uri: string
	readonly uriIndex: number
}

export interface XmlAttribute {
	readonly name: string
	readonly nameIndex: number
	readonly namespaceIndex: number
	readonly namespaceUri: string | null
	readonly prefix: string | null
	readonly rawValueIndex: number
	readonly resourceId: number | null
	readonly typedValue: TypedValue
	readonly value: string
}

export interface XmlText {
	readonly kind: 'text'
	readonly lineNumber: number
	readonly value: string
}

export interface XmlElement {
	readonly attributes: XmlAttribute[]
	readonly children: XmlNode[]
	readonly kind: 'element'
	readonly lineNumber: number
	readonly name: string
	readonly nameIndex: number
	readonly namespaceIndex: number
	readonly namespaceUri: string | null
	readonly namespaces: XmlNamespace[]
	readonly prefix: string | null
}

export type XmlNode = XmlElement | XmlText

export interface XmlDocument {
	readonly resourceMap: ResourceMap
	readonly root: XmlElement
	readonly stringPool: StringPool
}

export interface DecodeOptions {
	/** Observes every chunk header in stream order, including skipped ones. */
	readonly onChunk?: (header: ChunkHeader) => void
}

export interface SerializeOptions {
	readonly declaration?: boolean
	/** Indentation unit; omitted or empty means flat output. */
	readonly indent?: string
}
