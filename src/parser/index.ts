export {AxmlDecoder, decodeAxml} from './axml'
export {ByteCursor} from './byte-cursor'
export {chunkEnd, readChunkHeader} from './chunk'
export {
	ANDROID_MANIFEST_ENTRY,
	CHUNK_TYPE,
	NO_INDEX,
	STRING_POOL_FLAG,
	VALUE_TYPE
} from './constants'
export type {ValueType} from './constants'
export {AxmlError, isAxmlError} from './errors'
export type {AxmlErrorCode, AxmlErrorContext} from './errors'
export {chunkTypeName, formatChunkHeaderComment} from './format'
export {hex32, xmlEscape} from './helpers'
export {parseManifestXml} from './manifest-helper'
export type {ManifestSummary} from './manifest-helper'
export {ResourceMap} from './resource-map'
export {serializeDocument, XML_DECLARATION} from './serializer'
export {StringPool} from './string-pool'
export {
	complexToFloat,
	formatFloat,
	readTypedValue,
	resolveTypedValue
} from './typed-value'
export type {
	ChunkHeader,
	DecodeOptions,
	SerializeOptions,
	TypedValue,
	XmlAttribute,
	XmlDocument,
	XmlElement,
	XmlNamespace,
	XmlNode,
	XmlText
} from './types'
