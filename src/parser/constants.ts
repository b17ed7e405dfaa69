export const HEX: string[] = Array.from({length: 256}, (_, i) =>
	i.toString(16).padStart(2, '0')
)

export const CHUNK_TYPE = {
	NULL: 0x0000,
	STRING_POOL: 0x0001,
	TABLE: 0x0002,
	XML: 0x0003,
	XML_START_NAMESPACE: 0x0100,
	XML_END_NAMESPACE: 0x0101,
	XML_START_ELEMENT: 0x0102,
	XML_END_ELEMENT: 0x0103,
	XML_CDATA: 0x0104,
	XML_RESOURCE_MAP: 0x0180
} as const

export const CHUNK_TYPE_NAMES: Record<number, string> = {
	0x0000: 'Null',
	0x0001: 'StringPool',
	0x0002: 'Table',
	0x0003: 'Xml',
	0x0100: 'StartNamespace',
	0x0101: 'EndNamespace',
	0x0102: 'StartElement',
	0x0103: 'EndElement',
	0x0104: 'CData',
	0x0180: 'ResourceMap'
}

export const VALUE_TYPE = {
	NULL: 0x00,
	REFERENCE: 0x01,
	ATTRIBUTE: 0x02,
	STRING: 0x03,
	FLOAT: 0x04,
	DIMENSION: 0x05,
	FRACTION: 0x06,
	DYNAMIC_REFERENCE: 0x07,
	DYNAMIC_ATTRIBUTE: 0x08,
	INT_DEC: 0x10,
	INT_HEX: 0x11,
	INT_BOOLEAN: 0x12,
	INT_COLOR_ARGB8: 0x1c,
	INT_COLOR_RGB8: 0x1d,
	INT_COLOR_ARGB4: 0x1e,
	INT_COLOR_RGB4: 0x1f
} as const

export type ValueType = (typeof VALUE_TYPE)[keyof typeof VALUE_TYPE]

// Every header starts with type:u16, headerSize:u16, size:u32
export const CHUNK_HEADER_SIZE = 8

// Index fields are read as i32; 0xffffffff means "no string"
export const NO_INDEX = -1

export const STRING_POOL_FLAG = {
	SORTED: 0x001,
	UTF8: 0x100
} as const

// Node chunks: header(8) + lineNumber(4) + comment(4)
export const NODE_HEADER_SIZE = 16

// namespaceIndex, nameIndex, rawValueIndex, Res_value(8)
export const ATTRIBUTE_RECORD_SIZE = 20

export const TYPED_VALUE_SIZE = 8

export const COMPLEX = {
	UNIT_MASK: 0x0f,
	RADIX_SHIFT: 4,
	RADIX_MASK: 0x03,
	MANTISSA_SHIFT: 8
} as const

// Scale applied to (data & 0xffffff00) for radix 23p0, 16p7, 8p15, 0p23
export const RADIX_MULTIPLIERS: readonly number[] = [
	1 / (1 << 8),
	1 / (1 << 15),
	1 / (1 << 23),
	1 / 2 ** 31
]

export const DIMENSION_UNITS: readonly string[] = [
	'px',
	'dip',
	'sp',
	'pt',
	'in',
	'mm'
]

export const FRACTION_UNITS: readonly string[] = ['%', '%p']

export const ANDROID_MANIFEST_ENTRY = 'AndroidManifest.xml'
