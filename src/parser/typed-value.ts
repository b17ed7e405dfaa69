import type {ByteCursor} from './byte-cursor'
import {
	COMPLEX,
	DIMENSION_UNITS,
	FRACTION_UNITS,
	HEX,
	RADIX_MULTIPLIERS,
	VALUE_TYPE
} from './constants'
import {AxmlError} from './errors'
import type {AxmlErrorContext} from './errors'
import {hexWord} from './helpers'
import type {StringPool} from './string-pool'
import type {TypedValue} from './types'

export function readTypedValue(cursor: ByteCursor): TypedValue {
	const size = cursor.readU16()
	const res0 = cursor.readU8()
	const type = cursor.readU8()
	const data = cursor.readU32()
	return {size, res0, type, data}
}

/** Seven significant digits, the precision a float32 carries; whole numbers keep ".0". */
export function formatFloat(v: number): string {
	if (!Number.isFinite(v)) return String(v)
	// toPrecision and toFixed both drop the sign of negative zero
	if (Object.is(v, -0)) return '-0.0'
	const rounded = Number(v.toPrecision(7))
	return Number.isInteger(rounded) ? rounded.toFixed(1) : String(rounded)
}

export function float32FromBits(data: number): number {
	const dv = new DataView(new ArrayBuffer(4))
	dv.setUint32(0, data >>> 0)
	return dv.getFloat32(0)
}

/** Decode a complex (dimension/fraction) value, ignoring its unit. */
export function complexToFloat(data: number): number {
	// Masking keeps the mantissa in place as a signed int32
	const mantissa = data & ~((1 << COMPLEX.MANTISSA_SHIFT) - 1)
	const radix = (data >> COMPLEX.RADIX_SHIFT) & COMPLEX.RADIX_MASK
	return mantissa * RADIX_MULTIPLIERS[radix]!
}

function nibble(data: number, shift: number): string {
	return ((data >>> shift) & 0xf).toString(16)
}

function unsupported(value: TypedValue, detail: string, context: AxmlErrorContext): AxmlError {
	return new AxmlError('UnsupportedTypedValue', detail, {
		...context,
		found: `type 0x${HEX[value.type & 0xff]} data 0x${hexWord(value.data)}`
	})
}

function complexUnit(
	value: TypedValue,
	units: readonly string[],
	context: AxmlErrorContext
): string {
	const unit = units[value.data & COMPLEX.UNIT_MASK]
	if (unit === undefined) {
		throw unsupported(value, `unknown complex unit ${value.data & COMPLEX.UNIT_MASK}`, context)
	}
	return unit
}

/**
 * Render a typed value as Android tooling prints it. String values are
 * looked up in `pool`; unknown type tags fail rather than guess.
 *
 * @param context  Chunk type and offset of the record, for error reports only.
 */
export function resolveTypedValue(
	value: TypedValue,
	pool: StringPool,
	context: AxmlErrorContext = {}
): string {
	const {data} = value
	switch (value.type) {
		case VALUE_TYPE.NULL:
			return ''
		case VALUE_TYPE.REFERENCE:
		case VALUE_TYPE.DYNAMIC_REFERENCE:
			return data === 0 ? '@null' : `@${hexWord(data)}`
		case VALUE_TYPE.ATTRIBUTE:
		case VALUE_TYPE.DYNAMIC_ATTRIBUTE:
			return `?${hexWord(data)}`
		case VALUE_TYPE.STRING:
			return pool.get(data, context)
		case VALUE_TYPE.FLOAT:
			return formatFloat(float32FromBits(data))
		case VALUE_TYPE.DIMENSION:
			return formatFloat(complexToFloat(data)) + complexUnit(value, DIMENSION_UNITS, context)
		case VALUE_TYPE.FRACTION:
			return formatFloat(complexToFloat(data) * 100) + complexUnit(value, FRACTION_UNITS, context)
		case VALUE_TYPE.INT_DEC:
			return String(data | 0)
		case VALUE_TYPE.INT_HEX:
			return `0x${(data >>> 0).toString(16)}`
		case VALUE_TYPE.INT_BOOLEAN:
			return data !== 0 ? 'true' : 'false'
		case VALUE_TYPE.INT_COLOR_ARGB8: {
			const hex = hexWord(data)
			return hex.startsWith('ff') ? `#${hex.slice(2)}` : `#${hex}`
		}
		case VALUE_TYPE.INT_COLOR_RGB8:
			return `#${hexWord(data).slice(2)}`
		case VALUE_TYPE.INT_COLOR_ARGB4: {
			const rgb = nibble(data, 20) + nibble(data, 12) + nibble(data, 4)
			const alpha = nibble(data, 28)
			return alpha === 'f' ? `#${rgb}` : `#${alpha}${rgb}`
		}
		case VALUE_TYPE.INT_COLOR_RGB4:
			return `#${nibble(data, 20)}${nibble(data, 12)}${nibble(data, 4)}`
		default:
			throw unsupported(value, 'unknown type tag', context)
	}
}
