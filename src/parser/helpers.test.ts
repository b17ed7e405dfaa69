import {describe, expect, it} from 'vitest'
import {hex16, hex32, hexDump, hexWord, xmlEscape, xmlEscapeText} from './helpers'

describe('hex formatting', () => {
	it('pads to width', () => {
		expect(hex16(0x102)).toBe('0x0102')
		expect(hex32(0x24)).toBe('0x00000024')
		expect(hex32(-1)).toBe('0xffffffff')
		expect(hexWord(0x7f0a0001)).toBe('7f0a0001')
	})

	it('dumps bytes separated by spaces', () => {
		expect(hexDump(Uint8Array.of(0x03, 0x00, 0xff))).toBe('03 00 ff')
		expect(hexDump(new Uint8Array(0))).toBe('')
	})
})

describe('xml escaping', () => {
	it('escapes quotes in attribute values', () => {
		expect(xmlEscape('a<b & "c">')).toBe('a&lt;b &amp; &quot;c&quot;&gt;')
	})

	it('leaves quotes alone in text', () => {
		expect(xmlEscapeText('say "hi" & <go>')).toBe('say "hi" &amp; &lt;go&gt;')
	})

	it('returns plain strings unchanged', () => {
		expect(xmlEscape('com.example')).toBe('com.example')
		expect(xmlEscapeText("it's")).toBe("it's")
	})
})
