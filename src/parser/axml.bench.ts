import {bench, describe} from 'vitest'
import {ANDROID_NS, AxmlBuilder} from '../test-utils'
import {decodeAxml} from './axml'
import {VALUE_TYPE} from './constants'
import {parseManifestXml} from './manifest-helper'
import {serializeDocument} from './serializer'

function manifestWithActivities(count: number, utf8: boolean): Uint8Array {
	const b = new AxmlBuilder()
	if (utf8) b.useUtf8()
	b.startNamespace('android', ANDROID_NS)
		.startElement('manifest', [{name: 'package', raw: 'com.example.bench'}])
		.startElement('application')
	for (let i = 0; i < count; i++) {
		b.startElement('activity', [
			{ns: ANDROID_NS, name: 'name', raw: `.Activity${i}`},
			{ns: ANDROID_NS, name: 'exported', type: VALUE_TYPE.INT_BOOLEAN, data: i % 2}
		]).endElement('activity')
	}
	return b.endElement('application').endElement('manifest').endNamespace('android', ANDROID_NS).build()
}

const inputs = [
	{label: '100 activities, UTF-16', bytes: manifestWithActivities(100, false)},
	{label: '5000 activities, UTF-16', bytes: manifestWithActivities(5000, false)},
	{label: '5000 activities, UTF-8', bytes: manifestWithActivities(5000, true)}
]

for (const {label, bytes} of inputs) {
	describe(`${label} (${(bytes.length / 1024).toFixed(0)} KB)`, () => {
		const doc = decodeAxml(bytes)
		const xml = serializeDocument(doc)

		bench('decode', () => {
			decodeAxml(bytes)
		})

		bench('serialize (flat)', () => {
			serializeDocument(doc)
		})

		bench('serialize (pretty)', () => {
			serializeDocument(doc, {indent: '  '})
		})

		bench('summary', () => {
			parseManifestXml(xml)
		})
	})
}
