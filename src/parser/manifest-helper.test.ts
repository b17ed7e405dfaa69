import {describe, expect, it} from 'vitest'
import {ANDROID_NS} from '../test-utils'
import {parseManifestXml} from './manifest-helper'

describe('parseManifestXml', () => {
	it('collects package, versions, permissions and activities', () => {
		const xml =
			`<manifest xmlns:android="${ANDROID_NS}" android:versionCode="7" android:versionName="1.2" package="com.example">` +
			'<uses-sdk android:minSdkVersion="21" android:targetSdkVersion="34"/>' +
			'<uses-permission android:name="android.permission.INTERNET"/>' +
			'<uses-permission android:name="android.permission.CAMERA"/>' +
			'<application>' +
			'<activity android:name=".Main"/>' +
			'<activity android:name=".Settings"/>' +
			'<activity-alias android:name=".Launcher"/>' +
			'</application>' +
			'</manifest>'

		expect(parseManifestXml(xml)).toEqual({
			package: 'com.example',
			versionCode: '7',
			versionName: '1.2',
			minSdkVersion: '21',
			targetSdkVersion: '34',
			permissions: ['android.permission.INTERNET', 'android.permission.CAMERA'],
			activities: ['.Main', '.Settings', '.Launcher']
		})
	})

	it('reads a single permission as a list', () => {
		const xml =
			`<manifest xmlns:a="${ANDROID_NS}" package="p">` +
			'<uses-permission a:name="android.permission.VIBRATE"/>' +
			'</manifest>'

		const summary = parseManifestXml(xml)

		expect(summary.permissions).toEqual(['android.permission.VIBRATE'])
		expect(summary.activities).toEqual([])
	})

	it('returns empty fields for a bare manifest', () => {
		expect(parseManifestXml('<manifest/>')).toEqual({
			package: '',
			versionCode: '',
			versionName: '',
			minSdkVersion: '',
			targetSdkVersion: '',
			permissions: [],
			activities: []
		})
	})
})
