import {XMLParser} from 'fast-xml-parser'

/**
 * Pulls the commonly inspected manifest fields out of decoded XML text.
 *
 * Namespace prefixes are stripped, so `android:name` is read as `name`
 * whatever prefix the document bound.
 */

const ARRAY_TAGS = new Set(['uses-permission', 'activity', 'activity-alias'])

const parser = new XMLParser({
	ignoreAttributes: false,
	attributeNamePrefix: '@_',
	removeNSPrefix: true,
	parseAttributeValue: false,
	isArray: (tagName, _jPath, _isLeafNode, isAttribute) =>
		!isAttribute && ARRAY_TAGS.has(tagName)
})

interface NamedNode {
	'@_name'?: string
}

interface ParsedManifest {
	// An element with neither attributes nor children parses to ''
	manifest?: string | {
		'@_package'?: string
		'@_versionCode'?: string
		'@_versionName'?: string
		'uses-sdk'?: {'@_minSdkVersion'?: string; '@_targetSdkVersion'?: string} | string
		'uses-permission'?: Array<NamedNode | string>
		application?: {
			activity?: Array<NamedNode | string>
			'activity-alias'?: Array<NamedNode | string>
		} | string
	}
}

export interface ManifestSummary {
	activities: string[]
	minSdkVersion: string
	package: string
	permissions: string[]
	targetSdkVersion: string
	versionCode: string
	versionName: string
}

function names(nodes: Array<NamedNode | string> | undefined): string[] {
	const result: string[] = []
	for (const node of nodes ?? []) {
		const name = typeof node === 'object' ? node['@_name'] : undefined
		if (name) result.push(name)
	}
	return result
}

export function parseManifestXml(xmlString: string): ManifestSummary {
	const parsed: ParsedManifest = parser.parse(xmlString)
	const manifest = typeof parsed.manifest === 'object' ? parsed.manifest : undefined
	const rawSdk = manifest?.['uses-sdk']
	const sdk = typeof rawSdk === 'object' ? rawSdk : undefined
	const rawApplication = manifest?.application
	const application = typeof rawApplication === 'object' ? rawApplication : undefined

	return {
		package: manifest?.['@_package'] ?? '',
		versionCode: manifest?.['@_versionCode'] ?? '',
		versionName: manifest?.['@_versionName'] ?? '',
		minSdkVersion: sdk?.['@_minSdkVersion'] ?? '',
		targetSdkVersion: sdk?.['@_targetSdkVersion'] ?? '',
		permissions: names(manifest?.['uses-permission']),
		activities: [
			...names(application?.activity),
			...names(application?.['activity-alias'])
		]
	}
}
