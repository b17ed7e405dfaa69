import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import {afterEach, beforeEach, describe, expect, it} from 'vitest'
import {EXIT, run, USAGE} from './cli'
import {buildArchive, minimalManifest} from './test-utils'

interface Captured {
	stderr: string[]
	stdout: string[]
}

async function runCli(...argv: string[]): Promise<Captured & {code: number}> {
	const captured: Captured = {stderr: [], stdout: []}
	const code = await run(argv, {
		stderr: line => captured.stderr.push(line),
		stdout: text => captured.stdout.push(text)
	})
	return {...captured, code}
}

describe('axml-decode', () => {
	let dir: string

	beforeEach(async () => {
		dir = await fs.mkdtemp(path.join(os.tmpdir(), 'axml-decode-'))
	})

	afterEach(async () => {
		await fs.rm(dir, {recursive: true, force: true})
	})

	async function writeInput(name: string, bytes: Uint8Array): Promise<string> {
		const file = path.join(dir, name)
		await fs.writeFile(file, bytes)
		return file
	}

	it('prints usage for --help', async () => {
		const result = await runCli('--help')

		expect(result.code).toBe(EXIT.OK)
		expect(result.stdout).toEqual([`${USAGE}\n`])
		expect(result.stderr).toEqual([])
	})

	it('exits with a usage error without an input file', async () => {
		const result = await runCli()

		expect(result.code).toBe(EXIT.USAGE)
		expect(result.stderr).toEqual([USAGE])
	})

	it('exits with a usage error on too many arguments', async () => {
		expect((await runCli('a', 'b', 'c')).code).toBe(EXIT.USAGE)
	})

	it('exits with a usage error on an unknown option', async () => {
		const result = await runCli('in.xml', '--bogus')

		expect(result.code).toBe(EXIT.USAGE)
		expect(result.stderr[0]).toMatch(/^axml-decode: /)
		expect(result.stderr[1]).toBe(USAGE)
	})

	it('decodes a binary XML file to stdout', async () => {
		const input = await writeInput('AndroidManifest.xml', minimalManifest())

		const result = await runCli(input)

		expect(result.code).toBe(EXIT.OK)
		expect(result.stdout).toEqual(['<manifest package="com.example"/>\n'])
		expect(result.stderr).toEqual([])
	})

	it('adds the declaration on request', async () => {
		const input = await writeInput('AndroidManifest.xml', minimalManifest())

		const result = await runCli(input, '--declaration', '--pretty')

		expect(result.stdout).toEqual([
			'<?xml version="1.0" encoding="utf-8"?>\n<manifest package="com.example"/>\n'
		])
	})

	it('writes to the output file when one is given', async () => {
		const input = await writeInput('AndroidManifest.xml', minimalManifest())
		const output = path.join(dir, 'out.xml')

		const result = await runCli(input, output)

		expect(result.code).toBe(EXIT.OK)
		expect(result.stdout).toEqual([])
		expect(await fs.readFile(output, 'utf8')).toBe('<manifest package="com.example"/>\n')
	})

	it('decodes the manifest inside an APK', async () => {
		const apk = await buildArchive({
			'classes.dex': new TextEncoder().encode('dex'),
			'AndroidManifest.xml': minimalManifest()
		})
		const input = await writeInput('app.apk', apk)

		const result = await runCli(input)

		expect(result.code).toBe(EXIT.OK)
		expect(result.stdout).toEqual(['<manifest package="com.example"/>\n'])
	})

	it('decodes another archive entry with --entry', async () => {
		const apk = await buildArchive({'res/xml/config.xml': minimalManifest()})
		const input = await writeInput('app.apk', apk)

		const result = await runCli(input, '--entry', 'res/xml/config.xml')

		expect(result.code).toBe(EXIT.OK)
		expect(result.stdout).toEqual(['<manifest package="com.example"/>\n'])
	})

	it('takes a numeric entry name as a name', async () => {
		const apk = await buildArchive({'123': minimalManifest()})
		const input = await writeInput('app.apk', apk)

		const result = await runCli(input, '--entry', '123')

		expect(result.code).toBe(EXIT.OK)
		expect(result.stdout).toEqual(['<manifest package="com.example"/>\n'])
	})

	it('fails when the APK has no manifest', async () => {
		const apk = await buildArchive({'classes.dex': new TextEncoder().encode('dex')})
		const input = await writeInput('app.apk', apk)

		const result = await runCli(input)

		expect(result.code).toBe(EXIT.FAILURE)
		expect(result.stderr).toEqual([
			`axml-decode: ${input}: ManifestNotFound: no AndroidManifest.xml in archive. Files in archive: classes.dex`
		])
	})

	it('prints a JSON summary with --summary', async () => {
		const input = await writeInput('AndroidManifest.xml', minimalManifest())

		const result = await runCli(input, '--summary')

		expect(result.code).toBe(EXIT.OK)
		expect(JSON.parse(result.stdout.join(''))).toEqual({
			package: 'com.example',
			versionCode: '',
			versionName: '',
			minSdkVersion: '',
			targetSdkVersion: '',
			permissions: [],
			activities: []
		})
	})

	it('traces chunk headers to stderr', async () => {
		const input = await writeInput('AndroidManifest.xml', minimalManifest())

		const result = await runCli(input, '--trace')

		expect(result.code).toBe(EXIT.OK)
		expect(result.stderr).toHaveLength(4)
		expect(result.stderr[0]?.split('\n').slice(0, 2)).toEqual([
			'<!-- ═══ Chunk 0 ═══',
			'  type:          0x0003 (Xml)'
		])
		expect(result.stderr[1]?.split('\n')[1]).toBe('  type:          0x0001 (StringPool)')
	})

	it('reports malformed input and exits with failure', async () => {
		const input = await writeInput('AndroidManifest.xml', minimalManifest().subarray(0, 20))

		const result = await runCli(input)

		expect(result.code).toBe(EXIT.FAILURE)
		expect(result.stdout).toEqual([])
		expect(result.stderr).toHaveLength(1)
		expect(result.stderr[0]).toMatch(/^axml-decode: .*AndroidManifest\.xml: TruncatedBuffer: /)
	})

	it('warns about unrecognised inputs before decoding them', async () => {
		const input = await writeInput('data.bin', Uint8Array.of(0x02, 0x00, 0x08, 0x00, 0x08, 0x00, 0x00, 0x00))

		const result = await runCli(input)

		expect(result.code).toBe(EXIT.FAILURE)
		expect(result.stderr[0]).toBe(
			`axml-decode: warning: ${input}: unrecognised file type, decoding as binary XML`
		)
		expect(result.stderr[1]).toMatch(/InvalidChunkType/)
	})

	it('reports a missing input file', async () => {
		const result = await runCli(path.join(dir, 'missing.xml'))

		expect(result.code).toBe(EXIT.FAILURE)
		expect(result.stderr[0]).toMatch(/ENOENT/)
	})
})
