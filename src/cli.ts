import fs from 'node:fs/promises'
import path from 'node:path'
import cac from 'cac'
import {extractEntry} from './lib/archive'
import {detectFileType} from './lib/fileTypes'
import {createLogger} from './lib/logger'
import {
	ANDROID_MANIFEST_ENTRY,
	decodeAxml,
	formatChunkHeaderComment,
	parseManifestXml,
	serializeDocument
} from './parser'
import type {ChunkHeader} from './parser'

export const USAGE = `Usage: axml-decode <file> [output] [options]

Decode an Android binary XML file, or the manifest inside an APK.

Options:
  --pretty          indent the output
  --declaration     start the output with an XML declaration
  --summary         print package, versions, permissions and activities as JSON
  --entry <name>    archive entry to decode (default ${ANDROID_MANIFEST_ENTRY})
  --trace           write every chunk header to stderr
  -h, --help        show this help`

export const EXIT = {
	OK: 0,
	FAILURE: 1,
	USAGE: 2
} as const

export interface CliIo {
	stderr: (line: string) => void
	stdout: (text: string) => void
}

const defaultIo: CliIo = {
	stdout: text => {
		process.stdout.write(text)
	},
	stderr: line => {
		console.error(line)
	}
}

interface DecodeRequest {
	input: string
	options: {[name: string]: unknown}
	output: string | undefined
}

function createCli(requests: DecodeRequest[]): ReturnType<typeof cac> {
	const cli = cac('axml-decode')
	cli.option('-h, --help', 'show this help')
	cli
		.command('<file> [output]', 'decode an Android binary XML file')
		.option('--pretty', 'indent the output')
		.option('--declaration', 'start the output with an XML declaration')
		.option('--summary', 'print a JSON summary')
		.option('--entry <name>', 'archive entry to decode')
		.option('--trace', 'write every chunk header to stderr')
		.action(
			(input: string, output: string | undefined, options: {[name: string]: unknown}) => {
				requests.push({input, output, options})
			}
		)
	return cli
}

/** Runs the CLI and resolves to the process exit code. */
export async function run(argv: string[], io: CliIo = defaultIo): Promise<number> {
	const requests: DecodeRequest[] = []
	const cli = createCli(requests)
	try {
		const {args, options} = cli.parse(['node', 'axml-decode', ...argv], {run: false})
		if (options.help === true) {
			io.stdout(`${USAGE}\n`)
			return EXIT.OK
		}
		if (args.length === 0 || args.length > 2) {
			io.stderr(USAGE)
			return EXIT.USAGE
		}
		// Rejects unknown options and options missing their value
		cli.runMatchedCommand()
	} catch (e) {
		io.stderr(`axml-decode: ${e instanceof Error ? e.message : String(e)}`)
		io.stderr(USAGE)
		return EXIT.USAGE
	}

	const request = requests[0]
	if (request === undefined) {
		io.stderr(USAGE)
		return EXIT.USAGE
	}
	return decodeFile(request, io)
}

async function decodeFile({input, output, options}: DecodeRequest, io: CliIo): Promise<number> {
	const trace = options.trace === true
	const log = createLogger(io.stderr, 'axml-decode', trace)

	try {
		let bytes: Uint8Array = await fs.readFile(path.resolve(input))
		const type = detectFileType(input, bytes)
		if (type === 'apk') {
			// The argument parser turns numeric values into numbers
			const entry = options.entry === undefined ? ANDROID_MANIFEST_ENTRY : String(options.entry)
			bytes = await extractEntry(bytes, entry)
		} else if (type === 'unknown') {
			log.warn(`${input}: unrecognised file type, decoding as binary XML`)
		}

		let chunkIndex = 0
		const source = bytes
		const doc = decodeAxml(source, {
			onChunk: trace
				? (header: ChunkHeader) => {
						log.trace(formatChunkHeaderComment(chunkIndex++, header, source))
					}
				: undefined
		})

		const text =
			options.summary === true
				? JSON.stringify(parseManifestXml(serializeDocument(doc)), null, 2)
				: serializeDocument(doc, {
						indent: options.pretty === true ? '  ' : undefined,
						declaration: options.declaration === true
					})

		if (output !== undefined) {
			await fs.writeFile(path.resolve(output), `${text}\n`)
		} else {
			io.stdout(`${text}\n`)
		}
		return EXIT.OK
	} catch (e) {
		// AxmlError, ArchiveError and fs errors all carry a readable message
		if (e instanceof Error) {
			log.error(`${input}: ${e.message}`)
			return EXIT.FAILURE
		}
		throw e
	}
}
