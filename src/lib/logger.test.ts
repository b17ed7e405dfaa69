import {describe, expect, it} from 'vitest'
import {createLogger} from './logger'

describe('createLogger', () => {
	it('prefixes errors and warnings', () => {
		const lines: string[] = []
		const log = createLogger(line => lines.push(line))

		log.error('bad input')
		log.warn('odd input')

		expect(lines).toEqual(['axml-decode: bad input', 'axml-decode: warning: odd input'])
	})

	it('writes trace output only when verbose', () => {
		const quiet: string[] = []
		const verbose: string[] = []

		createLogger(line => quiet.push(line)).trace('chunk')
		createLogger(line => verbose.push(line), 'tool', true).trace('chunk')

		expect(quiet).toEqual([])
		expect(verbose).toEqual(['chunk'])
	})
})
