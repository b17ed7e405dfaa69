import {defineConfig} from 'vitest/config'

export default defineConfig({
	test: {
		clearMocks: true,
		environment: 'node',
		include: ['src/**/*.test.ts'],
		testTimeout: 20_000
	}
})
