import { defineConfig } from 'vitest/config'

export default defineConfig({
	test: {
		environment: 'node',
		include: ['src/**/*.test.ts'],
		env: {
			PROMPT_SEGMENTS_LOG_LEVEL: 'silent',
		},
	},
})
