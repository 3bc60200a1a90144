import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		include: [
			'packages/*/src/**/*.test.ts',
			'transports/*/src/**/*.test.ts',
			'loggers/*/src/**/*.test.ts',
		],
		environment: 'node',
		testTimeout: 10_000,
	},
});
