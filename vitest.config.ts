import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		// describe, it and expect are available without importing them
		globals: true,
		environment: 'node',
		include: ['src/**/*.test.ts'],
	},
});
