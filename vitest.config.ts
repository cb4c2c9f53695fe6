// vitest.config.ts

import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		include: ['src/**/*.test.ts'],
		setupFiles: ['src/tests-setup.ts'],
		environment: 'node',
	},
});
