import {fileURLToPath} from 'node:url';
import {defineConfig} from 'vitest/config';

export default defineConfig({
	resolve: {
		alias: {
			'@petclinic/visits': fileURLToPath(new URL('./packages/visits', import.meta.url)),
		},
	},
	test: {
		include: ['packages/**/*.test.tsx'],
		setupFiles: ['./packages/visits/src/test/setup.tsx'],
		env: {
			NODE_ENV: 'test',
			VISITS_DATABASE_BACKEND: 'memory',
			CASSANDRA_KEYSPACE: 'petclinic',
			LOG_LEVEL: 'silent',
		},
	},
});
