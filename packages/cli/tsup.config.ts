import { defineConfig } from 'tsup'

export default defineConfig({
	entry: ['src/index.ts'],
	format: ['esm'],
	platform: 'node',
	target: 'node20',
	noExternal: [/^@markaz\//],
	external: ['better-sqlite3'],
	splitting: false,
	sourcemap: true,
	clean: true,
	minify: false,
})
