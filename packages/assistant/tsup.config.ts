import { defineConfig } from 'tsup'

export default defineConfig({
	entry: ['src/main.ts'],
	format: ['esm'],
	platform: 'node',
	target: 'node20',
	noExternal: [/^@markaz\//],
	splitting: false,
	sourcemap: true,
	clean: true,
	minify: false,
})
