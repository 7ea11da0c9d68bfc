import { defineConfig } from 'tsup'

export default defineConfig({
    entry: {
        index: 'src/index.ts',
        'core/index': 'src/core/index.ts',
        'protocol/index': 'src/protocol/index.ts',
        'server/index': 'src/server/index.ts',
        'testing/index': 'src/testing/index.ts'
    },
    format: ['esm'],
    dts: true,
    splitting: false,
    sourcemap: true,
    clean: true,
    treeshake: true,
    esbuildOptions(options) {
        options.alias = {
            ...(options.alias ?? {}),
            '#observability': './src/observability/index.ts',
            '#protocol': './src/protocol/index.ts',
            '#shared': './src/shared/index.ts'
        }
    },
    external: [
        'lodash',
        'zod'
    ]
})
