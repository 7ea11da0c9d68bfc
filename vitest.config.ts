import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

const fromRoot = (path: string) => fileURLToPath(new URL(path, import.meta.url))

export default defineConfig({
    resolve: {
        alias: {
            '#observability': fromRoot('./src/observability/index.ts'),
            '#protocol': fromRoot('./src/protocol/index.ts'),
            '#shared': fromRoot('./src/shared/index.ts')
        }
    },
    test: {
        include: ['tests/**/*.test.ts']
    }
})
