import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

const resolveEntry = (pkg: string) => fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url))

export default defineConfig({
    resolve: {
        alias: {
            'keypage-types': resolveEntry('keypage-types'),
            'keypage-shared': resolveEntry('keypage-shared'),
            'keypage-core': resolveEntry('keypage-core'),
            'keypage-adapters': resolveEntry('keypage-adapters')
        }
    },
    test: {
        include: ['tests/**/*.test.ts'],
        environment: 'node'
    }
})
