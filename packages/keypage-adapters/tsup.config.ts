import { defineConfig } from 'tsup'

export default defineConfig({
    entry: {
        index: 'src/index.ts'
    },
    format: ['esm'],
    dts: true,
    splitting: false,
    sourcemap: true,
    clean: true,
    treeshake: true,
    external: [
        'mongodb',
        'typeorm',
        'keypage-core',
        'keypage-shared',
        'keypage-types'
    ]
})
