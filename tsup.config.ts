import { defineConfig } from 'tsup';

/**
 * Library bundles plus the standalone CLI.
 *
 * Shared code is split into chunks so that sub-path entries do not
 * duplicate the bandit and link-model modules.
 */
export default defineConfig([
    {
        name: 'lora-arms',

        entry: {
            // ==================== Main Entries ====================
            index: 'index.ts',
            node: 'node.ts',

            // ==================== Sub-path Exports ====================
            'src/core': 'src/core/index.ts',
            'src/models': 'src/models/index.ts',
            'src/bandits': 'src/bandits/index.ts',
            'src/tasks': 'src/tasks/index.ts',
        },

        format: ['cjs', 'esm'],
        dts: true,

        splitting: true,
        minify: false,
        treeshake: true,

        sourcemap: false,
        clean: false,

        outDir: 'dist',
        target: 'es2022',
        platform: 'neutral',
    },
    {
        name: 'lora-arms-cli',
        entry: { cli: 'src/tasks/lora-selection/cli.ts' },
        format: ['esm'],
        outDir: 'dist',
        target: 'node20',
        platform: 'node',
    },
]);
