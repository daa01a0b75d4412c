import type { KnipConfig } from 'knip';

const config: KnipConfig = {
    entry: [
        'src/index.ts',           // MCP server entry
        'src/cli/index.ts',       // CLI bin entry
        'tests/**/*.test.ts',
    ],
    project: [
        'src/**/*.ts',
        'tests/**/*.ts',
    ],
    ignore: [
        'dist/**',
    ],
    ignoreExportsUsedInFile: true,
};

export default config;
