import type { RollupOptions } from 'rollup'
import { dirname, resolve as pathResolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import commonjs from '@rollup/plugin-commonjs'
import json from '@rollup/plugin-json'
import { nodeResolve } from '@rollup/plugin-node-resolve'
import typescript from '@rollup/plugin-typescript'

const __filename = fileURLToPath(import.meta.url)
const __dirname = dirname(__filename)

// Bundle all third-party dependencies, only Node.js builtins stay external
const external = [
  'node:fs',
  'node:path',
  'node:os',
  'node:process',
  'node:child_process',
  'node:util',
  'node:url',
  'node:buffer',
  'node:stream',
  'node:readline',
  'node:events',
  'node:tty',
]

const config: RollupOptions[] = [
  {
    input: pathResolve(__dirname, 'packages/cli/src/cli/main.ts'),
    output: {
      file: pathResolve(__dirname, 'bin/cli.mjs'),
      format: 'esm',
      banner: '#!/usr/bin/env node',
      inlineDynamicImports: true,
    },
    external,
    plugins: [
      typescript({
        tsconfig: pathResolve(__dirname, 'packages/cli/tsconfig.build.json'),
      }),
      nodeResolve({
        extensions: ['.js', '.ts'],
        preferBuiltins: true,
      }),
      commonjs({
        ignoreDynamicRequires: true,
      }),
      json(),
    ],
  },
]

export default config
