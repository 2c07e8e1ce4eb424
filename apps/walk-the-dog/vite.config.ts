import path from 'node:path'
import { fileURLToPath } from 'node:url'

import { Manifest } from '@walkdog/pipeline'
import { defineConfig } from 'vite'

import { jsToTsResolver } from '../../scripts/vite-js-to-ts-resolver.js'

const appRoot = path.dirname(fileURLToPath(import.meta.url))

export default defineConfig({
  root: appRoot,
  plugins: [jsToTsResolver()],
  build: Manifest.toBundlerOptions(Manifest.release, path.resolve(appRoot, '../../dist/walk-the-dog')),
})
