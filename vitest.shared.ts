import path from "node:path"
import { fileURLToPath } from "node:url"
import { jsToTsResolver } from "./scripts/vite-js-to-ts-resolver.js"

const root = path.dirname(fileURLToPath(import.meta.url))

export const sharedConfig = {
  plugins: [jsToTsResolver()],
  resolve: {
    alias: {
      // Workspace packages resolve to their sources without an install step
      "@walkdog/engine": path.resolve(root, "./packages/walkdog-engine/src/index.ts"),
      "@walkdog/game": path.resolve(root, "./packages/walkdog-game/src/index.ts"),
      "@walkdog/pipeline": path.resolve(root, "./packages/walkdog-pipeline/src/index.ts"),
    },
  },
}
