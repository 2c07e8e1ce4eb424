import fs from "node:fs"
import path from "node:path"
import type { Plugin } from "vite"

const stripQuery = (id: string): string => id.split("?", 1)[0] ?? id

/**
 * Sources import each other with `.js` specifiers (NodeNext style).
 * Maps such a specifier to the `.ts` file beside it when no `.js` file exists.
 */
export const jsToTsResolver = (): Plugin => ({
  name: "walkdog:js-to-ts-resolver",
  enforce: "pre",
  resolveId(source, importer) {
    if (!importer || !source.startsWith(".") || !source.endsWith(".js")) {
      return null
    }

    const resolvedJs = path.resolve(path.dirname(stripQuery(importer)), stripQuery(source))
    if (fs.existsSync(resolvedJs)) {
      return null
    }

    const base = resolvedJs.slice(0, -".js".length)
    return [`${base}.ts`, `${base}.mts`].find((filePath) => fs.existsSync(filePath)) ?? null
  },
})
