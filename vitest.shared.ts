import * as path from "node:path"
import { fileURLToPath } from "node:url"

import type { ViteUserConfig } from "vitest/config"

const root = path.dirname(fileURLToPath(import.meta.url))

const alias = (dir: string, name = `@chainstream/${dir}`) => ({
  [`${name}/test`]: path.join(root, "packages", dir, "test"),
  [`${name}`]: path.join(root, "packages", dir, "src")
})

const config: ViteUserConfig = {
  test: {
    alias: {
      ...alias("client")
    },
    watch: false,
    globals: true,
    environment: "node",
    include: ["test/**/*.{test,spec}.{js,mjs,cjs,ts,mts,cts,jsx,tsx}"],
    reporters: ["default"],
    coverage: {
      reportsDirectory: "./test-output/vitest/coverage",
      provider: "v8" as const
    }
  }
}

export default config
