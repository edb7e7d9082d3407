/// <reference types="vitest" />

import * as path from "node:path"
import { fileURLToPath } from "node:url"
import { mergeConfig, type ViteUserConfig } from "vitest/config"

import shared from "../../vitest.shared.ts"

const config: ViteUserConfig = {
  root: path.dirname(fileURLToPath(import.meta.url)),
  cacheDir: "../../node_modules/.vite/@chainstream/client",
  test: {
    ...shared.test
  }
}

export default mergeConfig(shared, config)
