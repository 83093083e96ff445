import { defineConfig } from "vitest/config"
import { dirname, resolve } from "node:path"
import { fileURLToPath } from "node:url"

const rootDir = dirname(fileURLToPath(import.meta.url))

export default defineConfig({
  root: rootDir,
  resolve: {
    alias: {
      "@deskpet/shared": resolve(rootDir, "../shared/src/index.ts"),
    },
  },
  test: {
    name: "core",
    environment: "node",
    include: ["tests/**/*.{test,prop}.ts"],
    setupFiles: ["./tests/setup.ts"],
  },
})
