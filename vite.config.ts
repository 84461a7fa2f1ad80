import { defineConfig } from "vite";
import { fileURLToPath } from "node:url";

// Library build of the engine; the demo runner is not bundled.
export default defineConfig({
  build: {
    outDir: "dist",
    emptyOutDir: true,
    lib: {
      entry: fileURLToPath(new URL("src/engine/index.ts", import.meta.url)),
      formats: ["es"],
      fileName: "csp-backtrack",
    },
  },
});
