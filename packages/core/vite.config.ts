import { defineConfig } from "vite";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import dts from "vite-plugin-dts";

const root = fileURLToPath(new URL(".", import.meta.url));

export default defineConfig({
  plugins: [
    dts({
      include: ["src/**/*"],
      exclude: ["src/test/**/*"],
      rollupTypes: true
    })
  ],
  build: {
    lib: {
      entry: resolve(root, "src/index.ts"),
      name: "AdaptiveGroove",
      formats: ["es", "umd"],
      fileName: (format) => (format === "es" ? "index.js" : "adaptive-groove.umd.js")
    },
    outDir: resolve(root, "dist"),
    emptyOutDir: true,
    rollupOptions: {
      output: {
        exports: "named"
      }
    },
    sourcemap: true
  }
});
