import { fileURLToPath } from "node:url";
import { defineConfig } from "vite";

export default defineConfig({
  resolve: {
    alias: {
      "@": fileURLToPath(new URL("./src", import.meta.url)),
    },
  },
  build: {
    target: "es2022",
    minify: "esbuild",
    sourcemap: true,
    lib: {
      entry: fileURLToPath(new URL("./src/index.ts", import.meta.url)),
      name: "RotationQuaternion",
      formats: ["es", "cjs"],
      fileName: (format) =>
        format === "es" ? "rotation-quaternion.js" : "rotation-quaternion.cjs",
    },
  },
});
