import { fileURLToPath } from "node:url";
import { defineConfig } from "vite";
import react from "@vitejs/plugin-react";
import { apiDevPlugin } from "./vite.apiDevPlugin";

export default defineConfig({
  root: fileURLToPath(new URL(".", import.meta.url)),
  plugins: [react(), apiDevPlugin()],
  build: {
    outDir: "dist",
    emptyOutDir: true
  }
});
