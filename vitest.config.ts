import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@chatcmd/chat-client": fileURLToPath(
        new URL("./packages/chat-client/src/index.ts", import.meta.url),
      ),
      "@chatcmd/command-loop": fileURLToPath(
        new URL("./packages/command-loop/src/index.ts", import.meta.url),
      ),
    },
  },
  test: {
    include: ["packages/*/tests/**/*.test.ts"],
    environment: "node",
  },
});
