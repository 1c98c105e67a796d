import swc from "unplugin-swc";
import { defineConfig } from "vitest/config";

export default defineConfig({
  plugins: [
    // Nest's ValidationPipe and injector read decorator metadata, which esbuild does not emit.
    swc.vite({
      module: { type: "es6" },
      jsc: {
        parser: { syntax: "typescript", decorators: true },
        transform: { legacyDecorator: true, decoratorMetadata: true },
      },
    }),
  ],
  test: {
    environment: "node",
    include: ["services/*/tests/**/*.test.ts", "sdks/*/tests/**/*.test.ts"],
    testTimeout: 15000,
  },
});
