import { defineConfig } from "vitest/config";
import path from "path";
import { fileURLToPath } from "url";

const root = path.dirname(fileURLToPath(import.meta.url));
const src = path.resolve(root, "packages/pvl/src");

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    root,
    include: ["packages/*/src/**/*.test.ts", "packages/*/test/**/*.test.ts"],
  },
  resolve: {
    alias: {
      "#ast": path.resolve(src, "ast/index.ts"),
      "#types": path.resolve(src, "types/index.ts"),
      "#result": path.resolve(src, "result.ts"),
      "#errors": path.resolve(src, "errors.ts"),
      "#compiler": path.resolve(src, "compiler/index.ts"),
      "#parser": path.resolve(src, "parser/index.ts"),
      "#printer": path.resolve(src, "printer/index.ts"),
      "#resolver": path.resolve(src, "resolver/index.ts"),
      "#typechecker": path.resolve(src, "typechecker/index.ts"),
      "#cfg": path.resolve(src, "cfg/index.ts"),
    },
  },
});
