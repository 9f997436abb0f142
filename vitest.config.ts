import path from "path";
import { defineConfig } from "vitest/config";

const packageNames = [
  "types",
  "io",
  "config",
  "templates",
  "tools",
  "memory",
  "engine",
] as const;

const packageAliases = packageNames.flatMap((name) => {
  const basePath = path.resolve(__dirname, "packages", name, "src");
  return [
    { find: new RegExp(`^@promptweave/${name}$`), replacement: basePath },
    { find: `@promptweave/${name}/`, replacement: `${basePath}/` },
  ];
});

export default defineConfig({
  resolve: {
    alias: packageAliases,
  },
  esbuild: {
    tsconfigRaw: {
      compilerOptions: {
        experimentalDecorators: true,
        useDefineForClassFields: false,
      },
    },
  },
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    environment: "node",
    pool: "threads",
    setupFiles: [path.resolve(__dirname, "vitest.setup.ts")],
  },
});
