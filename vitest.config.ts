import ts from "typescript";
import { defineConfig } from "vitest/config";

export default defineConfig({
  // esbuild renames function expressions that shadow an outer binding
  // (`function add` inside `const add = ...` becomes `add2`), and vite
  // forces `keepNames` off. Transpile with TypeScript so names stay as written.
  esbuild: false,
  plugins: [
    {
      name: "typescript-transpile",
      transform(code, id) {
        if (!/\.[cm]?ts$/.test(id.split("?")[0])) return null;
        const out = ts.transpileModule(code, {
          fileName: id,
          compilerOptions: {
            target: ts.ScriptTarget.ES2022,
            module: ts.ModuleKind.ESNext,
            sourceMap: true,
          },
        });
        return { code: out.outputText, map: out.sourceMapText };
      },
    },
  ],
  test: {
    include: ["packages/**/*.test.ts"],
  },
});
