import ts from 'typescript';
import { defineConfig } from 'vitest/config';

// Transpile TypeScript with the compiler itself: esbuild renames named function
// expressions that share a name with an outer binding, which changes `fn.name`.
export default defineConfig({
  esbuild: false,
  plugins: [
    {
      name: 'typescript-transpile',
      enforce: 'pre',
      transform(code, id) {
        if (!/\.[cm]?ts$/.test(id.split('?')[0])) return null;
        const result = ts.transpileModule(code, {
          fileName: id,
          compilerOptions: {
            target: ts.ScriptTarget.ES2022,
            module: ts.ModuleKind.ESNext,
            sourceMap: true,
            inlineSources: true,
            isolatedModules: true,
            esModuleInterop: true,
          },
        });
        return { code: result.outputText.replace(/\n\/\/# sourceMappingURL=.*$/, ''), map: result.sourceMapText };
      },
    },
  ],
  test: {
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    environment: 'node',
  },
});
