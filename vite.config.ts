import { defineConfig, type Plugin } from "vite";
import dts from "vite-plugin-dts";
import fs from "fs";
import path from "path";

/**
 * Replace __DEV__ with a runtime process.env check so consumers'
 * bundlers can tree-shake the dev-only iteration guards.
 */
function replaceDevGlobal(): Plugin {
  return {
    name: "replace-dev-global",
    transform(code, id) {
      if (id.includes("node_modules")) return null;
      const result = code.replace(
        /\b__DEV__\b/g,
        'process.env.NODE_ENV !== "production"',
      );
      return result !== code ? result : null;
    },
  };
}

// Bare imports like "utils/error" resolve to top-level directories in src.
export const srcAliases = (): Record<string, string> =>
  Object.fromEntries(
    fs
      .readdirSync(path.resolve(__dirname, "src"), { withFileTypes: true })
      .filter((dirent) => dirent.isDirectory() && !dirent.name.startsWith("__"))
      .map((dirent) => [
        dirent.name,
        path.resolve(__dirname, `./src/${dirent.name}`),
      ]),
  );

// https://vite.dev/config/
export default defineConfig(({ command }) => ({
  plugins: [
    ...(command === "build"
      ? [replaceDevGlobal(), dts({ tsconfigPath: "./tsconfig.build.json" })]
      : []),
  ],

  define: command === "build" ? {} : { __DEV__: "true" },

  resolve: {
    alias: srcAliases(),
  },

  build: {
    target: "es2022",
    lib: {
      entry: path.resolve(__dirname, "src/index.ts"),
      formats: ["es", "cjs"],
      fileName: (format) => (format === "es" ? "index.js" : "index.cjs"),
    },
  },
}));
