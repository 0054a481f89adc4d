import path from "node:path";
import { fileURLToPath, pathToFileURL } from "node:url";
import {
  createResultErr,
  createResultOk,
  type BackendDiagnostic,
} from "@webcompile/types";
import * as sass from "sass";
import type { CompileBackend } from "./types";

const toRelativeSource = (source: string, outputDirectory: string): string => {
  if (!source.startsWith("file:")) {
    return source;
  }
  return path
    .relative(outputDirectory, fileURLToPath(source))
    .split(path.sep)
    .join("/");
};

const toDiagnostic = (error: unknown): BackendDiagnostic => {
  if (error instanceof sass.Exception) {
    return {
      code: "COMPILE_ERROR",
      message: error.sassMessage,
      line: error.span.start.line + 1,
      column: error.span.start.column + 1,
      cause: error,
    };
  }
  return {
    code: "COMPILE_ERROR",
    message: error instanceof Error ? error.message : String(error),
    cause: error,
  };
};

/**
 * Compiles SCSS (or the indented `.sass` syntax) with Dart Sass. The source's
 * own directory is on the load path so sibling partials resolve.
 */
export const createStyleBackend =
  (): CompileBackend<"style"> =>
  ({ source, sourcePath, outputDirectory, options }) => {
    try {
      const result = sass.compileString(source, {
        url: pathToFileURL(sourcePath),
        syntax: sourcePath.toLowerCase().endsWith(".sass") ? "indented" : "scss",
        style: options.format,
        loadPaths: [path.dirname(sourcePath)],
        sourceMap: options.sourcemap,
        sourceMapIncludeSources: options.sourcemap,
      });

      if (!result.sourceMap) {
        return createResultOk({ contents: result.css });
      }

      const map = {
        ...result.sourceMap,
        sources: result.sourceMap.sources.map((entry) =>
          toRelativeSource(entry, outputDirectory)
        ),
      };
      return createResultOk({
        contents: result.css,
        map: JSON.stringify(map),
      });
    } catch (error) {
      return createResultErr(toDiagnostic(error));
    }
  };
