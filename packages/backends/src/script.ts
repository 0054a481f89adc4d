import path from "node:path";
import {
  createResultErr,
  createResultOk,
  type BackendDiagnostic,
} from "@webcompile/types";
import { type Message, transform } from "esbuild";
import type { CompileBackend } from "./types";

type BuildFailure = Error & { readonly errors: readonly Message[] };

const isBuildFailure = (error: unknown): error is BuildFailure =>
  error instanceof Error &&
  "errors" in error &&
  Array.isArray(error.errors);

const toDiagnostic = (error: unknown): BackendDiagnostic => {
  if (isBuildFailure(error)) {
    const [first] = error.errors;
    if (first) {
      return {
        code: "COMPILE_ERROR",
        message: first.text,
        ...(first.location
          ? { line: first.location.line, column: first.location.column + 1 }
          : {}),
        cause: error,
      };
    }
  }
  return {
    code: "COMPILE_ERROR",
    message: error instanceof Error ? error.message : String(error),
    cause: error,
  };
};

/**
 * Minifies a script with esbuild. Legal comments (`/*!`, `@license`) are kept
 * inline when `comments` is on. The output ends with exactly one newline.
 */
export const createScriptBackend =
  (): CompileBackend<"script"> =>
  async ({ source, sourcePath, outputDirectory, options }) => {
    try {
      const result = await transform(source, {
        loader: "js",
        minify: true,
        legalComments: options.comments ? "inline" : "none",
        sourcemap: options.sourcemap ? "external" : false,
        sourcefile: path
          .relative(outputDirectory, sourcePath)
          .split(path.sep)
          .join("/"),
      });
      const contents = `${result.code.trimEnd()}\n`;
      return createResultOk(
        result.map.length > 0 ? { contents, map: result.map } : { contents }
      );
    } catch (error) {
      return createResultErr(toDiagnostic(error));
    }
  };
