import path from "node:path";
import {
  type BackendDiagnostic,
  type CompiledNameLookup,
  createResultErr,
  createResultOk,
  DanglingReferenceError,
} from "@webcompile/types";
import Handlebars, { type HelperDelegate } from "handlebars";
import type { CompileBackend } from "./types";

export type HandlebarsHelperMap = Readonly<Record<string, HelperDelegate>>;

export type TemplateBackendOptions = {
  /** Extra helpers registered after the defaults. */
  readonly helpers?: HandlebarsHelperMap;
  /** Partials available to every template, by name. */
  readonly partials?: Readonly<Record<string, string>>;
};

const PARSE_LINE_PATTERN = /on line (\d+)/;

const requireSourceArgument = (helper: string, value: unknown): string => {
  if (typeof value !== "string" || value.length === 0) {
    throw new Error(`${helper} expects a source path argument`);
  }
  return value;
};

const registerDefaultHelpers = (runtime: typeof Handlebars) => {
  runtime.registerHelper("uppercase", (value: unknown) =>
    typeof value === "string" ? value.toUpperCase() : value
  );

  runtime.registerHelper("lowercase", (value: unknown) =>
    typeof value === "string" ? value.toLowerCase() : value
  );

  runtime.registerHelper("json", (value: unknown) =>
    JSON.stringify(value, null, 2)
  );
};

/**
 * Helpers that cross-reference earlier stages. Each throws
 * `DanglingReferenceError` for a source nothing compiled.
 */
const registerLookupHelpers = (
  runtime: typeof Handlebars,
  lookup: CompiledNameLookup
) => {
  runtime.registerHelper("compiled_name", (source: unknown) =>
    path.posix.basename(
      lookup(requireSourceArgument("compiled_name", source)).outputPath
    )
  );

  runtime.registerHelper(
    "compiled_path",
    (source: unknown) =>
      lookup(requireSourceArgument("compiled_path", source)).outputPath
  );

  runtime.registerHelper(
    "compiled_hash",
    (source: unknown) =>
      lookup(requireSourceArgument("compiled_hash", source)).hash
  );
};

const registerExtras = (
  runtime: typeof Handlebars,
  options: TemplateBackendOptions
) => {
  for (const [name, helper] of Object.entries(options.helpers ?? {})) {
    runtime.registerHelper(name, helper);
  }
  for (const [name, template] of Object.entries(options.partials ?? {})) {
    runtime.registerPartial(name, template);
  }
};

const toDiagnostic = (error: unknown, sourcePath: string): BackendDiagnostic => {
  if (error instanceof DanglingReferenceError) {
    return {
      code: "DANGLING_REFERENCE",
      message: error.message,
      cause: error,
    };
  }
  const message =
    error instanceof Error ? error.message : String(error ?? "Unknown error");
  const line = PARSE_LINE_PATTERN.exec(message)?.[1];
  return {
    code: "COMPILE_ERROR",
    message: `Handlebars rendering failed for ${sourcePath}: ${message}`,
    ...(line ? { line: Number(line) } : {}),
    cause: error,
  };
};

/**
 * Renders Handlebars templates against the configured variables. A fresh
 * runtime is created per template so helpers never leak between runs.
 */
export const createTemplateBackend =
  (backendOptions: TemplateBackendOptions = {}): CompileBackend<"template"> =>
  ({ source, sourcePath, options, lookup }) => {
    const runtime = Handlebars.create();
    registerDefaultHelpers(runtime);
    registerLookupHelpers(runtime, lookup);
    registerExtras(runtime, backendOptions);

    try {
      const template = runtime.compile(source, {
        strict: options.strict,
        noEscape: options.noEscape,
      });
      const rendered = template({ ...options.variables });
      return createResultOk({ contents: `${rendered.trimEnd()}\n` });
    } catch (error) {
      return createResultErr(toDiagnostic(error, sourcePath));
    }
  };
