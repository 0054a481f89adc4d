import path from "node:path";
import {
  ConfigurationError,
  type FileMapping,
  type RawScriptStageConfig,
  type RawStyleStageConfig,
  type RawTemplateStageConfig,
  type RawWebCompileConfig,
  type ScriptStageConfig,
  type StageInputs,
  type StyleStageConfig,
  type TemplateStageConfig,
  type TranslatePair,
  type WebCompileConfig,
} from "@webcompile/types";

export const DEFAULT_CHANGED_EXIT_CODE = 3;
export const DEFAULT_ERROR_EXIT_CODE = 1;

type RawStageInputs = Pick<
  RawStyleStageConfig,
  | "files"
  | "paths"
  | "recurse"
  | "partialDepth"
  | "translate"
  | "globs"
  | "hash"
  | "encoding"
>;

/**
 * Splits `"<sourceRoot>:<outputRoot>"` on the first colon.
 */
export function parseTranslatePair(entry: string): TranslatePair {
  const separator = entry.indexOf(":");
  const sourceRoot = separator === -1 ? "" : entry.slice(0, separator).trim();
  const outputRoot = separator === -1 ? "" : entry.slice(separator + 1).trim();
  if (sourceRoot.length === 0 || outputRoot.length === 0) {
    throw new ConfigurationError(
      `Malformed translate option: '${entry}' (expected "<sourceRoot>:<outputRoot>")`
    );
  }
  return { sourceRoot, outputRoot };
}

function toFileMappings(
  files: Readonly<Record<string, string>> | undefined
): FileMapping[] {
  return Object.entries(files ?? {}).map(([source, output]) => ({
    source,
    output,
  }));
}

function normalizeInputs(raw: RawStageInputs | undefined): StageInputs {
  return {
    files: toFileMappings(raw?.files),
    paths: [...(raw?.paths ?? [])],
    recurse: raw?.recurse ?? true,
    partialDepth: raw?.partialDepth ?? 0,
    translate: (raw?.translate ?? []).map(parseTranslatePair),
    globs: [...(raw?.globs ?? [])],
    hash: raw?.hash ?? false,
    encoding: raw?.encoding ?? "utf8",
  };
}

function normalizeStyle(raw: RawStyleStageConfig | undefined): StyleStageConfig {
  return {
    ...normalizeInputs(raw),
    kind: "style",
    format: raw?.format ?? "compressed",
    sourcemap: raw?.sourcemap ?? false,
  };
}

function normalizeScript(
  raw: RawScriptStageConfig | undefined
): ScriptStageConfig {
  return {
    ...normalizeInputs(raw),
    kind: "script",
    comments: raw?.comments ?? false,
    sourcemap: raw?.sourcemap ?? false,
  };
}

function normalizeTemplate(
  raw: RawTemplateStageConfig | undefined
): TemplateStageConfig {
  return {
    ...normalizeInputs(raw),
    kind: "template",
    variables: { ...(raw?.variables ?? {}) },
    strict: raw?.strict ?? true,
    noEscape: raw?.noEscape ?? false,
  };
}

/** The error exit code must be non-zero and differ from the changed one. */
export function assertDistinctExitCodes(
  config: Pick<WebCompileConfig, "exitCode" | "errorExitCode">
): void {
  if (config.errorExitCode < 1) {
    throw new ConfigurationError(
      `errorExitCode must be non-zero, got ${config.errorExitCode}`
    );
  }
  if (config.errorExitCode === config.exitCode) {
    throw new ConfigurationError(
      `errorExitCode must differ from exitCode (both ${config.exitCode})`
    );
  }
}

/**
 * Applies every default to a schema-validated configuration section.
 */
export function normalizeConfig(
  raw: RawWebCompileConfig,
  location: { root: string; configPath?: string }
): WebCompileConfig {
  const config: WebCompileConfig = {
    root: path.resolve(location.root),
    ...(location.configPath ? { configPath: location.configPath } : {}),
    style: normalizeStyle(raw.style),
    script: normalizeScript(raw.script),
    template: normalizeTemplate(raw.template),
    continueOnError: raw.continueOnError ?? false,
    testRun: raw.testRun ?? false,
    exitCode: raw.exitCode ?? DEFAULT_CHANGED_EXIT_CODE,
    errorExitCode: raw.errorExitCode ?? DEFAULT_ERROR_EXIT_CODE,
    gitAdd: raw.gitAdd ?? true,
    concurrency: raw.concurrency ?? 1,
    log: {
      level: raw.log?.level ?? "info",
      format: raw.log?.format ?? "text",
    },
  };
  assertDistinctExitCodes(config);
  return config;
}
