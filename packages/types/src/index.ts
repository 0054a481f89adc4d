/**
 * Shared type definitions for the web-compile toolchain.
 *
 * These contracts are shared by the resolver, backends, orchestrator and CLI
 * so that packages can collaborate without depending on each other's
 * internals.
 */

import type {
  JsonObject as JsonObjectType,
  JsonValue as JsonValueType,
  ReadonlyDeep,
} from "type-fest";

export * from "./schema";

import type {
  LogFormat,
  LogLevel,
  SourceEncoding,
  StyleFormat,
} from "./schema";

export type JsonValue = JsonValueType;

export type JsonObject = JsonObjectType;

export type AsyncMaybe<T> = Promise<T> | T;

// --- stages -------------------------------------------------------------------

export const STAGE_ORDER = ["style", "script", "template"] as const;

export type StageKind = (typeof STAGE_ORDER)[number];

/** Token replaced by the content hash in an output file name. */
export const HASH_PLACEHOLDER = "[hash]";

/** File-name prefix marking a partial (fragment) source. */
export const PARTIAL_MARKER = "_";

/** Source extensions discovered for each asset kind, lower-case. */
export const SOURCE_EXTENSIONS: { readonly [K in StageKind]: readonly string[] } =
  {
    style: [".scss", ".sass"],
    script: [".js", ".mjs"],
    template: [".hbs", ".handlebars"],
  };

const MINIFIED_SCRIPT_PATTERN = /\.min\.m?js$/i;

/** Minified scripts are outputs of the script stage, never its sources. */
export const isMinifiedScript = (fileName: string): boolean =>
  MINIFIED_SCRIPT_PATTERN.test(fileName);

export type FileMapping = {
  readonly source: string;
  readonly output: string;
};

export type TranslatePair = {
  readonly sourceRoot: string;
  readonly outputRoot: string;
};

/** Discovery and naming options shared by every asset kind. */
export type StageInputs = {
  readonly files: readonly FileMapping[];
  readonly paths: readonly string[];
  readonly recurse: boolean;
  readonly partialDepth: number;
  readonly translate: readonly TranslatePair[];
  readonly globs: readonly string[];
  readonly hash: boolean;
  readonly encoding: SourceEncoding;
};

export type StyleStageConfig = StageInputs & {
  readonly kind: "style";
  readonly format: StyleFormat;
  readonly sourcemap: boolean;
};

export type ScriptStageConfig = StageInputs & {
  readonly kind: "script";
  readonly comments: boolean;
  readonly sourcemap: boolean;
};

export type TemplateStageConfig = StageInputs & {
  readonly kind: "template";
  readonly variables: Readonly<Record<string, JsonValue>>;
  readonly strict: boolean;
  readonly noEscape: boolean;
};

export type StageConfigMap = {
  readonly style: StyleStageConfig;
  readonly script: ScriptStageConfig;
  readonly template: TemplateStageConfig;
};

export type StageConfig = StageConfigMap[StageKind];

/**
 * Normalized run configuration. Format adapters validate and convert into
 * this structure before the core sees it; every default is already applied.
 */
export type WebCompileConfig = {
  /** Directory every relative path resolves against. */
  readonly root: string;
  readonly configPath?: string;
  readonly style: StyleStageConfig;
  readonly script: ScriptStageConfig;
  readonly template: TemplateStageConfig;
  readonly continueOnError: boolean;
  readonly testRun: boolean;
  /** Exit code when at least one output changed. */
  readonly exitCode: number;
  /** Exit code when at least one unit failed. */
  readonly errorExitCode: number;
  readonly gitAdd: boolean;
  readonly concurrency: number;
  readonly log: {
    readonly level: LogLevel;
    readonly format: LogFormat;
  };
};

type UnitOf<K extends StageKind> = {
  readonly stage: K;
  /** Absolute source path. */
  readonly sourcePath: string;
  /** Absolute output path; the file name may contain `[hash]`. */
  readonly outputTemplate: string;
  readonly options: StageConfigMap[K];
};

export type CompilationUnit = { [K in StageKind]: UnitOf<K> }[StageKind];

export type StageUnits = {
  readonly [K in StageKind]: readonly CompilationUnit[];
};

// --- results ------------------------------------------------------------------

export type ResultOk<TValue> = {
  readonly ok: true;
  readonly value: TValue;
};

export type ResultErr<TError> = {
  readonly ok: false;
  readonly error: TError;
};

export type Result<TValue, TError> = ResultOk<TValue> | ResultErr<TError>;

export const createResultOk = <TValue>(value: TValue): ResultOk<TValue> => ({
  ok: true as const,
  value,
});

export const createResultErr = <TError>(error: TError): ResultErr<TError> => ({
  ok: false as const,
  error,
});

export const isResultOk = <TValue, TError>(
  result: Result<TValue, TError>
): result is ResultOk<TValue> => result.ok === true;

export const isResultErr = <TValue, TError>(
  result: Result<TValue, TError>
): result is ResultErr<TError> => result.ok === false;

// --- errors -------------------------------------------------------------------

export const UNIT_ERROR_CODES = [
  "IO_ERROR",
  "COMPILE_ERROR",
  "DANGLING_REFERENCE",
] as const;

export type UnitErrorCode = (typeof UNIT_ERROR_CODES)[number];

export type UnitError = ReadonlyDeep<{
  readonly code: UnitErrorCode;
  readonly message: string;
  readonly sourcePath: string;
  readonly line?: number;
  readonly column?: number;
  readonly cause?: unknown;
}>;

export type UnitErrorInput = {
  readonly code: UnitErrorCode;
  readonly message: string;
  readonly sourcePath: string;
  readonly line?: number;
  readonly column?: number;
  readonly cause?: unknown;
};

export const createUnitError = (input: UnitErrorInput): UnitError => {
  const { line, column, cause, ...rest } = input;
  return Object.freeze({
    ...rest,
    ...(line === undefined ? {} : { line }),
    ...(column === undefined ? {} : { column }),
    ...(cause === undefined ? {} : { cause }),
  });
};

export const isUnitError = (value: unknown): value is UnitError => {
  if (!value || typeof value !== "object") {
    return false;
  }
  const candidate = value as Partial<UnitError>;
  return (
    typeof candidate.code === "string" &&
    (UNIT_ERROR_CODES as readonly string[]).includes(candidate.code) &&
    typeof candidate.message === "string"
  );
};

/**
 * Fatal problem with the configuration or the source tree layout. Raised
 * before any unit runs.
 */
export class ConfigurationError extends Error {
  override readonly name = "ConfigurationError";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** A template referenced a source that no earlier stage compiled. */
export class DanglingReferenceError extends Error {
  override readonly name = "DanglingReferenceError";
  readonly reference: string;

  constructor(reference: string) {
    super(`No compiled output registered for source: ${reference}`);
    this.reference = reference;
  }
}

// --- backends -----------------------------------------------------------------

export type BackendDiagnostic = {
  readonly code: Exclude<UnitErrorCode, "IO_ERROR">;
  readonly message: string;
  readonly line?: number;
  readonly column?: number;
  readonly cause?: unknown;
};

export type BackendOutput = {
  readonly contents: string;
  /** Source map text, when the backend produced one. */
  readonly map?: string;
};

export type BackendResult = Result<BackendOutput, BackendDiagnostic>;

export type CompiledNameEntry = {
  /** Root-relative POSIX path of the resolved output. */
  readonly outputPath: string;
  /** MD5 of the compiled output, whether or not the name carries it. */
  readonly hash: string;
};

export type CompiledNameLookup = (source: string) => CompiledNameEntry;

// --- outcomes -----------------------------------------------------------------

export type VersionControlIntent = {
  readonly action: "add" | "remove";
  readonly path: string;
};

type CompletedOutcome = {
  readonly unit: CompilationUnit;
  /** Absolute resolved output path. */
  readonly outputPath: string;
  readonly hash?: string;
  readonly mapPath?: string;
  readonly writtenPaths: readonly string[];
  readonly createdPaths: readonly string[];
  readonly removedPaths: readonly string[];
  /** True when the run was a test run and nothing touched the disk. */
  readonly dryRun: boolean;
};

export type WrittenOutcome = CompletedOutcome & { readonly status: "written" };

export type UnchangedOutcome = CompletedOutcome & {
  readonly status: "unchanged";
};

export type SkippedOutcome = {
  readonly status: "skipped";
  readonly unit: CompilationUnit;
  readonly reason: "stopped";
};

export type FailedOutcome = {
  readonly status: "failed";
  readonly unit: CompilationUnit;
  readonly error: UnitError;
};

export type UnitOutcome =
  | WrittenOutcome
  | UnchangedOutcome
  | SkippedOutcome
  | FailedOutcome;

export type RunResult = {
  readonly outcomes: readonly UnitOutcome[];
  readonly failures: readonly FailedOutcome[];
  readonly anyChanged: boolean;
  readonly anyFailed: boolean;
  readonly intents: readonly VersionControlIntent[];
};
