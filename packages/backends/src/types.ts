import type {
  AsyncMaybe,
  BackendResult,
  CompiledNameLookup,
  StageConfigMap,
  StageKind,
} from "@webcompile/types";

type BackendInputBase<K extends StageKind> = {
  /** Decoded source text. */
  readonly source: string;
  /** Absolute source path, used for diagnostics and relative imports. */
  readonly sourcePath: string;
  /** Directory the output will be written to; source maps are relative to it. */
  readonly outputDirectory: string;
  readonly options: StageConfigMap[K];
};

export type StyleBackendInput = BackendInputBase<"style">;

export type ScriptBackendInput = BackendInputBase<"script">;

export type TemplateBackendInput = BackendInputBase<"template"> & {
  /** Resolves a style or script source to its compiled output. */
  readonly lookup: CompiledNameLookup;
};

export type BackendInputMap = {
  readonly style: StyleBackendInput;
  readonly script: ScriptBackendInput;
  readonly template: TemplateBackendInput;
};

/**
 * A pure compilation function: source text in, output text (and an optional
 * source map) or a diagnostic out. Backends never write files.
 */
export type CompileBackend<K extends StageKind> = (
  input: BackendInputMap[K]
) => AsyncMaybe<BackendResult>;

export type BackendSet = {
  readonly [K in StageKind]: CompileBackend<K>;
};
