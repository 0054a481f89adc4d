import { promises as fs } from "node:fs";
import path from "node:path";
import {
  type LogFormat,
  isMinifiedScript,
  type LogLevel,
  SOURCE_EXTENSIONS,
  STAGE_ORDER,
  type StageInputs,
  type StageKind,
  type StyleFormat,
  type WebCompileConfig,
} from "@webcompile/types";
import { assertDistinctExitCodes, parseTranslatePair } from "./normalize";

/** Flags given explicitly on the command line; each wins over the file. */
export type CliOverrides = {
  readonly styleFormat?: StyleFormat;
  readonly sourcemap?: boolean;
  readonly hash?: boolean;
  readonly jsComments?: boolean;
  readonly partialDepth?: number;
  readonly recurse?: boolean;
  readonly translate?: readonly string[];
  readonly continueOnError?: boolean;
  readonly testRun?: boolean;
  readonly exitCode?: number;
  readonly errorExitCode?: number;
  readonly gitAdd?: boolean;
  readonly concurrency?: number;
  readonly logLevel?: LogLevel;
  readonly logFormat?: LogFormat;
  readonly paths?: Partial<Record<StageKind, readonly string[]>>;
};

type InputOverrides = Partial<
  Pick<StageInputs, "partialDepth" | "recurse" | "translate" | "hash" | "paths">
>;

function inputOverrides(
  overrides: CliOverrides,
  kind: StageKind,
  current: StageInputs
): InputOverrides {
  const extraPaths = overrides.paths?.[kind] ?? [];
  return {
    ...(overrides.partialDepth === undefined
      ? {}
      : { partialDepth: overrides.partialDepth }),
    ...(overrides.recurse === undefined ? {} : { recurse: overrides.recurse }),
    ...(overrides.translate === undefined
      ? {}
      : { translate: overrides.translate.map(parseTranslatePair) }),
    ...(overrides.hash === undefined || kind === "template"
      ? {}
      : { hash: overrides.hash }),
    ...(extraPaths.length === 0
      ? {}
      : { paths: [...current.paths, ...extraPaths] }),
  };
}

/**
 * Returns a copy of `config` with the command-line overrides applied.
 */
export function mergeCliOverrides(
  config: WebCompileConfig,
  overrides: CliOverrides
): WebCompileConfig {
  const sourcemap =
    overrides.sourcemap === undefined ? {} : { sourcemap: overrides.sourcemap };

  const merged: WebCompileConfig = {
    ...config,
    style: {
      ...config.style,
      ...inputOverrides(overrides, "style", config.style),
      ...sourcemap,
      ...(overrides.styleFormat ? { format: overrides.styleFormat } : {}),
    },
    script: {
      ...config.script,
      ...inputOverrides(overrides, "script", config.script),
      ...sourcemap,
      ...(overrides.jsComments === undefined
        ? {}
        : { comments: overrides.jsComments }),
    },
    template: {
      ...config.template,
      ...inputOverrides(overrides, "template", config.template),
    },
    continueOnError: overrides.continueOnError ?? config.continueOnError,
    testRun: overrides.testRun ?? config.testRun,
    exitCode: overrides.exitCode ?? config.exitCode,
    errorExitCode: overrides.errorExitCode ?? config.errorExitCode,
    gitAdd: overrides.gitAdd ?? config.gitAdd,
    concurrency: overrides.concurrency ?? config.concurrency,
    log: {
      level: overrides.logLevel ?? config.log.level,
      format: overrides.logFormat ?? config.log.format,
    },
  };
  assertDistinctExitCodes(merged);
  return merged;
}

/** Asset kind whose sources carry this extension; minified scripts have none. */
export function stageForExtension(filePath: string): StageKind | undefined {
  const normalized = filePath.toLowerCase();
  const kind = STAGE_ORDER.find((candidate) =>
    SOURCE_EXTENSIONS[candidate].some((ext) => normalized.endsWith(ext))
  );
  if (kind === "script" && isMinifiedScript(path.basename(normalized))) {
    return undefined;
  }
  return kind;
}

export type RoutedPaths = {
  readonly paths: Record<StageKind, string[]>;
  /** Files that are sources of no asset kind. */
  readonly ignored: string[];
};

/**
 * Assigns command-line paths to asset kinds: files by extension, directories
 * to every kind. Returned paths are absolute.
 */
export async function routePathsByKind(
  inputs: readonly string[],
  cwd: string
): Promise<RoutedPaths> {
  const routed: RoutedPaths = {
    paths: { style: [], script: [], template: [] },
    ignored: [],
  };

  for (const input of inputs) {
    const absolute = path.resolve(cwd, input);
    const stats = await fs.stat(absolute).catch(() => null);
    if (stats?.isDirectory()) {
      for (const kind of STAGE_ORDER) {
        routed.paths[kind].push(absolute);
      }
      continue;
    }
    const kind = stageForExtension(absolute);
    if (kind) {
      routed.paths[kind].push(absolute);
    } else {
      routed.ignored.push(absolute);
    }
  }

  return routed;
}
