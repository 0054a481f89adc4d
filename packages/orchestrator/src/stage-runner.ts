import { promises as fs } from "node:fs";
import path from "node:path";
import type { BackendSet } from "@webcompile/backends";
import {
  type BackendDiagnostic,
  type BackendResult,
  type CompilationUnit,
  createResultErr,
  createUnitError,
  type SourceEncoding,
  type StageKind,
  type UnitError,
  type UnitOutcome,
} from "@webcompile/types";
import {
  hashContent,
  hasHashPlaceholder,
  pruneStale,
  substituteHash,
} from "./hash-namer";
import type { Logger } from "./logger";
import type { CompiledNameRegistry } from "./name-registry";

export type StageRunContext = {
  readonly root: string;
  readonly backends: BackendSet;
  readonly registry: CompiledNameRegistry;
  /** Report what would change without touching the file system. */
  readonly testRun: boolean;
  readonly logger: Logger;
};

type SyncStatus = "created" | "updated" | "unchanged";

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const isMissing = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

const relative = (root: string, file: string): string =>
  path.relative(root, file).split(path.sep).join("/");

const sourceMappingComment = (stage: StageKind, mapName: string): string =>
  stage === "style"
    ? `/*# sourceMappingURL=${mapName} */`
    : `//# sourceMappingURL=${mapName}`;

/**
 * Writes `contents` only when the bytes on disk differ. In a dry run the
 * comparison still happens but nothing is written.
 */
const syncFile = async (
  file: string,
  contents: string,
  encoding: SourceEncoding,
  dryRun: boolean
): Promise<SyncStatus> => {
  const next = Buffer.from(contents, encoding);
  let existing: Buffer | undefined;
  try {
    existing = await fs.readFile(file);
  } catch (error) {
    if (!isMissing(error)) {
      throw error;
    }
  }

  if (existing?.equals(next)) {
    return "unchanged";
  }
  if (!dryRun) {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, next);
  }
  return existing ? "updated" : "created";
};

const invokeBackend = async (
  unit: CompilationUnit,
  source: string,
  context: StageRunContext
): Promise<BackendResult> => {
  const outputDirectory = path.dirname(unit.outputTemplate);
  const base = { source, sourcePath: unit.sourcePath, outputDirectory };

  switch (unit.stage) {
    case "style":
      return await context.backends.style({ ...base, options: unit.options });
    case "script":
      return await context.backends.script({ ...base, options: unit.options });
    case "template":
      return await context.backends.template({
        ...base,
        options: unit.options,
        lookup: context.registry.lookup,
      });
    default: {
      const exhaustive: never = unit;
      throw new Error(`Unknown stage: ${JSON.stringify(exhaustive)}`);
    }
  }
};

const failed = (unit: CompilationUnit, error: UnitError): UnitOutcome => ({
  status: "failed",
  unit,
  error,
});

const ioFailure = (
  unit: CompilationUnit,
  action: string,
  error: unknown
): UnitOutcome =>
  failed(
    unit,
    createUnitError({
      code: "IO_ERROR",
      message: `${action}: ${errorMessage(error)}`,
      sourcePath: unit.sourcePath,
      cause: error,
    })
  );

/**
 * Compiles one unit: read, compile, name, write if different, prune stale
 * hashed siblings and register the result for later stages. Never throws
 * for a unit-level problem; the failure is reported in the outcome.
 */
export async function runUnit(
  unit: CompilationUnit,
  context: StageRunContext
): Promise<UnitOutcome> {
  const { logger, root, testRun } = context;
  const encoding = unit.options.encoding;
  const sourceLabel = relative(root, unit.sourcePath);

  let source: string;
  try {
    source = await fs.readFile(unit.sourcePath, { encoding });
  } catch (error) {
    logger.error(`Cannot read source: ${sourceLabel}`, {
      file: sourceLabel,
      stage: unit.stage,
    });
    return ioFailure(unit, `Cannot read ${unit.sourcePath}`, error);
  }

  let compiled: BackendResult;
  try {
    compiled = await invokeBackend(unit, source, context);
  } catch (error) {
    compiled = createResultErr<BackendDiagnostic>({
      code: "COMPILE_ERROR",
      message: errorMessage(error),
      cause: error,
    });
  }

  if (!compiled.ok) {
    const diagnostic = compiled.error;
    logger.error(`Failed: ${sourceLabel}: ${diagnostic.message}`, {
      file: sourceLabel,
      stage: unit.stage,
      line: diagnostic.line,
    });
    return failed(
      unit,
      createUnitError({ ...diagnostic, sourcePath: unit.sourcePath })
    );
  }

  const output = compiled.value;
  const contentHash = hashContent(output.contents, encoding);
  const hash = hasHashPlaceholder(unit.outputTemplate) ? contentHash : undefined;
  const outputPath = hash
    ? substituteHash(unit.outputTemplate, hash)
    : unit.outputTemplate;
  const mapPath =
    output.map === undefined
      ? undefined
      : path.join(
          path.dirname(outputPath),
          `${path.basename(unit.sourcePath)}.map`
        );
  const contents =
    mapPath === undefined
      ? output.contents
      : `${output.contents.trimEnd()}\n${sourceMappingComment(unit.stage, path.basename(mapPath))}\n`;

  const writtenPaths: string[] = [];
  const createdPaths: string[] = [];
  let removedPaths: string[];

  try {
    const targets: Array<readonly [string, string]> = [[outputPath, contents]];
    if (mapPath !== undefined && output.map !== undefined) {
      targets.push([mapPath, output.map]);
    }
    for (const [file, text] of targets) {
      const status = await syncFile(file, text, encoding, testRun);
      if (status !== "unchanged") {
        writtenPaths.push(file);
      }
      if (status === "created") {
        createdPaths.push(file);
      }
    }
    removedPaths = await pruneStale(unit.outputTemplate, outputPath, {
      dryRun: testRun,
    });
  } catch (error) {
    logger.error(`Cannot write output for ${sourceLabel}`, {
      file: sourceLabel,
      output: relative(root, outputPath),
    });
    return ioFailure(unit, `Cannot write ${outputPath}`, error);
  }

  if (unit.stage !== "template") {
    context.registry.register(unit.sourcePath, {
      outputPath,
      hash: contentHash,
    });
  }

  const outputLabel = relative(root, outputPath);
  const changed = writtenPaths.length > 0 || removedPaths.length > 0;
  if (writtenPaths.length > 0) {
    logger.info(`Compiled: ${sourceLabel} -> ${outputLabel}`, {
      file: sourceLabel,
      output: outputLabel,
      stage: unit.stage,
    });
  } else {
    logger.debug(`Unchanged: ${outputLabel}`, {
      file: sourceLabel,
      stage: unit.stage,
    });
  }
  for (const removed of removedPaths) {
    logger.info(`Removed: ${relative(root, removed)}`, { stage: unit.stage });
  }

  return {
    status: changed ? "written" : "unchanged",
    unit,
    outputPath,
    ...(hash === undefined ? {} : { hash }),
    ...(mapPath === undefined ? {} : { mapPath }),
    writtenPaths,
    createdPaths,
    removedPaths,
    dryRun: testRun,
  };
}
