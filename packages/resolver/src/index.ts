import type { Dirent } from "node:fs";
import { promises as fs } from "node:fs";
import path from "node:path";
import {
  type CompilationUnit,
  ConfigurationError,
  HASH_PLACEHOLDER,
  type StageConfig,
  type StageUnits,
  type TranslatePair,
  type WebCompileConfig,
} from "@webcompile/types";
import picomatch from "picomatch";
import {
  deriveOutputName,
  isPartial,
  isSourceFile,
  partialSearchDirectories,
  translateDirectory,
} from "./naming";

export {
  deriveOutputName,
  isPartial,
  isSourceFile,
  partialSearchDirectories,
  translateDirectory,
} from "./naming";

const IGNORED_DIRECTORIES = new Set(["node_modules"]);

type FileFilter = (file: string) => boolean;

const createGlobFilter = (
  globs: readonly string[],
  baseDir: string
): FileFilter => {
  if (globs.length === 0) {
    return () => true;
  }
  const matchers = globs.map((pattern) =>
    picomatch(pattern, { dot: true, posixSlashes: true })
  );
  return (file) => {
    const relative = path.relative(baseDir, file).replace(/\\/g, "/");
    return matchers.some((matches) => matches(relative));
  };
};

const byName = (a: Dirent, b: Dirent): number =>
  a.name < b.name ? -1 : a.name > b.name ? 1 : 0;

async function readDirectory(directory: string): Promise<Dirent[]> {
  try {
    const entries = await fs.readdir(directory, { withFileTypes: true });
    return entries.sort(byName);
  } catch (error) {
    throw new ConfigurationError(`Cannot read directory: ${directory}`, {
      cause: error,
    });
  }
}

/**
 * Collects the non-partial sources of `stage.kind` under `directory`. Within a
 * directory, files come before subdirectories and both are sorted by name.
 */
async function collectDirectory(
  directory: string,
  stage: StageConfig,
  filter: FileFilter,
  found: string[]
): Promise<void> {
  const entries = await readDirectory(directory);
  const subdirectories: string[] = [];

  for (const entry of entries) {
    const full = path.join(directory, entry.name);
    if (entry.isDirectory()) {
      const ignored =
        IGNORED_DIRECTORIES.has(entry.name) || entry.name.startsWith(".");
      if (!ignored) {
        subdirectories.push(full);
      }
      continue;
    }
    if (
      entry.isFile() &&
      !isPartial(entry.name) &&
      isSourceFile(entry.name, stage.kind) &&
      filter(full)
    ) {
      found.push(full);
    }
  }

  if (!stage.recurse) {
    return;
  }
  for (const subdirectory of subdirectories) {
    await collectDirectory(subdirectory, stage, filter, found);
  }
}

/**
 * Expands a partial into every non-partial sibling in its directory and the
 * `partialDepth` nearest ancestors. This approximates "everything that might
 * import the partial" by proximity; imports from outside that window are not
 * detected.
 */
async function expandPartial(
  partialPath: string,
  stage: StageConfig,
  root: string,
  found: string[]
): Promise<void> {
  for (const directory of partialSearchDirectories(
    partialPath,
    stage.partialDepth,
    root
  )) {
    const entries = await readDirectory(directory);
    for (const entry of entries) {
      if (
        entry.isFile() &&
        !isPartial(entry.name) &&
        isSourceFile(entry.name, stage.kind)
      ) {
        found.push(path.join(directory, entry.name));
      }
    }
  }
}

async function collectInput(
  input: string,
  stage: StageConfig,
  root: string,
  found: string[]
): Promise<void> {
  const stats = await fs.stat(input).catch(() => null);
  if (!stats) {
    throw new ConfigurationError(`Input path does not exist: ${input}`);
  }
  if (stats.isDirectory()) {
    await collectDirectory(
      input,
      stage,
      createGlobFilter(stage.globs, input),
      found
    );
    return;
  }
  if (isPartial(path.basename(input))) {
    await expandPartial(input, stage, root, found);
    return;
  }
  if (isSourceFile(path.basename(input), stage.kind)) {
    found.push(input);
  }
}

async function resolveTranslations(
  translate: readonly TranslatePair[],
  root: string
): Promise<TranslatePair[]> {
  const resolved: TranslatePair[] = [];
  for (const pair of translate) {
    const sourceRoot = path.resolve(root, pair.sourceRoot);
    const isDirectory = await fs
      .stat(sourceRoot)
      .then((stat) => stat.isDirectory())
      .catch(() => false);
    if (!isDirectory) {
      throw new ConfigurationError(
        `Translate source root is not a directory: ${pair.sourceRoot}`
      );
    }
    resolved.push({
      sourceRoot,
      outputRoot: path.resolve(root, pair.outputRoot),
    });
  }
  return resolved;
}

/**
 * Rejects output templates whose `[hash]` placeholder is outside the file
 * name.
 */
export function assertHashInFileName(outputTemplate: string): void {
  if (path.dirname(outputTemplate).includes(HASH_PLACEHOLDER)) {
    throw new ConfigurationError(
      `The ${HASH_PLACEHOLDER} placeholder must be in the file name: ${outputTemplate}`
    );
  }
}

function createUnit(
  stage: StageConfig,
  sourcePath: string,
  outputTemplate: string
): CompilationUnit {
  assertHashInFileName(outputTemplate);
  let unit: CompilationUnit;
  switch (stage.kind) {
    case "style":
      unit = { stage: "style", sourcePath, outputTemplate, options: stage };
      break;
    case "script":
      unit = { stage: "script", sourcePath, outputTemplate, options: stage };
      break;
    case "template":
      unit = { stage: "template", sourcePath, outputTemplate, options: stage };
      break;
    default: {
      const exhaustive: never = stage;
      throw new ConfigurationError(`Unknown asset kind: ${String(exhaustive)}`);
    }
  }
  return Object.freeze(unit);
}

/**
 * Expands one asset kind's configuration into an ordered list of units:
 * the explicit file mapping first, then every `paths` entry in order.
 * Units are deduplicated by source path, keeping the first.
 */
export async function resolveStageUnits(
  stage: StageConfig,
  root: string
): Promise<CompilationUnit[]> {
  const translations = await resolveTranslations(stage.translate, root);
  const units: CompilationUnit[] = [];
  const seen = new Set<string>();

  for (const mapping of stage.files) {
    const sourcePath = path.resolve(root, mapping.source);
    if (seen.has(sourcePath)) {
      continue;
    }
    seen.add(sourcePath);
    units.push(
      createUnit(stage, sourcePath, path.resolve(root, mapping.output))
    );
  }

  for (const input of stage.paths) {
    const found: string[] = [];
    await collectInput(path.resolve(root, input), stage, root, found);
    for (const sourcePath of found) {
      if (seen.has(sourcePath)) {
        continue;
      }
      seen.add(sourcePath);
      const outputDirectory = translateDirectory(
        path.dirname(sourcePath),
        translations
      );
      const outputName = deriveOutputName(
        path.basename(sourcePath),
        stage.kind,
        stage.hash
      );
      units.push(
        createUnit(stage, sourcePath, path.join(outputDirectory, outputName))
      );
    }
  }

  return units;
}

/**
 * Resolves the units of every stage. Any configuration problem is raised
 * before a single unit has run.
 */
export async function resolveUnits(
  config: WebCompileConfig
): Promise<StageUnits> {
  const style = await resolveStageUnits(config.style, config.root);
  const script = await resolveStageUnits(config.script, config.root);
  const template = await resolveStageUnits(config.template, config.root);
  return { style, script, template };
}
