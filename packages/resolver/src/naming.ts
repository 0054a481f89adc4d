import path from "node:path";
import {
  HASH_PLACEHOLDER,
  isMinifiedScript,
  PARTIAL_MARKER,
  SOURCE_EXTENSIONS,
  type StageKind,
  type TranslatePair,
} from "@webcompile/types";

const OUTPUT_EXTENSIONS: Readonly<Record<string, string>> = {
  ".scss": ".css",
  ".sass": ".css",
  ".js": ".min.js",
  ".mjs": ".min.mjs",
};

const DEFAULT_TEMPLATE_EXTENSION = ".html";

export const isPartial = (fileName: string): boolean =>
  fileName.startsWith(PARTIAL_MARKER);

const matchingExtension = (
  fileName: string,
  kind: StageKind
): string | undefined => {
  const normalized = fileName.toLowerCase();
  return SOURCE_EXTENSIONS[kind].find((ext) => normalized.endsWith(ext));
};

/**
 * True for files discovered as compilation roots of `kind`. Minified
 * scripts are outputs, never sources.
 */
export function isSourceFile(fileName: string, kind: StageKind): boolean {
  if (!matchingExtension(fileName, kind)) {
    return false;
  }
  return !(kind === "script" && isMinifiedScript(fileName));
}

/**
 * Output file name for a discovered source, with `[hash]` before the final
 * extension when hashing is requested.
 */
export function deriveOutputName(
  fileName: string,
  kind: StageKind,
  hash: boolean
): string {
  const ext = matchingExtension(fileName, kind);
  const stem = ext ? fileName.slice(0, fileName.length - ext.length) : fileName;
  const hashSegment = hash ? `.${HASH_PLACEHOLDER}` : "";

  if (kind === "template") {
    const innerExt = path.extname(stem);
    if (innerExt.length === 0) {
      return `${stem}${hashSegment}${DEFAULT_TEMPLATE_EXTENSION}`;
    }
    return `${stem.slice(0, stem.length - innerExt.length)}${hashSegment}${innerExt}`;
  }

  const outputExt = (ext && OUTPUT_EXTENSIONS[ext]) ?? path.extname(fileName);
  return `${stem}${hashSegment}${outputExt}`;
}

const isWithin = (candidate: string, root: string): boolean =>
  candidate === root || candidate.startsWith(`${root}${path.sep}`);

/**
 * Maps `directory` under the longest matching source root; returns it
 * unchanged when no translation applies.
 */
export function translateDirectory(
  directory: string,
  translations: readonly TranslatePair[]
): string {
  const candidates = translations
    .filter((pair) => isWithin(directory, pair.sourceRoot))
    .sort((a, b) => b.sourceRoot.length - a.sourceRoot.length);
  const match = candidates[0];
  if (!match) {
    return directory;
  }
  return path.join(
    match.outputRoot,
    path.relative(match.sourceRoot, directory)
  );
}

/**
 * Directories searched when a partial is given as input: its own directory
 * plus up to `depth` ancestors, never leaving `root`.
 */
export function partialSearchDirectories(
  partialPath: string,
  depth: number,
  root: string
): string[] {
  const directories: string[] = [];
  let current = path.dirname(path.resolve(partialPath));
  const boundary = path.resolve(root);

  for (let level = 0; level <= depth; level += 1) {
    if (!isWithin(current, boundary)) {
      break;
    }
    directories.push(current);
    const parent = path.dirname(current);
    if (parent === current) {
      break;
    }
    current = parent;
  }

  return directories;
}
