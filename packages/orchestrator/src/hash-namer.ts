import { createHash } from "node:crypto";
import { promises as fs } from "node:fs";
import path from "node:path";
import { HASH_PLACEHOLDER, type SourceEncoding } from "@webcompile/types";

const HASH_HEX = "[0-9a-f]{32}";

const escapeRegExp = (value: string): string =>
  value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/** MD5 of the encoded bytes as 32 lower-case hex characters. */
export const hashContent = (
  contents: string,
  encoding: SourceEncoding = "utf8"
): string =>
  createHash("md5").update(Buffer.from(contents, encoding)).digest("hex");

export const hasHashPlaceholder = (template: string): boolean =>
  path.basename(template).includes(HASH_PLACEHOLDER);

/** Replaces every placeholder in the file name; directories are untouched. */
export const substituteHash = (template: string, hash: string): string => {
  if (!hasHashPlaceholder(template)) {
    return template;
  }
  const name = path.basename(template).split(HASH_PLACEHOLDER).join(hash);
  return path.join(path.dirname(template), name);
};

export const nameFor = (
  template: string,
  contents: string,
  encoding: SourceEncoding = "utf8"
): string =>
  hasHashPlaceholder(template)
    ? substituteHash(template, hashContent(contents, encoding))
    : template;

/**
 * Matches file names produced from `template` by any hash. Repeated
 * placeholders must all carry the same hash.
 */
export const stalePattern = (template: string): RegExp => {
  const [first = "", ...rest] = path
    .basename(template)
    .split(HASH_PLACEHOLDER)
    .map(escapeRegExp);
  const body = rest
    .map((part, index) => `${index === 0 ? `(${HASH_HEX})` : "\\1"}${part}`)
    .join("");
  return new RegExp(`^${first}${body}$`);
};

const readDirectory = async (directory: string): Promise<string[]> => {
  try {
    return await fs.readdir(directory);
  } catch (error) {
    if (
      error instanceof Error &&
      "code" in error &&
      (error.code === "ENOENT" || error.code === "ENOTDIR")
    ) {
      return [];
    }
    throw error;
  }
};

export const findStaleSiblings = async (
  template: string,
  keptPath: string
): Promise<string[]> => {
  if (!hasHashPlaceholder(template)) {
    return [];
  }
  const directory = path.dirname(template);
  const pattern = stalePattern(template);
  const kept = path.resolve(keptPath);
  const names = await readDirectory(directory);

  return names
    .filter((name) => pattern.test(name))
    .map((name) => path.join(directory, name))
    .filter((candidate) => path.resolve(candidate) !== kept)
    .sort();
};

export type PruneOptions = {
  readonly dryRun?: boolean;
};

/** Removes stale hashed siblings of `keptPath` and returns their paths. */
export const pruneStale = async (
  template: string,
  keptPath: string,
  options: PruneOptions = {}
): Promise<string[]> => {
  const stale = await findStaleSiblings(template, keptPath);
  if (!options.dryRun) {
    await Promise.all(stale.map((file) => fs.rm(file, { force: true })));
  }
  return stale;
};
