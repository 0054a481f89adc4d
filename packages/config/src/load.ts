import { promises as fs } from "node:fs";
import path from "node:path";
import TOML from "@iarna/toml";
import { load as yamlLoad } from "js-yaml";
import JSON5 from "json5";
import type { ZodIssue } from "zod";
import {
  CONFIG_TOP_LEVEL_KEY,
  ConfigurationError,
  type WebCompileConfig,
  webCompileConfigSchema,
} from "@webcompile/types";
import { normalizeConfig } from "./normalize";

export type ConfigFormat = "yaml" | "json" | "jsonc" | "toml";

type RawDocument = Record<string, unknown>;

export type LoadedConfig = {
  /** Absolute path to the configuration file (if one was found). */
  path?: string;
  /** The format derived from the file extension. */
  format?: ConfigFormat;
  /** Normalized configuration with every default applied. */
  config: WebCompileConfig;
};

export type LoadConfigOptions = {
  /** Directory searched for a default config file. Defaults to `process.cwd()`. */
  cwd?: string;
  /** Explicit path to a configuration file. Bypasses discovery when provided. */
  configPath?: string;
};

type Candidate = {
  filename: string;
  format: ConfigFormat;
};

const DEFAULT_CANDIDATES: readonly Candidate[] = [
  { filename: "web-compile.config.yaml", format: "yaml" },
  { filename: "web-compile.config.yml", format: "yaml" },
  { filename: "web-compile.config.json", format: "json" },
  { filename: "web-compile.config.jsonc", format: "jsonc" },
  { filename: "web-compile.config.toml", format: "toml" },
];

async function pathExists(candidate: string): Promise<boolean> {
  try {
    await fs.access(candidate);
    return true;
  } catch {
    return false;
  }
}

export function detectConfigFormat(filePath: string): ConfigFormat | undefined {
  const ext = path.extname(filePath).toLowerCase();
  switch (ext) {
    case ".yaml":
    case ".yml":
      return "yaml";
    case ".json":
      return "json";
    case ".jsonc":
      return "jsonc";
    case ".toml":
      return "toml";
    default:
      return;
  }
}

function ensurePlainObject(value: unknown): RawDocument | undefined {
  if (value && typeof value === "object" && !Array.isArray(value)) {
    return value as RawDocument;
  }
  return;
}

export function parseConfigContents(
  contents: string,
  format: ConfigFormat
): unknown {
  switch (format) {
    case "yaml":
      return yamlLoad(contents);
    case "json":
      return JSON.parse(contents);
    case "jsonc":
      return JSON5.parse(contents);
    case "toml":
      return TOML.parse(contents);
    default: {
      const exhaustive: never = format;
      throw new ConfigurationError(`Unsupported config format: ${exhaustive}`);
    }
  }
}

export function formatSchemaIssues(issues: readonly ZodIssue[]): string {
  return issues
    .map((issue) => {
      const pathLabel = issue.path
        .map((segment, index) =>
          typeof segment === "number"
            ? `[${segment}]`
            : index === 0
              ? segment
              : `.${segment}`
        )
        .join("");
      return `${pathLabel || CONFIG_TOP_LEVEL_KEY} ${issue.message}`;
    })
    .join("\n  • ");
}

async function resolveConfigPath(
  options: LoadConfigOptions
): Promise<{ path: string; format: ConfigFormat } | undefined> {
  if (options.configPath) {
    const explicit = path.resolve(options.cwd ?? process.cwd(), options.configPath);
    if (!(await pathExists(explicit))) {
      throw new ConfigurationError(
        `Configuration file does not exist: ${options.configPath}`
      );
    }
    const format = detectConfigFormat(explicit);
    if (!format) {
      throw new ConfigurationError(
        `Unsupported config extension: ${path.basename(explicit)} (allowed: json, jsonc, toml, yml, yaml)`
      );
    }
    return { path: explicit, format };
  }

  const cwd = path.resolve(options.cwd ?? process.cwd());
  for (const candidate of DEFAULT_CANDIDATES) {
    const candidatePath = path.join(cwd, candidate.filename);
    if (await pathExists(candidatePath)) {
      return { path: candidatePath, format: candidate.format };
    }
  }

  return;
}

/**
 * Validates a parsed configuration document and converts it into the
 * normalized structure. `root` is the directory relative paths resolve
 * against.
 */
export function readConfigDocument(
  document: unknown,
  root: string,
  configPath?: string
): WebCompileConfig {
  const locationHint = configPath ? ` (${configPath})` : "";
  const raw = ensurePlainObject(document);
  if (!(raw && CONFIG_TOP_LEVEL_KEY in raw)) {
    throw new ConfigurationError(
      `Configuration must contain top-level key '${CONFIG_TOP_LEVEL_KEY}'${locationHint}`
    );
  }

  const section = raw[CONFIG_TOP_LEVEL_KEY] ?? {};
  const schemaResult = webCompileConfigSchema.safeParse(section);
  if (!schemaResult.success) {
    throw new ConfigurationError(
      `Invalid configuration${locationHint}:\n  • ${formatSchemaIssues(schemaResult.error.issues)}`
    );
  }

  return normalizeConfig(schemaResult.data, { root, configPath });
}

/**
 * Loads the run configuration from an explicit path or the first default
 * candidate in `cwd`. Returns the defaults rooted at `cwd` when no file is
 * present.
 */
export async function loadConfig(
  options: LoadConfigOptions = {}
): Promise<LoadedConfig> {
  const resolved = await resolveConfigPath(options);
  if (!resolved) {
    const root = path.resolve(options.cwd ?? process.cwd());
    return { config: normalizeConfig({}, { root }) };
  }

  const contents = await fs.readFile(resolved.path, "utf8");
  if (contents.trim().length === 0) {
    throw new ConfigurationError(
      `Configuration file is empty: ${resolved.path}`
    );
  }

  let document: unknown;
  try {
    document = parseConfigContents(contents, resolved.format);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      throw error;
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(
      `Error reading configuration file ${resolved.path}: ${reason}`,
      { cause: error }
    );
  }

  return {
    path: resolved.path,
    format: resolved.format,
    config: readConfigDocument(
      document,
      path.dirname(resolved.path),
      resolved.path
    ),
  };
}
