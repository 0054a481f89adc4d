import type { JsonValue as JsonValueType } from "type-fest";
import { z } from "zod";

/** Top-level key every configuration document must contain. */
export const CONFIG_TOP_LEVEL_KEY = "web-compile";

export const SOURCE_ENCODINGS = [
  "utf8",
  "utf-8",
  "utf16le",
  "latin1",
  "ascii",
] as const;

export type SourceEncoding = (typeof SOURCE_ENCODINGS)[number];

export const STYLE_FORMATS = ["expanded", "compressed"] as const;

export type StyleFormat = (typeof STYLE_FORMATS)[number];

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const LOG_FORMATS = ["text", "json"] as const;

export type LogFormat = (typeof LOG_FORMATS)[number];

const TRANSLATE_PATTERN = /^[^:]+:[^:]+$/;

export const jsonValueSchema: z.ZodType<JsonValueType> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

const stringArraySchema = z.array(z.string().min(1));

const stageInputShape = {
  files: z.record(z.string().min(1)).optional(),
  paths: stringArraySchema.optional(),
  recurse: z.boolean().optional(),
  partialDepth: z.number().int().nonnegative().optional(),
  translate: z
    .array(
      z.string().regex(TRANSLATE_PATTERN, {
        message: 'Must be "<sourceRoot>:<outputRoot>"',
      })
    )
    .optional(),
  globs: stringArraySchema.optional(),
  hash: z.boolean().optional(),
  encoding: z.enum(SOURCE_ENCODINGS).optional(),
};

export const styleStageSchema = z
  .object({
    ...stageInputShape,
    format: z.enum(STYLE_FORMATS).optional(),
    sourcemap: z.boolean().optional(),
  })
  .strict();

export const scriptStageSchema = z
  .object({
    ...stageInputShape,
    comments: z.boolean().optional(),
    sourcemap: z.boolean().optional(),
  })
  .strict();

export const templateStageSchema = z
  .object({
    ...stageInputShape,
    variables: z.record(jsonValueSchema).optional(),
    strict: z.boolean().optional(),
    noEscape: z.boolean().optional(),
  })
  .strict();

const exitCodeSchema = z.number().int().min(0).max(255);

export const webCompileConfigSchema = z
  .object({
    style: styleStageSchema.optional(),
    script: scriptStageSchema.optional(),
    template: templateStageSchema.optional(),
    continueOnError: z.boolean().optional(),
    testRun: z.boolean().optional(),
    exitCode: exitCodeSchema.optional(),
    errorExitCode: exitCodeSchema.min(1).optional(),
    gitAdd: z.boolean().optional(),
    concurrency: z.number().int().positive().optional(),
    log: z
      .object({
        level: z.enum(LOG_LEVELS).optional(),
        format: z.enum(LOG_FORMATS).optional(),
      })
      .strict()
      .optional(),
  })
  .strict()
  .refine(
    (config) =>
      config.exitCode === undefined || config.exitCode !== config.errorExitCode,
    {
      message: "errorExitCode must differ from exitCode",
      path: ["errorExitCode"],
    }
  );

export type RawStyleStageConfig = z.infer<typeof styleStageSchema>;
export type RawScriptStageConfig = z.infer<typeof scriptStageSchema>;
export type RawTemplateStageConfig = z.infer<typeof templateStageSchema>;
export type RawWebCompileConfig = z.infer<typeof webCompileConfigSchema>;
