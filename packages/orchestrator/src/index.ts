import path from "node:path";
import { type BackendSet, createDefaultBackends } from "@webcompile/backends";
import { resolveUnits } from "@webcompile/resolver";
import {
  type CompilationUnit,
  type FailedOutcome,
  type RunResult,
  type SkippedOutcome,
  STAGE_ORDER,
  type StageKind,
  type StageUnits,
  type UnitOutcome,
  type VersionControlIntent,
  type WebCompileConfig,
} from "@webcompile/types";
import { createDefaultLogger, type Logger } from "./logger";
import { CompiledNameRegistry } from "./name-registry";
import { runUnit, type StageRunContext } from "./stage-runner";
import {
  createGitVersionControl,
  noopVersionControl,
  type VersionControl,
} from "./version-control";

export type PipelineStartEvent = {
  readonly kind: "pipeline:start";
  readonly timestamp: number;
  readonly units: StageUnits;
};

export type StageStartEvent = {
  readonly kind: "stage:start";
  readonly stage: StageKind;
  readonly units: readonly CompilationUnit[];
};

export type UnitCompleteEvent = {
  readonly kind: "unit:complete";
  readonly stage: StageKind;
  readonly outcome: UnitOutcome;
};

export type StageEndEvent = {
  readonly kind: "stage:end";
  readonly stage: StageKind;
  readonly outcomes: readonly UnitOutcome[];
};

export type PipelineEndEvent = {
  readonly kind: "pipeline:end";
  readonly timestamp: number;
  readonly result: RunResult;
  readonly exitCode: number;
};

export type PipelineEvent =
  | PipelineStartEvent
  | StageStartEvent
  | UnitCompleteEvent
  | StageEndEvent
  | PipelineEndEvent;

export type PipelineEventHandler = (
  event: PipelineEvent
) => void | Promise<void>;

export type RunOptions = {
  readonly backends?: BackendSet;
  readonly logger?: Logger;
  /** Defaults to git when `gitAdd` is on, otherwise a no-op. */
  readonly versionControl?: VersionControl;
  readonly onEvent?: PipelineEventHandler;
};

export type RunOutput = {
  readonly result: RunResult;
  readonly exitCode: number;
};

/** Error wins over changed; changed wins over clean. */
export const computeExitCode = (
  result: Pick<RunResult, "anyChanged" | "anyFailed">,
  config: Pick<WebCompileConfig, "exitCode" | "errorExitCode">
): number => {
  if (result.anyFailed) {
    return config.errorExitCode;
  }
  return result.anyChanged ? config.exitCode : 0;
};

const collectIntents = (
  outcomes: readonly UnitOutcome[]
): VersionControlIntent[] => {
  const intents: VersionControlIntent[] = [];
  for (const outcome of outcomes) {
    if (outcome.status !== "written") {
      continue;
    }
    for (const file of outcome.createdPaths) {
      intents.push({ action: "add", path: file });
    }
    for (const file of outcome.removedPaths) {
      intents.push({ action: "remove", path: file });
    }
  }
  return intents;
};

const buildResult = (
  outcomes: readonly UnitOutcome[],
  testRun: boolean
): RunResult => {
  const failures = outcomes.filter(
    (outcome): outcome is FailedOutcome => outcome.status === "failed"
  );
  return {
    outcomes,
    failures,
    anyChanged:
      !testRun && outcomes.some((outcome) => outcome.status === "written"),
    anyFailed: failures.length > 0,
    intents: collectIntents(outcomes),
  };
};

const applyIntents = async (
  intents: readonly VersionControlIntent[],
  versionControl: VersionControl
) => {
  const added = intents
    .filter((intent) => intent.action === "add")
    .map((intent) => intent.path);
  const removed = intents
    .filter((intent) => intent.action === "remove")
    .map((intent) => intent.path);
  await versionControl.add(added);
  await versionControl.remove(removed);
};

/**
 * Lists every failed unit as `path[:line[:column]] [CODE] message`, with
 * paths relative to `root`.
 */
export const formatFailureSummary = (
  result: Pick<RunResult, "failures">,
  root: string
): string =>
  result.failures
    .map(({ error }) => {
      const file = path
        .relative(root, error.sourcePath)
        .split(path.sep)
        .join("/");
      const position = [error.line, error.column]
        .filter((value): value is number => value !== undefined)
        .map((value) => `:${value}`)
        .join("");
      return `${file}${position} [${error.code}] ${error.message}`;
    })
    .join("\n");

const skipped = (unit: CompilationUnit): SkippedOutcome => ({
  status: "skipped",
  unit,
  reason: "stopped",
});

type StreamState = {
  halted: boolean;
};

async function* runStage(
  stage: StageKind,
  units: readonly CompilationUnit[],
  context: StageRunContext,
  config: WebCompileConfig,
  state: StreamState
): AsyncGenerator<UnitCompleteEvent, void, void> {
  for (let index = 0; index < units.length; index += config.concurrency) {
    const batch = units.slice(index, index + config.concurrency);
    const outcomes: UnitOutcome[] = state.halted
      ? batch.map(skipped)
      : await Promise.all(batch.map((unit) => runUnit(unit, context)));

    for (const outcome of outcomes) {
      if (outcome.status === "failed" && !config.continueOnError) {
        state.halted = true;
      }
      yield { kind: "unit:complete", stage, outcome };
    }
  }
}

/**
 * Runs every stage in order and yields progress events. Units are resolved
 * up front, so a `ConfigurationError` escapes before anything is written.
 */
export const createPipelineStream = (defaults: RunOptions = {}) =>
  async function* pipelineStream(
    config: WebCompileConfig,
    overrides: RunOptions = {}
  ): AsyncGenerator<PipelineEvent, void, void> {
    const options = { ...defaults, ...overrides };
    const logger =
      options.logger ?? createDefaultLogger({ level: config.log.level });
    const backends = options.backends ?? createDefaultBackends();
    const versionControl =
      options.versionControl ??
      (config.gitAdd ? createGitVersionControl(config.root) : noopVersionControl);

    const units = await resolveUnits(config);
    logger.debug("Resolved compilation units", {
      style: units.style.length,
      script: units.script.length,
      template: units.template.length,
    });

    yield {
      kind: "pipeline:start",
      timestamp: Date.now(),
      units,
    } satisfies PipelineStartEvent;

    const registry = new CompiledNameRegistry(config.root);
    const context: StageRunContext = {
      root: config.root,
      backends,
      registry,
      testRun: config.testRun,
      logger,
    };
    const state: StreamState = { halted: false };
    const outcomes: UnitOutcome[] = [];

    for (const stage of STAGE_ORDER) {
      yield { kind: "stage:start", stage, units: units[stage] };

      const stageOutcomes: UnitOutcome[] = [];
      for await (const event of runStage(
        stage,
        units[stage],
        context,
        config,
        state
      )) {
        stageOutcomes.push(event.outcome);
        yield event;
      }
      outcomes.push(...stageOutcomes);

      yield { kind: "stage:end", stage, outcomes: stageOutcomes };

      if (stage === "script") {
        registry.seal();
      }
    }

    const result = buildResult(outcomes, config.testRun);
    if (config.gitAdd && !config.testRun) {
      await applyIntents(result.intents, versionControl);
    }

    yield {
      kind: "pipeline:end",
      timestamp: Date.now(),
      result,
      exitCode: computeExitCode(result, config),
    } satisfies PipelineEndEvent;
  };

export const runAll = async (
  config: WebCompileConfig,
  options: RunOptions = {}
): Promise<RunOutput> => {
  let output: RunOutput | undefined;

  for await (const event of createPipelineStream(options)(config)) {
    if (options.onEvent) {
      await options.onEvent(event);
    }
    if (event.kind === "pipeline:end") {
      output = { result: event.result, exitCode: event.exitCode };
    }
  }

  if (!output) {
    throw new Error("Pipeline ended without a result");
  }
  return output;
};

export {
  findStaleSiblings,
  hashContent,
  hasHashPlaceholder,
  nameFor,
  type PruneOptions,
  pruneStale,
  stalePattern,
  substituteHash,
} from "./hash-namer";
export {
  createDefaultLogger,
  type LogMetadata,
  type Logger,
  type LoggerConfig,
  StructuredLogger,
} from "./logger";
export { CompiledNameRegistry, type RegisterInput } from "./name-registry";
export { runUnit, type StageRunContext } from "./stage-runner";
export {
  assertGitRepository,
  createGitVersionControl,
  noopVersionControl,
  type VersionControl,
} from "./version-control";
