import path from "node:path";
import type { BackendSet } from "@webcompile/backends";
import {
  type CliOverrides,
  DEFAULT_ERROR_EXIT_CODE,
  loadConfig,
  mergeCliOverrides,
  routePathsByKind,
} from "@webcompile/config";
import {
  assertGitRepository,
  formatFailureSummary,
  type Logger,
  runAll,
  type VersionControl,
} from "@webcompile/orchestrator";
import {
  CONFIG_TOP_LEVEL_KEY,
  ConfigurationError,
  type LogFormat,
  type LogLevel,
  type StyleFormat,
  type WebCompileConfig,
} from "@webcompile/types";
import chalk from "chalk";
import { dump } from "js-yaml";
import { logger as defaultLogger } from "../utils/logger";
import {
  createSpinner,
  type Spinner,
  type SpinnerFactory,
} from "../utils/spinner";

/** Options supported by the `web-compile` command. */
export type CompileFlags = {
  config?: string;
  styleFormat?: StyleFormat;
  sourcemap?: boolean;
  hash?: boolean;
  jsComments?: boolean;
  partialDepth?: number;
  recurse?: boolean;
  translate?: string[];
  continueOnError?: boolean;
  testRun?: boolean;
  exitCode?: number;
  errorExitCode?: number;
  gitAdd?: boolean;
  concurrency?: number;
  verbose?: boolean;
  format?: LogFormat;
  json?: boolean;
  logLevel?: LogLevel;
  quiet?: boolean;
};

export type CompileDependencies = {
  readonly cwd?: string;
  readonly logger?: Logger;
  readonly backends?: BackendSet;
  readonly versionControl?: VersionControl;
  readonly env?: NodeJS.ProcessEnv;
  readonly spinner?: SpinnerFactory;
};

const toOverrides = (
  flags: CompileFlags,
  paths: CliOverrides["paths"]
): CliOverrides => ({
  ...(flags.styleFormat ? { styleFormat: flags.styleFormat } : {}),
  ...(flags.sourcemap ? { sourcemap: true } : {}),
  ...(flags.hash ? { hash: true } : {}),
  ...(flags.jsComments ? { jsComments: true } : {}),
  ...(flags.partialDepth === undefined
    ? {}
    : { partialDepth: flags.partialDepth }),
  ...(flags.recurse === undefined ? {} : { recurse: flags.recurse }),
  ...(flags.translate ? { translate: flags.translate } : {}),
  ...(flags.continueOnError ? { continueOnError: true } : {}),
  ...(flags.testRun ? { testRun: true } : {}),
  ...(flags.exitCode === undefined ? {} : { exitCode: flags.exitCode }),
  ...(flags.errorExitCode === undefined
    ? {}
    : { errorExitCode: flags.errorExitCode }),
  ...(flags.gitAdd === undefined ? {} : { gitAdd: flags.gitAdd }),
  ...(flags.concurrency === undefined
    ? {}
    : { concurrency: flags.concurrency }),
  ...(flags.logLevel ? { logLevel: flags.logLevel } : {}),
  ...(flags.format ? { logFormat: flags.format } : {}),
  ...(paths ? { paths } : {}),
});

/** The effective configuration in the file layout, for `--verbose`. */
export const serializeConfig = (config: WebCompileConfig): string => {
  const { root: _root, configPath: _configPath, ...section } = config;
  return dump({ [CONFIG_TOP_LEVEL_KEY]: section }, { noRefs: true });
};

const describeChanges = (config: WebCompileConfig, changed: number) =>
  config.testRun
    ? `Test run: ${changed} output(s) would change`
    : `Updated ${changed} output(s)`;

/**
 * Loads configuration, applies flags and positional paths, runs the
 * pipeline and returns the process exit code.
 */
export async function runCompile(
  inputs: readonly string[],
  flags: CompileFlags,
  deps: CompileDependencies = {}
): Promise<number> {
  const cwd = deps.cwd ?? process.cwd();
  const logger = deps.logger ?? defaultLogger;
  let errorExitCode = flags.errorExitCode ?? DEFAULT_ERROR_EXIT_CODE;
  let spinner: Spinner | undefined;

  try {
    const loaded = await loadConfig({ cwd, configPath: flags.config });
    const routed = await routePathsByKind(inputs, cwd);
    for (const ignored of routed.ignored) {
      logger.debug(
        `Ignoring ${path.relative(cwd, ignored)}: not a style, script or template source`
      );
    }

    const config = mergeCliOverrides(
      loaded.config,
      toOverrides(flags, inputs.length > 0 ? routed.paths : undefined)
    );
    errorExitCode = config.errorExitCode;

    if (loaded.path) {
      logger.debug(`Using configuration ${loaded.path}`);
    }
    if (flags.verbose) {
      logger.info(serializeConfig(config));
    }
    if (config.gitAdd && !config.testRun && !deps.versionControl) {
      await assertGitRepository(config.root);
    }

    const text = "Compiling assets...";
    spinner = deps.spinner ? deps.spinner(text) : createSpinner(text, deps.env);
    const { result, exitCode } = await runAll(config, {
      logger,
      ...(deps.backends ? { backends: deps.backends } : {}),
      ...(deps.versionControl ? { versionControl: deps.versionControl } : {}),
    });

    const changed = result.outcomes.filter(
      (outcome) => outcome.status === "written"
    ).length;
    if (result.anyFailed) {
      spinner.fail(chalk.red(`${result.failures.length} unit(s) failed`));
      logger.error(
        `Compilation failed:\n${formatFailureSummary(result, config.root)}`
      );
    } else {
      spinner.succeed(describeChanges(config, changed));
    }

    return exitCode;
  } catch (error) {
    spinner?.fail(chalk.red("Failed to compile assets"));
    if (error instanceof ConfigurationError) {
      logger.error(chalk.red(error.message));
    } else if (error instanceof Error) {
      logger.error(error);
    } else {
      logger.error(String(error));
    }
    return errorExitCode;
  }
}
