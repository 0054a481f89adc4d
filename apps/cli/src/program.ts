import { STYLE_FORMATS } from "@webcompile/types";
import { Command, Option } from "commander";
import {
  type CompileFlags,
  type CompileDependencies,
  runCompile,
} from "./commands/compile";
import {
  addLoggingOptions,
  parseInteger,
  parsePositiveInteger,
} from "./utils/options";

export const VERSION = "0.1.0";

export type CompileRunner = (
  inputs: readonly string[],
  flags: CompileFlags,
  deps?: CompileDependencies
) => Promise<number>;

export type ProgramOptions = {
  readonly run?: CompileRunner;
  readonly env?: NodeJS.ProcessEnv;
  readonly deps?: CompileDependencies;
};

const FLAGS_WITH_NEGATION = ["recurse", "gitAdd"] as const;

/**
 * Pushes logging flags into the environment so the logger and spinner pick
 * them up, including loggers created before parsing.
 */
export function applyLoggingFlags(
  flags: CompileFlags,
  env: NodeJS.ProcessEnv = process.env
): void {
  if (flags.json) {
    env.WEB_COMPILE_LOG_FORMAT = "json";
  }
  if (flags.format) {
    env.WEB_COMPILE_LOG_FORMAT = flags.format;
  }
  if (flags.quiet) {
    env.WEB_COMPILE_LOG_LEVEL = "error";
  }
  if (flags.logLevel) {
    env.WEB_COMPILE_LOG_LEVEL = flags.logLevel;
  }
}

export function createProgram(options: ProgramOptions = {}): Command {
  const run = options.run ?? runCompile;
  const env = options.env ?? process.env;

  const program = new Command()
    .name("web-compile")
    .description(
      "Compile style sheets, scripts and templates with content-hashed names"
    )
    .version(VERSION)
    .argument("[paths...]", "Source files or directories to add to the run")
    .option("-c, --config <path>", "Configuration file")
    .addOption(
      new Option("--style-format <format>", "Style sheet output style").choices([
        ...STYLE_FORMATS,
      ])
    )
    .option("--sourcemap", "Write source maps for styles and scripts")
    .option("--hash", "Add [hash] to style and script output names")
    .option("--js-comments", "Keep legal comments in minified scripts")
    .option(
      "--partial-depth <n>",
      "Parent directories searched for sources using a partial",
      parseInteger
    )
    .option("--no-recurse", "Do not descend into subdirectories")
    .option(
      "-t, --translate <pair...>",
      "Map a source directory to an output directory (src:dest)"
    )
    .option("--continue-on-error", "Keep compiling after a unit fails")
    .option("--test-run", "Report changes without writing anything")
    .option(
      "--exit-code <n>",
      "Exit code when outputs changed (default 3)",
      parseInteger
    )
    .option(
      "--error-exit-code <n>",
      "Exit code when a unit failed (default 1)",
      parsePositiveInteger
    )
    .option("--no-git-add", "Do not stage new outputs with git")
    .option(
      "--concurrency <n>",
      "Units compiled in parallel within a stage",
      parsePositiveInteger
    )
    .option("-v, --verbose", "Print the effective configuration")
    .showHelpAfterError();

  addLoggingOptions(program);

  program.action(async (paths: string[], _opts: unknown, command: Command) => {
    const flags = { ...command.opts<CompileFlags>() };

    // --no-* flags default to true; only pass them on when typed explicitly.
    for (const name of FLAGS_WITH_NEGATION) {
      if (command.getOptionValueSource(name) !== "cli") {
        delete flags[name];
      }
    }

    applyLoggingFlags(flags, env);
    process.exitCode = await run(paths, flags, {
      ...options.deps,
      env,
    });
  });

  return program;
}
