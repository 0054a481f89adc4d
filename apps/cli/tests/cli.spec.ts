import { mkdir, mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { normalizeConfig } from "@webcompile/config";
import { type Logger, noopVersionControl } from "@webcompile/orchestrator";
import chalk from "chalk";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

import {
  type CompileFlags,
  runCompile,
  serializeConfig,
} from "../src/commands/compile";
import {
  applyLoggingFlags,
  type CompileRunner,
  createProgram,
} from "../src/program";
import { createCliLogger } from "../src/utils/logger";

const createRecordingLogger = () => {
  const lines: string[] = [];
  const logger: Logger = {
    debug: (message) => {
      lines.push(`debug ${message}`);
    },
    info: (message) => {
      lines.push(`info ${message}`);
    },
    warn: (message) => {
      lines.push(`warn ${message}`);
    },
    error: (message) => {
      lines.push(
        `error ${message instanceof Error ? message.message : message}`
      );
    },
  };
  return { logger, lines };
};

const createSink = () => {
  const chunks: string[] = [];
  const stream = {
    write: (chunk: string) => {
      chunks.push(chunk);
      return true;
    },
  };
  return { chunks, stream };
};

describe("command line parsing", () => {
  afterEach(() => {
    process.exitCode = undefined;
  });

  const parse = async (args: string[]) => {
    const run = vi.fn<CompileRunner>(async () => 3);
    const env: NodeJS.ProcessEnv = {};
    await createProgram({ run, env }).parseAsync(["node", "web-compile", ...args]);
    const [call] = run.mock.calls;
    return { call, env };
  };

  test("passes paths and flags to the runner", async () => {
    const { call } = await parse([
      "site.scss",
      "app.js",
      "--hash",
      "--no-git-add",
      "--partial-depth",
      "2",
      "--style-format",
      "expanded",
      "--exit-code",
      "0",
      "-t",
      "src:dist",
      "assets:public",
    ]);

    expect(call?.[0]).toEqual(["site.scss", "app.js"]);
    expect(call?.[1]).toEqual({
      hash: true,
      gitAdd: false,
      partialDepth: 2,
      styleFormat: "expanded",
      exitCode: 0,
      translate: ["src:dist", "assets:public"],
    });
    expect(process.exitCode).toBe(3);
  });

  test("negatable flags are only passed when typed", async () => {
    const { call } = await parse([]);

    expect(call?.[0]).toEqual([]);
    expect(call?.[1]).toEqual({});
  });

  test("logging flags reach the environment", async () => {
    const { env } = await parse(["--format", "json", "--log-level", "debug"]);

    expect(env.WEB_COMPILE_LOG_FORMAT).toBe("json");
    expect(env.WEB_COMPILE_LOG_LEVEL).toBe("debug");
  });

  test("quiet mode keeps only errors", () => {
    const env: NodeJS.ProcessEnv = {};
    applyLoggingFlags({ quiet: true, json: true }, env);

    expect(env).toEqual({
      WEB_COMPILE_LOG_FORMAT: "json",
      WEB_COMPILE_LOG_LEVEL: "error",
    });
  });
});

describe("runCompile", () => {
  let workspace: string;
  const env: NodeJS.ProcessEnv = { WEB_COMPILE_LOG_FORMAT: "json" };

  beforeEach(async () => {
    workspace = await mkdtemp(path.join(tmpdir(), "web-compile-cli-"));
  });

  afterEach(async () => {
    await rm(workspace, { recursive: true, force: true });
  });

  const compile = (inputs: string[], flags: CompileFlags) => {
    const recording = createRecordingLogger();
    const result = runCompile(inputs, flags, {
      cwd: workspace,
      logger: recording.logger,
      versionControl: noopVersionControl,
      env,
    });
    return { result, lines: recording.lines };
  };

  test("compiles configured sources and reports the changed exit code", async () => {
    await writeFile(
      path.join(workspace, "web-compile.config.yaml"),
      "web-compile:\n  style:\n    paths: [styles]\n"
    );
    await writeFile(path.join(workspace, "site.scss"), "a { color: red; }\n");
    await mkdir(path.join(workspace, "styles"));

    const { result } = compile(["site.scss"], {});

    await expect(result).resolves.toBe(3);
    expect((await readdir(workspace)).sort()).toEqual([
      "site.css",
      "site.scss",
      "styles",
      "web-compile.config.yaml",
    ]);
  });

  test("a test run exits cleanly and writes nothing", async () => {
    await writeFile(path.join(workspace, "app.js"), "const a = 1;\n");

    const { result } = compile(["app.js"], { testRun: true });

    await expect(result).resolves.toBe(0);
    expect(await readdir(workspace)).toEqual(["app.js"]);
  });

  test("configuration errors use the error exit code", async () => {
    await writeFile(
      path.join(workspace, "web-compile.config.json"),
      JSON.stringify({ other: {} })
    );

    const { result, lines } = compile([], { errorExitCode: 4 });

    await expect(result).resolves.toBe(4);
    expect(lines.some((line) => line.includes("top-level key 'web-compile'"))).toBe(
      true
    );
  });

  test("a configuration error raised mid-run settles the spinner", async () => {
    await writeFile(
      path.join(workspace, "web-compile.config.yaml"),
      "web-compile:\n  style:\n    paths: [missing]\n"
    );
    const spinner = {
      succeed: vi.fn<(text?: string) => void>(),
      fail: vi.fn<(text?: string) => void>(),
    };
    const { logger, lines } = createRecordingLogger();

    const exitCode = await runCompile([], {}, {
      cwd: workspace,
      logger,
      versionControl: noopVersionControl,
      spinner: () => spinner,
    });

    expect(exitCode).toBe(1);
    expect(spinner.fail).toHaveBeenCalledTimes(1);
    expect(spinner.succeed).not.toHaveBeenCalled();
    expect(lines.filter((line) => line.startsWith("error "))).toEqual([
      `error ${chalk.red(
        `Input path does not exist: ${path.join(workspace, "missing")}`
      )}`,
    ]);
  });

  test("failures are summarised", async () => {
    await writeFile(path.join(workspace, "broken.js"), "const = ;\n");

    const { result, lines } = compile(["broken.js"], {});

    await expect(result).resolves.toBe(1);
    const summary = lines.find((line) => line.startsWith("error Compilation failed:"));
    expect(summary).toContain("broken.js:1:");
    expect(summary).toContain("[COMPILE_ERROR]");
  });

  test("verbose mode prints the effective configuration", async () => {
    const { result, lines } = compile([], { verbose: true, hash: true });

    await expect(result).resolves.toBe(0);
    const dumped = lines.find((line) => line.startsWith("info web-compile:"));
    expect(dumped).toContain("  style:\n");
    expect(dumped).toContain("    hash: true\n");
  });
});

describe("helpers", () => {
  test("serializeConfig omits the root and nests under the top-level key", () => {
    const yaml = serializeConfig(normalizeConfig({}, { root: "/work" }));

    expect(yaml.startsWith("web-compile:\n")).toBe(true);
    expect(yaml).not.toContain("/work");
    expect(yaml).toContain("  exitCode: 3\n");
  });

  test("the CLI logger writes JSON lines in json mode", () => {
    const stdout = createSink();
    const stderr = createSink();
    const logger = createCliLogger({
      stdout: stdout.stream,
      stderr: stderr.stream,
      env: { WEB_COMPILE_LOG_FORMAT: "json", WEB_COMPILE_LOG_LEVEL: "info" },
    });

    logger.debug("hidden");
    logger.info("Compiled: a.scss -> a.css", { file: "a.scss" });
    logger.error("boom");

    expect(stdout.chunks).toHaveLength(1);
    expect(JSON.parse(stdout.chunks[0] ?? "")).toMatchObject({
      level: "info",
      message: "Compiled: a.scss -> a.css",
      file: "a.scss",
    });
    expect(JSON.parse(stderr.chunks[0] ?? "")).toMatchObject({
      level: "error",
      message: "boom",
    });
  });

  test("the CLI logger writes plain lines in text mode", () => {
    const stdout = createSink();
    const logger = createCliLogger({
      stdout: stdout.stream,
      env: { WEB_COMPILE_LOG_LEVEL: "debug" },
    });

    logger.debug("resolving");

    expect(stdout.chunks).toHaveLength(1);
    expect(stdout.chunks[0]).toContain("resolving");
  });
});
