import { spawn } from "node:child_process";
import path from "node:path";
import { ConfigurationError } from "@webcompile/types";

/**
 * Records created outputs with version control and forgets pruned ones.
 */
export type VersionControl = {
  add(paths: readonly string[]): Promise<void>;
  remove(paths: readonly string[]): Promise<void>;
};

export const noopVersionControl: VersionControl = {
  add: async () => {},
  remove: async () => {},
};

type GitRun = {
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;
};

const runGit = (args: readonly string[], cwd: string): Promise<GitRun> =>
  new Promise((resolve, reject) => {
    const child = spawn("git", [...args], {
      cwd,
      stdio: ["ignore", "pipe", "pipe"],
    });

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];

    child.stdout.on("data", (chunk) => {
      stdoutChunks.push(Buffer.from(chunk));
    });

    child.stderr.on("data", (chunk) => {
      stderrChunks.push(Buffer.from(chunk));
    });

    child.on("error", (error) => {
      reject(new Error(`Failed to run git: ${error.message}`, { cause: error }));
    });

    child.on("close", (exitCode) => {
      resolve({
        exitCode,
        stdout: Buffer.concat(stdoutChunks).toString("utf8"),
        stderr: Buffer.concat(stderrChunks).toString("utf8"),
      });
    });
  });

const toRelative = (root: string, paths: readonly string[]): string[] =>
  paths.map((file) => path.relative(root, path.resolve(root, file)));

const expectSuccess = (command: string, run: GitRun) => {
  if (run.exitCode !== 0) {
    throw new Error(
      `${command} exited with code ${String(run.exitCode)}: ${run.stderr.trim()}`
    );
  }
};

/** Fails when `root` is not inside a git work tree. */
export const assertGitRepository = async (root: string): Promise<void> => {
  let run: GitRun;
  try {
    run = await runGit(["rev-parse", "--is-inside-work-tree"], root);
  } catch (error) {
    throw new ConfigurationError(
      `Cannot add outputs to git from ${root}; use --no-git-add`,
      { cause: error }
    );
  }
  if (run.exitCode !== 0 || run.stdout.trim() !== "true") {
    throw new ConfigurationError(
      `${root} is not inside a git repository; use --no-git-add`
    );
  }
};

export const createGitVersionControl = (root: string): VersionControl => ({
  async add(paths) {
    if (paths.length === 0) {
      return;
    }
    expectSuccess(
      "git add",
      await runGit(["add", "--", ...toRelative(root, paths)], root)
    );
  },
  async remove(paths) {
    if (paths.length === 0) {
      return;
    }
    expectSuccess(
      "git rm",
      await runGit(
        [
          "rm",
          "--cached",
          "--quiet",
          "--ignore-unmatch",
          "--",
          ...toRelative(root, paths),
        ],
        root
      )
    );
  },
});
