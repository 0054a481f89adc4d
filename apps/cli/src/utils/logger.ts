import { LOG_LEVELS, type LogLevel } from "@webcompile/types";
import type { LogMetadata, Logger } from "@webcompile/orchestrator";
import chalk from "chalk";

type LineSink = {
  write(chunk: string): unknown;
};

type LoggerStreams = {
  readonly stdout?: LineSink;
  readonly stderr?: LineSink;
  readonly env?: NodeJS.ProcessEnv;
};

const ANSI_PATTERN = /\u001B\[[0-9;]*[A-Za-z]/g;

function stripAnsi(input: string): string {
  return input.replace(ANSI_PATTERN, "");
}

function write(stream: LineSink, message: string): void {
  stream.write(message.endsWith("\n") ? message : `${message}\n`);
}

const colourFor: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: (text) => text,
  warn: chalk.yellow,
  error: chalk.red,
};

/**
 * Logger that honours `WEB_COMPILE_LOG_LEVEL` and `WEB_COMPILE_LOG_FORMAT`,
 * emitting plain text for people or JSON lines for automation. The
 * environment is read on every call so flags parsed late still apply.
 */
export function createCliLogger(streams: LoggerStreams = {}): Logger {
  const env = streams.env ?? process.env;
  const stdout = streams.stdout ?? process.stdout;
  const stderr = streams.stderr ?? process.stderr;

  const currentLevel = (): LogLevel =>
    LOG_LEVELS.find((level) => level === env.WEB_COMPILE_LOG_LEVEL) ?? "info";

  const shouldLog = (level: LogLevel): boolean =>
    LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(currentLevel());

  const emit = (
    level: LogLevel,
    message: string | Error,
    metadata?: LogMetadata
  ) => {
    if (!shouldLog(level)) {
      return;
    }
    const stream = level === "warn" || level === "error" ? stderr : stdout;
    const text = message instanceof Error ? message.message : message;

    if (env.WEB_COMPILE_LOG_FORMAT === "json") {
      write(
        stream,
        JSON.stringify({
          level,
          ts: new Date().toISOString(),
          message: stripAnsi(text),
          ...metadata,
          ...(message instanceof Error ? { stack: message.stack } : {}),
        })
      );
      return;
    }

    const body =
      message instanceof Error ? (message.stack ?? message.message) : text;
    write(stream, colourFor[level](body));
  };

  return {
    debug: (message, metadata) => emit("debug", message, metadata),
    info: (message, metadata) => emit("info", message, metadata),
    warn: (message, metadata) => emit("warn", message, metadata),
    error: (message, metadata) => emit("error", message, metadata),
  };
}

export const logger = createCliLogger();
