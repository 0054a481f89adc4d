import type { LogLevel } from "@webcompile/types";
import pino, { type DestinationStream, type Logger as PinoLogger } from "pino";

export type LogMetadata = {
  file?: string;
  output?: string;
  stage?: string;
  line?: number;
  [key: string]: unknown;
};

export type Logger = {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string | Error, metadata?: LogMetadata): void;
};

/**
 * Logger configuration options.
 */
export type LoggerConfig = {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Whether to format logs for human reading */
  prettyPrint?: boolean;
  /** Additional context to include in all log messages */
  baseContext?: Record<string, unknown>;
  /** Stream receiving JSON lines when `prettyPrint` is off */
  destination?: DestinationStream;
};

const resolveLevel = (level: LogLevel | undefined): string =>
  level ?? process.env.WEB_COMPILE_LOG_LEVEL ?? "info";

/**
 * Pino-based structured logger used by the pipeline.
 */
export class StructuredLogger implements Logger {
  private readonly logger: PinoLogger;

  constructor(config: LoggerConfig = {}) {
    const {
      level,
      prettyPrint = process.env.NODE_ENV !== "production",
      baseContext = {},
      destination,
    } = config;

    const options = {
      level: resolveLevel(level),
      base: {
        name: "web-compile",
        ...baseContext,
      },
    };

    if (destination) {
      this.logger = pino(options, destination);
      return;
    }

    this.logger = pino({
      ...options,
      transport: prettyPrint
        ? {
            target: "pino-pretty",
            options: {
              colorize: true,
              translateTime: "SYS:standard",
              ignore: "pid,hostname,name",
            },
          }
        : undefined,
    });
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.logger.debug(metadata ?? {}, message);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.logger.info(metadata ?? {}, message);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.logger.warn(metadata ?? {}, message);
  }

  error(message: string | Error, metadata?: LogMetadata): void {
    if (message instanceof Error) {
      this.logger.error({ err: message, ...metadata }, message.message);
    } else {
      this.logger.error(metadata ?? {}, message);
    }
  }
}

export function createDefaultLogger(config?: LoggerConfig): Logger {
  return new StructuredLogger(config);
}
