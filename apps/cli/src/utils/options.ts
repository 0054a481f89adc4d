import { LOG_FORMATS, LOG_LEVELS } from "@webcompile/types";
import { type Command, InvalidArgumentError, Option } from "commander";

export const addLoggingOptions = <T extends Command>(command: T): T => {
  command.addOption(
    new Option("--format <mode>", "Output format: text|json").choices([
      ...LOG_FORMATS,
    ])
  );
  command.addOption(
    new Option("--json", "Output JSON logs (alias for --format json)").hideHelp()
  );
  command.addOption(
    new Option("--log-level <level>", "Log level: debug|info|warn|error").choices(
      [...LOG_LEVELS]
    )
  );
  command.option("-q, --quiet", "Quiet mode: only errors are printed");

  return command;
};

/** Commander argument parser for non-negative integers. */
export const parseInteger = (value: string): number => {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return Number(value);
};

/** Like `parseInteger`, but zero is rejected. */
export const parsePositiveInteger = (value: string): number => {
  const parsed = parseInteger(value);
  if (parsed === 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
};

