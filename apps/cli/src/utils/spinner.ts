import ora from "ora";

/** The part of an ora spinner the commands settle. */
export type Spinner = {
  succeed(text?: string): unknown;
  fail(text?: string): unknown;
};

export type SpinnerFactory = (text: string) => Spinner;

/**
 * Creates a spinner that respects JSON/quiet logging modes so automated
 * consumers are not spammed with terminal animations.
 */
export function createSpinner(text: string, env: NodeJS.ProcessEnv = process.env): Spinner {
  const isJson = env.WEB_COMPILE_LOG_FORMAT === "json";
  const isQuiet = (env.WEB_COMPILE_LOG_LEVEL || "").toLowerCase() === "error";
  return ora({ text, isSilent: isJson || isQuiet }).start();
}
