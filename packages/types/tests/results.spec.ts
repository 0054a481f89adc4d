import { describe, expect, test } from "vitest";

import {
  ConfigurationError,
  createResultErr,
  createResultOk,
  createUnitError,
  DanglingReferenceError,
  isResultErr,
  isResultOk,
  isUnitError,
  STAGE_ORDER,
  UNIT_ERROR_CODES,
  webCompileConfigSchema,
} from "../src/index";

describe("result primitives", () => {
  test("createResultOk wraps payload without freezing value", () => {
    const value = { contents: "a{color:red}" };
    const result = createResultOk(value);

    expect(result.ok).toBe(true);
    expect(result.value).toBe(value);
    expect(isResultOk(result)).toBe(true);
    expect(isResultErr(result)).toBe(false);
  });

  test("createResultErr preserves error payload", () => {
    const error = new Error("kaboom");
    const result = createResultErr(error);

    expect(result.ok).toBe(false);
    expect(result.error).toBe(error);
    expect(isResultErr(result)).toBe(true);
  });
});

describe("unit errors", () => {
  test("createUnitError freezes the error", () => {
    const error = createUnitError({
      code: "COMPILE_ERROR",
      message: "expected \"}\"",
      sourcePath: "/work/a.scss",
      line: 2,
      column: 5,
    });

    expect(Object.isFrozen(error)).toBe(true);
    expect(error).toEqual({
      code: "COMPILE_ERROR",
      message: "expected \"}\"",
      sourcePath: "/work/a.scss",
      line: 2,
      column: 5,
    });
  });

  test("createUnitError omits optional properties when not provided", () => {
    const error = createUnitError({
      code: "IO_ERROR",
      message: "missing",
      sourcePath: "/work/a.js",
    });

    expect(Object.keys(error).sort()).toEqual([
      "code",
      "message",
      "sourcePath",
    ]);
  });

  test("isUnitError recognises every code and rejects others", () => {
    for (const code of UNIT_ERROR_CODES) {
      expect(
        isUnitError({ code, message: "x", sourcePath: "/work/a.scss" })
      ).toBe(true);
    }
    expect(isUnitError({ code: "NOPE", message: "x" })).toBe(false);
    expect(isUnitError(null)).toBe(false);
    expect(isUnitError("IO_ERROR")).toBe(false);
  });
});

describe("error classes", () => {
  test("ConfigurationError keeps its name and cause", () => {
    const cause = new Error("inner");
    const error = new ConfigurationError("bad config", { cause });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("ConfigurationError");
    expect(error.message).toBe("bad config");
    expect(error.cause).toBe(cause);
  });

  test("DanglingReferenceError names the missing source", () => {
    const error = new DanglingReferenceError("styles/missing.scss");

    expect(error.name).toBe("DanglingReferenceError");
    expect(error.reference).toBe("styles/missing.scss");
    expect(error.message).toBe(
      "No compiled output registered for source: styles/missing.scss"
    );
  });
});

describe("configuration schema", () => {
  test("stages run style, then script, then template", () => {
    expect(STAGE_ORDER).toEqual(["style", "script", "template"]);
  });

  test("accepts an empty section", () => {
    expect(webCompileConfigSchema.safeParse({}).success).toBe(true);
  });

  test("rejects unknown keys and malformed translate pairs", () => {
    expect(webCompileConfigSchema.safeParse({ colour: true }).success).toBe(
      false
    );
    expect(
      webCompileConfigSchema.safeParse({ style: { translate: ["src"] } })
        .success
    ).toBe(false);
    expect(
      webCompileConfigSchema.safeParse({ style: { translate: ["src:dist"] } })
        .success
    ).toBe(true);
  });

  test("limits exit codes to a byte", () => {
    expect(webCompileConfigSchema.safeParse({ exitCode: 256 }).success).toBe(
      false
    );
    expect(webCompileConfigSchema.safeParse({ exitCode: 0 }).success).toBe(
      true
    );
  });

  test("the error exit code is non-zero and distinct", () => {
    expect(
      webCompileConfigSchema.safeParse({ errorExitCode: 0 }).success
    ).toBe(false);

    const clash = webCompileConfigSchema.safeParse({
      exitCode: 2,
      errorExitCode: 2,
    });
    expect(clash.success).toBe(false);
    expect(clash.error?.issues).toMatchObject([
      {
        path: ["errorExitCode"],
        message: "errorExitCode must differ from exitCode",
      },
    ]);
    expect(
      webCompileConfigSchema.safeParse({ exitCode: 2, errorExitCode: 5 })
        .success
    ).toBe(true);
  });
});
