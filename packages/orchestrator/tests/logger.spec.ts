import { describe, expect, test } from "vitest";

import { createDefaultLogger, StructuredLogger } from "../src/index";

const capture = () => {
  const records: Record<string, unknown>[] = [];
  const destination = {
    write: (message: string) => {
      records.push(JSON.parse(message));
    },
  };
  return { records, destination };
};

describe("StructuredLogger", () => {
  test("writes JSON records with metadata", () => {
    const { records, destination } = capture();
    const logger = new StructuredLogger({ level: "debug", destination });

    logger.info("Compiled: a.scss -> a.css", { file: "a.scss", stage: "style" });

    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      level: 30,
      name: "web-compile",
      msg: "Compiled: a.scss -> a.css",
      file: "a.scss",
      stage: "style",
    });
  });

  test("filters by level", () => {
    const { records, destination } = capture();
    const logger = new StructuredLogger({ level: "warn", destination });

    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");

    expect(records.map((record) => record.msg)).toEqual(["shown"]);
  });

  test("serializes errors", () => {
    const { records, destination } = capture();
    const logger = new StructuredLogger({ level: "info", destination });

    logger.error(new Error("disk full"), { output: "dist/a.css" });

    expect(records[0]).toMatchObject({
      level: 50,
      msg: "disk full",
      output: "dist/a.css",
      err: { message: "disk full" },
    });
  });

  test("createDefaultLogger accepts base context", () => {
    const { records, destination } = capture();
    const logger = createDefaultLogger({
      destination,
      baseContext: { run: "test-run" },
    });

    logger.warn("careful");

    expect(records[0]).toMatchObject({ run: "test-run", msg: "careful" });
  });
});
