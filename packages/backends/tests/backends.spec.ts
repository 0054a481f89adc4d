import path from "node:path";
import { normalizeConfig } from "@webcompile/config";
import {
  type CompiledNameEntry,
  DanglingReferenceError,
  type RawWebCompileConfig,
} from "@webcompile/types";
import { describe, expect, test } from "vitest";

import {
  createDefaultBackends,
  createScriptBackend,
  createStyleBackend,
  createTemplateBackend,
} from "../src/index";

const ROOT = path.resolve("/work");

const stages = (raw: RawWebCompileConfig = {}) =>
  normalizeConfig(raw, { root: ROOT });

const registered: Record<string, CompiledNameEntry> = {
  "styles/site.scss": {
    outputPath: "dist/site.0123456789abcdef0123456789abcdef.css",
    hash: "0123456789abcdef0123456789abcdef",
  },
  "js/app.js": {
    outputPath: "js/app.min.js",
    hash: "fedcba9876543210fedcba9876543210",
  },
};

const lookup = (source: string): CompiledNameEntry => {
  const entry = registered[source];
  if (!entry) {
    throw new DanglingReferenceError(source);
  }
  return entry;
};

describe("style backend", () => {
  const compile = createStyleBackend();

  test("compiles compressed css by default", async () => {
    const result = await compile({
      source: "a {\n  color: red;\n}\n",
      sourcePath: path.join(ROOT, "a.scss"),
      outputDirectory: ROOT,
      options: stages().style,
    });

    expect(result).toEqual({ ok: true, value: { contents: "a{color:red}" } });
  });

  test("honours the expanded format", async () => {
    const result = await compile({
      source: "$c: blue;\na { color: $c; }\n",
      sourcePath: path.join(ROOT, "a.scss"),
      outputDirectory: ROOT,
      options: stages({ style: { format: "expanded" } }).style,
    });

    expect(result.ok && result.value.contents).toBe("a {\n  color: blue;\n}");
  });

  test("returns a source map relative to the output directory", async () => {
    const result = await compile({
      source: "a { color: red; }\n",
      sourcePath: path.join(ROOT, "src", "a.scss"),
      outputDirectory: path.join(ROOT, "dist"),
      options: stages({ style: { sourcemap: true } }).style,
    });

    expect(result.ok).toBe(true);
    if (!(result.ok && result.value.map)) {
      throw new Error("expected a source map");
    }
    const map: unknown = JSON.parse(result.value.map);
    expect(map).toMatchObject({ sources: ["../src/a.scss"] });
  });

  test("reports syntax errors with a position", async () => {
    const result = await compile({
      source: "a { color: red;\n",
      sourcePath: path.join(ROOT, "broken.scss"),
      outputDirectory: ROOT,
      options: stages().style,
    });

    expect(result.ok).toBe(false);
    if (result.ok) {
      return;
    }
    expect(result.error.code).toBe("COMPILE_ERROR");
    expect(result.error.line).toBeGreaterThanOrEqual(1);
  });
});

describe("script backend", () => {
  const compile = createScriptBackend();

  test("minifies and ends with a single newline", async () => {
    const result = await compile({
      source: "const answer = 42;\nconsole.log(answer);\n\n",
      sourcePath: path.join(ROOT, "app.js"),
      outputDirectory: ROOT,
      options: stages().script,
    });

    expect(result).toEqual({
      ok: true,
      value: { contents: "const answer=42;console.log(answer);\n" },
    });
  });

  test("keeps legal comments only when asked", async () => {
    const source = "/*! placeholder license */\nconsole.log(1);\n";
    const input = {
      source,
      sourcePath: path.join(ROOT, "app.js"),
      outputDirectory: ROOT,
    };

    const stripped = await compile({ ...input, options: stages().script });
    const kept = await compile({
      ...input,
      options: stages({ script: { comments: true } }).script,
    });

    expect(stripped.ok && stripped.value.contents).toBe("console.log(1);\n");
    expect(kept.ok && kept.value.contents).toContain(
      "/*! placeholder license */"
    );
  });

  test("reports syntax errors with line and column", async () => {
    const result = await compile({
      source: "const = ;\n",
      sourcePath: path.join(ROOT, "broken.js"),
      outputDirectory: ROOT,
      options: stages().script,
    });

    expect(result.ok).toBe(false);
    if (result.ok) {
      return;
    }
    expect(result.error.code).toBe("COMPILE_ERROR");
    expect(result.error.line).toBe(1);
    expect(result.error.column).toBeGreaterThan(0);
  });
});

describe("template backend", () => {
  const render = createTemplateBackend();

  const renderTemplate = (source: string, raw: RawWebCompileConfig = {}) =>
    render({
      source,
      sourcePath: path.join(ROOT, "views", "page.hbs"),
      outputDirectory: path.join(ROOT, "views"),
      options: stages(raw).template,
      lookup,
    });

  test("resolves compiled names of earlier stages", async () => {
    const result = await renderTemplate(
      '<link href="{{compiled_name "styles/site.scss"}}">\n' +
        '<script src="/{{compiled_path "js/app.js"}}"></script>\n' +
        "{{compiled_hash \"styles/site.scss\"}}|{{compiled_hash \"js/app.js\"}}\n\n"
    );

    expect(result).toEqual({
      ok: true,
      value: {
        contents:
          '<link href="site.0123456789abcdef0123456789abcdef.css">\n' +
          '<script src="/js/app.min.js"></script>\n' +
          "0123456789abcdef0123456789abcdef|fedcba9876543210fedcba9876543210\n",
      },
    });
  });

  test("renders variables with escaping and default helpers", async () => {
    const escaped = await renderTemplate("{{uppercase title}} {{name}}", {
      template: { variables: { title: "home", name: "Tom & Jerry" } },
    });
    const raw = await renderTemplate("{{name}}", {
      template: { variables: { name: "Tom & Jerry" }, noEscape: true },
    });

    expect(escaped.ok && escaped.value.contents).toBe(
      "HOME Tom &amp; Jerry\n"
    );
    expect(raw.ok && raw.value.contents).toBe("Tom & Jerry\n");
  });

  test("an unknown reference is a dangling reference", async () => {
    const result = await renderTemplate('{{compiled_name "styles/missing.scss"}}');

    expect(result).toMatchObject({
      ok: false,
      error: {
        code: "DANGLING_REFERENCE",
        message: "No compiled output registered for source: styles/missing.scss",
      },
    });
  });

  test("strict mode rejects missing variables", async () => {
    const strict = await renderTemplate("{{missing}}");
    const lenient = await renderTemplate("[{{missing}}]", {
      template: { strict: false },
    });

    expect(strict.ok).toBe(false);
    expect(!strict.ok && strict.error.code).toBe("COMPILE_ERROR");
    expect(lenient.ok && lenient.value.contents).toBe("[]\n");
  });

  test("extra helpers and partials are registered", async () => {
    const custom = createTemplateBackend({
      helpers: { shout: (value: unknown) => `${String(value)}!` },
      partials: { footer: "<footer>{{year}}</footer>" },
    });

    const result = await custom({
      source: "{{shout greeting}}\n{{> footer}}",
      sourcePath: path.join(ROOT, "views", "page.hbs"),
      outputDirectory: path.join(ROOT, "views"),
      options: stages({
        template: { variables: { greeting: "hi", year: 2024 } },
      }).template,
      lookup,
    });

    expect(result.ok && result.value.contents).toBe(
      "hi!\n<footer>2024</footer>\n"
    );
  });
});

describe("createDefaultBackends", () => {
  test("provides a backend per asset kind", () => {
    const backends = createDefaultBackends();

    expect(typeof backends.style).toBe("function");
    expect(typeof backends.script).toBe("function");
    expect(typeof backends.template).toBe("function");
  });
});
