import { createScriptBackend } from "./script";
import { createStyleBackend } from "./style";
import { createTemplateBackend, type TemplateBackendOptions } from "./template";
import type { BackendSet } from "./types";

export { createScriptBackend } from "./script";
export { createStyleBackend } from "./style";
export {
  createTemplateBackend,
  type HandlebarsHelperMap,
  type TemplateBackendOptions,
} from "./template";
export type {
  BackendInputMap,
  BackendSet,
  CompileBackend,
  ScriptBackendInput,
  StyleBackendInput,
  TemplateBackendInput,
} from "./types";

export type DefaultBackendOptions = {
  readonly template?: TemplateBackendOptions;
};

/** Dart Sass for styles, esbuild for scripts, Handlebars for templates. */
export const createDefaultBackends = (
  options: DefaultBackendOptions = {}
): BackendSet => ({
  style: createStyleBackend(),
  script: createScriptBackend(),
  template: createTemplateBackend(options.template),
});
