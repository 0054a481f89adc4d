export {
  type ConfigFormat,
  detectConfigFormat,
  formatSchemaIssues,
  type LoadConfigOptions,
  type LoadedConfig,
  loadConfig,
  parseConfigContents,
  readConfigDocument,
} from "./load";
export {
  assertDistinctExitCodes,
  DEFAULT_CHANGED_EXIT_CODE,
  DEFAULT_ERROR_EXIT_CODE,
  normalizeConfig,
  parseTranslatePair,
} from "./normalize";
export {
  type CliOverrides,
  mergeCliOverrides,
  type RoutedPaths,
  routePathsByKind,
  stageForExtension,
} from "./overrides";
