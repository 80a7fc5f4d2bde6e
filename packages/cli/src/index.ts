export { createProgram, type CliDeps } from './lib/program.js';
export {
  CONFIG_FILES,
  CONFIG_TEMPLATE,
  OUTPUT_FORMATS,
  cliConfigSchema,
  configFromEnv,
  findConfigFile,
  loadConfigFile,
  mergeConfig,
  resolveConfig,
  toBridgeConfig,
  toPipelineConfig,
  toProviderConfig,
  type CliConfig,
  type OutputFormat,
  type ResolveConfigOptions,
} from './lib/config.js';
export { TOOL_DOC_FORMATS, renderToolCatalog, type ToolDocFormat, type ToolDocOptions } from './lib/toolDocs.js';
export { parseUrlList, renderAudit, renderBatch } from './lib/output.js';
